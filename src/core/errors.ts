// CHANGE: Typed domain error ADT for the GCD core using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Value does not fit in a signed 64-bit integer, or is not an integer at all.
 *
 * @pure true (Data class)
 * @invariant value.length > 0
 */
export class Int64OutOfRange extends Data.TaggedError("Int64OutOfRange")<{
	readonly value: string;
}> {}

/**
 * GCD of the operands is 2^63, one past INT64_MAX.
 *
 * @pure true (Data class)
 * @invariant a = INT64_MIN ∨ b = INT64_MIN
 */
export class Int64Overflow extends Data.TaggedError("Int64Overflow")<{
	readonly a: string;
	readonly b: string;
}> {}

/**
 * Produced stdout differs from the oracle's stdout.
 *
 * @pure true (Data class)
 * @invariant line ≥ 1
 */
export class OutputMismatch extends Data.TaggedError("OutputMismatch")<{
	readonly line: number;
	readonly expected: string;
	readonly actual: string;
}> {}
