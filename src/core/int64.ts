// CHANGE: Signed 64-bit integer domain on top of bigint
// FORMAT THEOREM: ∀n ∈ ℤ: isRight(toInt64(n)) ↔ INT64_MIN ≤ n ≤ INT64_MAX
// PURITY: CORE
// INVARIANT: Every Int64 value lies in [-2^63, 2^63 - 1]
// COMPLEXITY: O(1) per operation

import { Brand, Either } from "effect";

import { Int64OutOfRange } from "./errors.js";
import type { Int64 } from "./models.js";

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

// Unchecked brand; every caller below has established the range first.
const brandInt64 = Brand.nominal<Int64>();

/**
 * @pure true
 * @invariant result ↔ INT64_MIN ≤ n ≤ INT64_MAX
 * @complexity O(1)
 */
export function isInt64Range(n: bigint): boolean {
	return n >= INT64_MIN && n <= INT64_MAX;
}

/**
 * Range-checked constructor.
 *
 * Numbers are accepted only when they are safe integers; a number past
 * 2^53 has already lost the digits that would make it an exact Int64.
 *
 * @pure true
 * @invariant isRight(result) → isInt64Range(result.right)
 * @complexity O(1)
 *
 * @example
 * ```ts
 * toInt64(42)        // Right(42n)
 * toInt64(2n ** 63n) // Left(Int64OutOfRange)
 * toInt64(1.5)       // Left(Int64OutOfRange)
 * ```
 */
export function toInt64(
	n: bigint | number,
): Either.Either<Int64, Int64OutOfRange> {
	if (typeof n === "number" && !Number.isSafeInteger(n)) {
		return Either.left(new Int64OutOfRange({ value: String(n) }));
	}
	const value = BigInt(n);
	return isInt64Range(value)
		? Either.right(brandInt64(value))
		: Either.left(new Int64OutOfRange({ value: value.toString() }));
}

/**
 * Throwing constructor for literal tables known to be in range.
 *
 * @pure true (throws Int64OutOfRange for values outside the range)
 * @invariant isInt64Range(result)
 * @complexity O(1)
 */
export function int64(n: bigint | number): Int64 {
	return Either.getOrThrowWith(toInt64(n), (error) => error);
}

/**
 * Absolute value, widened to an unbounded bigint.
 *
 * @pure true
 * @invariant result ≥ 0; abs64(INT64_MIN) = 2^63 > INT64_MAX
 * @complexity O(1)
 */
export function abs64(n: bigint): bigint {
	return n < 0n ? -n : n;
}

/**
 * Decimal rendering matching printf's `%lld`.
 *
 * @pure true
 * @complexity O(digits)
 */
export const formatInt64 = (n: Int64): string => n.toString(10);
