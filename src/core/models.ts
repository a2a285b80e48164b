// CHANGE: Functional Core domain models for the GCD conformance harness (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { Brand, Either } from "effect";

import type { Int64Overflow } from "./errors.js";

/**
 * Signed 64-bit integer carried as a bigint.
 *
 * @remarks
 * - @invariant -2^63 ≤ n ≤ 2^63 - 1
 * - Only produced by the range-checked constructors in `int64.ts`
 */
export type Int64 = bigint & Brand.Brand<"Int64">;

/**
 * The 64-bit GCD contract: two Int64 in, one Int64 out, or an overflow
 * when the mathematical result (2^63) has no Int64 representation.
 */
export type GcdFunction = (
	a: Int64,
	b: Int64,
) => Either.Either<Int64, Int64Overflow>;

/**
 * One row of the oracle table.
 */
export interface ConformanceCase {
	readonly a: Int64;
	readonly b: Int64;
	readonly expected: Int64;
}

/**
 * Named, ordered list of cases. Order is significant: it is the line order
 * of the harness output.
 */
export interface ConformanceSuite {
	readonly name: string;
	readonly cases: readonly ConformanceCase[];
}

/**
 * Result of running one case.
 *
 * @remarks
 * - @invariant passed ↔ actual = case.expected
 */
export interface CaseOutcome {
	readonly case: ConformanceCase;
	readonly actual: Int64;
	readonly passed: boolean;
}

/**
 * Everything the harness learned from one suite run.
 *
 * @remarks
 * - @invariant outcomes.length = suite.cases.length
 * - @invariant stdout has exactly one "\n"-terminated line per outcome
 */
export interface SuiteReport {
	readonly suite: ConformanceSuite;
	readonly outcomes: readonly CaseOutcome[];
	readonly stdout: string;
	readonly expectedStdout: string;
}

/**
 * Exit code for the harness process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing exit code from a suite run.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 * - @complexity O(1)
 */
export interface DecisionState {
	readonly hasFailedCases: boolean;
	readonly hasOutputMismatch: boolean;
}
