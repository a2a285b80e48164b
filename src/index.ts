// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// GCD (Functional Core)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Euclidean GCD.
 *
 * @example
 * ```typescript
 * import { gcd, gcdInt64, int64 } from 'gcd64';
 *
 * gcd(123456n, 789012n);              // 12n
 * gcdInt64(int64(54), int64(24));     // Either.right(6n)
 * ```
 */
export { gcd, gcdAll, gcdEffect, gcdInt64 } from "./core/gcd.js";
export {
	euclidTrace,
	type EuclidStep,
	lameBound,
	stepCount,
} from "./core/euclid.js";
export {
	abs64,
	formatInt64,
	INT64_MAX,
	INT64_MIN,
	int64,
	isInt64Range,
	toInt64,
} from "./core/int64.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFORMANCE (Oracle and comparison)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	buildReport,
	compareStdout,
	evaluatePrefix,
	evaluateSuite,
	expectedStdout,
	renderStdout,
	type SuiteEvaluation,
} from "./core/conformance.js";
export { computeExitCode, decisionStateOf } from "./core/decision.js";
export { GCD_SUITE } from "./core/suites.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HARNESS (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @pure false - prints results to stdout, diagnostics to stderr
 * @returns ExitCode (0 = every line matched, 1 = divergence or overflow)
 */
export {
	defaultHarnessOptions,
	type HarnessOptions,
	runHarness,
	runHarnessEffect,
} from "./app/runHarness.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	Int64OutOfRange,
	Int64Overflow,
	OutputMismatch,
} from "./core/errors.js";
export type {
	CaseOutcome,
	ConformanceCase,
	ConformanceSuite,
	DecisionState,
	ExitCode,
	GcdFunction,
	Int64,
	SuiteReport,
} from "./core/models.js";
