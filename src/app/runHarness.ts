// CHANGE: Application layer orchestration (APP) for the conformance harness
// PURITY: APP (no process.exit here; console output delegated to SHELL)
// EFFECT: Effect<ExitCode, never, never>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n) where n = |suite.cases|

import { Effect, Either, Option } from "effect";

import {
	buildReport,
	compareStdout,
	evaluatePrefix,
} from "../core/conformance.js";
import { computeExitCodeEffect, decisionStateOf } from "../core/decision.js";
import { gcdInt64 } from "../core/gcd.js";
import type {
	ConformanceSuite,
	ExitCode,
	GcdFunction,
	SuiteReport,
} from "../core/models.js";
import { GCD_SUITE } from "../core/suites.js";
import {
	printResults,
	reportFailedCases,
	reportMismatch,
	reportOverflow,
} from "../shell/output/printer.js";

export interface HarnessOptions {
	readonly suite: ConformanceSuite;
	readonly implementation: GcdFunction;
	/** Compare produced stdout with the oracle and fail on divergence. */
	readonly verify: boolean;
}

export const defaultHarnessOptions: HarnessOptions = {
	suite: GCD_SUITE,
	implementation: gcdInt64,
	verify: true,
};

const SUCCESS: ExitCode = 0;
const FAILURE: ExitCode = 1;

function verifyReport(report: SuiteReport): Effect.Effect<ExitCode> {
	const name = report.suite.name;
	return Effect.gen(function* () {
		const comparison = compareStdout(report.stdout, report.expectedStdout);
		if (Either.isLeft(comparison)) {
			yield* reportMismatch(name, comparison.left);
		}
		yield* reportFailedCases(name, report.outcomes);
		return yield* computeExitCodeEffect(
			decisionStateOf(report.outcomes, comparison),
		);
	});
}

/**
 * Evaluate, print, and (optionally) verify one suite.
 *
 * Results computed before an overflow are still printed, in case order;
 * the overflow then goes to stderr and ends the run.
 *
 * @pure false (console output via SHELL)
 * @effect Effect<ExitCode, never, never>
 * @invariant verify = false → result = 0 unless the implementation overflows
 */
export function runHarnessEffect(
	options: HarnessOptions,
): Effect.Effect<ExitCode> {
	const { suite } = options;
	return Effect.gen(function* () {
		const { outcomes, overflow } = evaluatePrefix(
			suite,
			options.implementation,
		);
		yield* printResults(outcomes);

		if (Option.isSome(overflow)) {
			yield* reportOverflow(suite.name, overflow.value);
			return FAILURE;
		}

		const exitCode: ExitCode = options.verify
			? yield* verifyReport(buildReport(suite, outcomes))
			: SUCCESS;
		return exitCode;
	});
}

/**
 * Programmatic entry point.
 *
 * @example
 * ```ts
 * import { runHarness } from "gcd64";
 *
 * const exitCode = await runHarness({ verify: false });
 * ```
 *
 * @returns ExitCode (0 = every line matched, 1 = divergence or overflow)
 */
export function runHarness(
	options: Partial<HarnessOptions> = {},
): Promise<ExitCode> {
	return Effect.runPromise(
		runHarnessEffect({ ...defaultHarnessOptions, ...options }),
	);
}
