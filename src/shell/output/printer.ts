// CHANGE: Harness output — results on stdout, diagnostics on stderr
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: stdout receives exactly one line per outcome, nothing else
// COMPLEXITY: O(n) where n = |outcomes|

import { Effect } from "effect";

import type { Int64Overflow, OutputMismatch } from "../../core/errors.js";
import { formatInt64 } from "../../core/int64.js";
import type { CaseOutcome } from "../../core/models.js";

/**
 * Prints each result as `%lld\n`, in case order.
 *
 * @pure false (console output)
 * @postcondition bytes written to stdout = renderStdout(outcomes.map(actual))
 */
export function printResults(
	outcomes: readonly CaseOutcome[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const outcome of outcomes) {
			console.log(formatInt64(outcome.actual));
		}
	});
}

const describeCase = (o: CaseOutcome): string =>
	`gcd(${formatInt64(o.case.a)}, ${formatInt64(o.case.b)})`;

/**
 * Lists every failed case on stderr.
 *
 * @pure false (console output)
 */
export function reportFailedCases(
	suiteName: string,
	outcomes: readonly CaseOutcome[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const o of outcomes) {
			if (o.passed) continue;
			console.error(
				`❌ ${suiteName}: ${describeCase(o)} = ${formatInt64(o.actual)}, expected ${formatInt64(o.case.expected)}`,
			);
		}
	});
}

export function reportMismatch(
	suiteName: string,
	error: OutputMismatch,
): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(`❌ ${suiteName}: stdout differs at line ${error.line}`);
		console.error(`   expected: ${error.expected}`);
		console.error(`   actual:   ${error.actual}`);
	});
}

export function reportOverflow(
	suiteName: string,
	error: Int64Overflow,
): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(
			`❌ ${suiteName}: gcd(${error.a}, ${error.b}) does not fit in a signed 64-bit integer`,
		);
	});
}
