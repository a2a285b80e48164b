// CHANGE: Pure evaluation and stdout comparison for conformance suites
// FORMAT THEOREM: ∀suite, fn: renderStdout(outcomes.map(actual)) = expectedStdout(suite) ↔ ∀o ∈ outcomes: o.passed
// PURITY: CORE
// INVARIANT: No side effects; outcome order = case order
// COMPLEXITY: O(n) where n = |suite.cases|

import { Either, Option } from "effect";

import { OutputMismatch, type Int64Overflow } from "./errors.js";
import { formatInt64 } from "./int64.js";
import type {
	CaseOutcome,
	ConformanceSuite,
	GcdFunction,
	Int64,
	SuiteReport,
} from "./models.js";

const MISSING_LINE = "<missing>";

/**
 * Cases evaluated before the first overflow, plus that overflow if any.
 *
 * @invariant Option.isNone(overflow) → outcomes.length = suite.cases.length
 */
export interface SuiteEvaluation {
	readonly outcomes: readonly CaseOutcome[];
	readonly overflow: Option.Option<Int64Overflow>;
}

/**
 * Runs cases through `fn` in table order, keeping every outcome produced
 * before the first overflow.
 *
 * @pure true (given a pure fn)
 * @invariant outcomes is a prefix of the suite, in case order
 * @complexity O(n)
 */
export function evaluatePrefix(
	suite: ConformanceSuite,
	fn: GcdFunction,
): SuiteEvaluation {
	const outcomes: CaseOutcome[] = [];
	for (const c of suite.cases) {
		const result = fn(c.a, c.b);
		if (Either.isLeft(result)) {
			return { outcomes, overflow: Option.some(result.left) };
		}
		outcomes.push({
			case: c,
			actual: result.right,
			passed: result.right === c.expected,
		});
	}
	return { outcomes, overflow: Option.none() };
}

/**
 * Runs every case through `fn`, failing on the first overflow.
 *
 * @pure true (given a pure fn)
 * @invariant isRight(result) → result.right.length = suite.cases.length
 * @complexity O(n)
 */
export function evaluateSuite(
	suite: ConformanceSuite,
	fn: GcdFunction,
): Either.Either<readonly CaseOutcome[], Int64Overflow> {
	const { outcomes, overflow } = evaluatePrefix(suite, fn);
	return Option.match(overflow, {
		onNone: () => Either.right(outcomes),
		onSome: (error) => Either.left(error),
	});
}

/**
 * One `%lld\n` line per value.
 *
 * @pure true
 * @invariant result.split("\n").length = values.length + 1
 * @complexity O(n)
 */
export const renderStdout = (values: readonly Int64[]): string =>
	values.map((v) => `${formatInt64(v)}\n`).join("");

export const expectedStdout = (suite: ConformanceSuite): string =>
	renderStdout(suite.cases.map((c) => c.expected));

const splitLines = (text: string): readonly string[] => {
	const lines = text.split("\n");
	// A trailing "\n" terminates the last line rather than starting a new one.
	return lines.at(-1) === "" ? lines.slice(0, -1) : lines;
};

/**
 * Byte-exact stdout comparison that names the first differing line.
 *
 * @pure true
 * @invariant isLeft(result) ↔ actual ≠ expected
 * @complexity O(|actual| + |expected|)
 *
 * @example
 * ```ts
 * compareStdout("0\n1\n", "0\n2\n")
 * // Left(OutputMismatch { line: 2, expected: "2", actual: "1" })
 * ```
 */
export function compareStdout(
	actual: string,
	expected: string,
): Either.Either<void, OutputMismatch> {
	if (actual === expected) return Either.right(undefined);

	const actualLines = splitLines(actual);
	const expectedLines = splitLines(expected);
	const length = Math.max(actualLines.length, expectedLines.length);
	for (let i = 0; i < length; i++) {
		const a = actualLines[i];
		const e = expectedLines[i];
		if (a !== e) {
			return Either.left(
				new OutputMismatch({
					line: i + 1,
					expected: e ?? MISSING_LINE,
					actual: a ?? MISSING_LINE,
				}),
			);
		}
	}
	// Same lines, different terminators (e.g. missing final newline).
	return Either.left(
		new OutputMismatch({
			line: length,
			expected: JSON.stringify(expected.slice(-1)),
			actual: JSON.stringify(actual.slice(-1)),
		}),
	);
}

/**
 * @pure true
 * @invariant result.outcomes = outcomes
 * @complexity O(n)
 */
export function buildReport(
	suite: ConformanceSuite,
	outcomes: readonly CaseOutcome[],
): SuiteReport {
	return {
		suite,
		outcomes,
		stdout: renderStdout(outcomes.map((o) => o.actual)),
		expectedStdout: expectedStdout(suite),
	};
}
