// CHANGE: Pure decision function computing the harness exit code using Effect
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.hasFailedCases ∨ s.hasOutputMismatch) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, Either, pipe } from "effect";

import type { OutputMismatch } from "./errors.js";
import type { CaseOutcome, DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from a suite's decision state (pure function).
 *
 * @param state - Immutable flags computed from the suite run
 * @returns 1 if any case failed or stdout diverged; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.hasFailedCases ∨ state.hasOutputMismatch) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ hasFailedCases: true, hasOutputMismatch: false });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasFailedCases || s.hasOutputMismatch,
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Derives decision flags from outcomes and an already computed stdout
 * comparison.
 *
 * @pure true
 * @complexity O(n) where n = |outcomes|
 */
export const decisionStateOf = (
	outcomes: readonly CaseOutcome[],
	comparison: Either.Either<void, OutputMismatch>,
): DecisionState => ({
	hasFailedCases: outcomes.some((o) => !o.passed),
	hasOutputMismatch: Either.isLeft(comparison),
});

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @pure false - wraps in Effect for composition
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
