// CHANGE: Make main.ts a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects
// COMPLEXITY: O(1)

import { defaultHarnessOptions, runHarness } from "./app/runHarness.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 * Runs the default suite with verification on.
 *
 * @returns ExitCode (0 | 1)
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(): Promise<ExitCode> {
	return runHarness(defaultHarnessOptions);
}
