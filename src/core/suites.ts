// CHANGE: Fixed GCD oracle table
// PURITY: CORE
// INVARIANT: Row order is the harness output order

import { int64 } from "./int64.js";
import type { ConformanceCase, ConformanceSuite } from "./models.js";

const row = (a: number, b: number, expected: number): ConformanceCase => ({
	a: int64(a),
	b: int64(b),
	expected: int64(expected),
});

export const GCD_SUITE: ConformanceSuite = {
	name: "gcd",
	cases: [
		row(0, 0, 0),
		row(17, 31, 1),
		row(37, 11, 1),
		row(10, 5, 5),
		row(54, 24, 6),
		row(123456, 789012, 12),
		row(0, 28, 28),
		row(42, 42, 42),
	],
};
