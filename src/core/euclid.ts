// CHANGE: Observable Euclidean trace with Lamé step bound
// FORMAT THEOREM: ∀a,b: |a| ≥ |b| > 0 → |euclidTrace(a,b)| ≤ 5 · digits(|b|)
// PURITY: CORE
// INVARIANT: Each step's remainder is strictly smaller than its divisor
// COMPLEXITY: O(log min(|a|,|b|))

import { abs64 } from "./int64.js";

/**
 * One division of the Euclidean algorithm:
 * dividend = quotient · divisor + remainder, 0 ≤ remainder < divisor.
 */
export interface EuclidStep {
	readonly dividend: bigint;
	readonly divisor: bigint;
	readonly quotient: bigint;
	readonly remainder: bigint;
}

/**
 * Every division performed while computing gcd(a, b), in order.
 *
 * @pure true
 * @invariant b = 0 → result = []
 * @invariant result.at(-1).remainder = 0 when non-empty; its divisor is gcd(a, b)
 * @complexity O(log min(|a|,|b|))
 *
 * @example
 * ```ts
 * euclidTrace(54n, 24n)
 * // [ { dividend: 54n, divisor: 24n, quotient: 2n, remainder: 6n },
 * //   { dividend: 24n, divisor: 6n,  quotient: 4n, remainder: 0n } ]
 * ```
 */
export function euclidTrace(a: bigint, b: bigint): readonly EuclidStep[] {
	const steps: EuclidStep[] = [];
	let x = abs64(a);
	let y = abs64(b);
	while (y !== 0n) {
		const remainder = x % y;
		steps.push({ dividend: x, divisor: y, quotient: x / y, remainder });
		x = y;
		y = remainder;
	}
	return steps;
}

export const stepCount = (a: bigint, b: bigint): number =>
	euclidTrace(a, b).length;

/**
 * Lamé's bound: five times the number of decimal digits of the smaller
 * operand. digits(0) = 0. Holds for |a| ≥ |b|; the opposite order adds one
 * quotient-zero swap step.
 *
 * @pure true
 * @invariant result ≥ 0
 * @complexity O(digits)
 */
export function lameBound(a: bigint, b: bigint): number {
	const x = abs64(a);
	const y = abs64(b);
	const smaller = x < y ? x : y;
	return smaller === 0n ? 0 : 5 * smaller.toString(10).length;
}
