// CHANGE: Euclidean greatest common divisor over bigint and over Int64
// SOURCE: https://en.wikipedia.org/wiki/Euclidean_algorithm
// FORMAT THEOREM: ∀a,b ∈ ℤ: gcd(a,b) ≥ 0 ∧ gcd(a,b) | a ∧ gcd(a,b) | b ∧ (∀d: d | a ∧ d | b → d ≤ gcd(a,b)) ∨ a = b = 0
// PURITY: CORE
// INVARIANT: No modulo by zero is ever evaluated; gcd(0,0) = 0
// COMPLEXITY: O(log min(|a|,|b|)) remainder steps (Lamé)

import { Effect, Either, pipe } from "effect";

import { Int64Overflow } from "./errors.js";
import { abs64, formatInt64, toInt64 } from "./int64.js";
import type { GcdFunction, Int64 } from "./models.js";

/**
 * Greatest common divisor of two arbitrary integers.
 *
 * Negative operands are taken by absolute value, so the result is never
 * negative.
 *
 * @pure true
 * @invariant result ≥ 0
 * @postcondition gcd(a, 0) = |a|, gcd(0, b) = |b|, gcd(a, a) = |a|
 * @complexity O(log min(|a|,|b|))
 *
 * @example
 * ```ts
 * gcd(54n, 24n)          // 6n
 * gcd(123456n, 789012n)  // 12n
 * gcd(0n, 0n)            // 0n
 * gcd(-15n, 35n)         // 5n
 * ```
 */
export function gcd(a: bigint, b: bigint): bigint {
	let x = abs64(a);
	let y = abs64(b);
	if (x === 0n && y === 0n) return 0n;

	while (y !== 0n) {
		const r = x % y;
		x = y;
		y = r;
	}
	return x;
}

/**
 * The signed 64-bit contract.
 *
 * The only unrepresentable result is 2^63, reached when INT64_MIN is paired
 * with 0 or with itself; that case is an Int64Overflow instead of a wrapped
 * negative value.
 *
 * @pure true
 * @invariant isRight(result) → 0 ≤ result.right ≤ INT64_MAX
 * @complexity O(log min(|a|,|b|))
 */
export const gcdInt64: GcdFunction = (a, b) =>
	pipe(
		toInt64(gcd(a, b)),
		Either.mapLeft(
			() => new Int64Overflow({ a: formatInt64(a), b: formatInt64(b) }),
		),
	);

/**
 * `gcdInt64` lifted into Effect for APP composition.
 *
 * @pure false - wraps in Effect for composition
 * @effect Effect<Int64, Int64Overflow, never>
 * @complexity O(log min(|a|,|b|))
 */
export const gcdEffect = (
	a: Int64,
	b: Int64,
): Effect.Effect<Int64, Int64Overflow> =>
	Effect.suspend(() =>
		Either.match(gcdInt64(a, b), {
			onLeft: (error) => Effect.fail(error),
			onRight: (value) => Effect.succeed(value),
		}),
	);

/**
 * GCD of a list; 0 is the identity, so the empty list yields 0.
 * Stops as soon as the running divisor reaches 1.
 *
 * @pure true
 * @invariant result ≥ 0
 * @complexity O(n · log M) where n = |values|, M = max |value|
 */
export function gcdAll(values: readonly bigint[]): bigint {
	let acc = 0n;
	for (const value of values) {
		acc = gcd(acc, value);
		if (acc === 1n) return acc;
	}
	return acc;
}
