// CHANGE: Deterministic and property-based specs for the Euclidean GCD
// FORMAT THEOREM: ∀a,b ∈ ℤ: gcd(a,b) | a ∧ gcd(a,b) | b ∧ gcd(a/g, b/g) = 1 where g = gcd(a,b) > 0
// PURITY: CORE
// INVARIANT: gcd(a,b) ≥ 0; gcd(0,0) = 0
// COMPLEXITY: O(log min(|a|,|b|)) per assertion

import { Effect, Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { Int64Overflow } from "../../src/core/errors.js";
import {
	gcd,
	gcdAll,
	gcdEffect,
	gcdInt64,
} from "../../src/core/gcd.js";
import { INT64_MAX, INT64_MIN, int64 } from "../../src/core/int64.js";

const int64Arbitrary = fc.bigInt({ min: INT64_MIN, max: INT64_MAX });
const nonNegativeArbitrary = fc.bigInt({ min: 0n, max: INT64_MAX });

describe("gcd", () => {
	it.each([
		[0n, 0n, 0n],
		[17n, 31n, 1n],
		[37n, 11n, 1n],
		[10n, 5n, 5n],
		[54n, 24n, 6n],
		[123456n, 789012n, 12n],
		[0n, 28n, 28n],
		[42n, 42n, 42n],
	])("gcd(%s, %s) = %s", (a, b, expected) => {
		expect(gcd(a, b)).toBe(expected);
	});

	it("returns the non-zero operand when the other is zero", () => {
		expect(gcd(28n, 0n)).toBe(28n);
		expect(gcd(0n, 28n)).toBe(28n);
	});

	it("takes negative operands by absolute value", () => {
		expect(gcd(-15n, 35n)).toBe(5n);
		expect(gcd(15n, -35n)).toBe(5n);
		expect(gcd(-15n, -35n)).toBe(5n);
		expect(gcd(-7n, 0n)).toBe(7n);
	});

	it("returns 2^63 for INT64_MIN paired with zero", () => {
		expect(gcd(INT64_MIN, 0n)).toBe(2n ** 63n);
	});

	it("handles consecutive Fibonacci numbers (worst case for Euclid)", () => {
		// F(91), F(92): both below 2^63
		expect(gcd(4660046610375530309n, 7540113804746346429n)).toBe(1n);
	});
});

describe("gcd properties", () => {
	it("is commutative", () => {
		fc.assert(
			fc.property(int64Arbitrary, int64Arbitrary, (a, b) => {
				expect(gcd(a, b)).toBe(gcd(b, a));
			}),
		);
	});

	it("has zero as identity and is reflexive up to sign", () => {
		fc.assert(
			fc.property(int64Arbitrary, (a) => {
				const magnitude = a < 0n ? -a : a;
				expect(gcd(a, 0n)).toBe(magnitude);
				expect(gcd(0n, a)).toBe(magnitude);
				expect(gcd(a, a)).toBe(magnitude);
			}),
		);
	});

	it("divides both operands and leaves coprime cofactors", () => {
		fc.assert(
			fc.property(int64Arbitrary, int64Arbitrary, (a, b) => {
				const g = gcd(a, b);
				expect(g >= 0n).toBe(true);
				if (g === 0n) {
					expect(a).toBe(0n);
					expect(b).toBe(0n);
					return;
				}
				expect(a % g).toBe(0n);
				expect(b % g).toBe(0n);
				expect(gcd(a / g, b / g)).toBe(1n);
			}),
		);
	});

	it("is a multiple of every common divisor", () => {
		fc.assert(
			fc.property(
				fc.bigInt({ min: 1n, max: 1000n }),
				fc.bigInt({ min: -(10n ** 12n), max: 10n ** 12n }),
				fc.bigInt({ min: -(10n ** 12n), max: 10n ** 12n }),
				(d, x, y) => {
					expect(gcd(d * x, d * y) % d).toBe(0n);
				},
			),
		);
	});
});

describe("gcdInt64", () => {
	it("returns the divisor for in-range operands", () => {
		expect(Either.getOrThrow(gcdInt64(int64(54), int64(24)))).toBe(6n);
		expect(Either.getOrThrow(gcdInt64(int64(0), int64(0)))).toBe(0n);
	});

	it("returns INT64_MAX's own magnitude for (INT64_MAX, 0)", () => {
		expect(Either.getOrThrow(gcdInt64(int64(INT64_MAX), int64(0)))).toBe(
			INT64_MAX,
		);
	});

	it.each([
		[INT64_MIN, 0n],
		[0n, INT64_MIN],
		[INT64_MIN, INT64_MIN],
	])("reports overflow for gcd(%s, %s)", (a, b) => {
		const result = gcdInt64(int64(a), int64(b));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left).toBeInstanceOf(Int64Overflow);
			expect(result.left.a).toBe(a.toString());
			expect(result.left.b).toBe(b.toString());
		}
	});

	it("stays in range when INT64_MIN meets any other non-zero value", () => {
		expect(Either.getOrThrow(gcdInt64(int64(INT64_MIN), int64(6)))).toBe(2n);
		expect(
			Either.getOrThrow(gcdInt64(int64(INT64_MIN), int64(INT64_MAX))),
		).toBe(1n);
	});

	it("agrees with gcd on every non-negative pair", () => {
		fc.assert(
			fc.property(nonNegativeArbitrary, nonNegativeArbitrary, (a, b) => {
				expect(Either.getOrThrow(gcdInt64(int64(a), int64(b)))).toBe(
					gcd(a, b),
				);
			}),
		);
	});
});

describe("gcdEffect", () => {
	it("succeeds with the divisor", () => {
		expect(Effect.runSync(gcdEffect(int64(123456), int64(789012)))).toBe(12n);
	});

	it("fails with Int64Overflow in the error channel", () => {
		const result = Effect.runSync(
			Effect.either(gcdEffect(int64(INT64_MIN), int64(0))),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("Int64Overflow");
		}
	});
});

describe("gcdAll", () => {
	it("returns 0 for an empty list", () => {
		expect(gcdAll([])).toBe(0n);
	});

	it("folds over every element", () => {
		expect(gcdAll([12n, 18n, 30n])).toBe(6n);
		expect(gcdAll([0n, -8n])).toBe(8n);
	});

	it("stops at 1", () => {
		expect(gcdAll([4n, 9n, 100n])).toBe(1n);
	});
});
