/**
 * Fixed-Point Price Tests
 */

import { describe, expect, test } from "vitest";
import { fromMicros, midpoint, priceDifference, quantizePrice, toMicros } from "../src/decimal.js";

describe("toMicros / fromMicros", () => {
	test("converts to integer micro-units", () => {
		expect(toMicros(187.5)).toBe(187_500_000);
		expect(fromMicros(187_500_000)).toBe(187.5);
	});

	test("rejects non-finite prices", () => {
		expect(() => toMicros(Number.NaN)).toThrow(RangeError);
		expect(() => toMicros(Number.POSITIVE_INFINITY)).toThrow(RangeError);
	});
});

describe("quantizePrice", () => {
	test("rounds to six decimal places", () => {
		expect(quantizePrice(1.23456789)).toBe(1.234568);
		expect(quantizePrice(42)).toBe(42);
	});
});

describe("midpoint", () => {
	test("is exact where float arithmetic is not", () => {
		expect((0.1 + 0.2) / 2).not.toBe(0.15);
		expect(midpoint(0.1, 0.2)).toBe(0.15);
	});

	test("averages bid and ask", () => {
		expect(midpoint(187.5, 187.52)).toBe(187.51);
	});

	test("rounds a half micro-unit up", () => {
		expect(midpoint(100, 100.000001)).toBe(100.000001);
	});
});

describe("priceDifference", () => {
	test("subtracts on the fixed-point grid", () => {
		expect(priceDifference(0.3, 0.1)).toBe(0.2);
	});
});
