/**
 * OCC Symbol Tests
 */

import { describe, expect, test } from "vitest";
import { buildOccSymbol, parseOccSymbol, toDateKey } from "../src/occ.js";

describe("parseOccSymbol", () => {
	test("parses a call", () => {
		const parsed = parseOccSymbol("AAPL240119C00150000");
		expect(parsed).toEqual({
			underlying: "AAPL",
			expiration: new Date(Date.UTC(2024, 0, 19)),
			optionType: "CALL",
			strike: 150,
		});
	});

	test("parses a put with a fractional strike", () => {
		const parsed = parseOccSymbol("SPY240315P00412500");
		expect(parsed?.optionType).toBe("PUT");
		expect(parsed?.strike).toBe(412.5);
		expect(parsed?.underlying).toBe("SPY");
	});

	test("rejects malformed symbols", () => {
		expect(parseOccSymbol("AAPL")).toBeUndefined();
		expect(parseOccSymbol("AAPL240119X00150000")).toBeUndefined();
		expect(parseOccSymbol("aapl240119C00150000")).toBeUndefined();
	});

	test("rejects impossible dates and zero strikes", () => {
		expect(parseOccSymbol("AAPL240231C00150000")).toBeUndefined();
		expect(parseOccSymbol("AAPL240119C00000000")).toBeUndefined();
	});
});

describe("buildOccSymbol", () => {
	test("builds from components", () => {
		expect(buildOccSymbol("AAPL", new Date(Date.UTC(2024, 0, 19)), "CALL", 150)).toBe(
			"AAPL240119C00150000"
		);
		expect(buildOccSymbol("SPY", new Date(Date.UTC(2024, 2, 15)), "PUT", 412.5)).toBe(
			"SPY240315P00412500"
		);
	});
});

describe("toDateKey", () => {
	test("formats the UTC calendar date", () => {
		expect(toDateKey(new Date("2024-01-19T23:30:00Z"))).toBe("2024-01-19");
	});
});
