/**
 * E*TRADE Stub Provider Tests
 */

import { describe, expect, test } from "vitest";
import {
	CapabilityNotSupportedError,
	isMarketDataError,
	NotImplementedError,
	SessionClosedError,
} from "../src/errors.js";
import { ETradeProvider } from "../src/providers/etrade.js";
import { createCaptureLogger } from "./helpers.js";

function createProvider(): ETradeProvider {
	return new ETradeProvider(
		{ apiKey: "test-key", apiSecret: "test-secret" },
		{ logger: createCaptureLogger().logger }
	);
}

describe("ETradeProvider", () => {
	test("advertises no capabilities", () => {
		const provider = createProvider();
		expect(provider.vendor).toBe("etrade");
		expect(provider.capabilities().size).toBe(0);
		expect(provider.supports("bars")).toBe(false);
	});

	test("streamTrades is not supported", async () => {
		const provider = createProvider();
		await provider.open();

		const error = await provider.streamTrades(["AAPL"], () => undefined).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(CapabilityNotSupportedError);
		expect(error instanceof CapabilityNotSupportedError ? error.capability : undefined).toBe(
			"streamTrades"
		);
	});

	test("data operations are not implemented", async () => {
		const provider = createProvider();
		await provider.open();

		await expect(
			provider.fetchBars("AAPL", new Date("2024-01-02"), new Date("2024-01-05"), "1d")
		).rejects.toBeInstanceOf(NotImplementedError);
		await expect(provider.fetchLatestQuote("AAPL")).rejects.toBeInstanceOf(NotImplementedError);

		const error = await provider.fetchOptionsChain("AAPL").catch((e: unknown) => e);
		expect(isMarketDataError(error, "NOT_IMPLEMENTED")).toBe(true);
		expect(error instanceof Error ? error.message : "").toBe(
			'Provider "etrade" is not implemented: OAuth 1.0a integration is incomplete'
		);
	});

	test("open and close manage an idle session", async () => {
		const provider = createProvider();
		await expect(provider.fetchLatestQuote("AAPL")).rejects.toBeInstanceOf(SessionClosedError);

		await provider.open();
		expect(provider.isOpen()).toBe(true);
		await provider.close();
		expect(provider.isOpen()).toBe(false);
	});
});
