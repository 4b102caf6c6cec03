/**
 * withProvider Tests
 */

import { describe, expect, test } from "vitest";
import { NotImplementedError } from "../src/errors.js";
import { ETradeProvider } from "../src/providers/etrade.js";
import { withProvider } from "../src/session.js";
import { createCaptureLogger } from "./helpers.js";

function createProvider(): ETradeProvider {
	return new ETradeProvider(
		{ apiKey: "test-key", apiSecret: "test-secret" },
		{ logger: createCaptureLogger().logger }
	);
}

describe("withProvider", () => {
	test("opens the provider and returns the callback's result", async () => {
		const provider = createProvider();

		const result = await withProvider(provider, (p) => p.isOpen());

		expect(result).toBe(true);
		expect(provider.isOpen()).toBe(false);
	});

	test("closes the provider when the callback throws", async () => {
		const provider = createProvider();

		await expect(withProvider(provider, (p) => p.fetchLatestQuote("AAPL"))).rejects.toBeInstanceOf(
			NotImplementedError
		);
		expect(provider.isOpen()).toBe(false);
	});
});
