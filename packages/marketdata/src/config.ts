/**
 * Environment Configuration
 *
 * Type-safe access to the provider settings carried in environment variables.
 * Nothing is read at import time: call loadMarketDataEnv() at a system boundary
 * and pass the result down.
 */

import { z } from "zod";
import { AlpacaFeedSchema } from "./providers/alpaca.js";
import { MarketDataConfigError } from "./errors.js";
import { LogLevelSchema } from "./logger.js";
import type { ProviderCredential } from "./types.js";

/**
 * Empty strings count as unset, so `ALPACA_KEY=` in a .env file reads as missing.
 */
function optionalString() {
	return z.preprocess((val) => (val === "" ? undefined : val), z.string().optional());
}

function optionalUrl() {
	return z.preprocess((val) => (val === "" ? undefined : val), z.string().url().optional());
}

function positiveIntWithDefault(defaultValue: number) {
	return z.preprocess(
		(val) => (val === "" || val === undefined ? defaultValue : val),
		z.coerce.number().int().positive()
	);
}

const envSchema = z.object({
	ALPACA_KEY: optionalString().describe("Alpaca API key ID"),
	ALPACA_SECRET: optionalString().describe("Alpaca API secret key"),
	ALPACA_DATA_URL: optionalUrl().describe("Alpaca REST base URL (override for testing)"),
	ALPACA_STREAM_URL: optionalUrl().describe("Alpaca trade stream URL (override for testing)"),
	ALPACA_FEED: z
		.preprocess((val) => (val === "" || val === undefined ? "iex" : val), AlpacaFeedSchema)
		.describe("Alpaca stock feed: iex (free) or sip (full market)"),

	ETRADE_KEY: optionalString().describe("E*TRADE consumer key"),
	ETRADE_SECRET: optionalString().describe("E*TRADE consumer secret"),

	MARKETDATA_TIMEOUT_MS: positiveIntWithDefault(30000).describe("REST request timeout"),
	MARKETDATA_HANDSHAKE_TIMEOUT_MS: positiveIntWithDefault(10000).describe(
		"Per-phase stream handshake timeout"
	),

	LOG_LEVEL: z
		.preprocess((val) => (val === "" ? undefined : val), LogLevelSchema.optional())
		.describe("Minimum log level for providers created from the environment"),
});

export type MarketDataEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate the environment.
 *
 * @throws {z.ZodError} If a variable is present but invalid
 */
export function loadMarketDataEnv(source: NodeJS.ProcessEnv = process.env): MarketDataEnv {
	const result = envSchema.safeParse(source);
	if (!result.success) {
		throw result.error;
	}
	return result.data;
}

/**
 * Credential for `vendor` from a parsed environment.
 *
 * @throws {MarketDataConfigError} Naming every variable the vendor still needs
 */
export function credentialFromEnv(vendor: string, env: MarketDataEnv): ProviderCredential {
	switch (vendor) {
		case "alpaca":
			return requirePair(vendor, "ALPACA_KEY", env.ALPACA_KEY, "ALPACA_SECRET", env.ALPACA_SECRET);
		case "etrade":
			return requirePair(vendor, "ETRADE_KEY", env.ETRADE_KEY, "ETRADE_SECRET", env.ETRADE_SECRET);
		default:
			throw new MarketDataConfigError(vendor, [`${vendor.toUpperCase()}_KEY`]);
	}
}

function requirePair(
	vendor: string,
	keyVar: string,
	apiKey: string | undefined,
	secretVar: string,
	apiSecret: string | undefined
): ProviderCredential {
	const missing: string[] = [];
	if (!apiKey) missing.push(keyVar);
	if (!apiSecret) missing.push(secretVar);

	if (!apiKey || !apiSecret) {
		throw new MarketDataConfigError(vendor, missing);
	}
	return { apiKey, apiSecret };
}
