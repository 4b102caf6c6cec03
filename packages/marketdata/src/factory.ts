/**
 * Provider Factory
 *
 * Maps a vendor id onto a configured provider. Construction is pure: no
 * network or socket is touched until the caller opens the provider.
 */

import { credentialFromEnv, loadMarketDataEnv } from "./config.js";
import { MarketDataConfigError, NotImplementedError, UnknownProviderError } from "./errors.js";
import { log, withLogLevel } from "./logger.js";
import type { MarketDataProvider } from "./provider.js";
import { AlpacaProvider, type AlpacaProviderOptions } from "./providers/alpaca-provider.js";
import { ETradeProvider } from "./providers/etrade.js";
import type { ProviderCredential } from "./types.js";

// ============================================
// Vendors
// ============================================

export const VENDOR_IDS = ["alpaca", "etrade", "fidelity", "polygon", "iex"] as const;
export type VendorId = (typeof VENDOR_IDS)[number];

/**
 * - `implemented`: every advertised capability works
 * - `stub`: constructible, operations reject with NotImplementedError
 * - `not_implemented`: recognized, construction rejects
 */
export type VendorStatus = "implemented" | "stub" | "not_implemented";

const VENDOR_STATUS: Record<VendorId, VendorStatus> = {
	alpaca: "implemented",
	etrade: "stub",
	fidelity: "not_implemented",
	polygon: "not_implemented",
	iex: "not_implemented",
};

export interface VendorInfo {
	id: VendorId;
	status: VendorStatus;
}

export function listVendors(): VendorInfo[] {
	return VENDOR_IDS.map((id) => ({ id, status: VENDOR_STATUS[id] }));
}

function isVendorId(value: string): value is VendorId {
	return VENDOR_IDS.some((id) => id === value);
}

/**
 * Trimmed, lower-cased vendor id.
 *
 * @throws {UnknownProviderError} If the id names no known vendor
 */
export function resolveVendorId(vendorId: string): VendorId {
	const normalized = vendorId.trim().toLowerCase();
	if (!isVendorId(normalized)) {
		throw new UnknownProviderError(vendorId, VENDOR_IDS);
	}
	return normalized;
}

// ============================================
// Factory Functions
// ============================================

/**
 * Options shared by every provider. Vendor-specific settings (feed, URLs) only
 * apply to the vendor that reads them.
 */
export type ProviderOptions = AlpacaProviderOptions;

/**
 * Create a provider for `vendorId`.
 *
 * @throws {UnknownProviderError} Unrecognized vendor
 * @throws {NotImplementedError} Recognized vendor without an integration
 *
 * @example
 * ```ts
 * const provider = createProvider("alpaca", { apiKey: "key", apiSecret: "secret" });
 * ```
 */
export function createProvider(
	vendorId: string,
	credential: ProviderCredential,
	options: ProviderOptions = {}
): MarketDataProvider {
	const vendor = resolveVendorId(vendorId);

	switch (vendor) {
		case "alpaca":
			return new AlpacaProvider(credential, options);
		case "etrade":
			return new ETradeProvider(credential, { logger: options.logger });
		case "fidelity":
		case "polygon":
		case "iex":
			throw new NotImplementedError(vendor, "no integration exists for this vendor");
	}
}

/**
 * Create a provider with credentials and settings read from the environment.
 * `LOG_LEVEL` applies to the module logger unless `options.logger` is given.
 *
 * @throws {MarketDataConfigError} If the vendor's credentials are missing
 * @throws {z.ZodError} If a variable is present but invalid
 */
export function createProviderFromEnv(
	vendorId: string,
	source: NodeJS.ProcessEnv = process.env,
	options: ProviderOptions = {}
): MarketDataProvider {
	const vendor = resolveVendorId(vendorId);
	if (VENDOR_STATUS[vendor] === "not_implemented") {
		throw new NotImplementedError(vendor, "no integration exists for this vendor");
	}

	const env = loadMarketDataEnv(source);
	const credential = credentialFromEnv(vendor, env);

	return createProvider(vendor, credential, {
		baseUrl: env.ALPACA_DATA_URL,
		streamUrl: env.ALPACA_STREAM_URL,
		feed: env.ALPACA_FEED,
		timeoutMs: env.MARKETDATA_TIMEOUT_MS,
		handshakeTimeoutMs: env.MARKETDATA_HANDSHAKE_TIMEOUT_MS,
		...options,
		logger: options.logger ?? withLogLevel(log, env.LOG_LEVEL),
	});
}

/**
 * Like createProviderFromEnv, but null when credentials are not configured.
 */
export function getProviderFromEnv(
	vendorId: string,
	source: NodeJS.ProcessEnv = process.env,
	options: ProviderOptions = {}
): MarketDataProvider | null {
	try {
		return createProviderFromEnv(vendorId, source, options);
	} catch (error) {
		if (error instanceof MarketDataConfigError) {
			return null;
		}
		throw error;
	}
}
