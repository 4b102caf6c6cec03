/**
 * E*TRADE Provider (stub)
 *
 * Recognized by the factory so configuration can name it, but the OAuth 1.0a
 * integration is not built. Data operations reject with NotImplementedError;
 * trade streaming is something E*TRADE does not offer at all.
 */

import type { Logger } from "@tickwire/logger";
import { CapabilityNotSupportedError, NotImplementedError, SessionClosedError } from "../errors.js";
import { log as defaultLogger } from "../logger.js";
import type { MarketDataProvider, StreamOptions, TradeSink } from "../provider.js";
import type { Capability, MarketData, OptionsQuote, ProviderCredential } from "../types.js";

export const ETRADE_VENDOR = "etrade";

const OAUTH_PENDING = "OAuth 1.0a integration is incomplete";

export interface ETradeProviderOptions {
	logger?: Logger;
}

export class ETradeProvider implements MarketDataProvider {
	readonly vendor = ETRADE_VENDOR;

	private readonly logger: Logger;
	private opened = false;

	constructor(
		private readonly credential: ProviderCredential,
		options: ETradeProviderOptions = {}
	) {
		this.logger = options.logger ?? defaultLogger;
	}

	capabilities(): ReadonlySet<Capability> {
		return new Set<Capability>();
	}

	supports(capability: Capability): boolean {
		return this.capabilities().has(capability);
	}

	async open(): Promise<void> {
		this.opened = true;
		this.logger.debug(
			{ vendor: this.vendor, hasSecret: this.credential.apiSecret !== undefined },
			"E*TRADE session opened (idle)"
		);
	}

	async close(): Promise<void> {
		this.opened = false;
	}

	isOpen(): boolean {
		return this.opened;
	}

	async fetchBars(symbol: string, _start: Date, _end: Date, _timeframe: string): Promise<MarketData[]> {
		throw this.notImplemented("fetchBars", symbol);
	}

	async fetchLatestQuote(symbol: string): Promise<MarketData> {
		throw this.notImplemented("fetchLatestQuote", symbol);
	}

	async streamTrades(
		_symbols: readonly string[],
		_sink: TradeSink,
		_options?: StreamOptions
	): Promise<void> {
		throw new CapabilityNotSupportedError(this.vendor, "streamTrades");
	}

	async fetchOptionsChain(symbol: string, _expiration?: Date): Promise<OptionsQuote[]> {
		throw this.notImplemented("fetchOptionsChain", symbol);
	}

	private notImplemented(operation: string, symbol: string): Error {
		if (!this.opened) {
			return new SessionClosedError(this.vendor, operation, symbol);
		}
		return new NotImplementedError(this.vendor, OAUTH_PENDING, { operation, symbol });
	}
}
