/**
 * Provider Capability Interface
 *
 * Every data source implements the same four operations. A provider that lacks
 * one rejects it with CapabilityNotSupportedError instead of returning an empty
 * result, so "no data" and "no such feature" stay distinguishable.
 *
 * @example
 * ```ts
 * const provider = createProvider("alpaca", { apiKey, apiSecret });
 * await withProvider(provider, async (p) => {
 *   const bars = await p.fetchBars("AAPL", start, end, "1d");
 *   const quote = await p.fetchLatestQuote("AAPL");
 * });
 * ```
 */

import type { Capability, MarketData, OptionsQuote } from "./types.js";

/**
 * Receives one normalized record per trade. A returned promise is awaited
 * before the next record is delivered.
 */
export type TradeSink = (record: MarketData) => void | Promise<void>;

export interface StreamOptions {
	/** Aborting ends the stream; streamTrades then resolves */
	signal?: AbortSignal;
}

export interface MarketDataProvider {
	/** Vendor identifier, also used as the provider tag on records */
	readonly vendor: string;

	capabilities(): ReadonlySet<Capability>;

	supports(capability: Capability): boolean;

	/**
	 * Acquire session resources (HTTP client). Must precede any operation.
	 */
	open(): Promise<void>;

	/**
	 * Release session resources, cancel active streams and abort in-flight
	 * requests. Safe to call more than once.
	 */
	close(): Promise<void>;

	isOpen(): boolean;

	/**
	 * Historical bars in ascending timestamp order, each within [start, end].
	 * An empty array means no bars in range.
	 */
	fetchBars(symbol: string, start: Date, end: Date, timeframe: string): Promise<MarketData[]>;

	/**
	 * Latest bid/ask midpoint as `close`; open, high, low and volume are zero.
	 */
	fetchLatestQuote(symbol: string): Promise<MarketData>;

	/**
	 * Push one record per trade to `sink` in transport order. Resolves when the
	 * signal aborts (or the provider closes); rejects on authentication or
	 * transport failure.
	 */
	streamTrades(symbols: readonly string[], sink: TradeSink, options?: StreamOptions): Promise<void>;

	/**
	 * Option quotes for `symbol`, restricted to one expiration date when given.
	 * Empty when the vendor account or symbol has no options data.
	 */
	fetchOptionsChain(symbol: string, expiration?: Date): Promise<OptionsQuote[]>;
}
