/**
 * Market Data Package
 *
 * Normalized bars, quotes, trade streams and options chains from multiple
 * vendors behind one provider interface.
 *
 * @example
 * ```ts
 * import { createProviderFromEnv, withProvider } from "@tickwire/marketdata";
 *
 * const provider = createProviderFromEnv("alpaca");
 *
 * await withProvider(provider, async (p) => {
 *   const bars = await p.fetchBars("AAPL", new Date("2024-01-02"), new Date("2024-01-05"), "1d");
 *   const quote = await p.fetchLatestQuote("AAPL");
 *   const chain = await p.fetchOptionsChain("AAPL", new Date("2024-01-19"));
 *
 *   const controller = new AbortController();
 *   setTimeout(() => controller.abort(), 60_000);
 *   await p.streamTrades(["AAPL", "TSLA"], (trade) => handle(trade), {
 *     signal: controller.signal,
 *   });
 * });
 * ```
 */

// Canonical records
export * from "./decimal.js";
export * from "./occ.js";
export * from "./types.js";

// Errors
export * from "./errors.js";

// Provider interface and factory
export type { MarketDataProvider, StreamOptions, TradeSink } from "./provider.js";
export * from "./factory.js";
export { withProvider } from "./session.js";

// Configuration
export { credentialFromEnv, loadMarketDataEnv, type MarketDataEnv } from "./config.js";
export { type LogLevel, LogLevelSchema, withLogLevel } from "./logger.js";

// Transport
export {
	type ClientConfig,
	createRestClient,
	DEFAULT_RATE_LIMIT,
	DEFAULT_TIMEOUT_MS,
	type QueryParams,
	type RateLimitConfig,
	RateLimiter,
	type RequestOptions,
	RestClient,
} from "./client.js";
export { AsyncChannel, type TakeResult } from "./stream/channel.js";
export {
	canTransition,
	DEFAULT_HANDSHAKE_TIMEOUT_MS,
	type ReplyVerdict,
	type StateListener,
	type StreamingSessionOptions,
	StreamingSession,
	type StreamProtocol,
	StreamState,
	type TradeTranslation,
} from "./stream/session.js";
export {
	createWsSocket,
	type SocketFactory,
	type SocketHandlers,
	type StreamSocket,
} from "./stream/socket.js";

// Providers
export * from "./providers/index.js";

// Data quality
export * from "./validation/index.js";
