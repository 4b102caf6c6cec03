/**
 * Alpaca Provider
 *
 * REST bars, latest quotes and option snapshots plus the WebSocket trade
 * stream, behind the common provider interface.
 *
 * Each instance owns one REST session and any number of concurrent trade
 * streams. close() aborts in-flight requests, cancels every stream and waits
 * for the streams to release their sockets.
 */

import type { Logger } from "@tickwire/logger";
import { DEFAULT_RATE_LIMIT, type RateLimitConfig, RestClient } from "../client.js";
import {
	InvalidRequestError,
	SessionClosedError,
	TransportError,
} from "../errors.js";
import { log as defaultLogger } from "../logger.js";
import { toDateKey } from "../occ.js";
import type { MarketDataProvider, StreamOptions, TradeSink } from "../provider.js";
import { StreamingSession } from "../stream/session.js";
import type { SocketFactory } from "../stream/socket.js";
import {
	ALL_CAPABILITIES,
	type Capability,
	type MarketData,
	type OptionsQuote,
	parseTimeframe,
	type ProviderCredential,
} from "../types.js";
import {
	ALPACA_BARS_PAGE_LIMIT,
	ALPACA_DATA_URL,
	ALPACA_HEADERS,
	ALPACA_OPTIONS_PAGE_LIMIT,
	ALPACA_STREAM_BASE_URL,
	ALPACA_VENDOR,
	type AlpacaFeed,
	type AlpacaOptionsFeed,
	AlpacaBarsPageSchema,
	AlpacaLatestQuoteResponseSchema,
	AlpacaOptionSnapshotsPageSchema,
	mapAlpacaBar,
	mapAlpacaOptionSnapshot,
	mapAlpacaQuote,
	toAlpacaTimeframe,
} from "./alpaca.js";
import { AlpacaStreamProtocol } from "./alpaca-stream.js";

// ============================================
// Configuration
// ============================================

export interface AlpacaProviderOptions {
	/** REST base URL (default: https://data.alpaca.markets) */
	baseUrl?: string;
	/** Stream URL; defaults to the feed's stocks endpoint */
	streamUrl?: string;
	/** Stock data feed (default: iex) */
	feed?: AlpacaFeed;
	/** Options data feed (default: indicative) */
	optionsFeed?: AlpacaOptionsFeed;
	/** REST request timeout */
	timeoutMs?: number;
	/** REST rate limit (default: 200 requests per minute) */
	rateLimit?: RateLimitConfig;
	/** Per-phase handshake bound for the trade stream */
	handshakeTimeoutMs?: number;
	logger?: Logger;
	fetch?: typeof fetch;
	socketFactory?: SocketFactory;
}

/**
 * HTTP statuses that mean "no options data for this account or symbol".
 */
const OPTIONS_UNAVAILABLE_STATUSES: ReadonlySet<number> = new Set([403, 404]);

// ============================================
// Provider
// ============================================

export class AlpacaProvider implements MarketDataProvider {
	readonly vendor = ALPACA_VENDOR;

	private readonly client: RestClient;
	private readonly protocol: AlpacaStreamProtocol;
	private readonly feed: AlpacaFeed;
	private readonly logger: Logger;
	private readonly options: AlpacaProviderOptions;
	private readonly streams = new Map<StreamingSession, Promise<void>>();
	private opened = false;

	constructor(credential: ProviderCredential, options: AlpacaProviderOptions = {}) {
		if (!credential.apiSecret) {
			throw new InvalidRequestError("Alpaca requires both an API key and an API secret", {
				vendor: ALPACA_VENDOR,
			});
		}

		this.options = options;
		this.feed = options.feed ?? "iex";
		this.logger = options.logger ?? defaultLogger;
		this.client = new RestClient({
			vendor: ALPACA_VENDOR,
			baseUrl: options.baseUrl ?? ALPACA_DATA_URL,
			headers: {
				[ALPACA_HEADERS.keyId]: credential.apiKey,
				[ALPACA_HEADERS.secretKey]: credential.apiSecret,
			},
			timeoutMs: options.timeoutMs,
			rateLimit: options.rateLimit ?? DEFAULT_RATE_LIMIT,
			logger: this.logger,
			fetch: options.fetch,
		});
		this.protocol = new AlpacaStreamProtocol(
			options.streamUrl ?? `${ALPACA_STREAM_BASE_URL}/${this.feed}`,
			credential
		);
	}

	capabilities(): ReadonlySet<Capability> {
		return new Set(ALL_CAPABILITIES);
	}

	supports(capability: Capability): boolean {
		return this.capabilities().has(capability);
	}

	async open(): Promise<void> {
		this.client.open();
		this.opened = true;
	}

	async close(): Promise<void> {
		if (!this.opened) {
			return;
		}
		this.opened = false;
		this.client.close();
		for (const stream of this.streams.keys()) {
			stream.cancel();
		}
		// A stream finishes once its sink returns and its socket is closed
		await Promise.allSettled(this.streams.values());
		this.logger.debug({ vendor: this.vendor }, "Provider closed");
	}

	isOpen(): boolean {
		return this.opened;
	}

	// ============================================
	// Bars
	// ============================================

	/**
	 * Historical bars, following `next_page_token` until exhausted.
	 */
	async fetchBars(symbol: string, start: Date, end: Date, timeframe: string): Promise<MarketData[]> {
		const operation = "fetchBars";
		this.assertOpen(operation, symbol);

		const ticker = normalizeSymbol(symbol, operation);
		const frame = parseTimeframe(timeframe);
		if (start.getTime() > end.getTime()) {
			throw new InvalidRequestError(
				`start (${start.toISOString()}) must not be after end (${end.toISOString()})`,
				{ vendor: this.vendor, operation, symbol: ticker }
			);
		}

		const records: MarketData[] = [];
		let skipped = 0;
		let pageToken: string | undefined;

		do {
			const page = await this.client.get(
				`/v2/stocks/${encodeURIComponent(ticker)}/bars`,
				{
					operation,
					symbol: ticker,
					params: {
						start: start.toISOString(),
						end: end.toISOString(),
						timeframe: toAlpacaTimeframe(frame),
						adjustment: "all",
						feed: this.feed,
						limit: ALPACA_BARS_PAGE_LIMIT,
						page_token: pageToken,
					},
				},
				AlpacaBarsPageSchema
			);

			for (const raw of page.bars ?? []) {
				const mapped = mapAlpacaBar(ticker, raw, frame);
				if (!mapped.success) {
					skipped++;
					this.logger.warn({ symbol: ticker, reason: mapped.reason }, "Skipping malformed bar");
					continue;
				}
				const ts = mapped.data.timestamp.getTime();
				if (ts < start.getTime() || ts > end.getTime()) {
					continue;
				}
				records.push(mapped.data);
			}

			pageToken = page.next_page_token ?? undefined;
		} while (pageToken);

		records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

		this.logger.info(
			{ symbol: ticker, timeframe: frame, count: records.length, skipped },
			"Fetched bars"
		);
		return records;
	}

	// ============================================
	// Quotes
	// ============================================

	async fetchLatestQuote(symbol: string): Promise<MarketData> {
		const operation = "fetchLatestQuote";
		this.assertOpen(operation, symbol);

		const ticker = normalizeSymbol(symbol, operation);
		const response = await this.client.get(
			`/v2/stocks/${encodeURIComponent(ticker)}/quotes/latest`,
			{ operation, symbol: ticker, params: { feed: this.feed } },
			AlpacaLatestQuoteResponseSchema
		);

		const mapped = mapAlpacaQuote(ticker, response.quote);
		if (!mapped.success) {
			throw new TransportError(`alpaca ${operation} returned an unusable quote: ${mapped.reason}`, {
				vendor: this.vendor,
				operation,
				symbol: ticker,
			});
		}
		return mapped.data;
	}

	// ============================================
	// Trade Stream
	// ============================================

	async streamTrades(
		symbols: readonly string[],
		sink: TradeSink,
		options: StreamOptions = {}
	): Promise<void> {
		const operation = "streamTrades";
		this.assertOpen(operation);

		const tickers = symbols.map((symbol) => normalizeSymbol(symbol, operation));
		if (tickers.length === 0) {
			throw new InvalidRequestError("streamTrades needs at least one symbol", {
				vendor: this.vendor,
				operation,
			});
		}

		const session = new StreamingSession({
			protocol: this.protocol,
			socketFactory: this.options.socketFactory,
			handshakeTimeoutMs: this.options.handshakeTimeoutMs,
			logger: this.logger,
			signal: options.signal,
		});

		const running = session.run(tickers, sink);
		this.streams.set(session, running);
		try {
			await running;
		} finally {
			this.streams.delete(session);
		}
	}

	// ============================================
	// Options
	// ============================================

	/**
	 * Option snapshots for the underlying. 403/404 mean the account or symbol
	 * has no options data and yield an empty chain; any other failure throws.
	 */
	async fetchOptionsChain(symbol: string, expiration?: Date): Promise<OptionsQuote[]> {
		const operation = "fetchOptionsChain";
		this.assertOpen(operation, symbol);

		const underlying = normalizeSymbol(symbol, operation);
		const expirationKey = expiration ? toDateKey(expiration) : undefined;
		const quotes: OptionsQuote[] = [];
		let skipped = 0;
		let pageToken: string | undefined;

		try {
			do {
				const page = await this.client.get(
					`/v1beta1/options/snapshots/${encodeURIComponent(underlying)}`,
					{
						operation,
						symbol: underlying,
						params: {
							expiration_date: expirationKey,
							feed: this.options.optionsFeed ?? "indicative",
							limit: ALPACA_OPTIONS_PAGE_LIMIT,
							page_token: pageToken,
						},
					},
					AlpacaOptionSnapshotsPageSchema
				);

				for (const [contractSymbol, raw] of Object.entries(page.snapshots ?? {})) {
					const mapped = mapAlpacaOptionSnapshot(underlying, contractSymbol, raw);
					if (!mapped.success) {
						skipped++;
						this.logger.warn(
							{ symbol: underlying, contractSymbol, reason: mapped.reason },
							"Skipping malformed option snapshot"
						);
						continue;
					}
					if (expirationKey && toDateKey(mapped.data.expiration) !== expirationKey) {
						continue;
					}
					quotes.push(mapped.data);
				}

				pageToken = page.next_page_token ?? undefined;
			} while (pageToken);
		} catch (error) {
			if (
				error instanceof TransportError &&
				error.status !== undefined &&
				OPTIONS_UNAVAILABLE_STATUSES.has(error.status)
			) {
				this.logger.warn(
					{ symbol: underlying, status: error.status },
					"Options data unavailable for this account or symbol"
				);
				return [];
			}
			throw error;
		}

		this.logger.info({ symbol: underlying, count: quotes.length, skipped }, "Fetched options chain");
		return quotes;
	}

	private assertOpen(operation: string, symbol?: string): void {
		if (!this.opened) {
			throw new SessionClosedError(this.vendor, operation, symbol);
		}
	}
}

/**
 * Upper-cased, trimmed ticker. Blank input is a caller error.
 */
export function normalizeSymbol(symbol: string, operation: string): string {
	const ticker = symbol.trim().toUpperCase();
	if (ticker.length === 0) {
		throw new InvalidRequestError("Symbol must not be blank", { operation });
	}
	return ticker;
}
