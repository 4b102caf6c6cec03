/**
 * Alpaca Market Data Wire Format
 *
 * Endpoints, zod schemas for raw Alpaca payloads, and the mapping from those
 * payloads onto canonical records. No I/O lives here.
 *
 * @see https://docs.alpaca.markets/docs/about-market-data-api
 */

import { z } from "zod";
import { midpoint, quantizePrice } from "../decimal.js";
import { parseOccSymbol } from "../occ.js";
import {
	type MarketData,
	MarketDataSchema,
	type OptionsQuote,
	OptionsQuoteSchema,
	type Timeframe,
} from "../types.js";

// ============================================
// Constants
// ============================================

export const ALPACA_VENDOR = "alpaca";

export const ALPACA_DATA_URL = "https://data.alpaca.markets";
export const ALPACA_STREAM_BASE_URL = "wss://stream.data.alpaca.markets/v2";

export const AlpacaFeedSchema = z.enum(["iex", "sip"]);
export type AlpacaFeed = z.infer<typeof AlpacaFeedSchema>;

export const AlpacaOptionsFeedSchema = z.enum(["indicative", "opra"]);
export type AlpacaOptionsFeed = z.infer<typeof AlpacaOptionsFeedSchema>;

/** Max bars per page accepted by the bars endpoint */
export const ALPACA_BARS_PAGE_LIMIT = 10000;

/** Max option snapshots per page */
export const ALPACA_OPTIONS_PAGE_LIMIT = 1000;

const TIMEFRAME_WIRE: Record<Timeframe, string> = {
	"1m": "1Min",
	"5m": "5Min",
	"15m": "15Min",
	"30m": "30Min",
	"1h": "1Hour",
	"4h": "4Hour",
	"1d": "1Day",
	"1w": "1Week",
};

export function toAlpacaTimeframe(timeframe: Timeframe): string {
	return TIMEFRAME_WIRE[timeframe];
}

export const ALPACA_HEADERS = {
	keyId: "APCA-API-KEY-ID",
	secretKey: "APCA-API-SECRET-KEY",
} as const;

// ============================================
// Response Schemas
// ============================================

export const AlpacaBarSchema = z.object({
	t: z.string(), // Timestamp (RFC-3339)
	o: z.number(),
	h: z.number(),
	l: z.number(),
	c: z.number(),
	v: z.number(),
	n: z.number().optional(), // Trade count
	vw: z.number().optional(), // VWAP
});
export type AlpacaBar = z.infer<typeof AlpacaBarSchema>;

/**
 * Page envelope only; entries are validated one at a time so a bad bar does
 * not sink the page.
 */
export const AlpacaBarsPageSchema = z.object({
	bars: z.array(z.unknown()).nullish(),
	symbol: z.string().optional(),
	next_page_token: z.string().nullish(),
});
export type AlpacaBarsPage = z.infer<typeof AlpacaBarsPageSchema>;

export const AlpacaQuoteSchema = z.object({
	t: z.string(),
	bp: z.number(), // Bid price
	bs: z.number().optional(), // Bid size
	bx: z.string().optional(), // Bid exchange
	ap: z.number(), // Ask price
	as: z.number().optional(), // Ask size
	ax: z.string().optional(), // Ask exchange
	c: z.array(z.string()).optional(),
	z: z.string().optional(),
});
export type AlpacaQuote = z.infer<typeof AlpacaQuoteSchema>;

export const AlpacaLatestQuoteResponseSchema = z.object({
	symbol: z.string().optional(),
	quote: AlpacaQuoteSchema,
});

const AlpacaOptionGreeksSchema = z.object({
	delta: z.number().optional(),
	gamma: z.number().optional(),
	theta: z.number().optional(),
	vega: z.number().optional(),
	rho: z.number().optional(),
});

export const AlpacaOptionSnapshotSchema = z.object({
	latestQuote: z
		.object({
			t: z.string(),
			bp: z.number(),
			ap: z.number(),
			bs: z.number().optional(),
			as: z.number().optional(),
		})
		.optional(),
	latestTrade: z
		.object({
			t: z.string(),
			p: z.number(),
			s: z.number().optional(),
		})
		.optional(),
	dailyBar: z
		.object({
			t: z.string(),
			v: z.number(),
		})
		.passthrough()
		.optional(),
	greeks: AlpacaOptionGreeksSchema.optional(),
	impliedVolatility: z.number().optional(),
});
export type AlpacaOptionSnapshot = z.infer<typeof AlpacaOptionSnapshotSchema>;

export const AlpacaOptionSnapshotsPageSchema = z.object({
	snapshots: z.record(z.unknown()).nullish(),
	next_page_token: z.string().nullish(),
});

// ============================================
// Mapping
// ============================================

export type MapResult<T> = { success: true; data: T } | { success: false; reason: string };

function parseTimestamp(value: string): Date | undefined {
	const ms = Date.parse(value);
	return Number.isNaN(ms) ? undefined : new Date(ms);
}

function issues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Raw bar entry → canonical bar.
 */
export function mapAlpacaBar(symbol: string, raw: unknown, timeframe: Timeframe): MapResult<MarketData> {
	const wire = AlpacaBarSchema.safeParse(raw);
	if (!wire.success) {
		return { success: false, reason: issues(wire.error) };
	}

	const bar = wire.data;
	const timestamp = parseTimestamp(bar.t);
	if (!timestamp) {
		return { success: false, reason: `invalid timestamp "${bar.t}"` };
	}

	const record = MarketDataSchema.safeParse({
		symbol,
		timestamp,
		open: quantizePrice(bar.o),
		high: quantizePrice(bar.h),
		low: quantizePrice(bar.l),
		close: quantizePrice(bar.c),
		volume: bar.v,
		vwap: bar.vw === undefined ? undefined : quantizePrice(bar.vw),
		tradeCount: bar.n,
		provider: ALPACA_VENDOR,
		timeframe,
	});

	return record.success ? record : { success: false, reason: issues(record.error) };
}

/**
 * Latest quote → quote-derived record: close is the bid/ask midpoint.
 */
export function mapAlpacaQuote(symbol: string, quote: AlpacaQuote): MapResult<MarketData> {
	const timestamp = parseTimestamp(quote.t);
	if (!timestamp) {
		return { success: false, reason: `invalid timestamp "${quote.t}"` };
	}

	const record = MarketDataSchema.safeParse({
		symbol,
		timestamp,
		open: 0,
		high: 0,
		low: 0,
		close: midpoint(quote.bp, quote.ap),
		volume: 0,
		provider: ALPACA_VENDOR,
	});

	return record.success ? record : { success: false, reason: issues(record.error) };
}

/**
 * One entry of the snapshots map → options quote. The contract fields come
 * from the OCC key; open interest is not part of a snapshot and reads as 0.
 */
export function mapAlpacaOptionSnapshot(
	underlying: string,
	contractSymbol: string,
	raw: unknown
): MapResult<OptionsQuote> {
	const occ = parseOccSymbol(contractSymbol);
	if (!occ) {
		return { success: false, reason: `not an OCC symbol "${contractSymbol}"` };
	}

	const wire = AlpacaOptionSnapshotSchema.safeParse(raw);
	if (!wire.success) {
		return { success: false, reason: issues(wire.error) };
	}

	const snapshot = wire.data;
	const stamp = snapshot.latestQuote?.t ?? snapshot.latestTrade?.t ?? snapshot.dailyBar?.t;
	const timestamp = stamp === undefined ? undefined : parseTimestamp(stamp);
	if (!timestamp) {
		return { success: false, reason: "snapshot carries no usable timestamp" };
	}

	const quote = OptionsQuoteSchema.safeParse({
		underlying,
		contractSymbol,
		timestamp,
		strike: occ.strike,
		expiration: occ.expiration,
		optionType: occ.optionType,
		bid: quantizePrice(snapshot.latestQuote?.bp ?? 0),
		ask: quantizePrice(snapshot.latestQuote?.ap ?? 0),
		last: quantizePrice(snapshot.latestTrade?.p ?? 0),
		volume: snapshot.dailyBar?.v ?? 0,
		openInterest: 0,
		impliedVolatility: snapshot.impliedVolatility,
		greeks: snapshot.greeks,
	});

	return quote.success ? quote : { success: false, reason: issues(quote.error) };
}
