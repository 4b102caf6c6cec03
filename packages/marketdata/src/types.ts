/**
 * Canonical Market Data Records
 *
 * Normalized bar/trade/quote and options-quote records produced by every
 * provider. Records are plain values with no back-references; they are safe to
 * copy and share once produced.
 */

import { z } from "zod";
import { midpoint, priceDifference } from "./decimal.js";
import { InvalidRequestError } from "./errors.js";

// ============================================
// Timeframes
// ============================================

export const TimeframeSchema = z.enum(["1m", "5m", "15m", "30m", "1h", "4h", "1d", "1w"]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

/**
 * Vendor spellings accepted by parseTimeframe. Case matters: "1M" would read
 * as a month elsewhere, so it is deliberately absent.
 */
const TIMEFRAME_ALIASES = new Map<string, Timeframe>([
	["1Min", "1m"],
	["5Min", "5m"],
	["15Min", "15m"],
	["30Min", "30m"],
	["1H", "1h"],
	["1Hour", "1h"],
	["4H", "4h"],
	["4Hour", "4h"],
	["1D", "1d"],
	["1Day", "1d"],
	["1W", "1w"],
	["1Week", "1w"],
]);

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
	"1m": 1,
	"5m": 5,
	"15m": 15,
	"30m": 30,
	"1h": 60,
	"4h": 240,
	"1d": 1440,
	"1w": 10080,
};

export function parseTimeframe(value: string): Timeframe {
	const canonical = TimeframeSchema.safeParse(value);
	if (canonical.success) {
		return canonical.data;
	}

	const alias = TIMEFRAME_ALIASES.get(value);
	if (alias) {
		return alias;
	}

	throw new InvalidRequestError(`Unsupported timeframe "${value}"`);
}

export function getTimeframeMinutes(timeframe: Timeframe): number {
	return TIMEFRAME_MINUTES[timeframe];
}

export function getTimeframeMs(timeframe: Timeframe): number {
	return TIMEFRAME_MINUTES[timeframe] * 60 * 1000;
}

// ============================================
// Capabilities
// ============================================

export const CapabilitySchema = z.enum(["bars", "latestQuote", "streamTrades", "optionsChain"]);
export type Capability = z.infer<typeof CapabilitySchema>;

export const ALL_CAPABILITIES: readonly Capability[] = CapabilitySchema.options;

// ============================================
// MarketData (bar / trade / quote)
// ============================================

const PriceSchema = z.number().finite().nonnegative();

/**
 * One bar, trade tick or quote snapshot.
 *
 * Trade- and quote-derived records zero-fill open/high/low (quotes also zero
 * volume). Zero there means "not applicable", never a real zero price.
 */
export const MarketDataSchema = z
	.object({
		symbol: z.string().min(1),
		timestamp: z.date(),
		open: PriceSchema,
		high: PriceSchema,
		low: PriceSchema,
		close: PriceSchema,
		volume: z.number().int().nonnegative(),
		vwap: PriceSchema.optional(),
		tradeCount: z.number().int().nonnegative().optional(),
		provider: z.string().min(1),
		timeframe: TimeframeSchema.optional(),
	})
	.refine((record) => record.high >= record.low, {
		message: "high must be greater than or equal to low",
		path: ["high"],
	});
export type MarketData = z.infer<typeof MarketDataSchema>;

/**
 * True when open/high/low carry the zero-fill of a quote or trade tick.
 */
export function isQuoteDerived(record: MarketData): boolean {
	return record.open === 0 && record.high === 0 && record.low === 0;
}

// ============================================
// OptionsQuote
// ============================================

export const OptionTypeSchema = z.enum(["CALL", "PUT"]);
export type OptionType = z.infer<typeof OptionTypeSchema>;

/**
 * Greeks as reported by the vendor. A missing field was not computed; it is
 * not zero.
 */
export const GreeksSchema = z.object({
	delta: z.number().finite().optional(),
	gamma: z.number().finite().optional(),
	theta: z.number().finite().optional(),
	vega: z.number().finite().optional(),
	rho: z.number().finite().optional(),
});
export type Greeks = z.infer<typeof GreeksSchema>;

export const OptionsQuoteSchema = z
	.object({
		underlying: z.string().min(1),
		contractSymbol: z.string().min(1),
		timestamp: z.date(),
		strike: z.number().finite().positive(),
		expiration: z.date(),
		optionType: OptionTypeSchema,
		bid: PriceSchema,
		ask: PriceSchema,
		last: PriceSchema,
		volume: z.number().int().nonnegative(),
		openInterest: z.number().int().nonnegative(),
		impliedVolatility: z.number().finite().nonnegative().optional(),
		greeks: GreeksSchema.optional(),
	})
	.refine((quote) => quote.bid <= quote.ask, {
		message: "bid must be less than or equal to ask",
		path: ["bid"],
	});
export type OptionsQuote = z.infer<typeof OptionsQuoteSchema>;

export function optionMidPrice(quote: OptionsQuote): number {
	return midpoint(quote.bid, quote.ask);
}

export function optionSpread(quote: OptionsQuote): number {
	return priceDifference(quote.ask, quote.bid);
}

// ============================================
// Credentials
// ============================================

/**
 * Opaque to this package; forwarded to transport headers and handshakes.
 */
export const ProviderCredentialSchema = z.object({
	apiKey: z.string().min(1),
	apiSecret: z.string().min(1).optional(),
});
export type ProviderCredential = z.infer<typeof ProviderCredentialSchema>;
