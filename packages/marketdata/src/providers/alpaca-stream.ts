/**
 * Alpaca Trade Stream Protocol
 *
 * Every inbound frame is a JSON array of messages tagged by `T`:
 *
 * - `success`: `{"T":"success","msg":"connected"|"authenticated"}`
 * - `error`: `{"T":"error","code":402,"msg":"auth failed"}`
 * - `subscription`: current subscription lists
 * - `t`: trade, `q`: quote, `b`: bar, ...
 *
 * Only trades are translated; the rest is skipped by the session.
 *
 * @see https://docs.alpaca.markets/docs/streaming-market-data
 */

import { z } from "zod";
import { quantizePrice } from "../decimal.js";
import type { ReplyVerdict, StreamProtocol, TradeTranslation } from "../stream/session.js";
import { MarketDataSchema, type ProviderCredential } from "../types.js";
import { ALPACA_VENDOR } from "./alpaca.js";

// ============================================
// Message Schemas
// ============================================

export const AlpacaWsSuccessMessageSchema = z.object({
	T: z.literal("success"),
	msg: z.string(),
});

export const AlpacaWsErrorMessageSchema = z.object({
	T: z.literal("error"),
	code: z.number().optional(),
	msg: z.string(),
});

export const AlpacaWsSubscriptionMessageSchema = z.object({
	T: z.literal("subscription"),
	trades: z.array(z.string()).optional(),
	quotes: z.array(z.string()).optional(),
	bars: z.array(z.string()).optional(),
});

export const AlpacaWsTradeMessageSchema = z.object({
	T: z.literal("t"),
	S: z.string().min(1), // Symbol
	i: z.number().optional(), // Trade ID
	x: z.string().optional(), // Exchange
	p: z.number(), // Price
	s: z.number(), // Size
	t: z.union([z.string(), z.number()]), // RFC-3339 or epoch millis
	c: z.array(z.string()).optional(), // Conditions
	z: z.string().optional(), // Tape
});
export type AlpacaWsTradeMessage = z.infer<typeof AlpacaWsTradeMessageSchema>;

const TaggedSchema = z.object({ T: z.string() }).passthrough();

/**
 * Auth failure codes sent in `error` messages.
 */
export const ALPACA_WS_ERROR_CODES = {
	NOT_AUTHENTICATED: 401,
	AUTH_FAILED: 402,
	ALREADY_AUTHENTICATED: 403,
	AUTH_TIMEOUT: 404,
	CONNECTION_LIMIT: 406,
	INVALID_SYNTAX: 400,
} as const;

// ============================================
// Protocol
// ============================================

function toTimestamp(value: string | number): Date | undefined {
	const ms = typeof value === "number" ? value : Date.parse(value);
	return Number.isFinite(ms) ? new Date(ms) : undefined;
}

export class AlpacaStreamProtocol implements StreamProtocol {
	readonly vendor = ALPACA_VENDOR;

	constructor(
		readonly url: string,
		private readonly credential: ProviderCredential
	) {}

	authenticate(): string {
		return JSON.stringify({
			action: "auth",
			key: this.credential.apiKey,
			secret: this.credential.apiSecret ?? "",
		});
	}

	interpretAuthReply(envelope: unknown): ReplyVerdict {
		const success = AlpacaWsSuccessMessageSchema.safeParse(envelope);
		if (success.success) {
			if (success.data.msg === "connected") {
				return { kind: "ignore" };
			}
			if (success.data.msg === "authenticated") {
				return { kind: "accepted" };
			}
			return { kind: "rejected", message: `unexpected success message "${success.data.msg}"` };
		}

		const error = AlpacaWsErrorMessageSchema.safeParse(envelope);
		if (error.success) {
			return { kind: "rejected", message: error.data.msg, code: error.data.code };
		}

		return { kind: "rejected", message: "unrecognized auth reply" };
	}

	subscribe(symbols: readonly string[]): string {
		return JSON.stringify({ action: "subscribe", trades: [...symbols] });
	}

	interpretSubscribeReply(envelope: unknown): ReplyVerdict {
		if (AlpacaWsSubscriptionMessageSchema.safeParse(envelope).success) {
			return { kind: "accepted" };
		}

		const error = AlpacaWsErrorMessageSchema.safeParse(envelope);
		if (error.success) {
			return { kind: "rejected", message: error.data.msg, code: error.data.code };
		}

		return { kind: "ignore" };
	}

	translate(envelope: unknown): TradeTranslation {
		const tagged = TaggedSchema.safeParse(envelope);
		if (!tagged.success) {
			return { kind: "malformed", reason: "message has no type tag" };
		}
		if (tagged.data.T !== "t") {
			return { kind: "skip", messageType: tagged.data.T };
		}

		const trade = AlpacaWsTradeMessageSchema.safeParse(envelope);
		if (!trade.success) {
			return { kind: "malformed", reason: trade.error.issues.map((issue) => issue.message).join("; ") };
		}

		const timestamp = toTimestamp(trade.data.t);
		if (!timestamp) {
			return { kind: "malformed", reason: `invalid trade timestamp "${trade.data.t}"` };
		}

		const record = MarketDataSchema.safeParse({
			symbol: trade.data.S,
			timestamp,
			open: 0,
			high: 0,
			low: 0,
			close: quantizePrice(trade.data.p),
			volume: trade.data.s,
			provider: this.vendor,
		});
		if (!record.success) {
			return { kind: "malformed", reason: record.error.issues.map((issue) => issue.message).join("; ") };
		}

		return { kind: "trade", record: record.data };
	}
}
