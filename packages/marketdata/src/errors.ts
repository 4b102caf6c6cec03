/**
 * Market Data Errors
 *
 * Typed failures for provider operations. Every error carries enough context
 * (vendor, operation, symbol) for a caller to log it and pick a retry policy;
 * nothing in this package retries on its own.
 *
 * | Class                       | Code                     |
 * |-----------------------------|--------------------------|
 * | CapabilityNotSupportedError | CAPABILITY_NOT_SUPPORTED |
 * | NotImplementedError         | NOT_IMPLEMENTED          |
 * | AuthenticationFailedError   | AUTHENTICATION_FAILED    |
 * | TransportError              | TRANSPORT_FAILURE        |
 * | UnknownProviderError        | UNKNOWN_PROVIDER         |
 * | InvalidRequestError         | INVALID_REQUEST          |
 * | SessionClosedError          | SESSION_CLOSED           |
 * | MarketDataConfigError       | CONFIG                   |
 */

import type { Capability } from "./types.js";

// ============================================
// Base Error
// ============================================

export type MarketDataErrorCode =
	| "CAPABILITY_NOT_SUPPORTED"
	| "NOT_IMPLEMENTED"
	| "AUTHENTICATION_FAILED"
	| "TRANSPORT_FAILURE"
	| "UNKNOWN_PROVIDER"
	| "INVALID_REQUEST"
	| "SESSION_CLOSED"
	| "CONFIG";

export interface ErrorContext {
	vendor?: string;
	operation?: string;
	symbol?: string;
	cause?: unknown;
}

export class MarketDataError extends Error {
	readonly code: MarketDataErrorCode;
	readonly vendor?: string;
	readonly operation?: string;
	readonly symbol?: string;

	constructor(message: string, code: MarketDataErrorCode, context: ErrorContext = {}) {
		super(message, context.cause === undefined ? undefined : { cause: context.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.vendor = context.vendor;
		this.operation = context.operation;
		this.symbol = context.symbol;
	}

	/**
	 * Convert to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			vendor: this.vendor,
			operation: this.operation,
			symbol: this.symbol,
			cause: this.cause instanceof Error ? this.cause.message : this.cause,
		};
	}
}

// ============================================
// Specific Errors
// ============================================

/**
 * The provider never offers this capability. Distinct from an empty result.
 */
export class CapabilityNotSupportedError extends MarketDataError {
	readonly capability: Capability;

	constructor(vendor: string, capability: Capability, symbol?: string) {
		super(`Provider "${vendor}" does not support ${capability}`, "CAPABILITY_NOT_SUPPORTED", {
			vendor,
			operation: capability,
			symbol,
		});
		this.capability = capability;
	}
}

/**
 * The vendor is recognized but its integration (or this part of it) is not built yet.
 */
export class NotImplementedError extends MarketDataError {
	constructor(vendor: string, detail?: string, context: Omit<ErrorContext, "vendor"> = {}) {
		super(
			detail
				? `Provider "${vendor}" is not implemented: ${detail}`
				: `Provider "${vendor}" is not implemented`,
			"NOT_IMPLEMENTED",
			{ ...context, vendor }
		);
	}
}

export class AuthenticationFailedError extends MarketDataError {
	/** Vendor-specific rejection code, when the vendor sent one */
	readonly vendorCode?: number;

	constructor(vendor: string, message: string, vendorCode?: number, cause?: unknown) {
		super(`Authentication with "${vendor}" failed: ${message}`, "AUTHENTICATION_FAILED", {
			vendor,
			operation: "authenticate",
			cause,
		});
		this.vendorCode = vendorCode;
	}
}

/**
 * Network, HTTP or WebSocket failure. `status` is set for HTTP responses.
 */
export class TransportError extends MarketDataError {
	readonly status?: number;

	constructor(message: string, context: ErrorContext & { status?: number } = {}) {
		const { status, ...rest } = context;
		super(message, "TRANSPORT_FAILURE", rest);
		this.status = status;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), status: this.status };
	}
}

export class UnknownProviderError extends MarketDataError {
	readonly vendorId: string;

	constructor(vendorId: string, known: readonly string[]) {
		super(
			`Unknown market data provider "${vendorId}". Known providers: ${known.join(", ")}`,
			"UNKNOWN_PROVIDER",
			{ vendor: vendorId }
		);
		this.vendorId = vendorId;
	}
}

export class InvalidRequestError extends MarketDataError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_REQUEST", context);
	}
}

/**
 * Operation attempted outside an open session, or interrupted by close().
 */
export class SessionClosedError extends MarketDataError {
	constructor(vendor: string, operation: string, symbol?: string) {
		super(`Provider "${vendor}" session is not open (${operation})`, "SESSION_CLOSED", {
			vendor,
			operation,
			symbol,
		});
	}
}

export class MarketDataConfigError extends MarketDataError {
	readonly missingVars: readonly string[];

	constructor(vendor: string, missingVars: readonly string[]) {
		super(
			`Market data provider "${vendor}" requires ${missingVars.join(" and ")} environment variable${
				missingVars.length > 1 ? "s" : ""
			}.`,
			"CONFIG",
			{ vendor }
		);
		this.missingVars = missingVars;
	}
}

// ============================================
// Guards
// ============================================

export function isMarketDataError(
	error: unknown,
	code?: MarketDataErrorCode
): error is MarketDataError {
	return error instanceof MarketDataError && (code === undefined || error.code === code);
}
