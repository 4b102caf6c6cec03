/**
 * REST Session Client
 *
 * HTTP client owned by a single provider instance. It must be opened before use
 * and closed when the caller is done; closing aborts every in-flight request.
 *
 * - Rate limiting (token bucket)
 * - Per-request timeouts
 * - Request/response logging
 * - Failures surface as TransportError with vendor/operation/symbol context
 *
 * There is no retry here: callers own their retry and backoff policy.
 */

import type { Logger } from "@tickwire/logger";
import type { z } from "zod";
import { MarketDataError, SessionClosedError, TransportError } from "./errors.js";
import { log as defaultLogger } from "./logger.js";

// ============================================
// Types
// ============================================

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Rate limiter configuration.
 */
export interface RateLimitConfig {
	/** Maximum requests per interval */
	maxRequests: number;
	/** Interval in milliseconds */
	intervalMs: number;
}

export interface ClientConfig {
	/** Vendor tag used in errors and logs */
	vendor: string;
	/** Base URL for the API */
	baseUrl: string;
	/** Headers sent with every request (auth lives here) */
	headers?: Record<string, string>;
	/** Rate limiting configuration */
	rateLimit?: RateLimitConfig;
	/** Request timeout in milliseconds */
	timeoutMs?: number;
	logger?: Logger;
	/** fetch implementation (default: the global fetch at call time) */
	fetch?: typeof fetch;
}

export interface RequestOptions {
	/** Operation name for error context, e.g. "fetchBars" */
	operation: string;
	symbol?: string;
	params?: QueryParams;
	/** Override timeout */
	timeoutMs?: number;
	/** Skip rate limiting */
	skipRateLimit?: boolean;
}

interface InFlightRequest {
	controller: AbortController;
	abortReason?: "timeout" | "closed";
}

// ============================================
// Default Configuration
// ============================================

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 200,
	intervalMs: 60000, // 200 requests per minute
};

export const DEFAULT_TIMEOUT_MS = 30000;

// ============================================
// Rate Limiter
// ============================================

/**
 * Token bucket rate limiter.
 */
export class RateLimiter {
	private tokens: number;
	private lastRefill: number;

	constructor(private config: RateLimitConfig) {
		this.tokens = config.maxRequests;
		this.lastRefill = Date.now();
	}

	/**
	 * Acquire a token for making a request.
	 * Returns immediately if tokens are available, otherwise waits. An abort
	 * ends the wait early without taking a token.
	 */
	async acquire(signal?: AbortSignal): Promise<void> {
		this.refill();

		if (this.tokens > 0) {
			this.tokens--;
			return;
		}

		// Wait until next refill
		const waitTime = this.config.intervalMs - (Date.now() - this.lastRefill);
		if (waitTime > 0 && !(await sleep(waitTime, signal))) {
			return;
		}
		this.refill();

		this.tokens--;
	}

	private refill(): void {
		const now = Date.now();
		const elapsed = now - this.lastRefill;

		if (elapsed >= this.config.intervalMs) {
			this.tokens = this.config.maxRequests;
			this.lastRefill = now;
		}
	}
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) {
		return Promise.resolve(false);
	}
	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

// ============================================
// REST Client
// ============================================

export class RestClient {
	private readonly config: ClientConfig & { timeoutMs: number };
	private readonly rateLimiter?: RateLimiter;
	private readonly logger: Logger;
	private readonly inFlight = new Set<InFlightRequest>();
	private session = new AbortController();
	private opened = false;

	constructor(config: ClientConfig) {
		this.config = {
			...config,
			timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		};
		this.logger = config.logger ?? defaultLogger;

		if (config.rateLimit) {
			this.rateLimiter = new RateLimiter(config.rateLimit);
		}
	}

	open(): void {
		if (this.session.signal.aborted) {
			this.session = new AbortController();
		}
		this.opened = true;
	}

	/**
	 * Close the session. Pending requests reject with SessionClosedError.
	 */
	close(): void {
		this.opened = false;
		this.session.abort();
		for (const request of this.inFlight) {
			request.abortReason = "closed";
			request.controller.abort();
		}
		this.inFlight.clear();
	}

	isOpen(): boolean {
		return this.opened;
	}

	/**
	 * GET with schema validation; a payload that fails the schema is a TransportError.
	 */
	get<S extends z.ZodTypeAny>(path: string, options: RequestOptions, schema: S): Promise<z.output<S>>;
	/**
	 * GET returning the raw JSON body.
	 */
	get(path: string, options: RequestOptions): Promise<unknown>;
	async get<S extends z.ZodTypeAny>(
		path: string,
		options: RequestOptions,
		schema?: S
	): Promise<z.output<S> | unknown> {
		const data = await this.request(path, options);

		if (!schema) {
			return data;
		}

		const parsed = schema.safeParse(data);
		if (!parsed.success) {
			throw new TransportError(
				`${this.config.vendor} ${options.operation} returned an unexpected payload: ${parsed.error.message}`,
				{ vendor: this.config.vendor, operation: options.operation, symbol: options.symbol }
			);
		}
		return parsed.data;
	}

	private async request(path: string, options: RequestOptions): Promise<unknown> {
		const { vendor } = this.config;
		const { operation, symbol } = options;
		const context = { vendor, operation, symbol };

		if (!this.opened) {
			throw new SessionClosedError(vendor, operation, symbol);
		}

		if (!options.skipRateLimit && this.rateLimiter) {
			const session = this.session.signal;
			await this.rateLimiter.acquire(session);
			if (session.aborted) {
				throw new SessionClosedError(vendor, operation, symbol);
			}
		}

		const url = this.buildUrl(path, options.params);
		const timeout = options.timeoutMs ?? this.config.timeoutMs;
		const request: InFlightRequest = { controller: new AbortController() };
		this.inFlight.add(request);

		const timeoutId = setTimeout(() => {
			request.abortReason = "timeout";
			request.controller.abort();
		}, timeout);

		const startTime = Date.now();
		this.logger.debug({ method: "GET", path, vendor, operation, symbol }, "Market data API request");

		try {
			const fetchFn = this.config.fetch ?? globalThis.fetch;
			const response = await fetchFn(url, {
				method: "GET",
				headers: {
					Accept: "application/json",
					...this.config.headers,
				},
				signal: request.controller.signal,
			});

			if (!response.ok) {
				const body = await response.text().catch(() => "");
				const latencyMs = Date.now() - startTime;
				const level = response.status >= 500 ? "error" : "warn";
				this.logger[level](
					{ method: "GET", path, vendor, operation, symbol, status: response.status, latencyMs },
					"Market data API error"
				);
				throw new TransportError(
					`${vendor} ${operation}${symbol ? ` for ${symbol}` : ""} failed with HTTP ${response.status}: ${
						body || response.statusText
					}`,
					{ ...context, status: response.status }
				);
			}

			const text = await response.text();
			const latencyMs = Date.now() - startTime;
			this.logger.debug(
				{ method: "GET", path, vendor, operation, status: response.status, latencyMs },
				"Market data API response"
			);

			try {
				const data: unknown = JSON.parse(text);
				return data;
			} catch (error) {
				throw new TransportError(`${vendor} ${operation} returned invalid JSON`, {
					...context,
					status: response.status,
					cause: error,
				});
			}
		} catch (error) {
			throw this.classifyError(error, request, context, Date.now() - startTime);
		} finally {
			clearTimeout(timeoutId);
			this.inFlight.delete(request);
		}
	}

	/**
	 * Map a thrown value onto the error taxonomy.
	 */
	private classifyError(
		error: unknown,
		request: InFlightRequest,
		context: { vendor: string; operation: string; symbol?: string },
		latencyMs: number
	): MarketDataError {
		if (request.abortReason === "closed") {
			return new SessionClosedError(context.vendor, context.operation, context.symbol);
		}

		if (error instanceof MarketDataError) {
			return error;
		}

		if (request.abortReason === "timeout") {
			this.logger.error({ ...context, latencyMs }, "Market data API timeout");
			return new TransportError(`${context.vendor} ${context.operation} timed out after ${latencyMs}ms`, {
				...context,
				cause: error,
			});
		}

		const message = error instanceof Error ? error.message : String(error);
		this.logger.error({ ...context, error: message, latencyMs }, "Market data API network error");
		return new TransportError(`${context.vendor} ${context.operation} network error: ${message}`, {
			...context,
			cause: error,
		});
	}

	/**
	 * Build the full URL with query parameters.
	 */
	private buildUrl(path: string, params?: QueryParams): string {
		const url = new URL(path, this.config.baseUrl);

		if (params) {
			for (const [key, value] of Object.entries(params)) {
				if (value !== undefined) {
					url.searchParams.set(key, String(value));
				}
			}
		}

		return url.toString();
	}
}

// ============================================
// Factory Function
// ============================================

/**
 * Create a REST client with configuration.
 */
export function createRestClient(config: ClientConfig): RestClient {
	return new RestClient(config);
}
