/**
 * REST Session Client Tests
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { z } from "zod";
import {
	type ClientConfig,
	createRestClient,
	DEFAULT_RATE_LIMIT,
	DEFAULT_TIMEOUT_MS,
	RateLimiter,
	RestClient,
} from "../src/client.js";
import { SessionClosedError, TransportError } from "../src/errors.js";
import {
	createCaptureLogger,
	createHangingFetch,
	createJsonResponse,
	createMockFetch,
	getMockCallHeaders,
	getMockCallUrl,
	type MockFetch,
} from "./helpers.js";

function openClient(fetchFn: MockFetch, overrides: Partial<ClientConfig> = {}): RestClient {
	const client = createRestClient({
		vendor: "test-vendor",
		baseUrl: "https://api.example.com",
		fetch: fetchFn,
		logger: createCaptureLogger().logger,
		...overrides,
	});
	client.open();
	return client;
}

// ============================================
// Tests
// ============================================

describe("RateLimiter", () => {
	test("allows requests within limit", async () => {
		const limiter = new RateLimiter({ maxRequests: 5, intervalMs: 1000 });
		const startTime = Date.now();

		for (let i = 0; i < 5; i++) {
			await limiter.acquire();
		}

		expect(Date.now() - startTime).toBeLessThan(500);
	});

	test("blocks when limit exceeded", async () => {
		const limiter = new RateLimiter({ maxRequests: 2, intervalMs: 100 });
		const startTime = Date.now();

		await limiter.acquire();
		await limiter.acquire();
		await limiter.acquire();

		expect(Date.now() - startTime).toBeGreaterThanOrEqual(90); // Allow for timing variance
	});

	test("abort ends the wait", async () => {
		const limiter = new RateLimiter({ maxRequests: 1, intervalMs: 60_000 });
		const controller = new AbortController();
		await limiter.acquire();

		const waiting = limiter.acquire(controller.signal);
		controller.abort();
		const startTime = Date.now();
		await waiting;

		expect(Date.now() - startTime).toBeLessThan(500);
	});
});

describe("RestClient", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	test("creates client with default configuration", () => {
		const client = createRestClient({ vendor: "test-vendor", baseUrl: "https://api.example.com" });
		expect(client).toBeInstanceOf(RestClient);
		expect(client.isOpen()).toBe(false);
	});

	test("makes GET request with query parameters, dropping undefined ones", async () => {
		const mockFetch = createMockFetch(() => createJsonResponse({ ok: true }));
		const client = openClient(mockFetch);

		await client.get("/v2/test", {
			operation: "fetchThing",
			params: { foo: "bar", num: 42, missing: undefined },
		});

		const url = getMockCallUrl(mockFetch);
		expect(url.pathname).toBe("/v2/test");
		expect(url.searchParams.get("foo")).toBe("bar");
		expect(url.searchParams.get("num")).toBe("42");
		expect(url.searchParams.has("missing")).toBe(false);
	});

	test("sends configured headers", async () => {
		const mockFetch = createMockFetch(() => createJsonResponse({ ok: true }));
		const client = openClient(mockFetch, { headers: { "X-Api-Key": "test-key" } });

		await client.get("/test", { operation: "fetchThing" });

		const headers = getMockCallHeaders(mockFetch);
		expect(headers.get("X-Api-Key")).toBe("test-key");
		expect(headers.get("Accept")).toBe("application/json");
	});

	test("uses the global fetch when none is injected", async () => {
		const globalFetch = createMockFetch(() => createJsonResponse({ ok: true }));
		vi.stubGlobal("fetch", globalFetch);

		const client = createRestClient({
			vendor: "test-vendor",
			baseUrl: "https://api.example.com",
			logger: createCaptureLogger().logger,
		});
		client.open();

		expect(await client.get("/test", { operation: "fetchThing" })).toEqual({ ok: true });
		expect(globalFetch).toHaveBeenCalledTimes(1);
	});

	test("validates response with Zod schema", async () => {
		const client = openClient(createMockFetch(() => createJsonResponse({ success: true })));

		const result = await client.get("/test", { operation: "fetchThing" }, z.object({ success: z.boolean() }));

		expect(result.success).toBe(true);
	});

	test("schema failure is a TransportError", async () => {
		const client = openClient(createMockFetch(() => createJsonResponse({ success: true })));

		await expect(
			client.get("/test", { operation: "fetchThing" }, z.object({ missing_field: z.string() }))
		).rejects.toBeInstanceOf(TransportError);
	});

	test("HTTP failure is a TransportError with status and no retry", async () => {
		const mockFetch = createMockFetch(() => new Response("Server Error", { status: 500 }));
		const client = openClient(mockFetch);

		const error = await client
			.get("/test", { operation: "fetchThing", symbol: "AAPL" })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(TransportError);
		if (!(error instanceof TransportError)) return;
		expect(error.status).toBe(500);
		expect(error.vendor).toBe("test-vendor");
		expect(error.operation).toBe("fetchThing");
		expect(error.symbol).toBe("AAPL");
		expect(error.message).toBe("test-vendor fetchThing for AAPL failed with HTTP 500: Server Error");
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	test("logs 5xx at error and 4xx at warn", async () => {
		const capture = createCaptureLogger();
		let status = 503;
		const client = openClient(
			createMockFetch(() => new Response("nope", { status })),
			{ logger: capture.logger }
		);

		await client.get("/test", { operation: "fetchThing" }).catch(() => undefined);
		status = 422;
		await client.get("/test", { operation: "fetchThing" }).catch(() => undefined);

		expect(capture.messages("error")).toEqual(["Market data API error"]);
		expect(capture.messages("warn")).toEqual(["Market data API error"]);
	});

	test("invalid JSON is a TransportError", async () => {
		const client = openClient(createMockFetch(() => new Response("<html>", { status: 200 })));

		await expect(client.get("/test", { operation: "fetchThing" })).rejects.toThrow(
			"test-vendor fetchThing returned invalid JSON"
		);
	});

	test("network failure is a TransportError", async () => {
		const client = openClient(
			createMockFetch(() => Promise.reject(new TypeError("fetch failed")))
		);

		await expect(client.get("/test", { operation: "fetchThing" })).rejects.toThrow(
			"test-vendor fetchThing network error: fetch failed"
		);
	});

	test("handles timeout", async () => {
		const client = openClient(createHangingFetch(), { timeoutMs: 20 });

		const error = await client.get("/test", { operation: "fetchThing" }).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(TransportError);
		expect(error instanceof Error ? error.message : "").toMatch(/^test-vendor fetchThing timed out after \d+ms$/);
	});

	test("rejects requests before open without calling fetch", async () => {
		const mockFetch = createMockFetch(() => createJsonResponse({}));
		const client = createRestClient({
			vendor: "test-vendor",
			baseUrl: "https://api.example.com",
			fetch: mockFetch,
		});

		await expect(client.get("/test", { operation: "fetchThing" })).rejects.toBeInstanceOf(
			SessionClosedError
		);
		expect(mockFetch).not.toHaveBeenCalled();
	});

	test("close aborts in-flight requests with SessionClosedError", async () => {
		const hanging = createHangingFetch();
		const client = openClient(hanging);

		const pending = client.get("/test", { operation: "fetchThing", symbol: "AAPL" });
		expect(hanging).toHaveBeenCalledTimes(1);

		client.close();

		await expect(pending).rejects.toBeInstanceOf(SessionClosedError);
		expect(client.isOpen()).toBe(false);
	});
});

describe("Default Configuration", () => {
	test("has reasonable defaults", () => {
		expect(DEFAULT_RATE_LIMIT.maxRequests).toBe(200);
		expect(DEFAULT_RATE_LIMIT.intervalMs).toBe(60000);
		expect(DEFAULT_TIMEOUT_MS).toBe(30000);
	});
});

describe("RestClient close", () => {
	test("rejects a request waiting on the rate limiter", async () => {
		const mockFetch = createMockFetch(() => createJsonResponse({ ok: true }));
		const client = openClient(mockFetch, { rateLimit: { maxRequests: 1, intervalMs: 60_000 } });

		await client.get("/first", { operation: "fetchBars", symbol: "AAPL" });
		const second = client.get("/second", { operation: "fetchBars", symbol: "AAPL" });
		client.close();

		await expect(second).rejects.toBeInstanceOf(SessionClosedError);
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	test("reopened client takes requests again", async () => {
		const mockFetch = createMockFetch(() => createJsonResponse({ ok: true }));
		const client = openClient(mockFetch);

		client.close();
		client.open();

		expect(await client.get("/again", { operation: "fetchThing" })).toEqual({ ok: true });
	});
});
