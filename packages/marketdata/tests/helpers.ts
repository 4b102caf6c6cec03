/**
 * Test Helpers for Marketdata Package
 */

import { createNodeLogger, type Logger } from "@tickwire/logger";
import { type Mock, vi } from "vitest";
import type { SocketFactory, SocketHandlers, StreamSocket } from "../src/stream/socket.js";

// ============================================
// Logging
// ============================================

export interface CapturedLogger {
	logger: Logger;
	lines: Array<Record<string, unknown>>;
	/** Messages (`msg`) logged at `level`, in order */
	messages(level?: string): string[];
}

/**
 * Debug-level logger that keeps every line as parsed JSON.
 */
export function createCaptureLogger(): CapturedLogger {
	const lines: Array<Record<string, unknown>> = [];
	const logger = createNodeLogger({
		service: "marketdata-test",
		level: "debug",
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	});

	return {
		logger,
		lines,
		messages(level) {
			return lines
				.filter((line) => level === undefined || line.severity === level.toUpperCase())
				.map((line) => String(line.msg));
		},
	};
}

// ============================================
// HTTP
// ============================================

export type MockFetch = Mock<typeof fetch>;

/**
 * Create a mock JSON response.
 */
export function createJsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

/**
 * Mock fetch whose responses come from `handler`, which sees the parsed URL.
 */
export function createMockFetch(
	handler: (url: URL, init?: RequestInit) => Response | Promise<Response>
): MockFetch {
	return vi.fn<typeof fetch>(async (input, init) => handler(new URL(String(input)), init));
}

/**
 * Mock fetch that never answers; it rejects once the request is aborted.
 */
export function createHangingFetch(): MockFetch {
	return vi.fn<typeof fetch>(
		(_input, init) =>
			new Promise<Response>((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")), {
					once: true,
				});
			})
	);
}

/**
 * Get the URL from a mock fetch call.
 * Throws if the call doesn't exist.
 */
export function getMockCallUrl(mockFetch: MockFetch, callIndex = 0): URL {
	const call = mockFetch.mock.calls[callIndex];
	if (!call) {
		throw new Error(`Expected mock fetch to have call at index ${callIndex}`);
	}
	return new URL(String(call[0]));
}

/**
 * Get the headers from a mock fetch call.
 */
export function getMockCallHeaders(mockFetch: MockFetch, callIndex = 0): Headers {
	const call = mockFetch.mock.calls[callIndex];
	if (!call) {
		throw new Error(`Expected mock fetch to have call at index ${callIndex}`);
	}
	return new Headers(call[1]?.headers);
}

// ============================================
// WebSocket
// ============================================

/**
 * In-process stand-in for a WebSocket connection.
 */
export class FakeSocket implements StreamSocket {
	readonly sent: string[] = [];
	closed = false;

	constructor(
		readonly url: string,
		private readonly handlers: SocketHandlers,
		private readonly onSend?: (data: string, socket: FakeSocket) => void
	) {}

	send(data: string): void {
		this.sent.push(data);
		this.onSend?.(data, this);
	}

	close(): void {
		this.closed = true;
	}

	/** Parsed outbound messages */
	sentMessages(): unknown[] {
		return this.sent.map((data) => JSON.parse(data));
	}

	open(): void {
		this.handlers.onOpen();
	}

	/** Deliver one frame, serialized as JSON */
	receive(frame: unknown): void {
		this.handlers.onMessage(JSON.stringify(frame));
	}

	receiveRaw(data: string): void {
		this.handlers.onMessage(data);
	}

	fail(error: Error): void {
		this.handlers.onError(error);
	}

	drop(code = 1006, reason = ""): void {
		this.handlers.onClose(code, reason);
	}
}

export interface FakeSocketServer {
	factory: SocketFactory;
	sockets: FakeSocket[];
	/** Most recently created socket */
	latest(): FakeSocket;
}

export interface FakeServerScript {
	/** Open the socket right after creation (default: true) */
	autoOpen?: boolean;
	/** Frames sent as soon as the socket opens */
	onOpen?: unknown[];
	/** Reply frames to an `auth` action */
	onAuth?: unknown[];
	/** Reply frames to a `subscribe` action */
	onSubscribe?: unknown[];
}

function actionOf(data: string): unknown {
	const parsed: unknown = JSON.parse(data);
	if (typeof parsed === "object" && parsed !== null && "action" in parsed) {
		return parsed.action;
	}
	return undefined;
}

/**
 * Socket factory that plays a scripted server: every reply is pushed
 * synchronously from inside `send`.
 */
export function createFakeSocketServer(script: FakeServerScript = {}): FakeSocketServer {
	const sockets: FakeSocket[] = [];

	const factory: SocketFactory = (url, handlers) => {
		const socket = new FakeSocket(url, handlers, (data, self) => {
			const action = actionOf(data);
			const frames = action === "auth" ? script.onAuth : action === "subscribe" ? script.onSubscribe : undefined;
			for (const frame of frames ?? []) {
				self.receive(frame);
			}
		});
		sockets.push(socket);

		if (script.autoOpen !== false) {
			queueMicrotask(() => {
				socket.open();
				for (const frame of script.onOpen ?? []) {
					socket.receive(frame);
				}
			});
		}
		return socket;
	};

	return {
		factory,
		sockets,
		latest() {
			const socket = sockets.at(-1);
			if (!socket) {
				throw new Error("No socket has been created");
			}
			return socket;
		},
	};
}

// ============================================
// Alpaca stream frames
// ============================================

export const ALPACA_CONNECTED = [{ T: "success", msg: "connected" }];
export const ALPACA_AUTHENTICATED = [{ T: "success", msg: "authenticated" }];

export function alpacaSubscribed(symbols: string[]): unknown[] {
	return [{ T: "subscription", trades: symbols, quotes: [], bars: [] }];
}

export function alpacaTrade(symbol: string, price: number, size: number, t: string | number): Record<string, unknown> {
	return { T: "t", S: symbol, i: 1, x: "V", p: price, s: size, t, c: ["@"], z: "C" };
}

/**
 * Wait until `predicate` holds, polling on the macrotask queue.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
	const deadline = Date.now() + timeoutMs;
	while (!predicate()) {
		if (Date.now() > deadline) {
			throw new Error("waitFor timed out");
		}
		await new Promise((resolve) => setTimeout(resolve, 5));
	}
}
