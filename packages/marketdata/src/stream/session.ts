/**
 * Streaming Session
 *
 * Drives one trade subscription from connect to teardown:
 *
 *   DISCONNECTED → CONNECTING → AUTHENTICATING → SUBSCRIBING → STREAMING → CLOSED
 *
 * FAILED is reachable from every non-terminal state. Socket callbacks only push
 * events onto a channel; a single receive loop drains it, so sink calls never
 * overlap and arrive in transport order. There is no reconnect: a dropped
 * connection ends the session and the error goes back to the caller.
 *
 * The wire protocol (auth payload, reply shapes, trade translation) comes from a
 * {@link StreamProtocol}, so the state machine is vendor-neutral.
 */

import { type Logger, withRequestContext } from "@tickwire/logger";
import { AuthenticationFailedError, TransportError } from "../errors.js";
import { log as defaultLogger } from "../logger.js";
import type { TradeSink } from "../provider.js";
import type { MarketData } from "../types.js";
import { AsyncChannel } from "./channel.js";
import { createWsSocket, type SocketFactory, type StreamSocket } from "./socket.js";

// ============================================
// State
// ============================================

export enum StreamState {
	DISCONNECTED = "DISCONNECTED",
	CONNECTING = "CONNECTING",
	AUTHENTICATING = "AUTHENTICATING",
	SUBSCRIBING = "SUBSCRIBING",
	STREAMING = "STREAMING",
	CLOSED = "CLOSED",
	FAILED = "FAILED",
}

const TRANSITIONS: Record<StreamState, readonly StreamState[]> = {
	[StreamState.DISCONNECTED]: [StreamState.CONNECTING, StreamState.CLOSED],
	[StreamState.CONNECTING]: [StreamState.AUTHENTICATING, StreamState.FAILED, StreamState.CLOSED],
	[StreamState.AUTHENTICATING]: [StreamState.SUBSCRIBING, StreamState.FAILED, StreamState.CLOSED],
	[StreamState.SUBSCRIBING]: [StreamState.STREAMING, StreamState.FAILED, StreamState.CLOSED],
	[StreamState.STREAMING]: [StreamState.FAILED, StreamState.CLOSED],
	[StreamState.CLOSED]: [],
	[StreamState.FAILED]: [],
};

export function canTransition(from: StreamState, to: StreamState): boolean {
	return TRANSITIONS[from].includes(to);
}

export type StateListener = (next: StreamState, previous: StreamState) => void;

// ============================================
// Protocol
// ============================================

/**
 * How the session should treat one handshake reply envelope.
 */
export type ReplyVerdict =
	| { kind: "ignore" }
	| { kind: "accepted" }
	| { kind: "rejected"; message: string; code?: number };

export type TradeTranslation =
	| { kind: "trade"; record: MarketData }
	| { kind: "skip"; messageType: string }
	| { kind: "malformed"; reason: string };

export interface StreamProtocol {
	readonly vendor: string;
	readonly url: string;
	/** Serialized auth request, sent once the socket opens */
	authenticate(): string;
	interpretAuthReply(envelope: unknown): ReplyVerdict;
	/** Serialized subscribe request for trade updates */
	subscribe(symbols: readonly string[]): string;
	interpretSubscribeReply(envelope: unknown): ReplyVerdict;
	translate(envelope: unknown): TradeTranslation;
}

// ============================================
// Session
// ============================================

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10000;

export interface StreamingSessionOptions {
	protocol: StreamProtocol;
	socketFactory?: SocketFactory;
	/** Bound for each handshake phase (connect, auth, subscribe) */
	handshakeTimeoutMs?: number;
	logger?: Logger;
	/** External cancellation; aborting ends the session cleanly */
	signal?: AbortSignal;
}

type SocketEvent =
	| { type: "open" }
	| { type: "message"; data: string }
	| { type: "error"; error: Error }
	| { type: "close"; code: number; reason: string };

const OPERATION = "streamTrades";

export class StreamingSession {
	private readonly protocol: StreamProtocol;
	private readonly socketFactory: SocketFactory;
	private readonly handshakeTimeoutMs: number;
	private readonly logger: Logger;
	private readonly controller = new AbortController();
	private readonly channel = new AsyncChannel<SocketEvent>();
	private readonly listeners = new Set<StateListener>();
	private readonly lastTimestamps = new Map<string, number>();
	private state: StreamState = StreamState.DISCONNECTED;
	private socket: StreamSocket | null = null;
	private deliveredCount = 0;
	private detachSignal: () => void = () => {};

	constructor(options: StreamingSessionOptions) {
		this.protocol = options.protocol;
		this.socketFactory = options.socketFactory ?? createWsSocket;
		this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
		this.logger = withRequestContext(options.logger ?? defaultLogger, {
			vendor: options.protocol.vendor,
			operation: OPERATION,
		});

		const external = options.signal;
		if (external) {
			if (external.aborted) {
				this.controller.abort();
			} else {
				const onAbort = () => this.controller.abort();
				external.addEventListener("abort", onAbort, { once: true });
				this.detachSignal = () => external.removeEventListener("abort", onAbort);
			}
		}
	}

	getState(): StreamState {
		return this.state;
	}

	/**
	 * Number of records handed to the sink so far.
	 */
	get delivered(): number {
		return this.deliveredCount;
	}

	/**
	 * Observe state changes. Returns an unsubscribe function.
	 */
	onStateChange(listener: StateListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Request cancellation. `run()` resolves once the receive loop notices.
	 */
	cancel(): void {
		this.controller.abort();
	}

	/**
	 * Connect, authenticate, subscribe and deliver trades until cancelled.
	 * A session runs once.
	 */
	async run(symbols: readonly string[], sink: TradeSink): Promise<void> {
		if (this.getState() !== StreamState.DISCONNECTED) {
			throw new Error(`StreamingSession cannot run in state ${this.getState()}`);
		}

		const signal = this.controller.signal;
		if (signal.aborted) {
			this.detachSignal();
			this.transition(StreamState.CLOSED);
			return;
		}

		this.transition(StreamState.CONNECTING);
		this.logger.info({ url: this.protocol.url, symbols: symbols.length }, "Connecting to trade stream");

		try {
			this.socket = this.connect();

			let deadline = Date.now() + this.handshakeTimeoutMs;

			for (;;) {
				const waitMs =
					this.getState() === StreamState.STREAMING ? undefined : Math.max(0, deadline - Date.now());
				const next = await this.channel.take(signal, waitMs);

				if (next.kind === "aborted" || next.kind === "closed") {
					this.logger.info(
						{ state: this.state, delivered: this.deliveredCount },
						"Trade stream cancelled"
					);
					this.transition(StreamState.CLOSED);
					return;
				}

				if (next.kind === "timeout") {
					throw new TransportError(
						`${this.protocol.vendor} stream handshake timed out after ${this.handshakeTimeoutMs}ms (${this.state})`,
						{ vendor: this.protocol.vendor, operation: OPERATION }
					);
				}

				const before = this.getState();
				await this.handleEvent(next.value, symbols, sink, signal);
				if (this.getState() !== before) {
					deadline = Date.now() + this.handshakeTimeoutMs;
				}
			}
		} catch (error) {
			if (canTransition(this.getState(), StreamState.FAILED)) {
				this.transition(StreamState.FAILED);
			}
			this.logger.error(
				{ state: this.state, error: error instanceof Error ? error.message : String(error) },
				"Trade stream failed"
			);
			throw error;
		} finally {
			this.detachSignal();
			this.channel.close();
			const socket = this.socket;
			this.socket = null;
			socket?.close();
		}
	}

	private connect(): StreamSocket {
		const { vendor, url } = this.protocol;
		try {
			return this.socketFactory(url, {
				onOpen: () => this.channel.push({ type: "open" }),
				onMessage: (data) => this.channel.push({ type: "message", data }),
				onError: (error) => this.channel.push({ type: "error", error }),
				onClose: (code, reason) => this.channel.push({ type: "close", code, reason }),
			});
		} catch (error) {
			throw new TransportError(
				`${vendor} stream connect failed: ${error instanceof Error ? error.message : String(error)}`,
				{ vendor, operation: OPERATION, cause: error }
			);
		}
	}

	private async handleEvent(
		event: SocketEvent,
		symbols: readonly string[],
		sink: TradeSink,
		signal: AbortSignal
	): Promise<void> {
		const { vendor } = this.protocol;

		switch (event.type) {
			case "open":
				if (this.state === StreamState.CONNECTING) {
					this.transition(StreamState.AUTHENTICATING);
					this.send(this.protocol.authenticate());
				}
				return;

			case "error":
				throw new TransportError(`${vendor} stream transport error: ${event.error.message}`, {
					vendor,
					operation: OPERATION,
					cause: event.error,
				});

			case "close":
				throw new TransportError(
					`${vendor} stream closed unexpectedly (code ${event.code}${event.reason ? `: ${event.reason}` : ""})`,
					{ vendor, operation: OPERATION }
				);

			case "message":
				await this.handleFrame(event.data, symbols, sink, signal);
				return;
		}
	}

	private async handleFrame(
		data: string,
		symbols: readonly string[],
		sink: TradeSink,
		signal: AbortSignal
	): Promise<void> {
		const { vendor } = this.protocol;

		let parsed: unknown;
		try {
			parsed = JSON.parse(data);
		} catch (error) {
			if (this.state === StreamState.AUTHENTICATING) {
				throw new AuthenticationFailedError(vendor, "unparseable auth reply", undefined, error);
			}
			if (this.state === StreamState.SUBSCRIBING) {
				throw new TransportError(`${vendor} sent an unparseable subscription reply`, {
					vendor,
					operation: OPERATION,
					cause: error,
				});
			}
			this.logger.warn({ state: this.state, length: data.length }, "Skipping unparseable stream frame");
			return;
		}

		const envelopes: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

		for (const envelope of envelopes) {
			switch (this.state) {
				case StreamState.CONNECTING:
					this.logger.debug("Ignoring frame received before socket open");
					break;

				case StreamState.AUTHENTICATING: {
					const verdict = this.protocol.interpretAuthReply(envelope);
					if (verdict.kind === "rejected") {
						throw new AuthenticationFailedError(vendor, verdict.message, verdict.code);
					}
					if (verdict.kind === "accepted") {
						this.logger.info("Trade stream authenticated");
						this.transition(StreamState.SUBSCRIBING);
						this.send(this.protocol.subscribe(symbols));
					}
					break;
				}

				case StreamState.SUBSCRIBING: {
					const verdict = this.protocol.interpretSubscribeReply(envelope);
					if (verdict.kind === "rejected") {
						throw new TransportError(`${vendor} rejected trade subscription: ${verdict.message}`, {
							vendor,
							operation: OPERATION,
						});
					}
					if (verdict.kind === "accepted") {
						this.logger.info({ symbols }, "Trade stream subscribed");
						this.transition(StreamState.STREAMING);
					}
					break;
				}

				case StreamState.STREAMING: {
					if (signal.aborted) {
						return;
					}
					await this.deliver(envelope, sink);
					break;
				}

				default:
					return;
			}
		}
	}

	private async deliver(envelope: unknown, sink: TradeSink): Promise<void> {
		const translation = this.protocol.translate(envelope);

		if (translation.kind === "skip") {
			this.logger.debug({ messageType: translation.messageType }, "Ignoring non-trade stream message");
			return;
		}
		if (translation.kind === "malformed") {
			this.logger.warn({ reason: translation.reason }, "Skipping malformed trade message");
			return;
		}

		const { record } = translation;
		this.checkOrdering(record);
		this.deliveredCount++;
		await sink(record);
	}

	/**
	 * Out-of-order timestamps are reported, not corrected.
	 */
	private checkOrdering(record: MarketData): void {
		const current = record.timestamp.getTime();
		const previous = this.lastTimestamps.get(record.symbol);

		if (previous !== undefined && current < previous) {
			this.logger.warn(
				{
					symbol: record.symbol,
					previous: new Date(previous).toISOString(),
					current: record.timestamp.toISOString(),
				},
				"Out-of-order trade timestamp"
			);
			return;
		}
		this.lastTimestamps.set(record.symbol, current);
	}

	private send(payload: string): void {
		this.socket?.send(payload);
	}

	private transition(next: StreamState): void {
		const previous = this.state;
		if (!canTransition(previous, next)) {
			throw new Error(`Invalid stream state transition ${previous} -> ${next}`);
		}
		this.state = next;
		this.logger.debug({ from: previous, to: next }, "Stream state change");
		for (const listener of this.listeners) {
			listener(next, previous);
		}
	}
}
