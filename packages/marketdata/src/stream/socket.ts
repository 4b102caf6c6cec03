/**
 * Stream Socket
 *
 * Minimal WebSocket surface the streaming session needs. The default factory
 * wraps `ws`; tests inject an in-process fake.
 */

import WebSocket from "ws";

export interface SocketHandlers {
	onOpen(): void;
	/** Text frame, already decoded to a string */
	onMessage(data: string): void;
	onError(error: Error): void;
	onClose(code: number, reason: string): void;
}

export interface StreamSocket {
	send(data: string): void;
	close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => StreamSocket;

function rawDataToString(data: WebSocket.RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf8");
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data).toString("utf8");
	}
	return data.toString("utf8");
}

/**
 * Open a `ws` connection and forward its events to `handlers`.
 */
export const createWsSocket: SocketFactory = (url, handlers) => {
	const ws = new WebSocket(url);

	ws.on("open", () => handlers.onOpen());
	ws.on("message", (data) => handlers.onMessage(rawDataToString(data)));
	ws.on("error", (error) => handlers.onError(error));
	ws.on("close", (code, reason) => handlers.onClose(code, reason.toString()));

	return {
		send(data: string): void {
			if (ws.readyState === WebSocket.OPEN) {
				ws.send(data);
			}
		},
		close(): void {
			if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.OPEN) {
				ws.close(1000, "Client disconnect");
			}
		},
	};
};
