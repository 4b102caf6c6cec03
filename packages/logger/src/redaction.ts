/**
 * Redaction paths for credentials that travel through provider code.
 *
 * Paths use pino's redact syntax (fast-redact).
 */

export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"apiSecret",
	"secret",
	"password",
	"token",
	"credential.apiKey",
	"credential.apiSecret",
	"*.apiKey",
	"*.apiSecret",
	"*.secret",
	"headers.authorization",
	'headers["APCA-API-KEY-ID"]',
	'headers["APCA-API-SECRET-KEY"]',
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
