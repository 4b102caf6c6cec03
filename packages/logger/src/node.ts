import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions, RequestContext } from "./types.js";

export function createNodeLogger(options: NodeLoggerOptions): Logger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		redactPaths,
		base = {},
		destination,
		pinoOptions = {},
	} = options;

	const isPretty = destination === undefined && (pretty ?? process.env.NODE_ENV === "development");

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		redact: {
			paths: mergeRedactPaths(redactPaths),
			censor: "[REDACTED]",
		},
		// Replaces pino's pid/hostname base
		base: {
			service,
			environment,
			version,
			...base,
		},
		...pinoOptions,
	};

	if (destination) {
		return pino(loggerOptions, destination);
	}

	if (isPretty) {
		return pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "pid,hostname,service,environment,version",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			})
		);
	}

	return pino(loggerOptions);
}

/**
 * Child logger carrying vendor/operation/symbol bindings.
 * Undefined fields are left out so they don't show up as nulls.
 */
export function withRequestContext(logger: Logger, context: RequestContext): Logger {
	const bindings: Record<string, string> = {};
	for (const [key, value] of Object.entries(context)) {
		if (typeof value === "string") {
			bindings[key] = value;
		}
	}
	return logger.child(bindings);
}

/**
 * Logger that drops everything. Handy default for library consumers that
 * inject nothing and for tests that don't care about output.
 */
export function createSilentLogger(): Logger {
	return pino({ level: "silent" });
}
