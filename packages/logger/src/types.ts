import type { DestinationStream, Level, LoggerOptions } from "pino";

export type LogLevel = Level | "silent";

export interface NodeLoggerOptions {
	/** Service name attached to every line */
	service: string;
	/** Minimum level (default: info) */
	level?: LogLevel;
	/** Deployment environment label */
	environment?: string;
	/** Service version label */
	version?: string;
	/** Human-readable output through pino-pretty (default: NODE_ENV === "development") */
	pretty?: boolean;
	/** Extra paths to redact, merged with the defaults */
	redactPaths?: string[];
	/** Extra base bindings */
	base?: Record<string, unknown>;
	/** Write to this stream instead of stdout */
	destination?: DestinationStream;
	/** Raw pino overrides, applied last */
	pinoOptions?: LoggerOptions;
}

export interface RequestContext {
	vendor?: string;
	operation?: string;
	symbol?: string;
	requestId?: string;
}
