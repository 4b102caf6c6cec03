import { createNodeLogger, type Logger } from "@tickwire/logger";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const envLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);

export const log: Logger = createNodeLogger({
	service: "marketdata",
	level: envLevel.success ? envLevel.data : "info",
	environment: process.env.NODE_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});

/**
 * `base` with its level overridden, or `base` itself when no level is set.
 */
export function withLogLevel(base: Logger, level: LogLevel | undefined): Logger {
	return level === undefined ? base : base.child({}, { level });
}
