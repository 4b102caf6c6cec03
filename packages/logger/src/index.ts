export { createNodeLogger, createSilentLogger, withRequestContext } from "./node.js";
export * from "./redaction.js";
export type * from "./types.js";

export type { Logger } from "pino";
