/**
 * Data Quality Validation
 *
 * Pure checks over canonical bar series: gaps, staleness, price outliers and
 * record-level sanity.
 *
 * @example
 * ```ts
 * const bars = await provider.fetchBars("AAPL", start, end, "1h");
 * const { hasGaps, gaps } = detectGaps(bars, "1h");
 * const { isStale } = checkStaleness(bars.at(-1)?.timestamp ?? null, "1h");
 * ```
 */

export * from "./gaps.js";
export * from "./outliers.js";
export * from "./series.js";
export * from "./staleness.js";
