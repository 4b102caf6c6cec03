/**
 * Bar Series Validation
 *
 * Record-level sanity checks over a series. Quote- and trade-derived records
 * zero-fill open/high/low, so the OHLC range checks skip them.
 */

import { isQuoteDerived, type MarketData } from "../types.js";

export type SeriesIssueType =
	| "high_below_low"
	| "negative_price"
	| "negative_volume"
	| "price_outside_range"
	| "duplicate_timestamp"
	| "out_of_order";

export interface SeriesIssue {
	type: SeriesIssueType;
	severity: "warning" | "error";
	/** Position in the input array */
	index: number;
	symbol: string;
	timestamp: Date;
	message: string;
}

export interface SeriesValidationResult {
	isValid: boolean;
	totalBars: number;
	issues: SeriesIssue[];
	errorCount: number;
	warningCount: number;
}

/**
 * Validate a bar series. The series is valid when no issue has severity "error".
 */
export function validateBarSeries(bars: readonly MarketData[]): SeriesValidationResult {
	const issues: SeriesIssue[] = [];

	bars.forEach((bar, index) => {
		const issue = (type: SeriesIssueType, severity: SeriesIssue["severity"], message: string) =>
			issues.push({ type, severity, index, symbol: bar.symbol, timestamp: bar.timestamp, message });

		const prices = [bar.open, bar.high, bar.low, bar.close];
		if (prices.some((p) => p < 0)) {
			issue("negative_price", "error", "Price below zero");
		}
		if (bar.volume < 0) {
			issue("negative_volume", "error", `Volume ${bar.volume} below zero`);
		}

		if (!isQuoteDerived(bar)) {
			if (bar.high < bar.low) {
				issue("high_below_low", "error", `High ${bar.high} below low ${bar.low}`);
			} else if (
				bar.open < bar.low ||
				bar.open > bar.high ||
				bar.close < bar.low ||
				bar.close > bar.high
			) {
				issue("price_outside_range", "warning", "Open or close outside the high/low range");
			}
		}

		const prev = index > 0 ? bars[index - 1] : undefined;
		if (prev) {
			const delta = bar.timestamp.getTime() - prev.timestamp.getTime();
			if (delta === 0) {
				issue("duplicate_timestamp", "warning", `Duplicate timestamp ${bar.timestamp.toISOString()}`);
			} else if (delta < 0) {
				issue(
					"out_of_order",
					"error",
					`Timestamp ${bar.timestamp.toISOString()} precedes ${prev.timestamp.toISOString()}`
				);
			}
		}
	});

	const errorCount = issues.filter((i) => i.severity === "error").length;

	return {
		isValid: errorCount === 0,
		totalBars: bars.length,
		issues,
		errorCount,
		warningCount: issues.length - errorCount,
	};
}
