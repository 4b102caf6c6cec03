/**
 * Staleness Detection
 *
 * Flag data whose newest record is older than a per-timeframe threshold.
 */

import { z } from "zod";
import { type Timeframe, TimeframeSchema } from "../types.js";

// ============================================
// Types
// ============================================

export const StalenessThresholdsSchema = z.record(TimeframeSchema, z.number().positive());

export type StalenessThresholds = z.infer<typeof StalenessThresholdsSchema>;

export interface StalenessCheckResult {
	isStale: boolean;
	lastTimestamp: Date | null;
	/** Age of the newest record; Infinity when there is none */
	staleMinutes: number;
	thresholdMinutes: number;
	timeframe: Timeframe;
}

// ============================================
// Default Thresholds
// ============================================

/**
 * Default staleness thresholds in minutes.
 *
 * Rule: Allow 2x the timeframe duration before marking as stale.
 */
export const DEFAULT_STALENESS_THRESHOLDS: Record<Timeframe, number> = {
	"1m": 2,
	"5m": 10,
	"15m": 30,
	"30m": 60,
	"1h": 120,
	"4h": 480,
	"1d": 2880, // 2 days
	"1w": 20160, // 2 weeks
};

// ============================================
// Staleness Detection
// ============================================

/**
 * Check whether the newest record is stale.
 *
 * @param lastTimestamp - Timestamp of the newest record, or null if there is no data
 * @param now - Reference time (default: current time)
 */
export function checkStaleness(
	lastTimestamp: Date | null,
	timeframe: Timeframe,
	now: Date = new Date(),
	thresholds: StalenessThresholds = DEFAULT_STALENESS_THRESHOLDS
): StalenessCheckResult {
	const thresholdMinutes = thresholds[timeframe] ?? DEFAULT_STALENESS_THRESHOLDS[timeframe];

	if (!lastTimestamp) {
		return {
			isStale: true,
			lastTimestamp: null,
			staleMinutes: Number.POSITIVE_INFINITY,
			thresholdMinutes,
			timeframe,
		};
	}

	const staleMinutes = (now.getTime() - lastTimestamp.getTime()) / 60_000;

	return {
		isStale: staleMinutes > thresholdMinutes,
		lastTimestamp,
		staleMinutes,
		thresholdMinutes,
		timeframe,
	};
}

/**
 * Symbols whose newest record is stale.
 */
export function getStaleSymbols(
	timestamps: ReadonlyMap<string, Date | null>,
	timeframe: Timeframe,
	now: Date = new Date(),
	thresholds: StalenessThresholds = DEFAULT_STALENESS_THRESHOLDS
): string[] {
	const stale: string[] = [];
	for (const [symbol, timestamp] of timestamps) {
		if (checkStaleness(timestamp, timeframe, now, thresholds).isStale) {
			stale.push(symbol);
		}
	}
	return stale;
}
