/**
 * Gap Detection
 *
 * Find missing bars in a series by comparing consecutive timestamps against the
 * timeframe interval. No calendar awareness: overnight and weekend breaks in
 * intraday data show up as gaps.
 */

import { getTimeframeMs, type MarketData, type Timeframe } from "../types.js";

// ============================================
// Types
// ============================================

export interface GapInfo {
	/** Timestamp of the bar before the gap */
	previousTimestamp: Date;
	/** First timestamp that should have had a bar */
	expectedTimestamp: Date;
	/** Timestamp of the bar after the gap */
	nextTimestamp: Date;
	gapMinutes: number;
	missingBars: number;
}

export interface GapDetectionResult {
	symbol: string;
	timeframe: Timeframe;
	totalBars: number;
	gaps: GapInfo[];
	gapCount: number;
	totalMissingBars: number;
	hasGaps: boolean;
}

// ============================================
// Gap Detection
// ============================================

/**
 * Detect gaps in a bar series.
 *
 * @param bars - Bars in ascending timestamp order
 * @param toleranceMultiplier - Intervals longer than this many bar widths count as gaps
 */
export function detectGaps(
	bars: readonly MarketData[],
	timeframe: Timeframe,
	toleranceMultiplier = 1.5
): GapDetectionResult {
	const intervalMs = getTimeframeMs(timeframe);
	const toleranceMs = intervalMs * toleranceMultiplier;
	const gaps: GapInfo[] = [];
	let totalMissingBars = 0;

	for (let i = 1; i < bars.length; i++) {
		const prev = bars[i - 1];
		const curr = bars[i];
		if (!prev || !curr) continue;

		const prevTime = prev.timestamp.getTime();
		const actualInterval = curr.timestamp.getTime() - prevTime;

		if (actualInterval > toleranceMs) {
			const missingBars = Math.floor(actualInterval / intervalMs) - 1;
			gaps.push({
				previousTimestamp: prev.timestamp,
				expectedTimestamp: new Date(prevTime + intervalMs),
				nextTimestamp: curr.timestamp,
				gapMinutes: actualInterval / 60_000,
				missingBars,
			});
			totalMissingBars += missingBars;
		}
	}

	return {
		symbol: bars[0]?.symbol ?? "",
		timeframe,
		totalBars: bars.length,
		gaps,
		gapCount: gaps.length,
		totalMissingBars,
		hasGaps: gaps.length > 0,
	};
}
