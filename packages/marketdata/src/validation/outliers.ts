/**
 * Outlier Detection
 *
 * Close-to-close returns whose z-score across the series exceeds a threshold,
 * and volume spikes against a rolling mean.
 */

import type { MarketData } from "../types.js";

export interface PriceOutlier {
	symbol: string;
	timestamp: Date;
	/** Fractional return from the previous close, e.g. 0.12 for +12% */
	returnPct: number;
	zScore: number;
	severity: "warning" | "critical";
}

// ============================================
// Statistical Utilities
// ============================================

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation.
 */
export function stdDev(values: readonly number[], m: number = mean(values)): number {
	if (values.length < 2) return 0;
	const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
	return Math.sqrt(variance);
}

export function zScore(value: number, m: number, std: number): number {
	if (std === 0) return 0;
	return (value - m) / std;
}

// ============================================
// Detection
// ============================================

/**
 * Detect outlier moves. Pairs with a zero previous close are skipped.
 *
 * @param bars - Bars in ascending timestamp order
 * @param zThreshold - Absolute z-score above which a return is an outlier
 */
export function detectPriceOutliers(bars: readonly MarketData[], zThreshold = 3): PriceOutlier[] {
	const returns: Array<{ bar: MarketData; value: number }> = [];

	for (let i = 1; i < bars.length; i++) {
		const prev = bars[i - 1];
		const curr = bars[i];
		if (!prev || !curr || prev.close === 0) continue;
		returns.push({ bar: curr, value: (curr.close - prev.close) / prev.close });
	}

	const values = returns.map((r) => r.value);
	const m = mean(values);
	const std = stdDev(values, m);

	const outliers: PriceOutlier[] = [];
	for (const { bar, value } of returns) {
		const z = zScore(value, m, std);
		if (Math.abs(z) > zThreshold) {
			outliers.push({
				symbol: bar.symbol,
				timestamp: bar.timestamp,
				returnPct: value,
				zScore: z,
				severity: Math.abs(z) >= zThreshold * 1.5 ? "critical" : "warning",
			});
		}
	}

	return outliers;
}

// ============================================
// Volume Anomalies
// ============================================

export interface VolumeAnomaly {
	symbol: string;
	timestamp: Date;
	volume: number;
	/** Rolling mean over the window ending at this bar */
	averageVolume: number;
	/** volume / averageVolume */
	ratio: number;
	severity: "warning" | "critical";
}

/**
 * Detect bars whose volume exceeds `threshold` times the rolling mean of the
 * `window` bars ending at (and including) that bar. Series shorter than the
 * window yield nothing; windows averaging zero volume are skipped.
 *
 * @param bars - Bars in ascending timestamp order
 */
export function detectVolumeAnomalies(
	bars: readonly MarketData[],
	window = 20,
	threshold = 3
): VolumeAnomaly[] {
	const anomalies: VolumeAnomaly[] = [];

	for (let i = window - 1; i < bars.length; i++) {
		const bar = bars[i];
		if (!bar) continue;

		const averageVolume = mean(bars.slice(i - window + 1, i + 1).map((b) => b.volume));
		if (averageVolume === 0) continue;

		const ratio = bar.volume / averageVolume;
		if (ratio > threshold) {
			anomalies.push({
				symbol: bar.symbol,
				timestamp: bar.timestamp,
				volume: bar.volume,
				averageVolume,
				ratio,
				severity: ratio >= threshold * 1.5 ? "critical" : "warning",
			});
		}
	}

	return anomalies;
}
