import type { MarketDataProvider } from "./provider.js";

/**
 * Run `fn` against an opened provider and close it afterwards, whether `fn`
 * resolves or throws. Returns `fn`'s result.
 *
 * @example
 * ```ts
 * const bars = await withProvider(createProvider("alpaca", credential), (p) =>
 *   p.fetchBars("AAPL", start, end, "1d")
 * );
 * ```
 */
export async function withProvider<P extends MarketDataProvider, T>(
	provider: P,
	fn: (provider: P) => Promise<T> | T
): Promise<T> {
	await provider.open();
	try {
		return await fn(provider);
	} finally {
		await provider.close();
	}
}
