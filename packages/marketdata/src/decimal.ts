/**
 * Fixed-Point Price Helpers
 *
 * Prices are carried as numbers quantized to six decimal places. Anything that
 * combines two prices runs on integer micro-units so results such as
 * `midpoint(0.1, 0.2)` come out as exactly `0.15`.
 */

export const PRICE_DECIMALS = 6;

const MICROS_PER_UNIT = 10 ** PRICE_DECIMALS;

/**
 * Convert a price to integer micro-units.
 */
export function toMicros(price: number): number {
	if (!Number.isFinite(price)) {
		throw new RangeError(`Price must be a finite number, got ${price}`);
	}
	return Math.round(price * MICROS_PER_UNIT);
}

export function fromMicros(micros: number): number {
	return micros / MICROS_PER_UNIT;
}

/**
 * Round a price to the fixed-point grid.
 */
export function quantizePrice(price: number): number {
	return fromMicros(toMicros(price));
}

/**
 * Bid/ask midpoint, `(bid + ask) / 2`, rounded half-up to the grid.
 */
export function midpoint(bid: number, ask: number): number {
	return fromMicros(Math.round((toMicros(bid) + toMicros(ask)) / 2));
}

/**
 * `a - b` on the fixed-point grid.
 */
export function priceDifference(a: number, b: number): number {
	return fromMicros(toMicros(a) - toMicros(b));
}
