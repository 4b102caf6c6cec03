/**
 * OCC Option Symbols
 *
 * Standard OCC format: AAPL240119C00150000
 * - Root: AAPL (1-6 characters, may contain digits after a corporate action)
 * - Expiration: 240119 (YYMMDD)
 * - Type: C (call) or P (put)
 * - Strike: 00150000 (price * 1000)
 */

import type { OptionType } from "./types.js";

export interface OccSymbol {
	underlying: string;
	/** Expiration at 00:00 UTC */
	expiration: Date;
	optionType: OptionType;
	strike: number;
}

const OCC_PATTERN = /^([A-Z][A-Z0-9.]{0,5})(\d{2})(\d{2})(\d{2})([CP])(\d{8})$/;

/**
 * Parse an OCC option symbol. Returns undefined for anything else.
 */
export function parseOccSymbol(symbol: string): OccSymbol | undefined {
	const match = OCC_PATTERN.exec(symbol);
	if (!match) {
		return undefined;
	}

	const [, underlying, yy, mm, dd, typeChar, strikeStr] = match;
	if (!underlying || !yy || !mm || !dd || !typeChar || !strikeStr) {
		return undefined;
	}

	const year = 2000 + Number.parseInt(yy, 10);
	const month = Number.parseInt(mm, 10);
	const day = Number.parseInt(dd, 10);
	const expiration = new Date(Date.UTC(year, month - 1, day));

	// Reject dates that rolled over, e.g. 240231
	if (expiration.getUTCMonth() !== month - 1 || expiration.getUTCDate() !== day) {
		return undefined;
	}

	const strike = Number.parseInt(strikeStr, 10) / 1000;
	if (strike <= 0) {
		return undefined;
	}

	return {
		underlying,
		expiration,
		optionType: typeChar === "C" ? "CALL" : "PUT",
		strike,
	};
}

/**
 * Build an OCC option symbol from its components.
 */
export function buildOccSymbol(
	underlying: string,
	expiration: Date,
	optionType: OptionType,
	strike: number
): string {
	const yy = String(expiration.getUTCFullYear()).slice(2);
	const mm = String(expiration.getUTCMonth() + 1).padStart(2, "0");
	const dd = String(expiration.getUTCDate()).padStart(2, "0");
	const typeChar = optionType === "CALL" ? "C" : "P";
	const strikeStr = String(Math.round(strike * 1000)).padStart(8, "0");

	return `${underlying}${yy}${mm}${dd}${typeChar}${strikeStr}`;
}

/**
 * Calendar date (YYYY-MM-DD, UTC) used for expiration filters.
 */
export function toDateKey(date: Date): string {
	return date.toISOString().slice(0, 10);
}
