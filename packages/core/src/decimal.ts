import Decimal from "decimal.js";

/**
 * Decimal constructor used for every exchange-supplied price and volume.
 * Exchange values carry up to 8 fractional digits on top of large integer
 * parts, so sums over months of hourly candles need more than the library's
 * default 20 significant digits.
 */
export const Dec = Decimal.clone({
	precision: 40,
	rounding: Decimal.ROUND_HALF_UP,
	toExpNeg: -40,
	toExpPos: 40,
});

export type { Decimal };

export const DECIMAL_NAN = new Dec(NaN);

const DECIMAL_TEXT = /^-?\d+(\.\d+)?$/;

export const isDecimalText = (value: string): boolean =>
	DECIMAL_TEXT.test(value);

/**
 * Parse exact decimal text (or a finite JSON number) without going through
 * binary floating point for string input.
 * @throws Error when the value is not a plain decimal
 */
export const toDecimal = (value: string | number): Decimal => {
	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			throw new Error(`Invalid decimal value: ${value}`);
		}
		return new Dec(value);
	}
	const trimmed = value.trim();
	if (!isDecimalText(trimmed)) {
		throw new Error(`Invalid decimal value: "${value}"`);
	}
	return new Dec(trimmed);
};
