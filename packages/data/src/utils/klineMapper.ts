import { z } from "zod";
import { HttpError, isDecimalText, toDecimal, type Kline } from "@klinex/core";

const epochMs = z.number().int().nonnegative();

const decimalField = z.union([
	z.string().refine(isDecimalText, { message: "expected decimal text" }),
	z.number().finite(),
]);

/**
 * Positional kline row as served by `/api/v3/klines`. Only the first 11
 * fields are consumed; anything after them is ignored.
 */
export const RawKlineRowSchema = z
	.tuple([
		epochMs, // open time
		decimalField, // open
		decimalField, // high
		decimalField, // low
		decimalField, // close
		decimalField, // base volume
		epochMs, // close time
		decimalField, // quote volume
		z.number().int().nonnegative(), // trades
		decimalField, // taker buy base volume
		decimalField, // taker buy quote volume
	])
	.rest(z.unknown());

export type RawKlineRow = z.infer<typeof RawKlineRowSchema>;

export const RawKlinePageSchema = z.array(RawKlineRowSchema);

/**
 * Map one validated row to an immutable Kline.
 * @throws HttpError when the row's open time is not before its close time
 */
export const mapRawKline = (row: RawKlineRow): Kline => {
	const [
		openTime,
		open,
		high,
		low,
		close,
		volume,
		closeTime,
		quoteVolume,
		trades,
		takerBuyBaseVolume,
		takerBuyQuoteVolume,
	] = row;

	if (openTime >= closeTime) {
		throw new HttpError(
			`Malformed kline: open time ${openTime} is not before close time ${closeTime}`,
			null
		);
	}

	return Object.freeze({
		openTime,
		open: toDecimal(open),
		high: toDecimal(high),
		low: toDecimal(low),
		close: toDecimal(close),
		volume: toDecimal(volume),
		closeTime,
		quoteVolume: toDecimal(quoteVolume),
		trades,
		takerBuyBaseVolume: toDecimal(takerBuyBaseVolume),
		takerBuyQuoteVolume: toDecimal(takerBuyQuoteVolume),
	});
};

/**
 * Validate and map a whole klines page, preserving server order.
 * @throws HttpError naming the first offending row
 */
export const parseKlinePage = (payload: unknown): Kline[] => {
	const result = RawKlinePageSchema.safeParse(payload);
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue ? issue.path.join(".") : "";
		throw new HttpError(
			`Malformed klines response at [${where}]: ${issue?.message ?? result.error.message}`,
			null,
			result.error
		);
	}
	return result.data.map(mapRawKline);
};
