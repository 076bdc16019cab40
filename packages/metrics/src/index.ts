export * from "./metricsSchema";
export {
	computeSummaryMetrics,
	dailyVolumes,
	priceChangePct,
	referenceClose,
} from "./calcSummary";
