#!/usr/bin/env tsx

import process from "node:process";
import {
	configureLogger,
	createLogger,
	describeError,
	isKlineExportError,
	loadExporterConfig,
} from "@klinex/core";
import { BinanceKlinesClient } from "@klinex/data";
import { parseCliArgs, readFlag, readString } from "./cliArgs";
import { buildExportPlan } from "./exportPlan";
import { runExport } from "./runExport";
import { EXPORTER_VERSION } from "./version";

const USAGE = `Usage:
  klines-export --symbols <SYMBOL...> [options]

Options:
  --symbols <list>          Symbols, space or comma separated (e.g. BTCUSDT ETHUSDT)
  --symbolsFile <path>      File with one symbol per line (# comments allowed)
  --intervals <list>        Kline intervals (default 1h 4h, or KLINES_INTERVALS)
  --days <n>                Look-back window when --start is omitted (default 180)
  --start <date>            YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS, UTC
  --end <date>              YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS, UTC (default now)
  --out <dir>               Output directory (default out)
  --timeout <sec>           Per-request timeout (default 20)
  --retries <n>             Attempts per request, first included (default 3)
  --pageDelayMs <ms>        Pause between pages (default 150)
  --onNetworkError <mode>   abort | skip (default abort)
  --envPath <path>          Custom .env path
  --version                 Print the version
  --help                    Show this message

Output:
  <out>/klines_<interval>/<SYMBOL>_<interval>.csv and <out>/summary_metrics.csv.
  Lines end in LF (\n). Metrics with no data are written as NaN, not nan.
  Prices and volumes have 10 decimals; percentage changes have 6.
`;

const logger = createLogger("exporter-cli");

const main = async (): Promise<void> => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (readFlag(argMap, "help")) {
		console.log(USAGE);
		return;
	}
	if (readFlag(argMap, "version")) {
		console.log(EXPORTER_VERSION);
		return;
	}

	const config = loadExporterConfig({ envPath: readString(argMap, "envPath") });
	configureLogger();
	const plan = buildExportPlan(argMap, config);

	const client = BinanceKlinesClient.fromConfig(plan.config, {
		logger: logger.child({ component: "http" }),
	});

	const controller = new AbortController();
	process.once("SIGINT", () => {
		logger.warn("export_interrupted", { signal: "SIGINT" });
		controller.abort(new Error("Export interrupted by SIGINT"));
	});

	const result = await runExport(plan, {
		client,
		signal: controller.signal,
		logger,
	});
	console.log(
		`Exported ${result.exported.length} series (${result.skipped.length} skipped). Summary: ${result.summaryPath}`
	);
};

main().catch((error: unknown) => {
	logger.error("export_failed", {
		code: isKlineExportError(error) ? error.code : "UNKNOWN",
		error: describeError(error),
	});
	console.error("Export failed:", describeError(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
