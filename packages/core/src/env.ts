import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Load the first-found env files into process.env. An explicit path wins over
 * KLINES_ENV_FILE, which wins over `.env` and `.env.local` under projectRoot.
 * Each file is applied at most once per process.
 * @returns absolute paths loaded by this call
 */
export function loadEnvFiles(projectRoot: string, explicitPath?: string): string[] {
	const candidates = filterUnique(
		[explicitPath, process.env.KLINES_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate) ? candidate : path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: false });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
