import fs from "node:fs";

import { ConfigError } from "@klinex/core";

/** Upper-case, drop blanks and keep the first occurrence of each symbol */
export const normalizeSymbols = (symbols: readonly string[]): string[] => {
	const unique: string[] = [];
	for (const raw of symbols) {
		const symbol = raw.trim().toUpperCase();
		if (symbol.length && !unique.includes(symbol)) {
			unique.push(symbol);
		}
	}
	return unique;
};

/** One symbol per line; blank lines and `#` comments are ignored */
export const parseSymbolsList = (contents: string): string[] =>
	contents
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));

/**
 * @throws ConfigError when the file cannot be read
 */
export const readSymbolsFile = (filePath: string): string[] => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Symbols file not found: ${filePath}`);
	}
	return parseSymbolsList(fs.readFileSync(filePath, "utf-8"));
};
