import { ConfigError } from "@klinex/core";

export type ArgValue = string | string[] | boolean;

/**
 * Parse `--key value`, `--key=value`, `--key a b c` and bare `--flag` tokens.
 * A key followed by several values, or repeated, collects them into a list.
 */
export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];

	const assign = (key: string, values: string[]): void => {
		const previous = args[key];
		const merged = [
			...(typeof previous === "string" ? [previous] : Array.isArray(previous) ? previous : []),
			...values,
		];
		if (!merged.length) {
			args[key] = true;
			return;
		}
		args[key] = merged.length === 1 ? merged[0] : merged;
	};

	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			assign(token.slice(2, eqIdx), [token.slice(eqIdx + 1)]);
			continue;
		}
		const key = token.slice(2);
		const values: string[] = [];
		while (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
			values.push(argv[i + 1]);
			i += 1;
		}
		assign(key, values);
	}
	if (positionals.length && args.symbols === undefined) {
		assign("symbols", positionals);
	}
	return args;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean => {
	const value = args[key];
	return value === true || value === "true";
};

/**
 * @throws ConfigError when the option was given without a value or more than once
 */
export const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value === "boolean") {
		throw new ConfigError(`--${key} requires a value`);
	}
	if (Array.isArray(value)) {
		throw new ConfigError(`--${key} takes a single value, got ${value.join(" ")}`);
	}
	return value;
};

/** Values of a list option, split on commas and whitespace */
export const readList = (
	args: Record<string, ArgValue>,
	key: string
): string[] | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value === "boolean") {
		throw new ConfigError(`--${key} requires at least one value`);
	}
	return (Array.isArray(value) ? value : [value])
		.flatMap((entry) => entry.split(/[\s,]+/))
		.filter((entry) => entry.length > 0);
};
