import type { SleepFn } from "../types";

export const sleep: SleepFn = (ms) =>
	new Promise((resolve) => setTimeout(resolve, ms));
