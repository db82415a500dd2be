// SPDX-License-Identifier: MIT
// Shared test helpers: captured loggers and deep freezing.

import { createLogger, type Logger } from "../src/logger.js";

export interface CapturedLogger {
	logger: Logger;
	/** Parsed `msg` of every line written so far. */
	messages(): string[];
	/** Parsed numeric `level` of every line written so far. */
	levels(): number[];
	/** Every line written so far, parsed. */
	entries(): Record<string, unknown>[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseLine(line: string): Record<string, unknown> {
	const entry: unknown = JSON.parse(line);
	return isRecord(entry) ? entry : {};
}

/**
 * Logger at "warn" whose output is kept in memory.
 */
export function captureLogger(component: string): CapturedLogger {
	const lines: string[] = [];
	const logger = createLogger(component, {
		level: "warn",
		destination: { write(msg: string) { lines.push(msg); } },
	});
	return {
		logger,
		messages: () => lines.map(line => {
			const msg = parseLine(line).msg;
			return typeof msg === "string" ? msg : "";
		}),
		levels: () => lines.map(line => {
			const level = parseLine(line).level;
			return typeof level === "number" ? level : -1;
		}),
		entries: () => lines.map(parseLine),
	};
}

export function silentLogger(component = "test"): Logger {
	return createLogger(component, { level: "silent" });
}

/** Recursively freeze a value so any mutation throws in strict mode. */
export function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object") {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}
