// SPDX-License-Identifier: MIT
// VQIR Logging
// pino component loggers. Output goes to stderr so stdout stays free for
// rendered documents.

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerOptions {
	level?: LogLevel;
	destination?: DestinationStream;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Log level from LOG_LEVEL, falling back to "warn".
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const envLevel = env.LOG_LEVEL?.toLowerCase();
	if (envLevel && isLogLevel(envLevel)) {
		return envLevel;
	}
	return "warn";
}

/**
 * Create a logger for a component.
 *
 * @example
 * ```typescript
 * const logger = createLogger("pinecone");
 * logger.warn({ operator: "MATCHES" }, "Operator falls back to $eq");
 * ```
 */
export function createLogger(
	component: string,
	options: LoggerOptions = {},
): Logger {
	const { level = getLogLevel(), destination } = options;
	return pino(
		{ name: component, level },
		destination ?? pino.destination({ dest: 2, sync: true }),
	);
}

/**
 * Child logger carrying extra bindings, e.g. the operation being rendered.
 */
export function createChildLogger(
	parent: Logger,
	bindings: Record<string, unknown>,
): Logger {
	return parent.child(bindings);
}
