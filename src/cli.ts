#!/usr/bin/env -S node --import tsx
// SPDX-License-Identifier: MIT
// VQIR Command Line
// validate / render / capabilities over JSON query documents.

import { pathToFileURL } from "node:url";
import { parseArgs, readJsonFile, USAGE, type Options } from "./cli-utils.js";
import { loadRendererConfig, readRendererConfig, rendererFromConfig, type RendererConfig } from "./config.js";
import { exhaustive, isVQIRError, VQIRError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { DIALECTS, isDialect, type Renderer } from "./renderer.js";
import { resultDigest } from "./result.js";
import { DISTANCE_METRICS, FILTER_OPERATORS, OPERATIONS } from "./types.js";
import { parseQuery } from "./validator.js";

export interface CliIO {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	logger?: Logger;
}

const defaultIO: CliIO = {
	stdout: text => process.stdout.write(text + "\n"),
	stderr: text => process.stderr.write(text + "\n"),
};

function formatJson(value: unknown, pretty: boolean): string {
	return pretty ? JSON.stringify(value, null, "\t") : JSON.stringify(value);
}

/**
 * Resolve the renderer config from --config and --dialect; --dialect wins.
 */
async function resolveConfig(options: Options): Promise<RendererConfig | undefined> {
	const fromFile = options.config !== undefined ? await readRendererConfig(options.config) : undefined;
	if (options.dialect === undefined) return fromFile;
	if (!isDialect(options.dialect)) {
		throw VQIRError.config(`Unknown dialect '${options.dialect}'; expected one of ${DIALECTS.join(", ")}`);
	}
	return loadRendererConfig({ ...fromFile, dialect: options.dialect });
}

async function requireConfig(options: Options): Promise<RendererConfig> {
	const config = await resolveConfig(options);
	if (config === undefined) {
		throw VQIRError.config("A dialect is required: pass --dialect or --config");
	}
	return config;
}

function requirePath(path: string | null, command: string): string {
	if (path === null) {
		throw VQIRError.config(`${command} requires a query file`);
	}
	return path;
}

//==============================================================================
// Commands
//==============================================================================

async function runValidate(path: string, options: Options, io: CliIO): Promise<number> {
	const config = await resolveConfig(options);
	const result = parseQuery(await readJsonFile(path), config?.limits);
	const [first] = result.errors;
	if (first) {
		io.stderr(`${path}: ${first.code} at ${first.path}: ${first.message}`);
		return 1;
	}
	io.stdout(`${path}: valid`);
	return 0;
}

async function runRender(path: string, options: Options, io: CliIO): Promise<number> {
	const config = await requireConfig(options);
	const parsed = parseQuery(await readJsonFile(path), config.limits);
	if (!parsed.valid || parsed.value === undefined) {
		for (const error of parsed.errors) {
			io.stderr(`${path}: ${error.code} at ${error.path}: ${error.message}`);
		}
		return 1;
	}
	const renderer = rendererFromConfig(config, io.logger);
	const result = renderer.render(parsed.value);
	const document: unknown = JSON.parse(result.document);
	io.stdout(formatJson({
		dialect: renderer.dialect,
		document,
		requiredParams: result.requiredParams,
		digest: resultDigest(result),
	}, options.pretty));
	return 0;
}

async function runCapabilities(options: Options, io: CliIO): Promise<number> {
	const renderer: Renderer = rendererFromConfig(await requireConfig(options), io.logger);
	io.stdout(formatJson({
		dialect: renderer.dialect,
		operations: OPERATIONS.filter(op => renderer.supportsOperation(op)),
		filterOperators: FILTER_OPERATORS.filter(op => renderer.supportsFilterOperator(op)),
		metrics: DISTANCE_METRICS.filter(m => renderer.supportsMetric(m)),
	}, options.pretty));
	return 0;
}

/**
 * Run the CLI and return its exit code. Errors are reported on stderr.
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
	const { command, path, options } = parseArgs(args);
	if (options.help) {
		io.stdout(USAGE);
		return 0;
	}
	if (command === null) {
		io.stderr(USAGE);
		return 1;
	}

	try {
		switch (command) {
		case "validate": return await runValidate(requirePath(path, command), options, io);
		case "render": return await runRender(requirePath(path, command), options, io);
		case "capabilities": return await runCapabilities(options, io);
		case "help": io.stdout(USAGE); return 0;
		default: return exhaustive(command);
		}
	} catch (e) {
		if (isVQIRError(e)) {
			io.stderr(`error [${e.code}]: ${e.message}`);
			return 1;
		}
		throw e;
	}
}

//==============================================================================
// Entry Point
//==============================================================================

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
	const logger = createLogger("cli");
	runCli(process.argv.slice(2), { ...defaultIO, logger })
		.then(code => {
			process.exitCode = code;
		})
		.catch((e: unknown) => {
			logger.fatal({ err: e }, "Unexpected failure");
			process.exitCode = 2;
		});
}
