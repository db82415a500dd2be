/**
 * VQIR CLI Utilities
 *
 * Extracted CLI functions for testability:
 * - Argument parsing (subcommand, positional file, flags and options)
 * - File I/O (reading JSON documents)
 */

import { readFile } from "node:fs/promises";
import { VQIRError, ErrorCodes } from "./errors.js";

export const COMMANDS = ["validate", "render", "capabilities", "help"] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * CLI options interface
 */
export interface Options {
	help: boolean;
	pretty: boolean;
	dialect?: string;
	config?: string;
}

export interface ParsedArgs {
	command: Command | null;
	path: string | null;
	options: Options;
}

function isCommand(arg: string): arg is Command {
	return COMMANDS.some(c => c === arg);
}

function consumeNextArg(args: string[], i: number): string | undefined {
	const nextArg = args[i + 1];
	if (nextArg !== undefined && !nextArg.startsWith("-")) return nextArg;
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--help": case "-h": options.help = true; return true;
	case "--pretty": case "-p": options.pretty = true; return true;
	default: return false;
	}
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 *
 * Supports:
 *   - Subcommands: validate, render, capabilities, help
 *   - Positional path argument
 *   - Flags: --help/-h, --pretty/-p
 *   - Options with values: --dialect/-d <name>, --config/-c <path>
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: Options = { help: false, pretty: false };
	let command: Command | null = null;
	let path: string | null = null;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (arg === "--dialect" || arg === "-d" || arg === "--config" || arg === "-c") {
			const nextVal = consumeNextArg(args, i);
			if (nextVal === undefined) continue;
			if (arg === "--dialect" || arg === "-d") options.dialect = nextVal;
			else options.config = nextVal;
			i++;
			continue;
		}
		if (arg.startsWith("-")) continue;
		if (command === null && isCommand(arg)) {
			command = arg;
		} else if (path === null) {
			path = arg;
		}
	}

	if (command === "help") options.help = true;
	return { command, path, options };
}

/**
 * Read and parse a JSON file. Missing files and malformed JSON surface as a
 * SchemaError naming the file.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (e) {
		throw new VQIRError(
			ErrorCodes.SchemaError,
			`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	try {
		const parsed: unknown = JSON.parse(content);
		return parsed;
	} catch (e) {
		throw new VQIRError(
			ErrorCodes.SchemaError,
			`${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
}

export const USAGE = `Usage: vqir <command> [options]

Commands:
  validate <file>                  Validate a JSON query document
  render <file> --dialect <name>   Render a query for a backend
  capabilities --dialect <name>    List what a backend supports
  help                             Show this message

Options:
  -d, --dialect <name>   pinecone | qdrant | weaviate | milvus
  -c, --config <file>    Renderer config (JSON)
  -p, --pretty           Indent JSON output
  -h, --help             Show this message`;
