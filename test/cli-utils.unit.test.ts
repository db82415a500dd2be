// SPDX-License-Identifier: MIT
// VQIR CLI Utilities - Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { parseArgs, readJsonFile, type Options } from "../src/cli-utils.js";
import { ErrorCodes, VQIRError } from "../src/errors.js";

//==============================================================================
// Test Fixtures
//==============================================================================

const defaultOptions: Options = {
	help: false,
	pretty: false,
};

//==============================================================================
// Test Suite
//==============================================================================

describe("CLI Utils - Unit Tests", () => {

	//==========================================================================
	// parseArgs Tests
	//==========================================================================

	describe("parseArgs", () => {
		it("should parse a command, path and options", () => {
			assert.deepStrictEqual(parseArgs(["render", "query.json", "--dialect", "qdrant", "-p"]), {
				command: "render",
				path: "query.json",
				options: { ...defaultOptions, pretty: true, dialect: "qdrant" },
			});
		});

		it("should accept short option names", () => {
			assert.deepStrictEqual(parseArgs(["capabilities", "-d", "milvus", "-c", "vqir.json"]), {
				command: "capabilities",
				path: null,
				options: { ...defaultOptions, dialect: "milvus", config: "vqir.json" },
			});
		});

		it("should treat the help command as the help flag", () => {
			assert.deepStrictEqual(parseArgs(["help"]).options, { ...defaultOptions, help: true });
			assert.equal(parseArgs(["validate", "-h"]).options.help, true);
		});

		it("should not consume a flag as an option value", () => {
			assert.deepStrictEqual(parseArgs(["render", "--config", "--pretty"]).options, { ...defaultOptions, pretty: true });
			assert.deepStrictEqual(parseArgs(["render", "-d"]).options, defaultOptions);
		});

		it("should ignore unknown flags and take the first positional as the path", () => {
			const parsed = parseArgs(["--verbose", "validate", "a.json", "b.json"]);
			assert.equal(parsed.command, "validate");
			assert.equal(parsed.path, "a.json");
		});

		it("should leave command null for unknown words", () => {
			const parsed = parseArgs(["explain", "a.json"]);
			assert.equal(parsed.command, null);
			assert.equal(parsed.path, "explain");
		});
	});

	//==========================================================================
	// readJsonFile Tests
	//==========================================================================

	describe("readJsonFile", () => {
		let dir = "";

		before(async () => {
			dir = await mkdtemp(join(tmpdir(), "vqir-cli-utils-"));
		});

		after(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("should parse a JSON file", async () => {
			const file = join(dir, "query.json");
			await writeFile(file, '{"operation":"FETCH"}');
			assert.deepStrictEqual(await readJsonFile(file), { operation: "FETCH" });
		});

		it("should report a missing file", async () => {
			const file = join(dir, "missing.json");
			await assert.rejects(
				readJsonFile(file),
				(e: unknown) => e instanceof VQIRError &&
					e.code === ErrorCodes.SchemaError &&
					e.message.startsWith(`Cannot read ${file}: `),
			);
		});

		it("should report malformed JSON", async () => {
			const file = join(dir, "broken.json");
			await writeFile(file, "{");
			await assert.rejects(
				readJsonFile(file),
				(e: unknown) => e instanceof VQIRError && e.message.startsWith(`${file} is not valid JSON: `),
			);
		});
	});
});
