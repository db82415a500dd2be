// SPDX-License-Identifier: MIT
// VQIR Renderer Configuration - Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadRendererConfig, readRendererConfig, rendererFromConfig } from "../src/config.js";
import { createRenderer } from "../src/dialects/index.js";
import { ErrorCodes, VQIRError } from "../src/errors.js";
import { emptyQuery, Operations, type VectorQuery } from "../src/types.js";
import { silentLogger } from "./helpers.js";

function configError(prefix: string) {
	return (e: unknown) => e instanceof VQIRError &&
		e.code === ErrorCodes.ConfigError &&
		e.message.startsWith(prefix);
}

const searchQuery: VectorQuery = {
	...emptyQuery(Operations.Search, { name: "docs" }),
	queryVector: { kind: "param", name: "qv" },
	topK: 10,
};

describe("Renderer Config - Unit Tests", () => {

	describe("loadRendererConfig", () => {
		it("should accept a full config", () => {
			const config = loadRendererConfig({
				dialect: "milvus",
				unsupportedOperators: "reject",
				defaultVectorField: "vec",
				sparseVectorField: "bm25",
				limits: { maxTopK: 100 },
			});
			assert.deepStrictEqual(config, {
				dialect: "milvus",
				unsupportedOperators: "reject",
				defaultVectorField: "vec",
				sparseVectorField: "bm25",
				limits: { maxTopK: 100 },
			});
		});

		it("should name the offending key", () => {
			assert.throws(() => loadRendererConfig({ dialect: "redis" }), configError("Invalid renderer config at dialect: "));
			assert.throws(
				() => loadRendererConfig({ dialect: "qdrant", limits: { maxTopK: 0 } }),
				configError("Invalid renderer config at limits.maxTopK: "),
			);
			assert.throws(
				() => loadRendererConfig({ dialect: "qdrant", unsupportedOperators: "ignore" }),
				configError("Invalid renderer config at unsupportedOperators: "),
			);
		});

		it("should reject unknown keys", () => {
			assert.throws(() => loadRendererConfig({ dialect: "pinecone", namespace: "x" }), configError("Invalid renderer config at "));
		});
	});

	describe("readRendererConfig", () => {
		let dir = "";

		before(async () => {
			dir = await mkdtemp(join(tmpdir(), "vqir-config-"));
		});

		after(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("should read and validate a file", async () => {
			const file = join(dir, "qdrant.json");
			await writeFile(file, JSON.stringify({ dialect: "qdrant", defaultVectorName: "text" }));
			assert.deepStrictEqual(await readRendererConfig(file), { dialect: "qdrant", defaultVectorName: "text" });
		});

		it("should report malformed JSON", async () => {
			const file = join(dir, "broken.json");
			await writeFile(file, "{ dialect: qdrant");
			await assert.rejects(readRendererConfig(file), configError(`Config file ${file} is not valid JSON: `));
		});
	});

	describe("rendererFromConfig", () => {
		it("should pass dialect options through", () => {
			const r = rendererFromConfig({ dialect: "qdrant", defaultVectorName: "text" }, silentLogger());
			assert.equal(r.dialect, "qdrant");
			assert.equal(
				r.render(searchQuery).document,
				'{"limit":10,"query":{"name":"text","vector":":qv"},"with_payload":false,"with_vector":false}',
			);
		});

		it("should apply configured limits when rendering", () => {
			const r = rendererFromConfig({ dialect: "pinecone", limits: { maxTopK: 5 } }, silentLogger());
			assert.throws(
				() => r.render(searchQuery),
				(e: unknown) => e instanceof VQIRError &&
					e.code === ErrorCodes.LimitExceeded &&
					e.message === "Invalid query: topK exceeds maximum: 10 > 5",
			);
		});

		it("should match createRenderer for the same dialect", () => {
			const fromConfig = rendererFromConfig({ dialect: "weaviate" }, silentLogger());
			const direct = createRenderer("weaviate", { logger: silentLogger() });
			assert.deepStrictEqual(fromConfig.render(searchQuery), direct.render(searchQuery));
		});
	});
});
