// SPDX-License-Identifier: MIT
// VQIR Query Builder - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { fetch, QueryBuilder, remove, search, update, upsert } from "../src/builder.js";
import { createPineconeRenderer } from "../src/dialects/pinecone.js";
import { ErrorCodes, VQIRError } from "../src/errors.js";
import { collection, eq, gt, metadataField as field, param as p, record, vec } from "../src/expressions.js";
import { Operations } from "../src/types.js";
import { silentLogger } from "./helpers.js";

const products = collection("products");

function builderError(b: QueryBuilder): string | undefined {
	return b.err?.message;
}

describe("QueryBuilder - Unit Tests", () => {

	//==========================================================================
	// Entry Points
	//==========================================================================

	describe("entry points", () => {
		it("should include metadata by default for search", () => {
			const query = search(products).vector(vec(p("qv"))).topK(10).build();
			assert.equal(query.operation, Operations.Search);
			assert.equal(query.includeMetadata, true);
			assert.equal(query.includeVectors, false);
		});

		it("should include vectors and metadata by default for fetch", () => {
			const query = fetch(products).ids(p("a")).build();
			assert.equal(query.includeMetadata, true);
			assert.equal(query.includeVectors, true);
		});

		it("should start writes with both flags off", () => {
			const query = update(products).ids(p("a")).set(field("status"), p("s")).build();
			assert.equal(query.includeMetadata, false);
			assert.equal(query.includeVectors, false);
		});
	});

	//==========================================================================
	// Misuse
	//==========================================================================

	describe("misuse", () => {
		it("should reject search-only calls on other operations", () => {
			const b = upsert(products).topK(5);
			assert.equal(builderError(b), "topK() can only be used with SEARCH");
			assert.equal(b.err?.code, ErrorCodes.BuilderError);
		});

		it("should list the operations that accept ids", () => {
			assert.equal(builderError(search(products).ids(p("a"))), "ids() can only be used with DELETE, FETCH, UPDATE");
		});

		it("should keep the first error", () => {
			const b = search(products).topK(0).deleteAll().topK(20000);
			assert.equal(builderError(b), "topK must be positive: 0");
		});

		it("should check topK", () => {
			assert.equal(builderError(search(products).topK(1.5)), "topK must be an integer: 1.5");
			assert.equal(builderError(search(products).topK(20000)), "topK exceeds maximum: 20000 > 10000");
			assert.equal(builderError(search(products, { maxTopK: 50 }).topK(51)), "topK exceeds maximum: 51 > 50");
		});

		it("should check batch size as records are added", () => {
			const rec = record(p("id"), vec(p("v"))).build();
			const b = upsert(products, { maxBatchSize: 1 }).addVector(rec).addVector(rec);
			assert.equal(builderError(b), "Batch size exceeds maximum: 2 > 1");
			assert.equal(builderError(upsert(products, { maxBatchSize: 1 }).vectors([rec, rec])), "Batch size exceeds maximum: 2 > 1");
		});

		it("should check id and field counts", () => {
			assert.equal(builderError(remove(products, { maxIds: 2 }).ids(p("a"), p("b"), p("c"))), "Too many ids: 3 > 2");
			assert.equal(
				builderError(search(products, { maxMetadataFields: 1 }).selectMetadata(field("a"), field("b"))),
				"Metadata field selection exceeds maximum: 2 > 1",
			);
		});

		it("should throw the recorded error from build", () => {
			assert.throws(
				() => upsert(products).deleteAll().build(),
				(e: unknown) => e instanceof VQIRError && e.message === "deleteAll() can only be used with DELETE",
			);
		});
	});

	//==========================================================================
	// Composition
	//==========================================================================

	describe("composition", () => {
		it("should AND a second filter onto the first", () => {
			const first = eq(field("a"), p("x"));
			const second = gt(field("b"), p("y"));
			const query = search(products).vector(vec(p("qv"))).topK(1).filter(first).where(second).build();
			assert.deepStrictEqual(query.filter, { kind: "group", logic: "AND", children: [first, second] });
		});

		it("should replace a repeated update field", () => {
			const query = update(products).ids(p("a")).set(field("s"), p("s1")).set(field("t"), p("t1")).set(field("s"), p("s2")).build();
			assert.deepStrictEqual(query.updates.map(entry => entry.value.name), ["s2", "t1"]);
		});

		it("should keep same-named fields of different collections apart until validation", () => {
			const b = update(products).ids(p("a")).set(field("s", "left"), p("s1")).set(field("s", "right"), p("s2"));
			assert.equal(builderError(b), undefined);
			assert.throws(
				() => b.build(),
				(e: unknown) => e instanceof VQIRError &&
					e.code === ErrorCodes.InvalidValue &&
					e.path === "$.updates.1" &&
					e.message === "Invalid query: Duplicate metadata field 's'",
			);
		});

		it("should snapshot the query on build", () => {
			const b = update(products).ids(p("a")).set(field("s"), p("s1"));
			const built = b.build();
			b.set(field("t"), p("t1"));
			assert.equal(built.updates.length, 1);
			assert.equal(b.build().updates.length, 2);
		});
	});

	//==========================================================================
	// Terminals
	//==========================================================================

	describe("terminals", () => {
		it("should report validation failures from tryBuild", () => {
			const result = remove(products).filter(eq(field("s"), p("s"))).tryBuild();
			assert.equal(result.success, false);
			if (!result.success) {
				assert.equal(result.error.code, ErrorCodes.DeleteAllRequired);
				assert.equal(result.error.message, "Invalid query: DELETE by filter requires deleteAll for safety");
			}
		});

		it("should report a missing topK", () => {
			const result = search(products).vector(vec(p("qv"))).tryBuild();
			assert.equal(result.success, false);
			if (!result.success) {
				assert.equal(result.error.message, "Invalid query: SEARCH requires topK");
			}
		});

		it("should render through a renderer", () => {
			const result = remove(products).ids(p("id1")).render(createPineconeRenderer({ logger: silentLogger() }));
			assert.deepStrictEqual(result, { document: '{"ids":[":id1"]}', requiredParams: ["id1"] });
		});
	});
});
