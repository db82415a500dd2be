// SPDX-License-Identifier: MIT
// VQIR Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes, VQIRError } from "../src/errors.js";
import {
	emptyQuery,
	LogicOperators,
	Operations,
	type FilterGroup,
	type FilterItem,
	type Param,
	type VectorQuery,
	type VectorRecord,
} from "../src/types.js";
import { assertValidQuery, filterDepth, parseQuery, validateQuery } from "../src/validator.js";
import { queryJsonSchema } from "../src/zod-schemas.js";

//==============================================================================
// Test Fixtures
//==============================================================================

function p(name: string): Param {
	return { kind: "param", name };
}

function eqCond(field: string, value: string): FilterItem {
	return { kind: "condition", field: { name: field }, operator: "EQ", value: p(value) };
}

/** AND groups nested `levels` deep around a single condition. */
function nested(levels: number): FilterItem {
	let item = eqCond("a", "x");
	for (let i = 0; i < levels; i++) {
		item = { kind: "group", logic: LogicOperators.And, children: [item] };
	}
	return item;
}

function searchQuery(overrides: Partial<VectorQuery> = {}): VectorQuery {
	return {
		...emptyQuery(Operations.Search, { name: "products" }),
		queryVector: p("qv"),
		topK: 10,
		...overrides,
	};
}

function rec(id: string): VectorRecord {
	return { id: p(id), vector: p("v_" + id), metadata: [] };
}

function firstError(query: VectorQuery, limits?: Parameters<typeof validateQuery>[1]) {
	const result = validateQuery(query, limits);
	assert.equal(result.valid, false);
	assert.equal(result.errors.length, 1);
	const [error] = result.errors;
	assert.ok(error);
	return error;
}

//==============================================================================
// Test Suite
//==============================================================================

describe("Validator - Unit Tests", () => {

	describe("common rules", () => {
		it("should require a target collection before anything else", () => {
			const query = { ...emptyQuery(Operations.Search, { name: "" }) };
			const error = firstError(query);
			assert.equal(error.code, ErrorCodes.MissingRequiredField);
			assert.equal(error.path, "$.target.name");
			assert.equal(error.message, "Target collection is required");
		});

		it("should accept a minimal search and return it as value", () => {
			const query = searchQuery();
			const result = validateQuery(query);
			assert.deepStrictEqual(result, { valid: true, errors: [], value: query });
		});

		it("should be idempotent", () => {
			const query = searchQuery({ topK: 0 });
			assert.deepStrictEqual(validateQuery(query), validateQuery(query));
		});
	});

	//==========================================================================
	// SEARCH
	//==========================================================================

	describe("SEARCH", () => {
		it("should require a query vector", () => {
			const error = firstError(searchQuery({ queryVector: undefined }));
			assert.equal(error.code, ErrorCodes.MissingRequiredField);
			assert.equal(error.message, "SEARCH requires a query vector");
		});

		it("should require topK", () => {
			const error = firstError(searchQuery({ topK: undefined }));
			assert.equal(error.path, "$.topK");
			assert.equal(error.message, "SEARCH requires topK");
		});

		it("should accept a topK parameter without bounds checks", () => {
			assert.equal(validateQuery(searchQuery({ topK: p("k") })).valid, true);
		});

		it("should cite the limit when topK is too large", () => {
			const error = firstError(searchQuery({ topK: 10001 }));
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.message, "topK exceeds maximum: 10001 > 10000");
			assert.equal(error.value, 10001);
		});

		it("should reject non-positive and fractional topK", () => {
			assert.equal(firstError(searchQuery({ topK: 0 })).message, "topK must be positive: 0");
			assert.equal(firstError(searchQuery({ topK: -3 })).message, "topK must be positive: -3");
			assert.equal(firstError(searchQuery({ topK: 2.5 })).message, "topK must be an integer: 2.5");
		});

		it("should honour overridden limits", () => {
			const error = firstError(searchQuery({ topK: 11 }), { maxTopK: 10 });
			assert.equal(error.message, "topK exceeds maximum: 11 > 10");
		});

		it("should limit the metadata field selection", () => {
			const metadataFields = [{ name: "a" }, { name: "b" }, { name: "c" }];
			const error = firstError(searchQuery({ metadataFields }), { maxMetadataFields: 2 });
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.message, "Metadata field selection exceeds maximum: 3 > 2");
		});
	});

	//==========================================================================
	// UPSERT
	//==========================================================================

	describe("UPSERT", () => {
		const base = emptyQuery(Operations.Upsert, { name: "products" });

		it("should require at least one record", () => {
			const error = firstError(base);
			assert.equal(error.path, "$.vectors");
			assert.equal(error.message, "UPSERT requires at least one vector");
		});

		it("should accept exactly 100 records and reject 101", () => {
			const hundred = Array.from({ length: 100 }, (_, i) => rec("id" + i));
			assert.equal(validateQuery({ ...base, vectors: hundred }).valid, true);

			const error = firstError({ ...base, vectors: [...hundred, rec("extra")] });
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.message, "Batch size exceeds maximum: 101 > 100");
		});

		it("should reject duplicate metadata fields in a record", () => {
			const record: VectorRecord = {
				...rec("a"),
				metadata: [
					{ field: { name: "genre" }, value: p("g1") },
					{ field: { name: "genre" }, value: p("g2") },
				],
			};
			const error = firstError({ ...base, vectors: [rec("ok"), record] });
			assert.equal(error.code, ErrorCodes.InvalidValue);
			assert.equal(error.path, "$.vectors.1.metadata.1");
			assert.equal(error.message, "Duplicate metadata field 'genre'");
		});

		it("should check literal sparse vectors", () => {
			const mismatched: VectorRecord = { ...rec("a"), sparseVector: { kind: "sparse", indices: [1, 2], values: [0.5] } };
			assert.equal(
				firstError({ ...base, vectors: [mismatched] }).message,
				"Sparse vector indices and values differ in length: 2 != 1",
			);

			const negative: VectorRecord = { ...rec("a"), sparseVector: { kind: "sparse", indices: [-1], values: [0.5] } };
			const error = firstError({ ...base, vectors: [negative] });
			assert.equal(error.path, "$.vectors.0.sparseVector.indices");
			assert.equal(error.message, "Sparse vector index must be a non-negative integer: -1");
		});
	});

	//==========================================================================
	// DELETE / FETCH / UPDATE
	//==========================================================================

	describe("DELETE", () => {
		const base = emptyQuery(Operations.Delete, { name: "products" });

		it("should require ids or a filter", () => {
			const error = firstError(base);
			assert.equal(error.path, "$");
			assert.equal(error.message, "DELETE requires either ids or a filter");
		});

		it("should accept ids without deleteAll", () => {
			assert.equal(validateQuery({ ...base, ids: [p("id1"), p("id2")] }).valid, true);
		});

		it("should require deleteAll for a filter delete", () => {
			const error = firstError({ ...base, filter: eqCond("status", "s") });
			assert.equal(error.code, ErrorCodes.DeleteAllRequired);
			assert.equal(error.path, "$.deleteAll");
			assert.equal(error.message, "DELETE by filter requires deleteAll for safety");
			assert.equal(validateQuery({ ...base, filter: eqCond("status", "s"), deleteAll: true }).valid, true);
		});

		it("should reject ids combined with a filter", () => {
			const error = firstError({ ...base, ids: [p("id1")], filter: eqCond("status", "s"), deleteAll: true });
			assert.equal(error.code, ErrorCodes.InvalidValue);
			assert.equal(error.path, "$.filter");
			assert.equal(error.message, "DELETE takes ids or a filter, not both");
		});

		it("should limit the id count", () => {
			const error = firstError({ ...base, ids: [p("a"), p("b"), p("c")] }, { maxIds: 2 });
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.message, "Too many ids: 3 > 2");
		});
	});

	describe("FETCH", () => {
		it("should require at least one id", () => {
			const error = firstError(emptyQuery(Operations.Fetch, { name: "products" }));
			assert.equal(error.message, "FETCH requires at least one id");
		});
	});

	describe("UPDATE", () => {
		const base = emptyQuery(Operations.Update, { name: "products" });

		it("should require ids then updates", () => {
			assert.equal(firstError(base).message, "UPDATE requires at least one id");
			assert.equal(firstError({ ...base, ids: [p("a")] }).message, "UPDATE requires at least one field to update");
		});

		it("should reject duplicate update fields", () => {
			const updates = [
				{ field: { name: "status" }, value: p("s1") },
				{ field: { name: "status" }, value: p("s2") },
			];
			const error = firstError({ ...base, ids: [p("a")], updates });
			assert.equal(error.path, "$.updates.1");
			assert.equal(error.message, "Duplicate metadata field 'status'");
		});
	});

	//==========================================================================
	// Filters
	//==========================================================================

	describe("filters", () => {
		it("should measure nesting depth", () => {
			assert.equal(filterDepth(eqCond("a", "x")), 0);
			assert.equal(filterDepth(nested(1)), 1);
			assert.equal(filterDepth(nested(5)), 5);
		});

		it("should accept depth 5 and reject depth 6", () => {
			assert.equal(validateQuery(searchQuery({ filter: nested(5) })).valid, true);

			const error = firstError(searchQuery({ filter: nested(6) }));
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.path, "$.filter.children.0.children.0.children.0.children.0.children.0");
			assert.equal(error.message, "Filter nesting too deep: 6 > 5");
		});

		it("should check depth on filter deletes too", () => {
			const query = { ...emptyQuery(Operations.Delete, { name: "products" }), filter: nested(6), deleteAll: true };
			assert.equal(firstError(query).message, "Filter nesting too deep: 6 > 5");
		});

		it("should terminate on a self-referencing group", () => {
			const loop: FilterGroup = { kind: "group", logic: LogicOperators.Or, children: [] };
			loop.children.push(loop);
			const error = firstError(searchQuery({ filter: loop }));
			assert.equal(error.message, "Filter nesting too deep: 6 > 5");
		});

		it("should enforce NOT arity", () => {
			const filter: FilterItem = { kind: "group", logic: LogicOperators.Not, children: [eqCond("a", "x"), eqCond("b", "y")] };
			const error = firstError(searchQuery({ filter }));
			assert.equal(error.code, ErrorCodes.InvalidFilter);
			assert.equal(error.message, "NOT group must have exactly one child, got 2");
		});

		it("should reject empty AND groups", () => {
			const filter: FilterItem = { kind: "group", logic: LogicOperators.And, children: [] };
			assert.equal(firstError(searchQuery({ filter })).message, "AND group requires at least one child");
		});

		it("should check operator values", () => {
			const missing: FilterItem = { kind: "condition", field: { name: "price" }, operator: "GT" };
			assert.equal(firstError(searchQuery({ filter: missing })).message, "Operator GT on 'price' requires a value");

			const extra: FilterItem = { kind: "condition", field: { name: "tag" }, operator: "EXISTS", value: p("x") };
			assert.equal(firstError(searchQuery({ filter: extra })).message, "Operator EXISTS on 'tag' does not take a value");
		});

		it("should require a bound on ranges", () => {
			const filter: FilterItem = { kind: "range", field: { name: "price" }, minExclusive: false, maxExclusive: false };
			const error = firstError(searchQuery({ filter }));
			assert.equal(error.path, "$.filter");
			assert.equal(error.message, "Range filter on 'price' requires min or max");
		});
	});

	//==========================================================================
	// parseQuery / assertValidQuery
	//==========================================================================

	describe("parseQuery", () => {
		it("should apply defaults to a JSON document", () => {
			const result = parseQuery({
				operation: "SEARCH",
				target: { name: "products" },
				queryVector: { kind: "param", name: "qv" },
				topK: 5,
			});
			assert.equal(result.valid, true);
			assert.deepStrictEqual(result.value, {
				operation: "SEARCH",
				target: { name: "products" },
				queryVector: { kind: "param", name: "qv" },
				topK: 5,
				includeVectors: false,
				includeMetadata: false,
				metadataFields: [],
				vectors: [],
				updates: [],
				ids: [],
				deleteAll: false,
			});
		});

		it("should report the first structural problem as a SchemaError", () => {
			const result = parseQuery({ operation: "LIST", target: { name: "products" } });
			assert.equal(result.valid, false);
			assert.equal(result.errors.length, 1);
			assert.equal(result.errors[0]?.code, ErrorCodes.SchemaError);
			assert.equal(result.errors[0]?.path, "$.operation");
		});

		it("should reject literal values where a param is expected", () => {
			const result = parseQuery({
				operation: "DELETE",
				target: { name: "products" },
				ids: ["raw-id"],
			});
			assert.equal(result.errors[0]?.code, ErrorCodes.SchemaError);
			assert.equal(result.errors[0]?.path, "$.ids.0");
		});

		it("should run semantic checks after parsing", () => {
			const result = parseQuery({ operation: "FETCH", target: { name: "products" } });
			assert.equal(result.errors[0]?.message, "FETCH requires at least one id");
		});
	});

	describe("assertValidQuery", () => {
		it("should throw the first failure", () => {
			assert.throws(
				() => assertValidQuery(searchQuery({ topK: undefined })),
				(e: unknown) => e instanceof VQIRError &&
					e.code === ErrorCodes.MissingRequiredField &&
					e.path === "$.topK" &&
					e.message === "Invalid query: SEARCH requires topK",
			);
		});

		it("should not throw for a valid query", () => {
			assert.doesNotThrow(() => assertValidQuery(searchQuery()));
		});
	});

	describe("queryJsonSchema", () => {
		it("should describe the query document as draft 2020-12", () => {
			const schema = queryJsonSchema();
			assert.equal(schema.$schema, "https://json-schema.org/draft/2020-12/schema");
			assert.ok(JSON.stringify(schema).includes('"deleteAll"'));
			assert.deepStrictEqual(queryJsonSchema(), schema);
		});
	});
});
