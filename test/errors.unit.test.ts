// SPDX-License-Identifier: MIT
// VQIR Error Types - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ErrorCodes,
	exhaustive,
	invalidResult,
	isVQIRError,
	validResult,
	VQIRError,
} from "../src/errors.js";

describe("Errors - Unit Tests", () => {

	describe("VQIRError", () => {
		it("should carry code, message and path", () => {
			const error = new VQIRError(ErrorCodes.InvalidValue, "bad", "$.topK");
			assert.equal(error.name, "VQIRError");
			assert.equal(error.code, "InvalidValue");
			assert.equal(error.message, "bad");
			assert.equal(error.path, "$.topK");
			assert.ok(error instanceof Error);
		});

		it("should leave path unset when not given", () => {
			assert.equal("path" in new VQIRError(ErrorCodes.BuilderError, "x"), false);
		});

		it("should wrap a validation failure", () => {
			const error = VQIRError.fromValidation({
				code: ErrorCodes.LimitExceeded,
				path: "$.vectors",
				message: "Batch size exceeds maximum: 101 > 100",
			});
			assert.equal(error.code, ErrorCodes.LimitExceeded);
			assert.equal(error.path, "$.vectors");
			assert.equal(error.message, "Invalid query: Batch size exceeds maximum: 101 > 100");
		});

		it("should format rendering errors", () => {
			assert.equal(VQIRError.unsupportedFilter("milvus", "geo").message, "Unsupported filter type for milvus: geo");
			assert.equal(VQIRError.unsupportedFilter("milvus", "geo").code, ErrorCodes.UnsupportedFilter);
			assert.equal(
				VQIRError.unsupportedOperator("qdrant", "MATCHES").message,
				"Filter operator MATCHES is not supported by qdrant",
			);
			assert.equal(VQIRError.serialization("oops").message, "Failed to serialize query: oops");
		});

		it("should quote invalid identifiers", () => {
			const error = VQIRError.invalidIdentifier("field", "a'b");
			assert.equal(error.code, ErrorCodes.InvalidIdentifier);
			assert.equal(error.message, 'Invalid field name: "a\'b"');
		});

		it("should create construction-surface errors", () => {
			assert.equal(VQIRError.unknownReference("missing").code, ErrorCodes.UnknownReference);
			assert.equal(VQIRError.builder("misuse").code, ErrorCodes.BuilderError);
			assert.equal(VQIRError.config("bad config").code, ErrorCodes.ConfigError);
		});
	});

	describe("isVQIRError", () => {
		it("should recognise only VQIRError instances", () => {
			assert.equal(isVQIRError(VQIRError.builder("x")), true);
			assert.equal(isVQIRError(new Error("x")), false);
			assert.equal(isVQIRError({ code: "BuilderError" }), false);
		});
	});

	describe("validation results", () => {
		it("should build valid and invalid results", () => {
			assert.deepStrictEqual(validResult(3), { valid: true, errors: [], value: 3 });
			const error = { code: ErrorCodes.InvalidValue, path: "$", message: "m" };
			assert.deepStrictEqual(invalidResult([error]), { valid: false, errors: [error] });
		});
	});

	describe("exhaustive", () => {
		function label(kind: "a" | "b"): string {
			switch (kind) {
			case "a": return "A";
			case "b": return "B";
			default: return exhaustive(kind);
			}
		}

		it("should throw for a value outside the union", () => {
			const kind: "a" | "b" = JSON.parse('"c"');
			assert.throws(() => label(kind), { message: "Unexpected value: c" });
		});
	});
});
