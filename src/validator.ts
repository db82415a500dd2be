// SPDX-License-Identifier: MIT
// VQIR Query Validator
// Two-phase validation: Zod safeParse for structural, then semantic checks.
// Semantic checks stop at the first violated rule.

import { z } from "zod/v4";
import {
	ErrorCodes,
	invalidResult,
	VQIRError,
	type ErrorCode,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import {
	isValuelessOperator,
	LogicOperators,
	Operations,
	resolveLimits,
	type FilterItem,
	type MetadataEntry,
	type SparseVectorValue,
	type ValidationLimits,
	type VectorQuery,
} from "./types.js";
import { VectorQuerySchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	// First issue only: callers fix one problem at a time.
	return error.issues.slice(0, 1).map(issue => ({
		code: ErrorCodes.SchemaError,
		path: issue.path.length > 0 ? "$." + issue.path.map(String).join(".") : "$",
		message: issue.message,
	}));
}

//==============================================================================
// Rule Failures
//==============================================================================

/** First-failure carrier; the check functions return it or undefined. */
type Failure = ValidationError | undefined;

function fail(code: ErrorCode, path: string, message: string, value?: unknown): ValidationError {
	const error: ValidationError = { code, path, message };
	if (value !== undefined) error.value = value;
	return error;
}

function checkIdCount(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.ids.length > limits.maxIds) {
		return fail(
			ErrorCodes.LimitExceeded,
			"$.ids",
			`Too many ids: ${query.ids.length} > ${limits.maxIds}`,
			query.ids.length,
		);
	}
	return undefined;
}

/** Entries become object keys by name, so two fields sharing a name clash. */
function checkUniqueEntries(entries: MetadataEntry[], path: string): Failure {
	const seen = new Set<string>();
	for (const [i, entry] of entries.entries()) {
		if (seen.has(entry.field.name)) {
			return fail(
				ErrorCodes.InvalidValue,
				`${path}.${i}`,
				`Duplicate metadata field '${entry.field.name}'`,
				entry.field.name,
			);
		}
		seen.add(entry.field.name);
	}
	return undefined;
}

function checkSparseVector(sparse: SparseVectorValue, path: string): Failure {
	if (sparse.kind === "param") return undefined;
	if (sparse.indices.length !== sparse.values.length) {
		return fail(
			ErrorCodes.InvalidValue,
			path,
			`Sparse vector indices and values differ in length: ${sparse.indices.length} != ${sparse.values.length}`,
		);
	}
	for (const index of sparse.indices) {
		if (!Number.isInteger(index) || index < 0) {
			return fail(
				ErrorCodes.InvalidValue,
				path + ".indices",
				`Sparse vector index must be a non-negative integer: ${index}`,
				index,
			);
		}
	}
	return undefined;
}

//==============================================================================
// Filter Checks
//==============================================================================

/**
 * Walk the filter tree, counting group nesting. The walk never descends more
 * than maxFilterDepth groups, so self-referencing trees end in a depth error.
 */
function checkFilter(
	item: FilterItem,
	level: number,
	path: string,
	limits: ValidationLimits,
): Failure {
	switch (item.kind) {
	case "group": {
		const depth = level + 1;
		if (depth > limits.maxFilterDepth) {
			return fail(
				ErrorCodes.LimitExceeded,
				path,
				`Filter nesting too deep: ${depth} > ${limits.maxFilterDepth}`,
				depth,
			);
		}
		if (item.logic === LogicOperators.Not && item.children.length !== 1) {
			return fail(
				ErrorCodes.InvalidFilter,
				path,
				`NOT group must have exactly one child, got ${item.children.length}`,
			);
		}
		if (item.children.length === 0) {
			return fail(
				ErrorCodes.InvalidFilter,
				path,
				`${item.logic} group requires at least one child`,
			);
		}
		for (const [i, child] of item.children.entries()) {
			const failure = checkFilter(child, depth, `${path}.children.${i}`, limits);
			if (failure) return failure;
		}
		return undefined;
	}
	case "condition": {
		const valueless = isValuelessOperator(item.operator);
		if (valueless && item.value !== undefined) {
			return fail(
				ErrorCodes.InvalidFilter,
				path,
				`Operator ${item.operator} on '${item.field.name}' does not take a value`,
			);
		}
		if (!valueless && item.value === undefined) {
			return fail(
				ErrorCodes.InvalidFilter,
				path,
				`Operator ${item.operator} on '${item.field.name}' requires a value`,
			);
		}
		return undefined;
	}
	case "range":
		if (item.min === undefined && item.max === undefined) {
			return fail(
				ErrorCodes.InvalidFilter,
				path,
				`Range filter on '${item.field.name}' requires min or max`,
			);
		}
		return undefined;
	case "geo":
		return undefined;
	default:
		return fail(ErrorCodes.InvalidFilter, path, "Unknown filter node", item);
	}
}

/**
 * Nesting depth of an acyclic filter tree: one per group level, zero for a leaf.
 */
export function filterDepth(item: FilterItem): number {
	if (item.kind !== "group") return 0;
	let deepest = 0;
	for (const child of item.children) {
		deepest = Math.max(deepest, filterDepth(child));
	}
	return deepest + 1;
}

//==============================================================================
// Per-Operation Rules
//==============================================================================

function checkSearch(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.queryVector === undefined) {
		return fail(ErrorCodes.MissingRequiredField, "$.queryVector", "SEARCH requires a query vector");
	}
	if (query.topK === undefined) {
		return fail(ErrorCodes.MissingRequiredField, "$.topK", "SEARCH requires topK");
	}
	if (typeof query.topK === "number") {
		const k = query.topK;
		if (!Number.isInteger(k)) {
			return fail(ErrorCodes.InvalidValue, "$.topK", `topK must be an integer: ${k}`, k);
		}
		if (k > limits.maxTopK) {
			return fail(ErrorCodes.LimitExceeded, "$.topK", `topK exceeds maximum: ${k} > ${limits.maxTopK}`, k);
		}
		if (k <= 0) {
			return fail(ErrorCodes.InvalidValue, "$.topK", `topK must be positive: ${k}`, k);
		}
	}
	if (query.metadataFields.length > limits.maxMetadataFields) {
		return fail(
			ErrorCodes.LimitExceeded,
			"$.metadataFields",
			`Metadata field selection exceeds maximum: ${query.metadataFields.length} > ${limits.maxMetadataFields}`,
			query.metadataFields.length,
		);
	}
	return undefined;
}

function checkUpsert(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.vectors.length === 0) {
		return fail(ErrorCodes.MissingRequiredField, "$.vectors", "UPSERT requires at least one vector");
	}
	if (query.vectors.length > limits.maxBatchSize) {
		return fail(
			ErrorCodes.LimitExceeded,
			"$.vectors",
			`Batch size exceeds maximum: ${query.vectors.length} > ${limits.maxBatchSize}`,
			query.vectors.length,
		);
	}
	for (const [i, record] of query.vectors.entries()) {
		const duplicate = checkUniqueEntries(record.metadata, `$.vectors.${i}.metadata`);
		if (duplicate) return duplicate;
		if (record.sparseVector !== undefined) {
			const sparse = checkSparseVector(record.sparseVector, `$.vectors.${i}.sparseVector`);
			if (sparse) return sparse;
		}
	}
	return undefined;
}

function checkDelete(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.ids.length === 0 && query.filter === undefined) {
		return fail(ErrorCodes.MissingRequiredField, "$", "DELETE requires either ids or a filter");
	}
	if (query.ids.length > 0 && query.filter !== undefined) {
		return fail(ErrorCodes.InvalidValue, "$.filter", "DELETE takes ids or a filter, not both");
	}
	if (query.filter !== undefined && !query.deleteAll) {
		return fail(ErrorCodes.DeleteAllRequired, "$.deleteAll", "DELETE by filter requires deleteAll for safety");
	}
	return checkIdCount(query, limits);
}

function checkFetch(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.ids.length === 0) {
		return fail(ErrorCodes.MissingRequiredField, "$.ids", "FETCH requires at least one id");
	}
	return checkIdCount(query, limits);
}

function checkUpdate(query: VectorQuery, limits: ValidationLimits): Failure {
	if (query.ids.length === 0) {
		return fail(ErrorCodes.MissingRequiredField, "$.ids", "UPDATE requires at least one id");
	}
	if (query.updates.length === 0) {
		return fail(ErrorCodes.MissingRequiredField, "$.updates", "UPDATE requires at least one field to update");
	}
	const ids = checkIdCount(query, limits);
	if (ids) return ids;
	return checkUniqueEntries(query.updates, "$.updates");
}

function checkOperation(query: VectorQuery, limits: ValidationLimits): Failure {
	switch (query.operation) {
	case Operations.Search: return checkSearch(query, limits);
	case Operations.Upsert: return checkUpsert(query, limits);
	case Operations.Delete: return checkDelete(query, limits);
	case Operations.Fetch: return checkFetch(query, limits);
	case Operations.Update: return checkUpdate(query, limits);
	default:
		return fail(
			ErrorCodes.UnsupportedOperation,
			"$.operation",
			`Unsupported operation: ${String(query.operation)}`,
			query.operation,
		);
	}
}

//==============================================================================
// Public Validators
//==============================================================================

/**
 * Semantic validation of a typed query. Returns at most one error: the first
 * rule the query violates.
 */
export function validateQuery(
	query: VectorQuery,
	limits?: Partial<ValidationLimits>,
): ValidationResult<VectorQuery> {
	const resolved = resolveLimits(limits);

	if (query.target.name === "") {
		return invalidResult([
			fail(ErrorCodes.MissingRequiredField, "$.target.name", "Target collection is required"),
		]);
	}

	const failure =
		checkOperation(query, resolved) ??
		(query.filter !== undefined ? checkFilter(query.filter, 0, "$.filter", resolved) : undefined);
	if (failure) return invalidResult([failure]);

	return validResult(query);
}

/**
 * Validate an untyped document (e.g. parsed JSON) as a query.
 */
export function parseQuery(
	doc: unknown,
	limits?: Partial<ValidationLimits>,
): ValidationResult<VectorQuery> {
	// Phase 1: Structural validation via Zod
	const parsed = VectorQuerySchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<VectorQuery>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	return validateQuery(parsed.data, limits);
}

/**
 * Throwing variant of validateQuery for callers that render immediately.
 */
export function assertValidQuery(
	query: VectorQuery,
	limits?: Partial<ValidationLimits>,
): void {
	const result = validateQuery(query, limits);
	const [first] = result.errors;
	if (first) throw VQIRError.fromValidation(first);
}
