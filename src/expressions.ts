// SPDX-License-Identifier: MIT
// VQIR Expression Constructors
// Shorthand for building IR nodes. Names are screened as identifiers and the
// arity rules the validator enforces are checked at construction time.

import { VQIRError } from "./errors.js";
import { assertIdentifier } from "./identifiers.js";
import {
	FilterOperators,
	isValuelessOperator,
	LogicOperators,
	type Collection,
	type EmbeddingField,
	type FilterCondition,
	type FilterGroup,
	type FilterItem,
	type FilterOperator,
	type GeoFilter,
	type LiteralSparseVector,
	type LiteralVector,
	type MetadataEntry,
	type MetadataField,
	type Param,
	type RangeFilter,
	type SparseVectorValue,
	type VectorRecord,
	type VectorValue,
} from "./types.js";

//==============================================================================
// Handles
//==============================================================================

export function param(name: string): Param {
	return { kind: "param", name: assertIdentifier("parameter", name) };
}

export function collection(name: string): Collection {
	return { name: assertIdentifier("collection", name) };
}

export function metadataField(name: string, collectionName?: string): MetadataField {
	const field: MetadataField = { name: assertIdentifier("field", name) };
	if (collectionName !== undefined) {
		field.collection = assertIdentifier("collection", collectionName);
	}
	return field;
}

export function embeddingField(name: string, collectionName?: string): EmbeddingField {
	const field: EmbeddingField = { name: assertIdentifier("embedding", name) };
	if (collectionName !== undefined) {
		field.collection = assertIdentifier("collection", collectionName);
	}
	return field;
}

//==============================================================================
// Conditions
//==============================================================================

/**
 * Generic condition. EXISTS / NOT_EXISTS take no value; every other operator
 * requires one.
 */
export function cond(field: MetadataField, operator: FilterOperator, value?: Param): FilterCondition {
	if (isValuelessOperator(operator)) {
		if (value !== undefined) {
			throw VQIRError.builder(`${operator} does not take a value`);
		}
		return { kind: "condition", field, operator };
	}
	if (value === undefined) {
		throw VQIRError.builder(`${operator} requires a value`);
	}
	return { kind: "condition", field, operator, value };
}

type Comparison = (field: MetadataField, value: Param) => FilterCondition;

function comparison(operator: FilterOperator): Comparison {
	return (field, value) => cond(field, operator, value);
}

export const eq = comparison(FilterOperators.Eq);
export const ne = comparison(FilterOperators.Ne);
export const gt = comparison(FilterOperators.Gt);
export const gte = comparison(FilterOperators.Ge);
export const lt = comparison(FilterOperators.Lt);
export const lte = comparison(FilterOperators.Le);
export const isIn = comparison(FilterOperators.In);
export const notIn = comparison(FilterOperators.NotIn);
export const contains = comparison(FilterOperators.Contains);
export const startsWith = comparison(FilterOperators.StartsWith);
export const endsWith = comparison(FilterOperators.EndsWith);
export const matches = comparison(FilterOperators.Matches);
export const arrayContains = comparison(FilterOperators.ArrayContains);
export const arrayContainsAny = comparison(FilterOperators.ArrayContainsAny);
export const arrayContainsAll = comparison(FilterOperators.ArrayContainsAll);

export function exists(field: MetadataField): FilterCondition {
	return cond(field, FilterOperators.Exists);
}

export function notExists(field: MetadataField): FilterCondition {
	return cond(field, FilterOperators.NotExists);
}

//==============================================================================
// Groups
//==============================================================================

export function and(...children: FilterItem[]): FilterGroup {
	if (children.length === 0) {
		throw VQIRError.builder("AND requires at least one condition");
	}
	return { kind: "group", logic: LogicOperators.And, children };
}

export function or(...children: FilterItem[]): FilterGroup {
	if (children.length === 0) {
		throw VQIRError.builder("OR requires at least one condition");
	}
	return { kind: "group", logic: LogicOperators.Or, children };
}

export function not(child: FilterItem): FilterGroup {
	return { kind: "group", logic: LogicOperators.Not, children: [child] };
}

//==============================================================================
// Range and Geo
//==============================================================================

export interface RangeBounds {
	min?: Param | undefined;
	max?: Param | undefined;
}

function makeRange(field: MetadataField, bounds: RangeBounds, exclusive: boolean): RangeFilter {
	if (bounds.min === undefined && bounds.max === undefined) {
		throw VQIRError.builder(`Range on '${field.name}' requires min or max`);
	}
	const filter: RangeFilter = {
		kind: "range",
		field,
		minExclusive: exclusive,
		maxExclusive: exclusive,
	};
	if (bounds.min !== undefined) filter.min = bounds.min;
	if (bounds.max !== undefined) filter.max = bounds.max;
	return filter;
}

/** Inclusive range: min <= field <= max. */
export function range(field: MetadataField, bounds: RangeBounds): RangeFilter {
	return makeRange(field, bounds, false);
}

/** Exclusive range: min < field < max. */
export function rangeExclusive(field: MetadataField, bounds: RangeBounds): RangeFilter {
	return makeRange(field, bounds, true);
}

export function geo(field: MetadataField, lat: Param, lon: Param, radius: Param): GeoFilter {
	return { kind: "geo", field, center: { lat, lon }, radius };
}

//==============================================================================
// Vectors and Records
//==============================================================================

export function vec(p: Param): VectorValue {
	return p;
}

export function vecLiteral(values: readonly number[]): LiteralVector {
	if (values.length === 0) {
		throw VQIRError.builder("Literal vector must not be empty");
	}
	if (!values.every(Number.isFinite)) {
		throw VQIRError.builder("Literal vector values must be finite numbers");
	}
	return { kind: "literal", values: [...values] };
}

export function sparseVec(p: Param): SparseVectorValue {
	return p;
}

export function sparseVecLiteral(indices: readonly number[], values: readonly number[]): LiteralSparseVector {
	if (indices.length !== values.length) {
		throw VQIRError.builder(
			`Sparse vector indices and values differ in length: ${indices.length} != ${values.length}`,
		);
	}
	return { kind: "sparse", indices: [...indices], values: [...values] };
}

/**
 * Fluent construction of an upsert record.
 *
 * @example
 * ```typescript
 * const rec = record(param("id"), vec(param("embedding")))
 *   .withMetadata(metadataField("category"), param("category"))
 *   .build();
 * ```
 */
export class RecordBuilder {
	private readonly metadata: MetadataEntry[] = [];
	private sparseVector: SparseVectorValue | undefined;

	constructor(
		private readonly id: Param,
		private readonly vector: VectorValue,
	) {}

	/** Set a metadata field; a repeated field replaces the earlier value. */
	withMetadata(field: MetadataField, value: Param): this {
		const existing = this.metadata.findIndex(entry => entry.field.name === field.name);
		if (existing >= 0) {
			this.metadata[existing] = { field, value };
		} else {
			this.metadata.push({ field, value });
		}
		return this;
	}

	withSparseVector(sparse: SparseVectorValue): this {
		this.sparseVector = sparse;
		return this;
	}

	build(): VectorRecord {
		const rec: VectorRecord = {
			id: this.id,
			vector: this.vector,
			metadata: [...this.metadata],
		};
		if (this.sparseVector !== undefined) rec.sparseVector = this.sparseVector;
		return rec;
	}
}

export function record(id: Param, vector: VectorValue): RecordBuilder {
	return new RecordBuilder(id, vector);
}
