// SPDX-License-Identifier: MIT
// VQIR Core Types
// Provider-agnostic query tree. Nodes carry identifiers and placeholders only;
// runtime values are bound by the caller after rendering.

//==============================================================================
// Enumerations
//==============================================================================

export const Operations = {
	Search: "SEARCH",
	Upsert: "UPSERT",
	Delete: "DELETE",
	Fetch: "FETCH",
	Update: "UPDATE",
} as const;

export type Operation = (typeof Operations)[keyof typeof Operations];

export const FilterOperators = {
	Eq: "EQ",
	Ne: "NE",
	Gt: "GT",
	Ge: "GE",
	Lt: "LT",
	Le: "LE",
	In: "IN",
	NotIn: "NOT_IN",
	Contains: "CONTAINS",
	StartsWith: "STARTS_WITH",
	EndsWith: "ENDS_WITH",
	Matches: "MATCHES",
	Exists: "EXISTS",
	NotExists: "NOT_EXISTS",
	ArrayContains: "ARRAY_CONTAINS",
	ArrayContainsAny: "ARRAY_CONTAINS_ANY",
	ArrayContainsAll: "ARRAY_CONTAINS_ALL",
} as const;

export type FilterOperator = (typeof FilterOperators)[keyof typeof FilterOperators];

export const LogicOperators = {
	And: "AND",
	Or: "OR",
	Not: "NOT",
} as const;

export type LogicOperator = (typeof LogicOperators)[keyof typeof LogicOperators];

export const DistanceMetrics = {
	Cosine: "COSINE",
	Euclidean: "EUCLIDEAN",
	DotProduct: "DOT_PRODUCT",
	Manhattan: "MANHATTAN",
} as const;

export type DistanceMetric = (typeof DistanceMetrics)[keyof typeof DistanceMetrics];

export const OPERATIONS: Operation[] = Object.values(Operations);
export const FILTER_OPERATORS: FilterOperator[] = Object.values(FilterOperators);
export const DISTANCE_METRICS: DistanceMetric[] = Object.values(DistanceMetrics);

/** Operators that test presence and take no comparison value. */
const VALUELESS_OPERATORS: ReadonlySet<FilterOperator> = new Set([
	FilterOperators.Exists,
	FilterOperators.NotExists,
]);

export function isValuelessOperator(op: FilterOperator): boolean {
	return VALUELESS_OPERATORS.has(op);
}

//==============================================================================
// Complexity Limits
//==============================================================================

export interface ValidationLimits {
	maxFilterDepth: number;
	maxBatchSize: number;
	maxTopK: number;
	maxMetadataFields: number;
	maxIds: number;
}

export const DEFAULT_LIMITS: Readonly<ValidationLimits> = Object.freeze({
	maxFilterDepth: 5,
	maxBatchSize: 100,
	maxTopK: 10000,
	maxMetadataFields: 50,
	maxIds: 1000,
});

/** Defaults with any provided overrides applied; undefined entries keep the default. */
export function resolveLimits(
	overrides?: Partial<ValidationLimits>,
): ValidationLimits {
	return {
		maxFilterDepth: overrides?.maxFilterDepth ?? DEFAULT_LIMITS.maxFilterDepth,
		maxBatchSize: overrides?.maxBatchSize ?? DEFAULT_LIMITS.maxBatchSize,
		maxTopK: overrides?.maxTopK ?? DEFAULT_LIMITS.maxTopK,
		maxMetadataFields: overrides?.maxMetadataFields ?? DEFAULT_LIMITS.maxMetadataFields,
		maxIds: overrides?.maxIds ?? DEFAULT_LIMITS.maxIds,
	};
}

//==============================================================================
// Name Handles
//==============================================================================

export interface Collection {
	name: string;
}

export interface EmbeddingField {
	name: string;
	collection?: string | undefined;
}

export interface MetadataField {
	name: string;
	collection?: string | undefined;
}

/** Named placeholder. There is deliberately no value slot. */
export interface Param {
	kind: "param";
	name: string;
}

//==============================================================================
// Vector Values
//==============================================================================

export interface LiteralVector {
	kind: "literal";
	values: number[];
}

export type VectorValue = LiteralVector | Param;

export interface LiteralSparseVector {
	kind: "sparse";
	indices: number[];
	values: number[];
}

export type SparseVectorValue = LiteralSparseVector | Param;

/** Static top-K / limit, or a placeholder bound at execution time. */
export type PaginationValue = number | Param;

//==============================================================================
// Filter Tree
//==============================================================================

export interface FilterCondition {
	kind: "condition";
	field: MetadataField;
	operator: FilterOperator;
	value?: Param | undefined;
}

export interface FilterGroup {
	kind: "group";
	logic: LogicOperator;
	children: FilterItem[];
}

export interface RangeFilter {
	kind: "range";
	field: MetadataField;
	min?: Param | undefined;
	max?: Param | undefined;
	minExclusive: boolean;
	maxExclusive: boolean;
}

export interface GeoPoint {
	lat: Param;
	lon: Param;
}

export interface GeoFilter {
	kind: "geo";
	field: MetadataField;
	center: GeoPoint;
	radius: Param;
}

export type FilterItem = FilterCondition | FilterGroup | RangeFilter | GeoFilter;

//==============================================================================
// Records and Query Root
//==============================================================================

export interface MetadataEntry {
	field: MetadataField;
	value: Param;
}

export interface VectorRecord {
	id: Param;
	vector: VectorValue;
	metadata: MetadataEntry[];
	sparseVector?: SparseVectorValue | undefined;
}

export interface VectorQuery {
	operation: Operation;
	target: Collection;
	queryVector?: VectorValue | undefined;
	queryEmbedding?: EmbeddingField | undefined;
	topK?: PaginationValue | undefined;
	minScore?: Param | undefined;
	includeVectors: boolean;
	includeMetadata: boolean;
	filter?: FilterItem | undefined;
	metadataFields: MetadataField[];
	vectors: VectorRecord[];
	updates: MetadataEntry[];
	ids: Param[];
	deleteAll: boolean;
	namespace?: Param | undefined;
}

/** Rendered document plus the placeholder names to bind, in walk order. */
export interface QueryResult {
	document: string;
	requiredParams: string[];
}

//==============================================================================
// Constructors and Guards
//==============================================================================

/**
 * Create a query root with every collection field empty and both inclusion
 * flags off.
 */
export function emptyQuery(operation: Operation, target: Collection): VectorQuery {
	return {
		operation,
		target,
		includeVectors: false,
		includeMetadata: false,
		metadataFields: [],
		vectors: [],
		updates: [],
		ids: [],
		deleteAll: false,
	};
}

/** Field handles compare by (name, collection). */
export function sameField(
	a: MetadataField | EmbeddingField,
	b: MetadataField | EmbeddingField,
): boolean {
	return a.name === b.name && (a.collection ?? "") === (b.collection ?? "");
}
