// SPDX-License-Identifier: MIT
// VQIR Zod Schemas
// Structural schemas for the JSON form of a query. The TypeScript interfaces
// live in types.ts; recursive schemas are annotated with z.ZodType<Explicit>
// because z.discriminatedUnion does not support recursion.

import { z } from "zod/v4";
import {
	DistanceMetrics,
	FilterOperators,
	LogicOperators,
	Operations,
	type FilterGroup,
	type FilterItem,
	type VectorQuery,
} from "./types.js";

//==============================================================================
// Enumerations
//==============================================================================

export const OperationSchema = z.enum(Operations).meta({ id: "Operation", title: "Operation", description: "Kind of vector-database operation" });
export const FilterOperatorSchema = z.enum(FilterOperators).meta({ id: "FilterOperator", title: "Filter Operator", description: "Universal comparison operator" });
export const LogicOperatorSchema = z.enum(LogicOperators).meta({ id: "LogicOperator", title: "Logic Operator", description: "Boolean combinator of a filter group" });
export const DistanceMetricSchema = z.enum(DistanceMetrics).meta({ id: "DistanceMetric", title: "Distance Metric", description: "Similarity metric of an embedding" });

//==============================================================================
// Name Handles
//==============================================================================

export const CollectionSchema = z.object({
	name: z.string(),
}).meta({ id: "Collection", title: "Collection", description: "Target collection handle" });

export const FieldSchema = z.object({
	name: z.string().min(1),
	collection: z.string().optional(),
}).meta({ id: "Field", title: "Field", description: "Metadata or embedding field handle" });

export const ParamSchema = z.object({
	kind: z.literal("param"),
	name: z.string().min(1),
}).meta({ id: "Param", title: "Param", description: "Named placeholder bound at execution time" });

//==============================================================================
// Vector Values
//==============================================================================

const FiniteNumber = z.number().refine(Number.isFinite, { message: "Expected a finite number" });

export const LiteralVectorSchema = z.object({
	kind: z.literal("literal"),
	values: z.array(FiniteNumber).min(1),
}).meta({ id: "LiteralVector", title: "Literal Vector", description: "Dense vector embedded by the query author" });

export const VectorValueSchema = z.discriminatedUnion("kind", [
	LiteralVectorSchema,
	ParamSchema,
]).meta({ id: "VectorValue", title: "Vector Value", description: "Literal dense vector or placeholder" });

export const LiteralSparseVectorSchema = z.object({
	kind: z.literal("sparse"),
	indices: z.array(z.number().int().nonnegative()),
	values: z.array(FiniteNumber),
}).meta({ id: "LiteralSparseVector", title: "Literal Sparse Vector", description: "Index/value pairs for hybrid search" });

export const SparseVectorValueSchema = z.discriminatedUnion("kind", [
	LiteralSparseVectorSchema,
	ParamSchema,
]).meta({ id: "SparseVectorValue", title: "Sparse Vector Value", description: "Literal sparse vector or placeholder" });

export const PaginationValueSchema = z.union([
	z.number().int(),
	ParamSchema,
]).meta({ id: "PaginationValue", title: "Pagination Value", description: "Static top-K or placeholder" });

//==============================================================================
// Filter Tree
//==============================================================================

export const FilterConditionSchema = z.object({
	kind: z.literal("condition"),
	field: FieldSchema,
	operator: FilterOperatorSchema,
	value: ParamSchema.optional(),
}).meta({ id: "FilterCondition", title: "Filter Condition", description: "Leaf comparison" });

export const RangeFilterSchema = z.object({
	kind: z.literal("range"),
	field: FieldSchema,
	min: ParamSchema.optional(),
	max: ParamSchema.optional(),
	minExclusive: z.boolean().default(false),
	maxExclusive: z.boolean().default(false),
}).meta({ id: "RangeFilter", title: "Range Filter", description: "Lower and/or upper bound on a numeric field" });

export const GeoFilterSchema = z.object({
	kind: z.literal("geo"),
	field: FieldSchema,
	center: z.object({ lat: ParamSchema, lon: ParamSchema }),
	radius: ParamSchema,
}).meta({ id: "GeoFilter", title: "Geo Filter", description: "Within-radius-of-point test" });

export const FilterGroupSchema: z.ZodType<FilterGroup> = z.object({
	kind: z.literal("group"),
	logic: LogicOperatorSchema,
	get children() { return z.array(FilterItemSchema); },
}).meta({ id: "FilterGroup", title: "Filter Group", description: "AND / OR / NOT over child filters" });

/** Union of the four filter variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const FilterItemSchema: z.ZodType<FilterItem> = z.union([
	FilterConditionSchema,
	FilterGroupSchema,
	RangeFilterSchema,
	GeoFilterSchema,
]).meta({ id: "FilterItem", title: "Filter Item", description: "Node of the filter tree" });

//==============================================================================
// Records and Query Root
//==============================================================================

export const MetadataEntrySchema = z.object({
	field: FieldSchema,
	value: ParamSchema,
}).meta({ id: "MetadataEntry", title: "Metadata Entry", description: "Field-to-placeholder assignment" });

export const VectorRecordSchema = z.object({
	id: ParamSchema,
	vector: VectorValueSchema,
	metadata: z.array(MetadataEntrySchema).default([]),
	sparseVector: SparseVectorValueSchema.optional(),
}).meta({ id: "VectorRecord", title: "Vector Record", description: "Point written by an upsert" });

export const VectorQuerySchema: z.ZodType<VectorQuery> = z.object({
	operation: OperationSchema,
	target: CollectionSchema,
	queryVector: VectorValueSchema.optional(),
	queryEmbedding: FieldSchema.optional(),
	topK: PaginationValueSchema.optional(),
	minScore: ParamSchema.optional(),
	includeVectors: z.boolean().default(false),
	includeMetadata: z.boolean().default(false),
	filter: FilterItemSchema.optional(),
	metadataFields: z.array(FieldSchema).default([]),
	vectors: z.array(VectorRecordSchema).default([]),
	updates: z.array(MetadataEntrySchema).default([]),
	ids: z.array(ParamSchema).default([]),
	deleteAll: z.boolean().default(false),
	namespace: ParamSchema.optional(),
}).meta({ id: "VectorQuery", title: "Vector Query", description: "Root of the query IR" });

/**
 * JSON Schema (draft 2020-12) for the query document format.
 */
export function queryJsonSchema(): z.core.JSONSchema.BaseSchema {
	return z.toJSONSchema(VectorQuerySchema, { target: "draft-2020-12" });
}
