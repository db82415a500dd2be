// SPDX-License-Identifier: MIT
// VQIR - Vector Query Intermediate Representation
// Main entry point

//==============================================================================
// Types
//==============================================================================

export type {
	Collection,
	DistanceMetric,
	EmbeddingField,
	FilterCondition,
	FilterGroup,
	FilterItem,
	FilterOperator,
	GeoFilter,
	GeoPoint,
	LiteralSparseVector,
	LiteralVector,
	LogicOperator,
	MetadataEntry,
	MetadataField,
	Operation,
	PaginationValue,
	Param,
	QueryResult,
	RangeFilter,
	SparseVectorValue,
	ValidationLimits,
	VectorQuery,
	VectorRecord,
	VectorValue,
} from "./types.js";

export {
	DEFAULT_LIMITS,
	DISTANCE_METRICS,
	DistanceMetrics,
	emptyQuery,
	FILTER_OPERATORS,
	FilterOperators,
	isValuelessOperator,
	LogicOperators,
	OPERATIONS,
	Operations,
	resolveLimits,
	sameField,
} from "./types.js";

//==============================================================================
// Errors and Validation
//==============================================================================

export type { ErrorCode, Result, ValidationError, ValidationResult } from "./errors.js";
export { ErrorCodes, invalidResult, isVQIRError, validResult, VQIRError } from "./errors.js";

export { assertValidQuery, filterDepth, parseQuery, validateQuery } from "./validator.js";
export { queryJsonSchema, VectorQuerySchema } from "./zod-schemas.js";

//==============================================================================
// Rendering
//==============================================================================

export {
	DIALECTS,
	Dialects,
	isDialect,
	OperatorPolicies,
	type Dialect,
	type OperatorPolicy,
	type Renderer,
	type RendererOptions,
} from "./renderer.js";

export {
	createMilvusRenderer,
	createPineconeRenderer,
	createQdrantRenderer,
	createRenderer,
	createWeaviateRenderer,
	formatClassName,
	MilvusRenderer,
	PineconeRenderer,
	QdrantRenderer,
	WeaviateRenderer,
	type AnyRendererOptions,
	type MilvusRendererOptions,
	type QdrantRendererOptions,
} from "./dialects/index.js";

export { canonicalize, canonicalDigest } from "./canonicalize.js";
export { packageResult, parseDocument, resultDigest } from "./result.js";

//==============================================================================
// Construction Surface
//==============================================================================

export * as q from "./expressions.js";
export { QueryBuilder, fetch, remove, search, update, upsert } from "./builder.js";
export { SchemaRegistry, SchemaDocumentSchema, type SchemaDocument } from "./schema.js";
export { assertIdentifier, isValidIdentifier } from "./identifiers.js";

//==============================================================================
// Configuration and Logging
//==============================================================================

export {
	loadRendererConfig,
	readRendererConfig,
	RendererConfigSchema,
	rendererFromConfig,
	type RendererConfig,
} from "./config.js";
export { createChildLogger, createLogger, getLogLevel, type Logger, type LogLevel } from "./logger.js";

//==============================================================================
// CLI
//==============================================================================

export { parseArgs, readJsonFile, type Options, type ParsedArgs } from "./cli-utils.js";
export { runCli, type CliIO } from "./cli.js";
