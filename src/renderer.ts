// SPDX-License-Identifier: MIT
// VQIR Dialect Renderer Protocol
// Shared contract for the dialect renderers plus the small pieces every
// dialect needs: the parameter accumulator and operator-table resolution.

import { ErrorCodes, VQIRError } from "./errors.js";
import { createChildLogger, createLogger, type Logger } from "./logger.js";
import { packageResult } from "./result.js";
import type {
	DistanceMetric,
	FilterCondition,
	FilterOperator,
	MetadataEntry,
	Operation,
	Param,
	QueryResult,
	SparseVectorValue,
	ValidationLimits,
	VectorQuery,
	VectorValue,
} from "./types.js";
import { assertValidQuery } from "./validator.js";

//==============================================================================
// Dialects and Options
//==============================================================================

export const Dialects = {
	Pinecone: "pinecone",
	Qdrant: "qdrant",
	Weaviate: "weaviate",
	Milvus: "milvus",
} as const;

export type Dialect = (typeof Dialects)[keyof typeof Dialects];

export const DIALECTS: Dialect[] = Object.values(Dialects);

export function isDialect(value: string): value is Dialect {
	return DIALECTS.some(d => d === value);
}

/**
 * What to do with a filter operator the dialect has no mapping for.
 * "fallback" substitutes the dialect's default comparison and logs a warning;
 * "reject" throws UnsupportedOperator.
 */
export const OperatorPolicies = {
	Fallback: "fallback",
	Reject: "reject",
} as const;

export type OperatorPolicy = (typeof OperatorPolicies)[keyof typeof OperatorPolicies];

export interface RendererOptions {
	limits?: Partial<ValidationLimits> | undefined;
	unsupportedOperators?: OperatorPolicy | undefined;
	logger?: Logger | undefined;
}

//==============================================================================
// Renderer Interface
//==============================================================================

/** In-memory wire document before serialization. */
export type WireObject = Record<string, unknown>;

export interface Renderer {
	readonly dialect: Dialect;

	/** Validate, then translate the query into the dialect's wire document. */
	render(query: VectorQuery): QueryResult;

	supportsOperation(op: Operation): boolean;
	supportsFilterOperator(op: FilterOperator): boolean;
	supportsMetric(metric: DistanceMetric): boolean;
}

//==============================================================================
// Render Context
//==============================================================================

/** Construction-time settings shared by every render call of one renderer. */
export interface RenderContext {
	readonly dialect: Dialect;
	readonly limits: Partial<ValidationLimits> | undefined;
	readonly policy: OperatorPolicy;
	readonly logger: Logger;
}

export function createRenderContext(
	dialect: Dialect,
	options: RendererOptions = {},
): RenderContext {
	return Object.freeze({
		dialect,
		limits: options.limits === undefined ? undefined : { ...options.limits },
		policy: options.unsupportedOperators ?? OperatorPolicies.Fallback,
		logger: options.logger === undefined
			? createLogger(dialect)
			: createChildLogger(options.logger, { dialect }),
	});
}

/**
 * Ordered accumulator of parameter occurrences. A name referenced twice is
 * recorded twice.
 */
export class ParamCollector {
	private readonly names: string[] = [];

	/** Record one occurrence and return its placeholder token. */
	placeholder(param: Param): string {
		this.names.push(param.name);
		return ":" + param.name;
	}

	get params(): readonly string[] {
		return this.names;
	}
}

//==============================================================================
// Operator Tables
//==============================================================================

export interface OperatorTable<T> {
	mapped: Partial<Record<FilterOperator, T>>;
	fallback: T;
	/** Native spelling of the fallback, for the warning. */
	fallbackName: string;
}

export function tableSupports<T>(table: OperatorTable<T>, op: FilterOperator): boolean {
	return table.mapped[op] !== undefined;
}

/**
 * Look up an operator, applying the context's policy when it is unmapped.
 */
export function resolveOperator<T>(
	ctx: RenderContext,
	table: OperatorTable<T>,
	op: FilterOperator,
	field: string,
): T {
	const mapped = table.mapped[op];
	if (mapped !== undefined) return mapped;
	if (ctx.policy === OperatorPolicies.Reject) {
		throw VQIRError.unsupportedOperator(ctx.dialect, op);
	}
	ctx.logger.warn(
		{ operator: op, field, fallback: table.fallbackName },
		`Operator ${op} is not supported by ${ctx.dialect}; using ${table.fallbackName}`,
	);
	return table.fallback;
}

//==============================================================================
// Value Helpers
//==============================================================================

/** Placeholder for a vector param, or a copy of the author's literal. */
export function vectorValue(vector: VectorValue, params: ParamCollector): string | number[] {
	return vector.kind === "param" ? params.placeholder(vector) : [...vector.values];
}

export function sparseVectorValue(sparse: SparseVectorValue, params: ParamCollector): string | WireObject {
	if (sparse.kind === "param") return params.placeholder(sparse);
	return { indices: [...sparse.indices], values: [...sparse.values] };
}

/** Field-name keyed object of placeholders, in entry order. */
export function metadataObject(entries: readonly MetadataEntry[], params: ParamCollector): WireObject {
	const out: WireObject = {};
	for (const entry of entries) {
		out[entry.field.name] = params.placeholder(entry.value);
	}
	return out;
}

//==============================================================================
// Filter Walk Helpers
//==============================================================================

/** Comparison value of a condition whose operator takes one. */
export function conditionValue(item: FilterCondition): Param {
	if (item.value === undefined) {
		throw new VQIRError(
			ErrorCodes.InvalidFilter,
			`Operator ${item.operator} on '${item.field.name}' requires a value`,
		);
	}
	return item.value;
}

/** Default branch of a filter walk: the node is outside the known variants. */
export function unknownFilterNode(dialect: Dialect, node: never): never {
	const value: unknown = node;
	const kind = typeof value === "object" && value !== null && "kind" in value ? value.kind : value;
	throw VQIRError.unsupportedFilter(dialect, String(kind));
}

//==============================================================================
// Render Driver
//==============================================================================

/**
 * Shared render skeleton: validate, build the document, package it.
 */
export function runRender(
	ctx: RenderContext,
	query: VectorQuery,
	build: (params: ParamCollector) => unknown,
): QueryResult {
	assertValidQuery(query, ctx.limits);
	const params = new ParamCollector();
	const document = build(params);
	const result = packageResult(document, params.params);
	ctx.logger.debug(
		{ operation: query.operation, collection: query.target.name, params: result.requiredParams.length },
		"Rendered query",
	);
	return result;
}
