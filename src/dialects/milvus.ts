// SPDX-License-Identifier: MIT
// VQIR Milvus Dialect
// Renders queries as Milvus RESTful v2 bodies. Filters become boolean
// expression strings with :name placeholders.

import { ErrorCodes, exhaustive, VQIRError } from "../errors.js";
import {
	conditionValue,
	createRenderContext,
	Dialects,
	type OperatorTable,
	type ParamCollector,
	type RenderContext,
	type Renderer,
	type RendererOptions,
	resolveOperator,
	runRender,
	sparseVectorValue,
	tableSupports,
	unknownFilterNode,
	vectorValue,
	type WireObject,
} from "../renderer.js";
import {
	DistanceMetrics,
	FilterOperators,
	isValuelessOperator,
	LogicOperators,
	Operations,
	type DistanceMetric,
	type FilterItem,
	type FilterOperator,
	type MetadataEntry,
	type Operation,
	type QueryResult,
	type VectorQuery,
} from "../types.js";

//==============================================================================
// Capability Tables
//==============================================================================

type Expr = (field: string, value: string) => string;

function infix(op: string): Expr {
	return (field, value) => `${field} ${op} ${value}`;
}

function call(fn: string): Expr {
	return (field, value) => `${fn}(${field}, ${value})`;
}

const OPERATORS: OperatorTable<Expr> = {
	mapped: {
		[FilterOperators.Eq]: infix("=="),
		[FilterOperators.Ne]: infix("!="),
		[FilterOperators.Gt]: infix(">"),
		[FilterOperators.Ge]: infix(">="),
		[FilterOperators.Lt]: infix("<"),
		[FilterOperators.Le]: infix("<="),
		[FilterOperators.In]: infix("in"),
		[FilterOperators.NotIn]: infix("not in"),
		[FilterOperators.Contains]: infix("like"),
		[FilterOperators.Exists]: field => `${field} IS NOT NULL`,
		[FilterOperators.NotExists]: field => `${field} IS NULL`,
		[FilterOperators.ArrayContains]: call("array_contains"),
		[FilterOperators.ArrayContainsAny]: call("array_contains_any"),
		[FilterOperators.ArrayContainsAll]: call("array_contains_all"),
	},
	fallback: infix("=="),
	fallbackName: "==",
};

const OPERATIONS: ReadonlySet<Operation> = new Set(Object.values(Operations));

const METRICS: ReadonlySet<DistanceMetric> = new Set([
	DistanceMetrics.Cosine,
	DistanceMetrics.Euclidean,
	DistanceMetrics.DotProduct,
]);

export interface MilvusRendererOptions extends RendererOptions {
	/** Vector field searched and written when the query names none. */
	defaultVectorField?: string | undefined;
	/** Row field that receives sparse vectors on upsert. */
	sparseVectorField?: string | undefined;
}

//==============================================================================
// Renderer
//==============================================================================

export class MilvusRenderer implements Renderer {
	readonly dialect = Dialects.Milvus;
	readonly defaultVectorField: string;
	readonly sparseVectorField: string;
	private readonly ctx: RenderContext;

	constructor(options: MilvusRendererOptions = {}) {
		this.ctx = createRenderContext(this.dialect, options);
		this.defaultVectorField = options.defaultVectorField ?? "embedding";
		this.sparseVectorField = options.sparseVectorField ?? "sparse_vector";
	}

	render(query: VectorQuery): QueryResult {
		return runRender(this.ctx, query, params => {
			switch (query.operation) {
			case Operations.Search: return this.renderSearch(query, params);
			case Operations.Upsert: return this.renderUpsert(query, params);
			case Operations.Delete: return this.renderDelete(query, params);
			case Operations.Fetch: return this.renderFetch(query, params);
			case Operations.Update: return this.renderUpdate(query, params);
			default: return exhaustive(query.operation);
			}
		});
	}

	supportsOperation(op: Operation): boolean {
		return OPERATIONS.has(op);
	}

	supportsFilterOperator(op: FilterOperator): boolean {
		return tableSupports(OPERATORS, op);
	}

	supportsMetric(metric: DistanceMetric): boolean {
		return METRICS.has(metric);
	}

	//============================================================================
	// Operations
	//============================================================================

	private renderSearch(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {
			collection_name: query.target.name,
			anns_field: query.queryEmbedding?.name || this.defaultVectorField,
		};
		if (query.queryVector !== undefined) {
			const data = vectorValue(query.queryVector, params);
			doc.data = typeof data === "string" ? data : [data];
		}
		if (query.topK !== undefined) {
			doc.limit = typeof query.topK === "number" ? query.topK : params.placeholder(query.topK);
		}
		if (query.includeMetadata && query.metadataFields.length > 0) {
			doc.output_fields = query.metadataFields.map(f => f.name);
		}
		if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
		}
		if (query.minScore !== undefined) {
			this.ctx.logger.warn(
				{ param: query.minScore.name },
				"Milvus search has no score threshold; minScore ignored",
			);
		}
		if (query.namespace !== undefined) {
			doc.partition_names = [params.placeholder(query.namespace)];
		}
		return doc;
	}

	private renderUpsert(query: VectorQuery, params: ParamCollector): WireObject {
		const data = query.vectors.map((record, i) => {
			const row: WireObject = {
				id: params.placeholder(record.id),
				[this.defaultVectorField]: vectorValue(record.vector, params),
			};
			this.writeEntries(row, record.metadata, params, `$.vectors.${i}.metadata`);
			if (record.sparseVector !== undefined) {
				row[this.sparseVectorField] = sparseVectorValue(record.sparseVector, params);
			}
			return row;
		});
		const doc: WireObject = { collection_name: query.target.name, data };
		this.renderPartition(query, doc, params);
		return doc;
	}

	private renderDelete(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = { collection_name: query.target.name };
		if (query.ids.length > 0) {
			doc.filter = idFilter(query, params);
		} else if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
		}
		this.renderPartition(query, doc, params);
		return doc;
	}

	private renderFetch(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {
			collection_name: query.target.name,
			filter: idFilter(query, params),
		};
		if (query.includeMetadata) {
			doc.output_fields = query.metadataFields.length > 0
				? query.metadataFields.map(f => f.name)
				: ["*"];
		}
		if (query.namespace !== undefined) {
			doc.partition_names = [params.placeholder(query.namespace)];
		}
		return doc;
	}

	/** Milvus has no partial update: each id becomes an upserted row. */
	private renderUpdate(query: VectorQuery, params: ParamCollector): WireObject {
		const data = query.ids.map(id => {
			const row: WireObject = { id: params.placeholder(id) };
			this.writeEntries(row, query.updates, params, "$.updates");
			return row;
		});
		const doc: WireObject = { collection_name: query.target.name, data };
		this.renderPartition(query, doc, params);
		return doc;
	}

	/**
	 * Metadata shares the row with the primary key and vector columns, so an
	 * entry may not reuse their names.
	 */
	private writeEntries(
		row: WireObject,
		entries: readonly MetadataEntry[],
		params: ParamCollector,
		path: string,
	): void {
		const reserved = ["id", this.defaultVectorField, this.sparseVectorField];
		for (const [i, entry] of entries.entries()) {
			const name = entry.field.name;
			if (reserved.includes(name)) {
				throw new VQIRError(
					ErrorCodes.InvalidValue,
					`Field '${name}' collides with a reserved Milvus column`,
					`${path}.${i}`,
				);
			}
			row[name] = params.placeholder(entry.value);
		}
	}

	private renderPartition(query: VectorQuery, doc: WireObject, params: ParamCollector): void {
		if (query.namespace !== undefined) {
			doc.partition_name = params.placeholder(query.namespace);
		}
	}

	//============================================================================
	// Filters
	//============================================================================

	private renderFilter(item: FilterItem, params: ParamCollector): string {
		switch (item.kind) {
		case "condition": {
			const expr = resolveOperator(this.ctx, OPERATORS, item.operator, item.field.name);
			const value = isValuelessOperator(item.operator)
				? ""
				: params.placeholder(conditionValue(item));
			return expr(item.field.name, value);
		}
		case "group": {
			const parts = item.children.map(child => this.renderFilter(child, params));
			switch (item.logic) {
			case LogicOperators.Not: return `not (${parts.join(" and ")})`;
			case LogicOperators.Or: return "(" + parts.join(" or ") + ")";
			case LogicOperators.And: return "(" + parts.join(" and ") + ")";
			default: return exhaustive(item.logic);
			}
		}
		case "range": {
			const parts: string[] = [];
			if (item.min !== undefined) {
				const op = item.minExclusive ? ">" : ">=";
				parts.push(`${item.field.name} ${op} ${params.placeholder(item.min)}`);
			}
			if (item.max !== undefined) {
				const op = item.maxExclusive ? "<" : "<=";
				parts.push(`${item.field.name} ${op} ${params.placeholder(item.max)}`);
			}
			return "(" + parts.join(" and ") + ")";
		}
		case "geo":
			throw VQIRError.unsupportedFilter(this.dialect, item.kind);
		default:
			return unknownFilterNode(this.dialect, item);
		}
	}
}

function idFilter(query: VectorQuery, params: ParamCollector): string {
	return `id in [${query.ids.map(id => params.placeholder(id)).join(", ")}]`;
}

export function createMilvusRenderer(options?: MilvusRendererOptions): MilvusRenderer {
	return new MilvusRenderer(options);
}
