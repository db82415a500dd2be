// SPDX-License-Identifier: MIT
// VQIR Pinecone Dialect
// Renders queries as Pinecone REST bodies with Mongo-style metadata filters.

import { ErrorCodes, exhaustive, VQIRError } from "../errors.js";
import {
	conditionValue,
	createRenderContext,
	metadataObject,
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
	type LogicOperator,
	type Operation,
	type QueryResult,
	type VectorQuery,
} from "../types.js";

//==============================================================================
// Capability Tables
//==============================================================================

const OPERATORS: OperatorTable<string> = {
	mapped: {
		[FilterOperators.Eq]: "$eq",
		[FilterOperators.Ne]: "$ne",
		[FilterOperators.Gt]: "$gt",
		[FilterOperators.Ge]: "$gte",
		[FilterOperators.Lt]: "$lt",
		[FilterOperators.Le]: "$lte",
		[FilterOperators.In]: "$in",
		[FilterOperators.NotIn]: "$nin",
		[FilterOperators.Exists]: "$exists",
		[FilterOperators.NotExists]: "$exists",
	},
	fallback: "$eq",
	fallbackName: "$eq",
};

const LOGIC: Record<LogicOperator, string> = {
	[LogicOperators.And]: "$and",
	[LogicOperators.Or]: "$or",
	[LogicOperators.Not]: "$not",
};

const OPERATIONS: ReadonlySet<Operation> = new Set(Object.values(Operations));

const METRICS: ReadonlySet<DistanceMetric> = new Set([
	DistanceMetrics.Cosine,
	DistanceMetrics.Euclidean,
	DistanceMetrics.DotProduct,
]);

//==============================================================================
// Renderer
//==============================================================================

export class PineconeRenderer implements Renderer {
	readonly dialect = Dialects.Pinecone;
	private readonly ctx: RenderContext;

	constructor(options: RendererOptions = {}) {
		this.ctx = createRenderContext(this.dialect, options);
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
		const doc: WireObject = {};
		if (query.topK !== undefined) {
			doc.topK = typeof query.topK === "number" ? query.topK : params.placeholder(query.topK);
		}
		doc.includeValues = query.includeVectors;
		doc.includeMetadata = query.includeMetadata;
		if (query.queryVector !== undefined) {
			doc.vector = vectorValue(query.queryVector, params);
		}
		if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
		}
		if (query.minScore !== undefined) {
			this.ctx.logger.warn(
				{ param: query.minScore.name },
				"Pinecone query has no score threshold; minScore ignored",
			);
		}
		this.renderNamespace(query, doc, params);
		return doc;
	}

	private renderUpsert(query: VectorQuery, params: ParamCollector): WireObject {
		const vectors = query.vectors.map(record => {
			const vec: WireObject = {
				id: params.placeholder(record.id),
				values: vectorValue(record.vector, params),
			};
			if (record.metadata.length > 0) {
				vec.metadata = metadataObject(record.metadata, params);
			}
			if (record.sparseVector !== undefined) {
				vec.sparseValues = sparseVectorValue(record.sparseVector, params);
			}
			return vec;
		});
		const doc: WireObject = { vectors };
		this.renderNamespace(query, doc, params);
		return doc;
	}

	private renderDelete(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {};
		if (query.ids.length > 0) {
			doc.ids = query.ids.map(id => params.placeholder(id));
		} else if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
			doc.deleteAll = false;
		}
		this.renderNamespace(query, doc, params);
		return doc;
	}

	private renderFetch(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = { ids: query.ids.map(id => params.placeholder(id)) };
		this.renderNamespace(query, doc, params);
		return doc;
	}

	/** Pinecone updates one vector per request: only the first id is used. */
	private renderUpdate(query: VectorQuery, params: ParamCollector): WireObject {
		const [first] = query.ids;
		if (first === undefined) {
			throw new VQIRError(ErrorCodes.MissingRequiredField, "UPDATE requires at least one id", "$.ids");
		}
		if (query.ids.length > 1) {
			this.ctx.logger.warn(
				{ ids: query.ids.length },
				`Pinecone updates one vector per request; ${query.ids.length - 1} extra id(s) dropped`,
			);
		}
		const doc: WireObject = {
			id: params.placeholder(first),
			setMetadata: metadataObject(query.updates, params),
		};
		this.renderNamespace(query, doc, params);
		return doc;
	}

	private renderNamespace(query: VectorQuery, doc: WireObject, params: ParamCollector): void {
		if (query.namespace !== undefined) {
			doc.namespace = params.placeholder(query.namespace);
		}
	}

	//============================================================================
	// Filters
	//============================================================================

	private renderFilter(item: FilterItem, params: ParamCollector): WireObject {
		switch (item.kind) {
		case "condition": {
			const op = resolveOperator(this.ctx, OPERATORS, item.operator, item.field.name);
			if (isValuelessOperator(item.operator)) {
				return { [item.field.name]: { [op]: item.operator === FilterOperators.Exists } };
			}
			return { [item.field.name]: { [op]: params.placeholder(conditionValue(item)) } };
		}
		case "group":
			return {
				[LOGIC[item.logic]]: item.children.map(child => this.renderFilter(child, params)),
			};
		case "range": {
			const bounds: WireObject = {};
			if (item.min !== undefined) {
				bounds[item.minExclusive ? "$gt" : "$gte"] = params.placeholder(item.min);
			}
			if (item.max !== undefined) {
				bounds[item.maxExclusive ? "$lt" : "$lte"] = params.placeholder(item.max);
			}
			return { [item.field.name]: bounds };
		}
		case "geo":
			throw VQIRError.unsupportedFilter(this.dialect, item.kind);
		default:
			return unknownFilterNode(this.dialect, item);
		}
	}
}

export function createPineconeRenderer(options?: RendererOptions): PineconeRenderer {
	return new PineconeRenderer(options);
}
