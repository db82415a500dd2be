// SPDX-License-Identifier: MIT
// VQIR Qdrant Dialect
// Renders queries as Qdrant REST bodies. Filters use Qdrant's clause
// containers (must / should / must_not) instead of explicit boolean nodes.

import { exhaustive } from "../errors.js";
import {
	conditionValue,
	createRenderContext,
	Dialects,
	metadataObject,
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
// Clause Containers
//==============================================================================

const Containers = {
	Must: "must",
	Should: "should",
	MustNot: "must_not",
} as const;

type Container = (typeof Containers)[keyof typeof Containers];

interface Clause {
	container: Container;
	condition: (key: string, value: string | undefined) => WireObject;
}

function matchClause(container: Container, matcher: string): Clause {
	return { container, condition: (key, value) => ({ key, match: { [matcher]: value } }) };
}

function rangeClause(bound: string): Clause {
	return { container: Containers.Must, condition: (key, value) => ({ key, range: { [bound]: value } }) };
}

function isEmptyClause(container: Container): Clause {
	return { container, condition: key => ({ is_empty: { key } }) };
}

const OPERATORS: OperatorTable<Clause> = {
	mapped: {
		[FilterOperators.Eq]: matchClause(Containers.Must, "value"),
		[FilterOperators.Ne]: matchClause(Containers.MustNot, "value"),
		[FilterOperators.Gt]: rangeClause("gt"),
		[FilterOperators.Ge]: rangeClause("gte"),
		[FilterOperators.Lt]: rangeClause("lt"),
		[FilterOperators.Le]: rangeClause("lte"),
		[FilterOperators.In]: matchClause(Containers.Must, "any"),
		[FilterOperators.NotIn]: matchClause(Containers.Must, "except"),
		[FilterOperators.Contains]: matchClause(Containers.Must, "text"),
		[FilterOperators.Exists]: isEmptyClause(Containers.MustNot),
		[FilterOperators.NotExists]: isEmptyClause(Containers.Must),
		[FilterOperators.ArrayContains]: matchClause(Containers.Must, "value"),
		[FilterOperators.ArrayContainsAny]: matchClause(Containers.Must, "any"),
	},
	fallback: matchClause(Containers.Must, "value"),
	fallbackName: "must/match.value",
};

const LOGIC: Record<LogicOperator, Container> = {
	[LogicOperators.And]: Containers.Must,
	[LogicOperators.Or]: Containers.Should,
	[LogicOperators.Not]: Containers.MustNot,
};

const OPERATIONS: ReadonlySet<Operation> = new Set(Object.values(Operations));

const METRICS: ReadonlySet<DistanceMetric> = new Set(Object.values(DistanceMetrics));

/** Dense vector name used when a point also carries a sparse vector. */
const DEFAULT_DENSE_NAME = "dense";

export interface QdrantRendererOptions extends RendererOptions {
	/** Named vector to search when the query has no embedding field. */
	defaultVectorName?: string | undefined;
}

//==============================================================================
// Renderer
//==============================================================================

export class QdrantRenderer implements Renderer {
	readonly dialect = Dialects.Qdrant;
	readonly defaultVectorName: string;
	private readonly ctx: RenderContext;

	constructor(options: QdrantRendererOptions = {}) {
		this.ctx = createRenderContext(this.dialect, options);
		this.defaultVectorName = options.defaultVectorName ?? "";
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
		const vectorQuery: WireObject = {};
		if (query.queryVector !== undefined) {
			vectorQuery.vector = vectorValue(query.queryVector, params);
		}
		const name = query.queryEmbedding?.name || this.defaultVectorName;
		if (name !== "") {
			vectorQuery.name = name;
		}

		const doc: WireObject = { query: vectorQuery };
		if (query.topK !== undefined) {
			doc.limit = typeof query.topK === "number" ? query.topK : params.placeholder(query.topK);
		}
		if (query.minScore !== undefined) {
			doc.score_threshold = params.placeholder(query.minScore);
		}
		doc.with_payload = query.includeMetadata;
		doc.with_vector = query.includeVectors;
		if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
		}
		this.renderShardKey(query, doc, params);
		return doc;
	}

	private renderUpsert(query: VectorQuery, params: ParamCollector): WireObject {
		const points = query.vectors.map(record => {
			const id = params.placeholder(record.id);
			const dense = vectorValue(record.vector, params);
			const payload = record.metadata.length > 0 ? metadataObject(record.metadata, params) : undefined;

			const point: WireObject = { id, vector: dense };
			if (record.sparseVector !== undefined) {
				point.vector = {
					[this.defaultVectorName || DEFAULT_DENSE_NAME]: dense,
					sparse: sparseVectorValue(record.sparseVector, params),
				};
			}
			if (payload !== undefined) {
				point.payload = payload;
			}
			return point;
		});
		const doc: WireObject = { points };
		this.renderShardKey(query, doc, params);
		return doc;
	}

	private renderDelete(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {};
		if (query.ids.length > 0) {
			doc.points = query.ids.map(id => params.placeholder(id));
		} else if (query.filter !== undefined) {
			doc.filter = this.renderFilter(query.filter, params);
		}
		this.renderShardKey(query, doc, params);
		return doc;
	}

	private renderFetch(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {
			ids: query.ids.map(id => params.placeholder(id)),
			with_payload: query.includeMetadata,
			with_vector: query.includeVectors,
		};
		this.renderShardKey(query, doc, params);
		return doc;
	}

	private renderUpdate(query: VectorQuery, params: ParamCollector): WireObject {
		const points = query.ids.map(id => params.placeholder(id));
		const doc: WireObject = {
			points,
			payload: metadataObject(query.updates, params),
		};
		this.renderShardKey(query, doc, params);
		return doc;
	}

	/** Qdrant scopes a request to a shard key where other backends use namespaces. */
	private renderShardKey(query: VectorQuery, doc: WireObject, params: ParamCollector): void {
		if (query.namespace !== undefined) {
			doc.shard_key = params.placeholder(query.namespace);
		}
	}

	//============================================================================
	// Filters
	//============================================================================

	private renderFilter(item: FilterItem, params: ParamCollector): WireObject {
		switch (item.kind) {
		case "condition": {
			const clause = resolveOperator(this.ctx, OPERATORS, item.operator, item.field.name);
			const value = isValuelessOperator(item.operator)
				? undefined
				: params.placeholder(conditionValue(item));
			return { [clause.container]: [clause.condition(item.field.name, value)] };
		}
		case "group":
			return {
				[LOGIC[item.logic]]: item.children.map(child => this.renderFilter(child, params)),
			};
		case "range": {
			const bounds: WireObject = {};
			if (item.min !== undefined) {
				bounds[item.minExclusive ? "gt" : "gte"] = params.placeholder(item.min);
			}
			if (item.max !== undefined) {
				bounds[item.maxExclusive ? "lt" : "lte"] = params.placeholder(item.max);
			}
			return { [Containers.Must]: [{ key: item.field.name, range: bounds }] };
		}
		case "geo": {
			const lat = params.placeholder(item.center.lat);
			const lon = params.placeholder(item.center.lon);
			const radius = params.placeholder(item.radius);
			return {
				[Containers.Must]: [{
					key: item.field.name,
					geo_radius: { center: { lat, lon }, radius },
				}],
			};
		}
		default:
			return unknownFilterNode(this.dialect, item);
		}
	}
}

export function createQdrantRenderer(options?: QdrantRendererOptions): QdrantRenderer {
	return new QdrantRenderer(options);
}
