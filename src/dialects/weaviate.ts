// SPDX-License-Identifier: MIT
// VQIR Weaviate Dialect
// Renders queries as Weaviate request bodies: nearVector search, where-filter
// operand trees, class-scoped objects.

import { ErrorCodes, exhaustive, VQIRError } from "../errors.js";
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
	tableSupports,
	unknownFilterNode,
	vectorValue,
	type WireObject,
} from "../renderer.js";
import {
	DistanceMetrics,
	FilterOperators,
	LogicOperators,
	Operations,
	type DistanceMetric,
	type FilterItem,
	type FilterOperator,
	type LogicOperator,
	type MetadataField,
	type Operation,
	type QueryResult,
	type VectorQuery,
} from "../types.js";

//==============================================================================
// Capability Tables
//==============================================================================

/** Native operator plus the value slot it reads. IsNull carries a fixed boolean. */
type Leaf =
	| { operator: string; valueKey: "valueString" | "valueTextArray" }
	| { operator: "IsNull"; isNull: boolean };

function leaf(operator: string, valueKey: "valueString" | "valueTextArray" = "valueString"): Leaf {
	return { operator, valueKey };
}

const OPERATORS: OperatorTable<Leaf> = {
	mapped: {
		[FilterOperators.Eq]: leaf("Equal"),
		[FilterOperators.Ne]: leaf("NotEqual"),
		[FilterOperators.Gt]: leaf("GreaterThan"),
		[FilterOperators.Ge]: leaf("GreaterThanEqual"),
		[FilterOperators.Lt]: leaf("LessThan"),
		[FilterOperators.Le]: leaf("LessThanEqual"),
		[FilterOperators.Contains]: leaf("ContainsAny", "valueTextArray"),
		[FilterOperators.Exists]: { operator: "IsNull", isNull: false },
		[FilterOperators.NotExists]: { operator: "IsNull", isNull: true },
		[FilterOperators.ArrayContains]: leaf("ContainsAny", "valueTextArray"),
		[FilterOperators.ArrayContainsAny]: leaf("ContainsAny", "valueTextArray"),
		[FilterOperators.ArrayContainsAll]: leaf("ContainsAll", "valueTextArray"),
	},
	fallback: leaf("Equal"),
	fallbackName: "Equal",
};

const LOGIC: Record<LogicOperator, string> = {
	[LogicOperators.And]: "And",
	[LogicOperators.Or]: "Or",
	[LogicOperators.Not]: "Not",
};

const OPERATIONS: ReadonlySet<Operation> = new Set(Object.values(Operations));

const METRICS: ReadonlySet<DistanceMetric> = new Set(Object.values(DistanceMetrics));

/**
 * Weaviate class names start with an upper-case letter.
 */
export function formatClassName(name: string): string {
	if (name.length === 0) return name;
	return name.charAt(0).toUpperCase() + name.slice(1);
}

function fieldNames(fields: readonly MetadataField[]): string[] {
	return fields.map(f => f.name);
}

//==============================================================================
// Renderer
//==============================================================================

export class WeaviateRenderer implements Renderer {
	readonly dialect = Dialects.Weaviate;
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
		const nearVector: WireObject = {};
		if (query.queryVector !== undefined) {
			nearVector.vector = vectorValue(query.queryVector, params);
		}
		if (query.minScore !== undefined) {
			nearVector.certainty = params.placeholder(query.minScore);
		}
		if (query.queryEmbedding !== undefined && query.queryEmbedding.name !== "") {
			nearVector.targetVectors = [query.queryEmbedding.name];
		}

		const doc: WireObject = {
			class: formatClassName(query.target.name),
			nearVector,
		};
		if (query.topK !== undefined) {
			doc.limit = typeof query.topK === "number" ? query.topK : params.placeholder(query.topK);
		}
		if (query.includeMetadata && query.metadataFields.length > 0) {
			doc.properties = fieldNames(query.metadataFields);
		}
		if (query.filter !== undefined) {
			doc.where = this.renderFilter(query.filter, params);
		}
		this.renderTenant(query, doc, params);
		doc.additional = query.includeVectors
			? ["vector", "distance", "certainty"]
			: ["distance", "certainty"];
		return doc;
	}

	private renderUpsert(query: VectorQuery, params: ParamCollector): WireObject {
		const className = formatClassName(query.target.name);
		const objects = query.vectors.map((record, i) => {
			const obj: WireObject = {
				class: className,
				id: params.placeholder(record.id),
				vector: vectorValue(record.vector, params),
			};
			if (record.metadata.length > 0) {
				obj.properties = metadataObject(record.metadata, params);
			}
			if (record.sparseVector !== undefined) {
				this.ctx.logger.warn(
					{ record: i },
					"Weaviate objects carry no sparse vector; sparse values dropped",
				);
			}
			return obj;
		});
		const doc: WireObject = { objects };
		this.renderTenant(query, doc, params);
		return doc;
	}

	private renderDelete(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = { class: formatClassName(query.target.name) };
		if (query.ids.length > 0) {
			doc.ids = query.ids.map(id => params.placeholder(id));
		} else if (query.filter !== undefined) {
			doc.where = this.renderFilter(query.filter, params);
		}
		this.renderTenant(query, doc, params);
		return doc;
	}

	private renderFetch(query: VectorQuery, params: ParamCollector): WireObject {
		const doc: WireObject = {
			class: formatClassName(query.target.name),
			ids: query.ids.map(id => params.placeholder(id)),
		};
		if (query.includeMetadata && query.metadataFields.length > 0) {
			doc.properties = fieldNames(query.metadataFields);
		}
		if (query.includeVectors) {
			doc.additional = ["vector"];
		}
		this.renderTenant(query, doc, params);
		return doc;
	}

	/** Objects are patched one at a time: only the first id is used. */
	private renderUpdate(query: VectorQuery, params: ParamCollector): WireObject {
		const [first] = query.ids;
		if (first === undefined) {
			throw new VQIRError(ErrorCodes.MissingRequiredField, "UPDATE requires at least one id", "$.ids");
		}
		if (query.ids.length > 1) {
			this.ctx.logger.warn(
				{ ids: query.ids.length },
				`Weaviate updates one object per request; ${query.ids.length - 1} extra id(s) dropped`,
			);
		}
		const doc: WireObject = {
			class: formatClassName(query.target.name),
			id: params.placeholder(first),
			properties: metadataObject(query.updates, params),
		};
		this.renderTenant(query, doc, params);
		return doc;
	}

	private renderTenant(query: VectorQuery, doc: WireObject, params: ParamCollector): void {
		if (query.namespace !== undefined) {
			doc.tenant = params.placeholder(query.namespace);
		}
	}

	//============================================================================
	// Filters
	//============================================================================

	private renderFilter(item: FilterItem, params: ParamCollector): WireObject {
		switch (item.kind) {
		case "condition": {
			const native = resolveOperator(this.ctx, OPERATORS, item.operator, item.field.name);
			const path = [item.field.name];
			if ("isNull" in native) {
				return { path, operator: native.operator, valueBoolean: native.isNull };
			}
			return {
				path,
				operator: native.operator,
				[native.valueKey]: params.placeholder(conditionValue(item)),
			};
		}
		case "group":
			return {
				operator: LOGIC[item.logic],
				operands: item.children.map(child => this.renderFilter(child, params)),
			};
		case "range": {
			const operands: WireObject[] = [];
			if (item.min !== undefined) {
				operands.push({
					path: [item.field.name],
					operator: item.minExclusive ? "GreaterThan" : "GreaterThanEqual",
					valueNumber: params.placeholder(item.min),
				});
			}
			if (item.max !== undefined) {
				operands.push({
					path: [item.field.name],
					operator: item.maxExclusive ? "LessThan" : "LessThanEqual",
					valueNumber: params.placeholder(item.max),
				});
			}
			const [only] = operands;
			if (operands.length === 1 && only !== undefined) return only;
			return { operator: "And", operands };
		}
		case "geo": {
			const latitude = params.placeholder(item.center.lat);
			const longitude = params.placeholder(item.center.lon);
			const max = params.placeholder(item.radius);
			return {
				path: [item.field.name],
				operator: "WithinGeoRange",
				valueGeoRange: {
					geoCoordinates: { latitude, longitude },
					distance: { max },
				},
			};
		}
		default:
			return unknownFilterNode(this.dialect, item);
		}
	}
}

export function createWeaviateRenderer(options?: RendererOptions): WeaviateRenderer {
	return new WeaviateRenderer(options);
}
