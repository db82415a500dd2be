// SPDX-License-Identifier: MIT
// VQIR Query Builder
// Fluent construction of a VectorQuery. The first misuse is recorded and every
// later call becomes a no-op; build() reports it.

import { VQIRError, type Result } from "./errors.js";
import type { Renderer } from "./renderer.js";
import {
	emptyQuery,
	LogicOperators,
	Operations,
	resolveLimits,
	sameField,
	type Collection,
	type EmbeddingField,
	type FilterItem,
	type MetadataField,
	type Operation,
	type Param,
	type QueryResult,
	type ValidationLimits,
	type VectorQuery,
	type VectorRecord,
	type VectorValue,
} from "./types.js";
import { validateQuery } from "./validator.js";

export class QueryBuilder {
	private readonly query: VectorQuery;
	private readonly limits: ValidationLimits;
	private error: VQIRError | undefined;

	constructor(operation: Operation, target: Collection, limits?: Partial<ValidationLimits>) {
		this.query = emptyQuery(operation, target);
		this.limits = resolveLimits(limits);
	}

	/** The recorded misuse, if any. */
	get err(): VQIRError | undefined {
		return this.error;
	}

	private fail(message: string): this {
		this.error = VQIRError.builder(message);
		return this;
	}

	/** True when the call may proceed: no earlier error and an allowed operation. */
	private allowed(method: string, ...operations: Operation[]): boolean {
		if (this.error) return false;
		if (operations.length > 0 && !operations.includes(this.query.operation)) {
			this.fail(`${method}() can only be used with ${operations.join(", ")}`);
			return false;
		}
		return true;
	}

	//============================================================================
	// Search
	//============================================================================

	vector(value: VectorValue): this {
		if (this.allowed("vector", Operations.Search)) this.query.queryVector = value;
		return this;
	}

	embedding(field: EmbeddingField): this {
		if (this.allowed("embedding", Operations.Search)) this.query.queryEmbedding = field;
		return this;
	}

	topK(k: number): this {
		if (!this.allowed("topK", Operations.Search)) return this;
		if (!Number.isInteger(k)) return this.fail(`topK must be an integer: ${k}`);
		if (k > this.limits.maxTopK) return this.fail(`topK exceeds maximum: ${k} > ${this.limits.maxTopK}`);
		if (k <= 0) return this.fail(`topK must be positive: ${k}`);
		this.query.topK = k;
		return this;
	}

	topKParam(p: Param): this {
		if (this.allowed("topKParam", Operations.Search)) this.query.topK = p;
		return this;
	}

	minScore(p: Param): this {
		if (this.allowed("minScore", Operations.Search)) this.query.minScore = p;
		return this;
	}

	selectMetadata(...fields: MetadataField[]): this {
		if (!this.allowed("selectMetadata")) return this;
		if (fields.length > this.limits.maxMetadataFields) {
			return this.fail(
				`Metadata field selection exceeds maximum: ${fields.length} > ${this.limits.maxMetadataFields}`,
			);
		}
		this.query.metadataFields = [...fields];
		return this;
	}

	//============================================================================
	// Shared Options
	//============================================================================

	includeVectors(include = true): this {
		if (this.allowed("includeVectors")) this.query.includeVectors = include;
		return this;
	}

	includeMetadata(include = true): this {
		if (this.allowed("includeMetadata")) this.query.includeMetadata = include;
		return this;
	}

	/** Set the filter, or AND it onto the existing one. */
	filter(item: FilterItem): this {
		if (!this.allowed("filter")) return this;
		const current = this.query.filter;
		this.query.filter = current === undefined
			? item
			: { kind: "group", logic: LogicOperators.And, children: [current, item] };
		return this;
	}

	where(item: FilterItem): this {
		return this.filter(item);
	}

	namespace(ns: Param): this {
		if (this.allowed("namespace")) this.query.namespace = ns;
		return this;
	}

	//============================================================================
	// Writes
	//============================================================================

	addVector(rec: VectorRecord): this {
		if (!this.allowed("addVector", Operations.Upsert)) return this;
		if (this.query.vectors.length >= this.limits.maxBatchSize) {
			return this.fail(`Batch size exceeds maximum: ${this.query.vectors.length + 1} > ${this.limits.maxBatchSize}`);
		}
		this.query.vectors.push(rec);
		return this;
	}

	vectors(records: VectorRecord[]): this {
		if (!this.allowed("vectors", Operations.Upsert)) return this;
		if (records.length > this.limits.maxBatchSize) {
			return this.fail(`Batch size exceeds maximum: ${records.length} > ${this.limits.maxBatchSize}`);
		}
		this.query.vectors = [...records];
		return this;
	}

	/** Assign a field; setting the same field again replaces its value. */
	set(field: MetadataField, value: Param): this {
		if (!this.allowed("set", Operations.Update)) return this;
		const existing = this.query.updates.findIndex(entry => sameField(entry.field, field));
		if (existing >= 0) {
			this.query.updates[existing] = { field, value };
		} else {
			this.query.updates.push({ field, value });
		}
		return this;
	}

	ids(...ids: Param[]): this {
		if (!this.allowed("ids", Operations.Delete, Operations.Fetch, Operations.Update)) return this;
		if (ids.length > this.limits.maxIds) {
			return this.fail(`Too many ids: ${ids.length} > ${this.limits.maxIds}`);
		}
		this.query.ids = [...ids];
		return this;
	}

	deleteAll(): this {
		if (this.allowed("deleteAll", Operations.Delete)) this.query.deleteAll = true;
		return this;
	}

	//============================================================================
	// Terminals
	//============================================================================

	/**
	 * Validated copy of the query, or the first builder/validation error.
	 */
	tryBuild(): Result<VectorQuery> {
		if (this.error) return { success: false, error: this.error };
		const snapshot: VectorQuery = {
			...this.query,
			metadataFields: [...this.query.metadataFields],
			vectors: [...this.query.vectors],
			updates: [...this.query.updates],
			ids: [...this.query.ids],
		};
		const result = validateQuery(snapshot, this.limits);
		const [first] = result.errors;
		if (first) return { success: false, error: VQIRError.fromValidation(first) };
		return { success: true, value: snapshot };
	}

	build(): VectorQuery {
		const result = this.tryBuild();
		if (!result.success) throw result.error;
		return result.value;
	}

	render(renderer: Renderer): QueryResult {
		return renderer.render(this.build());
	}
}

//==============================================================================
// Entry Points
//==============================================================================

/** Similarity search; metadata is included by default. */
export function search(target: Collection, limits?: Partial<ValidationLimits>): QueryBuilder {
	return new QueryBuilder(Operations.Search, target, limits).includeMetadata(true);
}

export function upsert(target: Collection, limits?: Partial<ValidationLimits>): QueryBuilder {
	return new QueryBuilder(Operations.Upsert, target, limits);
}

/** Delete by ids, or by filter together with deleteAll(). */
export function remove(target: Collection, limits?: Partial<ValidationLimits>): QueryBuilder {
	return new QueryBuilder(Operations.Delete, target, limits);
}

/** Fetch by ids; vectors and metadata are included by default. */
export function fetch(target: Collection, limits?: Partial<ValidationLimits>): QueryBuilder {
	return new QueryBuilder(Operations.Fetch, target, limits)
		.includeMetadata(true)
		.includeVectors(true);
}

export function update(target: Collection, limits?: Partial<ValidationLimits>): QueryBuilder {
	return new QueryBuilder(Operations.Update, target, limits);
}
