// SPDX-License-Identifier: MIT
// VQIR Collection Schema Registry
// Hands out collection, embedding and metadata handles only for names the
// schema declares.

import { z } from "zod/v4";
import { ErrorCodes, VQIRError, type Result } from "./errors.js";
import { assertIdentifier, isValidIdentifier } from "./identifiers.js";
import type { Collection, DistanceMetric, EmbeddingField, MetadataField, Param } from "./types.js";
import { DistanceMetricSchema } from "./zod-schemas.js";

//==============================================================================
// Schema Document
//==============================================================================

const Identifier = z.string().refine(isValidIdentifier, { message: "Expected a bare identifier" });

export const MetadataTypeSchema = z.enum(["string", "number", "boolean", "string_array", "geo"]);

export const EmbeddingDefSchema = z.object({
	name: Identifier,
	dimensions: z.number().int().positive(),
	metric: DistanceMetricSchema,
}).meta({ id: "EmbeddingDef", title: "Embedding Definition", description: "Vector field of a collection" });

export const MetadataDefSchema = z.object({
	name: Identifier,
	type: MetadataTypeSchema.optional(),
}).meta({ id: "MetadataDef", title: "Metadata Definition", description: "Filterable payload field" });

export const CollectionDefSchema = z.object({
	name: Identifier,
	embeddings: z.array(EmbeddingDefSchema).default([]),
	metadata: z.array(MetadataDefSchema).default([]),
}).meta({ id: "CollectionDef", title: "Collection Definition", description: "Collection with its fields" });

export const SchemaDocumentSchema = z.object({
	collections: z.array(CollectionDefSchema),
}).meta({ id: "SchemaDocument", title: "Schema Document", description: "Collections a registry accepts" });

export type EmbeddingDef = z.infer<typeof EmbeddingDefSchema>;
export type MetadataDef = z.infer<typeof MetadataDefSchema>;
export type CollectionDef = z.infer<typeof CollectionDefSchema>;
export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;

//==============================================================================
// Registry
//==============================================================================

interface CollectionEntry {
	embeddings: Map<string, EmbeddingDef>;
	metadata: Map<string, MetadataDef>;
}

function unwrap<T>(result: Result<T>): T {
	if (!result.success) throw result.error;
	return result.value;
}

function duplicate(kind: string, name: string): VQIRError {
	return new VQIRError(ErrorCodes.SchemaError, `Duplicate ${kind} '${name}' in schema`);
}

export class SchemaRegistry {
	private readonly collectionsByName = new Map<string, CollectionEntry>();

	constructor(document: SchemaDocument) {
		for (const def of document.collections) {
			if (this.collectionsByName.has(def.name)) throw duplicate("collection", def.name);
			const entry: CollectionEntry = { embeddings: new Map(), metadata: new Map() };
			for (const emb of def.embeddings) {
				if (entry.embeddings.has(emb.name)) throw duplicate("embedding", `${def.name}.${emb.name}`);
				entry.embeddings.set(emb.name, emb);
			}
			for (const meta of def.metadata) {
				if (entry.metadata.has(meta.name)) throw duplicate("metadata field", `${def.name}.${meta.name}`);
				entry.metadata.set(meta.name, meta);
			}
			this.collectionsByName.set(def.name, entry);
		}
	}

	/**
	 * Parse an untyped schema document. Throws a SchemaError describing the
	 * first structural problem.
	 */
	static fromDocument(doc: unknown): SchemaRegistry {
		const parsed = SchemaDocumentSchema.safeParse(doc);
		if (!parsed.success) {
			const [issue] = parsed.error.issues;
			const where = issue && issue.path.length > 0 ? "$." + issue.path.map(String).join(".") : "$";
			throw new VQIRError(ErrorCodes.SchemaError, `Invalid schema at ${where}: ${issue?.message ?? "unknown error"}`, where);
		}
		return new SchemaRegistry(parsed.data);
	}

	private lookup(collectionName: string): Result<CollectionEntry> {
		const entry = this.collectionsByName.get(collectionName);
		if (!entry) {
			return { success: false, error: VQIRError.unknownReference(`collection '${collectionName}' not found in schema`) };
		}
		return { success: true, value: entry };
	}

	//============================================================================
	// Handles
	//============================================================================

	tryCollection(name: string): Result<Collection> {
		const entry = this.lookup(name);
		if (!entry.success) return entry;
		return { success: true, value: { name } };
	}

	collection(name: string): Collection {
		return unwrap(this.tryCollection(name));
	}

	tryEmbedding(collectionName: string, embeddingName: string): Result<EmbeddingField> {
		const entry = this.lookup(collectionName);
		if (!entry.success) return entry;
		if (!entry.value.embeddings.has(embeddingName)) {
			return {
				success: false,
				error: VQIRError.unknownReference(`embedding '${embeddingName}' not found in collection '${collectionName}'`),
			};
		}
		return { success: true, value: { name: embeddingName, collection: collectionName } };
	}

	embedding(collectionName: string, embeddingName: string): EmbeddingField {
		return unwrap(this.tryEmbedding(collectionName, embeddingName));
	}

	tryMetadata(collectionName: string, fieldName: string): Result<MetadataField> {
		const entry = this.lookup(collectionName);
		if (!entry.success) return entry;
		if (!entry.value.metadata.has(fieldName)) {
			return {
				success: false,
				error: VQIRError.unknownReference(`metadata field '${fieldName}' not found in collection '${collectionName}'`),
			};
		}
		return { success: true, value: { name: fieldName, collection: collectionName } };
	}

	metadata(collectionName: string, fieldName: string): MetadataField {
		return unwrap(this.tryMetadata(collectionName, fieldName));
	}

	tryParam(name: string): Result<Param> {
		if (!isValidIdentifier(name)) {
			return { success: false, error: VQIRError.invalidIdentifier("parameter", name) };
		}
		return { success: true, value: { kind: "param", name } };
	}

	param(name: string): Param {
		return { kind: "param", name: assertIdentifier("parameter", name) };
	}

	//============================================================================
	// Introspection
	//============================================================================

	embeddingDimensions(collectionName: string, embeddingName: string): number {
		return this.embeddingDef(collectionName, embeddingName).dimensions;
	}

	embeddingMetric(collectionName: string, embeddingName: string): DistanceMetric {
		return this.embeddingDef(collectionName, embeddingName).metric;
	}

	private embeddingDef(collectionName: string, embeddingName: string): EmbeddingDef {
		const def = this.collectionsByName.get(collectionName)?.embeddings.get(embeddingName);
		if (!def) {
			throw VQIRError.unknownReference(`embedding '${embeddingName}' not found in collection '${collectionName}'`);
		}
		return def;
	}

	/** Collection names in declaration order. */
	collections(): string[] {
		return [...this.collectionsByName.keys()];
	}

	embeddings(collectionName: string): string[] {
		return [...unwrap(this.lookup(collectionName)).embeddings.keys()];
	}

	metadataFields(collectionName: string): string[] {
		return [...unwrap(this.lookup(collectionName)).metadata.keys()];
	}
}
