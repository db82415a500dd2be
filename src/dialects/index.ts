// SPDX-License-Identifier: MIT
// VQIR Dialect Registry

import type { Dialect, Renderer } from "../renderer.js";
import { exhaustive } from "../errors.js";
import { createMilvusRenderer, type MilvusRendererOptions } from "./milvus.js";
import { createPineconeRenderer } from "./pinecone.js";
import { createQdrantRenderer, type QdrantRendererOptions } from "./qdrant.js";
import { createWeaviateRenderer } from "./weaviate.js";

export { MilvusRenderer, createMilvusRenderer, type MilvusRendererOptions } from "./milvus.js";
export { PineconeRenderer, createPineconeRenderer } from "./pinecone.js";
export { QdrantRenderer, createQdrantRenderer, type QdrantRendererOptions } from "./qdrant.js";
export { WeaviateRenderer, createWeaviateRenderer, formatClassName } from "./weaviate.js";

/** Union of every dialect's options; each renderer reads the keys it knows. */
export type AnyRendererOptions = QdrantRendererOptions & MilvusRendererOptions;

/**
 * Construct the renderer for a dialect.
 */
export function createRenderer(dialect: Dialect, options: AnyRendererOptions = {}): Renderer {
	switch (dialect) {
	case "pinecone": return createPineconeRenderer(options);
	case "qdrant": return createQdrantRenderer(options);
	case "weaviate": return createWeaviateRenderer(options);
	case "milvus": return createMilvusRenderer(options);
	default: return exhaustive(dialect);
	}
}
