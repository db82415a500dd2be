// Generate JSON Schema files from Zod schemas
// Usage: tsx scripts/generate-schemas.ts

import { mkdirSync, writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { RendererConfigSchema } from "../src/config.js";
import { SchemaDocumentSchema } from "../src/schema.js";
import { queryJsonSchema } from "../src/zod-schemas.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const schemaDir = resolve(__dirname, "..", "schemas");

/**
 * JSON Schema key priority order; remaining keys follow alphabetically.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "$defs",
	"title", "description", "type", "const", "enum", "default",
	"properties", "additionalProperties", "required",
	"items", "minItems", "maxItems",
	"oneOf", "anyOf", "allOf", "not",
	"minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum",
	"minLength", "maxLength", "pattern", "format",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);
	let priorityOrder: string[];
	if ("$ref" in record) {
		priorityOrder = ["$ref"];
	} else if ("type" in record || "$schema" in record) {
		priorityOrder = jsonSchemaKeyOrder;
	} else {
		priorityOrder = [];
	}
	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter(k => keys.includes(k));
	const remainingKeys = keys.filter(k => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;
	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

type JsonSchema = z.core.JSONSchema.BaseSchema;

function writeSchema(name: string, title: string, jsonSchema: JsonSchema): void {
	const output = { ...jsonSchema, $id: `${name}.schema.json`, title };
	const filePath = resolve(schemaDir, `${name}.schema.json`);
	writeFileSync(filePath, JSON.stringify(sortKeys(output), null, "\t") + "\n");
	console.log(`Generated schemas/${name}.schema.json`);
}

mkdirSync(schemaDir, { recursive: true });

function toJsonSchema(schema: z.ZodType): JsonSchema {
	return z.toJSONSchema(schema, { target: "draft-2020-12" });
}

writeSchema("query", "VQIR Query", queryJsonSchema());
writeSchema("renderer-config", "VQIR Renderer Config", toJsonSchema(RendererConfigSchema));
writeSchema("collection-schema", "VQIR Collection Schema", toJsonSchema(SchemaDocumentSchema));
