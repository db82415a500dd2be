// SPDX-License-Identifier: MIT
// VQIR Renderer Configuration
// zod-validated settings for constructing a renderer from JSON.

import { readFile } from "node:fs/promises";
import { z } from "zod/v4";
import { createRenderer } from "./dialects/index.js";
import { VQIRError } from "./errors.js";
import type { Logger } from "./logger.js";
import { Dialects, OperatorPolicies, type Renderer } from "./renderer.js";

//==============================================================================
// Schema
//==============================================================================

const PositiveInt = z.number().int().positive();

export const LimitsConfigSchema = z.strictObject({
	maxFilterDepth: PositiveInt.optional(),
	maxBatchSize: PositiveInt.optional(),
	maxTopK: PositiveInt.optional(),
	maxMetadataFields: PositiveInt.optional(),
	maxIds: PositiveInt.optional(),
}).meta({ id: "LimitsConfig", title: "Limits Config", description: "Overrides for the validation limits" });

export const RendererConfigSchema = z.strictObject({
	dialect: z.enum(Dialects),
	unsupportedOperators: z.enum(OperatorPolicies).optional(),
	defaultVectorName: z.string().optional(),
	defaultVectorField: z.string().min(1).optional(),
	sparseVectorField: z.string().min(1).optional(),
	limits: LimitsConfigSchema.optional(),
}).meta({ id: "RendererConfig", title: "Renderer Config", description: "Renderer construction settings" });

export type RendererConfig = z.infer<typeof RendererConfigSchema>;

//==============================================================================
// Loading
//==============================================================================

/**
 * Validate an untyped config document. Throws a ConfigError naming the first
 * offending key.
 */
export function loadRendererConfig(doc: unknown): RendererConfig {
	const parsed = RendererConfigSchema.safeParse(doc);
	if (!parsed.success) {
		const [issue] = parsed.error.issues;
		const where = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : "config";
		throw VQIRError.config(`Invalid renderer config at ${where}: ${issue?.message ?? "unknown error"}`);
	}
	return parsed.data;
}

/**
 * Read and validate a JSON config file.
 */
export async function readRendererConfig(filePath: string): Promise<RendererConfig> {
	const content = await readFile(filePath, "utf-8");
	let doc: unknown;
	try {
		doc = JSON.parse(content);
	} catch (e) {
		throw VQIRError.config(`Config file ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
	}
	return loadRendererConfig(doc);
}

/**
 * Build the renderer a config describes.
 */
export function rendererFromConfig(config: RendererConfig, logger?: Logger): Renderer {
	return createRenderer(config.dialect, {
		limits: config.limits,
		unsupportedOperators: config.unsupportedOperators,
		defaultVectorName: config.defaultVectorName,
		defaultVectorField: config.defaultVectorField,
		sparseVectorField: config.sparseVectorField,
		logger,
	});
}
