// SPDX-License-Identifier: MIT
// VQIR Result Packager
// Pairs the canonical serialization of a wire document with the parameter
// names collected while rendering it.

import { canonicalDigest, canonicalize } from "./canonicalize.js";
import type { QueryResult } from "./types.js";

/**
 * Serialize a rendered document. Non-encodable values raise a
 * SerializationError; nothing is dropped.
 */
export function packageResult(
	document: unknown,
	requiredParams: readonly string[],
): QueryResult {
	return {
		document: canonicalize(document),
		requiredParams: [...requiredParams],
	};
}

/** Content digest of a rendered result, stable across runs. */
export function resultDigest(result: QueryResult): string {
	return canonicalDigest(result.document);
}

/** Parse the rendered document back into a JSON value. */
export function parseDocument(result: QueryResult): unknown {
	return JSON.parse(result.document);
}
