// SPDX-License-Identifier: MIT
// VQIR JSON Canonicalization (JCS Profile)
// RFC 8785 (JSON Canonicalization Scheme) serialization of rendered wire
// documents: sorted keys, no whitespace, deterministic bytes.

import { createHash, type Hash } from "node:crypto";
import { VQIRError } from "./errors.js";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

/** Serialize a number per RFC 8785 / ECMAScript Number.toString(). */
function jcsNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw VQIRError.serialization(`non-finite number ${value}`);
	}
	if (Object.is(value, -0)) return "0";
	return JSON.stringify(value);
}

function isRecord(val: unknown): val is Record<string, unknown> {
	return val !== null && typeof val === "object" && !Array.isArray(val);
}

function isPlainObject(val: Record<string, unknown>): boolean {
	const proto: unknown = Object.getPrototypeOf(val);
	return proto === Object.prototype || proto === null;
}

/** Serialize an object with keys sorted by UTF-16 code unit comparison. */
function jcsObject(obj: Record<string, unknown>): string {
	if (!isPlainObject(obj)) {
		throw VQIRError.serialization(`unsupported object ${Object.prototype.toString.call(obj)}`);
	}
	const keys = Object.keys(obj).sort();
	const entries: string[] = [];
	for (const key of keys) {
		const val = obj[key];
		if (val === undefined) continue;
		entries.push(JSON.stringify(key) + ":" + jcsSerialize(val));
	}
	return "{" + entries.join(",") + "}";
}

function jcsArray(arr: unknown[]): string {
	const items: string[] = [];
	for (const [i, item] of arr.entries()) {
		if (item === undefined) {
			throw VQIRError.serialization(`undefined array element at index ${i}`);
		}
		items.push(jcsSerialize(item));
	}
	return "[" + items.join(",") + "]";
}

/**
 * Serialize a JSON value to its RFC 8785 canonical form.
 *
 * - Objects: keys sorted by UTF-16 code unit lexicographic order
 * - Arrays: element order preserved
 * - Strings: ECMAScript escaping
 * - Numbers: ECMAScript Number.toString()
 * - No whitespace between tokens
 */
function jcsSerialize(value: unknown): string {
	if (value === null) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jcsNumber(value);
	if (typeof value === "string") return JSON.stringify(value);
	if (Array.isArray(value)) return jcsArray(value);
	if (isRecord(value)) return jcsObject(value);
	throw VQIRError.serialization(`unsupported type ${typeof value}`);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Produce the RFC 8785 canonical JSON string of a wire document.
 * Throws a SerializationError for anything JSON cannot carry.
 */
export function canonicalize(doc: unknown): string {
	return jcsSerialize(doc);
}

/**
 * Compute the content digest of a canonical document string.
 *
 * @param algorithm - Hash algorithm (default: "sha256")
 * @returns Digest string in the format `vqir-{algorithm}:{hex}`
 */
export function canonicalDigest(
	canonical: string,
	algorithm = "sha256",
): string {
	const hash: Hash = createHash(algorithm);
	hash.update(canonical, "utf8");
	return `vqir-${algorithm}:${hash.digest("hex")}`;
}
