// SPDX-License-Identifier: MIT
// VQIR Identifier Screening
// Names that end up inside rendered documents (params, collections, fields)
// must be bare tokens: a letter or underscore, then letters, digits or
// underscores. Quotes, comment markers, separators and whitespace (so any
// "x or y" / "drop t" phrase) can never appear.

import { VQIRError } from "./errors.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type IdentifierKind = "parameter" | "collection" | "field" | "embedding";

export function isValidIdentifier(name: string): boolean {
	return IDENTIFIER.test(name);
}

/**
 * Return the name unchanged, or throw InvalidIdentifier.
 */
export function assertIdentifier(kind: IdentifierKind, name: string): string {
	if (!isValidIdentifier(name)) {
		throw VQIRError.invalidIdentifier(kind, name);
	}
	return name;
}
