import type { ObjectKey, QualifiedName } from "./model";
import { createObjectKey } from "./model";
import { tokenize } from "./lexer";
import reservedWords from "./reservedWords.json";

const RESERVED = new Set<string>(reservedWords);

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes.
 */
export function escapeIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Render an identifier bare when PostgreSQL would read it back unchanged
 * (apart from case folding), quoted otherwise.
 */
export function renderIdentifier(name: string): string {
	if (/^[A-Za-z_][A-Za-z0-9_$]*$/.test(name) && !RESERVED.has(name.toLowerCase())) {
		return name;
	}
	return escapeIdentifier(name);
}

export function renderObjectKey(key: ObjectKey): string {
	return `${renderIdentifier(key.schema)}.${renderIdentifier(key.table)}`;
}

/** `OrderID` → `order_id`, `XMLData` → `xml_data`. */
export function snakeCase(name: string): string {
	return name
		.replace(/([a-z0-9])([A-Z])/g, "$1_$2")
		.replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
		.replace(/[^A-Za-z0-9]+/g, "_")
		.replace(/^_+|_+$/g, "")
		.toLowerCase();
}

/**
 * Target key of a sequence: schema lowercased, local name snake-cased with a
 * `_seq` suffix. Applying it to its own output changes nothing.
 */
export function sequenceKey(name: QualifiedName, defaultSchema: string): ObjectKey {
	const parts = name.parts;
	const local = snakeCase(parts[parts.length - 1] ?? "");
	const schema = parts.length >= 2 ? parts[parts.length - 2] : defaultSchema;
	return createObjectKey(schema, local.endsWith("_seq") ? local : `${local}_seq`);
}

/**
 * Rewrite an expression so bracketed (or double-quoted) identifiers render the
 * PostgreSQL way and `N'...'` literals lose their prefix. Everything else,
 * whitespace included, is kept.
 */
export function stripBrackets(expression: string): string {
	let result = "";
	let last = 0;
	for (const token of tokenize(expression)) {
		result += expression.slice(last, token.start);
		if (token.kind === "quoted") {
			result += renderIdentifier(token.value);
		} else if (token.kind === "string" && token.national) {
			result += `'${token.value.replace(/'/g, "''")}'`;
		} else {
			result += expression.slice(token.start, token.end);
		}
		last = token.end;
	}
	return result + expression.slice(last);
}
