import { ParseError, positionAt } from "./errors";

export type TokenKind = "word" | "quoted" | "string" | "number" | "punct" | "operator" | "comment";

export interface Token {
	readonly kind: TokenKind;
	/** Unquoted, unescaped content for `quoted` and `string`; source text otherwise. */
	readonly value: string;
	readonly start: number;
	readonly end: number;
	/** `N'...'` string literal. */
	readonly national?: boolean;
}

const PUNCT = new Set(["(", ")", ",", ".", ";", "="]);
const TWO_CHAR_OPERATORS = new Set(["<=", ">=", "<>", "!=", "::", "||", "!<", "!>"]);

const WORD_START = /[\p{L}_@#]/u;
const WORD_PART = /[\p{L}\p{N}_@#$]/u;

/**
 * Tokenize `text` between `from` and `to`. Offsets in the returned tokens are
 * absolute positions in `text`.
 */
export function tokenize(text: string, from = 0, to = text.length): Token[] {
	const tokens: Token[] = [];
	let i = from;

	const fail = (reason: string, at: number): never => {
		throw new ParseError(reason, positionAt(text, at));
	};

	while (i < to) {
		const ch = text[i];
		const next = i + 1 < to ? text[i + 1] : "";

		if (/\s/.test(ch)) {
			i++;
			continue;
		}

		if (ch === "-" && next === "-") {
			let end = i + 2;
			while (end < to && text[end] !== "\n" && text[end] !== "\r") end++;
			tokens.push({ kind: "comment", value: text.slice(i, end), start: i, end });
			i = end;
			continue;
		}

		if (ch === "/" && next === "*") {
			// T-SQL block comments nest
			let depth = 1;
			let end = i + 2;
			while (end < to && depth > 0) {
				if (text[end] === "/" && text[end + 1] === "*") {
					depth++;
					end += 2;
				} else if (text[end] === "*" && text[end + 1] === "/") {
					depth--;
					end += 2;
				} else {
					end++;
				}
			}
			if (depth > 0) fail("Unterminated block comment", i);
			tokens.push({ kind: "comment", value: text.slice(i, end), start: i, end });
			i = end;
			continue;
		}

		if (ch === "[") {
			const { value, end } = readDelimited(text, i, to, "]");
			if (end < 0) fail("Unterminated bracketed identifier", i);
			tokens.push({ kind: "quoted", value, start: i, end });
			i = end;
			continue;
		}

		if (ch === '"') {
			const { value, end } = readDelimited(text, i, to, '"');
			if (end < 0) fail("Unterminated quoted identifier", i);
			tokens.push({ kind: "quoted", value, start: i, end });
			i = end;
			continue;
		}

		if (ch === "'" || ((ch === "N" || ch === "n") && next === "'")) {
			const national = ch !== "'";
			const open = national ? i + 1 : i;
			const { value, end } = readDelimited(text, open, to, "'");
			if (end < 0) fail("Unterminated string literal", i);
			tokens.push({ kind: "string", value, start: i, end, national });
			i = end;
			continue;
		}

		if (/\d/.test(ch) || (ch === "." && /\d/.test(next))) {
			let end = i;
			if (ch === "0" && (next === "x" || next === "X")) {
				end += 2;
				while (end < to && /[0-9a-fA-F]/.test(text[end])) end++;
			} else {
				while (end < to && /\d/.test(text[end])) end++;
				if (text[end] === "." && /\d/.test(text[end + 1] ?? "")) {
					end++;
					while (end < to && /\d/.test(text[end])) end++;
				}
				if ((text[end] === "e" || text[end] === "E") && /[\d+-]/.test(text[end + 1] ?? "")) {
					end += 2;
					while (end < to && /\d/.test(text[end])) end++;
				}
			}
			tokens.push({ kind: "number", value: text.slice(i, end), start: i, end });
			i = end;
			continue;
		}

		if (WORD_START.test(ch)) {
			let end = i + 1;
			while (end < to && WORD_PART.test(text[end])) end++;
			tokens.push({ kind: "word", value: text.slice(i, end), start: i, end });
			i = end;
			continue;
		}

		if (PUNCT.has(ch)) {
			tokens.push({ kind: "punct", value: ch, start: i, end: i + 1 });
			i++;
			continue;
		}

		const pair = ch + next;
		if (TWO_CHAR_OPERATORS.has(pair)) {
			tokens.push({ kind: "operator", value: pair, start: i, end: i + 2 });
			i += 2;
			continue;
		}

		tokens.push({ kind: "operator", value: ch, start: i, end: i + 1 });
		i++;
	}

	return tokens;
}

/**
 * Read a literal opened at `open` and closed by `close`, where a doubled
 * closing character escapes itself. Returns `end: -1` when unterminated.
 */
function readDelimited(text: string, open: number, to: number, close: string): { value: string; end: number } {
	let value = "";
	let i = open + 1;
	while (i < to) {
		const ch = text[i];
		if (ch === close) {
			if (text[i + 1] === close && i + 1 < to) {
				value += close;
				i += 2;
				continue;
			}
			return { value, end: i + 1 };
		}
		value += ch;
		i++;
	}
	return { value, end: -1 };
}

export function isKeyword(token: Token | undefined, ...keywords: string[]): boolean {
	if (token === undefined || token.kind !== "word") return false;
	const upper = token.value.toUpperCase();
	return keywords.includes(upper);
}

export function isPunct(token: Token | undefined, value: string): boolean {
	return token !== undefined && token.kind === "punct" && token.value === value;
}

/**
 * Split text into batches at lines holding only `GO` (optionally `GO n`).
 * Lines inside strings, bracketed identifiers or block comments never split.
 */
export function splitBatches(text: string): { start: number; end: number }[] {
	const batches: { start: number; end: number }[] = [];
	let batchStart = 0;
	let state: "code" | "string" | "bracket" | "quoted" | "block" = "code";
	let blockDepth = 0;
	let i = 0;
	let lineStart = true;

	while (i < text.length) {
		if (lineStart && state === "code") {
			const lineEnd = findLineEnd(text, i);
			if (/^[ \t]*GO(?:[ \t]+\d+)?[ \t]*$/i.test(text.slice(i, lineEnd))) {
				batches.push({ start: batchStart, end: i });
				batchStart = lineEnd;
				i = lineEnd;
				continue;
			}
		}
		lineStart = false;
		const ch = text[i];
		const next = text[i + 1];

		switch (state) {
			case "code":
				if (ch === "'") state = "string";
				else if (ch === "[") state = "bracket";
				else if (ch === '"') state = "quoted";
				else if (ch === "/" && next === "*") {
					state = "block";
					blockDepth = 1;
					i++;
				} else if (ch === "-" && next === "-") {
					i = findLineEnd(text, i) - 1;
				}
				break;
			case "string":
				if (ch === "'") {
					if (next === "'") i++;
					else state = "code";
				}
				break;
			case "bracket":
				if (ch === "]") {
					if (next === "]") i++;
					else state = "code";
				}
				break;
			case "quoted":
				if (ch === '"') {
					if (next === '"') i++;
					else state = "code";
				}
				break;
			case "block":
				if (ch === "/" && next === "*") {
					blockDepth++;
					i++;
				} else if (ch === "*" && next === "/") {
					blockDepth--;
					i++;
					if (blockDepth === 0) state = "code";
				}
				break;
		}

		if (text[i] === "\n") lineStart = true;
		i++;
	}

	batches.push({ start: batchStart, end: text.length });
	return batches.filter(b => text.slice(b.start, b.end).trim() !== "");
}

function findLineEnd(text: string, from: number): number {
	const newline = text.indexOf("\n", from);
	return newline < 0 ? text.length : newline;
}
