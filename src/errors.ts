export interface SourcePosition {
	readonly offset: number;
	readonly line: number;
	readonly column: number;
}

/**
 * Unbalanced delimiters or an unterminated literal. Scoped to one statement
 * (or one batch, when the lexer cannot find the end of a literal).
 */
export class ParseError extends Error {
	constructor(
		readonly reason: string,
		readonly position: SourcePosition
	) {
		super(`${reason} at line ${position.line}, column ${position.column}`);
		this.name = "ParseError";
	}
}

/** Another writer holds the output path. */
export class OutputLockedError extends Error {
	constructor(readonly path: string) {
		super(`Output ${path} is locked by another conversion`);
		this.name = "OutputLockedError";
	}
}

/** The input file holds no CREATE TABLE statement. */
export class NoTableError extends Error {
	constructor(readonly file: string) {
		super(`No CREATE TABLE statement found in ${file}`);
		this.name = "NoTableError";
	}
}

export class ConfigError extends Error {
	constructor(
		readonly file: string,
		readonly details: readonly string[]
	) {
		super(`Invalid config ${file}: ${details.join("; ")}`);
		this.name = "ConfigError";
	}
}

/** Compute 1-based line and column of an offset. */
export function positionAt(text: string, offset: number): SourcePosition {
	let line = 1;
	let lineStart = 0;
	for (let i = 0; i < offset && i < text.length; i++) {
		if (text[i] === "\n") {
			line++;
			lineStart = i + 1;
		}
	}
	return { offset, line, column: offset - lineStart + 1 };
}
