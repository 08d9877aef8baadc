import type {
	AlterTableAction,
	Column,
	ColumnRef,
	Constraint,
	DataType,
	DefaultExpression,
	ExtendedPropertyNode,
	Identity,
	IndexNode,
	PropertyLevel,
	QualifiedName,
	SequenceNode,
	SourceSpan,
	StatementNode,
	TableElement,
	TableNode,
	TableOption,
} from "./model";
import { ParseError, positionAt } from "./errors";
import { isKeyword, isPunct, splitBatches, tokenize, type Token } from "./lexer";

export interface ParseResult {
	readonly statements: readonly StatementNode[];
	/** One entry per statement (or batch) that could not be read. */
	readonly errors: readonly ParseError[];
}

/**
 * Parse DDL text into statement nodes.
 *
 * Every statement either parses into a structured node or is kept verbatim as
 * a `raw` node. Only unbalanced parentheses and unterminated literals fail, and
 * they fail for their own statement only.
 */
export function parseDdl(text: string): ParseResult {
	const statements: StatementNode[] = [];
	const errors: ParseError[] = [];

	for (const batch of splitBatches(text)) {
		let tokens: Token[];
		try {
			tokens = tokenize(text, batch.start, batch.end);
		} catch (error) {
			if (error instanceof ParseError) {
				errors.push(error);
				continue;
			}
			throw error;
		}

		for (const group of splitStatements(tokens, text)) {
			if (group.error) {
				errors.push(group.error);
				continue;
			}
			statements.push(buildStatement(group.tokens, text));
		}
	}

	return { statements, errors };
}

// === Statement splitting ===

interface StatementGroup {
	readonly tokens: readonly Token[];
	readonly error: ParseError | undefined;
}

function startsStatement(tokens: readonly Token[], index: number, current: readonly Token[]): boolean {
	const token = tokens[index];
	const head = current.find(t => t.kind !== "comment");
	if (head === undefined) return false;
	if (isKeyword(token, "CREATE", "EXEC", "EXECUTE", "USE", "PRINT")) return true;
	if (isKeyword(token, "ALTER")) return !isKeyword(tokens[index + 1], "COLUMN");
	if (isKeyword(token, "DROP", "SET")) {
		if (isKeyword(head, "ALTER")) return false;
		const previous = previousCode(tokens, index);
		return !isKeyword(previous, "DELETE", "UPDATE");
	}
	return false;
}

function opensNewStatement(tokens: readonly Token[], index: number, current: readonly Token[]): boolean {
	return isKeyword(tokens[index], "CREATE", "ALTER", "EXEC", "EXECUTE", "USE") && startsStatement(tokens, index, current);
}

function previousCode(tokens: readonly Token[], index: number): Token | undefined {
	for (let i = index - 1; i >= 0; i--) {
		if (tokens[i].kind !== "comment") return tokens[i];
	}
	return undefined;
}

function splitStatements(tokens: readonly Token[], text: string): StatementGroup[] {
	const groups: StatementGroup[] = [];
	let current: Token[] = [];
	let depth = 0;
	let openAt: number[] = [];
	let error: ParseError | undefined;

	const flush = () => {
		if (depth > 0 && error === undefined) {
			error = new ParseError("Unbalanced '('", positionAt(text, openAt[openAt.length - 1]));
		}
		// Comments trailing a statement become their own passthrough
		let end = current.length;
		while (end > 0 && current[end - 1].kind === "comment") end--;
		if (end > 0) groups.push({ tokens: current.slice(0, end), error });
		if (end < current.length) groups.push({ tokens: current.slice(end), error: undefined });
		current = [];
		depth = 0;
		openAt = [];
		error = undefined;
	};

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];

		if (token.kind === "comment") {
			current.push(token);
			continue;
		}

		// A comment run before the first code token is its own statement
		if (current.length > 0 && current.every(t => t.kind === "comment")) {
			groups.push({ tokens: current, error: undefined });
			current = [];
		}

		// An open parenthesis never spans statements: a new statement keyword
		// closes the broken one with its error
		if (depth === 0 ? startsStatement(tokens, i, current) : opensNewStatement(tokens, i, current)) {
			flush();
		}

		current.push(token);

		if (isPunct(token, "(")) {
			depth++;
			openAt.push(token.start);
		} else if (isPunct(token, ")")) {
			if (depth === 0) {
				error ??= new ParseError("Unbalanced ')'", positionAt(text, token.start));
			} else {
				depth--;
				openAt.pop();
			}
		} else if (isPunct(token, ";")) {
			flush();
		}
	}

	if (current.length > 0) flush();
	return groups;
}

// === Cursor ===

class SyntaxMismatch extends Error {
	constructor(message: string) {
		super(message);
		this.name = "SyntaxMismatch";
	}
}

class Cursor {
	private _pos = 0;

	constructor(
		private readonly _tokens: readonly Token[],
		readonly source: string
	) { }

	get position(): number {
		return this._pos;
	}

	atEnd(): boolean {
		return this._pos >= this._tokens.length;
	}

	peek(offset = 0): Token | undefined {
		return this._tokens[this._pos + offset];
	}

	next(): Token {
		const token = this._tokens[this._pos];
		if (token === undefined) throw new SyntaxMismatch("Unexpected end of statement");
		this._pos++;
		return token;
	}

	acceptKeyword(...keywords: string[]): string | undefined {
		const token = this.peek();
		if (isKeyword(token, ...keywords) && token !== undefined) {
			this._pos++;
			return token.value.toUpperCase();
		}
		return undefined;
	}

	expectKeyword(...keywords: string[]): string {
		const matched = this.acceptKeyword(...keywords);
		if (matched === undefined) throw new SyntaxMismatch(`Expected ${keywords.join(" or ")}`);
		return matched;
	}

	acceptKeywords(...sequence: string[]): boolean {
		for (let i = 0; i < sequence.length; i++) {
			if (!isKeyword(this.peek(i), sequence[i])) return false;
		}
		this._pos += sequence.length;
		return true;
	}

	acceptPunct(value: string): boolean {
		if (isPunct(this.peek(), value)) {
			this._pos++;
			return true;
		}
		return false;
	}

	expectPunct(value: string): void {
		if (!this.acceptPunct(value)) throw new SyntaxMismatch(`Expected '${value}'`);
	}

	expectEnd(): void {
		if (!this.atEnd()) throw new SyntaxMismatch("Unexpected trailing tokens");
	}

	readIdentifier(): string {
		const token = this.next();
		if (token.kind === "word" || token.kind === "quoted") return token.value;
		throw new SyntaxMismatch("Expected identifier");
	}

	readName(): QualifiedName {
		const parts = [this.readIdentifier()];
		while (isPunct(this.peek(), ".")) {
			this._pos++;
			parts.push(this.readIdentifier());
		}
		return { parts };
	}

	/** Consume a parenthesized group and return the tokens inside it. */
	readParenthesized(): Token[] {
		this.expectPunct("(");
		const inner: Token[] = [];
		let depth = 1;
		for (;;) {
			const token = this.next();
			if (isPunct(token, "(")) depth++;
			else if (isPunct(token, ")")) {
				depth--;
				if (depth === 0) return inner;
			}
			inner.push(token);
		}
	}

	/** Consume tokens up to (not including) a top-level stop keyword. */
	readUntilKeyword(stop: readonly string[]): Token[] {
		const taken: Token[] = [];
		let depth = 0;
		while (!this.atEnd()) {
			const token = this.peek();
			if (token === undefined) break;
			if (depth === 0 && taken.length > 0 && isKeyword(token, ...stop)) break;
			if (isPunct(token, "(")) depth++;
			else if (isPunct(token, ")")) depth--;
			taken.push(this.next());
		}
		return taken;
	}

	rest(): Token[] {
		const taken: Token[] = [];
		while (!this.atEnd()) taken.push(this.next());
		return taken;
	}

	textOf(tokens: readonly Token[]): string {
		if (tokens.length === 0) return "";
		return this.source.slice(tokens[0].start, tokens[tokens.length - 1].end);
	}
}

function splitTopLevel(tokens: readonly Token[]): Token[][] {
	const parts: Token[][] = [];
	let current: Token[] = [];
	let depth = 0;
	for (const token of tokens) {
		if (isPunct(token, "(")) depth++;
		else if (isPunct(token, ")")) depth--;
		if (depth === 0 && isPunct(token, ",")) {
			parts.push(current);
			current = [];
			continue;
		}
		current.push(token);
	}
	if (current.length > 0 || parts.length > 0) parts.push(current);
	return parts;
}

// === Statements ===

function buildStatement(tokens: readonly Token[], text: string): StatementNode {
	const first = tokens[0];
	const last = tokens[tokens.length - 1];
	const position = positionAt(text, first.start);
	const span: SourceSpan = { start: first.start, end: last.end, line: position.line, column: position.column };
	const source = text.slice(span.start, span.end);

	const code = tokens.filter(t => t.kind !== "comment");
	if (code.length === 0) {
		return { kind: "raw", span, text: source, commentOnly: true };
	}
	if (isPunct(code[code.length - 1], ";")) code.pop();

	try {
		const node = parseRecognized(new Cursor(code, text), span, source);
		if (node) return node;
	} catch (error) {
		if (!(error instanceof SyntaxMismatch)) throw error;
	}
	return { kind: "raw", span, text: source, commentOnly: false };
}

function parseRecognized(c: Cursor, span: SourceSpan, text: string): StatementNode | undefined {
	if (c.acceptKeyword("CREATE")) {
		if (c.acceptKeyword("TABLE")) return parseCreateTable(c, span, text);
		if (c.acceptKeyword("SEQUENCE")) return parseCreateSequence(c, span, text);
		if (c.acceptKeyword("SCHEMA")) {
			c.acceptKeywords("IF", "NOT", "EXISTS");
			const name = c.readIdentifier();
			c.expectEnd();
			return { kind: "schema", span, text, name };
		}
		return parseCreateIndex(c, span, text);
	}
	if (c.acceptKeywords("ALTER", "TABLE")) return parseAlterTable(c, span, text);
	if (c.acceptKeyword("EXEC", "EXECUTE")) return parseAddExtendedProperty(c, span, text);
	if (c.acceptKeywords("COMMENT", "ON")) return parseCommentOn(c, span, text);
	if (c.acceptKeyword("SET")) {
		const option = c.readIdentifier();
		const value = c.expectKeyword("ON", "OFF");
		c.expectEnd();
		return { kind: "sessionOption", span, text, option, value };
	}
	return undefined;
}

// --- CREATE TABLE ---

function parseCreateTable(c: Cursor, span: SourceSpan, text: string): TableNode {
	const name = c.readName();
	const body = c.readParenthesized();

	const elements: TableElement[] = [];
	let ordinal = 0;
	for (const part of splitTopLevel(body)) {
		if (part.length === 0) throw new SyntaxMismatch("Empty table element");
		const parsed = parseTableElement(part, c.source, ordinal + 1);
		for (const element of parsed) {
			if (element.kind === "column") ordinal++;
			elements.push(element);
		}
	}

	const options = parseTableOptions(c);
	return { kind: "table", span, text, name, elements, options };
}

function parseTableElement(part: readonly Token[], source: string, ordinal: number): TableElement[] {
	const element = new Cursor(part, source);
	const text = element.textOf(part);
	try {
		if (element.acceptKeyword("CONSTRAINT")) {
			const name = element.readIdentifier();
			const constraint = parseConstraintBody(element, name, undefined);
			element.expectEnd();
			return [{ kind: "constraint", constraint }];
		}
		if (isKeyword(element.peek(), "PRIMARY", "UNIQUE", "FOREIGN", "CHECK")) {
			const constraint = parseConstraintBody(element, undefined, undefined);
			element.expectEnd();
			return [{ kind: "constraint", constraint }];
		}
		if (element.acceptKeywords("PERIOD", "FOR", "SYSTEM_TIME")) {
			const columns = parseNameList(element);
			element.expectEnd();
			if (columns.length !== 2) throw new SyntaxMismatch("PERIOD takes two columns");
			return [{ kind: "period", startColumn: columns[0], endColumn: columns[1] }];
		}
		if (isKeyword(element.peek(), "INDEX")) {
			return [{ kind: "unmodeled", text }];
		}
		return parseColumn(element, ordinal);
	} catch (error) {
		if (error instanceof SyntaxMismatch) return [{ kind: "unmodeled", text }];
		throw error;
	}
}

const COLUMN_ATTRIBUTE_KEYWORDS = [
	"NOT", "NULL", "CONSTRAINT", "DEFAULT", "IDENTITY", "GENERATED", "HIDDEN",
	"COLLATE", "PRIMARY", "UNIQUE", "REFERENCES", "FOREIGN", "CHECK",
];

function parseColumn(c: Cursor, ordinal: number): TableElement[] {
	const name = c.readIdentifier();
	if (isKeyword(c.peek(), "AS")) throw new SyntaxMismatch("Computed column");
	const type = parseDataType(c);

	let nullable: boolean | undefined;
	let defaultValue: DefaultExpression | undefined;
	let defaultConstraintName: string | undefined;
	let identity: Identity | undefined;
	let generatedAlways: Column["generatedAlways"];
	let hidden = false;
	let collation: string | undefined;
	const unmodeled: string[] = [];
	const constraints: Constraint[] = [];

	while (!c.atEnd()) {
		if (c.acceptKeywords("NOT", "NULL")) {
			nullable = false;
			continue;
		}
		if (c.acceptKeyword("NULL")) {
			nullable = true;
			continue;
		}

		let constraintName: string | undefined;
		if (c.acceptKeyword("CONSTRAINT")) constraintName = c.readIdentifier();

		if (c.acceptKeyword("DEFAULT")) {
			defaultValue = parseDefaultExpression(c.readUntilKeyword(COLUMN_ATTRIBUTE_KEYWORDS), c.source);
			defaultConstraintName = constraintName;
			continue;
		}
		if (isKeyword(c.peek(), "PRIMARY", "UNIQUE", "REFERENCES", "FOREIGN", "CHECK")) {
			constraints.push(parseConstraintBody(c, constraintName, name));
			continue;
		}
		if (constraintName !== undefined) throw new SyntaxMismatch("Expected constraint after CONSTRAINT name");

		if (c.acceptKeyword("IDENTITY")) {
			identity = { start: "1", increment: "1" };
			if (isPunct(c.peek(), "(")) {
				const args = splitTopLevel(c.readParenthesized()).map(part => c.textOf(part));
				if (args.length !== 2) throw new SyntaxMismatch("IDENTITY takes seed and increment");
				identity = { start: args[0], increment: args[1] };
			}
			continue;
		}
		if (c.acceptKeyword("GENERATED")) {
			if (c.acceptKeywords("ALWAYS", "AS", "ROW")) {
				generatedAlways = c.expectKeyword("START", "END") === "START" ? "rowStart" : "rowEnd";
				if (c.acceptKeyword("HIDDEN")) hidden = true;
				continue;
			}
			if (!c.acceptKeywords("BY", "DEFAULT")) c.expectKeyword("ALWAYS");
			c.expectKeyword("AS");
			c.expectKeyword("IDENTITY");
			identity = parseIdentityOptions(c);
			continue;
		}
		if (c.acceptKeyword("HIDDEN")) {
			hidden = true;
			continue;
		}
		if (c.acceptKeyword("COLLATE")) {
			collation = c.readIdentifier();
			continue;
		}

		unmodeled.push(c.textOf(c.readUntilKeyword(COLUMN_ATTRIBUTE_KEYWORDS)));
	}

	const column: Column = {
		name,
		type,
		nullable,
		default: defaultValue,
		defaultConstraintName,
		identity,
		generatedAlways,
		hidden,
		collation,
		ordinal,
		unmodeled,
	};
	return [
		{ kind: "column", column },
		...constraints.map((constraint): TableElement => ({ kind: "constraint", constraint })),
	];
}

function parseIdentityOptions(c: Cursor): Identity {
	let start = "1";
	let increment = "1";
	if (!isPunct(c.peek(), "(")) return { start, increment };
	const options = new Cursor(c.readParenthesized(), c.source);
	while (!options.atEnd()) {
		if (options.acceptKeyword("START")) {
			options.acceptKeyword("WITH");
			start = readSignedNumber(options);
		} else {
			options.expectKeyword("INCREMENT");
			options.acceptKeyword("BY");
			increment = readSignedNumber(options);
		}
	}
	return { start, increment };
}

function parseDataType(c: Cursor): DataType {
	let name: string;
	if (c.acceptKeywords("DOUBLE", "PRECISION")) {
		name = "DOUBLE PRECISION";
	} else if (c.acceptKeywords("CHARACTER", "VARYING")) {
		name = "CHARACTER VARYING";
	} else {
		name = c.readName().parts.join(".");
	}
	const args = isPunct(c.peek(), "(")
		? splitTopLevel(c.readParenthesized()).map(part => c.textOf(part))
		: [];
	return { name, args };
}

function readSignedNumber(c: Cursor): string {
	let sign = "";
	const first = c.peek();
	if (first?.kind === "operator" && (first.value === "-" || first.value === "+")) {
		c.next();
		sign = first.value === "-" ? "-" : "";
	}
	const token = c.next();
	if (token.kind !== "number") throw new SyntaxMismatch("Expected number");
	return sign + token.value;
}

const CURRENT_TIMESTAMP_FUNCTIONS = new Set(["GETDATE", "SYSDATETIME", "SYSDATETIMEOFFSET", "NOW"]);
const UTC_TIMESTAMP_FUNCTIONS = new Set(["GETUTCDATE", "SYSUTCDATETIME"]);

/**
 * Read a default expression into its structured form. Wrapping parentheses,
 * as T-SQL scripts them (`((0))`), are removed first.
 */
export function parseDefaultExpression(tokens: readonly Token[], source: string): DefaultExpression {
	let inner = tokens.slice();
	while (inner.length >= 2 && isPunct(inner[0], "(") && isPunct(inner[inner.length - 1], ")") && wraps(inner)) {
		inner = inner.slice(1, -1);
	}
	const text = inner.length === 0 ? "" : source.slice(inner[0].start, inner[inner.length - 1].end);

	if (inner.length >= 4 && isKeyword(inner[0], "NEXT") && isKeyword(inner[1], "VALUE") && isKeyword(inner[2], "FOR")) {
		const c = new Cursor(inner.slice(3), source);
		const sequence = c.readName();
		if (c.atEnd()) return { kind: "nextValue", sequence };
	}

	if (inner.length === 4 && isKeyword(inner[0], "NEXTVAL") && isPunct(inner[1], "(") && inner[2].kind === "string" && isPunct(inner[3], ")")) {
		return { kind: "sequenceCall", sequence: inner[2].value };
	}

	if (inner.length === 1 && isKeyword(inner[0], "CURRENT_TIMESTAMP")) {
		return { kind: "currentTimestamp", utc: false };
	}
	if (
		inner.length === 5 &&
		isKeyword(inner[0], "CURRENT_TIMESTAMP") &&
		isKeyword(inner[1], "AT") && isKeyword(inner[2], "TIME") && isKeyword(inner[3], "ZONE") &&
		inner[4].kind === "string" && inner[4].value.toUpperCase() === "UTC"
	) {
		return { kind: "currentTimestamp", utc: true };
	}

	if (inner.length === 3 && inner[0].kind === "word" && isPunct(inner[1], "(") && isPunct(inner[2], ")")) {
		const fn = inner[0].value.toUpperCase();
		if (CURRENT_TIMESTAMP_FUNCTIONS.has(fn)) return { kind: "currentTimestamp", utc: false };
		if (UTC_TIMESTAMP_FUNCTIONS.has(fn)) return { kind: "currentTimestamp", utc: true };
		if (fn === "NEWID" || fn === "NEWSEQUENTIALID" || fn === "GEN_RANDOM_UUID") return { kind: "newGuid" };
	}

	if (inner.length === 1 && (inner[0].kind === "number" || inner[0].kind === "string" || isKeyword(inner[0], "NULL", "TRUE", "FALSE"))) {
		return { kind: "literal", value: literalText(inner[0]) };
	}
	if (inner.length === 2 && inner[0].kind === "operator" && inner[0].value === "-" && inner[1].kind === "number") {
		return { kind: "literal", value: `-${inner[1].value}` };
	}

	return { kind: "expression", text };
}

function literalText(token: Token): string {
	if (token.kind === "string") return `'${token.value.replace(/'/g, "''")}'`;
	if (token.kind === "word") return token.value.toUpperCase();
	return token.value;
}

/** True when the first token's parenthesis closes at the last token. */
function wraps(tokens: readonly Token[]): boolean {
	let depth = 0;
	for (let i = 0; i < tokens.length; i++) {
		if (isPunct(tokens[i], "(")) depth++;
		else if (isPunct(tokens[i], ")")) depth--;
		if (depth === 0) return i === tokens.length - 1;
	}
	return false;
}

// --- Constraints ---

function parseColumnRefs(c: Cursor): ColumnRef[] {
	return splitTopLevel(c.readParenthesized()).map(part => {
		const ref = new Cursor(part, c.source);
		const name = ref.readIdentifier();
		const direction = ref.acceptKeyword("ASC", "DESC");
		ref.expectEnd();
		return { name, direction: direction === "ASC" || direction === "DESC" ? direction : undefined };
	});
}

function parseNameList(c: Cursor): string[] {
	return splitTopLevel(c.readParenthesized()).map(part => {
		const ref = new Cursor(part, c.source);
		const name = ref.readIdentifier();
		ref.expectEnd();
		return name;
	});
}

/** Read `WITH (...)` and `ON <filegroup>` clauses trailing a key or index. */
function parseStorageClauses(c: Cursor): string[] {
	const storage: string[] = [];
	for (;;) {
		const start = c.position;
		if (c.acceptKeyword("WITH")) {
			if (!isPunct(c.peek(), "(")) throw new SyntaxMismatch("Expected WITH options");
			const inner = c.readParenthesized();
			storage.push(`WITH (${c.textOf(inner)})`);
			continue;
		}
		if (isKeyword(c.peek(), "ON") && !isKeyword(c.peek(1), "DELETE", "UPDATE")) {
			c.next();
			const target = c.readIdentifier();
			if (isPunct(c.peek(), "(")) {
				const inner = c.readParenthesized();
				storage.push(`ON ${target}(${c.textOf(inner)})`);
			} else {
				storage.push(`ON ${target}`);
			}
			continue;
		}
		if (c.position === start) return storage;
	}
}

/**
 * Read a constraint after its optional `CONSTRAINT name`. Column-level
 * constraints pass `forColumn` and may omit their column list. Callers check
 * for trailing tokens.
 */
function parseConstraintBody(c: Cursor, name: string | undefined, forColumn: string | undefined): Constraint {
	const ownColumn: ColumnRef[] = forColumn === undefined ? [] : [{ name: forColumn, direction: undefined }];

	let keyKind: "primaryKey" | "unique" | undefined;
	if (c.acceptKeywords("PRIMARY", "KEY")) keyKind = "primaryKey";
	else if (c.acceptKeyword("UNIQUE")) keyKind = "unique";

	if (keyKind !== undefined) {
		const clustered = c.acceptKeyword("CLUSTERED", "NONCLUSTERED");
		const clustering = clustered === "CLUSTERED" || clustered === "NONCLUSTERED" ? clustered : undefined;
		const columns = isPunct(c.peek(), "(") ? parseColumnRefs(c) : ownColumn;
		if (columns.length === 0) throw new SyntaxMismatch("Key without columns");
		const storage = parseStorageClauses(c);
		return { kind: keyKind, name, columns, clustering, references: undefined, expression: undefined, storage };
	}

	if (c.acceptKeywords("FOREIGN", "KEY")) {
		const columns = isPunct(c.peek(), "(") ? parseColumnRefs(c) : ownColumn;
		if (columns.length === 0) throw new SyntaxMismatch("Foreign key without columns");
		return parseReferences(c, name, columns);
	}

	if (isKeyword(c.peek(), "REFERENCES") && forColumn !== undefined) {
		return parseReferences(c, name, ownColumn);
	}

	if (c.acceptKeyword("CHECK")) {
		const storage: string[] = [];
		if (c.acceptKeywords("NOT", "FOR", "REPLICATION")) storage.push("NOT FOR REPLICATION");
		const expression = c.textOf(c.readParenthesized());
		return { kind: "check", name, columns: ownColumn, clustering: undefined, references: undefined, expression, storage };
	}

	throw new SyntaxMismatch("Expected constraint");
}

function parseReferences(c: Cursor, name: string | undefined, columns: ColumnRef[]): Constraint {
	c.expectKeyword("REFERENCES");
	const table = c.readName();
	const targetColumns = isPunct(c.peek(), "(") ? parseNameList(c) : [];
	let onDelete: string | undefined;
	let onUpdate: string | undefined;
	const storage: string[] = [];

	for (;;) {
		if (c.acceptKeywords("ON", "DELETE")) {
			onDelete = readReferentialAction(c);
		} else if (c.acceptKeywords("ON", "UPDATE")) {
			onUpdate = readReferentialAction(c);
		} else if (c.acceptKeywords("NOT", "FOR", "REPLICATION")) {
			storage.push("NOT FOR REPLICATION");
		} else {
			break;
		}
	}

	return {
		kind: "foreignKey",
		name,
		columns,
		clustering: undefined,
		references: { table, columns: targetColumns, onDelete, onUpdate },
		expression: undefined,
		storage,
	};
}

function readReferentialAction(c: Cursor): string {
	if (c.acceptKeyword("CASCADE")) return "CASCADE";
	if (c.acceptKeyword("RESTRICT")) return "RESTRICT";
	if (c.acceptKeywords("NO", "ACTION")) return "NO ACTION";
	c.expectKeyword("SET");
	return `SET ${c.expectKeyword("NULL", "DEFAULT")}`;
}

// --- Table options ---

function parseTableOptions(c: Cursor): TableOption[] {
	const options: TableOption[] = [];
	while (!c.atEnd()) {
		const start = c.peek();
		if (isKeyword(start, "ON", "TEXTIMAGE_ON", "FILESTREAM_ON")) {
			const keyword = c.next().value.toUpperCase();
			const target = c.readIdentifier();
			let text = `${keyword} ${target}`;
			if (isPunct(c.peek(), "(")) text += `(${c.textOf(c.readParenthesized())})`;
			options.push({ kind: "storage", text });
			continue;
		}
		if (c.acceptKeyword("WITH")) {
			if (!isPunct(c.peek(), "(")) throw new SyntaxMismatch("Expected table options");
			for (const part of splitTopLevel(c.readParenthesized())) {
				options.push(parseWithOption(part, c.source));
			}
			continue;
		}
		options.push({ kind: "unmodeled", text: c.textOf(c.rest()) });
	}
	return options;
}

function parseWithOption(part: readonly Token[], source: string): TableOption {
	const option = new Cursor(part, source);
	const text = option.textOf(part);
	if (option.acceptKeyword("SYSTEM_VERSIONING")) {
		option.expectPunct("=");
		if (option.acceptKeyword("ON")) {
			let historyTable: QualifiedName | undefined;
			if (isPunct(option.peek(), "(")) {
				for (const part of splitTopLevel(option.readParenthesized())) {
					const setting = new Cursor(part, option.source);
					if (setting.acceptKeyword("HISTORY_TABLE")) {
						setting.expectPunct("=");
						historyTable = setting.readName();
					}
				}
			}
			return { kind: "systemVersioning", historyTable };
		}
		return { kind: "unmodeled", text };
	}
	if (isKeyword(option.peek(), "DATA_COMPRESSION", "FILLFACTOR", "PAD_INDEX")) {
		return { kind: "storage", text };
	}
	return { kind: "unmodeled", text };
}

// --- CREATE SEQUENCE ---

function parseCreateSequence(c: Cursor, span: SourceSpan, text: string): SequenceNode {
	c.acceptKeywords("IF", "NOT", "EXISTS");
	const name = c.readName();
	let dataType: DataType | undefined;
	let start: string | undefined;
	let increment: string | undefined;
	let minValue: string | undefined;
	let maxValue: string | undefined;
	let cache: string | undefined;
	let cycle = false;

	while (!c.atEnd()) {
		if (c.acceptKeyword("AS")) {
			dataType = parseDataType(c);
		} else if (c.acceptKeyword("START")) {
			c.acceptKeyword("WITH");
			start = readSignedNumber(c);
		} else if (c.acceptKeyword("INCREMENT")) {
			c.acceptKeyword("BY");
			increment = readSignedNumber(c);
		} else if (c.acceptKeyword("MINVALUE")) {
			minValue = readSignedNumber(c);
		} else if (c.acceptKeyword("MAXVALUE")) {
			maxValue = readSignedNumber(c);
		} else if (c.acceptKeyword("CACHE")) {
			cache = c.peek()?.kind === "number" ? c.next().value : undefined;
		} else if (c.acceptKeyword("CYCLE")) {
			cycle = true;
		} else {
			c.expectKeyword("NO");
			c.expectKeyword("MINVALUE", "MAXVALUE", "CACHE", "CYCLE");
		}
	}

	return { kind: "sequence", span, text, name, dataType, start, increment, minValue, maxValue, cache, cycle };
}

// --- CREATE INDEX ---

function parseCreateIndex(c: Cursor, span: SourceSpan, text: string): IndexNode {
	const unique = c.acceptKeyword("UNIQUE") !== undefined;
	const clustered = c.acceptKeyword("CLUSTERED", "NONCLUSTERED");
	const clustering = clustered === "CLUSTERED" || clustered === "NONCLUSTERED" ? clustered : undefined;
	const columnstore = c.acceptKeyword("COLUMNSTORE") !== undefined;
	c.expectKeyword("INDEX");
	c.acceptKeywords("IF", "NOT", "EXISTS");
	const name = c.readIdentifier();
	c.expectKeyword("ON");
	const table = c.readName();
	const columns = isPunct(c.peek(), "(") ? parseColumnRefs(c) : [];
	if (columns.length === 0 && !columnstore) throw new SyntaxMismatch("Index without columns");

	let include: string[] = [];
	if (c.acceptKeyword("INCLUDE")) include = parseNameList(c);

	let where: string | undefined;
	if (c.acceptKeyword("WHERE")) {
		where = c.textOf(c.readUntilKeyword(["WITH", "ON"]));
	}

	const storage = parseStorageClauses(c);
	c.expectEnd();
	return { kind: "index", span, text, name, table, unique, clustering, columnstore, columns, include, where, storage };
}

// --- ALTER TABLE ---

function parseAlterTable(c: Cursor, span: SourceSpan, text: string): StatementNode {
	const table = c.readName();
	let action: AlterTableAction;

	if (c.acceptKeywords("ALTER", "COLUMN")) {
		const column = c.readIdentifier();
		c.expectKeyword("SET");
		c.expectKeyword("DEFAULT");
		const value = parseDefaultExpression(c.rest(), c.source);
		action = { kind: "addDefault", name: undefined, column, value };
		return { kind: "alterTable", span, text, table, action };
	}

	let noCheck = false;
	if (c.acceptKeyword("WITH")) {
		noCheck = c.expectKeyword("CHECK", "NOCHECK") === "NOCHECK";
	}

	if (c.acceptKeywords("CHECK", "CONSTRAINT")) {
		const name = c.readIdentifier();
		c.expectEnd();
		action = { kind: "checkConstraint", name };
		return { kind: "alterTable", span, text, table, action };
	}

	c.expectKeyword("ADD");
	let name: string | undefined;
	if (c.acceptKeyword("CONSTRAINT")) name = c.readIdentifier();

	if (c.acceptKeyword("DEFAULT")) {
		const value = parseDefaultExpression(c.readUntilKeyword(["FOR"]), c.source);
		c.expectKeyword("FOR");
		const column = c.readIdentifier();
		c.expectEnd();
		action = { kind: "addDefault", name, column, value };
		return { kind: "alterTable", span, text, table, action };
	}

	const constraint = parseConstraintBody(c, name, undefined);
	if (c.acceptKeywords("NOT", "VALID")) noCheck = true;
	c.expectEnd();
	action = { kind: "addConstraint", constraint, noCheck };
	return { kind: "alterTable", span, text, table, action };
}

// --- Extended properties ---

const PROPERTY_PARAMETERS = [
	"@name", "@value",
	"@level0type", "@level0name",
	"@level1type", "@level1name",
	"@level2type", "@level2name",
];

function parseAddExtendedProperty(c: Cursor, span: SourceSpan, text: string): ExtendedPropertyNode {
	const procedure = c.readName();
	const last = procedure.parts[procedure.parts.length - 1];
	if (last.toLowerCase() !== "sp_addextendedproperty") throw new SyntaxMismatch("Not an extended property call");

	const values = new Map<string, string | undefined>();
	splitTopLevel(c.rest()).forEach((part, index) => {
		const arg = new Cursor(part, c.source);
		let parameter = PROPERTY_PARAMETERS[index];
		const first = arg.peek();
		if (first?.kind === "word" && first.value.startsWith("@") && isPunct(arg.peek(1), "=")) {
			parameter = first.value.toLowerCase();
			arg.next();
			arg.next();
		}
		if (parameter === undefined) throw new SyntaxMismatch("Too many arguments");
		values.set(parameter, readPropertyValue(arg));
	});

	const property = values.get("@name");
	if (property === undefined) throw new SyntaxMismatch("Extended property without a name");

	const levels: PropertyLevel[] = [];
	for (const level of [0, 1, 2]) {
		const type = values.get(`@level${level}type`);
		const name = values.get(`@level${level}name`);
		if (type !== undefined && name !== undefined) levels.push({ type: type.toUpperCase(), name });
	}

	return { kind: "extendedProperty", span, text, property, value: values.get("@value"), levels };
}

function readPropertyValue(c: Cursor): string | undefined {
	const token = c.next();
	c.expectEnd();
	if (token.kind === "string" || token.kind === "number") return token.value;
	if (isKeyword(token, "NULL")) return undefined;
	if (token.kind === "word" || token.kind === "quoted") return token.value;
	throw new SyntaxMismatch("Unsupported property value");
}

function parseCommentOn(c: Cursor, span: SourceSpan, text: string): ExtendedPropertyNode {
	const level = c.expectKeyword("SCHEMA", "TABLE", "COLUMN");
	const parts = c.readName().parts;
	c.expectKeyword("IS");
	const token = c.next();
	c.expectEnd();
	let value: string | undefined;
	if (token.kind === "string") value = token.value;
	else if (!isKeyword(token, "NULL")) throw new SyntaxMismatch("Expected comment text");

	const expected = level === "SCHEMA" ? [1] : level === "TABLE" ? [1, 2] : [2, 3];
	if (!expected.includes(parts.length)) throw new SyntaxMismatch("Unexpected name length");

	const types = level === "SCHEMA"
		? ["SCHEMA"]
		: level === "TABLE"
			? ["SCHEMA", "TABLE"].slice(2 - parts.length)
			: ["SCHEMA", "TABLE", "COLUMN"].slice(3 - parts.length);
	const levels = parts.map((name, index) => ({ type: types[index], name }));

	return { kind: "extendedProperty", span, text, property: "Description", value, levels };
}
