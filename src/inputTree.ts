import * as fs from "fs";
import * as path from "path";
import type { ObjectKey, SequenceNode } from "./model";
import { createObjectKey, objectKeyId } from "./model";
import type { SourceCatalog } from "./orchestrator";
import { parseDdl } from "./parser";
import { sequenceKey } from "./identifiers";

/**
 * Table files to convert. A file is taken as is; a directory is searched
 * recursively for `*.sql` files inside `Tables` directories, or for any
 * `*.sql` file when it has no `Tables` directory at all.
 */
export function discoverTableFiles(target: string): string[] {
	if (fs.statSync(target).isFile()) return [target];

	const all = listSqlFiles(target);
	const inTables = all.filter(file => isTablesDir(path.dirname(file)));
	return inTables.length > 0 ? inTables : all;
}

function listSqlFiles(dir: string): string[] {
	const files: string[] = [];
	const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
	for (const entry of entries) {
		const full = path.join(dir, entry.name);
		if (entry.isDirectory()) files.push(...listSqlFiles(full));
		else if (entry.isFile() && entry.name.toLowerCase().endsWith(".sql")) files.push(full);
	}
	return files;
}

/**
 * Root of a `<root>/<Schema>/Tables/<Table>.sql` layout containing `target`,
 * if it sits in one. A `Tables` directory or a schema directory (one holding
 * `Tables`) points at the root above it; any other directory is a root itself.
 */
export function inferInputRoot(target: string): string | undefined {
	const resolved = path.resolve(target);
	if (fs.statSync(resolved).isDirectory()) {
		if (isTablesDir(resolved)) return path.dirname(path.dirname(resolved));
		const hasTables = fs.readdirSync(resolved, { withFileTypes: true }).some(entry => entry.isDirectory() && isTablesDir(entry.name));
		return hasTables ? path.dirname(resolved) : resolved;
	}
	const tablesDir = path.dirname(resolved);
	if (!isTablesDir(tablesDir)) return undefined;
	return path.dirname(path.dirname(tablesDir));
}

function isTablesDir(dir: string): boolean {
	return path.basename(dir).toLowerCase() === "tables";
}

/**
 * Tables and sequences an input tree defines, by file layout.
 */
export class InputTree implements SourceCatalog {
	private readonly _tables = new Set<string>();
	private readonly _sequences = new Map<string, SequenceNode>();

	constructor(
		readonly root: string,
		private readonly _defaultSchema: string
	) {
		if (!fs.existsSync(root)) return;
		for (const schema of fs.readdirSync(root, { withFileTypes: true })) {
			if (!schema.isDirectory()) continue;
			const schemaDir = path.join(root, schema.name);
			for (const kind of fs.readdirSync(schemaDir, { withFileTypes: true })) {
				if (!kind.isDirectory()) continue;
				const kindDir = path.join(schemaDir, kind.name);
				const files = fs.readdirSync(kindDir).filter(f => f.toLowerCase().endsWith(".sql"));
				if (kind.name.toLowerCase() === "tables") {
					for (const file of files) {
						this._tables.add(objectKeyId(createObjectKey(schema.name, file.slice(0, -4))));
					}
				} else if (kind.name.toLowerCase() === "sequences") {
					for (const file of files) this._addSequences(path.join(kindDir, file));
				}
			}
		}
	}

	private _addSequences(file: string): void {
		const { statements } = parseDdl(fs.readFileSync(file, "utf-8"));
		for (const statement of statements) {
			if (statement.kind !== "sequence") continue;
			const id = objectKeyId(sequenceKey(statement.name, this._defaultSchema));
			if (!this._sequences.has(id)) this._sequences.set(id, statement);
		}
	}

	hasSource(key: ObjectKey): boolean {
		return this._tables.has(objectKeyId(key));
	}

	resolveSequence(key: ObjectKey): SequenceNode | undefined {
		return this._sequences.get(objectKeyId(key));
	}
}
