import * as fs from "fs";
import * as path from "path";
import type { ConversionState, DependencyEdge, Diagnostic, ObjectKey, TargetTable } from "./model";
import { objectKeyId } from "./model";
import { NoTableError } from "./errors";
import { parseDdl } from "./parser";
import { DEFAULT_SCHEMA, transformStatements, type TransformContext, type TransformResult } from "./transformer";
import { extractDependencies, findDependencyCycles, orderByDependency } from "./dependencies";
import { planDependencies, type SourceCatalog, type UnresolvedDependency } from "./orchestrator";
import { emitDdl } from "./emitter";
import { createReportEnvelope, generateReport, serializeReport, type ConversionReport } from "./report";
import { discoverTableFiles, inferInputRoot, InputTree } from "./inputTree";
import { OutputTree, outputPath } from "./outputTree";

export interface ConvertOptions {
	/** Root of the output tree */
	readonly output: string;
	/** Root of the input tree, for sequence definitions and source lookups */
	readonly inputRoot?: string;
	/** Schema for unqualified names (default: dbo) */
	readonly defaultSchema?: string;
	/** Convert without writing anything */
	readonly dryRun?: boolean;
	/** Clock for the report timestamp */
	readonly now?: () => Date;
}

export interface PreparedFile {
	readonly file: string;
	readonly transform: TransformResult;
	readonly tables: readonly TargetTable[];
	readonly edges: readonly DependencyEdge[];
}

export type FileResult =
	| {
		readonly status: "converted";
		readonly file: string;
		readonly objects: readonly ObjectKey[];
		readonly outputPath: string;
		/** DDL files of the file's other tables, each naming `outputPath`. */
		readonly pointerPaths: readonly string[];
		readonly report: ConversionReport;
	}
	| {
		readonly status: "failed";
		readonly file: string;
		readonly error: Error;
	};

export interface BatchResult {
	/** Failed preparations first, then conversions in dependency order. */
	readonly results: readonly FileResult[];
	readonly cycles: readonly Diagnostic[];
}

/**
 * Parse and transform one file's text. A parse error anywhere in the text
 * fails the whole file, as does the absence of a CREATE TABLE.
 */
export function prepareText(text: string, file: string, context: TransformContext): PreparedFile {
	const { statements, errors } = parseDdl(text);
	if (errors.length > 0) throw errors[0];

	const transform = transformStatements(statements, context);
	const tables = transform.statements.filter((s): s is TargetTable => s.kind === "table");
	if (tables.length === 0) throw new NoTableError(file);

	return { file, transform, tables, edges: extractDependencies(transform.statements) };
}

/**
 * Produce DDL and report for a prepared file against the current state.
 */
export function renderPrepared(
	prepared: PreparedFile,
	state: ConversionState,
	sources?: SourceCatalog,
	cycles: readonly Diagnostic[] = []
): { ddl: string; report: ConversionReport; unresolved: UnresolvedDependency[] } {
	const unresolved = planDependencies(prepared.edges, state, sources);
	const ids = prepared.tables.map(t => objectKeyId(t.key));
	const relevantCycles = cycles.filter(note => note.subject.split(", ").some(subject => ids.includes(subject)));
	const report = generateReport({
		sourceFile: prepared.file,
		objects: prepared.tables.map(t => t.key),
		tags: prepared.transform.tags,
		unresolved,
		flags: prepared.transform.flags,
		diagnostics: [...prepared.transform.diagnostics, ...relevantCycles],
	});
	return { ddl: emitDdl(prepared.transform.statements), report, unresolved };
}

interface PreparedBatch {
	readonly failures: readonly FileResult[];
	/** In dependency order, parents first. */
	readonly files: readonly PreparedFile[];
	readonly sources: SourceCatalog;
	readonly cycles: readonly Diagnostic[];
}

function prepareBatch(target: string, options: ConvertOptions): PreparedBatch {
	const defaultSchema = options.defaultSchema ?? DEFAULT_SCHEMA;
	const inputRoot = options.inputRoot ?? inferInputRoot(target);
	const input = inputRoot === undefined ? undefined : new InputTree(inputRoot, defaultSchema);
	const context: TransformContext = {
		defaultSchema,
		resolveSequence: key => input?.resolveSequence(key),
	};

	const failures: FileResult[] = [];
	const prepared: PreparedFile[] = [];
	for (const file of discoverTableFiles(target)) {
		try {
			prepared.push(prepareText(fs.readFileSync(file, "utf-8"), file, context));
		} catch (error) {
			failures.push({ status: "failed", file, error: toError(error) });
		}
	}

	const batchKeys = new Set(prepared.flatMap(p => p.tables.map(t => objectKeyId(t.key))));
	const sources: SourceCatalog = {
		hasSource: key => batchKeys.has(objectKeyId(key)) || (input?.hasSource(key) ?? false),
	};
	const cycles = findDependencyCycles(prepared.flatMap(p => p.edges));
	return { failures, files: orderFiles(prepared), sources, cycles };
}

/**
 * Convert one file or every table file under a directory.
 * Files are converted parents first; a failing file never stops the batch.
 */
export function convertBatch(target: string, options: ConvertOptions): BatchResult {
	const batch = prepareBatch(target, options);
	const state = new OutputTree(options.output);
	const results: FileResult[] = [...batch.failures];

	for (const file of batch.files) {
		try {
			const { ddl, report } = renderPrepared(file, state, batch.sources, batch.cycles);
			const now = options.now?.() ?? new Date();
			const [primary, ...others] = distinctSourceNames(file.tables);
			const write = (name: SourceName, text: string) =>
				options.dryRun
					? outputPath(options.output, name.schema, name.table)
					: state.write(name.schema, name.table, text, serializeReport(createReportEnvelope(report, now, text)));

			const written = write(primary, ddl);
			const pointerPaths = others.map(other => {
				const pointer = outputPath(options.output, other.schema, other.table);
				return write(other, pointerDdl(other, path.relative(path.dirname(pointer), written)));
			});
			results.push({
				status: "converted",
				file: file.file,
				objects: file.tables.map(t => t.key),
				outputPath: written,
				pointerPaths,
				report,
			});
		} catch (error) {
			results.push({ status: "failed", file: file.file, error: toError(error) });
		}
	}

	return { results, cycles: batch.cycles };
}

export interface PlanResult {
	readonly failures: readonly FileResult[];
	/** Unresolved dependencies per file, in dependency order. */
	readonly plan: ReadonlyMap<string, readonly UnresolvedDependency[]>;
	readonly cycles: readonly Diagnostic[];
}

/**
 * Unresolved dependencies of every file under `target` against the output
 * tree. Writes nothing.
 */
export function planBatch(target: string, options: ConvertOptions): PlanResult {
	const batch = prepareBatch(target, options);
	const state = new OutputTree(options.output);
	const plan = new Map<string, readonly UnresolvedDependency[]>();
	for (const file of batch.files) {
		plan.set(file.file, planDependencies(file.edges, state, batch.sources));
	}
	return { failures: batch.failures, plan, cycles: batch.cycles };
}

/** Tables of every file under `target` that parses, for diagrams. */
export function collectTables(target: string, options: Pick<ConvertOptions, "inputRoot" | "defaultSchema">): TargetTable[] {
	const batch = prepareBatch(target, { ...options, output: "" });
	return batch.files.flatMap(file => file.tables);
}

function orderFiles(prepared: readonly PreparedFile[]): PreparedFile[] {
	const owner = new Map<string, string>();
	for (const file of prepared) {
		for (const table of file.tables) owner.set(objectKeyId(table.key), file.file);
	}
	const dependsOn = new Map<string, Set<string>>();
	for (const file of prepared) {
		const deps = new Set<string>();
		for (const edge of file.edges) {
			const parent = owner.get(objectKeyId(edge.to));
			if (parent !== undefined && parent !== file.file) deps.add(parent);
		}
		dependsOn.set(file.file, deps);
	}
	return orderByDependency(prepared, file => file.file, dependsOn);
}

type SourceName = TargetTable["sourceName"];

/** Source spellings of the file's tables, first table first, without repeats. */
function distinctSourceNames(tables: readonly TargetTable[]): [SourceName, ...SourceName[]] {
	const [first, ...rest] = tables.map(t => t.sourceName);
	const seen = new Set([sourceNameId(first)]);
	const others: SourceName[] = [];
	for (const name of rest) {
		if (seen.has(sourceNameId(name))) continue;
		seen.add(sourceNameId(name));
		others.push(name);
	}
	return [first, ...others];
}

function sourceNameId(name: SourceName): string {
	return `${name.schema}.${name.table}`.toLowerCase();
}

/**
 * DDL file for a table that another file of the output creates. It holds no
 * statement, so applying every output file creates each table once.
 */
function pointerDdl(name: SourceName, target: string): string {
	return `-- ${name.schema}.${name.table} is created in ${target.split(path.sep).join("/")}\n`;
}

function toError(error: unknown): Error {
	if (error instanceof Error) return error;
	return new Error(String(error));
}
