import * as fs from "fs";
import * as path from "path";
import type { ConversionState, ObjectKey } from "./model";
import { OutputLockedError } from "./errors";

/**
 * Where the DDL of `schema.table` lives under `root`. Segments keep the
 * spelling they are given; lookups elsewhere ignore case.
 */
export function outputPath(root: string, schema: string, table: string): string {
	return path.join(root, schema, "Tables", `${table}.sql`);
}

/** Companion report beside a DDL file. */
export function reportPathFor(ddlPath: string): string {
	return ddlPath.replace(/\.sql$/i, "") + ".report.json";
}

/**
 * The persisted output tree. `hasOutput` is the only state shared across
 * runs: a table counts as converted once its DDL file exists.
 */
export class OutputTree implements ConversionState {
	constructor(readonly root: string) { }

	hasOutput(key: ObjectKey): boolean {
		return this.findOutput(key.schema, key.table) !== undefined;
	}

	/** Existing DDL path for `schema.table`, matched case-insensitively. */
	findOutput(schema: string, table: string): string | undefined {
		const schemaDir = findEntry(this.root, schema);
		if (schemaDir === undefined) return undefined;
		const tablesDir = findEntry(schemaDir, "Tables");
		if (tablesDir === undefined) return undefined;
		const file = findEntry(tablesDir, `${table}.sql`);
		return file !== undefined && fs.statSync(file).isFile() ? file : undefined;
	}

	/**
	 * Write DDL and report for one table as a pair. Existing directories are
	 * reused whatever their case.
	 */
	write(schema: string, table: string, ddl: string, report: string): string {
		const schemaDir = findEntry(this.root, schema) ?? path.join(this.root, schema);
		const tablesDir = findEntry(schemaDir, "Tables") ?? path.join(schemaDir, "Tables");
		const target = findEntry(tablesDir, `${table}.sql`) ?? path.join(tablesDir, `${table}.sql`);
		writeOutputAtomically(target, ddl, report);
		return target;
	}
}

function findEntry(dir: string, name: string): string | undefined {
	if (!fs.existsSync(dir)) return undefined;
	const exact = path.join(dir, name);
	if (fs.existsSync(exact)) return exact;
	const lower = name.toLowerCase();
	const match = fs.readdirSync(dir).find(entry => entry.toLowerCase() === lower);
	return match === undefined ? undefined : path.join(dir, match);
}

/**
 * Write both files under an exclusive `<ddl>.lock`. The report is renamed into
 * place first and the DDL last, so an existing DDL file always has a report.
 * A run that stops between the renames leaves a report whose DDL digest does
 * not match the file beside it; readers check it with `reportMatchesDdl`.
 * The lock and any temporaries are removed on every exit path.
 */
export function writeOutputAtomically(ddlPath: string, ddl: string, report: string): void {
	fs.mkdirSync(path.dirname(ddlPath), { recursive: true });

	const lockPath = `${ddlPath}.lock`;
	let lock: number;
	try {
		lock = fs.openSync(lockPath, "wx");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "EEXIST") {
			throw new OutputLockedError(ddlPath);
		}
		throw error;
	}

	const reportPath = reportPathFor(ddlPath);
	const suffix = `.${process.pid}.tmp`;
	const ddlTemp = ddlPath + suffix;
	const reportTemp = reportPath + suffix;
	try {
		fs.writeFileSync(reportTemp, report);
		fs.writeFileSync(ddlTemp, ddl);
		fs.renameSync(reportTemp, reportPath);
		fs.renameSync(ddlTemp, ddlPath);
	} finally {
		fs.rmSync(ddlTemp, { force: true });
		fs.rmSync(reportTemp, { force: true });
		fs.closeSync(lock);
		fs.rmSync(lockPath, { force: true });
	}
}
