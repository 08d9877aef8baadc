#!/usr/bin/env node
import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import { collectTables, convertBatch, planBatch, type FileResult } from "./converter";
import { loadConfig, type TranslateConfig } from "./config";
import { OutputTree, reportPathFor } from "./outputTree";
import { parseReport, reportMatchesDdl, type DependencyGroup } from "./report";
import { generateMermaid } from "./mermaidGenerator";
import type { UnresolvedDependency } from "./orchestrator";
import { objectKeyId } from "./model";

interface CommonOptions {
	output?: string;
	inputRoot?: string;
	defaultSchema?: string;
	config?: string;
}

interface ConvertCommandOptions extends CommonOptions {
	dryRun?: boolean;
}

interface GraphCommandOptions {
	inputRoot?: string;
	defaultSchema?: string;
	config?: string;
	output?: string;
	columns: boolean;
}

function resolveInput(target: string | undefined, config: TranslateConfig): string {
	const input = target ?? config.input;
	if (input === undefined) {
		throw new Error("No input given. Pass a file or directory, or set \"input\" in the config file.");
	}
	return input;
}

function resolveOutput(options: CommonOptions, config: TranslateConfig): string {
	const output = options.output ?? config.output;
	if (output === undefined) {
		throw new Error("No output directory given. Pass -o, or set \"output\" in the config file.");
	}
	return output;
}

function describeDependency(group: DependencyGroup): string {
	return `${group.target} (${group.status}) ← ${group.columns.join(", ")} [${group.owners.join(", ")}]`;
}

function toGroup(dependency: UnresolvedDependency): DependencyGroup {
	return {
		target: objectKeyId(dependency.target),
		columns: dependency.columns,
		owners: dependency.owners.map(objectKeyId),
		status: dependency.status,
	};
}

function printFailure(result: Extract<FileResult, { status: "failed" }>): void {
	console.error(`Failed ${result.file}: ${result.error.message}`);
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("ddl-translate")
		.description("Translate SQL Server table DDL into PostgreSQL DDL")
		.version("0.1.0");

	program
		.command("convert")
		.description("Convert a table file, or every table file under a directory")
		.argument("[path]", "Input file or directory")
		.option("-o, --output <dir>", "Root of the output tree")
		.option("--input-root <dir>", "Root of the input tree (for sequence definitions)")
		.option("--default-schema <name>", "Schema for unqualified names")
		.option("--dry-run", "Convert without writing output")
		.option("--config <file>", "Config file (default: ddl-translate.config.json)")
		.action((target: string | undefined, options: ConvertCommandOptions) => {
			const config = loadConfig(options.config);
			const input = resolveInput(target, config);
			const batch = convertBatch(input, {
				output: resolveOutput(options, config),
				inputRoot: options.inputRoot ?? config.inputRoot,
				defaultSchema: options.defaultSchema ?? config.defaultSchema,
				dryRun: options.dryRun,
			});

			let failed = 0;
			for (const result of batch.results) {
				if (result.status === "failed") {
					failed++;
					printFailure(result);
					continue;
				}
				const verb = options.dryRun ? "Would write" : "Converted";
				console.log(`${verb} ${result.file} → ${result.outputPath}`);
				for (const pointer of result.pointerPaths) {
					console.log(`  also ${pointer}`);
				}
				for (const group of result.report.dependencies ?? []) {
					console.log(`  unresolved: ${describeDependency(group)}`);
				}
				if (result.report.flags.needsManualReview) {
					console.log("  needs manual review");
				}
			}
			for (const note of batch.cycles) {
				console.log(`Note: ${note.message}`);
			}

			const converted = batch.results.length - failed;
			console.log(`Converted ${converted} file(s), ${failed} failed.`);
			if (failed > 0) process.exitCode = 1;
		});

	program
		.command("plan")
		.description("Show which referenced tables still need conversion")
		.argument("[path]", "Input file or directory")
		.option("-o, --output <dir>", "Root of the output tree")
		.option("--input-root <dir>", "Root of the input tree")
		.option("--default-schema <name>", "Schema for unqualified names")
		.option("--config <file>", "Config file (default: ddl-translate.config.json)")
		.action((target: string | undefined, options: CommonOptions) => {
			const config = loadConfig(options.config);
			const result = planBatch(resolveInput(target, config), {
				output: resolveOutput(options, config),
				inputRoot: options.inputRoot ?? config.inputRoot,
				defaultSchema: options.defaultSchema ?? config.defaultSchema,
			});

			for (const failure of result.failures) {
				if (failure.status === "failed") printFailure(failure);
			}
			for (const [file, groups] of result.plan) {
				console.log(file);
				if (groups.length === 0) {
					console.log("  all dependencies converted");
				}
				for (const group of groups) {
					console.log(`  ${describeDependency(toGroup(group))}`);
				}
			}
			if (result.failures.length > 0) process.exitCode = 1;
		});

	program
		.command("status")
		.description("Print the output path of a converted table; exit 1 if it has no output or a stale report")
		.argument("<schema>", "Schema name")
		.argument("<table>", "Table name")
		.option("-o, --output <dir>", "Root of the output tree")
		.option("--config <file>", "Config file (default: ddl-translate.config.json)")
		.action((schema: string, table: string, options: CommonOptions) => {
			const config = loadConfig(options.config);
			const tree = new OutputTree(resolveOutput(options, config));
			const found = tree.findOutput(schema, table);
			if (found === undefined) {
				console.error(`No output for ${schema}.${table}`);
				process.exitCode = 1;
				return;
			}

			console.log(found);
			const report = parseReport(fs.readFileSync(reportPathFor(found), "utf-8"));
			console.log(`  converted at ${report.convertedAt}`);
			if (!reportMatchesDdl(report, fs.readFileSync(found, "utf-8"))) {
				console.log("  report does not match the DDL beside it; convert the table again");
				process.exitCode = 1;
			}
			for (const group of report.dependencies ?? []) {
				console.log(`  unresolved: ${group.target} (${group.status})`);
			}
			if (report.flags.needsManualReview) {
				console.log("  needs manual review");
			}
		});

	program
		.command("graph")
		.description("Print the foreign-key graph as a Mermaid ER diagram")
		.argument("[path]", "Input file or directory")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.option("--input-root <dir>", "Root of the input tree")
		.option("--default-schema <name>", "Schema for unqualified names")
		.option("--no-columns", "Hide column details")
		.option("--config <file>", "Config file (default: ddl-translate.config.json)")
		.action((target: string | undefined, options: GraphCommandOptions) => {
			const config = loadConfig(options.config);
			const tables = collectTables(resolveInput(target, config), {
				inputRoot: options.inputRoot ?? config.inputRoot,
				defaultSchema: options.defaultSchema ?? config.defaultSchema,
			});
			const mermaid = generateMermaid(tables, { showColumns: options.columns, highlightCompositions: true });

			if (options.output) {
				fs.mkdirSync(path.dirname(path.resolve(options.output)), { recursive: true });
				fs.writeFileSync(options.output, mermaid + "\n");
				console.log(`Exported to ${options.output}`);
			} else {
				console.log(mermaid);
			}
		});

	return program;
}

if (require.main === module) {
	try {
		createProgram().parse();
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	}
}
