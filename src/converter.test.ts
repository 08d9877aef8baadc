import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { collectTables, convertBatch, planBatch, prepareText } from "./converter";
import { NoTableError, OutputLockedError, ParseError } from "./errors";
import { parseReport } from "./report";
import { OutputTree } from "./outputTree";
import type { FileResult } from "./converter";

const ACCOUNTS = `CREATE TABLE [Sales].[Accounts] (
    [AccountID] INT NOT NULL DEFAULT (NEXT VALUE FOR [Sequences].[AccountID]),
    [RegionID]  INT NOT NULL,
    CONSTRAINT [FK_Accounts_Regions] FOREIGN KEY ([RegionID]) REFERENCES [Sales].[Regions] ([RegionID])
);
GO
`;

const REGIONS = `CREATE TABLE [Sales].[Regions] (
    [RegionID] INT NOT NULL,
    CONSTRAINT [PK_Regions] PRIMARY KEY CLUSTERED ([RegionID])
);
GO
`;

const ACCOUNT_SEQUENCE = "CREATE SEQUENCE [Sequences].[AccountID] AS INT START WITH 500 INCREMENT BY 1;\nGO\n";

const NOW = () => new Date("2026-01-02T03:04:05Z");

function fileNames(results: readonly FileResult[]): string[] {
	return results.map(r => `${r.status} ${path.basename(r.file)}`);
}

function converted(results: readonly FileResult[], name: string) {
	const result = results.find(r => path.basename(r.file) === name);
	if (result?.status !== "converted") throw new Error(`${name} was not converted`);
	return result;
}

describe("convertBatch", () => {
	let root: string;
	let input: string;
	let output: string;

	function writeInput(relative: string, content: string): string {
		const file = path.join(input, relative);
		fs.mkdirSync(path.dirname(file), { recursive: true });
		fs.writeFileSync(file, content);
		return file;
	}

	beforeEach(() => {
		root = fs.mkdtempSync(path.join(os.tmpdir(), "ddl-convert-"));
		input = path.join(root, "in");
		output = path.join(root, "out");
		writeInput("Sales/Tables/Accounts.sql", ACCOUNTS);
		writeInput("Sales/Tables/Regions.sql", REGIONS);
		writeInput("Sequences/Sequences/AccountID.sql", ACCOUNT_SEQUENCE);
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	test("converts referenced tables first and resolves sequences from the input tree", () => {
		const { results, cycles } = convertBatch(input, { output, now: NOW });

		expect(fileNames(results)).toEqual(["converted Regions.sql", "converted Accounts.sql"]);
		expect(cycles).toEqual([]);

		const accounts = converted(results, "Accounts.sql");
		expect(accounts.outputPath).toBe(path.join(output, "Sales", "Tables", "Accounts.sql"));
		expect(accounts.objects).toEqual([{ schema: "sales", table: "accounts" }]);
		expect(accounts.report.dependencies).toBeUndefined();

		const ddl = fs.readFileSync(accounts.outputPath, "utf-8");
		expect(ddl).toContain("CREATE SEQUENCE IF NOT EXISTS sequences.account_id_seq AS INTEGER START 500 INCREMENT 1;\n");
		expect(ddl.split("\n")).toContain("    AccountID INTEGER        DEFAULT nextval('sequences.account_id_seq') NOT NULL,");

		const report = parseReport(fs.readFileSync(path.join(output, "Sales", "Tables", "Accounts.report.json"), "utf-8"));
		expect(report.convertedAt).toBe("2026-01-02T03:04:05.000Z");
		expect(report.sourceFile).toBe(path.join(input, "Sales", "Tables", "Accounts.sql"));
		expect(report.diagnostics).toEqual([]);
	});

	test("reports references to tables without output as pending", () => {
		const { results } = convertBatch(path.join(input, "Sales", "Tables", "Accounts.sql"), { output, now: NOW });

		expect(converted(results, "Accounts.sql").report.dependencies).toEqual([
			{ target: "sales.regions", columns: ["RegionID"], owners: ["sales.accounts"], status: "pending" },
		]);
		expect(fs.readdirSync(path.join(output, "Sales", "Tables")).sort()).toEqual(["Accounts.report.json", "Accounts.sql"]);
	});

	test("picks up output written by an earlier run", () => {
		convertBatch(path.join(input, "Sales", "Tables", "Regions.sql"), { output, now: NOW });
		const { results } = convertBatch(path.join(input, "Sales", "Tables", "Accounts.sql"), { output, now: NOW });

		expect(converted(results, "Accounts.sql").report.dependencies).toBeUndefined();
	});

	test("reports references with no source anywhere as missing", () => {
		writeInput(
			"Sales/Tables/Visits.sql",
			"CREATE TABLE [Sales].[Visits] ([GhostID] INT NULL, CONSTRAINT [FK_Visits_Ghosts] FOREIGN KEY ([GhostID]) REFERENCES [Sales].[Ghosts] ([GhostID]))"
		);
		const { results } = convertBatch(input, { output, now: NOW });

		expect(converted(results, "Visits.sql").report.dependencies).toEqual([
			{ target: "sales.ghosts", columns: ["GhostID"], owners: ["sales.visits"], status: "missing-source" },
		]);
	});

	test("looks up sources and sequences across the whole tree when converting one schema", () => {
		writeInput("Application/Tables/People.sql", "CREATE TABLE [Application].[People] ([PersonID] INT NOT NULL)");
		writeInput(
			"Sales/Tables/Visits.sql",
			"CREATE TABLE [Sales].[Visits] ([PersonID] INT NULL, CONSTRAINT [FK_Visits_People] FOREIGN KEY ([PersonID]) REFERENCES [Application].[People] ([PersonID]))"
		);

		const { results } = convertBatch(path.join(input, "Sales"), { output, now: NOW });

		expect(fileNames(results)).toEqual(["converted Regions.sql", "converted Accounts.sql", "converted Visits.sql"]);
		expect(converted(results, "Visits.sql").report.dependencies).toEqual([
			{ target: "application.people", columns: ["PersonID"], owners: ["sales.visits"], status: "pending" },
		]);
		const accounts = converted(results, "Accounts.sql");
		expect(accounts.report.diagnostics).toEqual([]);
		expect(fs.readFileSync(accounts.outputPath, "utf-8")).toContain(
			"CREATE SEQUENCE IF NOT EXISTS sequences.account_id_seq AS INTEGER START 500 INCREMENT 1;\n"
		);
	});

	test("gives every table of a file output so references to any of them resolve", () => {
		writeInput(
			"Sales/Tables/Orders.sql",
			`CREATE TABLE [Sales].[Orders] ([OrderID] INT NOT NULL, CONSTRAINT [PK_Orders] PRIMARY KEY ([OrderID]));
GO
CREATE TABLE [Sales].[OrderLines] (
    [OrderLineID] INT NOT NULL,
    [OrderID]     INT NOT NULL,
    CONSTRAINT [PK_OrderLines] PRIMARY KEY ([OrderLineID]),
    CONSTRAINT [FK_OrderLines_Orders] FOREIGN KEY ([OrderID]) REFERENCES [Sales].[Orders] ([OrderID])
);
GO
`
		);
		writeInput(
			"Sales/Tables/Invoices.sql",
			"CREATE TABLE [Sales].[Invoices] ([OrderLineID] INT NOT NULL, CONSTRAINT [FK_Invoices_OrderLines] FOREIGN KEY ([OrderLineID]) REFERENCES [Sales].[OrderLines] ([OrderLineID]))"
		);

		const { results } = convertBatch(input, { output, now: NOW });

		expect(fileNames(results)).toEqual([
			"converted Regions.sql",
			"converted Accounts.sql",
			"converted Orders.sql",
			"converted Invoices.sql",
		]);
		const orders = converted(results, "Orders.sql");
		const pointer = path.join(output, "Sales", "Tables", "OrderLines.sql");
		expect(orders.outputPath).toBe(path.join(output, "Sales", "Tables", "Orders.sql"));
		expect(orders.pointerPaths).toEqual([pointer]);
		expect(fs.readFileSync(pointer, "utf-8")).toBe("-- Sales.OrderLines is created in Orders.sql\n");
		expect(parseReport(fs.readFileSync(path.join(output, "Sales", "Tables", "OrderLines.report.json"), "utf-8")).objects).toEqual([
			"sales.orders",
			"sales.orderlines",
		]);
		expect(new OutputTree(output).hasOutput({ schema: "sales", table: "orderlines" })).toBe(true);
		expect(converted(results, "Invoices.sql").report.dependencies).toBeUndefined();
	});

	test("lists failing files first and converts the rest", () => {
		writeInput("Sales/Tables/Broken.sql", "CREATE TABLE [Sales].[Broken] ([Note] NVARCHAR(10) DEFAULT 'oops)");
		writeInput("Sales/Tables/NoTable.sql", "CREATE VIEW [Sales].[Totals] AS SELECT 1 AS [One]");

		const { results } = convertBatch(input, { output, now: NOW });

		expect(fileNames(results)).toEqual([
			"failed Broken.sql",
			"failed NoTable.sql",
			"converted Regions.sql",
			"converted Accounts.sql",
		]);
		const [broken, noTable] = results;
		expect(broken.status === "failed" && broken.error).toBeInstanceOf(ParseError);
		expect(noTable.status === "failed" && noTable.error).toBeInstanceOf(NoTableError);
		expect(fs.existsSync(path.join(output, "Sales", "Tables", "Broken.sql"))).toBe(false);
	});

	test("fails a locked output without stopping the batch", () => {
		fs.mkdirSync(path.join(output, "Sales", "Tables"), { recursive: true });
		fs.writeFileSync(path.join(output, "Sales", "Tables", "Regions.sql.lock"), "");

		const { results } = convertBatch(input, { output, now: NOW });

		expect(fileNames(results)).toEqual(["failed Regions.sql", "converted Accounts.sql"]);
		const [regions] = results;
		expect(regions.status === "failed" && regions.error).toBeInstanceOf(OutputLockedError);
		expect(converted(results, "Accounts.sql").report.dependencies?.map(d => d.target)).toEqual(["sales.regions"]);
	});

	test("writes nothing in a dry run", () => {
		const { results } = convertBatch(input, { output, dryRun: true, now: NOW });

		expect(fileNames(results)).toEqual(["converted Regions.sql", "converted Accounts.sql"]);
		expect(converted(results, "Accounts.sql").outputPath).toBe(path.join(output, "Sales", "Tables", "Accounts.sql"));
		expect(fs.existsSync(output)).toBe(false);
	});

	test("notes foreign-key cycles in the reports of the tables involved", () => {
		writeInput(
			"Sales/Tables/Regions.sql",
			"CREATE TABLE [Sales].[Regions] ([RegionID] INT NOT NULL, [HeadAccountID] INT NULL, CONSTRAINT [FK_Regions_Accounts] FOREIGN KEY ([HeadAccountID]) REFERENCES [Sales].[Accounts] ([AccountID]))"
		);

		const { results, cycles } = convertBatch(input, { output, now: NOW });

		expect(cycles).toEqual([
			{
				kind: "dependency-cycle",
				subject: "sales.accounts, sales.regions",
				message: "Foreign keys form a cycle: sales.accounts → sales.regions → sales.accounts",
			},
		]);
		expect(converted(results, "Regions.sql").report.diagnostics).toEqual(cycles);
		expect(converted(results, "Accounts.sql").report.diagnostics).toEqual(cycles);
	});
});

describe("planBatch", () => {
	let root: string;

	beforeEach(() => {
		root = fs.mkdtempSync(path.join(os.tmpdir(), "ddl-plan-"));
		fs.mkdirSync(path.join(root, "in", "Sales", "Tables"), { recursive: true });
		fs.writeFileSync(path.join(root, "in", "Sales", "Tables", "Accounts.sql"), ACCOUNTS);
		fs.writeFileSync(path.join(root, "in", "Sales", "Tables", "Regions.sql"), REGIONS);
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	test("lists unresolved dependencies per file without writing", () => {
		const output = path.join(root, "out");
		const { plan, failures } = planBatch(path.join(root, "in"), { output });

		expect(failures).toEqual([]);
		expect([...plan.keys()].map(f => path.basename(f))).toEqual(["Regions.sql", "Accounts.sql"]);
		expect(plan.get(path.join(root, "in", "Sales", "Tables", "Regions.sql"))).toEqual([]);
		expect(plan.get(path.join(root, "in", "Sales", "Tables", "Accounts.sql"))?.map(d => [d.target.table, d.status])).toEqual([
			["regions", "pending"],
		]);
		expect(fs.existsSync(output)).toBe(false);
	});

	test("collects the tables of every file for diagrams", () => {
		const tables = collectTables(path.join(root, "in"), {});
		expect(tables.map(t => t.key.table)).toEqual(["regions", "accounts"]);
	});
});

describe("prepareText", () => {
	test("names the file in the error when it holds no table", () => {
		expect(() => prepareText("CREATE SEQUENCE s START WITH 1", "Sequences.sql", { defaultSchema: "dbo" })).toThrow(
			"No CREATE TABLE statement found in Sequences.sql"
		);
	});

	test("fails the whole file on a parse error", () => {
		expect(() => prepareText("CREATE TABLE a (x INT)\nGO\nCREATE TABLE b (y INT", "Two.sql", { defaultSchema: "dbo" })).toThrow(
			ParseError
		);
	});
});
