import { describe, test, expect } from "vitest";
import Ajv from "ajv";
import addFormats from "ajv-formats";
import { parseDdl } from "./parser";
import { transformStatements } from "./transformer";
import { extractDependencies } from "./dependencies";
import { planDependencies } from "./orchestrator";
import { createReportEnvelope, generateReport, parseReport, reportJsonSchema, reportMatchesDdl, serializeReport } from "./report";
import { createObjectKey, emptyFeatureFlags } from "./model";
import type { ConversionReport } from "./report";

const ORDERS = `CREATE TABLE [Sales].[Orders] (
    [OrderID]    INT NOT NULL CONSTRAINT [DF_Sales_Orders_OrderID] DEFAULT (NEXT VALUE FOR [Sequences].[OrderID]),
    [CustomerID] INT NOT NULL,
    CONSTRAINT [PK_Sales_Orders] PRIMARY KEY CLUSTERED ([OrderID] ASC),
    CONSTRAINT [FK_Sales_Orders_CustomerID_Sales_Customers] FOREIGN KEY ([CustomerID]) REFERENCES [Sales].[Customers] ([CustomerID])
);`;

function ordersReport(): ConversionReport {
	const result = transformStatements(parseDdl(ORDERS).statements);
	const unresolved = planDependencies(extractDependencies(result.statements), { hasOutput: () => false });
	return generateReport({
		sourceFile: "Sales/Tables/Orders.sql",
		objects: [createObjectKey("sales", "orders")],
		tags: result.tags,
		unresolved,
		flags: result.flags,
		diagnostics: result.diagnostics,
	});
}

describe("generateReport", () => {
	test("groups rules by category in fixed order", () => {
		const report = ordersReport();

		expect(Object.keys(report.rules)).toEqual(["identifiers", "types", "defaults", "sequences", "constraints"]);
		expect(report.rules.types).toEqual([
			{ rule: "INT→INTEGER", count: 2, subjects: ["sales.orders.OrderID", "sales.orders.CustomerID"] },
		]);
		expect(report.rules.constraints).toEqual([
			{ rule: "CLUSTERED qualifier dropped", count: 1, subjects: ["PK_Sales_Orders"] },
			{ rule: "ASC/DESC dropped from constraint columns", count: 1, subjects: ["PK_Sales_Orders"] },
		]);
		expect(report.rules.defaults?.map(e => e.rule)).toEqual([
			"named default constraint unwrapped",
			"NEXT VALUE FOR → nextval()",
		]);
	});

	test("lists unresolved references", () => {
		const report = ordersReport();

		expect(report.objects).toEqual(["sales.orders"]);
		expect(report.dependencies).toEqual([
			{ target: "sales.customers", columns: ["CustomerID"], owners: ["sales.orders"], status: "pending" },
		]);
		expect(report.flags.needsManualReview).toBe(true);
		expect(report.diagnostics.map(d => d.kind)).toEqual(["missing-sequence"]);
	});

	test("counts repeated subjects once in the subject list", () => {
		const report = generateReport({
			sourceFile: "t.sql",
			objects: [],
			tags: [
				{ category: "review", rule: "WITH NOCHECK constraint now validated", subject: "FK_A" },
				{ category: "review", rule: "WITH NOCHECK constraint now validated", subject: "FK_A" },
			],
			unresolved: [],
			flags: emptyFeatureFlags(),
			diagnostics: [],
		});

		expect(report.rules).toEqual({
			review: [{ rule: "WITH NOCHECK constraint now validated", count: 2, subjects: ["FK_A"] }],
		});
		expect("dependencies" in report).toBe(false);
	});
});

describe("report file", () => {
	test("the schema is a valid JSON Schema", () => {
		const ajv = new Ajv({ strict: false });
		addFormats(ajv);
		expect(ajv.validateSchema(reportJsonSchema)).toBe(true);
	});

	test("serializes with tabs and reads back", () => {
		const envelope = createReportEnvelope(ordersReport(), new Date("2026-01-02T03:04:05Z"), "");
		const content = serializeReport(envelope);

		expect(content.endsWith("}\n")).toBe(true);
		expect(content.split("\n")[1]).toBe('\t"sourceFile": "Sales/Tables/Orders.sql",');
		expect(parseReport(content)).toEqual(envelope);
		expect(parseReport(content).convertedAt).toBe("2026-01-02T03:04:05.000Z");
	});

	test("rejects reports that break the schema", () => {
		const envelope = createReportEnvelope(ordersReport(), new Date("2026-01-02T03:04:05Z"), "");

		expect(() => parseReport(JSON.stringify({ ...envelope, convertedAt: "yesterday" }))).toThrow(
			'Invalid conversion report: /convertedAt must match format "date-time"'
		);
		expect(() => parseReport(JSON.stringify({ ...envelope, extra: 1 }))).toThrow(
			"Invalid conversion report: / must NOT have additional properties"
		);
	});

	test("records which DDL the report belongs to", () => {
		const ddl = "CREATE TABLE sales.orders (OrderID INTEGER);\n";
		const envelope = createReportEnvelope(ordersReport(), new Date("2026-01-02T03:04:05Z"), ddl);

		expect(createReportEnvelope(ordersReport(), new Date("2026-01-02T03:04:05Z"), "").ddlSha256).toBe(
			"e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
		);
		expect(reportMatchesDdl(parseReport(serializeReport(envelope)), ddl)).toBe(true);
		expect(reportMatchesDdl(envelope, "CREATE TABLE sales.orders (OrderID BIGINT);\n")).toBe(false);
		expect(() => parseReport(JSON.stringify({ ...envelope, ddlSha256: "abc" }))).toThrow(
			'Invalid conversion report: /ddlSha256 must match pattern "^[0-9a-f]{64}$"'
		);
	});
});
