import { describe, test, expect } from "vitest";
import { parseDdl } from "./parser";
import type { Column, StatementNode, TableNode } from "./model";

const ORDERS = `CREATE TABLE [Sales].[Orders] (
    [OrderID]    INT NOT NULL CONSTRAINT [DF_Sales_Orders_OrderID] DEFAULT (NEXT VALUE FOR [Sequences].[OrderID]),
    [CustomerID] INT NOT NULL,
    CONSTRAINT [PK_Sales_Orders] PRIMARY KEY CLUSTERED ([OrderID] ASC),
    CONSTRAINT [FK_Sales_Orders_CustomerID_Sales_Customers] FOREIGN KEY ([CustomerID]) REFERENCES [Sales].[Customers] ([CustomerID])
);`;

function single(sql: string): StatementNode {
	const { statements, errors } = parseDdl(sql);
	expect(errors).toEqual([]);
	expect(statements).toHaveLength(1);
	return statements[0];
}

function table(sql: string): TableNode {
	const node = single(sql);
	if (node.kind !== "table") throw new Error(`Expected a table, got ${node.kind}`);
	return node;
}

function columns(sql: string): Column[] {
	return table(sql).elements.flatMap(e => (e.kind === "column" ? [e.column] : []));
}

describe("parseDdl", () => {
	describe("CREATE TABLE", () => {
		test("reads columns and table constraints", () => {
			const node = table(ORDERS);

			expect(node.name).toEqual({ parts: ["Sales", "Orders"] });
			expect(node.span).toEqual({ start: 0, end: ORDERS.length, line: 1, column: 1 });
			expect(node.options).toEqual([]);
			expect(node.elements.map(e => e.kind)).toEqual(["column", "column", "constraint", "constraint"]);
			expect(node.elements[0]).toEqual({
				kind: "column",
				column: {
					name: "OrderID",
					type: { name: "INT", args: [] },
					nullable: false,
					default: { kind: "nextValue", sequence: { parts: ["Sequences", "OrderID"] } },
					defaultConstraintName: "DF_Sales_Orders_OrderID",
					identity: undefined,
					generatedAlways: undefined,
					hidden: false,
					collation: undefined,
					ordinal: 1,
					unmodeled: [],
				},
			});
			expect(node.elements[2]).toEqual({
				kind: "constraint",
				constraint: {
					kind: "primaryKey",
					name: "PK_Sales_Orders",
					columns: [{ name: "OrderID", direction: "ASC" }],
					clustering: "CLUSTERED",
					references: undefined,
					expression: undefined,
					storage: [],
				},
			});
			expect(node.elements[3]).toEqual({
				kind: "constraint",
				constraint: {
					kind: "foreignKey",
					name: "FK_Sales_Orders_CustomerID_Sales_Customers",
					columns: [{ name: "CustomerID", direction: undefined }],
					clustering: undefined,
					references: {
						table: { parts: ["Sales", "Customers"] },
						columns: ["CustomerID"],
						onDelete: undefined,
						onUpdate: undefined,
					},
					expression: undefined,
					storage: [],
				},
			});
		});

		test("reads structured defaults", () => {
			const parsed = columns(`CREATE TABLE t (
				a BIT DEFAULT ((0)),
				b DATETIME2 DEFAULT (getutcdate()),
				c UNIQUEIDENTIFIER DEFAULT NEWID(),
				d NVARCHAR(10) DEFAULT (N'it''s'),
				e INT DEFAULT ((-1)),
				f INT DEFAULT ([x]+(1)),
				g DATETIME DEFAULT (sysdatetime()),
				h INT DEFAULT nextval('sequences.order_id_seq')
			)`);

			expect(parsed.map(c => c.default)).toEqual([
				{ kind: "literal", value: "0" },
				{ kind: "currentTimestamp", utc: true },
				{ kind: "newGuid" },
				{ kind: "literal", value: "'it''s'" },
				{ kind: "literal", value: "-1" },
				{ kind: "expression", text: "[x]+(1)" },
				{ kind: "currentTimestamp", utc: false },
				{ kind: "sequenceCall", sequence: "sequences.order_id_seq" },
			]);
		});

		test("reads identity, collation and nullability", () => {
			const [id, name, note] = columns(
				"CREATE TABLE t ([ID] INT IDENTITY(100, 5) NOT NULL, [Name] NVARCHAR(50) COLLATE Latin1_General_CI_AS NULL, [Note] NVARCHAR(MAX))"
			);

			expect(id.identity).toEqual({ start: "100", increment: "5" });
			expect(id.nullable).toBe(false);
			expect(name.collation).toBe("Latin1_General_CI_AS");
			expect(name.nullable).toBe(true);
			expect(note.type).toEqual({ name: "NVARCHAR", args: ["MAX"] });
			expect(note.nullable).toBeUndefined();
		});

		test("reads the PostgreSQL identity spelling", () => {
			const [id] = columns("CREATE TABLE t (id INTEGER GENERATED BY DEFAULT AS IDENTITY (START WITH 10 INCREMENT BY 2) NOT NULL)");
			expect(id.identity).toEqual({ start: "10", increment: "2" });
		});

		test("keeps unknown column attributes verbatim", () => {
			const [id] = columns("CREATE TABLE t (id UNIQUEIDENTIFIER ROWGUIDCOL NOT NULL)");
			expect(id.unmodeled).toEqual(["ROWGUIDCOL"]);
			expect(id.nullable).toBe(false);
		});

		test("keeps computed columns and inline indexes as unmodeled elements", () => {
			const node = table("CREATE TABLE t (a INT, b AS (a * 2), INDEX ix_a (a), c INT)");
			expect(node.elements).toEqual([
				expect.objectContaining({ kind: "column" }),
				{ kind: "unmodeled", text: "b AS (a * 2)" },
				{ kind: "unmodeled", text: "INDEX ix_a (a)" },
				expect.objectContaining({ kind: "column" }),
			]);
			const ordinals = node.elements.flatMap(e => (e.kind === "column" ? [e.column.ordinal] : []));
			expect(ordinals).toEqual([1, 2]);
		});

		test("reads temporal tables", () => {
			const node = table(`CREATE TABLE [Sales].[Prices] (
    [PriceID]   INT NOT NULL,
    [ValidFrom] DATETIME2(7) GENERATED ALWAYS AS ROW START HIDDEN NOT NULL,
    [ValidTo]   DATETIME2(7) GENERATED ALWAYS AS ROW END HIDDEN NOT NULL,
    PERIOD FOR SYSTEM_TIME ([ValidFrom], [ValidTo])
) WITH (SYSTEM_VERSIONING = ON (HISTORY_TABLE = [Sales].[PricesHistory]));`);

			const [, validFrom, validTo] = node.elements.flatMap(e => (e.kind === "column" ? [e.column] : []));
			expect(validFrom.generatedAlways).toBe("rowStart");
			expect(validFrom.hidden).toBe(true);
			expect(validTo.generatedAlways).toBe("rowEnd");
			expect(node.elements[3]).toEqual({ kind: "period", startColumn: "ValidFrom", endColumn: "ValidTo" });
			expect(node.options).toEqual([
				{ kind: "systemVersioning", historyTable: { parts: ["Sales", "PricesHistory"] } },
			]);
		});

		test("reads storage and unknown table options", () => {
			const node = table("CREATE TABLE t (a INT) ON [PRIMARY] TEXTIMAGE_ON [PRIMARY] WITH (DATA_COMPRESSION = PAGE, LEDGER = ON)");
			expect(node.options).toEqual([
				{ kind: "storage", text: "ON PRIMARY" },
				{ kind: "storage", text: "TEXTIMAGE_ON PRIMARY" },
				{ kind: "storage", text: "DATA_COMPRESSION = PAGE" },
				{ kind: "unmodeled", text: "LEDGER = ON" },
			]);
		});

		test("reads inline column constraints with referential actions", () => {
			const node = table(
				"CREATE TABLE t (parent_id INT NULL CONSTRAINT fk_parent REFERENCES dbo.t (id) ON DELETE SET NULL ON UPDATE NO ACTION, id INT PRIMARY KEY)"
			);
			const constraints = node.elements.flatMap(e => (e.kind === "constraint" ? [e.constraint] : []));
			expect(constraints).toEqual([
				{
					kind: "foreignKey",
					name: "fk_parent",
					columns: [{ name: "parent_id", direction: undefined }],
					clustering: undefined,
					references: { table: { parts: ["dbo", "t"] }, columns: ["id"], onDelete: "SET NULL", onUpdate: "NO ACTION" },
					expression: undefined,
					storage: [],
				},
				{
					kind: "primaryKey",
					name: undefined,
					columns: [{ name: "id", direction: undefined }],
					clustering: undefined,
					references: undefined,
					expression: undefined,
					storage: [],
				},
			]);
		});
	});

	describe("statement splitting", () => {
		test("splits statements without semicolons at CREATE", () => {
			const { statements } = parseDdl("CREATE TABLE a (x INT)\nCREATE INDEX ix ON a (x)");
			expect(statements.map(s => s.kind)).toEqual(["table", "index"]);
		});

		test("keeps comment runs as their own passthroughs", () => {
			const { statements } = parseDdl("-- header\nCREATE TABLE a (x INT); -- trailing\n");
			expect(statements.map(s => [s.kind, s.text])).toEqual([
				["raw", "-- header"],
				["table", "CREATE TABLE a (x INT);"],
				["raw", "-- trailing"],
			]);
		});

		test("does not split ON DELETE SET NULL", () => {
			const { statements } = parseDdl("CREATE TABLE a (x INT REFERENCES b (id) ON DELETE SET NULL)");
			expect(statements.map(s => s.kind)).toEqual(["table"]);
		});

		test("keeps unrecognized statements verbatim", () => {
			const node = single("CREATE VIEW v AS SELECT 1");
			expect(node).toEqual({
				kind: "raw",
				span: { start: 0, end: 25, line: 1, column: 1 },
				text: "CREATE VIEW v AS SELECT 1",
				commentOnly: false,
			});
		});

		test("reads session options", () => {
			const { statements } = parseDdl("SET ANSI_NULLS ON\nGO\nSET QUOTED_IDENTIFIER ON\nGO\n");
			expect(statements.map(s => (s.kind === "sessionOption" ? `${s.option} ${s.value}` : s.kind))).toEqual([
				"ANSI_NULLS ON",
				"QUOTED_IDENTIFIER ON",
			]);
		});
	});

	describe("errors", () => {
		test("an unbalanced parenthesis fails only its own statement", () => {
			const { statements, errors } = parseDdl("CREATE TABLE a (x INT\nGO\nCREATE TABLE b (y INT)");
			expect(errors.map(e => e.message)).toEqual(["Unbalanced '(' at line 1, column 16"]);
			expect(errors[0].position).toEqual({ offset: 15, line: 1, column: 16 });
			expect(statements.map(s => s.kind)).toEqual(["table"]);
		});

		test("an unbalanced parenthesis ends at the next semicolon in the same batch", () => {
			const { statements, errors } = parseDdl("CREATE TABLE a (x INT;\nCREATE TABLE b (y INT);\nCREATE INDEX ix ON b (y);");
			expect(errors.map(e => e.message)).toEqual(["Unbalanced '(' at line 1, column 16"]);
			expect(statements.map(s => s.kind)).toEqual(["table", "index"]);
			expect(statements[0].kind === "table" && statements[0].name).toEqual({ parts: ["b"] });
		});

		test("an unbalanced parenthesis ends at the next statement keyword", () => {
			const { statements, errors } = parseDdl("CREATE TABLE a (x INT\nCREATE TABLE b (y INT)\nALTER TABLE b ADD CONSTRAINT pk PRIMARY KEY (y)");
			expect(errors.map(e => e.message)).toEqual(["Unbalanced '(' at line 1, column 16"]);
			expect(statements.map(s => s.kind)).toEqual(["table", "alterTable"]);
		});

		test("reports a stray closing parenthesis", () => {
			const { errors } = parseDdl("CREATE TABLE a (x INT))");
			expect(errors.map(e => e.reason)).toEqual(["Unbalanced ')'"]);
		});

		test("an unterminated literal fails its batch", () => {
			const { statements, errors } = parseDdl("CREATE TABLE b (y INT)\nGO\nCREATE TABLE a (x INT DEFAULT 'oops)");
			expect(errors.map(e => e.reason)).toEqual(["Unterminated string literal"]);
			expect(statements.map(s => s.kind)).toEqual(["table"]);
		});
	});

	describe("CREATE SEQUENCE", () => {
		test("reads the T-SQL spelling", () => {
			const node = single(
				"CREATE SEQUENCE [Sequences].[OrderID] AS INT START WITH 1000 INCREMENT BY 1 MINVALUE 1 NO MAXVALUE CACHE 50"
			);
			expect(node).toMatchObject({
				kind: "sequence",
				name: { parts: ["Sequences", "OrderID"] },
				dataType: { name: "INT", args: [] },
				start: "1000",
				increment: "1",
				minValue: "1",
				maxValue: undefined,
				cache: "50",
				cycle: false,
			});
		});

		test("reads the PostgreSQL spelling", () => {
			const node = single("CREATE SEQUENCE IF NOT EXISTS sequences.order_id_seq START 1 INCREMENT -1 CYCLE;");
			expect(node).toMatchObject({
				kind: "sequence",
				name: { parts: ["sequences", "order_id_seq"] },
				start: "1",
				increment: "-1",
				cycle: true,
			});
		});
	});

	describe("CREATE INDEX", () => {
		test("reads columns, INCLUDE, WHERE and storage clauses", () => {
			const node = single(
				"CREATE UNIQUE NONCLUSTERED INDEX [IX_Orders_Date] ON [Sales].[Orders] ([OrderDate] DESC) INCLUDE ([CustomerID]) WHERE ([OrderDate] IS NOT NULL) WITH (FILLFACTOR = 90) ON [PRIMARY]"
			);
			expect(node).toMatchObject({
				kind: "index",
				name: "IX_Orders_Date",
				table: { parts: ["Sales", "Orders"] },
				unique: true,
				clustering: "NONCLUSTERED",
				columnstore: false,
				columns: [{ name: "OrderDate", direction: "DESC" }],
				include: ["CustomerID"],
				where: "([OrderDate] IS NOT NULL)",
				storage: ["WITH (FILLFACTOR = 90)", "ON PRIMARY"],
			});
		});

		test("reads columnstore indexes without columns", () => {
			const node = single("CREATE CLUSTERED COLUMNSTORE INDEX [CCI_Orders] ON [Sales].[Orders]");
			expect(node).toMatchObject({ kind: "index", clustering: "CLUSTERED", columnstore: true, columns: [] });
		});
	});

	describe("ALTER TABLE", () => {
		test("reads ADD CONSTRAINT with NOCHECK", () => {
			const node = single(
				"ALTER TABLE [Sales].[Orders] WITH NOCHECK ADD CONSTRAINT [FK_Orders_Customers] FOREIGN KEY ([CustomerID]) REFERENCES [Sales].[Customers] ([CustomerID])"
			);
			expect(node).toMatchObject({
				kind: "alterTable",
				table: { parts: ["Sales", "Orders"] },
				action: {
					kind: "addConstraint",
					noCheck: true,
					constraint: { kind: "foreignKey", name: "FK_Orders_Customers" },
				},
			});
		});

		test("reads ADD DEFAULT ... FOR", () => {
			const node = single("ALTER TABLE [Sales].[Orders] ADD CONSTRAINT [DF_Qty] DEFAULT ((0)) FOR [Qty]");
			expect(node).toMatchObject({
				kind: "alterTable",
				action: { kind: "addDefault", name: "DF_Qty", column: "Qty", value: { kind: "literal", value: "0" } },
			});
		});

		test("reads CHECK CONSTRAINT", () => {
			const node = single("ALTER TABLE [Sales].[Orders] CHECK CONSTRAINT [FK_Orders_Customers]");
			expect(node).toMatchObject({ kind: "alterTable", action: { kind: "checkConstraint", name: "FK_Orders_Customers" } });
		});

		test("reads the PostgreSQL SET DEFAULT spelling", () => {
			const node = single("ALTER TABLE sales.orders\n    ALTER COLUMN Qty SET DEFAULT 5;");
			expect(node).toMatchObject({
				kind: "alterTable",
				action: { kind: "addDefault", name: undefined, column: "Qty", value: { kind: "literal", value: "5" } },
			});
		});
	});

	describe("extended properties", () => {
		test("reads named arguments", () => {
			const node = single(
				"EXEC sys.sp_addextendedproperty @name = N'MS_Description', @value = N'Customer orders', @level0type = N'SCHEMA', @level0name = N'Sales', @level1type = N'TABLE', @level1name = N'Orders';"
			);
			expect(node).toMatchObject({
				kind: "extendedProperty",
				property: "MS_Description",
				value: "Customer orders",
				levels: [
					{ type: "SCHEMA", name: "Sales" },
					{ type: "TABLE", name: "Orders" },
				],
			});
		});

		test("reads positional arguments", () => {
			const node = single(
				"EXECUTE sp_addextendedproperty 'MS_Description', 'Order id', 'schema', 'Sales', 'table', 'Orders', 'column', 'OrderID'"
			);
			expect(node).toMatchObject({
				kind: "extendedProperty",
				value: "Order id",
				levels: [
					{ type: "SCHEMA", name: "Sales" },
					{ type: "TABLE", name: "Orders" },
					{ type: "COLUMN", name: "OrderID" },
				],
			});
		});

		test("reads COMMENT ON as a description", () => {
			const node = single("COMMENT ON COLUMN sales.orders.OrderID IS 'Order id';");
			expect(node).toMatchObject({
				kind: "extendedProperty",
				property: "Description",
				value: "Order id",
				levels: [
					{ type: "SCHEMA", name: "sales" },
					{ type: "TABLE", name: "orders" },
					{ type: "COLUMN", name: "OrderID" },
				],
			});
		});

		test("other procedures stay raw", () => {
			expect(single("EXEC dbo.usp_refresh 1").kind).toBe("raw");
		});
	});
});
