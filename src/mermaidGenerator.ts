import type { TargetConstraint, TargetTable } from "./model";
import { objectKeyId } from "./model";
import { formatDataType } from "./typeMapping";

export interface MermaidOptions {
	/** Include column details in tables */
	readonly showColumns?: boolean;
	/** Draw ON DELETE CASCADE references with a solid line */
	readonly highlightCompositions?: boolean;
}

interface Reference {
	readonly name: string | undefined;
	readonly fromTable: string;
	readonly fromColumns: readonly string[];
	readonly toTable: string;
	readonly onDelete: string | undefined;
}

/**
 * Generate a Mermaid ER diagram of converted tables and the foreign keys
 * between them. Referenced tables outside the set appear as empty entities.
 */
export function generateMermaid(tables: readonly TargetTable[], options: MermaidOptions = {}): string {
	const showColumns = options.showColumns ?? true;
	const highlightCompositions = options.highlightCompositions ?? true;

	const references: Reference[] = tables.flatMap(table =>
		foreignKeys(table).map(fk => ({
			name: fk.name,
			fromTable: objectKeyId(table.key),
			fromColumns: fk.columns.map(c => c.name),
			toTable: objectKeyId(fk.table),
			onDelete: fk.onDelete,
		}))
	);

	const lines: string[] = ["erDiagram"];

	const declared = new Set<string>();
	for (const table of tables) {
		const tableName = objectKeyId(table.key);
		if (declared.has(tableName)) continue;
		declared.add(tableName);

		lines.push(`    ${entityName(tableName)} {`);
		if (showColumns) {
			const primaryKey = table.elements.flatMap(e =>
				e.kind === "constraint" && e.constraint.kind === "primaryKey" ? e.constraint.columns.map(c => c.name) : []
			);
			for (const element of table.elements) {
				if (element.kind !== "column") continue;
				const column = element.column;
				const isPK = primaryKey.includes(column.name);
				const isFK = references.some(r => r.fromTable === tableName && r.fromColumns.includes(column.name));
				// Mermaid supports comma-separated keys like "PK,FK" but not "PK FK"
				const keyMarker = isPK && isFK ? " PK,FK" : isPK ? " PK" : isFK ? " FK" : "";
				const nullComment = column.nullable === false ? "" : ' "nullable"';
				lines.push(
					`        ${attributeType(formatDataType(column.type))} ${attributeName(column.name)}${keyMarker}${nullComment}`
				);
			}
		}
		lines.push("    }");
	}

	// Tables referenced but not part of this set
	for (const reference of references) {
		if (declared.has(reference.toTable)) continue;
		declared.add(reference.toTable);
		lines.push(`    ${entityName(reference.toTable)} {`);
		lines.push("    }");
	}

	for (const reference of references) {
		// CASCADE (composition) uses solid line --, others dotted ..
		const lineStyle = highlightCompositions && reference.onDelete === "CASCADE" ? "--" : "..";
		const label = (reference.name ?? reference.fromColumns.join(" ")).replace(/_/g, " ");

		// toTable (referenced) has exactly one (||), fromTable (FK holder) has many (o{)
		lines.push(
			`    ${entityName(reference.toTable)} ||${lineStyle}o{ ${entityName(reference.fromTable)} : "${label.replace(/"/g, "'")}"`
		);
	}

	return lines.join("\n");
}

function foreignKeys(table: TargetTable): {
	name: string | undefined;
	columns: TargetConstraint["columns"];
	table: TargetTable["key"];
	onDelete: string | undefined;
}[] {
	return table.elements.flatMap(element => {
		if (element.kind !== "constraint" || element.constraint.references === undefined) return [];
		const { name, columns, references } = element.constraint;
		return [{ name, columns, table: references.table, onDelete: references.onDelete }];
	});
}

const BARE_ENTITY = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Table names that are not plain words go in double quotes. */
function entityName(name: string): string {
	return BARE_ENTITY.test(name) ? name : `"${name.replace(/"/g, '\\"')}"`;
}

/** Mermaid ER has no quoting for attributes, so anything but a word character becomes `_`. */
function attributeName(name: string): string {
	return name.replace(/\W/g, "_");
}

const MERMAID_TYPES = new Map<string, string>([
	["text", "string"],
	["varchar", "string"],
	["char", "string"],
	["smallint", "int"],
	["integer", "int"],
	["bigint", "bigint"],
	["real", "float"],
	["double precision", "float"],
	["numeric", "float"],
	["boolean", "bool"],
	["uuid", "uuid"],
	["date", "date"],
	["timestamp", "timestamp"],
	["timestamptz", "timestamp"],
	["time", "time"],
	["json", "json"],
	["jsonb", "json"],
	["bytea", "bytes"],
]);

/** Short attribute type for a column; length and precision are left out. */
function attributeType(pgType: string): string {
	const base = pgType.toLowerCase().replace(/\(.+\)/, "").trim();
	return MERMAID_TYPES.get(base) ?? attributeName(base);
}
