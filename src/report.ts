import * as crypto from "crypto";
import Ajv from "ajv";
import addFormats from "ajv-formats";
import type { Diagnostic, FeatureFlags, ObjectKey, RuleCategory, RuleTag } from "./model";
import { RULE_CATEGORIES, objectKeyId } from "./model";
import type { DependencyStatus, UnresolvedDependency } from "./orchestrator";

export interface RuleEntry {
	readonly rule: string;
	readonly count: number;
	/** Distinct subjects in first-seen order. */
	readonly subjects: readonly string[];
}

export interface DependencyGroup {
	readonly target: string;
	readonly columns: readonly string[];
	readonly owners: readonly string[];
	readonly status: DependencyStatus;
}

export interface ConversionReport {
	readonly sourceFile: string;
	readonly objects: readonly string[];
	/** Only triggered categories, in fixed category order. */
	readonly rules: Partial<Record<RuleCategory, readonly RuleEntry[]>>;
	/** Absent when every referenced table already has output. */
	readonly dependencies?: readonly DependencyGroup[];
	readonly flags: FeatureFlags;
	readonly diagnostics: readonly Diagnostic[];
}

/** The report as written next to the DDL. */
export interface ReportEnvelope extends ConversionReport {
	readonly convertedAt: string;
	/** SHA-256 of the DDL written with this report, hex encoded. */
	readonly ddlSha256: string;
}

export interface ReportInput {
	readonly sourceFile: string;
	readonly objects: readonly ObjectKey[];
	readonly tags: readonly RuleTag[];
	readonly unresolved: readonly UnresolvedDependency[];
	readonly flags: FeatureFlags;
	readonly diagnostics: readonly Diagnostic[];
}

/**
 * Aggregate applied-rule tags and unresolved dependencies into a report.
 */
export function generateReport(input: ReportInput): ConversionReport {
	const rules: Partial<Record<RuleCategory, RuleEntry[]>> = {};
	for (const category of RULE_CATEGORIES) {
		const entries = aggregate(input.tags.filter(t => t.category === category));
		if (entries.length > 0) rules[category] = entries;
	}

	const report: ConversionReport = {
		sourceFile: input.sourceFile,
		objects: input.objects.map(objectKeyId),
		rules,
		flags: input.flags,
		diagnostics: input.diagnostics,
	};
	if (input.unresolved.length === 0) return report;

	return {
		...report,
		dependencies: input.unresolved.map(group => ({
			target: objectKeyId(group.target),
			columns: group.columns,
			owners: group.owners.map(objectKeyId),
			status: group.status,
		})),
	};
}

function aggregate(tags: readonly RuleTag[]): RuleEntry[] {
	const entries = new Map<string, { rule: string; count: number; subjects: string[] }>();
	for (const tag of tags) {
		let entry = entries.get(tag.rule);
		if (!entry) {
			entry = { rule: tag.rule, count: 0, subjects: [] };
			entries.set(tag.rule, entry);
		}
		entry.count++;
		if (!entry.subjects.includes(tag.subject)) entry.subjects.push(tag.subject);
	}
	return [...entries.values()];
}

// === JSON Schema ===

const stringArray = { type: "array", items: { type: "string" } };

const ruleEntrySchema = {
	type: "object",
	properties: {
		rule: { type: "string" },
		count: { type: "integer", minimum: 1 },
		subjects: stringArray,
	},
	required: ["rule", "count", "subjects"],
	additionalProperties: false,
};

/** JSON Schema of the written report, draft-07. */
export const reportJsonSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	properties: {
		sourceFile: { type: "string" },
		convertedAt: { type: "string", format: "date-time" },
		ddlSha256: { type: "string", pattern: "^[0-9a-f]{64}$" },
		objects: stringArray,
		rules: {
			type: "object",
			properties: Object.fromEntries(
				RULE_CATEGORIES.map(category => [category, { type: "array", items: ruleEntrySchema, minItems: 1 }])
			),
			additionalProperties: false,
		},
		dependencies: {
			type: "array",
			minItems: 1,
			items: {
				type: "object",
				properties: {
					target: { type: "string" },
					columns: stringArray,
					owners: stringArray,
					status: { enum: ["pending", "missing-source"] },
				},
				required: ["target", "columns", "owners", "status"],
				additionalProperties: false,
			},
		},
		flags: {
			type: "object",
			properties: {
				usesGeography: { type: "boolean" },
				usesGeometry: { type: "boolean" },
				isTemporalTable: { type: "boolean" },
				usesIdentity: { type: "boolean" },
				needsManualReview: { type: "boolean" },
			},
			required: ["usesGeography", "usesGeometry", "isTemporalTable", "usesIdentity", "needsManualReview"],
			additionalProperties: false,
		},
		diagnostics: {
			type: "array",
			items: {
				type: "object",
				properties: {
					kind: { enum: ["unmapped-construct", "missing-sequence", "dependency-cycle"] },
					subject: { type: "string" },
					message: { type: "string" },
				},
				required: ["kind", "subject", "message"],
				additionalProperties: false,
			},
		},
	},
	required: ["sourceFile", "convertedAt", "ddlSha256", "objects", "rules", "flags", "diagnostics"],
	additionalProperties: false,
};

function createAjv() {
	const ajv = new Ajv({ strict: false, allErrors: true });
	addFormats(ajv);
	return ajv;
}

const validateEnvelope = createAjv().compile<ReportEnvelope>(reportJsonSchema);

export function createReportEnvelope(report: ConversionReport, convertedAt: Date, ddl: string): ReportEnvelope {
	return { ...report, convertedAt: convertedAt.toISOString(), ddlSha256: sha256(ddl) };
}

/**
 * Whether `envelope` was written together with `ddl`. A report left over from
 * another run, or one whose DDL rename never happened, does not match.
 */
export function reportMatchesDdl(envelope: ReportEnvelope, ddl: string): boolean {
	return envelope.ddlSha256 === sha256(ddl);
}

function sha256(text: string): string {
	return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}

export function serializeReport(envelope: ReportEnvelope): string {
	return JSON.stringify(envelope, null, "\t") + "\n";
}

/**
 * Parse and validate a written report. Errors list each schema violation.
 */
export function parseReport(content: string): ReportEnvelope {
	const data: unknown = JSON.parse(content);
	if (!validateEnvelope(data)) {
		const details = (validateEnvelope.errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
		throw new Error(`Invalid conversion report: ${details.join("; ")}`);
	}
	return data;
}
