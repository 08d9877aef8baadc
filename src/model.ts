/**
 * Core data model types for ddl-translate.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Identity ===

/**
 * Canonical identity of a table (or sequence): lowercase, bracket-free.
 * The only key used for dependency and state lookups.
 */
export interface ObjectKey {
  readonly schema: string;
  readonly table: string;
}

/** A possibly multi-part name exactly as written, quotes removed. */
export interface QualifiedName {
  readonly parts: readonly string[];
}

export interface SourceSpan {
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

// === Source statements ===

export type StatementNode =
  | TableNode
  | SequenceNode
  | IndexNode
  | ExtendedPropertyNode
  | AlterTableNode
  | SchemaNode
  | SessionOptionNode
  | RawPassthroughNode;

interface NodeBase {
  readonly span: SourceSpan;
  readonly text: string;
}

export interface DataType {
  readonly name: string;
  readonly args: readonly string[];
}

export type DefaultExpression =
  | { readonly kind: 'nextValue'; readonly sequence: QualifiedName }
  | { readonly kind: 'sequenceCall'; readonly sequence: string }
  | { readonly kind: 'currentTimestamp'; readonly utc: boolean }
  | { readonly kind: 'newGuid' }
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'expression'; readonly text: string };

export interface Identity {
  readonly start: string;
  readonly increment: string;
}

export interface Column {
  readonly name: string;
  readonly type: DataType;
  /** Undefined when the source does not say. */
  readonly nullable: boolean | undefined;
  readonly default: DefaultExpression | undefined;
  /** Name of the wrapping `CONSTRAINT x DEFAULT` clause, if any. */
  readonly defaultConstraintName: string | undefined;
  readonly identity: Identity | undefined;
  readonly generatedAlways: 'rowStart' | 'rowEnd' | undefined;
  readonly hidden: boolean;
  readonly collation: string | undefined;
  readonly ordinal: number;
  /** Column attributes no rule models, verbatim. */
  readonly unmodeled: readonly string[];
}

export interface ColumnRef {
  readonly name: string;
  readonly direction: 'ASC' | 'DESC' | undefined;
}

export type ConstraintKind = 'primaryKey' | 'unique' | 'foreignKey' | 'check';

export interface Constraint {
  readonly kind: ConstraintKind;
  readonly name: string | undefined;
  readonly columns: readonly ColumnRef[];
  readonly clustering: 'CLUSTERED' | 'NONCLUSTERED' | undefined;
  readonly references: ForeignKeyTarget | undefined;
  /** CHECK body, verbatim between the outer parentheses. */
  readonly expression: string | undefined;
  /** `WITH (...)` / `ON [filegroup]` clauses attached to the constraint. */
  readonly storage: readonly string[];
}

export interface ForeignKeyTarget {
  readonly table: QualifiedName;
  readonly columns: readonly string[];
  readonly onDelete: string | undefined;
  readonly onUpdate: string | undefined;
}

export type TableElement =
  | { readonly kind: 'column'; readonly column: Column }
  | { readonly kind: 'constraint'; readonly constraint: Constraint }
  | { readonly kind: 'period'; readonly startColumn: string; readonly endColumn: string }
  | { readonly kind: 'unmodeled'; readonly text: string };

export type TableOption =
  | { readonly kind: 'systemVersioning'; readonly historyTable: QualifiedName | undefined }
  | { readonly kind: 'storage'; readonly text: string }
  | { readonly kind: 'unmodeled'; readonly text: string };

export interface TableNode extends NodeBase {
  readonly kind: 'table';
  readonly name: QualifiedName;
  readonly elements: readonly TableElement[];
  readonly options: readonly TableOption[];
}

export interface SequenceNode extends NodeBase {
  readonly kind: 'sequence';
  readonly name: QualifiedName;
  readonly dataType: DataType | undefined;
  readonly start: string | undefined;
  readonly increment: string | undefined;
  readonly minValue: string | undefined;
  readonly maxValue: string | undefined;
  readonly cache: string | undefined;
  readonly cycle: boolean;
}

export interface IndexNode extends NodeBase {
  readonly kind: 'index';
  readonly name: string;
  readonly table: QualifiedName;
  readonly unique: boolean;
  readonly clustering: 'CLUSTERED' | 'NONCLUSTERED' | undefined;
  readonly columnstore: boolean;
  readonly columns: readonly ColumnRef[];
  readonly include: readonly string[];
  readonly where: string | undefined;
  readonly storage: readonly string[];
}

export interface PropertyLevel {
  readonly type: string;
  readonly name: string;
}

export interface ExtendedPropertyNode extends NodeBase {
  readonly kind: 'extendedProperty';
  readonly property: string;
  readonly value: string | undefined;
  readonly levels: readonly PropertyLevel[];
}

export type AlterTableAction =
  | { readonly kind: 'addConstraint'; readonly constraint: Constraint; readonly noCheck: boolean }
  | { readonly kind: 'addDefault'; readonly name: string | undefined; readonly column: string; readonly value: DefaultExpression }
  | { readonly kind: 'checkConstraint'; readonly name: string };

export interface AlterTableNode extends NodeBase {
  readonly kind: 'alterTable';
  readonly table: QualifiedName;
  readonly action: AlterTableAction;
}

export interface SchemaNode extends NodeBase {
  readonly kind: 'schema';
  readonly name: string;
}

export interface SessionOptionNode extends NodeBase {
  readonly kind: 'sessionOption';
  readonly option: string;
  readonly value: string;
}

export interface RawPassthroughNode extends NodeBase {
  readonly kind: 'raw';
  /** True when the text holds nothing but comments. */
  readonly commentOnly: boolean;
}

// === Target statements ===

export type TargetStatement =
  | TargetSchema
  | TargetSequence
  | TargetTable
  | TargetAlterTable
  | TargetIndex
  | TargetComment
  | TargetRaw;

export interface TargetSchema {
  readonly kind: 'schema';
  readonly schema: string;
}

export interface TargetSequence {
  readonly kind: 'sequence';
  readonly key: ObjectKey;
  readonly dataType: DataType | undefined;
  readonly start: string;
  readonly increment: string;
  readonly minValue: string | undefined;
  readonly maxValue: string | undefined;
  readonly cache: string | undefined;
  readonly cycle: boolean;
}

export type TargetDefault =
  | { readonly kind: 'sequenceCall'; readonly sequence: ObjectKey }
  | { readonly kind: 'sql'; readonly text: string };

export interface TargetColumn {
  readonly name: string;
  readonly type: DataType;
  readonly nullable: boolean | undefined;
  readonly default: TargetDefault | undefined;
  readonly identity: Identity | undefined;
  readonly ordinal: number;
  readonly review: readonly string[];
}

export interface TargetConstraint {
  readonly kind: ConstraintKind;
  readonly name: string | undefined;
  readonly columns: readonly ColumnRef[];
  readonly references: TargetForeignKey | undefined;
  readonly expression: string | undefined;
}

export interface TargetForeignKey {
  readonly table: ObjectKey;
  readonly columns: readonly string[];
  readonly onDelete: string | undefined;
  readonly onUpdate: string | undefined;
}

export type TargetTableElement =
  | { readonly kind: 'column'; readonly column: TargetColumn }
  | { readonly kind: 'constraint'; readonly constraint: TargetConstraint }
  | { readonly kind: 'review'; readonly text: string };

export interface TargetTable {
  readonly kind: 'table';
  readonly key: ObjectKey;
  /** Schema and table as written in the source, quotes removed. */
  readonly sourceName: { readonly schema: string; readonly table: string };
  readonly elements: readonly TargetTableElement[];
  /** Table options passed through for review, emitted after the statement. */
  readonly review: readonly string[];
}

export type TargetAlterAction =
  | { readonly kind: 'addConstraint'; readonly constraint: TargetConstraint; readonly notValid: boolean }
  | { readonly kind: 'setDefault'; readonly column: string; readonly value: TargetDefault };

export interface TargetAlterTable {
  readonly kind: 'alterTable';
  readonly key: ObjectKey;
  readonly action: TargetAlterAction;
}

export interface TargetIndex {
  readonly kind: 'index';
  readonly name: string;
  readonly table: ObjectKey;
  readonly unique: boolean;
  readonly columns: readonly ColumnRef[];
  readonly include: readonly string[];
  readonly where: string | undefined;
}

export type CommentTarget =
  | { readonly level: 'schema'; readonly schema: string }
  | { readonly level: 'table'; readonly key: ObjectKey }
  | { readonly level: 'column'; readonly key: ObjectKey; readonly column: string };

export interface TargetComment {
  readonly kind: 'comment';
  readonly target: CommentTarget;
  /** Undefined removes the comment. */
  readonly text: string | undefined;
}

export interface TargetRaw {
  readonly kind: 'raw';
  /**
   * `omission` and `review` render as SQL comments; `verbatim` renders the
   * text unchanged.
   */
  readonly role: 'omission' | 'review' | 'verbatim';
  readonly text: string;
  /** Leading comment-only passthroughs stay at the top of the output. */
  readonly preamble: boolean;
}

// === Rules, diagnostics, dependencies ===

export const RULE_CATEGORIES = [
  'identifiers',
  'types',
  'defaults',
  'sequences',
  'temporal',
  'constraints',
  'indexes',
  'comments',
  'storage',
  'review',
] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export interface RuleTag {
  readonly category: RuleCategory;
  readonly rule: string;
  /** What the rule was applied to, e.g. `sales.orders.OrderID`. */
  readonly subject: string;
}

export type Diagnostic =
  | { readonly kind: 'unmapped-construct'; readonly subject: string; readonly message: string }
  | { readonly kind: 'missing-sequence'; readonly subject: string; readonly message: string }
  | { readonly kind: 'dependency-cycle'; readonly subject: string; readonly message: string };

export interface FeatureFlags {
  readonly usesGeography: boolean;
  readonly usesGeometry: boolean;
  readonly isTemporalTable: boolean;
  readonly usesIdentity: boolean;
  readonly needsManualReview: boolean;
}

export interface DependencyEdge {
  readonly from: ObjectKey;
  readonly to: ObjectKey;
  /** Referencing column names on `from`, in first-seen order. */
  readonly columns: readonly string[];
  readonly selfReference: boolean;
}

export interface ConversionState {
  hasOutput(key: ObjectKey): boolean;
}

// === Helpers ===

export function createObjectKey(schema: string, table: string): ObjectKey {
  return {
    schema: stripQuotes(schema).toLowerCase(),
    table: stripQuotes(table).toLowerCase(),
  };
}

export function objectKeyId(key: ObjectKey): string {
  return `${key.schema}.${key.table}`;
}

export function sameObjectKey(a: ObjectKey, b: ObjectKey): boolean {
  return a.schema === b.schema && a.table === b.table;
}

export function compareObjectKeys(a: ObjectKey, b: ObjectKey): number {
  if (a.schema !== b.schema) return a.schema < b.schema ? -1 : 1;
  if (a.table !== b.table) return a.table < b.table ? -1 : 1;
  return 0;
}

/**
 * Resolve a written name into its key. One part takes the default schema;
 * three or more parts keep the last two.
 */
export function resolveObjectKey(name: QualifiedName, defaultSchema: string): ObjectKey {
  const parts = name.parts;
  const table = parts[parts.length - 1] ?? '';
  const schema = parts.length >= 2 ? parts[parts.length - 2] : defaultSchema;
  return createObjectKey(schema, table);
}

export function formatQualifiedName(name: QualifiedName): string {
  return name.parts.join('.');
}

function stripQuotes(segment: string): string {
  if (segment.startsWith('[') && segment.endsWith(']')) {
    return segment.slice(1, -1).replace(/\]\]/g, ']');
  }
  if (segment.startsWith('"') && segment.endsWith('"') && segment.length >= 2) {
    return segment.slice(1, -1).replace(/""/g, '"');
  }
  return segment;
}

export function emptyFeatureFlags(): FeatureFlags {
  return {
    usesGeography: false,
    usesGeometry: false,
    isTemporalTable: false,
    usesIdentity: false,
    needsManualReview: false,
  };
}
