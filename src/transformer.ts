import type {
  AlterTableNode,
  Column,
  CommentTarget,
  Constraint,
  DataType,
  DefaultExpression,
  Diagnostic,
  ExtendedPropertyNode,
  FeatureFlags,
  IndexNode,
  ObjectKey,
  QualifiedName,
  RuleCategory,
  RuleTag,
  SequenceNode,
  StatementNode,
  TableNode,
  TargetColumn,
  TargetConstraint,
  TargetDefault,
  TargetSequence,
  TargetStatement,
  TargetTableElement,
} from './model';
import { createObjectKey, emptyFeatureFlags, formatQualifiedName, objectKeyId, resolveObjectKey } from './model';
import { formatDataType, mapDataType } from './typeMapping';
import { sequenceKey, stripBrackets } from './identifiers';

export interface TransformContext {
  /** Schema for unqualified names. */
  readonly defaultSchema: string;
  /** Definition of a sequence found elsewhere in the batch. */
  readonly resolveSequence?: (key: ObjectKey) => SequenceNode | undefined;
}

export interface TransformResult {
  readonly statements: readonly TargetStatement[];
  readonly tags: readonly RuleTag[];
  readonly diagnostics: readonly Diagnostic[];
  readonly flags: FeatureFlags;
}

export const DEFAULT_SCHEMA = 'dbo';

/**
 * Translate one file's statements into target statements.
 *
 * Pure: the result depends only on the nodes and the context. Nothing is
 * dropped without either an omission comment in the output or a rule tag.
 */
export function transformStatements(
  nodes: readonly StatementNode[],
  context: TransformContext = { defaultSchema: DEFAULT_SCHEMA }
): TransformResult {
  return new Transformation(context).run(nodes);
}

interface TableDraft {
  readonly kind: 'table';
  readonly key: ObjectKey;
  readonly sourceName: { readonly schema: string; readonly table: string };
  readonly elements: TargetTableElement[];
  readonly review: string[];
}

const DESCRIPTION_PROPERTIES = new Set(['description', 'ms_description']);
const SEQUENCE_TYPES = new Set(['SMALLINT', 'INTEGER', 'BIGINT']);

class Transformation {
  private readonly _statements: TargetStatement[] = [];
  private readonly _tags: RuleTag[] = [];
  private readonly _diagnostics: Diagnostic[] = [];
  private _flags: FeatureFlags = emptyFeatureFlags();

  private readonly _tables = new Map<string, TableDraft>();
  private readonly _declaredSequences = new Map<string, TargetSequence>();
  private readonly _consumedSequences = new Map<string, ObjectKey>();
  private readonly _omittedPropertyLevels = new Set<string>();

  constructor(private readonly _context: TransformContext) {}

  run(nodes: readonly StatementNode[]): TransformResult {
    // Tables first, so ALTER TABLE statements anywhere in the file can fold in
    const drafts = new Map<TableNode, TableDraft>();
    for (const node of nodes) {
      if (node.kind === 'table') drafts.set(node, this.table(node));
    }

    let preamble = true;
    for (const node of nodes) {
      if (node.kind === 'raw' && node.commentOnly) {
        this._statements.push({ kind: 'raw', role: 'verbatim', text: node.text, preamble });
        continue;
      }
      preamble = false;
      switch (node.kind) {
        case 'table': {
          const draft = drafts.get(node);
          if (draft !== undefined) this._statements.push(draft);
          break;
        }
        case 'sequence':
          this.declareSequence(node);
          break;
        case 'index':
          this.index(node);
          break;
        case 'extendedProperty':
          this.extendedProperty(node);
          break;
        case 'alterTable':
          this.alterTable(node);
          break;
        case 'schema':
          this._statements.push({ kind: 'schema', schema: node.name.toLowerCase() });
          break;
        case 'sessionOption':
          this.omit(`SET ${node.option.toUpperCase()} ${node.value} omitted (session option with no PostgreSQL equivalent)`);
          this.tag('review', 'session option omitted', `SET ${node.option.toUpperCase()}`);
          break;
        case 'raw':
          this.unrecognized(node.text);
          break;
      }
    }

    this.resolveConsumedSequences();

    // Schemas of everything this file creates
    for (const draft of this._tables.values()) {
      this._statements.push({ kind: 'schema', schema: draft.key.schema });
    }
    for (const sequence of this._declaredSequences.values()) {
      this._statements.push({ kind: 'schema', schema: sequence.key.schema });
    }

    const needsManualReview =
      this._tags.some(t => t.category === 'review') || this._diagnostics.some(d => d.kind !== 'dependency-cycle');
    return {
      statements: this._statements,
      tags: this._tags,
      diagnostics: this._diagnostics,
      flags: { ...this._flags, needsManualReview },
    };
  }

  // === Rule bookkeeping ===

  private tag(category: RuleCategory, rule: string, subject: string): void {
    this._tags.push({ category, rule, subject });
  }

  private omit(text: string): void {
    this._statements.push({ kind: 'raw', role: 'omission', text, preamble: false });
  }

  private unmapped(subject: string, message: string): void {
    this._diagnostics.push({ kind: 'unmapped-construct', subject, message });
  }

  private unrecognized(text: string): void {
    const subject = text.trim().split(/\r?\n/)[0];
    this._statements.push({ kind: 'raw', role: 'review', text, preamble: false });
    this.tag('review', 'unrecognized statement kept as comment', subject);
    this.unmapped(subject, 'Statement not recognized; kept verbatim as a comment');
  }

  private resolve(name: QualifiedName): ObjectKey {
    if (name.parts.length > 2) {
      this.tag('identifiers', 'database qualifier dropped', formatQualifiedName(name));
    }
    return resolveObjectKey(name, this._context.defaultSchema);
  }

  // === Tables ===

  private table(node: TableNode): TableDraft {
    const key = this.resolve(node.name);
    const id = objectKeyId(key);
    const parts = node.name.parts;
    const sourceName = {
      schema: parts.length >= 2 ? parts[parts.length - 2] : this._context.defaultSchema,
      table: parts[parts.length - 1] ?? '',
    };
    if (sourceName.schema !== key.schema || sourceName.table !== key.table) {
      this.tag('identifiers', 'schema and table names lowercased', id);
    }

    const history = node.options.flatMap(o => (o.kind === 'systemVersioning' ? [o] : []))[0];
    const period = node.elements.find(e => e.kind === 'period');
    if (period !== undefined) {
      this.tag('temporal', 'PERIOD FOR SYSTEM_TIME dropped', id);
    }
    if (history !== undefined) {
      const subject = history.historyTable === undefined ? id : `${id} (history ${formatQualifiedName(history.historyTable)})`;
      this.tag('temporal', 'SYSTEM_VERSIONING dropped', subject);
    }

    const elements: TargetTableElement[] = [];
    for (const element of node.elements) {
      switch (element.kind) {
        case 'column':
          elements.push({ kind: 'column', column: this.column(element.column, key) });
          break;
        case 'constraint':
          elements.push({ kind: 'constraint', constraint: this.constraint(element.constraint, key) });
          break;
        case 'period':
          break;
        case 'unmodeled':
          elements.push({ kind: 'review', text: element.text });
          this.tag('review', 'table element kept as comment', `${id}: ${element.text}`);
          this.unmapped(id, `Table element not translated: ${element.text}`);
          break;
      }
    }

    const review: string[] = [];
    for (const option of node.options) {
      if (option.kind === 'storage') {
        this.tag('storage', 'table storage option dropped', `${id}: ${option.text}`);
      } else if (option.kind === 'unmodeled') {
        review.push(option.text);
        this.tag('review', 'table option kept as comment', `${id}: ${option.text}`);
        this.unmapped(id, `Table option not translated: ${option.text}`);
      }
    }

    const rowVersioned = node.elements.some(e => e.kind === 'column' && e.column.generatedAlways !== undefined);
    if (period !== undefined || history !== undefined || rowVersioned) {
      this._flags = { ...this._flags, isTemporalTable: true };
    }

    const draft: TableDraft = { kind: 'table', key, sourceName, elements, review };
    if (!this._tables.has(id)) this._tables.set(id, draft);
    return draft;
  }

  private column(column: Column, owner: ObjectKey): TargetColumn {
    const subject = `${objectKeyId(owner)}.${column.name}`;
    const review: string[] = [];

    if (column.generatedAlways !== undefined) {
      const rule = column.generatedAlways === 'rowStart' ? 'ROW START' : 'ROW END';
      this.tag('temporal', `${rule} column → TIMESTAMP(6) DEFAULT CURRENT_TIMESTAMP NOT NULL`, subject);
      if (column.hidden) this.tag('temporal', 'HIDDEN dropped', subject);
      return {
        name: column.name,
        type: { name: 'TIMESTAMP', args: ['6'] },
        nullable: false,
        default: { kind: 'sql', text: 'CURRENT_TIMESTAMP' },
        identity: undefined,
        ordinal: column.ordinal,
        review,
      };
    }

    let type = column.type;
    const mapping = mapDataType(column.type);
    if (mapping === undefined) {
      const name = formatDataType(column.type);
      this.tag('review', `unmapped type ${name} passed through`, subject);
      this.unmapped(subject, `No rule for type ${name}; passed through unchanged`);
    } else {
      type = mapping.type;
      if (mapping.rule !== undefined) this.tag('types', mapping.rule, subject);
      if (mapping.feature === 'geography') this._flags = { ...this._flags, usesGeography: true };
      if (mapping.feature === 'geometry') this._flags = { ...this._flags, usesGeometry: true };
    }

    if (column.defaultConstraintName !== undefined) {
      this.tag('defaults', 'named default constraint unwrapped', `${subject} (${column.defaultConstraintName})`);
    }
    const defaultValue = column.default === undefined ? undefined : this.defaultValue(column.default, type.name, subject);

    if (column.identity !== undefined) {
      this._flags = { ...this._flags, usesIdentity: true };
      this.tag('defaults', 'IDENTITY → GENERATED BY DEFAULT AS IDENTITY', subject);
      if (!SEQUENCE_TYPES.has(type.name)) {
        this.tag('review', 'identity on a non-integer type', subject);
      }
    }
    if (column.hidden) {
      this.tag('temporal', 'HIDDEN dropped', subject);
    }
    if (column.collation !== undefined) {
      review.push(`COLLATE ${column.collation}`);
      this.tag('review', 'collation kept as comment', subject);
    }
    for (const text of column.unmodeled) {
      review.push(text);
      this.tag('review', 'column attribute kept as comment', `${subject}: ${text}`);
      this.unmapped(subject, `Column attribute not translated: ${text}`);
    }

    return {
      name: column.name,
      type,
      nullable: column.nullable,
      default: defaultValue,
      identity: column.identity,
      ordinal: column.ordinal,
      review,
    };
  }

  private defaultValue(value: DefaultExpression, typeName: string, subject: string): TargetDefault {
    switch (value.kind) {
      case 'nextValue': {
        const key = this.consumeSequence(value.sequence);
        this.tag('defaults', 'NEXT VALUE FOR → nextval()', subject);
        return { kind: 'sequenceCall', sequence: key };
      }
      case 'sequenceCall':
        return { kind: 'sequenceCall', sequence: this.consumeSequence({ parts: value.sequence.split('.') }) };
      case 'currentTimestamp':
        if (value.utc) {
          this.tag('defaults', 'UTC timestamp → CURRENT_TIMESTAMP AT TIME ZONE', subject);
          return { kind: 'sql', text: "(CURRENT_TIMESTAMP AT TIME ZONE 'UTC')" };
        }
        this.tag('defaults', 'current timestamp → CURRENT_TIMESTAMP', subject);
        return { kind: 'sql', text: 'CURRENT_TIMESTAMP' };
      case 'newGuid':
        this.tag('defaults', 'NEWID() → gen_random_uuid()', subject);
        return { kind: 'sql', text: 'gen_random_uuid()' };
      case 'literal':
        if (typeName === 'BOOLEAN' && (value.value === '0' || value.value === '1')) {
          this.tag('defaults', 'BIT default → BOOLEAN literal', subject);
          return { kind: 'sql', text: value.value === '1' ? 'TRUE' : 'FALSE' };
        }
        return { kind: 'sql', text: value.value };
      case 'expression':
        this.tag('review', 'default expression copied', subject);
        return { kind: 'sql', text: `(${stripBrackets(value.text)})` };
    }
  }

  // === Sequences ===

  private consumeSequence(name: QualifiedName): ObjectKey {
    const key = sequenceKey(name, this._context.defaultSchema);
    const id = objectKeyId(key);
    if (!this._consumedSequences.has(id)) this._consumedSequences.set(id, key);
    return key;
  }

  private declareSequence(node: SequenceNode): void {
    const key = sequenceKey(node.name, this._context.defaultSchema);
    const id = objectKeyId(key);
    if (this._declaredSequences.has(id)) return;
    const sequence = this.sequence(node, key);
    this._declaredSequences.set(id, sequence);
    this._statements.push(sequence);
  }

  private sequence(node: SequenceNode, key: ObjectKey): TargetSequence {
    const id = objectKeyId(key);
    const source = formatQualifiedName(node.name);
    if (source !== id) this.tag('sequences', 'sequence renamed to snake_case', `${source} → ${id}`);

    let dataType: DataType | undefined;
    if (node.dataType !== undefined) {
      const mapped = mapDataType(node.dataType)?.type;
      if (mapped !== undefined && SEQUENCE_TYPES.has(mapped.name)) {
        dataType = mapped;
      } else {
        this.tag('sequences', 'sequence type dropped', `${id} AS ${formatDataType(node.dataType)}`);
      }
    }

    return {
      kind: 'sequence',
      key,
      dataType,
      start: node.start ?? node.minValue ?? '1',
      increment: node.increment ?? '1',
      minValue: node.minValue,
      maxValue: node.maxValue,
      cache: node.cache,
      cycle: node.cycle,
    };
  }

  private resolveConsumedSequences(): void {
    for (const [id, key] of this._consumedSequences) {
      if (this._declaredSequences.has(id)) continue;
      const found = this._context.resolveSequence?.(key);
      let sequence: TargetSequence;
      if (found !== undefined) {
        sequence = this.sequence(found, key);
        this.tag('sequences', 'sequence declared from batch definition', id);
      } else {
        sequence = {
          kind: 'sequence',
          key,
          dataType: undefined,
          start: '1',
          increment: '1',
          minValue: undefined,
          maxValue: undefined,
          cache: undefined,
          cycle: false,
        };
        this.tag('sequences', 'sequence declared without definition (START 1 INCREMENT 1)', id);
        this._diagnostics.push({
          kind: 'missing-sequence',
          subject: id,
          message: `Sequence ${id} is not defined in this batch; declared with START 1 INCREMENT 1, confirm manually`,
        });
      }
      this._declaredSequences.set(id, sequence);
      this._statements.push(sequence);
    }
  }

  // === Constraints ===

  private constraint(source: Constraint, owner: ObjectKey): TargetConstraint {
    const subject = source.name ?? `${objectKeyId(owner)} ${source.kind}`;
    if (source.clustering !== undefined) {
      this.tag('constraints', `${source.clustering} qualifier dropped`, subject);
    }
    for (const clause of source.storage) {
      if (clause === 'NOT FOR REPLICATION') {
        this.tag('constraints', 'NOT FOR REPLICATION dropped', subject);
      } else {
        this.tag('storage', 'constraint storage option dropped', `${subject}: ${clause}`);
      }
    }

    // PostgreSQL key and foreign-key column lists take no sort order
    if (source.columns.some(c => c.direction !== undefined)) {
      this.tag('constraints', 'ASC/DESC dropped from constraint columns', subject);
    }
    const columns = source.columns.map(c => ({ name: c.name, direction: undefined }));

    let expression: string | undefined;
    if (source.kind === 'check' && source.expression !== undefined) {
      expression = stripBrackets(source.expression);
      this.tag('review', 'CHECK body copied, verify syntax', subject);
    }

    const references = source.references;
    return {
      kind: source.kind,
      name: source.name,
      columns,
      references:
        references === undefined
          ? undefined
          : {
              table: this.resolve(references.table),
              columns: references.columns,
              onDelete: references.onDelete,
              onUpdate: references.onUpdate,
            },
      expression,
    };
  }

  private alterTable(node: AlterTableNode): void {
    const key = this.resolve(node.table);
    const id = objectKeyId(key);
    const draft = this._tables.get(id);
    const action = node.action;

    switch (action.kind) {
      case 'checkConstraint':
        this.tag('constraints', 'CHECK CONSTRAINT re-enable folded', `${id} ${action.name}`);
        return;
      case 'addConstraint': {
        const constraint = this.constraint(action.constraint, key);
        const subject = action.constraint.name ?? id;
        if (draft !== undefined) {
          draft.elements.push({ kind: 'constraint', constraint });
          this.tag('constraints', 'ALTER TABLE ADD CONSTRAINT folded into CREATE TABLE', subject);
          if (action.noCheck) this.tag('review', 'WITH NOCHECK constraint now validated', subject);
          return;
        }
        const notValid = action.noCheck && (constraint.kind === 'foreignKey' || constraint.kind === 'check');
        if (action.noCheck && !notValid) this.tag('review', 'WITH NOCHECK constraint now validated', subject);
        this._statements.push({ kind: 'alterTable', key, action: { kind: 'addConstraint', constraint, notValid } });
        return;
      }
      case 'addDefault': {
        const index = draft?.elements.findIndex(
          e => e.kind === 'column' && e.column.name.toLowerCase() === action.column.toLowerCase()
        );
        const existing = draft !== undefined && index !== undefined && index >= 0 ? draft.elements[index] : undefined;
        const subject = `${id}.${action.column}`;
        if (action.name !== undefined) {
          this.tag('defaults', 'named default constraint unwrapped', `${subject} (${action.name})`);
        }
        if (draft !== undefined && index !== undefined && existing?.kind === 'column') {
          const value = this.defaultValue(action.value, existing.column.type.name, subject);
          draft.elements[index] = { kind: 'column', column: { ...existing.column, default: value } };
          this.tag('defaults', 'ALTER TABLE ADD DEFAULT folded into column', subject);
          return;
        }
        const value = this.defaultValue(action.value, '', subject);
        this._statements.push({ kind: 'alterTable', key, action: { kind: 'setDefault', column: action.column, value } });
        return;
      }
    }
  }

  // === Indexes ===

  private index(node: IndexNode): void {
    const table = this.resolve(node.table);
    const subject = `${objectKeyId(table)} ${node.name}`;

    if (node.columnstore) {
      const kind = node.clustering === 'CLUSTERED' ? 'CLUSTERED COLUMNSTORE' : 'COLUMNSTORE';
      this.omit(`${kind} INDEX ${node.name} omitted (PostgreSQL has no columnstore index equivalent)`);
      this.tag('indexes', 'columnstore index omitted', subject);
      return;
    }

    if (node.clustering === 'CLUSTERED') {
      this.tag('indexes', 'CLUSTERED index → plain index', subject);
    } else if (node.clustering === 'NONCLUSTERED') {
      this.tag('indexes', 'NONCLUSTERED qualifier dropped', subject);
    }
    for (const clause of node.storage) {
      this.tag('storage', 'index storage option dropped', `${subject}: ${clause}`);
    }

    this._statements.push({
      kind: 'index',
      name: node.name,
      table,
      unique: node.unique,
      columns: node.columns,
      include: node.include,
      where: node.where === undefined ? undefined : stripBrackets(node.where),
    });
  }

  // === Extended properties ===

  private extendedProperty(node: ExtendedPropertyNode): void {
    const level = (type: string) => node.levels.find(l => l.type === type)?.name;
    const schemaName = level('SCHEMA');
    const tableName = level('TABLE');
    const columnName = level('COLUMN');
    const path = node.levels.map(l => `${l.type} ${l.name}`).join(', ');
    const subject = `${node.property} on ${path === '' ? 'database' : path}`;

    if (!DESCRIPTION_PROPERTIES.has(node.property.toLowerCase())) {
      this.omit(`Extended property ${node.property} (${path}) omitted (PostgreSQL comments hold descriptions only)`);
      this.tag('review', 'extended property omitted', subject);
      return;
    }

    // Index-level metadata has no PostgreSQL counterpart; one comment per file
    if (node.levels.some(l => l.type === 'INDEX')) {
      if (!this._omittedPropertyLevels.has('INDEX')) {
        this._omittedPropertyLevels.add('INDEX');
        this.omit('INDEX extended properties omitted (PostgreSQL does not support index comments via standard DDL)');
      }
      this.tag('comments', 'index extended property omitted', subject);
      return;
    }

    const addressed = node.levels.map(l => l.type).join('/');
    const schema = (schemaName ?? this._context.defaultSchema).toLowerCase();
    let target: CommentTarget | undefined;
    if (addressed === 'SCHEMA') {
      target = { level: 'schema', schema };
    } else if (tableName !== undefined && (addressed === 'SCHEMA/TABLE' || addressed === 'TABLE')) {
      target = { level: 'table', key: createObjectKey(schema, tableName) };
    } else if (
      tableName !== undefined &&
      columnName !== undefined &&
      (addressed === 'SCHEMA/TABLE/COLUMN' || addressed === 'TABLE/COLUMN')
    ) {
      target = { level: 'column', key: createObjectKey(schema, tableName), column: columnName };
    }

    if (target === undefined) {
      this.omit(`Extended property ${node.property} (${path}) omitted (no COMMENT ON target)`);
      this.tag('review', 'extended property omitted', subject);
      return;
    }

    this._statements.push({ kind: 'comment', target, text: node.value });
    this.tag('comments', `${node.property} → COMMENT ON ${target.level.toUpperCase()}`, subject);
  }
}
