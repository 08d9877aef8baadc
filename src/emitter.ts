import type {
  CommentTarget,
  ConstraintKind,
  TargetAlterTable,
  TargetColumn,
  TargetComment,
  TargetConstraint,
  TargetDefault,
  TargetIndex,
  TargetRaw,
  TargetSequence,
  TargetStatement,
  TargetTable,
} from './model';
import { objectKeyId } from './model';
import { formatDataType } from './typeMapping';
import { renderIdentifier, renderObjectKey } from './identifiers';

const INDENT = '    ';
const MIN_TYPE_WIDTH = 15;
const CONSTRAINT_ORDER: readonly ConstraintKind[] = ['primaryKey', 'unique', 'foreignKey', 'check'];

/**
 * Serialize target statements in canonical order:
 * leading comments, schemas, sequences, tables, then alterations, indexes and
 * omission comments in source order, then COMMENT ON statements.
 */
export function emitDdl(statements: readonly TargetStatement[]): string {
  const blocks: string[] = [];

  const preamble = statements.filter((s): s is TargetRaw => s.kind === 'raw' && s.preamble);
  blocks.push(...preamble.map(renderRaw));

  const schemas = unique(statements.flatMap(s => (s.kind === 'schema' ? [s.schema] : [])), s => s);
  if (schemas.length > 0) {
    blocks.push(schemas.map(s => `CREATE SCHEMA IF NOT EXISTS ${renderIdentifier(s)};`).join('\n'));
  }

  const sequences = unique(
    statements.filter((s): s is TargetSequence => s.kind === 'sequence'),
    s => objectKeyId(s.key)
  );
  if (sequences.length > 0) {
    blocks.push(sequences.map(renderSequence).join('\n'));
  }

  const tables = statements.filter((s): s is TargetTable => s.kind === 'table');
  blocks.push(...tables.map(renderTable));

  for (const statement of statements) {
    switch (statement.kind) {
      case 'alterTable':
        blocks.push(renderAlterTable(statement));
        break;
      case 'index':
        blocks.push(renderIndex(statement));
        break;
      case 'raw':
        if (!statement.preamble) blocks.push(renderRaw(statement));
        break;
      default:
        break;
    }
  }

  const comments = statements.filter((s): s is TargetComment => s.kind === 'comment');
  const outer = comments.filter(c => c.target.level !== 'column');
  const onColumns = comments.filter(c => c.target.level === 'column');
  if (outer.length > 0) {
    const levelRank = (c: TargetComment) => (c.target.level === 'schema' ? 0 : 1);
    blocks.push(stableSort(outer, (a, b) => levelRank(a) - levelRank(b)).map(renderComment).join('\n'));
  }
  if (onColumns.length > 0) {
    const position = columnPositions(tables);
    const rank = (c: TargetComment) =>
      c.target.level === 'column'
        ? position.get(`${objectKeyId(c.target.key)}.${c.target.column.toLowerCase()}`) ?? Number.MAX_SAFE_INTEGER
        : 0;
    blocks.push(stableSort(onColumns, (a, b) => rank(a) - rank(b)).map(renderComment).join('\n'));
  }

  return blocks.join('\n\n') + '\n';
}

// === Statements ===

function renderSequence(sequence: TargetSequence): string {
  const parts = [`CREATE SEQUENCE IF NOT EXISTS ${renderObjectKey(sequence.key)}`];
  if (sequence.dataType) parts.push(`AS ${formatDataType(sequence.dataType)}`);
  parts.push(`START ${sequence.start}`, `INCREMENT ${sequence.increment}`);
  if (sequence.minValue !== undefined) parts.push(`MINVALUE ${sequence.minValue}`);
  if (sequence.maxValue !== undefined) parts.push(`MAXVALUE ${sequence.maxValue}`);
  if (sequence.cache !== undefined) parts.push(`CACHE ${sequence.cache}`);
  if (sequence.cycle) parts.push('CYCLE');
  return `${parts.join(' ')};`;
}

function renderTable(table: TargetTable): string {
  const columns = table.elements.flatMap(e => (e.kind === 'column' ? [e.column] : []));
  const nameWidth = Math.max(0, ...columns.map(c => renderIdentifier(c.name).length)) + 1;
  const typeWidth = Math.max(MIN_TYPE_WIDTH, ...columns.map(c => formatDataType(c.type).length + 1));

  // Columns and review lines keep their source order; constraints follow, grouped by kind
  const body = [
    ...table.elements.filter(e => e.kind !== 'constraint'),
    ...CONSTRAINT_ORDER.flatMap(kind => table.elements.filter(e => e.kind === 'constraint' && e.constraint.kind === kind)),
  ];

  const lines: string[] = [];
  body.forEach((element, index) => {
    if (element.kind === 'review') {
      lines.push(`${INDENT}-- REVIEW: ${singleLine(element.text)}`);
      return;
    }
    const more = body.slice(index + 1).some(e => e.kind !== 'review');
    const text = element.kind === 'column'
      ? renderColumn(element.column, nameWidth, typeWidth)
      : renderConstraint(element.constraint);
    lines.push(`${INDENT}${text}${more ? ',' : ''}`);
  });

  const statement = `CREATE TABLE ${renderObjectKey(table.key)} (\n${lines.join('\n')}\n);`;
  return [statement, ...table.review.map(text => `-- REVIEW: ${singleLine(text)}`)].join('\n');
}

function renderColumn(column: TargetColumn, nameWidth: number, typeWidth: number): string {
  const attributes: string[] = [];
  if (column.default) attributes.push(`DEFAULT ${renderDefault(column.default)}`);
  if (column.identity) {
    attributes.push(
      `GENERATED BY DEFAULT AS IDENTITY (START WITH ${column.identity.start} INCREMENT BY ${column.identity.increment})`
    );
  }
  if (column.nullable === false) attributes.push('NOT NULL');
  if (column.nullable === true) attributes.push('NULL');
  for (const text of column.review) attributes.push(`/* REVIEW: ${singleLine(text).replace(/\*\//g, '* /')} */`);

  const head = renderIdentifier(column.name).padEnd(nameWidth) + formatDataType(column.type).padEnd(typeWidth);
  return (head + attributes.join(' ')).trimEnd();
}

function renderDefault(value: TargetDefault): string {
  if (value.kind === 'sequenceCall') return `nextval(${quoteLiteral(renderObjectKey(value.sequence))})`;
  return value.text;
}

function renderConstraint(constraint: TargetConstraint): string {
  const name = constraint.name === undefined ? '' : `CONSTRAINT ${renderIdentifier(constraint.name)} `;
  const columns = constraint.columns.map(c => renderIdentifier(c.name)).join(', ');
  switch (constraint.kind) {
    case 'primaryKey':
      return `${name}PRIMARY KEY (${columns})`;
    case 'unique':
      return `${name}UNIQUE (${columns})`;
    case 'check':
      return `${name}CHECK (${constraint.expression ?? ''})`;
    case 'foreignKey': {
      const references = constraint.references;
      if (!references) return `${name}FOREIGN KEY (${columns})`;
      let text = `${name}FOREIGN KEY (${columns}) REFERENCES ${renderObjectKey(references.table)}`;
      if (references.columns.length > 0) text += ` (${references.columns.map(renderIdentifier).join(', ')})`;
      if (references.onDelete) text += ` ON DELETE ${references.onDelete}`;
      if (references.onUpdate) text += ` ON UPDATE ${references.onUpdate}`;
      return text;
    }
  }
}

function renderAlterTable(statement: TargetAlterTable): string {
  const head = `ALTER TABLE ${renderObjectKey(statement.key)}`;
  const action = statement.action;
  if (action.kind === 'setDefault') {
    return `${head}\n${INDENT}ALTER COLUMN ${renderIdentifier(action.column)} SET DEFAULT ${renderDefault(action.value)};`;
  }
  return `${head}\n${INDENT}ADD ${renderConstraint(action.constraint)}${action.notValid ? ' NOT VALID' : ''};`;
}

function renderIndex(index: TargetIndex): string {
  const columns = index.columns
    .map(c => (c.direction ? `${renderIdentifier(c.name)} ${c.direction}` : renderIdentifier(c.name)))
    .join(', ');
  let text = `CREATE ${index.unique ? 'UNIQUE ' : ''}INDEX ${renderIdentifier(index.name)}\n`;
  text += `${INDENT}ON ${renderObjectKey(index.table)} (${columns})`;
  if (index.include.length > 0) text += ` INCLUDE (${index.include.map(renderIdentifier).join(', ')})`;
  if (index.where !== undefined) text += ` WHERE ${index.where}`;
  return `${text};`;
}

function renderComment(comment: TargetComment): string {
  return `COMMENT ON ${renderCommentTarget(comment.target)} IS ${comment.text === undefined ? 'NULL' : quoteLiteral(comment.text)};`;
}

function renderCommentTarget(target: CommentTarget): string {
  switch (target.level) {
    case 'schema':
      return `SCHEMA ${renderIdentifier(target.schema)}`;
    case 'table':
      return `TABLE ${renderObjectKey(target.key)}`;
    case 'column':
      return `COLUMN ${renderObjectKey(target.key)}.${renderIdentifier(target.column)}`;
  }
}

function renderRaw(raw: TargetRaw): string {
  switch (raw.role) {
    case 'verbatim':
      return raw.text.trimEnd();
    case 'omission':
      return `-- ${singleLine(raw.text)}`;
    case 'review':
      return ['-- REVIEW: statement not translated', ...raw.text.trimEnd().split(/\r?\n/).map(line => `-- ${line}`.trimEnd())].join('\n');
  }
}

// === Helpers ===

function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function unique<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    const key = keyOf(item);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function stableSort<T>(items: readonly T[], compare: (a: T, b: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => compare(a.item, b.item) || a.index - b.index)
    .map(entry => entry.item);
}

/** Position of every column across the file: table order first, then ordinal. */
function columnPositions(tables: readonly TargetTable[]): Map<string, number> {
  const positions = new Map<string, number>();
  for (const table of tables) {
    const columns = table.elements.flatMap(e => (e.kind === 'column' ? [e.column] : []));
    for (const column of stableSort(columns, (a, b) => a.ordinal - b.ordinal)) {
      positions.set(`${objectKeyId(table.key)}.${column.name.toLowerCase()}`, positions.size);
    }
  }
  return positions;
}
