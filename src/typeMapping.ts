import type { DataType } from './model';

export type SpatialFeature = 'geography' | 'geometry';

export interface TypeMapping {
  readonly type: DataType;
  /** Rule label for the report; undefined when the type was already native. */
  readonly rule: string | undefined;
  readonly feature: SpatialFeature | undefined;
}

interface TypeRule {
  readonly names: readonly string[];
  /** Undefined when the arguments do not fit this rule. */
  map(args: readonly string[]): { type: DataType; rule: string | undefined } | undefined;
  readonly feature?: SpatialFeature;
}

const isMax = (arg: string | undefined) => arg !== undefined && arg.toUpperCase() === 'MAX';
const isCount = (arg: string) => /^\d+$/.test(arg);

/** A type that takes no arguments. `rule` undefined marks a native name. */
function fixed(name: string, rule: string | undefined, args: readonly string[] = []): TypeRule['map'] {
  return given => (given.length === 0 ? { type: { name, args }, rule } : undefined);
}

/** A type with at most `max` numeric arguments, passed through. */
function counted(name: string, rule: string | undefined, max: number): TypeRule['map'] {
  return given => (given.length <= max && given.every(isCount) ? { type: { name, args: [...given] }, rule } : undefined);
}

/**
 * A fractional-seconds type; SQL Server allows 7 digits, PostgreSQL 6.
 * Native names only carry the rule label when the precision was clamped.
 */
function fractional(name: string, rule: string, fallback: string | undefined, native: boolean): TypeRule['map'] {
  return given => {
    if (given.length > 1 || !given.every(isCount)) return undefined;
    const precision = given.length === 0 ? fallback : String(Math.min(Number(given[0]), 6));
    const args = precision === undefined ? [] : [precision];
    const clamped = given.length === 1 && precision !== given[0];
    return { type: { name, args }, rule: native && !clamped ? undefined : rule };
  };
}

function varying(rule: string | undefined): TypeRule['map'] {
  return given => {
    if (given.length === 0) return { type: { name: 'VARCHAR', args: ['1'] }, rule: 'VARCHAR→VARCHAR(1)' };
    if (given.length > 1) return undefined;
    if (isMax(given[0])) return { type: { name: 'TEXT', args: [] }, rule: rule === undefined ? 'VARCHAR(MAX)→TEXT' : 'NVARCHAR(MAX)→TEXT' };
    return isCount(given[0]) ? { type: { name: 'VARCHAR', args: [given[0]] }, rule } : undefined;
  };
}

function binary(given: readonly string[]): { type: DataType; rule: string } | undefined {
  if (given.length > 1) return undefined;
  if (given.length === 1 && isMax(given[0])) return { type: { name: 'BYTEA', args: [] }, rule: 'VARBINARY(MAX)→BYTEA' };
  if (given.length === 0 || isCount(given[0])) return { type: { name: 'BYTEA', args: [] }, rule: 'BINARY(n)→BYTEA' };
  return undefined;
}

/**
 * Type rules keyed by lowercase name. SQL Server names carry a rule label;
 * names PostgreSQL already accepts map to themselves without one, which keeps
 * re-translation a fixed point.
 */
const TYPE_RULES: readonly TypeRule[] = [
  { names: ['int', 'int4'], map: fixed('INTEGER', 'INT→INTEGER') },
  { names: ['integer'], map: fixed('INTEGER', undefined) },
  { names: ['bigint'], map: fixed('BIGINT', undefined) },
  { names: ['smallint'], map: fixed('SMALLINT', undefined) },
  { names: ['tinyint'], map: fixed('SMALLINT', 'TINYINT→SMALLINT') },
  { names: ['bit'], map: fixed('BOOLEAN', 'BIT→BOOLEAN') },
  { names: ['boolean'], map: fixed('BOOLEAN', undefined) },
  { names: ['nvarchar'], map: varying('NVARCHAR(n)→VARCHAR(n)') },
  { names: ['varchar', 'character varying'], map: varying(undefined) },
  { names: ['nchar'], map: given => counted('CHAR', 'NCHAR(n)→CHAR(n)', 1)(given.length === 0 ? ['1'] : given) },
  { names: ['char'], map: given => counted('CHAR', undefined, 1)(given.length === 0 ? ['1'] : given) },
  { names: ['ntext'], map: fixed('TEXT', 'NTEXT→TEXT') },
  { names: ['text'], map: fixed('TEXT', undefined) },
  { names: ['datetime2'], map: fractional('TIMESTAMP', 'DATETIME2(p)→TIMESTAMP(p)', '6', false) },
  { names: ['timestamp'], map: fractional('TIMESTAMP', 'TIMESTAMP(p)→TIMESTAMP(6)', undefined, true) },
  { names: ['datetime'], map: fixed('TIMESTAMP', 'DATETIME→TIMESTAMP(3)', ['3']) },
  { names: ['smalldatetime'], map: fixed('TIMESTAMP', 'SMALLDATETIME→TIMESTAMP(0)', ['0']) },
  { names: ['datetimeoffset'], map: fractional('TIMESTAMPTZ', 'DATETIMEOFFSET(p)→TIMESTAMPTZ(p)', '6', false) },
  { names: ['timestamptz'], map: fractional('TIMESTAMPTZ', 'TIMESTAMPTZ(p)→TIMESTAMPTZ(6)', undefined, true) },
  { names: ['time'], map: fractional('TIME', 'TIME(p)→TIME(6)', undefined, true) },
  { names: ['date'], map: fixed('DATE', undefined) },
  { names: ['decimal'], map: given => counted('NUMERIC', 'DECIMAL(p,s)→NUMERIC(p,s)', 2)(given.length === 0 ? ['18', '0'] : given) },
  { names: ['numeric'], map: counted('NUMERIC', undefined, 2) },
  { names: ['money'], map: fixed('NUMERIC', 'MONEY→NUMERIC(19,4)', ['19', '4']) },
  { names: ['smallmoney'], map: fixed('NUMERIC', 'SMALLMONEY→NUMERIC(10,4)', ['10', '4']) },
  {
    names: ['float'],
    map: given => {
      if (given.length > 1 || !given.every(isCount)) return undefined;
      if (given.length === 1 && Number(given[0]) <= 24) return { type: { name: 'REAL', args: [] }, rule: 'FLOAT(n≤24)→REAL' };
      return { type: { name: 'DOUBLE PRECISION', args: [] }, rule: 'FLOAT→DOUBLE PRECISION' };
    },
  },
  { names: ['real'], map: fixed('REAL', undefined) },
  { names: ['double precision'], map: fixed('DOUBLE PRECISION', undefined) },
  { names: ['varbinary', 'binary'], map: binary },
  { names: ['image'], map: fixed('BYTEA', 'IMAGE→BYTEA') },
  { names: ['bytea'], map: fixed('BYTEA', undefined) },
  { names: ['uniqueidentifier'], map: fixed('UUID', 'UNIQUEIDENTIFIER→UUID') },
  { names: ['uuid'], map: fixed('UUID', undefined) },
  { names: ['xml'], map: fixed('XML', undefined) },
  { names: ['json'], map: fixed('JSON', undefined) },
  { names: ['jsonb'], map: fixed('JSONB', undefined) },
  { names: ['sysname'], map: fixed('VARCHAR', 'SYSNAME→VARCHAR(128)', ['128']) },
  { names: ['geography'], map: fixed('geography', 'GEOGRAPHY→geography'), feature: 'geography' },
  { names: ['geometry'], map: fixed('geometry', 'GEOMETRY→geometry'), feature: 'geometry' },
];

/**
 * Map a column type. Undefined means no rule covers the name or its
 * arguments; the caller passes the type through unchanged and flags it.
 */
export function mapDataType(source: DataType): TypeMapping | undefined {
  const name = normalizeTypeName(source.name);
  const rule = TYPE_RULES.find(r => r.names.includes(name));
  if (rule === undefined) return undefined;
  const mapped = rule.map(source.args);
  if (mapped === undefined) return undefined;
  return { type: mapped.type, rule: mapped.rule, feature: rule.feature };
}

/** Lowercase, and drop a `sys.` qualifier from built-in type names. */
function normalizeTypeName(name: string): string {
  const lower = name.toLowerCase();
  return lower.startsWith('sys.') ? lower.slice(4) : lower;
}

export function formatDataType(type: DataType): string {
  return type.args.length === 0 ? type.name : `${type.name}(${type.args.join(',')})`;
}
