/**
 * Renders store queries and guarded statements as Dolt SQL, and decodes
 * `dolt sql -r json` output back into rows.
 *
 * Field names map to the commons schema columns (posted_by, claimed_by, ...).
 * Stamp quality and reliability live in the `valence` JSON column.
 */

import type {
  CommonsTables,
  RowCondition,
  SelectQuery,
  Statement,
  TableName,
} from '../commons_store.types';
import type { CompletionRecord, Stamp, WantedItem } from '../../wanted/wanted.types';
import { EFFORT_LEVELS, SEVERITIES, WANTED_STATUSES, WANTED_TYPES } from '../../wanted/wanted.types';

type ColumnKind = 'text' | 'int' | 'json' | 'timestamp' | 'valence';

type ColumnSpec = { column: string; kind: ColumnKind };

type LooseFilter = { match: object; anyOf?: readonly object[] | undefined };

const WANTED_COLUMNS: Record<keyof WantedItem, ColumnSpec> = {
  id: { column: 'id', kind: 'text' },
  title: { column: 'title', kind: 'text' },
  description: { column: 'description', kind: 'text' },
  project: { column: 'project', kind: 'text' },
  type: { column: 'type', kind: 'text' },
  priority: { column: 'priority', kind: 'int' },
  tags: { column: 'tags', kind: 'json' },
  postedBy: { column: 'posted_by', kind: 'text' },
  claimedBy: { column: 'claimed_by', kind: 'text' },
  status: { column: 'status', kind: 'text' },
  effortLevel: { column: 'effort_level', kind: 'text' },
  createdAt: { column: 'created_at', kind: 'timestamp' },
  updatedAt: { column: 'updated_at', kind: 'timestamp' },
};

const COMPLETION_COLUMNS: Record<keyof CompletionRecord, ColumnSpec> = {
  id: { column: 'id', kind: 'text' },
  wantedId: { column: 'wanted_id', kind: 'text' },
  completedBy: { column: 'completed_by', kind: 'text' },
  evidence: { column: 'evidence', kind: 'text' },
  stampId: { column: 'stamp_id', kind: 'text' },
  validatedBy: { column: 'validated_by', kind: 'text' },
  completedAt: { column: 'completed_at', kind: 'timestamp' },
};

const STAMP_COLUMNS: Record<keyof Stamp, ColumnSpec> = {
  id: { column: 'id', kind: 'text' },
  author: { column: 'author', kind: 'text' },
  subject: { column: 'subject', kind: 'text' },
  quality: { column: 'valence', kind: 'valence' },
  reliability: { column: 'valence', kind: 'valence' },
  severity: { column: 'severity', kind: 'text' },
  contextId: { column: 'context_id', kind: 'text' },
  contextType: { column: 'context_type', kind: 'text' },
  skillTags: { column: 'skill_tags', kind: 'json' },
  message: { column: 'message', kind: 'text' },
  createdAt: { column: 'created_at', kind: 'timestamp' },
};

const COLUMNS: Record<TableName, ReadonlyMap<string, ColumnSpec>> = {
  wanted: new Map(Object.entries(WANTED_COLUMNS)),
  completions: new Map(Object.entries(COMPLETION_COLUMNS)),
  stamps: new Map(Object.entries(STAMP_COLUMNS)),
};

/** Temporary table whose CHECK aborts the script when a required statement changed nothing. */
export const REQUIRED_GUARD_TABLE = 'wl_required';

// ═══════════════════════════════════════════════════════════════════════
// LITERALS
// ═══════════════════════════════════════════════════════════════════════

export function escapeSql(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

/** ISO-8601 to `YYYY-MM-DD HH:MM:SS` (UTC). */
export function toSqlTimestamp(iso: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/.exec(iso);
  return match ? `${match[1]} ${match[2]}` : iso;
}

export function fromSqlTimestamp(value: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})/.exec(value);
  return match ? `${match[1]}T${match[2]}.000Z` : value;
}

function quote(value: string): string {
  return `'${escapeSql(value)}'`;
}

function literal(value: unknown, kind: ColumnKind): string {
  if (value === null || value === undefined) return 'NULL';
  if (kind === 'json' || kind === 'valence') return quote(JSON.stringify(value));
  if (kind === 'timestamp' && typeof value === 'string') return quote(toSqlTimestamp(value));
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'NULL';
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'string') return quote(value);
  return quote(JSON.stringify(value));
}

function columnSpec(table: TableName, field: string): ColumnSpec {
  const spec = COLUMNS[table].get(field);
  if (!spec) {
    throw new Error(`unknown field "${field}" on table ${table}`);
  }
  return spec;
}

function columnExpr(table: TableName, field: string): string {
  const spec = columnSpec(table, field);
  return spec.kind === 'valence' ? `JSON_EXTRACT(valence, '$.${field}')` : spec.column;
}

// ═══════════════════════════════════════════════════════════════════════
// FILTERS AND GUARDS
// ═══════════════════════════════════════════════════════════════════════

function renderMatch(table: TableName, match: object): string[] {
  const conditions: string[] = [];
  for (const [field, value] of Object.entries(match)) {
    if (value === undefined) continue;
    const expr = columnExpr(table, field);
    const spec = columnSpec(table, field);
    conditions.push(value === null ? `${expr} IS NULL` : `${expr} = ${literal(value, spec.kind === 'valence' ? 'int' : spec.kind)}`);
  }
  return conditions;
}

export function renderFilter(table: TableName, filter: LooseFilter | undefined): string {
  if (!filter) return '1 = 1';
  const conditions = renderMatch(table, filter.match);
  if (filter.anyOf && filter.anyOf.length > 0) {
    const alternatives = filter.anyOf.map(alternative => {
      const parts = renderMatch(table, alternative);
      return parts.length > 0 ? `(${parts.join(' AND ')})` : '1 = 1';
    });
    conditions.push(`(${alternatives.join(' OR ')})`);
  }
  return conditions.length > 0 ? conditions.join(' AND ') : '1 = 1';
}

/**
 * Existence check. The derived table keeps MySQL from rejecting a guard
 * that reads the table being updated.
 */
function renderCondition(condition: RowCondition, alias: string): string {
  return `EXISTS (SELECT 1 FROM (SELECT id FROM ${condition.table} WHERE ${renderFilter(condition.table, condition.filter)}) AS ${alias})`;
}

function renderGuards(statement: Statement, index: number): string[] {
  const when = (statement.when ?? []).map((condition, i) => renderCondition(condition, `g${index}_${i}`));
  const unless = statement.op === 'insert'
    ? (statement.unless ?? []).map((condition, i) => `NOT ${renderCondition(condition, `u${index}_${i}`)}`)
    : [];
  return [...when, ...unless];
}

// ═══════════════════════════════════════════════════════════════════════
// STATEMENTS
// ═══════════════════════════════════════════════════════════════════════

function renderInsert(table: TableName, row: object, guards: string[], ignore: boolean): string {
  const columns: string[] = [];
  const values: string[] = [];
  const valence: Record<string, unknown> = {};

  for (const [field, value] of Object.entries(row)) {
    const spec = columnSpec(table, field);
    if (spec.kind === 'valence') {
      valence[field] = value;
      continue;
    }
    columns.push(spec.column);
    values.push(literal(value, spec.kind));
  }
  if (Object.keys(valence).length > 0) {
    columns.push('valence');
    values.push(literal(valence, 'json'));
  }

  const verb = ignore ? 'INSERT IGNORE INTO' : 'INSERT INTO';
  const target = `${verb} ${table} (${columns.join(', ')})`;
  return guards.length > 0
    ? `${target} SELECT ${values.join(', ')} FROM DUAL WHERE ${guards.join(' AND ')}`
    : `${target} VALUES (${values.join(', ')})`;
}

function renderUpdate(table: TableName, set: object, where: LooseFilter, guards: string[]): string {
  const assignments: string[] = [];
  const valencePaths: string[] = [];

  for (const [field, value] of Object.entries(set)) {
    if (value === undefined) continue;
    const spec = columnSpec(table, field);
    if (spec.kind === 'valence') {
      valencePaths.push(`'$.${field}', ${literal(value, 'int')}`);
      continue;
    }
    assignments.push(`${spec.column} = ${literal(value, spec.kind)}`);
  }
  if (valencePaths.length > 0) {
    assignments.push(`valence = JSON_SET(valence, ${valencePaths.join(', ')})`);
  }

  const conditions = [renderFilter(table, where), ...guards];
  return `UPDATE ${table} SET ${assignments.join(', ')} WHERE ${conditions.join(' AND ')}`;
}

function renderSql(statement: Statement, guards: string[]): string {
  switch (statement.op) {
    case 'insert':
      return renderInsert(statement.table, statement.row, guards, statement.onConflict === 'ignore');
    case 'update':
      return renderUpdate(statement.table, statement.set, statement.where, guards);
    case 'delete':
      return `DELETE FROM ${statement.table} WHERE ${[renderFilter(statement.table, statement.where), ...guards].join(' AND ')}`;
  }
}

/**
 * One statement plus, when it is required, the row-count check that
 * follows it.
 */
export function renderStatement(statement: Statement, index: number): string[] {
  const sql = renderSql(statement, renderGuards(statement, index));
  const lines = [`${sql};`];
  if (statement.required) {
    lines.push(`INSERT INTO ${REQUIRED_GUARD_TABLE} (statement_index, changed) VALUES (${index}, ROW_COUNT());`);
  }
  return lines;
}

export function commitSql(message: string, signed: boolean): string {
  return signed
    ? `CALL DOLT_COMMIT('-S', '-m', ${quote(message)});`
    : `CALL DOLT_COMMIT('-m', ${quote(message)});`;
}

/**
 * Full commit script: statements, staged and committed together.
 */
export function renderScript(commitMessage: string, signed: boolean, statements: Statement[]): string {
  const lines: string[] = [];
  if (statements.some(statement => statement.required)) {
    lines.push(
      `CREATE TEMPORARY TABLE ${REQUIRED_GUARD_TABLE} (statement_index INT, changed INT, ` +
      `CONSTRAINT ${REQUIRED_GUARD_TABLE}_changed CHECK (changed > 0));`
    );
  }
  statements.forEach((statement, index) => {
    lines.push(...renderStatement(statement, index));
  });
  lines.push("CALL DOLT_ADD('-A');");
  lines.push(commitSql(commitMessage, signed));
  return `${lines.join('\n')}\n`;
}

// ═══════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════

export function renderSelect<K extends TableName>(select: SelectQuery<K>, ref: string = ''): string {
  const table = select.table;
  const asOf = ref !== '' && ref !== 'main' ? ` AS OF ${quote(ref)}` : '';
  let sql = `SELECT * FROM ${table}${asOf} WHERE ${renderFilter(table, select.where)}`;

  const search = select.search;
  if (search && search.term !== '') {
    sql += ` AND LOWER(${columnExpr(table, search.field)}) LIKE ${quote(`%${escapeLike(search.term.toLowerCase())}%`)}`;
  }
  const orderBy = select.orderBy ?? [];
  if (orderBy.length > 0) {
    sql += ` ORDER BY ${orderBy.map(order => `${columnExpr(table, order.field)} ${order.direction.toUpperCase()}`).join(', ')}`;
  }
  if (select.limit !== undefined && select.limit >= 0) {
    sql += ` LIMIT ${Math.floor(select.limit)}`;
  }
  return sql;
}

export function renderBranchList(prefix: string): string {
  return `SELECT name FROM dolt_branches WHERE name LIKE ${quote(`${escapeLike(prefix)}%`)} ORDER BY name`;
}

// ═══════════════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════════════

type SqlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is SqlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses `dolt sql -r json` output (`{"rows": [...]}`); empty output is
 * an empty result.
 */
export function parseJsonRows(stdout: string): SqlRecord[] {
  const text = stdout.trim();
  if (text === '') return [];
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error('unexpected dolt json output');
  }
  const rows = parsed['rows'];
  if (rows === undefined) return [];
  if (!Array.isArray(rows)) {
    throw new Error('unexpected dolt json output: rows is not an array');
  }
  return rows.filter(isRecord);
}

function text(record: SqlRecord, column: string): string {
  const value = record[column];
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

function nullableText(record: SqlRecord, column: string): string | null {
  const value = record[column];
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : String(value);
}

function int(value: unknown, fallback: number): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

function json(record: SqlRecord, column: string): unknown {
  const value = record[column];
  if (typeof value !== 'string') return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function timestamp(record: SqlRecord, column: string): string {
  return fromSqlTimestamp(text(record, column));
}

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

function decodeWanted(record: SqlRecord): WantedItem {
  return {
    id: text(record, 'id'),
    title: text(record, 'title'),
    description: text(record, 'description'),
    project: text(record, 'project'),
    type: pick(WANTED_TYPES, record['type'], ''),
    priority: int(record['priority'], 2),
    tags: stringArray(json(record, 'tags')),
    postedBy: text(record, 'posted_by'),
    claimedBy: nullableText(record, 'claimed_by'),
    status: pick(WANTED_STATUSES, record['status'], 'open'),
    effortLevel: pick(EFFORT_LEVELS, record['effort_level'], 'medium'),
    createdAt: timestamp(record, 'created_at'),
    updatedAt: timestamp(record, 'updated_at'),
  };
}

function decodeCompletion(record: SqlRecord): CompletionRecord {
  return {
    id: text(record, 'id'),
    wantedId: text(record, 'wanted_id'),
    completedBy: text(record, 'completed_by'),
    evidence: text(record, 'evidence'),
    stampId: nullableText(record, 'stamp_id'),
    validatedBy: nullableText(record, 'validated_by'),
    completedAt: timestamp(record, 'completed_at'),
  };
}

function decodeStamp(record: SqlRecord): Stamp {
  const valence = json(record, 'valence');
  const quality = isRecord(valence) ? int(valence['quality'], 0) : 0;
  return {
    id: text(record, 'id'),
    author: text(record, 'author'),
    subject: text(record, 'subject'),
    quality,
    reliability: isRecord(valence) ? int(valence['reliability'], quality) : quality,
    severity: pick(SEVERITIES, record['severity'], 'leaf'),
    contextId: text(record, 'context_id'),
    contextType: 'completion',
    skillTags: stringArray(json(record, 'skill_tags')),
    message: text(record, 'message'),
    createdAt: timestamp(record, 'created_at'),
  };
}

const DECODERS: { [K in TableName]: (record: SqlRecord) => CommonsTables[K] } = {
  wanted: decodeWanted,
  completions: decodeCompletion,
  stamps: decodeStamp,
};

export function decodeRows<K extends TableName>(table: K, records: SqlRecord[]): CommonsTables[K][] {
  const decode: (record: SqlRecord) => CommonsTables[K] = DECODERS[table];
  return records.map(record => decode(record));
}
