/**
 * Pure operations over in-memory commons snapshots: guarded statement
 * application, selection and three-way merge.
 */

import { isDeepStrictEqual } from 'util';
import type {
  CommonsSnapshot,
  CommonsTables,
  RowCondition,
  SelectQuery,
  Statement,
  TableName,
} from '../commons_store.types';
import { ConstraintViolationError, PreconditionFailedError } from '../errors';

type LooseFilter = { match: object; anyOf?: readonly object[] | undefined };

export function emptySnapshot(): CommonsSnapshot {
  return { wanted: [], completions: [], stamps: [] };
}

export function cloneSnapshot(snapshot: CommonsSnapshot): CommonsSnapshot {
  return structuredClone(snapshot);
}

export function snapshotsEqual(a: CommonsSnapshot, b: CommonsSnapshot): boolean {
  return isDeepStrictEqual(byId(a.wanted), byId(b.wanted)) &&
    isDeepStrictEqual(byId(a.completions), byId(b.completions)) &&
    isDeepStrictEqual(byId(a.stamps), byId(b.stamps));
}

function byId<R extends { id: string }>(rows: R[]): Map<string, R> {
  return new Map(rows.map(row => [row.id, row]));
}

function fieldsMatch(row: object, match: object): boolean {
  for (const [key, expected] of Object.entries(match)) {
    if (expected === undefined) continue;
    if (!isDeepStrictEqual(Reflect.get(row, key), expected)) {
      return false;
    }
  }
  return true;
}

export function filterMatches(row: object, filter: LooseFilter | undefined): boolean {
  if (!filter) return true;
  if (!fieldsMatch(row, filter.match)) return false;
  if (filter.anyOf && filter.anyOf.length > 0) {
    return filter.anyOf.some(alternative => fieldsMatch(row, alternative));
  }
  return true;
}

function conditionHolds(snapshot: CommonsSnapshot, condition: RowCondition): boolean {
  const rows: readonly object[] = snapshot[condition.table];
  return rows.some(row => filterMatches(row, condition.filter));
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : 1;
}

export function selectRows<K extends TableName>(snapshot: CommonsSnapshot, select: SelectQuery<K>): CommonsTables[K][] {
  const search = select.search;
  let rows = snapshot[select.table].filter(row => {
    if (!filterMatches(row, select.where)) return false;
    if (search && search.term !== '') {
      const value = Reflect.get(row, search.field);
      return typeof value === 'string' && value.toLowerCase().includes(search.term.toLowerCase());
    }
    return true;
  });

  const orderBy = select.orderBy ?? [];
  if (orderBy.length > 0) {
    rows = [...rows].sort((left, right) => {
      for (const order of orderBy) {
        const result = compareValues(Reflect.get(left, order.field), Reflect.get(right, order.field));
        if (result !== 0) {
          return order.direction === 'asc' ? result : -result;
        }
      }
      return 0;
    });
  }

  if (select.limit !== undefined && select.limit >= 0) {
    rows = rows.slice(0, select.limit);
  }
  return structuredClone(rows);
}

function insertRow<K extends TableName>(snapshot: CommonsSnapshot, table: K, row: CommonsTables[K], ignoreConflict: boolean): number {
  const rows = snapshot[table];
  if (rows.some(existing => existing.id === row.id)) {
    if (ignoreConflict) return 0;
    throw new ConstraintViolationError(table, `duplicate id "${row.id}"`);
  }
  rows.push(structuredClone(row));
  return 1;
}

function updateRows<K extends TableName>(snapshot: CommonsSnapshot, table: K, filter: LooseFilter, set: Partial<CommonsTables[K]>): number {
  const rows = snapshot[table];
  let changed = 0;
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    if (row === undefined || !filterMatches(row, filter)) continue;
    const next = { ...row, ...structuredClone(set) };
    if (!isDeepStrictEqual(next, row)) {
      rows[i] = next;
      changed++;
    }
  }
  return changed;
}

function deleteRows(snapshot: CommonsSnapshot, table: TableName, filter: LooseFilter): number {
  const rows: object[] = snapshot[table];
  let changed = 0;
  for (let i = rows.length - 1; i >= 0; i--) {
    const row = rows[i];
    if (row !== undefined && filterMatches(row, filter)) {
      rows.splice(i, 1);
      changed++;
    }
  }
  return changed;
}

function applyStatement(snapshot: CommonsSnapshot, statement: Statement): number {
  const conditions = statement.when ?? [];
  if (!conditions.every(condition => conditionHolds(snapshot, condition))) {
    return 0;
  }

  switch (statement.op) {
    case 'insert': {
      const blockers = statement.unless ?? [];
      if (blockers.some(condition => conditionHolds(snapshot, condition))) {
        return 0;
      }
      if (statement.table === 'stamps' && statement.row.author === statement.row.subject) {
        throw new ConstraintViolationError('stamps', 'author and subject must differ');
      }
      return insertRow(snapshot, statement.table, statement.row, statement.onConflict === 'ignore');
    }
    case 'update':
      return updateRows(snapshot, statement.table, statement.where, statement.set);
    case 'delete':
      return deleteRows(snapshot, statement.table, statement.where);
  }
}

/**
 * Applies statements in order to `snapshot` (mutated in place).
 *
 * @returns total number of changed rows
 * @throws PreconditionFailedError when a required statement changes nothing
 *   or the whole batch changes nothing
 */
export function applyStatements(snapshot: CommonsSnapshot, statements: Statement[], commitMessage: string = ''): number {
  let total = 0;
  for (const statement of statements) {
    const changed = applyStatement(snapshot, statement);
    if (changed === 0 && statement.required) {
      throw new PreconditionFailedError(
        `precondition failed: ${statement.op} on ${statement.table} matched no row`,
        commitMessage
      );
    }
    total += changed;
  }
  if (total === 0) {
    throw new PreconditionFailedError('nothing to commit', commitMessage);
  }
  return total;
}

type TableMerge<K extends TableName> = { rows: CommonsTables[K][]; conflicts: string[] };

function mergeTable<K extends TableName>(
  table: K,
  base: CommonsTables[K][],
  ours: CommonsTables[K][],
  theirs: CommonsTables[K][]
): TableMerge<K> {
  const baseRows = byId(base);
  const ourRows = byId(ours);
  const theirRows = byId(theirs);
  const ids = new Set([...ourRows.keys(), ...theirRows.keys()]);
  const rows: CommonsTables[K][] = [];
  const conflicts: string[] = [];

  for (const id of ids) {
    const original = baseRows.get(id);
    const mine = ourRows.get(id);
    const other = theirRows.get(id);

    if (isDeepStrictEqual(mine, other)) {
      if (mine) rows.push(mine);
      continue;
    }
    if (isDeepStrictEqual(mine, original)) {
      if (other) rows.push(other);
      continue;
    }
    if (isDeepStrictEqual(other, original)) {
      if (mine) rows.push(mine);
      continue;
    }
    conflicts.push(`${table}:${id}`);
  }

  return { rows, conflicts };
}

/**
 * Row-level three-way merge. A row changed differently on both sides is a
 * conflict.
 */
export function mergeSnapshots(
  base: CommonsSnapshot,
  ours: CommonsSnapshot,
  theirs: CommonsSnapshot
): { merged: CommonsSnapshot; conflicts: string[] } {
  const wanted = mergeTable('wanted', base.wanted, ours.wanted, theirs.wanted);
  const completions = mergeTable('completions', base.completions, ours.completions, theirs.completions);
  const stamps = mergeTable('stamps', base.stamps, ours.stamps, theirs.stamps);

  return {
    merged: { wanted: wanted.rows, completions: completions.rows, stamps: stamps.rows },
    conflicts: [...wanted.conflicts, ...completions.conflicts, ...stamps.conflicts],
  };
}
