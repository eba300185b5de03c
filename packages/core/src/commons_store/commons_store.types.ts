/**
 * CommonsStore contract types.
 *
 * Writes are expressed as structured, guarded statements instead of SQL
 * text so that every backend re-checks the precondition at execution time.
 */

import type { CompletionRecord, Stamp, WantedItem } from '../wanted/wanted.types';

export type CommonsTables = {
  wanted: WantedItem;
  completions: CompletionRecord;
  stamps: Stamp;
};

export type TableName = keyof CommonsTables;

export type CommonsSnapshot = { [K in TableName]: CommonsTables[K][] };

/**
 * Row filter: every `match` field must be equal, and when `anyOf` is given
 * at least one of its entries must match as well.
 */
export type RowFilter<K extends TableName> = {
  match: Partial<CommonsTables[K]>;
  anyOf?: Partial<CommonsTables[K]>[];
};

/** Existence check against another table, evaluated inside the commit. */
export type RowCondition = { [K in TableName]: { table: K; filter: RowFilter<K> } }[TableName];

type Guarded = {
  /** Every condition must find a row, otherwise the statement is skipped. */
  when?: RowCondition[];
  /** A statement that changes no row aborts the whole commit. */
  required?: boolean;
};

export type InsertStatement<K extends TableName> = Guarded & {
  op: 'insert';
  table: K;
  row: CommonsTables[K];
  /** Skip the insert when any of these finds a row. */
  unless?: RowCondition[];
  /** Duplicate primary keys are skipped instead of failing. */
  onConflict?: 'ignore';
};

export type UpdateStatement<K extends TableName> = Guarded & {
  op: 'update';
  table: K;
  set: Partial<CommonsTables[K]>;
  where: RowFilter<K>;
};

export type DeleteStatement<K extends TableName> = Guarded & {
  op: 'delete';
  table: K;
  where: RowFilter<K>;
};

export type Statement = {
  [K in TableName]: InsertStatement<K> | UpdateStatement<K> | DeleteStatement<K>;
}[TableName];

export type OrderBy<K extends TableName> = {
  field: keyof CommonsTables[K] & string;
  direction: 'asc' | 'desc';
};

export type SelectQuery<K extends TableName> = {
  table: K;
  where?: RowFilter<K>;
  /** Case-insensitive substring match on a text column. */
  search?: { field: keyof CommonsTables[K] & string; term: string };
  orderBy?: OrderBy<K>[];
  limit?: number;
};

/**
 * Sink for the diagnostic output of push operations.
 */
export interface PushLog {
  write(chunk: string): void;
}

export type CommitInfo = {
  hash: string;
  ref: string;
  message: string;
  signed: boolean;
};

/**
 * CommonsStore - versioned SQL store behind the mutation engine
 *
 * An empty or missing ref means main.
 */
export interface CommonsStore {
  query<K extends TableName>(select: SelectQuery<K>, ref?: string): Promise<CommonsTables[K][]>;

  /**
   * Atomic multi-statement commit. An empty branch targets main; any other
   * branch is created from main when absent. Throws PreconditionFailedError
   * when a required statement or the whole commit changes nothing.
   */
  exec(branch: string, commitMessage: string, signed: boolean, statements: Statement[]): Promise<void>;

  branches(prefix: string): Promise<string[]>;
  deleteBranch(name: string): Promise<void>;
  deleteRemoteBranch(name: string): Promise<void>;

  pushBranch(name: string, log: PushLog): Promise<void>;
  pushMain(log: PushLog): Promise<void>;
  /** Push main upstream, pulling and retrying once when rejected. */
  pushWithSync(log: PushLog): Promise<void>;
  sync(): Promise<void>;
  mergeBranch(name: string): Promise<void>;

  /** Resolves when direct-to-main writes are supported, otherwise throws CapabilityUnavailableError. */
  canWildWest(): Promise<void>;
}
