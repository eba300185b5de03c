/**
 * MemoryCommonsStore - In-memory versioned commons for tests and embedding
 *
 * Models a rig's fork: local main, per-item branches (each remembering the
 * main snapshot it was created from), the origin remote (the rig's fork) and
 * the shared upstream commons.
 *
 * Test Helpers:
 * - seedItem / seedCompletion / seedStamp: shared starting data
 * - commitUpstream(fn): simulate another rig pushing to upstream
 * - failNextPush(ref, log): make the next push of a ref fail with log text
 * - rejectNextPushes(n): make upstream pushes fail n times
 * - setCanWildWest(bool): toggle the direct-to-main capability
 *
 * @module commons_store/memory
 */

import type {
  CommitInfo,
  CommonsSnapshot,
  CommonsStore,
  CommonsTables,
  PushLog,
  SelectQuery,
  Statement,
  TableName,
} from '../commons_store.types';
import type { CompletionRecord, Stamp, WantedItem } from '../../wanted/wanted.types';
import { BranchNotFoundError, MergeConflictError, PushRejectedError } from '../errors';
import { CapabilityUnavailableError } from '../../wanted/errors';
import { createLogger } from '../../logger';
import {
  applyStatements,
  cloneSnapshot,
  emptySnapshot,
  mergeSnapshots,
  selectRows,
  snapshotsEqual,
} from './snapshot_ops';

const logger = createLogger('[MemoryCommonsStore] ');

export type MemoryCommonsStoreOptions = {
  /** Direct-to-main writes allowed (default: true) */
  canWildWest?: boolean;
  /** `sync()` resets main to upstream instead of merging (pr-mode forks) */
  resetOnSync?: boolean;
};

type MemoryBranch = {
  base: CommonsSnapshot;
  snapshot: CommonsSnapshot;
};

type MemoryCommonsState = {
  main: CommonsSnapshot;
  upstream: CommonsSnapshot;
  /** Upstream as last seen by this fork */
  lastSynced: CommonsSnapshot;
  branches: Map<string, MemoryBranch>;
  originBranches: Map<string, CommonsSnapshot>;
  originMain: CommonsSnapshot;
  commits: CommitInfo[];
  canWildWest: boolean;
  resetOnSync: boolean;
  pushFailures: Map<string, string>;
  pushRejections: number;
};

export class MemoryCommonsStore implements CommonsStore {
  private state: MemoryCommonsState;
  private commitCounter = 0;

  constructor(options: MemoryCommonsStoreOptions = {}) {
    this.state = {
      main: emptySnapshot(),
      upstream: emptySnapshot(),
      lastSynced: emptySnapshot(),
      branches: new Map(),
      originBranches: new Map(),
      originMain: emptySnapshot(),
      commits: [],
      canWildWest: options.canWildWest ?? true,
      resetOnSync: options.resetOnSync ?? false,
      pushFailures: new Map(),
      pushRejections: 0,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /** Adds a row to main, origin and upstream alike. */
  private seed<K extends TableName>(table: K, row: CommonsTables[K]): void {
    for (const snapshot of [this.state.main, this.state.upstream, this.state.lastSynced, this.state.originMain]) {
      const rows = snapshot[table];
      const index = rows.findIndex(existing => existing.id === row.id);
      if (index >= 0) {
        rows[index] = structuredClone(row);
      } else {
        rows.push(structuredClone(row));
      }
    }
  }

  seedItem(item: WantedItem): void {
    this.seed('wanted', item);
  }

  seedCompletion(completion: CompletionRecord): void {
    this.seed('completions', completion);
  }

  seedStamp(stamp: Stamp): void {
    this.seed('stamps', stamp);
  }

  /** Simulates a concurrent push to upstream by another rig. */
  commitUpstream(change: (snapshot: CommonsSnapshot) => void): void {
    change(this.state.upstream);
  }

  getItem(id: string, ref: string = ''): WantedItem | null {
    const snapshot = this.snapshotFor(ref);
    return structuredClone(snapshot.wanted.find(item => item.id === id) ?? null);
  }

  getUpstreamItem(id: string): WantedItem | null {
    return structuredClone(this.state.upstream.wanted.find(item => item.id === id) ?? null);
  }

  getCompletions(ref: string = ''): CompletionRecord[] {
    return structuredClone(this.snapshotFor(ref).completions);
  }

  getStamps(ref: string = ''): Stamp[] {
    return structuredClone(this.snapshotFor(ref).stamps);
  }

  getCommits(): CommitInfo[] {
    return [...this.state.commits];
  }

  hasBranch(name: string): boolean {
    return this.state.branches.has(name);
  }

  hasRemoteBranch(name: string): boolean {
    return this.state.originBranches.has(name);
  }

  failNextPush(ref: string, logText: string): void {
    this.state.pushFailures.set(ref, logText);
  }

  rejectNextPushes(count: number): void {
    this.state.pushRejections = count;
  }

  setCanWildWest(enabled: boolean): void {
    this.state.canWildWest = enabled;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  private snapshotFor(ref: string): CommonsSnapshot {
    if (ref === '' || ref === 'main') {
      return this.state.main;
    }
    const branch = this.state.branches.get(ref);
    if (!branch) {
      throw new BranchNotFoundError(ref);
    }
    return branch.snapshot;
  }

  async query<K extends TableName>(select: SelectQuery<K>, ref: string = ''): Promise<CommonsTables[K][]> {
    return selectRows(this.snapshotFor(ref), select);
  }

  async branches(prefix: string): Promise<string[]> {
    return [...this.state.branches.keys()].filter(name => name.startsWith(prefix)).sort();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async exec(branch: string, commitMessage: string, signed: boolean, statements: Statement[]): Promise<void> {
    const target = branch === '' || branch === 'main' ? 'main' : branch;
    const existing = target === 'main' ? undefined : this.state.branches.get(target);
    const working = target === 'main'
      ? cloneSnapshot(this.state.main)
      : cloneSnapshot(existing ? existing.snapshot : this.state.main);

    // Throws before anything is stored; a failed first write creates no branch.
    applyStatements(working, statements, commitMessage);

    if (target === 'main') {
      this.state.main = working;
    } else if (existing) {
      existing.snapshot = working;
    } else {
      this.state.branches.set(target, { base: cloneSnapshot(this.state.main), snapshot: working });
      logger.debug(`created branch ${target}`);
    }

    this.commitCounter++;
    this.state.commits.push({
      hash: `mem${this.commitCounter.toString(16).padStart(8, '0')}`,
      ref: target,
      message: commitMessage,
      signed,
    });
  }

  async deleteBranch(name: string): Promise<void> {
    if (!this.state.branches.delete(name)) {
      throw new BranchNotFoundError(name);
    }
  }

  async deleteRemoteBranch(name: string): Promise<void> {
    if (!this.state.originBranches.delete(name)) {
      throw new BranchNotFoundError(name);
    }
  }

  async mergeBranch(name: string): Promise<void> {
    const branch = this.state.branches.get(name);
    if (!branch) {
      throw new BranchNotFoundError(name);
    }
    const { merged, conflicts } = mergeSnapshots(branch.base, this.state.main, branch.snapshot);
    if (conflicts.length > 0) {
      throw new MergeConflictError(name, conflicts);
    }
    this.state.main = merged;
    this.commitCounter++;
    this.state.commits.push({
      hash: `mem${this.commitCounter.toString(16).padStart(8, '0')}`,
      ref: 'main',
      message: `Merge branch '${name}'`,
      signed: false,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  private takePushFailure(ref: string, log: PushLog): void {
    const failure = this.state.pushFailures.get(ref);
    if (failure !== undefined) {
      this.state.pushFailures.delete(ref);
      log.write(failure);
      throw new PushRejectedError(ref, failure.trim());
    }
  }

  async pushBranch(name: string, log: PushLog): Promise<void> {
    const branch = this.state.branches.get(name);
    if (!branch) {
      throw new BranchNotFoundError(name);
    }
    this.takePushFailure(name, log);
    this.state.originBranches.set(name, cloneSnapshot(branch.snapshot));
    log.write(`pushed ${name} to origin\n`);
  }

  async pushMain(log: PushLog): Promise<void> {
    this.takePushFailure('main', log);
    this.state.originMain = cloneSnapshot(this.state.main);
    log.write('pushed main to origin\n');
  }

  private async pull(log: PushLog): Promise<void> {
    const { merged, conflicts } = mergeSnapshots(this.state.lastSynced, this.state.main, this.state.upstream);
    if (conflicts.length > 0) {
      throw new MergeConflictError('upstream/main', conflicts);
    }
    this.state.main = merged;
    this.state.lastSynced = cloneSnapshot(this.state.upstream);
    log.write('pulled upstream/main\n');
  }

  async pushWithSync(log: PushLog): Promise<void> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      const moved = !snapshotsEqual(this.state.upstream, this.state.lastSynced);
      const injected = this.state.pushRejections > 0;
      if (!moved && !injected) {
        this.takePushFailure('main', log);
        this.state.upstream = cloneSnapshot(this.state.main);
        this.state.lastSynced = cloneSnapshot(this.state.main);
        this.state.originMain = cloneSnapshot(this.state.main);
        log.write('pushed main to upstream\n');
        return;
      }
      if (injected) {
        this.state.pushRejections--;
      }
      log.write('push to upstream rejected: remote has new commits\n');
      if (attempt === 2) {
        throw new PushRejectedError('upstream/main', 'remote has new commits');
      }
      logger.debug('upstream moved, pulling before retry');
      await this.pull(log);
    }
  }

  async sync(): Promise<void> {
    if (this.state.resetOnSync) {
      this.state.main = cloneSnapshot(this.state.upstream);
      this.state.lastSynced = cloneSnapshot(this.state.upstream);
      return;
    }
    await this.pull({ write: () => undefined });
  }

  async canWildWest(): Promise<void> {
    if (!this.state.canWildWest) {
      throw new CapabilityUnavailableError(
        'wild-west',
        'direct-to-main writes are not supported by this store; use pr mode'
      );
    }
  }
}
