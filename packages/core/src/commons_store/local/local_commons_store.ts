/**
 * LocalCommonsStore - CommonsStore over the dolt CLI
 *
 * Operates on a rig's local clone of its fork. Remotes follow the commons
 * layout: `origin` is the rig's fork, `upstream` the shared commons.
 *
 * @module commons_store/local
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomBytes } from 'crypto';

import type {
  CommonsStore,
  CommonsTables,
  PushLog,
  SelectQuery,
  Statement,
  TableName,
} from '../commons_store.types';
import {
  BranchNotFoundError,
  ConstraintViolationError,
  MergeConflictError,
  PreconditionFailedError,
  PushRejectedError,
  StoreCommandError,
} from '../errors';
import { createLogger } from '../../logger';
import type { ExecCommand, ExecResult, LocalCommonsStoreDependencies } from './local_commons_store.types';
import {
  REQUIRED_GUARD_TABLE,
  decodeRows,
  escapeSql,
  parseJsonRows,
  renderBranchList,
  renderScript,
  renderSelect,
} from './sql_renderer';

const logger = createLogger('[LocalCommonsStore] ');

const DEFAULT_TIMEOUTS = {
  query: 15_000,
  script: 30_000,
  remote: 60_000,
};

function outputOf(result: ExecResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(part => part !== '').join('\n');
}

export class LocalCommonsStore implements CommonsStore {
  private readonly dbDir: string;
  private readonly execCommand: ExecCommand;
  private readonly resetOnSync: boolean;
  private readonly timeouts: typeof DEFAULT_TIMEOUTS;
  private readonly scriptDir: string;

  constructor(dependencies: LocalCommonsStoreDependencies) {
    if (!dependencies.dbDir) {
      throw new Error('dbDir is required for LocalCommonsStore');
    }
    this.dbDir = dependencies.dbDir;
    this.execCommand = dependencies.execCommand;
    this.resetOnSync = dependencies.resetOnSync ?? false;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...dependencies.timeouts };
    this.scriptDir = dependencies.scriptDir ?? os.tmpdir();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMMAND HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async run(args: string[], timeout: number): Promise<ExecResult> {
    return this.execCommand('dolt', args, { cwd: this.dbDir, timeout });
  }

  /** Runs a dolt command and throws StoreCommandError on a non-zero exit. */
  private async dolt(args: string[], timeout: number = this.timeouts.script): Promise<ExecResult> {
    const result = await this.run(args, timeout);
    if (result.exitCode !== 0) {
      const output = outputOf(result);
      throw new StoreCommandError(`dolt ${args.join(' ')}: ${output || `exit code ${result.exitCode}`}`, result.stderr, `dolt ${args.join(' ')}`);
    }
    return result;
  }

  private async sqlQuery(sql: string): Promise<Record<string, unknown>[]> {
    const result = await this.dolt(['sql', '-r', 'json', '-q', sql], this.timeouts.query);
    return parseJsonRows(result.stdout);
  }

  /**
   * Runs a SQL script from a temporary file (`dolt sql --file`).
   */
  private async sqlScript(script: string): Promise<ExecResult> {
    const file = path.join(this.scriptDir, `dolt-script-${randomBytes(6).toString('hex')}.sql`);
    await fs.writeFile(file, script, 'utf-8');
    try {
      return await this.run(['sql', '--file', file], this.timeouts.script);
    } finally {
      await fs.rm(file, { force: true });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async query<K extends TableName>(select: SelectQuery<K>, ref: string = ''): Promise<CommonsTables[K][]> {
    const records = await this.sqlQuery(renderSelect(select, ref));
    return decodeRows(select.table, records);
  }

  async branches(prefix: string): Promise<string[]> {
    const records = await this.sqlQuery(renderBranchList(prefix));
    return records
      .map(record => record['name'])
      .filter((name): name is string => typeof name === 'string' && name !== '');
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Checks out the branch (created from main when absent), runs the commit
   * script and returns to main. A failed script leaves no working changes,
   * and a branch created for it is removed again.
   */
  async exec(branch: string, commitMessage: string, signed: boolean, statements: Statement[]): Promise<void> {
    const onBranch = branch !== '' && branch !== 'main';
    let created = false;

    if (onBranch) {
      const exists = (await this.branches(branch)).includes(branch);
      if (!exists) {
        await this.dolt(['branch', branch, 'main']);
        created = true;
      }
      await this.dolt(['checkout', branch]);
    }

    let result: ExecResult;
    try {
      result = await this.sqlScript(renderScript(commitMessage, signed, statements));
      if (result.exitCode !== 0) {
        await this.dolt(['reset', '--hard']);
      }
    } finally {
      if (onBranch) {
        await this.dolt(['checkout', 'main']);
      }
    }

    if (result.exitCode !== 0) {
      if (created) {
        await this.dolt(['branch', '-D', branch]);
      }
      throw this.scriptError(result, commitMessage);
    }
    logger.debug(`committed "${commitMessage}" on ${onBranch ? branch : 'main'}`);
  }

  private scriptError(result: ExecResult, commitMessage: string): Error {
    const output = outputOf(result);
    const lower = output.toLowerCase();
    if (lower.includes('nothing to commit')) {
      return new PreconditionFailedError('nothing to commit', commitMessage);
    }
    if (lower.includes(REQUIRED_GUARD_TABLE)) {
      return new PreconditionFailedError(`precondition failed: ${output}`, commitMessage);
    }
    if (lower.includes('duplicate') || lower.includes('check constraint')) {
      const table = /\b(wanted|completions|stamps)\b/.exec(lower)?.[1] ?? 'commons';
      return new ConstraintViolationError(table, output);
    }
    return new StoreCommandError(`dolt sql: ${output}`, result.stderr, 'dolt sql --file');
  }

  async deleteBranch(name: string): Promise<void> {
    const result = await this.sqlScript(`CALL DOLT_BRANCH('-D', '${escapeSql(name)}');\n`);
    if (result.exitCode !== 0) {
      const output = outputOf(result);
      if (output.toLowerCase().includes('not found')) {
        throw new BranchNotFoundError(name);
      }
      throw new StoreCommandError(`delete branch ${name}: ${output}`, result.stderr, 'dolt sql --file');
    }
  }

  /**
   * Merges a branch into main; a conflicting merge is aborted.
   */
  async mergeBranch(name: string): Promise<void> {
    const result = await this.sqlScript(`CALL DOLT_CHECKOUT('main');\nCALL DOLT_MERGE('${escapeSql(name)}');\n`);
    if (result.exitCode === 0) return;

    const output = outputOf(result);
    if (output.toLowerCase().includes('conflict')) {
      const abort = await this.sqlScript("CALL DOLT_MERGE('--abort');\n");
      if (abort.exitCode !== 0) {
        logger.warn(`merge abort for ${name} failed: ${outputOf(abort)}`);
      }
      throw new MergeConflictError(name, [output]);
    }
    if (output.toLowerCase().includes('not found')) {
      throw new BranchNotFoundError(name);
    }
    throw new StoreCommandError(`merging branch ${name}: ${output}`, result.stderr, 'dolt sql --file');
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REMOTE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Force-pushes a mutation branch to origin. Rig branches are rewritten
   * freely (unclaim then claim again), hence --force.
   */
  async pushBranch(name: string, log: PushLog): Promise<void> {
    const result = await this.run(['push', '--force', 'origin', name], this.timeouts.remote);
    if (result.exitCode !== 0) {
      const output = outputOf(result);
      log.write(`  warning: push branch ${name} to origin failed: ${output}\n`);
      throw new PushRejectedError(name, output);
    }
    log.write(`  Pushed branch ${name} to origin\n`);
  }

  async pushMain(log: PushLog): Promise<void> {
    const result = await this.run(['push', '--force', 'origin', 'main'], this.timeouts.remote);
    if (result.exitCode !== 0) {
      const output = outputOf(result);
      log.write(`  warning: push main to origin failed: ${output}\n`);
      throw new PushRejectedError('main', output);
    }
    log.write('  Pushed main to origin\n');
  }

  async deleteRemoteBranch(name: string): Promise<void> {
    await this.dolt(['push', 'origin', `:${name}`], this.timeouts.remote);
  }

  /**
   * Pushes main to upstream, then origin. A rejected push pulls from that
   * remote and retries once.
   */
  async pushWithSync(log: PushLog): Promise<void> {
    const failures: string[] = [];
    for (const remote of ['upstream', 'origin']) {
      const first = await this.run(['push', remote, 'main'], this.timeouts.remote);
      if (first.exitCode !== 0) {
        log.write(`  Syncing with ${remote}...\n`);
        const pull = await this.run(['pull', remote, 'main'], this.timeouts.remote);
        if (pull.exitCode !== 0) {
          log.write(`  warning: sync from ${remote} failed: ${outputOf(pull)}\n`);
          failures.push(remote);
          continue;
        }
        const retry = await this.run(['push', remote, 'main'], this.timeouts.remote);
        if (retry.exitCode !== 0) {
          log.write(`  warning: push to ${remote} failed after sync: ${outputOf(retry)}\n`);
          failures.push(remote);
          continue;
        }
      }
      log.write(`  Pushed to ${remote}\n`);
    }
    if (failures.length > 0) {
      throw new PushRejectedError(failures.join(', '), 'push failed after sync');
    }
  }

  /**
   * Pulls upstream main; in reset mode discards local main for upstream's.
   */
  async sync(): Promise<void> {
    if (this.resetOnSync) {
      await this.dolt(['fetch', 'upstream'], this.timeouts.remote);
      await this.dolt(['reset', '--hard', 'upstream/main']);
      return;
    }
    await this.dolt(['pull', 'upstream', 'main'], this.timeouts.remote);
  }

  /** Local clones can always write to main. */
  async canWildWest(): Promise<void> {
    return;
  }
}
