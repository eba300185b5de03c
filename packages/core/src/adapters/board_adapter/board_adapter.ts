import type { CommonsStore, Statement } from '../../commons_store/commons_store.types';
import { PreconditionFailedError } from '../../commons_store/errors';
import type { BoardEvent, IEventStream } from '../../event_bus';
import { createLogger } from '../../logger';
import { MutationLock } from '../../utils/mutation_lock';
import { OutputBuffer } from '../../utils/output_buffer';
import { generatePrefixedId, generateWantedId } from '../../utils/id_generator';
import {
  validateAcceptInput,
  validatePostInput,
  validateWantedUpdate,
} from '../../validation/input_validator';
import { branchName, parseBranchName, rigBranchPrefix } from '../../wanted/branch_name';
import {
  CapabilityUnavailableError,
  CompletionNotFoundError,
  InvalidBranchNameError,
  SelfStampError,
  WantedNotFoundError,
} from '../../wanted/errors';
import {
  browseQuery,
  matchesBrowseFilter,
  queryCompletion,
  queryItem,
  queryItemStamp,
  toSummary,
} from '../../wanted/queries';
import { computeBranchActions, computeDelta, resolveItemState, sameContent } from '../../wanted/resolve_item_state';
import {
  acceptStatements,
  claimStatements,
  closeStatements,
  deleteStatements,
  doneStatements,
  insertWantedStatements,
  rejectStatements,
  unclaimStatements,
  updateWantedStatements,
} from '../../wanted/statements';
import { TRANSITION_RULES, availableTransitions, transitionPath } from '../../wanted/transitions';
import type {
  AcceptInput,
  BoardMode,
  BrowseFilter,
  BrowseResult,
  DashboardResult,
  DetailResult,
  MutationKind,
  MutationResult,
  PostInput,
  ResolvedItemState,
  Stamp,
  WantedItem,
  WantedStatus,
  WantedUpdate,
} from '../../wanted/wanted.types';
import type {
  BoardAdapterDependencies,
  BoardCapabilities,
  CapabilityFlags,
  IBoardAdapter,
} from './board_adapter.types';
import { BranchLifecycleError, BranchPushError, DiscardFailedError } from './errors';

const logger = createLogger('[BoardAdapter] ');

export const REVERTED_HINT = 'reverted — branch cleaned up';
export const BRANCH_ONLY_DELETE_HINT = 'branch-only item — branch deleted';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * BoardAdapter - Mutation engine for one joined commons
 *
 * Turns board intents into guarded statements and runs them on main
 * (wild-west) or on the rig's per-item branch (pr). Every mutating call
 * holds an exclusive lock across its whole read-modify-write span; reads
 * do not take the lock.
 */
export class BoardAdapter implements IBoardAdapter {
  private readonly store: CommonsStore;
  private readonly rig: string;
  private currentMode: BoardMode;
  private signing: boolean;
  private readonly callbacks: BoardCapabilities;
  private readonly eventBus: IEventStream | undefined;
  private readonly clock: () => Date;
  private readonly lock = new MutationLock();

  constructor(dependencies: BoardAdapterDependencies) {
    if (!dependencies.rigHandle) {
      throw new Error('rigHandle is required for BoardAdapter');
    }
    this.store = dependencies.store;
    this.rig = dependencies.rigHandle;
    this.currentMode = dependencies.mode;
    this.signing = dependencies.signing ?? false;
    this.callbacks = { ...dependencies.capabilities };
    this.eventBus = dependencies.eventBus;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SETTINGS
  // ═══════════════════════════════════════════════════════════════════════

  mode(): BoardMode {
    return this.currentMode;
  }

  rigHandle(): string {
    return this.rig;
  }

  isSigning(): boolean {
    return this.signing;
  }

  capabilities(): CapabilityFlags {
    const callbacks = this.callbacks;
    return {
      createPullRequest: callbacks.createPullRequest !== undefined,
      checkPullRequest: callbacks.checkPullRequest !== undefined,
      closePullRequest: callbacks.closePullRequest !== undefined,
      loadDiff: callbacks.loadDiff !== undefined,
      branchUrl: callbacks.branchUrl !== undefined,
      saveSettings: callbacks.saveSettings !== undefined,
      listPendingItems: callbacks.listPendingItems !== undefined,
    };
  }

  /**
   * Persists mode and signing through the hosting layer, then applies them.
   */
  async saveSettings(mode: BoardMode, signing: boolean): Promise<void> {
    const persist = this.callbacks.saveSettings;
    if (!persist) {
      throw new CapabilityUnavailableError('saveSettings', 'settings persistence not available');
    }
    await this.lock.runExclusive(async () => {
      await persist(mode, signing);
      this.currentMode = mode;
      this.signing = signing;
    });
    logger.info(`Settings saved: mode=${mode} signing=${signing}`);
  }

  async sync(): Promise<void> {
    await this.lock.runExclusive(() => this.store.sync());
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Lists items on main, overlaid in pr mode with the rig's branch views.
   */
  async browse(filter: BrowseFilter = {}): Promise<BrowseResult> {
    const query = browseQuery(filter);
    const mainItems = await this.store.query(query);
    const { overrides, pendingIds } = await this.loadBranchOverlays();

    let items: WantedItem[] = mainItems;
    if (this.currentMode === 'pr' && overrides.size > 0) {
      const seen = new Set<string>();
      const merged: WantedItem[] = [];
      for (const item of mainItems) {
        seen.add(item.id);
        const override = overrides.get(item.id);
        const effective = override ?? item;
        if (override === undefined || matchesBrowseFilter(effective, filter)) {
          merged.push(effective);
        }
      }
      for (const [id, override] of overrides) {
        if (!seen.has(id) && matchesBrowseFilter(override, filter)) {
          merged.push(override);
        }
      }
      items = merged
        .sort((a, b) => a.priority - b.priority || (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
        .slice(0, query.limit);
    }

    if ((filter.view ?? 'mine') === 'all' && this.callbacks.listPendingItems) {
      try {
        const upstream = await this.callbacks.listPendingItems();
        for (const id of Object.keys(upstream)) {
          if (!pendingIds[id]) {
            pendingIds[id] = 1;
          }
        }
      } catch (error) {
        logger.debug(`listPendingItems failed: ${messageOf(error)}`);
      }
    }

    return { items: items.map(toSummary), pendingIds };
  }

  /**
   * Wild-west shows main's item, completion and stamp; a leftover rig
   * branch is still reported with its delta and actions.
   */
  async detail(wantedId: string): Promise<DetailResult> {
    const state = await resolveItemState(this.store, this.rig, wantedId);
    if (this.currentMode === 'wild-west') {
      return this.detailFromState(wantedId, await this.mainView(wantedId, state));
    }
    return this.detailFromState(wantedId, state);
  }

  /**
   * The rig's claimed, in-review and completed work, branch-aware in pr mode.
   */
  async dashboard(): Promise<DashboardResult> {
    const [claimedByMe, postedByMe] = await Promise.all([
      this.store.query({ table: 'wanted', where: { match: { claimedBy: this.rig } } }),
      this.store.query({ table: 'wanted', where: { match: { postedBy: this.rig } } }),
    ]);
    const byId = new Map<string, WantedItem>();
    for (const item of [...claimedByMe, ...postedByMe]) {
      byId.set(item.id, item);
    }
    if (this.currentMode === 'pr') {
      const { overrides } = await this.loadBranchOverlays();
      for (const [id, item] of overrides) {
        byId.set(id, item);
      }
    }

    const items = [...byId.values()].sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id));
    const mine = (item: WantedItem) => item.claimedBy === this.rig;
    return {
      claimed: items.filter(item => item.status === 'claimed' && mine(item)).map(toSummary),
      inReview: items.filter(item => item.status === 'in_review' && (mine(item) || item.postedBy === this.rig)).map(toSummary),
      completed: items.filter(item => item.status === 'completed' && mine(item)).map(toSummary),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async post(input: PostInput): Promise<MutationResult> {
    validatePostInput(input);
    return this.lock.runExclusive(() => {
      const now = this.now();
      const item: WantedItem = {
        id: generateWantedId(input.title, this.clock()),
        title: input.title,
        description: input.description ?? '',
        project: input.project ?? '',
        type: input.type ?? '',
        priority: input.priority ?? 2,
        tags: [...(input.tags ?? [])],
        postedBy: this.rig,
        claimedBy: null,
        status: 'open',
        effortLevel: input.effortLevel ?? 'medium',
        createdAt: now,
        updatedAt: now,
      };
      return this.mutate(item.id, 'post', `wl post: ${item.id}`, null, insertWantedStatements(item));
    });
  }

  async update(wantedId: string, fields: WantedUpdate): Promise<MutationResult> {
    validateWantedUpdate(fields);
    return this.lock.runExclusive(() =>
      this.mutate(wantedId, 'update', `wl update: ${wantedId}`, null,
        updateWantedStatements(wantedId, this.rig, fields, this.now()))
    );
  }

  async claim(wantedId: string): Promise<MutationResult> {
    return this.lock.runExclusive(() =>
      this.mutate(wantedId, 'claim', `wl claim: ${wantedId}`, TRANSITION_RULES.claim.to,
        claimStatements(wantedId, this.rig, this.now()))
    );
  }

  async unclaim(wantedId: string): Promise<MutationResult> {
    return this.lock.runExclusive(() =>
      this.mutate(wantedId, 'unclaim', `wl unclaim: ${wantedId}`, TRANSITION_RULES.unclaim.to,
        unclaimStatements(wantedId, this.rig, this.now()))
    );
  }

  async done(wantedId: string, evidence: string): Promise<MutationResult> {
    return this.lock.runExclusive(() => {
      const completionId = generatePrefixedId('c', [wantedId, this.rig, evidence], this.clock());
      return this.mutate(wantedId, 'done', `wl done: ${wantedId}`, TRANSITION_RULES.done.to,
        doneStatements(wantedId, this.rig, { id: completionId, evidence }, this.now()));
    });
  }

  /**
   * Stamps the completion and completes the item. Reliability defaults to
   * quality and severity to leaf.
   */
  async accept(wantedId: string, input: AcceptInput): Promise<MutationResult> {
    validateAcceptInput(input);
    return this.lock.runExclusive(async () => {
      const completion = await queryCompletion(this.store, wantedId, await this.effectiveRef(wantedId));
      if (!completion) {
        throw new CompletionNotFoundError(wantedId);
      }
      if (completion.completedBy === this.rig) {
        throw new SelfStampError();
      }

      const now = this.now();
      const stamp: Stamp = {
        id: generatePrefixedId('s', [wantedId, this.rig, completion.completedBy], this.clock()),
        author: this.rig,
        subject: completion.completedBy,
        quality: input.quality,
        reliability: input.reliability ?? input.quality,
        severity: input.severity ?? 'leaf',
        contextId: completion.id,
        contextType: 'completion',
        skillTags: [...(input.skillTags ?? [])],
        message: input.message ?? '',
        createdAt: now,
      };
      return this.mutate(wantedId, 'accept', `wl accept: ${wantedId}`, TRANSITION_RULES.accept.to,
        acceptStatements(wantedId, this.rig, completion.id, stamp, now));
    });
  }

  async reject(wantedId: string, reason: string = ''): Promise<MutationResult> {
    const message = reason !== '' ? `wl reject: ${wantedId} — ${reason}` : `wl reject: ${wantedId}`;
    return this.lock.runExclusive(() =>
      this.mutate(wantedId, 'reject', message, TRANSITION_RULES.reject.to,
        rejectStatements(wantedId, this.rig, this.now()))
    );
  }

  async close(wantedId: string): Promise<MutationResult> {
    return this.lock.runExclusive(() =>
      this.mutate(wantedId, 'close', `wl close: ${wantedId}`, TRANSITION_RULES.close.to,
        closeStatements(wantedId, this.rig, this.now()))
    );
  }

  /**
   * Withdraws an item. In pr mode an item that exists only on the rig's
   * branch is disposed of by deleting the branch, without a commit.
   */
  async delete(wantedId: string): Promise<MutationResult> {
    return this.lock.runExclusive(async () => {
      if (this.currentMode === 'pr' && (await queryItem(this.store, wantedId)) === null) {
        return this.deleteBranchOnlyItem(wantedId);
      }
      return this.mutate(wantedId, 'delete', `wl delete: ${wantedId}`, TRANSITION_RULES.delete.to,
        deleteStatements(wantedId, this.rig, this.now()));
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BRANCH LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Merges a branch into main, deletes it and pushes main to origin.
   */
  async applyBranch(branch: string): Promise<void> {
    const parsed = parseBranchName(branch);
    if (!parsed) {
      throw new InvalidBranchNameError(branch);
    }
    await this.lock.runExclusive(async () => {
      await this.store.mergeBranch(branch);
      try {
        await this.store.deleteBranch(branch);
      } catch (error) {
        throw new BranchLifecycleError(branch, 'delete local branch', error);
      }
      const log = new OutputBuffer();
      try {
        await this.store.pushMain(log);
      } catch (error) {
        throw new BranchLifecycleError(branch, 'push origin main', error);
      }
      await this.bestEffort(`delete remote branch ${branch}`, () => this.store.deleteRemoteBranch(branch));
    });
    logger.info(`Applied ${branch}`);
    this.publish({
      type: 'branch.applied',
      timestamp: this.clock().getTime(),
      source: 'board_adapter',
      payload: { branch, wantedId: parsed.wantedId, rigHandle: this.rig },
    });
  }

  /**
   * Closes the pull request, clears the branch's rows for its item and
   * deletes the branch. Only the row clear must succeed.
   */
  async discardBranch(branch: string): Promise<void> {
    const parsed = parseBranchName(branch);
    if (!parsed) {
      throw new InvalidBranchNameError(branch);
    }
    const { wantedId } = parsed;

    await this.lock.runExclusive(async () => {
      const closePullRequest = this.callbacks.closePullRequest;
      if (closePullRequest) {
        await this.bestEffort(`close pull request for ${branch}`, () => closePullRequest(branch));
      }

      const exists = (await this.store.branches(branch)).includes(branch);
      let clearError: unknown = null;
      if (exists) {
        const clear: Statement[] = [
          { op: 'delete', table: 'completions', where: { match: { wantedId } } },
          { op: 'delete', table: 'wanted', where: { match: { id: wantedId } } },
        ];
        try {
          await this.store.exec(branch, `wl discard: ${wantedId}`, this.signing, clear);
        } catch (error) {
          if (error instanceof PreconditionFailedError) {
            logger.debug(`${branch} already clear`);
          } else {
            clearError = error;
          }
        }
        await this.bestEffort(`delete local branch ${branch}`, () => this.store.deleteBranch(branch));
      }
      await this.bestEffort(`delete remote branch ${branch}`, () => this.store.deleteRemoteBranch(branch));

      if (clearError !== null) {
        throw new DiscardFailedError(branch, clearError);
      }
    });
    logger.info(`Discarded ${branch}`);
    this.publish({
      type: 'branch.discarded',
      timestamp: this.clock().getTime(),
      source: 'board_adapter',
      payload: { branch, wantedId, rigHandle: this.rig },
    });
  }

  async submitPR(branch: string): Promise<string> {
    const createPullRequest = this.callbacks.createPullRequest;
    if (!createPullRequest) {
      throw new CapabilityUnavailableError('createPullRequest', 'PR creation not available');
    }
    return createPullRequest(branch);
  }

  async branchDiff(branch: string): Promise<string> {
    const loadDiff = this.callbacks.loadDiff;
    if (!loadDiff) {
      throw new CapabilityUnavailableError('loadDiff', 'diff loading not available');
    }
    return loadDiff(branch);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private now(): string {
    return this.clock().toISOString();
  }

  private async bestEffort(step: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      logger.debug(`${step} failed (ignored): ${messageOf(error)}`);
    }
  }

  private publish(event: BoardEvent): void {
    this.eventBus?.publish(event);
  }

  private async hasBranch(name: string): Promise<boolean> {
    return (await this.store.branches(name)).includes(name);
  }

  /** The rig's branch for an item in pr mode when it exists, else main. */
  private async effectiveRef(wantedId: string): Promise<string> {
    if (this.currentMode !== 'pr') return '';
    const name = branchName(this.rig, wantedId);
    return (await this.hasBranch(name)) ? name : '';
  }

  private async pullRequestUrl(branch: string): Promise<string> {
    const checkPullRequest = this.callbacks.checkPullRequest;
    if (branch === '' || !checkPullRequest) return '';
    try {
      return await checkPullRequest(branch);
    } catch (error) {
      logger.debug(`checkPullRequest(${branch}) failed: ${messageOf(error)}`);
      return '';
    }
  }

  private branchWebUrl(branch: string): string {
    const branchUrl = this.callbacks.branchUrl;
    return branch !== '' && branchUrl ? branchUrl(branch) : '';
  }

  /** Main's view of an item, keeping the rig branch and its delta. */
  private async mainView(wantedId: string, state: ResolvedItemState): Promise<ResolvedItemState> {
    const completion = await queryCompletion(this.store, wantedId);
    const stamp = await queryItemStamp(this.store, completion);
    return { ...state, effective: state.main, completion, stamp };
  }

  private async detailFromState(wantedId: string, state: ResolvedItemState): Promise<DetailResult> {
    const item = state.effective;
    if (!item) {
      throw new WantedNotFoundError(wantedId);
    }
    const actions = availableTransitions(item, this.rig);
    const prUrl = await this.pullRequestUrl(state.branchName);
    return {
      item,
      completion: state.completion,
      stamp: state.stamp,
      branch: state.branchName,
      branchUrl: this.branchWebUrl(state.branchName),
      mainStatus: state.branchName !== '' && state.main ? state.main.status : '',
      prUrl,
      delta: state.delta,
      actions,
      branchActions: computeBranchActions(this.currentMode, state.branchName, state.delta, prUrl, actions.includes('delete')),
    };
  }

  /**
   * Result read back from a mutation branch. `main` is main's snapshot
   * taken before the mutation.
   */
  private async branchResult(wantedId: string, branch: string, main: WantedItem | null): Promise<MutationResult> {
    const item = await queryItem(this.store, wantedId, branch);
    const completion = await queryCompletion(this.store, wantedId, branch);
    const stamp = await queryItemStamp(this.store, completion, branch);
    if (!item) {
      return { detail: null, branch, hint: '' };
    }
    const { delta } = computeDelta(main, item, stamp !== null);
    const state: ResolvedItemState = {
      main,
      branch: item,
      branchName: branch,
      effective: item,
      completion,
      stamp,
      delta,
      hops: [],
    };
    return { detail: await this.detailFromState(wantedId, state), branch, hint: '' };
  }

  private async mutate(
    wantedId: string,
    kind: MutationKind,
    commitMessage: string,
    targetStatus: WantedStatus | null,
    statements: Statement[]
  ): Promise<MutationResult> {
    if (this.currentMode === 'pr' && targetStatus !== null) {
      const replayed = await this.replayedResult(wantedId, kind, targetStatus);
      if (replayed) {
        logger.debug(`${commitMessage}: ${replayed.branch} already shows ${kind}, skipping replay`);
        return replayed;
      }
    }

    const result = this.currentMode === 'pr'
      ? await this.mutatePR(wantedId, commitMessage, statements)
      : await this.mutateWildWest(wantedId, commitMessage, statements);

    logger.debug(`${commitMessage} (${this.currentMode}) branch=${result.branch || 'main'}`);
    this.publish({
      type: 'wanted.mutated',
      timestamp: this.clock().getTime(),
      source: 'board_adapter',
      payload: {
        wantedId,
        kind,
        rigHandle: this.rig,
        mode: this.currentMode,
        branch: result.branch,
        status: result.detail ? result.detail.item.status : null,
      },
    });
    return result;
  }

  private async mutateWildWest(wantedId: string, commitMessage: string, statements: Statement[]): Promise<MutationResult> {
    await this.store.canWildWest();
    await this.store.exec('', commitMessage, this.signing, statements);
    await this.store.pushWithSync(new OutputBuffer());
    return { detail: await this.detail(wantedId), branch: '', hint: '' };
  }

  /**
   * A transition already applied on the rig branch by this rig: the branch
   * shows the target status, reached last through `kind`, with this rig's
   * claim, completion or stamp where the transition writes one. Anything
   * else runs the statements, whose guards then reject it.
   */
  private async replayedResult(
    wantedId: string,
    kind: MutationKind,
    targetStatus: WantedStatus
  ): Promise<MutationResult | null> {
    const state = await resolveItemState(this.store, this.rig, wantedId);
    const current = state.branch;
    if (!current || current.status !== targetStatus || state.main?.status === targetStatus) {
      return null;
    }

    const hops = state.main ? state.hops : transitionPath('open', current.status, state.stamp !== null);
    if (hops[hops.length - 1] !== kind) {
      return null;
    }
    switch (kind) {
      case 'claim':
        if (current.claimedBy !== this.rig) return null;
        break;
      case 'done':
        if (state.completion?.completedBy !== this.rig) return null;
        break;
      case 'accept':
        if (state.stamp?.author !== this.rig) return null;
        break;
      default:
        break;
    }
    return this.branchResult(wantedId, state.branchName, state.main);
  }

  private async mutatePR(wantedId: string, commitMessage: string, statements: Statement[]): Promise<MutationResult> {
    const branch = branchName(this.rig, wantedId);
    const main = await queryItem(this.store, wantedId);

    await this.store.exec(branch, commitMessage, this.signing, statements);
    const result = await this.branchResult(wantedId, branch, main);

    const log = new OutputBuffer();
    try {
      await this.store.pushBranch(branch, log);
    } catch (error) {
      throw new BranchPushError(branch, log.toString().trim(), error);
    }

    const detail = result.detail;
    if (main && detail && sameContent(main, detail.item)) {
      await this.bestEffort(`delete local branch ${branch}`, () => this.store.deleteBranch(branch));
      await this.bestEffort(`delete remote branch ${branch}`, () => this.store.deleteRemoteBranch(branch));
      logger.info(`${branch} reverted to main, cleaned up`);
      return {
        detail: {
          ...detail,
          branch: '',
          branchUrl: '',
          mainStatus: '',
          delta: '',
          prUrl: '',
          branchActions: [],
        },
        branch: '',
        hint: REVERTED_HINT,
      };
    }

    const createPullRequest = this.callbacks.createPullRequest;
    if (detail && detail.prUrl === '' && createPullRequest) {
      try {
        const prUrl = await createPullRequest(branch);
        return {
          ...result,
          detail: {
            ...detail,
            prUrl,
            branchActions: computeBranchActions(this.currentMode, branch, detail.delta, prUrl, detail.actions.includes('delete')),
          },
        };
      } catch (error) {
        logger.warn(`PR creation for ${branch} failed: ${messageOf(error)}`);
        return { ...result, hint: `PR creation failed: ${messageOf(error)}` };
      }
    }
    return result;
  }

  private async deleteBranchOnlyItem(wantedId: string): Promise<MutationResult> {
    const branch = branchName(this.rig, wantedId);
    if (!(await this.hasBranch(branch))) {
      throw new WantedNotFoundError(wantedId);
    }
    await this.store.deleteBranch(branch);
    await this.bestEffort(`delete remote branch ${branch}`, () => this.store.deleteRemoteBranch(branch));
    logger.info(`Deleted branch-only item ${wantedId}`);
    this.publish({
      type: 'wanted.mutated',
      timestamp: this.clock().getTime(),
      source: 'board_adapter',
      payload: { wantedId, kind: 'delete', rigHandle: this.rig, mode: this.currentMode, branch: '', status: null },
    });
    return { detail: null, branch: '', hint: BRANCH_ONLY_DELETE_HINT };
  }

  /**
   * The rig's pending branches: per-item overrides (branch view differs
   * from main) and pending counts.
   */
  private async loadBranchOverlays(): Promise<{ overrides: Map<string, WantedItem>; pendingIds: Record<string, number> }> {
    const overrides = new Map<string, WantedItem>();
    const pendingIds: Record<string, number> = {};
    const names = await this.store.branches(rigBranchPrefix(this.rig));

    for (const name of names) {
      const parsed = parseBranchName(name);
      if (!parsed || parsed.rigHandle !== this.rig) continue;
      const [main, branchItem] = await Promise.all([
        queryItem(this.store, parsed.wantedId),
        queryItem(this.store, parsed.wantedId, name),
      ]);
      if (!branchItem || (main && sameContent(main, branchItem))) continue;
      overrides.set(parsed.wantedId, branchItem);
      pendingIds[parsed.wantedId] = (pendingIds[parsed.wantedId] ?? 0) + 1;
    }
    return { overrides, pendingIds };
  }
}
