/**
 * Branch State Resolver
 *
 * Merges the main snapshot of an item with the acting rig's branch
 * snapshot into one effective view plus a delta label.
 */

import { isDeepStrictEqual } from 'util';
import type { CommonsStore } from '../commons_store/commons_store.types';
import type {
  BoardMode,
  BranchAction,
  DeltaLabel,
  ResolvedItemState,
  Transition,
  WantedItem,
} from './wanted.types';
import { branchName } from './branch_name';
import { queryCompletion, queryItem, queryItemStamp } from './queries';
import { transitionPath } from './transitions';

const CONTENT_FIELDS = [
  'id', 'title', 'description', 'project', 'type', 'priority', 'tags',
  'postedBy', 'claimedBy', 'status', 'effortLevel',
] as const;

/**
 * Two snapshots of an item carry the same content. Timestamps are ignored
 * and an empty claimer equals no claimer.
 */
export function sameContent(a: WantedItem, b: WantedItem): boolean {
  return CONTENT_FIELDS.every(field => {
    if (field === 'claimedBy') {
      return (a.claimedBy || null) === (b.claimedBy || null);
    }
    return isDeepStrictEqual(a[field], b[field]);
  });
}

/**
 * Delta label between main and branch snapshots.
 *
 * - '' when there is no branch snapshot or nothing differs
 * - 'new' when the item does not exist on main
 * - 'update' when only content fields differ
 * - the transition name for a single hop
 * - 'changes' for two or more hops
 */
export function computeDelta(
  main: WantedItem | null,
  branch: WantedItem | null,
  stamped: boolean
): { delta: DeltaLabel; hops: Transition[] } {
  if (!branch) return { delta: '', hops: [] };
  if (!main) return { delta: 'new', hops: [] };
  if (sameContent(main, branch)) return { delta: '', hops: [] };
  if (main.status === branch.status) return { delta: 'update', hops: [] };

  const hops = transitionPath(main.status, branch.status, stamped);
  const [only] = hops;
  if (hops.length === 1 && only !== undefined) {
    return { delta: only, hops };
  }
  return { delta: 'changes', hops };
}

/**
 * Loads main and, when the rig's branch exists, branch snapshots of an item.
 * Completion and stamp are read from the branch when it exists.
 */
export async function resolveItemState(
  store: CommonsStore,
  rigHandle: string,
  wantedId: string
): Promise<ResolvedItemState> {
  const name = branchName(rigHandle, wantedId);
  const [main, listed] = await Promise.all([
    queryItem(store, wantedId),
    store.branches(name),
  ]);
  const hasBranch = listed.includes(name);
  const ref = hasBranch ? name : '';
  const branch = hasBranch ? await queryItem(store, wantedId, name) : null;
  const completion = await queryCompletion(store, wantedId, ref);
  const stamp = await queryItemStamp(store, completion, ref);
  const { delta, hops } = computeDelta(main, branch, stamp !== null);

  return {
    main,
    branch,
    branchName: hasBranch ? name : '',
    effective: branch ?? main,
    completion,
    stamp,
    delta,
    hops,
  };
}

/**
 * Branch-level actions for the detail view.
 *
 * Discard is dropped when delete is available, since delete already
 * disposes of the branch.
 */
export function computeBranchActions(
  mode: BoardMode,
  branch: string,
  delta: DeltaLabel,
  prUrl: string,
  hasDelete: boolean
): BranchAction[] {
  if (branch === '' || delta === '') return [];

  const actions: BranchAction[] = [];
  switch (mode) {
    case 'pr':
      if (prUrl === '') actions.push('submit_pr');
      break;
    case 'wild-west':
      actions.push('apply');
      break;
  }
  if (!hasDelete) actions.push('discard');
  return actions;
}
