export const BRANCH_PREFIX = 'wl';

/**
 * Deterministic branch for a rig's pending changes to one item.
 * Other components parse this exact shape.
 */
export function branchName(rigHandle: string, wantedId: string): string {
  return `${BRANCH_PREFIX}/${rigHandle}/${wantedId}`;
}

/** Prefix listing every branch of one rig. */
export function rigBranchPrefix(rigHandle: string): string {
  return `${BRANCH_PREFIX}/${rigHandle}/`;
}

/**
 * Parses `wl/{rig}/{wantedId}`; null for any other shape.
 */
export function parseBranchName(branch: string): { rigHandle: string; wantedId: string } | null {
  const parts = branch.split('/');
  if (parts.length !== 3) return null;
  const [prefix, rigHandle, wantedId] = parts;
  if (prefix !== BRANCH_PREFIX || !rigHandle || !wantedId) return null;
  return { rigHandle, wantedId };
}
