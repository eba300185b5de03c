export * from './wanted.types';
export * from './errors';
export { branchName, rigBranchPrefix, parseBranchName, BRANCH_PREFIX } from './branch_name';
export {
  TRANSITION_RULES,
  availableTransitions,
  transitionBetween,
  transitionPath,
  isTerminal,
} from './transitions';
export type { TransitionRule } from './transitions';
export {
  claimStatements,
  unclaimStatements,
  doneStatements,
  acceptStatements,
  rejectStatements,
  closeStatements,
  deleteStatements,
  insertWantedStatements,
  updateWantedStatements,
} from './statements';
export {
  DEFAULT_BROWSE_LIMIT,
  queryItem,
  queryCompletion,
  queryStamp,
  queryItemStamp,
  browseQuery,
  matchesBrowseFilter,
  toSummary,
} from './queries';
export { resolveItemState, computeDelta, computeBranchActions, sameContent } from './resolve_item_state';
