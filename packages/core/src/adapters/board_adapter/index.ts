export { BoardAdapter, REVERTED_HINT, BRANCH_ONLY_DELETE_HINT } from './board_adapter';
export type {
  BoardAdapterDependencies,
  BoardCapabilities,
  CapabilityFlags,
  CapabilityName,
  IBoardAdapter,
} from './board_adapter.types';
export { BranchLifecycleError, BranchPushError, DiscardFailedError } from './errors';
