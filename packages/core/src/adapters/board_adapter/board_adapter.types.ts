import type { CommonsStore } from '../../commons_store/commons_store.types';
import type { IEventStream } from '../../event_bus';
import type {
  AcceptInput,
  BoardMode,
  BrowseFilter,
  BrowseResult,
  DashboardResult,
  DetailResult,
  MutationResult,
  PostInput,
  WantedUpdate,
} from '../../wanted/wanted.types';

/**
 * Optional collaborators provided by the hosting layer. An absent callback
 * disables the dependent operation with CapabilityUnavailableError.
 */
export type BoardCapabilities = {
  /** Opens a pull request for a branch; resolves to its URL. */
  createPullRequest?: (branch: string) => Promise<string>;
  /** URL of the open pull request for a branch, or '' when none. */
  checkPullRequest?: (branch: string) => Promise<string>;
  closePullRequest?: (branch: string) => Promise<void>;
  loadDiff?: (branch: string) => Promise<string>;
  /** Web URL of a branch on the fork host. */
  branchUrl?: (branch: string) => string;
  /** Persists mode and signing, e.g. ConfigManager.saveSettings. */
  saveSettings?: (mode: BoardMode, signing: boolean) => Promise<void>;
  /** Pending item IDs across all rigs (upstream pull requests). */
  listPendingItems?: () => Promise<Record<string, number>>;
};

export type CapabilityName = keyof BoardCapabilities;

export type CapabilityFlags = Record<CapabilityName, boolean>;

/**
 * BoardAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type BoardAdapterDependencies = {
  // Data Layer
  store: CommonsStore;

  // Identity and settings
  rigHandle: string;
  mode: BoardMode;
  signing?: boolean;

  // Hosting layer callbacks (Optional)
  capabilities?: BoardCapabilities;

  // Infrastructure Layer (Optional)
  eventBus?: IEventStream;
  /** Time source for timestamps and IDs (default: system clock) */
  clock?: () => Date;
};

/**
 * BoardAdapter Interface - the mutation engine of one joined commons
 */
export interface IBoardAdapter {
  // Reads
  browse(filter?: BrowseFilter): Promise<BrowseResult>;
  detail(wantedId: string): Promise<DetailResult>;
  dashboard(): Promise<DashboardResult>;

  // Mutations
  post(input: PostInput): Promise<MutationResult>;
  update(wantedId: string, fields: WantedUpdate): Promise<MutationResult>;
  claim(wantedId: string): Promise<MutationResult>;
  unclaim(wantedId: string): Promise<MutationResult>;
  done(wantedId: string, evidence: string): Promise<MutationResult>;
  accept(wantedId: string, input: AcceptInput): Promise<MutationResult>;
  reject(wantedId: string, reason?: string): Promise<MutationResult>;
  close(wantedId: string): Promise<MutationResult>;
  delete(wantedId: string): Promise<MutationResult>;

  // Branch lifecycle
  applyBranch(branch: string): Promise<void>;
  discardBranch(branch: string): Promise<void>;
  submitPR(branch: string): Promise<string>;
  branchDiff(branch: string): Promise<string>;

  // Settings and sync
  saveSettings(mode: BoardMode, signing: boolean): Promise<void>;
  sync(): Promise<void>;
  mode(): BoardMode;
  rigHandle(): string;
  capabilities(): CapabilityFlags;
}
