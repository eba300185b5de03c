/**
 * Wanted Board domain types.
 *
 * Rows use camelCase field names; the local store maps them to the
 * commons schema columns (posted_by, claimed_by, ...).
 */

export const WANTED_STATUSES = ['open', 'claimed', 'in_review', 'completed', 'withdrawn'] as const;
export type WantedStatus = typeof WANTED_STATUSES[number];

export const WANTED_TYPES = ['', 'feature', 'bug', 'design', 'rfc', 'docs'] as const;
export type WantedType = typeof WANTED_TYPES[number];

export const EFFORT_LEVELS = ['trivial', 'small', 'medium', 'large', 'epic'] as const;
export type EffortLevel = typeof EFFORT_LEVELS[number];

export const SEVERITIES = ['leaf', 'branch', 'root'] as const;
export type Severity = typeof SEVERITIES[number];

export const BOARD_MODES = ['wild-west', 'pr'] as const;
export type BoardMode = typeof BOARD_MODES[number];

/**
 * Status-changing edges of the wanted state machine, in display order.
 */
export const TRANSITIONS = ['claim', 'unclaim', 'done', 'accept', 'reject', 'close', 'delete'] as const;
export type Transition = typeof TRANSITIONS[number];

/** Every kind of write the board performs. */
export type MutationKind = Transition | 'post' | 'update';

/** Delta between an item on main and on the rig's branch. */
export type DeltaLabel = '' | 'new' | 'changes' | Transition | 'update';

export type BranchAction = 'submit_pr' | 'apply' | 'discard';

export type WantedItem = {
  id: string;
  title: string;
  description: string;
  project: string;
  type: WantedType;
  priority: number;
  tags: string[];
  postedBy: string;
  claimedBy: string | null;
  status: WantedStatus;
  effortLevel: EffortLevel;
  createdAt: string;
  updatedAt: string;
};

export type CompletionRecord = {
  id: string;
  wantedId: string;
  completedBy: string;
  evidence: string;
  stampId: string | null;
  validatedBy: string | null;
  completedAt: string;
};

export type Stamp = {
  id: string;
  author: string;
  subject: string;
  quality: number;
  reliability: number;
  severity: Severity;
  contextId: string;
  contextType: 'completion';
  skillTags: string[];
  message: string;
  createdAt: string;
};

/** Fields `update` may change on an open item. */
export type WantedUpdate = Partial<Pick<WantedItem,
  'title' | 'description' | 'project' | 'type' | 'priority' | 'tags' | 'effortLevel'>>;

export type PostInput = {
  title: string;
  description?: string;
  project?: string;
  type?: WantedType;
  priority?: number;
  tags?: string[];
  effortLevel?: EffortLevel;
};

export type AcceptInput = {
  quality: number;
  reliability?: number;
  severity?: Severity;
  skillTags?: string[];
  message?: string;
};

/**
 * Main and branch views of one item, merged.
 */
export type ResolvedItemState = {
  main: WantedItem | null;
  branch: WantedItem | null;
  /** `wl/{rig}/{id}` when the branch exists, otherwise empty. */
  branchName: string;
  effective: WantedItem | null;
  completion: CompletionRecord | null;
  stamp: Stamp | null;
  delta: DeltaLabel;
  /** Ordered transitions leading from main's status to the branch's. */
  hops: Transition[];
};

export type DetailResult = {
  item: WantedItem;
  completion: CompletionRecord | null;
  stamp: Stamp | null;
  branch: string;
  branchUrl: string;
  mainStatus: WantedStatus | '';
  prUrl: string;
  delta: DeltaLabel;
  actions: Transition[];
  branchActions: BranchAction[];
};

export type MutationResult = {
  detail: DetailResult | null;
  branch: string;
  hint: string;
};

export type WantedSummary = Pick<WantedItem,
  'id' | 'title' | 'project' | 'type' | 'priority' | 'postedBy' | 'claimedBy' | 'status' | 'effortLevel'>;

export type BrowseFilter = {
  status?: WantedStatus;
  project?: string;
  type?: WantedType;
  /** Unset or -1 means any priority. */
  priority?: number;
  postedBy?: string;
  claimedBy?: string;
  search?: string;
  /** Defaults to 50. */
  limit?: number;
  /** `mine` restricts pending IDs to the rig's own branches. */
  view?: 'mine' | 'all';
};

export type BrowseResult = {
  items: WantedSummary[];
  /** Number of pending branches per wanted ID. */
  pendingIds: Record<string, number>;
};

export type DashboardResult = {
  claimed: WantedSummary[];
  inReview: WantedSummary[];
  completed: WantedSummary[];
};
