/**
 * Event Bus types for board events
 */

import type { BoardMode, MutationKind, WantedStatus } from '../wanted/wanted.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (ms since epoch) */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

export type WantedMutatedEvent = BaseEvent & {
  type: 'wanted.mutated';
  payload: {
    wantedId: string;
    kind: MutationKind;
    rigHandle: string;
    mode: BoardMode;
    /** Branch holding the change; empty for main or after cleanup */
    branch: string;
    /** Status after the mutation, null when the item is gone */
    status: WantedStatus | null;
  };
};

export type BranchAppliedEvent = BaseEvent & {
  type: 'branch.applied';
  payload: {
    branch: string;
    wantedId: string;
    rigHandle: string;
  };
};

export type BranchDiscardedEvent = BaseEvent & {
  type: 'branch.discarded';
  payload: {
    branch: string;
    wantedId: string;
    rigHandle: string;
  };
};

export type BoardEvent = WantedMutatedEvent | BranchAppliedEvent | BranchDiscardedEvent;
export type BoardEventType = BoardEvent['type'];
export type BoardEventOf<T extends BoardEventType> = Extract<BoardEvent, { type: T }>;

export type EventHandler<T extends BoardEvent = BoardEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to, or '*' */
  eventType: BoardEventType | '*';
  metadata: {
    createdAt: number;
  };
};
