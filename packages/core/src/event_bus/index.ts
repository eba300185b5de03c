export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export type {
  BaseEvent,
  BoardEvent,
  BoardEventOf,
  BoardEventType,
  BranchAppliedEvent,
  BranchDiscardedEvent,
  EventHandler,
  EventSubscription,
  WantedMutatedEvent,
} from './types';
