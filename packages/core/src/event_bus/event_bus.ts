import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';

import type {
  BoardEvent,
  BoardEventOf,
  BoardEventType,
  EventHandler,
  EventSubscription
} from './types';
import { createLogger } from '../logger';

const logger = createLogger('[EventBus] ');

function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${randomBytes(5).toString('hex')}`;
}

function isEventOfType<T extends BoardEventType>(event: BoardEvent, type: T): event is BoardEventOf<T> {
  return event.type === type;
}

/**
 * Event Stream interface
 */
export interface IEventStream {
  publish(event: BoardEvent): void;

  subscribe<T extends BoardEventType>(
    eventType: T,
    handler: EventHandler<BoardEventOf<T>>
  ): EventSubscription;

  subscribeToAll(handler: EventHandler): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

type Registration = {
  subscription: EventSubscription;
  listener: (event: BoardEvent) => void;
};

/**
 * In-memory EventBus on Node's EventEmitter.
 *
 * Publishing never waits for handlers; handler failures are logged and
 * never reach the publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private registrations: Map<string, Registration>;
  private pendingHandlers: Set<Promise<void>>;

  constructor() {
    this.emitter = new EventEmitter();
    this.registrations = new Map();
    this.pendingHandlers = new Set();
    this.emitter.setMaxListeners(100);
  }

  publish(event: BoardEvent): void {
    if (!event.source) {
      throw new Error('Event must have a valid source string');
    }
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  private track(eventType: string, run: () => void | Promise<void>): void {
    const handlerPromise = (async () => {
      try {
        await run();
      } catch (error) {
        logger.error(`Error in event handler for ${eventType}:`, error);
      }
    })();

    this.pendingHandlers.add(handlerPromise);
    void handlerPromise.finally(() => {
      this.pendingHandlers.delete(handlerPromise);
    });
  }

  private register(eventType: BoardEventType | '*', listener: (event: BoardEvent) => void): EventSubscription {
    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      metadata: { createdAt: Date.now() }
    };
    this.emitter.on(eventType, listener);
    this.registrations.set(subscription.id, { subscription, listener });
    return subscription;
  }

  subscribe<T extends BoardEventType>(
    eventType: T,
    handler: EventHandler<BoardEventOf<T>>
  ): EventSubscription {
    return this.register(eventType, (event: BoardEvent) => {
      if (isEventOfType(event, eventType)) {
        const matched = event;
        this.track(eventType, () => handler(matched));
      }
    });
  }

  /**
   * Subscribe to all events (monitoring, logging)
   */
  subscribeToAll(handler: EventHandler): EventSubscription {
    return this.register('*', (event: BoardEvent) => {
      this.track('*', () => handler(event));
    });
  }

  unsubscribe(subscriptionId: string): boolean {
    const registration = this.registrations.get(subscriptionId);
    if (!registration) {
      return false;
    }
    this.emitter.removeListener(registration.subscription.eventType, registration.listener);
    this.registrations.delete(subscriptionId);
    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.registrations.values(), registration => registration.subscription);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.registrations.clear();
  }

  getSubscriptionCount(eventType: BoardEventType | '*'): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @example
   * ```typescript
   * await board.claim(id);         // publishes wanted.mutated
   * await eventBus.waitForIdle();  // handlers have run
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }
      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10))
      ]);
    }
  }
}
