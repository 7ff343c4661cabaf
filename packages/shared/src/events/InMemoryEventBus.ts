import { logger } from '../logger';

import type { EventHandler, IEventBus } from './IEventBus';

/** Process-local bus. Handlers of one event run concurrently; the first rejection fails the publish. */
export class InMemoryEventBus implements IEventBus {
  private readonly subscriptions = new Map<string, Set<EventHandler<unknown>>>();

  async publish<T>(eventName: string, payload: T): Promise<void> {
    const handlers = this.subscriptions.get(eventName);
    if (!handlers || handlers.size === 0) {
      logger.debug({ eventName }, 'No subscribers for event');
      return;
    }

    await Promise.all([...handlers].map(async (handler) => handler(payload)));
  }

  subscribe<T>(eventName: string, handler: EventHandler<T>): () => void {
    const entry = handler as EventHandler<unknown>;
    const handlers = this.subscriptions.get(eventName) ?? new Set<EventHandler<unknown>>();
    handlers.add(entry);
    this.subscriptions.set(eventName, handlers);

    return () => {
      const current = this.subscriptions.get(eventName);
      current?.delete(entry);
      if (current && current.size === 0) {
        this.subscriptions.delete(eventName);
      }
    };
  }

  clearAllSubscribers(): void {
    this.subscriptions.clear();
  }
}
