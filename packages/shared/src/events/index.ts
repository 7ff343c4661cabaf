import type { IEventBus } from './IEventBus';
import { InMemoryEventBus } from './InMemoryEventBus';

let cachedBus: IEventBus | null = null;

export function getEventBus(): IEventBus {
  if (!cachedBus) {
    cachedBus = new InMemoryEventBus();
  }

  return cachedBus;
}

export function clearEventBusSubscribers(): void {
  cachedBus?.clearAllSubscribers?.();
  cachedBus = null;
}

export * from './IEventBus';
export { InMemoryEventBus } from './InMemoryEventBus';
export * from './contracts';
