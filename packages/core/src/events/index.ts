import type { EventBus } from './bus';
import { InMemoryEventBus } from './in-memory-bus';
import { logger } from '../observability/logger';

let eventBus: EventBus | null = null;

export function getEventBus(): EventBus {
  if (!eventBus) {
    eventBus = new InMemoryEventBus();
  }
  return eventBus;
}

export function setEventBus(bus: EventBus): void {
  eventBus = bus;
}

export async function initializeEventSystem(): Promise<EventBus> {
  const bus = getEventBus();
  await bus.start();
  logger.info('Event system initialized');
  return bus;
}

export async function shutdownEventSystem(): Promise<void> {
  if (!eventBus) return;
  await eventBus.stop();
  logger.info('Event system stopped');
}

export type { EventBus, EventHandler } from './bus';
export { InMemoryEventBus } from './in-memory-bus';
export type { DeadLetter } from './in-memory-bus';
export { buildEvent, buildEventFromContext } from './build-event';
export { publishWithEvents } from './publish-with-events';
