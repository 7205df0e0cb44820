import { AsyncLocalStorage } from 'node:async_hooks';
import type { Actor } from './actor';

export interface RequestContext {
  actor: Actor;
  requestId: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext {
  const ctx = requestContext.getStore();
  if (!ctx) {
    throw new Error('No request context available. Ensure middleware has been applied.');
  }
  return ctx;
}
