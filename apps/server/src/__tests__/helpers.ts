import { vi } from 'vitest';
import type { Request, Response } from 'express';
import type { RequestContext } from '@barflow/core/auth/context';
import type { Actor } from '@barflow/core/auth/actor';

export function makeCtx(actor: Partial<Actor> = {}): RequestContext {
  return {
    actor: { userId: 42, role: 'customer', barIds: [], ...actor },
    requestId: 'req-test',
  };
}

export function fakeRequest(parts: {
  params?: Record<string, string>;
  body?: unknown;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  method?: string;
  path?: string;
} = {}): Request {
  const req = {
    params: parts.params ?? {},
    body: parts.body,
    query: parts.query ?? {},
    headers: parts.headers ?? {},
    method: parts.method ?? 'GET',
    path: parts.path ?? '/',
  };
  return req as unknown as Request;
}

export function fakeResponse(locals: Record<string, unknown> = {}) {
  const res = {
    locals,
    headersSent: false,
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  return { res, response: res as unknown as Response };
}
