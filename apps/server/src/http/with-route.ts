import type { Request, RequestHandler } from 'express';
import { AuthenticationError, ValidationError, generateUlid } from '@barflow/shared';
import type { ApiResponse } from '@barflow/shared';
import { requestContext } from '@barflow/core/auth/context';
import type { RequestContext } from '@barflow/core/auth/context';
import { extractBearerToken, verifyAccessToken } from '@barflow/core/auth/token';
import type { Actor } from '@barflow/core/auth/actor';
import type { z } from 'zod';

export type RouteHandler<T = unknown> = (req: Request, ctx: RequestContext) => Promise<T>;

export interface RouteOptions {
  /** Status for a successful response. Default 200. */
  successStatus?: number;
}

export type WithRoute = <T>(handler: RouteHandler<T>, options?: RouteOptions) => RequestHandler;

function queryToken(req: Request): string | null {
  const token = req.query.token;
  return typeof token === 'string' ? token : null;
}

export function authenticateRequest(req: Request, jwtSecret: string): Actor {
  const token = extractBearerToken(req.headers.authorization, queryToken(req));
  if (!token) throw new AuthenticationError();
  return verifyAccessToken(token, jwtSecret);
}

/** The request id assigned by the request logger, or a fresh one. */
export function requestIdOf(res: { locals: Record<string, unknown> }): string {
  const id = res.locals.requestId;
  return typeof id === 'string' ? id : generateUlid();
}

/**
 * Wraps an API handler: authenticates the caller, runs the handler inside the
 * request context and sends `{ data }`. Errors go to the error middleware.
 */
export function createRouteWrapper(jwtSecret: string): WithRoute {
  return <T>(handler: RouteHandler<T>, options: RouteOptions = {}): RequestHandler =>
    async (req, res, next) => {
      try {
        const actor = authenticateRequest(req, jwtSecret);
        const ctx: RequestContext = { actor, requestId: requestIdOf(res) };
        res.locals.userId = actor.userId;

        const data = await requestContext.run(ctx, () => handler(req, ctx));
        const body: ApiResponse<T> = { data };
        res.status(options.successStatus ?? 200).json(body);
      } catch (error) {
        next(error);
      }
    };
}

/** Parses request input, turning zod issues into a `ValidationError` with field details. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Validation failed',
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}
