import type { Request } from 'express';
import { ValidationError } from '@barflow/shared';
import { idParamSchema } from '@barflow/module-orders';
import type { RouteHandler, RouteOptions } from '../http/with-route';

export type HttpMethod = 'get' | 'post' | 'patch' | 'put' | 'delete';

export interface ApiRoute {
  method: HttpMethod;
  path: string;
  handler: RouteHandler;
  options?: RouteOptions;
}

export function idParam(req: Request, name: string): number {
  const parsed = idParamSchema.safeParse(req.params[name]);
  if (!parsed.success) {
    throw new ValidationError('Validation failed', [
      { field: name, message: 'Expected a positive integer id' },
    ]);
  }
  return parsed.data;
}
