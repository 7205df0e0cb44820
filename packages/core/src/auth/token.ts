import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError, USER_ROLES } from '@barflow/shared';
import type { Actor } from './actor';

/**
 * Access tokens are issued by the session service; this side only verifies
 * them. HS256 with a shared secret.
 */
const ClaimsSchema = z.object({
  sub: z.union([z.string(), z.number()]).pipe(z.coerce.number().int().positive()),
  role: z.enum(USER_ROLES),
  barIds: z.array(z.number().int().positive()).default([]),
});

export function verifyAccessToken(token: string, secret: string): Actor {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError || error instanceof jwt.TokenExpiredError) {
      throw new AuthenticationError('Invalid or expired access token');
    }
    throw error;
  }
  if (typeof decoded === 'string') {
    throw new AuthenticationError('Invalid access token payload');
  }
  const claims = ClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new AuthenticationError('Invalid access token claims');
  }
  return { userId: claims.data.sub, role: claims.data.role, barIds: claims.data.barIds };
}

/** Used by tests and local tooling to mint tokens the server accepts. */
export function signAccessToken(actor: Actor, secret: string, expiresIn: number = 3600): string {
  return jwt.sign({ role: actor.role, barIds: actor.barIds }, secret, {
    algorithm: 'HS256',
    subject: String(actor.userId),
    expiresIn,
  });
}

/** Reads `Authorization: Bearer <token>`, falling back to a `token` query parameter. */
export function extractBearerToken(
  authorizationHeader: string | undefined,
  queryToken?: string | null,
): string | null {
  if (authorizationHeader) {
    const match = /^Bearer\s+(.+)$/i.exec(authorizationHeader.trim());
    if (match?.[1]) return match[1];
  }
  return queryToken || null;
}
