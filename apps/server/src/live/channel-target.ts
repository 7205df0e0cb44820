import { AuthorizationError } from '@barflow/shared';
import { isStaffOf, isSuperAdmin } from '@barflow/core/auth/actor';
import type { Actor } from '@barflow/core/auth/actor';
import { barKey, userKey } from '@barflow/module-live';
import type { ChannelKey } from '@barflow/module-live';

export type ChannelTarget = { kind: 'bar'; barId: number } | { kind: 'user'; userId: number };

const CHANNEL_PATH = /^\/ws\/(bar|user)\/([1-9]\d*)\/orders\/?$/;

/** Maps an upgrade path to the feed it asks for, or null for anything else. */
export function parseChannelPath(pathname: string): ChannelTarget | null {
  const match = CHANNEL_PATH.exec(pathname);
  if (!match) return null;
  const id = Number(match[2]);
  if (!Number.isSafeInteger(id)) return null;
  return match[1] === 'bar' ? { kind: 'bar', barId: id } : { kind: 'user', userId: id };
}

/** Bar feeds are for that bar's staff; user feeds for the user themselves. Super admins see all. */
export function authorizeChannel(actor: Actor, target: ChannelTarget): ChannelKey {
  if (target.kind === 'bar') {
    if (!isStaffOf(actor, target.barId)) {
      throw new AuthorizationError(`Not staff of bar ${target.barId}`);
    }
    return barKey(target.barId);
  }
  if (actor.userId !== target.userId && !isSuperAdmin(actor)) {
    throw new AuthorizationError('Cannot subscribe to another user\'s orders');
  }
  return userKey(target.userId);
}
