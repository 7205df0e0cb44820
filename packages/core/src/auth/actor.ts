import type { UserRole } from '@barflow/shared';

/** The authenticated identity behind a request or live channel. */
export interface Actor {
  userId: number;
  role: UserRole;
  /** Bars the user works at. Empty for customers; ignored for super admins. */
  barIds: number[];
}

const STAFF_ROLES: readonly UserRole[] = ['bartender', 'bar_admin'];

export function isSuperAdmin(actor: Actor): boolean {
  return actor.role === 'super_admin';
}

/** Bartenders and bar admins of `barId`, and super admins everywhere. */
export function isStaffOf(actor: Actor, barId: number): boolean {
  if (isSuperAdmin(actor)) return true;
  return STAFF_ROLES.includes(actor.role) && actor.barIds.includes(barId);
}

export function isBarAdminOf(actor: Actor, barId: number): boolean {
  if (isSuperAdmin(actor)) return true;
  return actor.role === 'bar_admin' && actor.barIds.includes(barId);
}
