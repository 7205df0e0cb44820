import { monotonicFactory, ulid } from 'ulid';

const monotonicUlid = monotonicFactory();

export function generateUlid(): string {
  return monotonicUlid();
}

/**
 * Short customer-facing order code: 40 random bits from a non-monotonic
 * ULID, so it neither encodes the creation time nor follows the previous code.
 */
export function generatePublicCode(): string {
  return ulid().slice(-8);
}
