import { monotonicFactory } from 'ulid';

// Crockford base32, no I, L, O or U
const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

const nextUlid = monotonicFactory();

/** Session and message identifiers: sortable by creation time within a process. */
export function generateUlid(): string {
  return nextUlid();
}

export function isValidUlid(value: unknown): value is string {
  return typeof value === 'string' && ULID_PATTERN.test(value);
}
