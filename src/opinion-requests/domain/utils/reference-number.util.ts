import { randomBytes } from 'crypto';

export const REFERENCE_NUMBER_PREFIX = 'OPN-';
export const REFERENCE_NUMBER_MAX_ATTEMPTS = 5;

/**
 * `OPN-` followed by 8 upper-case hex characters, e.g. `OPN-1A2B3C4D`.
 *
 * Not unique on its own; callers check storage and retry.
 */
export function generateReferenceNumber(): string {
  return `${REFERENCE_NUMBER_PREFIX}${randomBytes(4).toString('hex').toUpperCase()}`;
}
