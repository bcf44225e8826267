import { randomBytes } from 'node:crypto';
import {
  CLAIM_REFERENCE_PREFIX,
  MEMBER_NUMBER_PREFIX,
} from '@medclaims/shared/constants/claim.constants.js';

/** `prefix` followed by `length` uppercase hex characters. */
export function generateReference(prefix: string, length: number): string {
  const hex = randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
  return `${prefix}${hex.toUpperCase()}`;
}

/** CLM-XXXXXXXX */
export function generateClaimReference(): string {
  return generateReference(CLAIM_REFERENCE_PREFIX, 8);
}

/** MEM-XXXXXXX */
export function generateMemberNumber(): string {
  return generateReference(MEMBER_NUMBER_PREFIX, 7);
}
