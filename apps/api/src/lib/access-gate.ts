// ============================================================================
// Ownership & role scoping
// Permission checks live in the authorize() preHandler; this module covers
// the record-level rules that depend on who owns the data.
// ============================================================================

import { Role } from '@medclaims/shared/constants/iam.constants.js';
import {
  type ReviewType,
  ROLE_REVIEW_TYPE,
} from '@medclaims/shared/constants/claim.constants.js';
import { ForbiddenError } from './errors.js';

export interface Principal {
  userId: string;
  role: Role;
}

/** POLICYHOLDER is the only role whose reach is limited to its own records. */
export function isOwnerScoped(principal: Principal): boolean {
  return principal.role === Role.POLICYHOLDER;
}

/**
 * Policyholder filter to push into list queries: the principal's own id for
 * a POLICYHOLDER, undefined (no filter) for everyone else.
 */
export function policyholderScope(principal: Principal): string | undefined {
  return isOwnerScoped(principal) ? principal.userId : undefined;
}

/**
 * Single-record gate. `ownerId` is the policyholder the record belongs to,
 * reached through its claim and policy.
 */
export function assertOwnerAccess(principal: Principal, ownerId: string): void {
  if (isOwnerScoped(principal) && ownerId !== principal.userId) {
    throw new ForbiddenError('You do not have access to this resource');
  }
}

/**
 * Review-type filter for review listings: reviewers only see their own type,
 * everyone else is unrestricted.
 */
export function reviewTypeScope(principal: Principal): ReviewType | undefined {
  if (principal.role === Role.ADMIN) return undefined;
  return ROLE_REVIEW_TYPE[principal.role];
}
