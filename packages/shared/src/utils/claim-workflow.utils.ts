// ============================================================================
// Claim Workflow — Pure Transition Rules
// ============================================================================

import { Role } from '../constants/iam.constants.js';
import {
  ClaimStatus,
  PaymentStatus,
  ReviewDecision,
  ReviewType,
  REVIEW_TRANSITIONS,
  REVIEW_STAGE_STATUSES,
  ROLE_REVIEW_TYPE,
  PAYABLE_CLAIM_STATUSES,
} from '../constants/claim.constants.js';
import { sumAmounts } from './money.utils.js';

export type TransitionResult =
  | { valid: true; status: ClaimStatus }
  | { valid: false; error: string };

/**
 * Compute the claim status that follows a review of `reviewType` concluding
 * with `decision`.
 *
 * Pure: the caller persists the returned status. Pairs missing from
 * REVIEW_TRANSITIONS (e.g. any NEEDS_MORE_INFO decision) are reported as
 * invalid rather than leaving the status untouched.
 */
export function resolveNextClaimStatus(
  reviewType: ReviewType,
  decision: ReviewDecision,
): TransitionResult {
  const row = REVIEW_TRANSITIONS[reviewType];
  const next = row ? row[decision] : undefined;
  if (!next) {
    return {
      valid: false,
      error: `Decision ${decision} is not valid for a ${reviewType} review`,
    };
  }
  return { valid: true, status: next };
}

/**
 * Whether a review of `reviewType` may act on a claim currently in `status`.
 */
export function isReviewStageOpen(
  reviewType: ReviewType,
  status: ClaimStatus,
): boolean {
  return REVIEW_STAGE_STATUSES[reviewType].includes(status);
}

/**
 * Role gate for review authorship. Reviewer roles may only author their own
 * review type; ADMIN may author any; every other role is barred.
 */
export function canAuthorReview(role: Role, reviewType: ReviewType): boolean {
  if (role === Role.ADMIN) return true;
  return ROLE_REVIEW_TYPE[role] === reviewType;
}

export function isPayableStatus(status: ClaimStatus): boolean {
  return PAYABLE_CLAIM_STATUSES.has(status);
}

/**
 * Claim status after one of its payments moves to `paymentStatus`.
 * PROCESSED always yields PAID (idempotent for an already-PAID claim);
 * SCHEDULED and FAILED leave the claim where it is.
 */
export function claimStatusAfterPayment(
  current: ClaimStatus,
  paymentStatus: PaymentStatus,
): ClaimStatus {
  if (paymentStatus === PaymentStatus.PROCESSED) {
    return ClaimStatus.PAID;
  }
  return current;
}

/**
 * Claim-level approved amount: full re-sum of every review item's approved
 * amount across all reviews of the claim. Missing amounts count as zero.
 */
export function aggregateApprovedAmount(
  items: ReadonlyArray<{ approvedAmount: string | null | undefined }>,
): string {
  return sumAmounts(items.map((item) => item.approvedAmount));
}
