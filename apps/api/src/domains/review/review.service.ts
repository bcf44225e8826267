import {
  type CreateReview,
  type UpdateReview,
  type CreateReviewItem,
  type UpdateReviewItem,
} from '@medclaims/shared/schemas/review.schema.js';
import { AuditCategory, Role } from '@medclaims/shared/constants/iam.constants.js';
import {
  ClaimAuditAction,
  REVIEW_DECISIONS,
  ROLE_REVIEW_TYPE,
  isReviewDecision,
  type ClaimStatus,
  type ReviewDecision,
  type ReviewType,
} from '@medclaims/shared/constants/claim.constants.js';
import {
  resolveNextClaimStatus,
  isReviewStageOpen,
  canAuthorReview,
  aggregateApprovedAmount,
} from '@medclaims/shared/utils/claim-workflow.utils.js';
import { amountExceeds } from '@medclaims/shared/utils/money.utils.js';
import {
  type SelectClaim,
  type InsertReview,
  type SelectReview,
  type InsertReviewItem,
  type SelectReviewItem,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import {
  ForbiddenError,
  InconsistentStateError,
  InvalidDecisionError,
  NotFoundError,
  ValidationError,
} from '../../lib/errors.js';
import { type AuditEntry, type SideEffectDispatcher } from '../../lib/side-effects.js';
import { type TransactionRunner } from '../../lib/unit-of-work.js';
import {
  assertOwnerAccess,
  policyholderScope,
  reviewTypeScope,
  type Principal,
} from '../../lib/access-gate.js';
import { type ClaimWithOwner } from '../claim/claim.repository.js';
import { type ReviewListFilters, type ReviewWithOwner } from './review.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface ReviewRepo {
  createReview(data: InsertReview): Promise<SelectReview>;
  findReviewById(reviewId: string): Promise<ReviewWithOwner | undefined>;
  listReviews(
    filters: ReviewListFilters,
  ): Promise<{ data: ReviewWithOwner[]; total: number }>;
  updateReview(
    reviewId: string,
    data: {
      decision?: ReviewDecision;
      comments?: string | null;
      rejectionReason?: string | null;
    },
  ): Promise<SelectReview | undefined>;
  createItem(data: InsertReviewItem): Promise<SelectReviewItem>;
  findItemById(itemId: string): Promise<SelectReviewItem | undefined>;
  updateItem(
    itemId: string,
    data: Partial<
      Pick<
        InsertReviewItem,
        'itemName' | 'requestedAmount' | 'approvedAmount' | 'status' | 'rejectionReason'
      >
    >,
  ): Promise<SelectReviewItem | undefined>;
  listItems(reviewId: string): Promise<SelectReviewItem[]>;
  listItemsForClaim(claimId: string): Promise<SelectReviewItem[]>;
}

export interface ReviewClaimRepo {
  findClaimById(claimId: string): Promise<ClaimWithOwner | undefined>;
  updateClaimStatus(claimId: string, status: ClaimStatus): Promise<SelectClaim | undefined>;
  setApprovedAmount(claimId: string, approvedAmount: string): Promise<SelectClaim | undefined>;
}

export interface ReviewRepos {
  reviewRepo: ReviewRepo;
  claimRepo: ReviewClaimRepo;
}

export interface ReviewServiceDeps extends ReviewRepos {
  reviewTx: TransactionRunner<ReviewRepos>;
  sideEffects: SideEffectDispatcher;
}

export type ReviewWithItems = ReviewWithOwner & { items: SelectReviewItem[] };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Reviewers default to the review type of their role; ADMIN has none and must
 * name one.
 */
function resolveReviewType(principal: Principal, requested: ReviewType | undefined): ReviewType {
  const reviewType = requested ?? ROLE_REVIEW_TYPE[principal.role];
  if (!reviewType) {
    if (principal.role === Role.ADMIN) {
      throw new ValidationError('review_type is required', { field: 'review_type' });
    }
    throw new ForbiddenError('Your role may not create reviews');
  }
  if (!canAuthorReview(principal.role, reviewType)) {
    throw new ForbiddenError(`Your role may not create ${reviewType} reviews`);
  }
  return reviewType;
}

function parseDecision(decision: string): ReviewDecision {
  if (!isReviewDecision(decision)) {
    throw new InvalidDecisionError(`Unknown review decision: ${decision}`, {
      allowed: REVIEW_DECISIONS,
    });
  }
  return decision;
}

function assertReviewAuthor(principal: Principal, review: SelectReview): void {
  if (principal.role !== Role.ADMIN && review.reviewerId !== principal.userId) {
    throw new ForbiddenError('Only the reviewer may change this review');
  }
}

function assertItemWithinRequested(
  requestedAmount: string,
  approvedAmount: string | null | undefined,
): void {
  if (amountExceeds(approvedAmount, requestedAmount)) {
    throw new ValidationError('approved_amount must not exceed requested_amount', {
      field: 'approved_amount',
      requestedAmount,
      approvedAmount,
    });
  }
}

/**
 * Re-sum every item of every review of the claim and store the total as the
 * claim's approved amount. A total above the claim's requested amount is
 * refused, which rolls the surrounding transaction back.
 */
async function recomputeApprovedAmount(
  repos: ReviewRepos,
  claimId: string,
): Promise<{ previous: string | null; approvedAmount: string }> {
  const claim = await repos.claimRepo.findClaimById(claimId);
  if (!claim) throw new NotFoundError('Claim');

  const items = await repos.reviewRepo.listItemsForClaim(claimId);
  const approvedAmount = aggregateApprovedAmount(items);

  if (amountExceeds(approvedAmount, claim.requestedAmount)) {
    throw new InconsistentStateError(
      'Approved total would exceed the claim requested amount',
      { requestedAmount: claim.requestedAmount, approvedAmount },
    );
  }

  await repos.claimRepo.setApprovedAmount(claimId, approvedAmount);
  return { previous: claim.approvedAmount, approvedAmount };
}

function recomputeAudit(
  actorId: string,
  claimId: string,
  amounts: { previous: string | null; approvedAmount: string },
): AuditEntry {
  return {
    userId: actorId,
    action: ClaimAuditAction.CLAIM_APPROVED_AMOUNT_RECALCULATED,
    category: AuditCategory.CLAIM,
    resourceType: 'claim',
    resourceId: claimId,
    detail: { from: amounts.previous, to: amounts.approvedAmount },
  };
}

// ---------------------------------------------------------------------------
// Reviews
// ---------------------------------------------------------------------------

/**
 * Record a review and move the claim to the status the (type, decision) pair
 * maps to. Validation happens before anything is written; the review insert
 * and claim update share one transaction.
 */
export async function createReview(
  deps: ReviewServiceDeps,
  principal: Principal,
  claimId: string,
  data: CreateReview,
): Promise<SelectReview> {
  const reviewType = resolveReviewType(principal, data.review_type);
  const decision = parseDecision(data.decision);

  const transition = resolveNextClaimStatus(reviewType, decision);
  if (!transition.valid) {
    throw new InvalidDecisionError(transition.error, { reviewType, decision });
  }
  const nextStatus = transition.status;

  const { review, previousStatus } = await deps.reviewTx.run(async (repos) => {
    const claim = await repos.claimRepo.findClaimById(claimId);
    if (!claim) throw new NotFoundError('Claim');

    if (!isReviewStageOpen(reviewType, claim.status)) {
      throw new InconsistentStateError(
        `A ${reviewType} review cannot act on a claim in status ${claim.status}`,
        { reviewType, status: claim.status },
      );
    }

    const created = await repos.reviewRepo.createReview({
      claimId,
      reviewerId: principal.userId,
      reviewType,
      decision,
      comments: data.comments ?? null,
      rejectionReason: data.rejection_reason ?? null,
    });
    await repos.claimRepo.updateClaimStatus(claimId, nextStatus);

    return { review: created, previousStatus: claim.status };
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.REVIEW_CREATED,
        category: AuditCategory.REVIEW,
        resourceType: 'review',
        resourceId: review.reviewId,
        detail: { claimId, reviewType, decision },
      },
      {
        userId: principal.userId,
        action: ClaimAuditAction.CLAIM_STATUS_CHANGED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: { from: previousStatus, to: nextStatus, reviewId: review.reviewId },
      },
    ],
    notifications:
      previousStatus === nextStatus
        ? []
        : [
            {
              event: 'CLAIM_STATUS_UPDATED',
              claimId,
              previousStatus,
              newStatus: nextStatus,
            },
          ],
  });

  return review;
}

/**
 * Reviewers only see reviews of their own type; policyholders only those on
 * their own claims.
 */
export async function listReviews(
  deps: ReviewServiceDeps,
  principal: Principal,
  filters: ReviewListFilters,
): Promise<{ data: ReviewWithOwner[]; total: number }> {
  return deps.reviewRepo.listReviews({
    ...filters,
    reviewType: reviewTypeScope(principal) ?? filters.reviewType,
    policyholderId: policyholderScope(principal),
  });
}

async function getAccessibleReview(
  deps: Pick<ReviewServiceDeps, 'reviewRepo'>,
  principal: Principal,
  reviewId: string,
): Promise<ReviewWithOwner> {
  const review = await deps.reviewRepo.findReviewById(reviewId);
  if (!review) throw new NotFoundError('Review');
  assertOwnerAccess(principal, review.policyholderId);

  const scopedType = reviewTypeScope(principal);
  if (scopedType && review.reviewType !== scopedType) {
    throw new ForbiddenError('You do not have access to this review');
  }
  return review;
}

export async function getReview(
  deps: ReviewServiceDeps,
  principal: Principal,
  reviewId: string,
): Promise<ReviewWithItems> {
  const review = await getAccessibleReview(deps, principal, reviewId);
  const items = await deps.reviewRepo.listItems(reviewId);
  return { ...review, items };
}

/**
 * Patch comments, decision or rejection reason. The claim status is not
 * re-evaluated.
 */
export async function updateReview(
  deps: ReviewServiceDeps,
  principal: Principal,
  reviewId: string,
  data: UpdateReview,
): Promise<SelectReview> {
  const review = await getAccessibleReview(deps, principal, reviewId);
  assertReviewAuthor(principal, review);

  const decision = data.decision === undefined ? undefined : parseDecision(data.decision);

  const updated = await deps.reviewRepo.updateReview(reviewId, {
    decision,
    comments: data.comments,
    rejectionReason: data.rejection_reason,
  });
  if (!updated) throw new NotFoundError('Review');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.REVIEW_UPDATED,
        category: AuditCategory.REVIEW,
        resourceType: 'review',
        resourceId: reviewId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return updated;
}

// ---------------------------------------------------------------------------
// Review items
// ---------------------------------------------------------------------------

export async function addReviewItem(
  deps: ReviewServiceDeps,
  principal: Principal,
  reviewId: string,
  data: CreateReviewItem,
): Promise<SelectReviewItem> {
  assertItemWithinRequested(data.requested_amount, data.approved_amount);

  const { item, claimId, amounts } = await deps.reviewTx.run(async (repos) => {
    const review = await repos.reviewRepo.findReviewById(reviewId);
    if (!review) throw new NotFoundError('Review');
    assertReviewAuthor(principal, review);

    const created = await repos.reviewRepo.createItem({
      reviewId,
      itemName: data.item_name,
      requestedAmount: data.requested_amount,
      approvedAmount: data.approved_amount ?? null,
      status: data.status,
      rejectionReason: data.rejection_reason ?? null,
    });
    const recomputed = await recomputeApprovedAmount(repos, review.claimId);

    return { item: created, claimId: review.claimId, amounts: recomputed };
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.REVIEW_ITEM_ADDED,
        category: AuditCategory.REVIEW,
        resourceType: 'review',
        resourceId: reviewId,
        detail: {
          itemId: item.itemId,
          itemName: item.itemName,
          approvedAmount: item.approvedAmount,
        },
      },
      recomputeAudit(principal.userId, claimId, amounts),
    ],
    notifications: [],
  });

  return item;
}

export async function updateReviewItem(
  deps: ReviewServiceDeps,
  principal: Principal,
  reviewId: string,
  itemId: string,
  data: UpdateReviewItem,
): Promise<SelectReviewItem> {
  const { item, claimId, amounts } = await deps.reviewTx.run(async (repos) => {
    const review = await repos.reviewRepo.findReviewById(reviewId);
    if (!review) throw new NotFoundError('Review');
    assertReviewAuthor(principal, review);

    const existing = await repos.reviewRepo.findItemById(itemId);
    if (!existing || existing.reviewId !== reviewId) {
      throw new NotFoundError('Review item');
    }

    const requestedAmount = data.requested_amount ?? existing.requestedAmount;
    const approvedAmount =
      data.approved_amount === undefined ? existing.approvedAmount : data.approved_amount;
    assertItemWithinRequested(requestedAmount, approvedAmount);

    const updated = await repos.reviewRepo.updateItem(itemId, {
      itemName: data.item_name,
      requestedAmount: data.requested_amount,
      approvedAmount: data.approved_amount,
      status: data.status,
      rejectionReason: data.rejection_reason,
    });
    if (!updated) throw new NotFoundError('Review item');

    const recomputed = await recomputeApprovedAmount(repos, review.claimId);
    return { item: updated, claimId: review.claimId, amounts: recomputed };
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.REVIEW_ITEM_UPDATED,
        category: AuditCategory.REVIEW,
        resourceType: 'review',
        resourceId: reviewId,
        detail: { itemId, fields: Object.keys(data) },
      },
      recomputeAudit(principal.userId, claimId, amounts),
    ],
    notifications: [],
  });

  return item;
}
