import { describe, it, expect, beforeEach } from 'vitest';
import { Role } from '@medclaims/shared/constants/iam.constants.js';
import {
  ClaimAuditAction,
  ClaimStatus,
  ReviewType,
} from '@medclaims/shared/constants/claim.constants.js';
import { type SelectClaim } from '@medclaims/shared/schemas/db/claim.schema.js';
import {
  createReview,
  listReviews,
  getReview,
  updateReview,
  addReviewItem,
  updateReviewItem,
  type ReviewServiceDeps,
} from './review.service.js';
import { type Principal } from '../../lib/access-gate.js';
import { createSideEffectDispatcher } from '../../lib/side-effects.js';
import {
  type EmailClient,
  type EmailSendResult,
} from '../notification/email-client.js';
import { createMemoryStore, type MemoryStore } from '../../../test/helpers/memory-store.js';
import {
  createTestDeps,
  createTestLogger,
  seedPolicy,
  seedUser,
  type SeededUser,
} from '../../../test/helpers/test-app.js';

let store: MemoryStore;
let deps: ReviewServiceDeps;
let holder: SeededUser;
let cs: Principal;
let claimsOfficer: Principal;
let md: Principal;
let claim: SelectClaim;

function principal(seeded: SeededUser, role: Role): Principal {
  return { userId: seeded.user.userId, role };
}

async function claimFor(policyholder: SeededUser, requestedAmount = '1000.00') {
  const policy = await seedPolicy(
    store,
    policyholder.user.userId,
    `MBR-${store.tables.policies.length + 1}`,
  );
  return store.claimRepo.createClaim({
    referenceNumber: `CLM-${String(store.tables.claims.length + 1).padStart(8, '0')}`,
    policyId: policy.policyId,
    hospitalPharmacy: 'City Hospital',
    reasonForClaim: 'Surgery',
    requestedAmount,
    submittedBy: policyholder.user.userId,
  });
}

function statusOf(claimId: string) {
  return store.tables.claims.find((c) => c.claimId === claimId)?.status;
}

function approvedOf(claimId: string) {
  return store.tables.claims.find((c) => c.claimId === claimId)?.approvedAmount;
}

beforeEach(async () => {
  store = createMemoryStore();
  deps = createTestDeps(store).deps.review;
  holder = await seedUser(store, Role.POLICYHOLDER);
  cs = principal(await seedUser(store, Role.CUSTOMER_SERVICE), Role.CUSTOMER_SERVICE);
  claimsOfficer = principal(await seedUser(store, Role.CLAIMS), Role.CLAIMS);
  md = principal(await seedUser(store, Role.MD), Role.MD);
  claim = await claimFor(holder);
});

// ---------------------------------------------------------------------------
// createReview
// ---------------------------------------------------------------------------

describe('createReview', () => {
  it('moves a SUBMITTED claim to claims review on customer service approval', async () => {
    const review = await createReview(deps, cs, claim.claimId, {
      decision: 'APPROVED',
      comments: 'Documents complete',
    });

    expect(review.reviewType).toBe(ReviewType.CUSTOMER_SERVICE);
    expect(review.reviewerId).toBe(cs.userId);
    expect(review.comments).toBe('Documents complete');
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.UNDER_REVIEW_CLAIMS);

    await deps.sideEffects.settled();
    expect(store.tables.auditLog.map((e) => e.action)).toEqual([
      ClaimAuditAction.REVIEW_CREATED,
      ClaimAuditAction.CLAIM_STATUS_CHANGED,
    ]);
    expect(store.tables.auditLog[1]?.detail).toEqual({
      from: ClaimStatus.SUBMITTED,
      to: ClaimStatus.UNDER_REVIEW_CLAIMS,
      reviewId: review.reviewId,
    });

    expect(store.tables.notifications).toHaveLength(1);
    expect(store.tables.notifications[0]).toMatchObject({
      userId: holder.user.userId,
      title: 'Claim Status Update',
      message: `Your claim with reference number ${claim.referenceNumber} is now under review by Claims Department.`,
    });
  });

  it('walks customer service, claims and MD approval to APPROVED', async () => {
    await createReview(deps, cs, claim.claimId, { decision: 'APPROVED' });
    await createReview(deps, claimsOfficer, claim.claimId, { decision: 'PARTIALLY_APPROVED' });
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PENDING_MD_APPROVAL);

    await createReview(deps, md, claim.claimId, { decision: 'APPROVED' });
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.APPROVED);
  });

  it('maps an MD partial approval to PARTIALLY_APPROVED', async () => {
    await store.claimRepo.updateClaimStatus(claim.claimId, ClaimStatus.PENDING_MD_APPROVAL);

    await createReview(deps, md, claim.claimId, { decision: 'PARTIALLY_APPROVED' });

    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PARTIALLY_APPROVED);
  });

  it('rejects at any stage and closes the claim to further reviews', async () => {
    await createReview(deps, cs, claim.claimId, {
      decision: 'REJECTED',
      rejection_reason: 'Not covered',
    });
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.REJECTED);

    await expect(
      createReview(deps, cs, claim.claimId, { decision: 'APPROVED' }),
    ).rejects.toMatchObject({
      code: 'INCONSISTENT_STATE',
      message: 'A CUSTOMER_SERVICE review cannot act on a claim in status REJECTED',
    });
  });

  it('refuses NEEDS_MORE_INFO without writing anything', async () => {
    await expect(
      createReview(deps, cs, claim.claimId, { decision: 'NEEDS_MORE_INFO' }),
    ).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_DECISION',
      message: 'Decision NEEDS_MORE_INFO is not valid for a CUSTOMER_SERVICE review',
    });
    expect(store.tables.reviews).toHaveLength(0);
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.SUBMITTED);
  });

  it('refuses an unknown decision', async () => {
    await expect(
      createReview(deps, cs, claim.claimId, { decision: 'MAYBE' }),
    ).rejects.toMatchObject({
      code: 'INVALID_DECISION',
      message: 'Unknown review decision: MAYBE',
    });
  });

  it('refuses a review out of stage order', async () => {
    await expect(
      createReview(deps, claimsOfficer, claim.claimId, { decision: 'APPROVED' }),
    ).rejects.toMatchObject({ code: 'INCONSISTENT_STATE' });
    expect(store.tables.reviews).toHaveLength(0);
    await deps.sideEffects.settled();
    expect(store.tables.auditLog).toHaveLength(0);
  });

  it('returns 404 for an unknown claim', async () => {
    await expect(
      createReview(deps, cs, '00000000-0000-4000-8000-000000000000', { decision: 'APPROVED' }),
    ).rejects.toMatchObject({ statusCode: 404, message: 'Claim not found' });
  });

  it('bars non-reviewer roles and cross-type reviews', async () => {
    const hr = principal(await seedUser(store, Role.HR), Role.HR);

    await expect(
      createReview(deps, hr, claim.claimId, { decision: 'APPROVED' }),
    ).rejects.toMatchObject({ statusCode: 403, message: 'Your role may not create reviews' });
    await expect(
      createReview(deps, cs, claim.claimId, { review_type: ReviewType.MD, decision: 'APPROVED' }),
    ).rejects.toMatchObject({ statusCode: 403, message: 'Your role may not create MD reviews' });
  });

  it('requires ADMIN to name the review type', async () => {
    const admin = principal(await seedUser(store, Role.ADMIN), Role.ADMIN);

    await expect(
      createReview(deps, admin, claim.claimId, { decision: 'APPROVED' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'review_type is required' });

    const review = await createReview(deps, admin, claim.claimId, {
      review_type: ReviewType.CUSTOMER_SERVICE,
      decision: 'APPROVED',
    });
    expect(review.reviewType).toBe(ReviewType.CUSTOMER_SERVICE);
  });
});

// ---------------------------------------------------------------------------
// Listing and access
// ---------------------------------------------------------------------------

describe('listReviews / getReview', () => {
  beforeEach(async () => {
    await createReview(deps, cs, claim.claimId, { decision: 'APPROVED' });
    await createReview(deps, claimsOfficer, claim.claimId, { decision: 'APPROVED' });
  });

  it('shows reviewers only their own review type', async () => {
    const seen = await listReviews(deps, cs, {
      reviewType: ReviewType.CLAIMS,
      page: 1,
      pageSize: 25,
    });

    expect(seen.data.map((r) => r.reviewType)).toEqual([ReviewType.CUSTOMER_SERVICE]);
  });

  it('shows a policyholder every review on their claim', async () => {
    const seen = await listReviews(deps, principal(holder, Role.POLICYHOLDER), {
      page: 1,
      pageSize: 25,
    });

    expect(seen.total).toBe(2);
  });

  it('hides reviews on other holders\' claims', async () => {
    const other = await seedUser(store, Role.POLICYHOLDER);
    const review = store.tables.reviews[0];
    if (!review) throw new Error('expected a review');

    const seen = await listReviews(deps, principal(other, Role.POLICYHOLDER), {
      page: 1,
      pageSize: 25,
    });
    expect(seen.total).toBe(0);
    await expect(
      getReview(deps, principal(other, Role.POLICYHOLDER), review.reviewId),
    ).rejects.toMatchObject({ statusCode: 403 });
  });

  it('refuses a reviewer another type\'s review', async () => {
    const claimsReview = store.tables.reviews.find((r) => r.reviewType === ReviewType.CLAIMS);
    if (!claimsReview) throw new Error('expected a claims review');

    await expect(getReview(deps, cs, claimsReview.reviewId)).rejects.toMatchObject({
      statusCode: 403,
      message: 'You do not have access to this review',
    });
  });
});

describe('updateReview', () => {
  it('lets the author patch comments without touching the claim status', async () => {
    const review = await createReview(deps, cs, claim.claimId, { decision: 'APPROVED' });

    const updated = await updateReview(deps, cs, review.reviewId, { comments: 'Follow-up noted' });

    expect(updated.comments).toBe('Follow-up noted');
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.UNDER_REVIEW_CLAIMS);
  });

  it('refuses another reviewer of the same type', async () => {
    const review = await createReview(deps, cs, claim.claimId, { decision: 'APPROVED' });
    const otherCs = principal(await seedUser(store, Role.CUSTOMER_SERVICE), Role.CUSTOMER_SERVICE);

    await expect(
      updateReview(deps, otherCs, review.reviewId, { comments: 'Overwrite' }),
    ).rejects.toMatchObject({ statusCode: 403, message: 'Only the reviewer may change this review' });
  });
});

// ---------------------------------------------------------------------------
// Review items
// ---------------------------------------------------------------------------

describe('review items', () => {
  let reviewId: string;

  beforeEach(async () => {
    await store.claimRepo.updateClaimStatus(claim.claimId, ClaimStatus.PENDING_MD_APPROVAL);
    reviewId = (await createReview(deps, md, claim.claimId, { decision: 'PARTIALLY_APPROVED' }))
      .reviewId;
  });

  it('re-sums approved amounts onto the claim', async () => {
    await addReviewItem(deps, md, reviewId, {
      item_name: 'Cosmetic',
      requested_amount: '300.00',
      status: 'REJECTED',
      rejection_reason: 'Not covered',
    });
    await addReviewItem(deps, md, reviewId, {
      item_name: 'Consultation',
      requested_amount: '400.00',
      approved_amount: '400.00',
      status: 'APPROVED',
    });
    await addReviewItem(deps, md, reviewId, {
      item_name: 'Medication',
      requested_amount: '300.00',
      approved_amount: '220.55',
      status: 'APPROVED',
    });

    expect(approvedOf(claim.claimId)).toBe('620.55');
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)).toMatchObject({
      action: ClaimAuditAction.CLAIM_APPROVED_AMOUNT_RECALCULATED,
      detail: { from: '400.00', to: '620.55' },
    });
  });

  it('refuses an item approving more than it requested', async () => {
    await expect(
      addReviewItem(deps, md, reviewId, {
        item_name: 'Consultation',
        requested_amount: '100.00',
        approved_amount: '100.01',
        status: 'APPROVED',
      }),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'approved_amount must not exceed requested_amount',
    });
  });

  it('rolls back an item that would push the claim over its requested amount', async () => {
    await addReviewItem(deps, md, reviewId, {
      item_name: 'Surgery',
      requested_amount: '900.00',
      approved_amount: '900.00',
      status: 'APPROVED',
    });

    await expect(
      addReviewItem(deps, md, reviewId, {
        item_name: 'Aftercare',
        requested_amount: '200.00',
        approved_amount: '200.00',
        status: 'APPROVED',
      }),
    ).rejects.toMatchObject({
      code: 'INCONSISTENT_STATE',
      details: { requestedAmount: '1000.00', approvedAmount: '1100.00' },
    });
    expect(store.tables.reviewItems.map((i) => i.itemName)).toEqual(['Surgery']);
    expect(approvedOf(claim.claimId)).toBe('900.00');
  });

  it('recomputes after an item update and clears a withdrawn amount', async () => {
    const item = await addReviewItem(deps, md, reviewId, {
      item_name: 'Consultation',
      requested_amount: '500.00',
      approved_amount: '500.00',
      status: 'APPROVED',
    });

    const updated = await updateReviewItem(deps, md, reviewId, item.itemId, {
      status: 'REJECTED',
      approved_amount: null,
    });

    expect(updated.status).toBe('REJECTED');
    expect(updated.approvedAmount).toBeNull();
    expect(approvedOf(claim.claimId)).toBe('0.00');
  });

  it('checks an updated requested amount against the stored approval', async () => {
    const item = await addReviewItem(deps, md, reviewId, {
      item_name: 'Consultation',
      requested_amount: '500.00',
      approved_amount: '450.00',
      status: 'APPROVED',
    });

    await expect(
      updateReviewItem(deps, md, reviewId, item.itemId, { requested_amount: '400.00' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('returns 404 for an item of another review', async () => {
    const item = await addReviewItem(deps, md, reviewId, {
      item_name: 'Consultation',
      requested_amount: '10.00',
      status: 'APPROVED',
    });
    const otherClaim = await claimFor(holder);
    await store.claimRepo.updateClaimStatus(otherClaim.claimId, ClaimStatus.PENDING_MD_APPROVAL);
    const otherReview = await createReview(deps, md, otherClaim.claimId, { decision: 'APPROVED' });

    await expect(
      updateReviewItem(deps, md, otherReview.reviewId, item.itemId, { item_name: 'Moved' }),
    ).rejects.toMatchObject({ statusCode: 404, message: 'Review item not found' });
  });

  it('lists items with the review', async () => {
    await addReviewItem(deps, md, reviewId, {
      item_name: 'Consultation',
      requested_amount: '10.00',
      approved_amount: '10.00',
      status: 'APPROVED',
    });

    const review = await getReview(deps, md, reviewId);
    expect(review.items.map((i) => i.itemName)).toEqual(['Consultation']);
    expect(review.policyholderId).toBe(holder.user.userId);
  });
});

// ---------------------------------------------------------------------------
// Side-effect delivery
// ---------------------------------------------------------------------------

describe('side-effect delivery', () => {
  it('returns before a stalled email send completes', async () => {
    const stalled: EmailClient = {
      sendEmail: () => new Promise<EmailSendResult>(() => {}),
    };
    const stalledDeps = createTestDeps(store, { emailClient: stalled }).deps.review;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const outcome = await Promise.race([
      createReview(stalledDeps, cs, claim.claimId, { decision: 'APPROVED' }).then(
        () => 'returned',
      ),
      new Promise<string>((resolve) => {
        timer = setTimeout(() => resolve('blocked'), 500);
      }),
    ]);
    clearTimeout(timer);

    expect(outcome).toBe('returned');
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.UNDER_REVIEW_CLAIMS);
  });

  it('keeps the review when the audit log and notifier both fail', async () => {
    const logger = createTestLogger();
    const failingDeps: ReviewServiceDeps = {
      ...deps,
      sideEffects: createSideEffectDispatcher({
        auditRepo: {
          async appendAuditLog() {
            throw new Error('audit table locked');
          },
        },
        notifier: {
          async notify() {
            throw new Error('notifier down');
          },
        },
        logger,
      }),
    };

    const review = await createReview(failingDeps, cs, claim.claimId, { decision: 'APPROVED' });
    await failingDeps.sideEffects.settled();

    expect(store.tables.reviews.map((r) => r.reviewId)).toEqual([review.reviewId]);
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.UNDER_REVIEW_CLAIMS);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ action: ClaimAuditAction.REVIEW_CREATED }),
      'Failed to write audit log',
    );
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'CLAIM_STATUS_UPDATED', claimId: claim.claimId }),
      'Failed to dispatch notification',
    );
  });
});
