// ============================================================================
// Claim Workflow — Constants
// ============================================================================

import { Role } from './iam.constants.js';

// --- Claim Status (9 statuses, 2 terminal) ---

export const ClaimStatus = {
  SUBMITTED: 'SUBMITTED',
  UNDER_REVIEW_CS: 'UNDER_REVIEW_CS',
  UNDER_REVIEW_CLAIMS: 'UNDER_REVIEW_CLAIMS',
  PENDING_MD_APPROVAL: 'PENDING_MD_APPROVAL',
  APPROVED: 'APPROVED',
  PARTIALLY_APPROVED: 'PARTIALLY_APPROVED',
  REJECTED: 'REJECTED',
  PENDING_PAYMENT: 'PENDING_PAYMENT',
  PAID: 'PAID',
} as const;

export type ClaimStatus = (typeof ClaimStatus)[keyof typeof ClaimStatus];

export const CLAIM_STATUSES = [
  ClaimStatus.SUBMITTED,
  ClaimStatus.UNDER_REVIEW_CS,
  ClaimStatus.UNDER_REVIEW_CLAIMS,
  ClaimStatus.PENDING_MD_APPROVAL,
  ClaimStatus.APPROVED,
  ClaimStatus.PARTIALLY_APPROVED,
  ClaimStatus.REJECTED,
  ClaimStatus.PENDING_PAYMENT,
  ClaimStatus.PAID,
] as const;

export function isClaimStatus(value: string): value is ClaimStatus {
  return (CLAIM_STATUSES as readonly string[]).includes(value);
}

export const TERMINAL_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.REJECTED,
  ClaimStatus.PAID,
]);

// Statuses from which finance may schedule a payment.
export const PAYABLE_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.APPROVED,
  ClaimStatus.PARTIALLY_APPROVED,
]);

// Dashboard groupings.
export const IN_REVIEW_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.SUBMITTED,
  ClaimStatus.UNDER_REVIEW_CS,
  ClaimStatus.UNDER_REVIEW_CLAIMS,
  ClaimStatus.PENDING_MD_APPROVAL,
]);

export const APPROVED_CLAIM_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.APPROVED,
  ClaimStatus.PARTIALLY_APPROVED,
  ClaimStatus.PENDING_PAYMENT,
  ClaimStatus.PAID,
]);

// Human wording used in notification templates.
export const CLAIM_STATUS_DESCRIPTIONS: Readonly<Record<ClaimStatus, string>> =
  Object.freeze({
    [ClaimStatus.SUBMITTED]: 'submitted',
    [ClaimStatus.UNDER_REVIEW_CS]: 'under review by Customer Service',
    [ClaimStatus.UNDER_REVIEW_CLAIMS]: 'under review by Claims Department',
    [ClaimStatus.PENDING_MD_APPROVAL]: 'pending Medical Director approval',
    [ClaimStatus.APPROVED]: 'approved',
    [ClaimStatus.PARTIALLY_APPROVED]: 'partially approved',
    [ClaimStatus.REJECTED]: 'rejected',
    [ClaimStatus.PENDING_PAYMENT]: 'pending payment',
    [ClaimStatus.PAID]: 'paid',
  });

// --- Review Type ---

export const ReviewType = {
  CUSTOMER_SERVICE: 'CUSTOMER_SERVICE',
  CLAIMS: 'CLAIMS',
  MD: 'MD',
} as const;

export type ReviewType = (typeof ReviewType)[keyof typeof ReviewType];

export const REVIEW_TYPES = [
  ReviewType.CUSTOMER_SERVICE,
  ReviewType.CLAIMS,
  ReviewType.MD,
] as const;

// --- Review Decision ---

export const ReviewDecision = {
  APPROVED: 'APPROVED',
  PARTIALLY_APPROVED: 'PARTIALLY_APPROVED',
  REJECTED: 'REJECTED',
  NEEDS_MORE_INFO: 'NEEDS_MORE_INFO',
} as const;

export type ReviewDecision = (typeof ReviewDecision)[keyof typeof ReviewDecision];

export const REVIEW_DECISIONS = [
  ReviewDecision.APPROVED,
  ReviewDecision.PARTIALLY_APPROVED,
  ReviewDecision.REJECTED,
  ReviewDecision.NEEDS_MORE_INFO,
] as const;

export function isReviewDecision(value: string): value is ReviewDecision {
  return (REVIEW_DECISIONS as readonly string[]).includes(value);
}

// --- Review Item Status ---

export const ReviewItemStatus = {
  APPROVED: 'APPROVED',
  REJECTED: 'REJECTED',
} as const;

export type ReviewItemStatus =
  (typeof ReviewItemStatus)[keyof typeof ReviewItemStatus];

export const REVIEW_ITEM_STATUSES = [
  ReviewItemStatus.APPROVED,
  ReviewItemStatus.REJECTED,
] as const;

// --- Payment Status ---

export const PaymentStatus = {
  SCHEDULED: 'SCHEDULED',
  PROCESSED: 'PROCESSED',
  FAILED: 'FAILED',
} as const;

export type PaymentStatus = (typeof PaymentStatus)[keyof typeof PaymentStatus];

export const PAYMENT_STATUSES = [
  PaymentStatus.SCHEDULED,
  PaymentStatus.PROCESSED,
  PaymentStatus.FAILED,
] as const;

export function isPaymentStatus(value: string): value is PaymentStatus {
  return (PAYMENT_STATUSES as readonly string[]).includes(value);
}

// --- Review Transition Table ---
// (review type, decision) -> next claim status. Pairs missing from the table
// are invalid; NEEDS_MORE_INFO has no entry for any review type.

export const REVIEW_TRANSITIONS: Readonly<
  Record<ReviewType, Partial<Record<ReviewDecision, ClaimStatus>>>
> = Object.freeze({
  [ReviewType.CUSTOMER_SERVICE]: {
    [ReviewDecision.APPROVED]: ClaimStatus.UNDER_REVIEW_CLAIMS,
    [ReviewDecision.PARTIALLY_APPROVED]: ClaimStatus.UNDER_REVIEW_CLAIMS,
    [ReviewDecision.REJECTED]: ClaimStatus.REJECTED,
  },
  [ReviewType.CLAIMS]: {
    [ReviewDecision.APPROVED]: ClaimStatus.PENDING_MD_APPROVAL,
    [ReviewDecision.PARTIALLY_APPROVED]: ClaimStatus.PENDING_MD_APPROVAL,
    [ReviewDecision.REJECTED]: ClaimStatus.REJECTED,
  },
  [ReviewType.MD]: {
    [ReviewDecision.APPROVED]: ClaimStatus.APPROVED,
    [ReviewDecision.PARTIALLY_APPROVED]: ClaimStatus.PARTIALLY_APPROVED,
    [ReviewDecision.REJECTED]: ClaimStatus.REJECTED,
  },
});

// --- Review Stage Preconditions ---
// Claim statuses each review type may act on.

export const REVIEW_STAGE_STATUSES: Readonly<
  Record<ReviewType, readonly ClaimStatus[]>
> = Object.freeze({
  [ReviewType.CUSTOMER_SERVICE]: [
    ClaimStatus.SUBMITTED,
    ClaimStatus.UNDER_REVIEW_CS,
  ],
  [ReviewType.CLAIMS]: [ClaimStatus.UNDER_REVIEW_CLAIMS],
  [ReviewType.MD]: [ClaimStatus.PENDING_MD_APPROVAL],
});

// --- Reviewer Role -> Review Type ---
// Roles absent from the map may not author reviews. ADMIN is handled by the
// access gate (may author any type).

export const ROLE_REVIEW_TYPE: Readonly<Partial<Record<Role, ReviewType>>> =
  Object.freeze({
    [Role.CUSTOMER_SERVICE]: ReviewType.CUSTOMER_SERVICE,
    [Role.CLAIMS]: ReviewType.CLAIMS,
    [Role.MD]: ReviewType.MD,
  });

// --- Attachments ---

export const DEFAULT_ALLOWED_UPLOAD_EXTENSIONS = [
  '.pdf',
  '.jpg',
  '.jpeg',
  '.png',
  '.doc',
  '.docx',
] as const;

export const DEFAULT_MAX_UPLOAD_SIZE = 10 * 1024 * 1024; // 10 MB

// --- Reference Number Prefixes ---

export const CLAIM_REFERENCE_PREFIX = 'CLM-';
export const MEMBER_NUMBER_PREFIX = 'MEM-';

// --- Claim Audit Actions ---

export const ClaimAuditAction = {
  CLAIM_SUBMITTED: 'claim.submitted',
  CLAIM_UPDATED: 'claim.updated',
  CLAIM_STATUS_CHANGED: 'claim.status_changed',
  CLAIM_STATUS_OVERRIDDEN: 'claim.status_overridden',
  CLAIM_APPROVED_AMOUNT_RECALCULATED: 'claim.approved_amount_recalculated',
  ATTACHMENT_UPLOADED: 'claim.attachment_uploaded',
  ATTACHMENT_RENAMED: 'claim.attachment_renamed',
  ATTACHMENT_DELETED: 'claim.attachment_deleted',
  REVIEW_CREATED: 'review.created',
  REVIEW_UPDATED: 'review.updated',
  REVIEW_ITEM_ADDED: 'review.item_added',
  REVIEW_ITEM_UPDATED: 'review.item_updated',
  PAYMENT_SCHEDULED: 'payment.scheduled',
  PAYMENT_UPDATED: 'payment.updated',
  PAYMENT_PROCESSED: 'payment.processed',
} as const;

export type ClaimAuditAction =
  (typeof ClaimAuditAction)[keyof typeof ClaimAuditAction];
