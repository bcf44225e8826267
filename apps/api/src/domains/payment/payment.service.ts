import {
  type CreatePayment,
  type UpdatePayment,
} from '@medclaims/shared/schemas/payment.schema.js';
import { AuditCategory } from '@medclaims/shared/constants/iam.constants.js';
import {
  ClaimStatus,
  ClaimAuditAction,
  PaymentStatus,
  PAYMENT_STATUSES,
  isPaymentStatus,
} from '@medclaims/shared/constants/claim.constants.js';
import {
  isPayableStatus,
  claimStatusAfterPayment,
} from '@medclaims/shared/utils/claim-workflow.utils.js';
import {
  type SelectClaim,
  type InsertPayment,
  type SelectPayment,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import {
  InconsistentStateError,
  InvalidDecisionError,
  NotFoundError,
} from '../../lib/errors.js';
import {
  type AuditEntry,
  type ClaimNotification,
  type SideEffectDispatcher,
} from '../../lib/side-effects.js';
import { type TransactionRunner } from '../../lib/unit-of-work.js';
import {
  assertOwnerAccess,
  policyholderScope,
  type Principal,
} from '../../lib/access-gate.js';
import { type ClaimWithOwner } from '../claim/claim.repository.js';
import { type PaymentListFilters, type PaymentView } from './payment.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface PaymentRepo {
  createPayment(data: InsertPayment): Promise<SelectPayment>;
  findPaymentById(paymentId: string): Promise<PaymentView | undefined>;
  listPayments(
    filters: PaymentListFilters,
  ): Promise<{ data: PaymentView[]; total: number }>;
  updatePayment(
    paymentId: string,
    data: {
      invoiceNumber?: string;
      amount?: string;
      paymentDate?: string;
      status?: PaymentStatus;
    },
  ): Promise<SelectPayment | undefined>;
}

export interface PaymentClaimRepo {
  findClaimById(claimId: string): Promise<ClaimWithOwner | undefined>;
  updateClaimStatus(claimId: string, status: ClaimStatus): Promise<SelectClaim | undefined>;
}

export interface PaymentRepos {
  paymentRepo: PaymentRepo;
  claimRepo: PaymentClaimRepo;
}

export interface PaymentServiceDeps extends PaymentRepos {
  paymentTx: TransactionRunner<PaymentRepos>;
  sideEffects: SideEffectDispatcher;
}

// ---------------------------------------------------------------------------
// Scheduling
// ---------------------------------------------------------------------------

/**
 * Schedule a payment for an approved claim and move the claim to
 * PENDING_PAYMENT. Both writes share one transaction; a claim in any other
 * status is refused and nothing is written.
 */
export async function createPayment(
  deps: PaymentServiceDeps,
  actorId: string,
  claimId: string,
  data: CreatePayment,
): Promise<SelectPayment> {
  const { payment, previousStatus } = await deps.paymentTx.run(async (repos) => {
    const claim = await repos.claimRepo.findClaimById(claimId);
    if (!claim) throw new NotFoundError('Claim');

    if (!isPayableStatus(claim.status)) {
      throw new InconsistentStateError(
        `Claim must be APPROVED or PARTIALLY_APPROVED to schedule a payment (current: ${claim.status})`,
        { status: claim.status },
      );
    }

    const created = await repos.paymentRepo.createPayment({
      claimId,
      invoiceNumber: data.invoice_number,
      amount: data.amount,
      paymentDate: data.payment_date,
      status: PaymentStatus.SCHEDULED,
      processedBy: actorId,
    });
    await repos.claimRepo.updateClaimStatus(claimId, ClaimStatus.PENDING_PAYMENT);

    return { payment: created, previousStatus: claim.status };
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: ClaimAuditAction.PAYMENT_SCHEDULED,
        category: AuditCategory.PAYMENT,
        resourceType: 'payment',
        resourceId: payment.paymentId,
        detail: {
          claimId,
          invoiceNumber: payment.invoiceNumber,
          amount: payment.amount,
          paymentDate: payment.paymentDate,
        },
      },
      {
        userId: actorId,
        action: ClaimAuditAction.CLAIM_STATUS_CHANGED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: {
          from: previousStatus,
          to: ClaimStatus.PENDING_PAYMENT,
          paymentId: payment.paymentId,
        },
      },
    ],
    notifications: [
      { event: 'PAYMENT_SCHEDULED', claimId, paymentId: payment.paymentId },
    ],
  });

  return payment;
}

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

/**
 * Patch a payment. Moving it to PROCESSED forces the claim to PAID; doing so
 * for a claim that is already PAID changes nothing and notifies no one.
 */
export async function updatePayment(
  deps: PaymentServiceDeps,
  actorId: string,
  paymentId: string,
  data: UpdatePayment,
): Promise<SelectPayment> {
  let status: PaymentStatus | undefined;
  if (data.status !== undefined) {
    if (!isPaymentStatus(data.status)) {
      throw new InvalidDecisionError(`Unknown payment status: ${data.status}`, {
        allowed: PAYMENT_STATUSES,
      });
    }
    status = data.status;
  }

  const result = await deps.paymentTx.run(async (repos) => {
    const existing = await repos.paymentRepo.findPaymentById(paymentId);
    if (!existing) throw new NotFoundError('Payment');

    const updated = await repos.paymentRepo.updatePayment(paymentId, {
      invoiceNumber: data.invoice_number,
      amount: data.amount,
      paymentDate: data.payment_date,
      status,
    });
    if (!updated) throw new NotFoundError('Payment');

    let claimChange: { from: ClaimStatus; to: ClaimStatus } | null = null;
    if (status !== undefined) {
      const claim = await repos.claimRepo.findClaimById(existing.claimId);
      if (!claim) throw new NotFoundError('Claim');
      const next = claimStatusAfterPayment(claim.status, status);
      if (next !== claim.status) {
        await repos.claimRepo.updateClaimStatus(claim.claimId, next);
        claimChange = { from: claim.status, to: next };
      }
    }

    return { payment: updated, previousPaymentStatus: existing.status, claimChange };
  });

  const { payment, previousPaymentStatus, claimChange } = result;
  const audit: AuditEntry[] = [
    {
      userId: actorId,
      action:
        status === PaymentStatus.PROCESSED && previousPaymentStatus !== PaymentStatus.PROCESSED
          ? ClaimAuditAction.PAYMENT_PROCESSED
          : ClaimAuditAction.PAYMENT_UPDATED,
      category: AuditCategory.PAYMENT,
      resourceType: 'payment',
      resourceId: paymentId,
      detail: {
        fields: Object.keys(data),
        from: previousPaymentStatus,
        to: payment.status,
      },
    },
  ];
  const notifications: ClaimNotification[] = [];

  if (claimChange) {
    audit.push({
      userId: actorId,
      action: ClaimAuditAction.CLAIM_STATUS_CHANGED,
      category: AuditCategory.CLAIM,
      resourceType: 'claim',
      resourceId: payment.claimId,
      detail: { ...claimChange, paymentId },
    });
    notifications.push({
      event: 'CLAIM_STATUS_UPDATED',
      claimId: payment.claimId,
      previousStatus: claimChange.from,
      newStatus: claimChange.to,
    });
  }

  deps.sideEffects.dispatch({ audit, notifications });

  return payment;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function listPayments(
  deps: PaymentServiceDeps,
  principal: Principal,
  filters: PaymentListFilters,
): Promise<{ data: PaymentView[]; total: number }> {
  return deps.paymentRepo.listPayments({
    ...filters,
    policyholderId: policyholderScope(principal),
  });
}

export async function getPayment(
  deps: PaymentServiceDeps,
  principal: Principal,
  paymentId: string,
): Promise<PaymentView> {
  const payment = await deps.paymentRepo.findPaymentById(paymentId);
  if (!payment) throw new NotFoundError('Payment');
  assertOwnerAccess(principal, payment.policyholderId);
  return payment;
}
