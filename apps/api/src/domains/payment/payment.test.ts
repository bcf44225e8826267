import { describe, it, expect, beforeEach } from 'vitest';
import { Role } from '@medclaims/shared/constants/iam.constants.js';
import {
  ClaimAuditAction,
  ClaimStatus,
  PaymentStatus,
} from '@medclaims/shared/constants/claim.constants.js';
import { NotificationEvent } from '@medclaims/shared/constants/notification.constants.js';
import { type SelectClaim } from '@medclaims/shared/schemas/db/claim.schema.js';
import {
  createPayment,
  updatePayment,
  listPayments,
  getPayment,
  type PaymentServiceDeps,
} from './payment.service.js';
import { createSideEffectDispatcher } from '../../lib/side-effects.js';
import { createMemoryStore, type MemoryStore } from '../../../test/helpers/memory-store.js';
import {
  createTestDeps,
  createTestLogger,
  seedPolicy,
  seedUser,
  type SeededUser,
} from '../../../test/helpers/test-app.js';

let store: MemoryStore;
let deps: PaymentServiceDeps;
let holder: SeededUser;
let finance: SeededUser;
let claim: SelectClaim;

const schedule = {
  invoice_number: 'INV-1001',
  amount: '500.00',
  payment_date: '2026-11-01',
};

function statusOf(claimId: string) {
  return store.tables.claims.find((c) => c.claimId === claimId)?.status;
}

beforeEach(async () => {
  store = createMemoryStore();
  deps = createTestDeps(store).deps.payment;
  holder = await seedUser(store, Role.POLICYHOLDER);
  finance = await seedUser(store, Role.FINANCE, { fullName: 'Fin Officer' });
  const policy = await seedPolicy(store, holder.user.userId);
  claim = await store.claimRepo.createClaim({
    referenceNumber: 'CLM-0000PAY1',
    policyId: policy.policyId,
    hospitalPharmacy: 'City Pharmacy',
    reasonForClaim: 'Prescription',
    requestedAmount: '500.00',
    approvedAmount: '500.00',
    status: ClaimStatus.APPROVED,
    submittedBy: holder.user.userId,
  });
});

// ---------------------------------------------------------------------------
// createPayment
// ---------------------------------------------------------------------------

describe('createPayment', () => {
  it('schedules a payment and moves the claim to PENDING_PAYMENT', async () => {
    const payment = await createPayment(deps, finance.user.userId, claim.claimId, schedule);

    expect(payment.status).toBe(PaymentStatus.SCHEDULED);
    expect(payment.processedBy).toBe(finance.user.userId);
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PENDING_PAYMENT);
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.map((e) => e.action)).toEqual([
      ClaimAuditAction.PAYMENT_SCHEDULED,
      ClaimAuditAction.CLAIM_STATUS_CHANGED,
    ]);
  });

  it('tells the policyholder the amount and date', async () => {
    await createPayment(deps, finance.user.userId, claim.claimId, schedule);
    await deps.sideEffects.settled();

    expect(store.tables.notifications).toHaveLength(1);
    expect(store.tables.notifications[0]).toMatchObject({
      userId: holder.user.userId,
      eventType: NotificationEvent.PAYMENT_SCHEDULED,
      title: 'Payment Scheduled',
      message:
        'A payment of 500.00 for your claim with reference number CLM-0000PAY1 has been scheduled for 2026-11-01.',
    });
  });

  it('accepts a partially approved claim', async () => {
    await store.claimRepo.updateClaimStatus(claim.claimId, ClaimStatus.PARTIALLY_APPROVED);

    await createPayment(deps, finance.user.userId, claim.claimId, schedule);

    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PENDING_PAYMENT);
  });

  it('refuses a claim that is not approved and writes nothing', async () => {
    await store.claimRepo.updateClaimStatus(claim.claimId, ClaimStatus.PENDING_MD_APPROVAL);

    await expect(
      createPayment(deps, finance.user.userId, claim.claimId, schedule),
    ).rejects.toMatchObject({
      code: 'INCONSISTENT_STATE',
      message:
        'Claim must be APPROVED or PARTIALLY_APPROVED to schedule a payment (current: PENDING_MD_APPROVAL)',
    });
    expect(store.tables.payments).toHaveLength(0);
    await deps.sideEffects.settled();
    expect(store.tables.notifications).toHaveLength(0);
  });

  it('refuses a second payment once the claim is pending payment', async () => {
    await createPayment(deps, finance.user.userId, claim.claimId, schedule);

    await expect(
      createPayment(deps, finance.user.userId, claim.claimId, schedule),
    ).rejects.toMatchObject({ code: 'INCONSISTENT_STATE' });
    expect(store.tables.payments).toHaveLength(1);
  });

  it('returns 404 for an unknown claim', async () => {
    await expect(
      createPayment(deps, finance.user.userId, '00000000-0000-4000-8000-000000000000', schedule),
    ).rejects.toMatchObject({ statusCode: 404, message: 'Claim not found' });
  });
});

// ---------------------------------------------------------------------------
// updatePayment
// ---------------------------------------------------------------------------

describe('updatePayment', () => {
  let paymentId: string;

  beforeEach(async () => {
    paymentId = (await createPayment(deps, finance.user.userId, claim.claimId, schedule)).paymentId;
  });

  it('marks the claim PAID when the payment is processed', async () => {
    await deps.sideEffects.settled();
    const before = store.tables.notifications.length;

    const payment = await updatePayment(deps, finance.user.userId, paymentId, {
      status: 'PROCESSED',
    });

    expect(payment.status).toBe(PaymentStatus.PROCESSED);
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PAID);
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.slice(-2).map((e) => e.action)).toEqual([
      ClaimAuditAction.PAYMENT_PROCESSED,
      ClaimAuditAction.CLAIM_STATUS_CHANGED,
    ]);
    const added = store.tables.notifications.slice(before);
    expect(added.map((n) => n.message)).toEqual([
      'Your claim with reference number CLM-0000PAY1 is now paid.',
    ]);
  });

  it('marks the claim PAID even when audit and notification delivery fail', async () => {
    const logger = createTestLogger();
    const failingDeps: PaymentServiceDeps = {
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

    const payment = await updatePayment(failingDeps, finance.user.userId, paymentId, {
      status: 'PROCESSED',
    });
    await failingDeps.sideEffects.settled();

    expect(payment.status).toBe(PaymentStatus.PROCESSED);
    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PAID);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ action: ClaimAuditAction.PAYMENT_PROCESSED }),
      'Failed to write audit log',
    );
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'CLAIM_STATUS_UPDATED', claimId: claim.claimId }),
      'Failed to dispatch notification',
    );
  });

  it('reprocessing a paid claim changes nothing and notifies no one', async () => {
    await updatePayment(deps, finance.user.userId, paymentId, { status: 'PROCESSED' });
    await deps.sideEffects.settled();
    const notificationsBefore = store.tables.notifications.length;

    await updatePayment(deps, finance.user.userId, paymentId, { status: 'PROCESSED' });

    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PAID);
    await deps.sideEffects.settled();
    expect(store.tables.notifications).toHaveLength(notificationsBefore);
    expect(store.tables.auditLog.at(-1)).toMatchObject({
      action: ClaimAuditAction.PAYMENT_UPDATED,
      detail: { fields: ['status'], from: 'PROCESSED', to: 'PROCESSED' },
    });
  });

  it('leaves the claim alone when a payment fails', async () => {
    await updatePayment(deps, finance.user.userId, paymentId, { status: 'FAILED' });

    expect(statusOf(claim.claimId)).toBe(ClaimStatus.PENDING_PAYMENT);
    expect(store.tables.payments[0]?.status).toBe(PaymentStatus.FAILED);
  });

  it('patches invoice details without a status change', async () => {
    const payment = await updatePayment(deps, finance.user.userId, paymentId, {
      invoice_number: 'INV-1001-A',
      payment_date: '2026-11-15',
    });

    expect(payment.invoiceNumber).toBe('INV-1001-A');
    expect(payment.paymentDate).toBe('2026-11-15');
    expect(payment.status).toBe(PaymentStatus.SCHEDULED);
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)?.action).toBe(ClaimAuditAction.PAYMENT_UPDATED);
  });

  it('rejects an unknown status as an invalid decision', async () => {
    await expect(
      updatePayment(deps, finance.user.userId, paymentId, { status: 'REFUNDED' }),
    ).rejects.toMatchObject({
      code: 'INVALID_DECISION',
      message: 'Unknown payment status: REFUNDED',
    });
  });

  it('returns 404 for an unknown payment', async () => {
    await expect(
      updatePayment(deps, finance.user.userId, '00000000-0000-4000-8000-000000000000', {
        status: 'PROCESSED',
      }),
    ).rejects.toMatchObject({ statusCode: 404, message: 'Payment not found' });
  });
});

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe('listPayments / getPayment', () => {
  it('shows the claim reference and processor name', async () => {
    const created = await createPayment(deps, finance.user.userId, claim.claimId, schedule);

    const payment = await getPayment(
      deps,
      { userId: holder.user.userId, role: Role.POLICYHOLDER },
      created.paymentId,
    );

    expect(payment.claimReference).toBe('CLM-0000PAY1');
    expect(payment.processorName).toBe('Fin Officer');
    expect(payment.policyholderId).toBe(holder.user.userId);
  });

  it('scopes a policyholder to payments on their own claims', async () => {
    const created = await createPayment(deps, finance.user.userId, claim.claimId, schedule);
    const other = await seedUser(store, Role.POLICYHOLDER);
    const otherPrincipal = { userId: other.user.userId, role: Role.POLICYHOLDER };

    const listed = await listPayments(deps, otherPrincipal, { page: 1, pageSize: 25 });
    expect(listed.total).toBe(0);
    await expect(getPayment(deps, otherPrincipal, created.paymentId)).rejects.toMatchObject({
      statusCode: 403,
    });

    const staff = await listPayments(
      deps,
      { userId: finance.user.userId, role: Role.FINANCE },
      { status: PaymentStatus.SCHEDULED, page: 1, pageSize: 25 },
    );
    expect(staff.data.map((p) => p.paymentId)).toEqual([created.paymentId]);
  });
});
