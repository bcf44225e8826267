import { eq, and, desc, count, getTableColumns, type SQL } from 'drizzle-orm';
import {
  claims,
  payments,
  type InsertPayment,
  type SelectPayment,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import { policies } from '@medclaims/shared/schemas/db/policy.schema.js';
import { users } from '@medclaims/shared/schemas/db/iam.schema.js';
import { type PaymentStatus } from '@medclaims/shared/constants/claim.constants.js';
import { type DbClient } from '../../lib/db.js';

/** A payment with the claim reference, owner and processor it was made for. */
export type PaymentView = SelectPayment & {
  policyholderId: string;
  claimReference: string;
  processorName: string;
};

export interface PaymentListFilters {
  claimId?: string;
  status?: PaymentStatus;
  policyholderId?: string;
  page: number;
  pageSize: number;
}

type UpdatePaymentData = Partial<
  Pick<InsertPayment, 'invoiceNumber' | 'amount' | 'paymentDate' | 'status'>
>;

const paymentViewColumns = {
  ...getTableColumns(payments),
  policyholderId: policies.policyholderId,
  claimReference: claims.referenceNumber,
  processorName: users.fullName,
};

// ---------------------------------------------------------------------------
// Payment Repository
// ---------------------------------------------------------------------------

export function createPaymentRepository(db: DbClient) {
  function viewQuery() {
    return db
      .select(paymentViewColumns)
      .from(payments)
      .innerJoin(claims, eq(payments.claimId, claims.claimId))
      .innerJoin(policies, eq(claims.policyId, policies.policyId))
      .innerJoin(users, eq(payments.processedBy, users.userId));
  }

  return {
    async createPayment(data: InsertPayment): Promise<SelectPayment> {
      const rows = await db.insert(payments).values(data).returning();
      return rows[0];
    },

    async findPaymentById(paymentId: string): Promise<PaymentView | undefined> {
      const rows = await viewQuery().where(eq(payments.paymentId, paymentId)).limit(1);
      return rows[0];
    },

    async listPayments(
      filters: PaymentListFilters,
    ): Promise<{ data: PaymentView[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.claimId) conditions.push(eq(payments.claimId, filters.claimId));
      if (filters.status) conditions.push(eq(payments.status, filters.status));
      if (filters.policyholderId) {
        conditions.push(eq(policies.policyholderId, filters.policyholderId));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await viewQuery()
        .where(where)
        .orderBy(desc(payments.createdAt))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);

      const [{ total }] = await db
        .select({ total: count() })
        .from(payments)
        .innerJoin(claims, eq(payments.claimId, claims.claimId))
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(where);

      return { data, total };
    },

    async updatePayment(
      paymentId: string,
      data: UpdatePaymentData,
    ): Promise<SelectPayment | undefined> {
      const rows = await db
        .update(payments)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(payments.paymentId, paymentId))
        .returning();
      return rows[0];
    },
  };
}

export type PaymentRepository = ReturnType<typeof createPaymentRepository>;
