import {
  eq,
  and,
  desc,
  asc,
  count,
  inArray,
  sql,
  getTableColumns,
  type SQL,
} from 'drizzle-orm';
import {
  claims,
  claimAttachments,
  reviews,
  reviewItems,
  payments,
  type InsertClaim,
  type SelectClaim,
  type InsertClaimAttachment,
  type SelectClaimAttachment,
  type SelectReview,
  type SelectReviewItem,
  type SelectPayment,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import { policies } from '@medclaims/shared/schemas/db/policy.schema.js';
import { type ClaimStatus } from '@medclaims/shared/constants/claim.constants.js';
import { type DbClient } from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A claim plus the policyholder reached through its policy. */
export type ClaimWithOwner = SelectClaim & { policyholderId: string };

export interface ClaimListFilters {
  policyholderId?: string;
  policyId?: string;
  status?: ClaimStatus;
  page: number;
  pageSize: number;
}

export interface ClaimDetail {
  claim: ClaimWithOwner;
  reviews: Array<SelectReview & { items: SelectReviewItem[] }>;
  payments: SelectPayment[];
  attachments: SelectClaimAttachment[];
}

export type ClaimEdit = Partial<
  Pick<InsertClaim, 'hospitalPharmacy' | 'reasonForClaim' | 'requestedAmount'>
>;

export interface ClaimStatusSummary {
  status: ClaimStatus;
  count: number;
  requestedTotal: string;
  approvedTotal: string;
}

const claimWithOwnerColumns = {
  ...getTableColumns(claims),
  policyholderId: policies.policyholderId,
};

// ---------------------------------------------------------------------------
// Claim Repository
// ---------------------------------------------------------------------------

export function createClaimRepository(db: DbClient) {
  async function findClaimById(claimId: string): Promise<ClaimWithOwner | undefined> {
    const rows = await db
      .select(claimWithOwnerColumns)
      .from(claims)
      .innerJoin(policies, eq(claims.policyId, policies.policyId))
      .where(eq(claims.claimId, claimId))
      .limit(1);
    return rows[0];
  }

  async function listAttachments(claimId: string): Promise<SelectClaimAttachment[]> {
    return db
      .select()
      .from(claimAttachments)
      .where(eq(claimAttachments.claimId, claimId))
      .orderBy(asc(claimAttachments.uploadedAt));
  }

  return {
    async createClaim(data: InsertClaim): Promise<SelectClaim> {
      const rows = await db.insert(claims).values(data).returning();
      return rows[0];
    },

    findClaimById,

    async findClaimByReference(
      referenceNumber: string,
    ): Promise<SelectClaim | undefined> {
      const rows = await db
        .select()
        .from(claims)
        .where(eq(claims.referenceNumber, referenceNumber))
        .limit(1);
      return rows[0];
    },

    async listClaims(
      filters: ClaimListFilters,
    ): Promise<{ data: ClaimWithOwner[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.policyholderId) {
        conditions.push(eq(policies.policyholderId, filters.policyholderId));
      }
      if (filters.policyId) {
        conditions.push(eq(claims.policyId, filters.policyId));
      }
      if (filters.status) {
        conditions.push(eq(claims.status, filters.status));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select(claimWithOwnerColumns)
        .from(claims)
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(where)
        .orderBy(desc(claims.submissionDate))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);

      const [{ total }] = await db
        .select({ total: count() })
        .from(claims)
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(where);

      return { data, total };
    },

    async updateClaimStatus(
      claimId: string,
      status: ClaimStatus,
    ): Promise<SelectClaim | undefined> {
      const rows = await db
        .update(claims)
        .set({ status, updatedAt: new Date() })
        .where(eq(claims.claimId, claimId))
        .returning();
      return rows[0];
    },

    async updateClaim(
      claimId: string,
      data: ClaimEdit,
    ): Promise<SelectClaim | undefined> {
      const rows = await db
        .update(claims)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(claims.claimId, claimId))
        .returning();
      return rows[0];
    },

    async setApprovedAmount(
      claimId: string,
      approvedAmount: string,
    ): Promise<SelectClaim | undefined> {
      const rows = await db
        .update(claims)
        .set({ approvedAmount, updatedAt: new Date() })
        .where(eq(claims.claimId, claimId))
        .returning();
      return rows[0];
    },

    // --- Attachments ---

    async addAttachment(
      data: InsertClaimAttachment,
    ): Promise<SelectClaimAttachment> {
      const rows = await db.insert(claimAttachments).values(data).returning();
      return rows[0];
    },

    listAttachments,

    async findAttachment(
      claimId: string,
      attachmentId: string,
    ): Promise<SelectClaimAttachment | undefined> {
      const rows = await db
        .select()
        .from(claimAttachments)
        .where(
          and(
            eq(claimAttachments.attachmentId, attachmentId),
            eq(claimAttachments.claimId, claimId),
          ),
        )
        .limit(1);
      return rows[0];
    },

    async renameAttachment(
      attachmentId: string,
      fileName: string,
    ): Promise<SelectClaimAttachment | undefined> {
      const rows = await db
        .update(claimAttachments)
        .set({ fileName })
        .where(eq(claimAttachments.attachmentId, attachmentId))
        .returning();
      return rows[0];
    },

    async deleteAttachment(
      attachmentId: string,
    ): Promise<SelectClaimAttachment | undefined> {
      const rows = await db
        .delete(claimAttachments)
        .where(eq(claimAttachments.attachmentId, attachmentId))
        .returning();
      return rows[0];
    },

    // --- Detail ---

    async findClaimDetail(claimId: string): Promise<ClaimDetail | undefined> {
      const claim = await findClaimById(claimId);
      if (!claim) return undefined;

      const reviewRows = await db
        .select()
        .from(reviews)
        .where(eq(reviews.claimId, claimId))
        .orderBy(asc(reviews.reviewedAt));

      const itemRows =
        reviewRows.length > 0
          ? await db
              .select()
              .from(reviewItems)
              .where(
                inArray(
                  reviewItems.reviewId,
                  reviewRows.map((r) => r.reviewId),
                ),
              )
              .orderBy(asc(reviewItems.createdAt))
          : [];

      const paymentRows = await db
        .select()
        .from(payments)
        .where(eq(payments.claimId, claimId))
        .orderBy(asc(payments.createdAt));

      const attachments = await listAttachments(claimId);

      return {
        claim,
        reviews: reviewRows.map((review) => ({
          ...review,
          items: itemRows.filter((item) => item.reviewId === review.reviewId),
        })),
        payments: paymentRows,
        attachments,
      };
    },

    // --- Dashboard ---

    async summariseClaimsByStatus(
      policyholderId: string,
    ): Promise<ClaimStatusSummary[]> {
      const rows = await db
        .select({
          status: claims.status,
          count: count(),
          requestedTotal: sql<string>`coalesce(sum(${claims.requestedAmount}), 0)`,
          approvedTotal: sql<string>`coalesce(sum(${claims.approvedAmount}), 0)`,
        })
        .from(claims)
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(eq(policies.policyholderId, policyholderId))
        .groupBy(claims.status);

      return rows.map((row) => ({
        ...row,
        requestedTotal: String(row.requestedTotal),
        approvedTotal: String(row.approvedTotal),
      }));
    },
  };
}

export type ClaimRepository = ReturnType<typeof createClaimRepository>;
