import { eq, and, desc, asc, count, getTableColumns, type SQL } from 'drizzle-orm';
import {
  claims,
  reviews,
  reviewItems,
  type InsertReview,
  type SelectReview,
  type InsertReviewItem,
  type SelectReviewItem,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import { policies } from '@medclaims/shared/schemas/db/policy.schema.js';
import { type ReviewType } from '@medclaims/shared/constants/claim.constants.js';
import { type DbClient } from '../../lib/db.js';

/** A review plus the policyholder that owns its claim. */
export type ReviewWithOwner = SelectReview & { policyholderId: string };

export interface ReviewListFilters {
  claimId?: string;
  reviewType?: ReviewType;
  policyholderId?: string;
  page: number;
  pageSize: number;
}

type UpdateReviewData = Partial<Pick<InsertReview, 'decision' | 'comments' | 'rejectionReason'>>;

type UpdateReviewItemData = Partial<
  Pick<
    InsertReviewItem,
    'itemName' | 'requestedAmount' | 'approvedAmount' | 'status' | 'rejectionReason'
  >
>;

const reviewWithOwnerColumns = {
  ...getTableColumns(reviews),
  policyholderId: policies.policyholderId,
};

// ---------------------------------------------------------------------------
// Review Repository
// ---------------------------------------------------------------------------

export function createReviewRepository(db: DbClient) {
  return {
    async createReview(data: InsertReview): Promise<SelectReview> {
      const rows = await db.insert(reviews).values(data).returning();
      return rows[0];
    },

    async findReviewById(reviewId: string): Promise<ReviewWithOwner | undefined> {
      const rows = await db
        .select(reviewWithOwnerColumns)
        .from(reviews)
        .innerJoin(claims, eq(reviews.claimId, claims.claimId))
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(eq(reviews.reviewId, reviewId))
        .limit(1);
      return rows[0];
    },

    async listReviews(
      filters: ReviewListFilters,
    ): Promise<{ data: ReviewWithOwner[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.claimId) conditions.push(eq(reviews.claimId, filters.claimId));
      if (filters.reviewType) conditions.push(eq(reviews.reviewType, filters.reviewType));
      if (filters.policyholderId) {
        conditions.push(eq(policies.policyholderId, filters.policyholderId));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select(reviewWithOwnerColumns)
        .from(reviews)
        .innerJoin(claims, eq(reviews.claimId, claims.claimId))
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(where)
        .orderBy(desc(reviews.reviewedAt))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);

      const [{ total }] = await db
        .select({ total: count() })
        .from(reviews)
        .innerJoin(claims, eq(reviews.claimId, claims.claimId))
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .where(where);

      return { data, total };
    },

    async updateReview(
      reviewId: string,
      data: UpdateReviewData,
    ): Promise<SelectReview | undefined> {
      const rows = await db
        .update(reviews)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(reviews.reviewId, reviewId))
        .returning();
      return rows[0];
    },

    // --- Items ---

    async createItem(data: InsertReviewItem): Promise<SelectReviewItem> {
      const rows = await db.insert(reviewItems).values(data).returning();
      return rows[0];
    },

    async findItemById(itemId: string): Promise<SelectReviewItem | undefined> {
      const rows = await db
        .select()
        .from(reviewItems)
        .where(eq(reviewItems.itemId, itemId))
        .limit(1);
      return rows[0];
    },

    async updateItem(
      itemId: string,
      data: UpdateReviewItemData,
    ): Promise<SelectReviewItem | undefined> {
      const rows = await db
        .update(reviewItems)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(reviewItems.itemId, itemId))
        .returning();
      return rows[0];
    },

    async listItems(reviewId: string): Promise<SelectReviewItem[]> {
      return db
        .select()
        .from(reviewItems)
        .where(eq(reviewItems.reviewId, reviewId))
        .orderBy(asc(reviewItems.createdAt));
    },

    /** Every item under every review of the claim. */
    async listItemsForClaim(claimId: string): Promise<SelectReviewItem[]> {
      return db
        .select(getTableColumns(reviewItems))
        .from(reviewItems)
        .innerJoin(reviews, eq(reviewItems.reviewId, reviews.reviewId))
        .where(eq(reviews.claimId, claimId));
    },
  };
}

export type ReviewRepository = ReturnType<typeof createReviewRepository>;
