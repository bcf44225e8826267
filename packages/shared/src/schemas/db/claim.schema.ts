// ============================================================================
// Claims, Reviews & Payments — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  decimal,
  date,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import {
  type ClaimStatus,
  type ReviewType,
  type ReviewDecision,
  type ReviewItemStatus,
  type PaymentStatus,
} from '../../constants/claim.constants.js';
import { users } from './iam.schema.js';
import { policies } from './policy.schema.js';

// --- Claims Table ---
// Never hard-deleted. Reference number is immutable after creation.

export const claims = pgTable(
  'claims',
  {
    claimId: uuid('claim_id').primaryKey().defaultRandom(),
    referenceNumber: varchar('reference_number', { length: 20 }).notNull(),
    policyId: uuid('policy_id')
      .notNull()
      .references(() => policies.policyId),
    hospitalPharmacy: varchar('hospital_pharmacy', { length: 200 }).notNull(),
    reasonForClaim: text('reason_for_claim').notNull(),
    requestedAmount: decimal('requested_amount', {
      precision: 12,
      scale: 2,
    }).notNull(),
    approvedAmount: decimal('approved_amount', { precision: 12, scale: 2 }),
    status: varchar('status', { length: 30 })
      .notNull()
      .default('SUBMITTED')
      .$type<ClaimStatus>(),
    submittedBy: uuid('submitted_by')
      .notNull()
      .references(() => users.userId),
    submissionDate: timestamp('submission_date', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('claims_reference_number_idx').on(table.referenceNumber),
    index('claims_policy_status_idx').on(table.policyId, table.status),
    index('claims_status_submission_idx').on(
      table.status,
      table.submissionDate,
    ),
  ],
);

// --- Claim Attachments Table ---

export const claimAttachments = pgTable(
  'claim_attachments',
  {
    attachmentId: uuid('attachment_id').primaryKey().defaultRandom(),
    claimId: uuid('claim_id')
      .notNull()
      .references(() => claims.claimId),
    fileName: varchar('file_name', { length: 255 }).notNull(),
    storagePath: text('storage_path').notNull(),
    contentType: varchar('content_type', { length: 100 }).notNull(),
    sizeBytes: integer('size_bytes').notNull(),
    uploadedBy: uuid('uploaded_by')
      .notNull()
      .references(() => users.userId),
    uploadedAt: timestamp('uploaded_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('claim_attachments_claim_idx').on(table.claimId)],
);

// --- Reviews Table ---
// Reviewer and review type are immutable once written.

export const reviews = pgTable(
  'reviews',
  {
    reviewId: uuid('review_id').primaryKey().defaultRandom(),
    claimId: uuid('claim_id')
      .notNull()
      .references(() => claims.claimId),
    reviewerId: uuid('reviewer_id')
      .notNull()
      .references(() => users.userId),
    reviewType: varchar('review_type', { length: 20 })
      .notNull()
      .$type<ReviewType>(),
    decision: varchar('decision', { length: 20 })
      .notNull()
      .$type<ReviewDecision>(),
    comments: text('comments'),
    rejectionReason: text('rejection_reason'),
    reviewedAt: timestamp('reviewed_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('reviews_claim_idx').on(table.claimId, table.reviewedAt),
    index('reviews_type_idx').on(table.reviewType),
  ],
);

// --- Review Items Table ---

export const reviewItems = pgTable(
  'review_items',
  {
    itemId: uuid('item_id').primaryKey().defaultRandom(),
    reviewId: uuid('review_id')
      .notNull()
      .references(() => reviews.reviewId),
    itemName: varchar('item_name', { length: 200 }).notNull(),
    requestedAmount: decimal('requested_amount', {
      precision: 12,
      scale: 2,
    }).notNull(),
    approvedAmount: decimal('approved_amount', { precision: 12, scale: 2 }),
    status: varchar('status', { length: 20 })
      .notNull()
      .$type<ReviewItemStatus>(),
    rejectionReason: text('rejection_reason'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('review_items_review_idx').on(table.reviewId)],
);

// --- Payments Table ---

export const payments = pgTable(
  'payments',
  {
    paymentId: uuid('payment_id').primaryKey().defaultRandom(),
    claimId: uuid('claim_id')
      .notNull()
      .references(() => claims.claimId),
    invoiceNumber: varchar('invoice_number', { length: 50 }).notNull(),
    amount: decimal('amount', { precision: 12, scale: 2 }).notNull(),
    paymentDate: date('payment_date', { mode: 'string' }).notNull(),
    status: varchar('status', { length: 20 })
      .notNull()
      .default('SCHEDULED')
      .$type<PaymentStatus>(),
    processedBy: uuid('processed_by')
      .notNull()
      .references(() => users.userId),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('payments_claim_idx').on(table.claimId),
    index('payments_status_idx').on(table.status),
  ],
);

// --- Inferred Types ---

export type InsertClaim = typeof claims.$inferInsert;
export type SelectClaim = typeof claims.$inferSelect;

export type InsertClaimAttachment = typeof claimAttachments.$inferInsert;
export type SelectClaimAttachment = typeof claimAttachments.$inferSelect;

export type InsertReview = typeof reviews.$inferInsert;
export type SelectReview = typeof reviews.$inferSelect;

export type InsertReviewItem = typeof reviewItems.$inferInsert;
export type SelectReviewItem = typeof reviewItems.$inferSelect;

export type InsertPayment = typeof payments.$inferInsert;
export type SelectPayment = typeof payments.$inferSelect;
