// ============================================================================
// Reviews — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  REVIEW_TYPES,
  REVIEW_ITEM_STATUSES,
} from '../constants/claim.constants.js';
import { amountSchema } from './claim.schema.js';

// --- Create Review ---
// review_type defaults to the reviewer's own type; ADMIN must supply it.
// decision is checked by the transition function, not here.

export const createReviewSchema = z.object({
  review_type: z.enum(REVIEW_TYPES).optional(),
  decision: z.string().min(1).max(20),
  comments: z.string().max(5000).optional(),
  rejection_reason: z.string().max(5000).optional(),
});

export type CreateReview = z.infer<typeof createReviewSchema>;

// --- Update Review ---
// Reviewer, claim and review type are immutable.

export const updateReviewSchema = z
  .object({
    decision: z.string().min(1).max(20).optional(),
    comments: z.string().max(5000).nullable().optional(),
    rejection_reason: z.string().max(5000).nullable().optional(),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateReview = z.infer<typeof updateReviewSchema>;

export const reviewIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type ReviewIdParam = z.infer<typeof reviewIdParamSchema>;

export const reviewItemParamSchema = z.object({
  id: z.string().uuid(),
  itemId: z.string().uuid(),
});

export type ReviewItemParam = z.infer<typeof reviewItemParamSchema>;

export const listReviewsQuerySchema = z.object({
  claim_id: z.string().uuid().optional(),
  review_type: z.enum(REVIEW_TYPES).optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListReviewsQuery = z.infer<typeof listReviewsQuerySchema>;

// ============================================================================
// Review Items
// ============================================================================

export const createReviewItemSchema = z.object({
  item_name: z.string().min(1).max(200),
  requested_amount: amountSchema,
  approved_amount: amountSchema.optional(),
  status: z.enum(REVIEW_ITEM_STATUSES),
  rejection_reason: z.string().max(5000).optional(),
});

export type CreateReviewItem = z.infer<typeof createReviewItemSchema>;

export const updateReviewItemSchema = z
  .object({
    item_name: z.string().min(1).max(200).optional(),
    requested_amount: amountSchema.optional(),
    approved_amount: amountSchema.nullable().optional(),
    status: z.enum(REVIEW_ITEM_STATUSES).optional(),
    rejection_reason: z.string().max(5000).nullable().optional(),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateReviewItem = z.infer<typeof updateReviewItemSchema>;
