// ============================================================================
// Claims — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { CLAIM_STATUSES } from '../constants/claim.constants.js';
import { formatAmount } from '../utils/money.utils.js';

// --- Amount (reusable) ---
// Accepts 500, "500", "500.5" or "500.50"; always yields "500.50"-style strings.

export const amountSchema = z
  .union([z.number(), z.string()])
  .transform((v) => String(v).trim())
  .pipe(
    z
      .string()
      .regex(
        /^\d{1,10}(\.\d{1,2})?$/,
        'Amount must be a non-negative number with at most 2 decimal places',
      ),
  )
  .transform(formatAmount);

// ============================================================================
// Claim Submission
// ============================================================================

// Multipart submissions carry every field as a string, hence the coercing
// amount schema.
export const submitClaimSchema = z.object({
  policy_id: z.string().uuid(),
  hospital_pharmacy: z.string().min(1).max(200),
  reason_for_claim: z.string().min(1).max(5000),
  requested_amount: amountSchema,
});

export type SubmitClaim = z.infer<typeof submitClaimSchema>;

// --- Claim ID Parameter ---

export const claimIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type ClaimIdParam = z.infer<typeof claimIdParamSchema>;

// ============================================================================
// Claim Edit
// ============================================================================

// Only the descriptive fields are editable; status moves through reviews or
// the override endpoint.
export const updateClaimSchema = z
  .object({
    hospital_pharmacy: z.string().min(1).max(200).optional(),
    reason_for_claim: z.string().min(1).max(5000).optional(),
    requested_amount: amountSchema.optional(),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateClaim = z.infer<typeof updateClaimSchema>;

// ============================================================================
// Claim Query / List
// ============================================================================

export const listClaimsQuerySchema = z.object({
  status: z.enum(CLAIM_STATUSES).optional(),
  policy_id: z.string().uuid().optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListClaimsQuery = z.infer<typeof listClaimsQuerySchema>;

// ============================================================================
// Status Override
// ============================================================================

// The value is checked against ClaimStatus by the service so an unknown
// status surfaces as INVALID_DECISION rather than a generic validation error.
export const claimStatusUpdateSchema = z.object({
  status: z.string().min(1).max(30),
  reason: z.string().max(1000).optional(),
});

export type ClaimStatusUpdate = z.infer<typeof claimStatusUpdateSchema>;

// ============================================================================
// Attachments
// ============================================================================

export const attachmentParamSchema = z.object({
  id: z.string().uuid(),
  attachmentId: z.string().uuid(),
});

export type AttachmentParam = z.infer<typeof attachmentParamSchema>;

export const updateAttachmentSchema = z.object({
  file_name: z.string().trim().min(1).max(255),
});

export type UpdateAttachment = z.infer<typeof updateAttachmentSchema>;
