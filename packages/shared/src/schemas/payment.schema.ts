// ============================================================================
// Payments — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { PAYMENT_STATUSES } from '../constants/claim.constants.js';
import { amountSchema } from './claim.schema.js';

// --- Schedule Payment ---
// New payments always start SCHEDULED.

export const createPaymentSchema = z.object({
  invoice_number: z.string().min(1).max(50),
  amount: amountSchema,
  payment_date: z.string().date(),
});

export type CreatePayment = z.infer<typeof createPaymentSchema>;

// --- Update Payment ---
// status is checked by the service so unknown values map to INVALID_DECISION.

export const updatePaymentSchema = z
  .object({
    invoice_number: z.string().min(1).max(50).optional(),
    amount: amountSchema.optional(),
    payment_date: z.string().date().optional(),
    status: z.string().min(1).max(20).optional(),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdatePayment = z.infer<typeof updatePaymentSchema>;

export const paymentIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type PaymentIdParam = z.infer<typeof paymentIdParamSchema>;

export const listPaymentsQuerySchema = z.object({
  claim_id: z.string().uuid().optional(),
  payment_status: z.enum(PAYMENT_STATUSES).optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListPaymentsQuery = z.infer<typeof listPaymentsQuerySchema>;
