// ============================================================================
// Identity & Access — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { ROLES } from '../constants/iam.constants.js';

// --- Password validation (reusable) ---
// min 12 chars, must contain uppercase, lowercase, digit, special character

const passwordSchema = z
  .string()
  .min(12, 'Password must be at least 12 characters')
  .regex(
    /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[^a-zA-Z\d]).{12,}$/,
    'Password must contain uppercase, lowercase, digit, and special character',
  );

// --- Registration ---
// Self-registration always yields a POLICYHOLDER.

export const registerSchema = z.object({
  email: z.string().email().max(255),
  password: passwordSchema,
  full_name: z.string().min(1).max(200),
  phone: z.string().max(20).optional(),
});

export type Register = z.infer<typeof registerSchema>;

// --- Login ---

export const loginSchema = z.object({
  email: z.string().email().max(255),
  password: z.string().min(1),
});

export type Login = z.infer<typeof loginSchema>;

// ============================================================================
// User Management
// ============================================================================

export const createUserSchema = z.object({
  email: z.string().email().max(255),
  password: passwordSchema,
  full_name: z.string().min(1).max(200),
  phone: z.string().max(20).optional(),
  role: z.enum(ROLES),
});

export type CreateUser = z.infer<typeof createUserSchema>;

export const updateUserSchema = z
  .object({
    full_name: z.string().min(1).max(200).optional(),
    phone: z.string().max(20).nullable().optional(),
    role: z.enum(ROLES).optional(),
    is_active: z.boolean().optional(),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateUser = z.infer<typeof updateUserSchema>;

// --- Self-service profile update ---
// Role and activation are not self-editable.

export const updateProfileSchema = z
  .object({
    full_name: z.string().min(1).max(200).optional(),
    phone: z.string().max(20).nullable().optional(),
  })
  .refine((data) => data.full_name !== undefined || data.phone !== undefined, {
    message: 'At least one field must be provided',
  });

export type UpdateProfile = z.infer<typeof updateProfileSchema>;

export const userIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type UserIdParam = z.infer<typeof userIdParamSchema>;

export const listUsersQuerySchema = z.object({
  role: z.enum(ROLES).optional(),
  is_active: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;

// ============================================================================
// Audit Log
// ============================================================================

export const auditLogQuerySchema = z.object({
  user_id: z.string().uuid().optional(),
  action: z.string().optional(),
  resource_type: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(200).default(50),
});

export type AuditLogQuery = z.infer<typeof auditLogQuerySchema>;
