// ============================================================================
// Employers, Providers & Policies — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// ============================================================================
// Employers
// ============================================================================

export const createEmployerSchema = z.object({
  name: z.string().min(1).max(200),
  contact_person: z.string().max(100).optional(),
  contact_email: z.string().email().max(255).optional(),
  contact_phone: z.string().max(20).optional(),
});

export type CreateEmployer = z.infer<typeof createEmployerSchema>;

export const updateEmployerSchema = createEmployerSchema.partial();

export type UpdateEmployer = z.infer<typeof updateEmployerSchema>;

export const employerIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type EmployerIdParam = z.infer<typeof employerIdParamSchema>;

export const listEmployersQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListEmployersQuery = z.infer<typeof listEmployersQuerySchema>;

// ============================================================================
// Providers
// ============================================================================

export const createProviderSchema = z.object({
  name: z.string().min(1).max(200),
  contact_person: z.string().min(1).max(100),
  contact_email: z.string().email().max(255),
  contact_phone: z.string().min(1).max(20),
});

export type CreateProvider = z.infer<typeof createProviderSchema>;

export const updateProviderSchema = createProviderSchema.partial();

export type UpdateProvider = z.infer<typeof updateProviderSchema>;

export const providerIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type ProviderIdParam = z.infer<typeof providerIdParamSchema>;

export const listProvidersQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListProvidersQuery = z.infer<typeof listProvidersQuerySchema>;

// ============================================================================
// Policies
// ============================================================================

// Member number is generated on create and never taken from the caller.
export const createPolicySchema = z
  .object({
    plan_type: z.string().min(1).max(50),
    policyholder_id: z.string().uuid(),
    employer_id: z.string().uuid().optional(),
    start_date: z.string().date(),
    end_date: z.string().date().optional(),
  })
  .refine((data) => !data.end_date || data.end_date >= data.start_date, {
    message: 'end_date must not be before start_date',
    path: ['end_date'],
  });

export type CreatePolicy = z.infer<typeof createPolicySchema>;

export const updatePolicySchema = z.object({
  plan_type: z.string().min(1).max(50).optional(),
  employer_id: z.string().uuid().nullable().optional(),
  start_date: z.string().date().optional(),
  end_date: z.string().date().nullable().optional(),
  is_active: z.boolean().optional(),
});

export type UpdatePolicy = z.infer<typeof updatePolicySchema>;

export const policyIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type PolicyIdParam = z.infer<typeof policyIdParamSchema>;

export const listPoliciesQuerySchema = z.object({
  policyholder_id: z.string().uuid().optional(),
  employer_id: z.string().uuid().optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(25),
});

export type ListPoliciesQuery = z.infer<typeof listPoliciesQuerySchema>;
