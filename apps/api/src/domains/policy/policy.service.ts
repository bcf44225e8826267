import {
  type CreateEmployer,
  type UpdateEmployer,
  type CreateProvider,
  type UpdateProvider,
  type CreatePolicy,
  type UpdatePolicy,
} from '@medclaims/shared/schemas/policy.schema.js';
import {
  AuditAction,
  AuditCategory,
  Role,
} from '@medclaims/shared/constants/iam.constants.js';
import {
  type SelectEmployer,
  type SelectProvider,
  type SelectPolicy,
} from '@medclaims/shared/schemas/db/policy.schema.js';
import { type SelectUser } from '@medclaims/shared/schemas/db/iam.schema.js';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../lib/errors.js';
import { type SideEffectDispatcher } from '../../lib/side-effects.js';
import {
  assertOwnerAccess,
  policyholderScope,
  type Principal,
} from '../../lib/access-gate.js';
import { generateMemberNumber } from '../../lib/reference-numbers.js';
import { type PolicyListFilters } from './policy.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface EmployerRepo {
  createEmployer(data: {
    name: string;
    contactPerson?: string | null;
    contactEmail?: string | null;
    contactPhone?: string | null;
  }): Promise<SelectEmployer>;
  findEmployerById(employerId: string): Promise<SelectEmployer | undefined>;
  listEmployers(
    page: number,
    pageSize: number,
  ): Promise<{ data: SelectEmployer[]; total: number }>;
  updateEmployer(
    employerId: string,
    data: {
      name?: string;
      contactPerson?: string;
      contactEmail?: string;
      contactPhone?: string;
    },
  ): Promise<SelectEmployer | undefined>;
  deleteEmployer(employerId: string): Promise<boolean>;
  countPoliciesForEmployer(employerId: string): Promise<number>;
}

export interface ProviderRepo {
  createProvider(data: {
    name: string;
    contactPerson: string;
    contactEmail: string;
    contactPhone: string;
  }): Promise<SelectProvider>;
  findProviderById(providerId: string): Promise<SelectProvider | undefined>;
  findProviderByEmail(contactEmail: string): Promise<SelectProvider | undefined>;
  listProviders(
    page: number,
    pageSize: number,
  ): Promise<{ data: SelectProvider[]; total: number }>;
  updateProvider(
    providerId: string,
    data: {
      name?: string;
      contactPerson?: string;
      contactEmail?: string;
      contactPhone?: string;
    },
  ): Promise<SelectProvider | undefined>;
  deleteProvider(providerId: string): Promise<boolean>;
}

export interface PolicyRepo {
  createPolicy(data: {
    memberNumber: string;
    planType: string;
    policyholderId: string;
    employerId?: string | null;
    startDate: string;
    endDate?: string | null;
  }): Promise<SelectPolicy>;
  findPolicyById(policyId: string): Promise<SelectPolicy | undefined>;
  findPolicyByMemberNumber(memberNumber: string): Promise<SelectPolicy | undefined>;
  listPolicies(
    filters: PolicyListFilters,
  ): Promise<{ data: SelectPolicy[]; total: number }>;
  updatePolicy(
    policyId: string,
    data: {
      planType?: string;
      employerId?: string | null;
      startDate?: string;
      endDate?: string | null;
      isActive?: boolean;
    },
  ): Promise<SelectPolicy | undefined>;
  deletePolicy(policyId: string): Promise<boolean>;
  countClaimsForPolicy(policyId: string): Promise<number>;
}

export interface PolicyholderLookup {
  findUserById(userId: string): Promise<SelectUser | undefined>;
}

export interface PolicyServiceDeps {
  employerRepo: EmployerRepo;
  providerRepo: ProviderRepo;
  policyRepo: PolicyRepo;
  userRepo: PolicyholderLookup;
  sideEffects: SideEffectDispatcher;
}

const MEMBER_NUMBER_ATTEMPTS = 5;

// ---------------------------------------------------------------------------
// Employers
// ---------------------------------------------------------------------------

export async function createEmployer(
  deps: PolicyServiceDeps,
  actorId: string,
  data: CreateEmployer,
): Promise<SelectEmployer> {
  const employer = await deps.employerRepo.createEmployer({
    name: data.name,
    contactPerson: data.contact_person ?? null,
    contactEmail: data.contact_email ?? null,
    contactPhone: data.contact_phone ?? null,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.EMPLOYER_CREATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'employer',
        resourceId: employer.employerId,
        detail: { name: employer.name },
      },
    ],
    notifications: [],
  });

  return employer;
}

export async function listEmployers(
  deps: PolicyServiceDeps,
  page: number,
  pageSize: number,
): Promise<{ data: SelectEmployer[]; total: number }> {
  return deps.employerRepo.listEmployers(page, pageSize);
}

export async function getEmployer(
  deps: PolicyServiceDeps,
  employerId: string,
): Promise<SelectEmployer> {
  const employer = await deps.employerRepo.findEmployerById(employerId);
  if (!employer) throw new NotFoundError('Employer');
  return employer;
}

export async function updateEmployer(
  deps: PolicyServiceDeps,
  actorId: string,
  employerId: string,
  data: UpdateEmployer,
): Promise<SelectEmployer> {
  const updated = await deps.employerRepo.updateEmployer(employerId, {
    name: data.name,
    contactPerson: data.contact_person,
    contactEmail: data.contact_email,
    contactPhone: data.contact_phone,
  });
  if (!updated) throw new NotFoundError('Employer');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.EMPLOYER_UPDATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'employer',
        resourceId: employerId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return updated;
}

/** Employers still referenced by a policy cannot be removed. */
export async function deleteEmployer(
  deps: PolicyServiceDeps,
  actorId: string,
  employerId: string,
): Promise<void> {
  const employer = await deps.employerRepo.findEmployerById(employerId);
  if (!employer) throw new NotFoundError('Employer');

  const linked = await deps.employerRepo.countPoliciesForEmployer(employerId);
  if (linked > 0) {
    throw new ConflictError(`Employer has ${linked} linked policies`);
  }

  await deps.employerRepo.deleteEmployer(employerId);

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.EMPLOYER_DELETED,
        category: AuditCategory.REFERENCE,
        resourceType: 'employer',
        resourceId: employerId,
      },
    ],
    notifications: [],
  });
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

async function assertProviderEmailFree(
  deps: PolicyServiceDeps,
  contactEmail: string,
  providerId?: string,
): Promise<void> {
  const existing = await deps.providerRepo.findProviderByEmail(contactEmail);
  if (existing && existing.providerId !== providerId) {
    throw new ConflictError('A provider with this email already exists');
  }
}

export async function createProvider(
  deps: PolicyServiceDeps,
  actorId: string,
  data: CreateProvider,
): Promise<SelectProvider> {
  const contactEmail = data.contact_email.toLowerCase();
  await assertProviderEmailFree(deps, contactEmail);

  const provider = await deps.providerRepo.createProvider({
    name: data.name,
    contactPerson: data.contact_person,
    contactEmail,
    contactPhone: data.contact_phone,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.PROVIDER_CREATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'provider',
        resourceId: provider.providerId,
        detail: { name: provider.name },
      },
    ],
    notifications: [],
  });

  return provider;
}

export async function listProviders(
  deps: PolicyServiceDeps,
  page: number,
  pageSize: number,
): Promise<{ data: SelectProvider[]; total: number }> {
  return deps.providerRepo.listProviders(page, pageSize);
}

export async function getProvider(
  deps: PolicyServiceDeps,
  providerId: string,
): Promise<SelectProvider> {
  const provider = await deps.providerRepo.findProviderById(providerId);
  if (!provider) throw new NotFoundError('Provider');
  return provider;
}

export async function updateProvider(
  deps: PolicyServiceDeps,
  actorId: string,
  providerId: string,
  data: UpdateProvider,
): Promise<SelectProvider> {
  const contactEmail = data.contact_email?.toLowerCase();
  if (contactEmail) await assertProviderEmailFree(deps, contactEmail, providerId);

  const updated = await deps.providerRepo.updateProvider(providerId, {
    name: data.name,
    contactPerson: data.contact_person,
    contactEmail,
    contactPhone: data.contact_phone,
  });
  if (!updated) throw new NotFoundError('Provider');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.PROVIDER_UPDATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'provider',
        resourceId: providerId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return updated;
}

export async function deleteProvider(
  deps: PolicyServiceDeps,
  actorId: string,
  providerId: string,
): Promise<void> {
  const deleted = await deps.providerRepo.deleteProvider(providerId);
  if (!deleted) throw new NotFoundError('Provider');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.PROVIDER_DELETED,
        category: AuditCategory.REFERENCE,
        resourceType: 'provider',
        resourceId: providerId,
      },
    ],
    notifications: [],
  });
}

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

async function uniqueMemberNumber(deps: PolicyServiceDeps): Promise<string> {
  for (let attempt = 0; attempt < MEMBER_NUMBER_ATTEMPTS; attempt++) {
    const candidate = generateMemberNumber();
    if (!(await deps.policyRepo.findPolicyByMemberNumber(candidate))) {
      return candidate;
    }
  }
  throw new ConflictError('Could not allocate a unique member number');
}

/**
 * Create a policy. The policyholder must be an existing POLICYHOLDER user
 * and the employer, when given, must exist.
 */
export async function createPolicy(
  deps: PolicyServiceDeps,
  actorId: string,
  data: CreatePolicy,
): Promise<SelectPolicy> {
  const holder = await deps.userRepo.findUserById(data.policyholder_id);
  if (!holder) {
    throw new ValidationError('Policyholder not found', { field: 'policyholder_id' });
  }
  if (holder.role !== Role.POLICYHOLDER) {
    throw new ValidationError('User is not a policyholder', {
      field: 'policyholder_id',
      role: holder.role,
    });
  }

  if (data.employer_id) {
    const employer = await deps.employerRepo.findEmployerById(data.employer_id);
    if (!employer) {
      throw new ValidationError('Employer not found', { field: 'employer_id' });
    }
  }

  const policy = await deps.policyRepo.createPolicy({
    memberNumber: await uniqueMemberNumber(deps),
    planType: data.plan_type,
    policyholderId: data.policyholder_id,
    employerId: data.employer_id ?? null,
    startDate: data.start_date,
    endDate: data.end_date ?? null,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.POLICY_CREATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'policy',
        resourceId: policy.policyId,
        detail: {
          memberNumber: policy.memberNumber,
          policyholderId: policy.policyholderId,
        },
      },
    ],
    notifications: [],
  });

  return policy;
}

/** POLICYHOLDER callers only ever see their own policies. */
export async function listPolicies(
  deps: PolicyServiceDeps,
  principal: Principal,
  filters: PolicyListFilters,
): Promise<{ data: SelectPolicy[]; total: number }> {
  const scoped = policyholderScope(principal);
  return deps.policyRepo.listPolicies({
    ...filters,
    policyholderId: scoped ?? filters.policyholderId,
  });
}

export async function getPolicy(
  deps: PolicyServiceDeps,
  principal: Principal,
  policyId: string,
): Promise<SelectPolicy> {
  const policy = await deps.policyRepo.findPolicyById(policyId);
  if (!policy) throw new NotFoundError('Policy');
  assertOwnerAccess(principal, policy.policyholderId);
  return policy;
}

export async function updatePolicy(
  deps: PolicyServiceDeps,
  actorId: string,
  policyId: string,
  data: UpdatePolicy,
): Promise<SelectPolicy> {
  const existing = await deps.policyRepo.findPolicyById(policyId);
  if (!existing) throw new NotFoundError('Policy');

  if (data.employer_id) {
    const employer = await deps.employerRepo.findEmployerById(data.employer_id);
    if (!employer) {
      throw new ValidationError('Employer not found', { field: 'employer_id' });
    }
  }

  const startDate = data.start_date ?? existing.startDate;
  const endDate = data.end_date === undefined ? existing.endDate : data.end_date;
  if (endDate && endDate < startDate) {
    throw new ValidationError('end_date must not be before start_date', {
      field: 'end_date',
    });
  }

  const updated = await deps.policyRepo.updatePolicy(policyId, {
    planType: data.plan_type,
    employerId: data.employer_id,
    startDate: data.start_date,
    endDate: data.end_date,
    isActive: data.is_active,
  });
  if (!updated) throw new NotFoundError('Policy');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.POLICY_UPDATED,
        category: AuditCategory.REFERENCE,
        resourceType: 'policy',
        resourceId: policyId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return updated;
}

/** Policies with claims are kept; deactivate them instead. */
export async function deletePolicy(
  deps: PolicyServiceDeps,
  actorId: string,
  policyId: string,
): Promise<void> {
  const policy = await deps.policyRepo.findPolicyById(policyId);
  if (!policy) throw new NotFoundError('Policy');

  const claimCount = await deps.policyRepo.countClaimsForPolicy(policyId);
  if (claimCount > 0) {
    throw new ConflictError(`Policy has ${claimCount} claims and cannot be deleted`);
  }

  await deps.policyRepo.deletePolicy(policyId);

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.POLICY_DELETED,
        category: AuditCategory.REFERENCE,
        resourceType: 'policy',
        resourceId: policyId,
        detail: { memberNumber: policy.memberNumber },
      },
    ],
    notifications: [],
  });
}
