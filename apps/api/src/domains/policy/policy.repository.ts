import { eq, and, desc, count, sql, type SQL } from 'drizzle-orm';
import {
  employers,
  providers,
  policies,
  type InsertEmployer,
  type SelectEmployer,
  type InsertProvider,
  type SelectProvider,
  type InsertPolicy,
  type SelectPolicy,
} from '@medclaims/shared/schemas/db/policy.schema.js';
import { claims } from '@medclaims/shared/schemas/db/claim.schema.js';
import { type DbClient } from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Employer Repository
// ---------------------------------------------------------------------------

type UpdateEmployerData = Partial<
  Pick<InsertEmployer, 'name' | 'contactPerson' | 'contactEmail' | 'contactPhone'>
>;

export function createEmployerRepository(db: DbClient) {
  return {
    async createEmployer(data: InsertEmployer): Promise<SelectEmployer> {
      const rows = await db.insert(employers).values(data).returning();
      return rows[0];
    },

    async findEmployerById(employerId: string): Promise<SelectEmployer | undefined> {
      const rows = await db
        .select()
        .from(employers)
        .where(eq(employers.employerId, employerId))
        .limit(1);
      return rows[0];
    },

    async listEmployers(
      page: number,
      pageSize: number,
    ): Promise<{ data: SelectEmployer[]; total: number }> {
      const data = await db
        .select()
        .from(employers)
        .orderBy(employers.name)
        .limit(pageSize)
        .offset((page - 1) * pageSize);
      const [{ total }] = await db.select({ total: count() }).from(employers);
      return { data, total };
    },

    async updateEmployer(
      employerId: string,
      data: UpdateEmployerData,
    ): Promise<SelectEmployer | undefined> {
      const rows = await db
        .update(employers)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(employers.employerId, employerId))
        .returning();
      return rows[0];
    },

    async deleteEmployer(employerId: string): Promise<boolean> {
      const rows = await db
        .delete(employers)
        .where(eq(employers.employerId, employerId))
        .returning({ employerId: employers.employerId });
      return rows.length > 0;
    },

    async countPoliciesForEmployer(employerId: string): Promise<number> {
      const [{ total }] = await db
        .select({ total: count() })
        .from(policies)
        .where(eq(policies.employerId, employerId));
      return total;
    },
  };
}

export type EmployerRepository = ReturnType<typeof createEmployerRepository>;

// ---------------------------------------------------------------------------
// Provider Repository
// ---------------------------------------------------------------------------

type UpdateProviderData = Partial<
  Pick<InsertProvider, 'name' | 'contactPerson' | 'contactEmail' | 'contactPhone'>
>;

export function createProviderRepository(db: DbClient) {
  return {
    async createProvider(data: InsertProvider): Promise<SelectProvider> {
      const rows = await db.insert(providers).values(data).returning();
      return rows[0];
    },

    async findProviderById(providerId: string): Promise<SelectProvider | undefined> {
      const rows = await db
        .select()
        .from(providers)
        .where(eq(providers.providerId, providerId))
        .limit(1);
      return rows[0];
    },

    async findProviderByEmail(contactEmail: string): Promise<SelectProvider | undefined> {
      const rows = await db
        .select()
        .from(providers)
        .where(eq(providers.contactEmail, contactEmail))
        .limit(1);
      return rows[0];
    },

    async listProviders(
      page: number,
      pageSize: number,
    ): Promise<{ data: SelectProvider[]; total: number }> {
      const data = await db
        .select()
        .from(providers)
        .orderBy(providers.name)
        .limit(pageSize)
        .offset((page - 1) * pageSize);
      const [{ total }] = await db.select({ total: count() }).from(providers);
      return { data, total };
    },

    async updateProvider(
      providerId: string,
      data: UpdateProviderData,
    ): Promise<SelectProvider | undefined> {
      const rows = await db
        .update(providers)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(providers.providerId, providerId))
        .returning();
      return rows[0];
    },

    async deleteProvider(providerId: string): Promise<boolean> {
      const rows = await db
        .delete(providers)
        .where(eq(providers.providerId, providerId))
        .returning({ providerId: providers.providerId });
      return rows.length > 0;
    },
  };
}

// ---------------------------------------------------------------------------
// Policy Repository
// ---------------------------------------------------------------------------

type UpdatePolicyData = Partial<
  Pick<InsertPolicy, 'planType' | 'employerId' | 'startDate' | 'endDate' | 'isActive'>
>;

export interface PolicyListFilters {
  policyholderId?: string;
  employerId?: string;
  page: number;
  pageSize: number;
}

export function createPolicyRepository(db: DbClient) {
  return {
    async createPolicy(data: InsertPolicy): Promise<SelectPolicy> {
      const rows = await db.insert(policies).values(data).returning();
      return rows[0];
    },

    async findPolicyById(policyId: string): Promise<SelectPolicy | undefined> {
      const rows = await db
        .select()
        .from(policies)
        .where(eq(policies.policyId, policyId))
        .limit(1);
      return rows[0];
    },

    async findPolicyByMemberNumber(
      memberNumber: string,
    ): Promise<SelectPolicy | undefined> {
      const rows = await db
        .select()
        .from(policies)
        .where(eq(policies.memberNumber, memberNumber))
        .limit(1);
      return rows[0];
    },

    async listPolicies(
      filters: PolicyListFilters,
    ): Promise<{ data: SelectPolicy[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.policyholderId) {
        conditions.push(eq(policies.policyholderId, filters.policyholderId));
      }
      if (filters.employerId) {
        conditions.push(eq(policies.employerId, filters.employerId));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select()
        .from(policies)
        .where(where)
        .orderBy(desc(policies.createdAt))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);
      const [{ total }] = await db
        .select({ total: count() })
        .from(policies)
        .where(where);

      return { data, total };
    },

    async updatePolicy(
      policyId: string,
      data: UpdatePolicyData,
    ): Promise<SelectPolicy | undefined> {
      const rows = await db
        .update(policies)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(policies.policyId, policyId))
        .returning();
      return rows[0];
    },

    async deletePolicy(policyId: string): Promise<boolean> {
      const rows = await db
        .delete(policies)
        .where(eq(policies.policyId, policyId))
        .returning({ policyId: policies.policyId });
      return rows.length > 0;
    },

    async countPoliciesForHolder(
      policyholderId: string,
    ): Promise<{ total: number; active: number }> {
      const [row] = await db
        .select({
          total: count(),
          active: sql<number>`count(*) filter (where ${policies.isActive})`.mapWith(Number),
        })
        .from(policies)
        .where(eq(policies.policyholderId, policyholderId));
      return row;
    },

    async countClaimsForPolicy(policyId: string): Promise<number> {
      const [{ total }] = await db
        .select({ total: count() })
        .from(claims)
        .where(eq(claims.policyId, policyId));
      return total;
    },
  };
}

export type PolicyRepository = ReturnType<typeof createPolicyRepository>;
