// ============================================================================
// Employers, Providers & Policies — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  date,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './iam.schema.js';

// --- Employers Table ---

export const employers = pgTable('employers', {
  employerId: uuid('employer_id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 200 }).notNull(),
  contactPerson: varchar('contact_person', { length: 100 }),
  contactEmail: varchar('contact_email', { length: 255 }),
  contactPhone: varchar('contact_phone', { length: 20 }),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

// --- Providers Table ---

export const providers = pgTable(
  'providers',
  {
    providerId: uuid('provider_id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 200 }).notNull(),
    contactPerson: varchar('contact_person', { length: 100 }).notNull(),
    contactEmail: varchar('contact_email', { length: 255 }).notNull(),
    contactPhone: varchar('contact_phone', { length: 20 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [uniqueIndex('providers_contact_email_idx').on(table.contactEmail)],
);

// --- Policies Table ---

export const policies = pgTable(
  'policies',
  {
    policyId: uuid('policy_id').primaryKey().defaultRandom(),
    memberNumber: varchar('member_number', { length: 50 }).notNull(),
    planType: varchar('plan_type', { length: 50 }).notNull(),
    policyholderId: uuid('policyholder_id')
      .notNull()
      .references(() => users.userId),
    employerId: uuid('employer_id').references(() => employers.employerId),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('policies_member_number_idx').on(table.memberNumber),
    index('policies_policyholder_idx').on(table.policyholderId),
    index('policies_employer_idx').on(table.employerId),
  ],
);

// --- Inferred Types ---

export type InsertEmployer = typeof employers.$inferInsert;
export type SelectEmployer = typeof employers.$inferSelect;

export type InsertProvider = typeof providers.$inferInsert;
export type SelectProvider = typeof providers.$inferSelect;

export type InsertPolicy = typeof policies.$inferInsert;
export type SelectPolicy = typeof policies.$inferSelect;
