// ============================================================================
// Notifications — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  text,
  boolean,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

import { users } from './iam.schema.js';
import { claims } from './claim.schema.js';

// --- Notifications Table ---
// In-app notifications, scoped by user_id.

export const notifications = pgTable(
  'notifications',
  {
    notificationId: uuid('notification_id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.userId),
    claimId: uuid('claim_id').references(() => claims.claimId),
    eventType: varchar('event_type', { length: 50 }).notNull(),
    notificationType: varchar('notification_type', { length: 10 })
      .notNull()
      .default('IN_APP'),
    title: varchar('title', { length: 200 }).notNull(),
    message: text('message').notNull(),
    isRead: boolean('is_read').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('notifications_user_read_idx').on(table.userId, table.isRead),
    index('notifications_user_created_at_idx').on(
      table.userId,
      table.createdAt,
    ),
  ],
);

// --- Inferred Types ---

export type InsertNotification = typeof notifications.$inferInsert;
export type SelectNotification = typeof notifications.$inferSelect;
