import { eq, and, desc, count } from 'drizzle-orm';
import {
  notifications,
  type InsertNotification,
  type SelectNotification,
} from '@medclaims/shared/schemas/db/notification.schema.js';
import { claims } from '@medclaims/shared/schemas/db/claim.schema.js';
import { policies } from '@medclaims/shared/schemas/db/policy.schema.js';
import { users } from '@medclaims/shared/schemas/db/iam.schema.js';
import { type DbClient } from '../../lib/db.js';

export interface ListNotificationsOpts {
  unreadOnly?: boolean;
  limit: number;
  offset: number;
}

/** What the notifier needs to address and word a claim notification. */
export interface ClaimContext {
  claimId: string;
  referenceNumber: string;
  policyholder: {
    userId: string;
    email: string;
    fullName: string;
    isActive: boolean;
  };
}

export function createNotificationRepository(db: DbClient) {
  return {
    async createNotification(
      data: InsertNotification,
    ): Promise<SelectNotification> {
      const rows = await db
        .insert(notifications)
        .values(data)
        .returning();
      return rows[0];
    },

    async listNotifications(
      userId: string,
      opts: ListNotificationsOpts,
    ): Promise<SelectNotification[]> {
      const conditions = [eq(notifications.userId, userId)];

      if (opts.unreadOnly) {
        conditions.push(eq(notifications.isRead, false));
      }

      return db
        .select()
        .from(notifications)
        .where(and(...conditions))
        .orderBy(desc(notifications.createdAt))
        .limit(opts.limit)
        .offset(opts.offset);
    },

    async countUnread(userId: string): Promise<number> {
      const [{ total }] = await db
        .select({ total: count() })
        .from(notifications)
        .where(
          and(
            eq(notifications.userId, userId),
            eq(notifications.isRead, false),
          ),
        );
      return total;
    },

    async markRead(
      notificationId: string,
      userId: string,
    ): Promise<SelectNotification | undefined> {
      const rows = await db
        .update(notifications)
        .set({ isRead: true })
        .where(
          and(
            eq(notifications.notificationId, notificationId),
            eq(notifications.userId, userId),
          ),
        )
        .returning();
      return rows[0];
    },

    async markAllRead(userId: string): Promise<number> {
      const rows = await db
        .update(notifications)
        .set({ isRead: true })
        .where(
          and(
            eq(notifications.userId, userId),
            eq(notifications.isRead, false),
          ),
        )
        .returning({ notificationId: notifications.notificationId });
      return rows.length;
    },

    async findClaimContext(claimId: string): Promise<ClaimContext | undefined> {
      const rows = await db
        .select({
          claimId: claims.claimId,
          referenceNumber: claims.referenceNumber,
          userId: users.userId,
          email: users.email,
          fullName: users.fullName,
          isActive: users.isActive,
        })
        .from(claims)
        .innerJoin(policies, eq(claims.policyId, policies.policyId))
        .innerJoin(users, eq(policies.policyholderId, users.userId))
        .where(eq(claims.claimId, claimId))
        .limit(1);

      const row = rows[0];
      if (!row) return undefined;
      return {
        claimId: row.claimId,
        referenceNumber: row.referenceNumber,
        policyholder: {
          userId: row.userId,
          email: row.email,
          fullName: row.fullName,
          isActive: row.isActive,
        },
      };
    },
  };
}

export type NotificationRepository = ReturnType<typeof createNotificationRepository>;
