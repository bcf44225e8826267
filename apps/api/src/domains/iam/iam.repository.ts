import { eq, and, desc, count, inArray, type SQL } from 'drizzle-orm';
import {
  users,
  sessions,
  auditLog,
  type InsertUser,
  type SelectUser,
  type SelectSession,
  type SelectAuditLog,
} from '@medclaims/shared/schemas/db/iam.schema.js';
import { type Role } from '@medclaims/shared/constants/iam.constants.js';
import { type DbClient } from '../../lib/db.js';
import { type AuditEntry } from '../../lib/side-effects.js';

type UpdateUserData = Partial<
  Pick<InsertUser, 'fullName' | 'phone' | 'role' | 'isActive'>
>;

export interface UserListFilters {
  role?: Role;
  isActive?: boolean;
  page: number;
  pageSize: number;
}

export function createUserRepository(db: DbClient) {
  return {
    async createUser(data: InsertUser): Promise<SelectUser> {
      const rows = await db
        .insert(users)
        .values({ ...data, email: data.email.toLowerCase() })
        .returning();
      return rows[0];
    },

    async findUserByEmail(email: string): Promise<SelectUser | undefined> {
      const rows = await db
        .select()
        .from(users)
        .where(eq(users.email, email.toLowerCase()))
        .limit(1);
      return rows[0];
    },

    async findUserById(userId: string): Promise<SelectUser | undefined> {
      const rows = await db
        .select()
        .from(users)
        .where(eq(users.userId, userId))
        .limit(1);
      return rows[0];
    },

    async updateUser(
      userId: string,
      data: UpdateUserData,
    ): Promise<SelectUser | undefined> {
      const rows = await db
        .update(users)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(users.userId, userId))
        .returning();
      return rows[0];
    },

    async deactivateUser(userId: string): Promise<SelectUser | undefined> {
      const rows = await db
        .update(users)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(users.userId, userId))
        .returning();
      return rows[0];
    },

    async listUsers(
      filters: UserListFilters,
    ): Promise<{ data: SelectUser[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.role) conditions.push(eq(users.role, filters.role));
      if (filters.isActive !== undefined) {
        conditions.push(eq(users.isActive, filters.isActive));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select()
        .from(users)
        .where(where)
        .orderBy(desc(users.createdAt))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);

      const [{ total }] = await db
        .select({ total: count() })
        .from(users)
        .where(where);

      return { data, total };
    },

    async findActiveUsersByRoles(roles: readonly Role[]): Promise<SelectUser[]> {
      if (roles.length === 0) return [];
      return db
        .select()
        .from(users)
        .where(and(inArray(users.role, [...roles]), eq(users.isActive, true)));
    },
  };
}

export type UserRepository = ReturnType<typeof createUserRepository>;

// ---------------------------------------------------------------------------
// Session Repository
// ---------------------------------------------------------------------------

export interface SessionLifetimes {
  /** Absolute lifetime from creation. */
  absoluteTtlMs: number;
  /** Idle timeout from last activity. */
  idleTtlMs: number;
}

interface CreateSessionData {
  userId: string;
  tokenHash: string;
  ipAddress: string;
  userAgent: string;
}

export interface SessionWithUser {
  session: SelectSession;
  user: Pick<SelectUser, 'userId' | 'role' | 'isActive'>;
}

export function isSessionExpired(
  session: Pick<SelectSession, 'createdAt' | 'lastActiveAt'>,
  lifetimes: SessionLifetimes,
  now: number = Date.now(),
): boolean {
  const createdAt = new Date(session.createdAt).getTime();
  const lastActiveAt = new Date(session.lastActiveAt).getTime();

  if (now - createdAt > lifetimes.absoluteTtlMs) return true;
  if (now - lastActiveAt > lifetimes.idleTtlMs) return true;
  return false;
}

export function createSessionRepository(
  db: DbClient,
  lifetimes: SessionLifetimes,
) {
  return {
    async createSession(data: CreateSessionData): Promise<SelectSession> {
      const rows = await db.insert(sessions).values(data).returning();
      return rows[0];
    },

    async findSessionByTokenHash(
      tokenHash: string,
    ): Promise<SessionWithUser | undefined> {
      const rows = await db
        .select({
          session: sessions,
          user: {
            userId: users.userId,
            role: users.role,
            isActive: users.isActive,
          },
        })
        .from(sessions)
        .innerJoin(users, eq(sessions.userId, users.userId))
        .where(
          and(
            eq(sessions.tokenHash, tokenHash),
            eq(sessions.revoked, false),
          ),
        )
        .limit(1);

      if (rows.length === 0) return undefined;

      const row = rows[0];
      if (isSessionExpired(row.session, lifetimes)) return undefined;

      return row;
    },

    async refreshSession(sessionId: string): Promise<void> {
      await db
        .update(sessions)
        .set({ lastActiveAt: new Date() })
        .where(eq(sessions.sessionId, sessionId));
    },

    async revokeSession(sessionId: string, reason: string): Promise<void> {
      await db
        .update(sessions)
        .set({ revoked: true, revokedReason: reason })
        .where(eq(sessions.sessionId, sessionId));
    },

    async revokeAllUserSessions(userId: string, reason: string): Promise<void> {
      await db
        .update(sessions)
        .set({ revoked: true, revokedReason: reason })
        .where(and(eq(sessions.userId, userId), eq(sessions.revoked, false)));
    },
  };
}

export type SessionRepository = ReturnType<typeof createSessionRepository>;

// ---------------------------------------------------------------------------
// Audit Log Repository
// ---------------------------------------------------------------------------

const SANITISED_DETAIL_KEYS = new Set([
  'password',
  'passwordHash',
  'password_hash',
  'token',
  'tokenHash',
  'token_hash',
]);

/** Recursively strip sensitive keys from a JSONB detail object. */
function sanitiseDetail(
  detail: Record<string, unknown> | null | undefined,
): Record<string, unknown> | null {
  if (!detail) return null;

  const sanitised: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(detail)) {
    if (SANITISED_DETAIL_KEYS.has(key)) {
      sanitised[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      sanitised[key] = sanitiseDetail(value);
    } else {
      sanitised[key] = value;
    }
  }
  return sanitised;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export interface AuditLogFilters {
  userId?: string;
  action?: string;
  resourceType?: string;
  page: number;
  pageSize: number;
}

export function createAuditLogRepository(db: DbClient) {
  return {
    /**
     * Append a single audit log entry. This is the ONLY write operation
     * on the audit_log table.
     */
    async appendAuditLog(entry: AuditEntry): Promise<SelectAuditLog> {
      const rows = await db
        .insert(auditLog)
        .values({
          userId: entry.userId ?? undefined,
          action: entry.action,
          category: entry.category,
          resourceType: entry.resourceType ?? undefined,
          resourceId: entry.resourceId ?? undefined,
          detail: sanitiseDetail(entry.detail),
          ipAddress: entry.ipAddress ?? undefined,
          userAgent: entry.userAgent ?? undefined,
        })
        .returning();
      return rows[0];
    },

    /**
     * Query the audit log across all users, newest first. The route guard
     * restricts this to AUDIT_VIEW holders.
     */
    async queryAuditLog(
      filters: AuditLogFilters,
    ): Promise<{ data: SelectAuditLog[]; total: number }> {
      const conditions: SQL[] = [];
      if (filters.userId) conditions.push(eq(auditLog.userId, filters.userId));
      if (filters.action) conditions.push(eq(auditLog.action, filters.action));
      if (filters.resourceType) {
        conditions.push(eq(auditLog.resourceType, filters.resourceType));
      }
      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select()
        .from(auditLog)
        .where(where)
        .orderBy(desc(auditLog.createdAt))
        .limit(filters.pageSize)
        .offset((filters.page - 1) * filters.pageSize);

      const [{ total }] = await db
        .select({ total: count() })
        .from(auditLog)
        .where(where);

      return { data, total };
    },
  };
}

export type AuditLogRepository = ReturnType<typeof createAuditLogRepository>;
