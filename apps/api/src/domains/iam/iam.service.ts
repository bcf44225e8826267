import { createHash, randomBytes } from 'node:crypto';
import { hash as argon2Hash, verify as argon2Verify } from '@node-rs/argon2';
import { type Register, type CreateUser, type UpdateUser, type UpdateProfile } from '@medclaims/shared/schemas/iam.schema.js';
import {
  AuditAction,
  AuditCategory,
  Role,
  isRole,
} from '@medclaims/shared/constants/iam.constants.js';
import { type SelectUser, type SelectSession, type SelectAuditLog } from '@medclaims/shared/schemas/db/iam.schema.js';
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../lib/errors.js';
import { type SideEffectDispatcher } from '../../lib/side-effects.js';
import { type UserListFilters, type AuditLogFilters } from './iam.repository.js';

// ---------------------------------------------------------------------------
// Token utilities
// ---------------------------------------------------------------------------

/** SHA-256 hash a plaintext token. Stored in DB instead of the raw value. */
export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

function generateSessionToken(): string {
  return randomBytes(32).toString('hex');
}

// ---------------------------------------------------------------------------
// Public user projection (never exposes the password hash)
// ---------------------------------------------------------------------------

export type PublicUser = Omit<SelectUser, 'passwordHash'>;

export function toPublicUser(user: SelectUser): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface Argon2Options {
  memoryCost: number;
  timeCost: number;
}

export interface UserRepo {
  createUser(data: {
    email: string;
    passwordHash: string;
    fullName: string;
    phone?: string | null;
    role: Role;
  }): Promise<SelectUser>;
  findUserByEmail(email: string): Promise<SelectUser | undefined>;
  findUserById(userId: string): Promise<SelectUser | undefined>;
  updateUser(
    userId: string,
    data: {
      fullName?: string;
      phone?: string | null;
      role?: Role;
      isActive?: boolean;
    },
  ): Promise<SelectUser | undefined>;
  deactivateUser(userId: string): Promise<SelectUser | undefined>;
  listUsers(filters: UserListFilters): Promise<{ data: SelectUser[]; total: number }>;
}

export interface SessionRepo {
  createSession(data: {
    userId: string;
    tokenHash: string;
    ipAddress: string;
    userAgent: string;
  }): Promise<Pick<SelectSession, 'sessionId'>>;
  findSessionByTokenHash(tokenHash: string): Promise<
    | {
        session: Pick<SelectSession, 'sessionId' | 'userId'>;
        user: { userId: string; role: string; isActive: boolean };
      }
    | undefined
  >;
  refreshSession(sessionId: string): Promise<void>;
  revokeSession(sessionId: string, reason: string): Promise<void>;
  revokeAllUserSessions(userId: string, reason: string): Promise<void>;
}

export interface AuditLogQueryRepo {
  queryAuditLog(
    filters: AuditLogFilters,
  ): Promise<{ data: SelectAuditLog[]; total: number }>;
}

export interface IamServiceDeps {
  userRepo: UserRepo;
  sessionRepo: SessionRepo;
  auditLogRepo: AuditLogQueryRepo;
  sideEffects: SideEffectDispatcher;
  argon2: Argon2Options;
}

export type SessionManagementDeps = Pick<IamServiceDeps, 'sessionRepo' | 'sideEffects'>;

interface RequestMeta {
  ipAddress: string;
  userAgent: string;
}

function hashPassword(deps: Pick<IamServiceDeps, 'argon2'>, password: string) {
  return argon2Hash(password, {
    memoryCost: deps.argon2.memoryCost,
    timeCost: deps.argon2.timeCost,
    parallelism: 1,
  });
}

// ---------------------------------------------------------------------------
// Service: Registration
// ---------------------------------------------------------------------------

/**
 * Self-registration. Always creates a POLICYHOLDER; staff accounts are
 * created by an admin through createUser.
 */
export async function registerUser(
  deps: IamServiceDeps,
  data: Register,
  meta?: RequestMeta,
): Promise<PublicUser> {
  const email = data.email.toLowerCase();
  const existing = await deps.userRepo.findUserByEmail(email);
  if (existing) {
    throw new ConflictError('Email already registered');
  }

  const user = await deps.userRepo.createUser({
    email,
    passwordHash: await hashPassword(deps, data.password),
    fullName: data.full_name,
    phone: data.phone ?? null,
    role: Role.POLICYHOLDER,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: user.userId,
        action: AuditAction.AUTH_REGISTERED,
        category: AuditCategory.AUTH,
        resourceType: 'user',
        resourceId: user.userId,
        detail: { email },
        ipAddress: meta?.ipAddress,
        userAgent: meta?.userAgent,
      },
    ],
    notifications: [],
  });

  return toPublicUser(user);
}

// ---------------------------------------------------------------------------
// Service: Login
// ---------------------------------------------------------------------------

export interface LoginResult {
  sessionToken: string;
  user: PublicUser;
}

/**
 * Authenticate with email and password and open a session.
 *
 * Wrong email, wrong password and a deactivated account all yield the same
 * error. A dummy hash is computed for unknown emails so timing does not
 * reveal which addresses exist.
 */
export async function loginUser(
  deps: IamServiceDeps,
  email: string,
  password: string,
  meta: RequestMeta,
): Promise<LoginResult> {
  const user = await deps.userRepo.findUserByEmail(email.toLowerCase());

  if (!user) {
    await hashPassword(deps, 'dummy-password-for-timing');
    throw new UnauthorizedError('Invalid credentials');
  }

  const passwordValid = await argon2Verify(user.passwordHash, password);

  if (!passwordValid || !user.isActive) {
    deps.sideEffects.dispatch({
      audit: [
        {
          userId: user.userId,
          action: AuditAction.AUTH_LOGIN_FAILED,
          category: AuditCategory.AUTH,
          resourceType: 'user',
          resourceId: user.userId,
          detail: { reason: passwordValid ? 'account_inactive' : 'invalid_password' },
          ipAddress: meta.ipAddress,
          userAgent: meta.userAgent,
        },
      ],
      notifications: [],
    });
    throw new UnauthorizedError('Invalid credentials');
  }

  const sessionToken = generateSessionToken();
  const session = await deps.sessionRepo.createSession({
    userId: user.userId,
    tokenHash: hashToken(sessionToken),
    ipAddress: meta.ipAddress,
    userAgent: meta.userAgent,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: user.userId,
        action: AuditAction.AUTH_LOGIN_SUCCESS,
        category: AuditCategory.AUTH,
        resourceType: 'session',
        resourceId: session.sessionId,
        ipAddress: meta.ipAddress,
        userAgent: meta.userAgent,
      },
    ],
    notifications: [],
  });

  return { sessionToken, user: toPublicUser(user) };
}

// ---------------------------------------------------------------------------
// Service: Validate Session
// ---------------------------------------------------------------------------

export interface AuthContext {
  userId: string;
  role: Role;
  sessionId: string;
}

/**
 * Validate a session by its token hash.
 *
 * Expiry and revocation are checked by the repository. The owning user must
 * still be active and hold a known role. On success the idle timer is
 * refreshed.
 */
export async function validateSession(
  deps: Pick<IamServiceDeps, 'sessionRepo'>,
  tokenHash: string,
): Promise<AuthContext | null> {
  const result = await deps.sessionRepo.findSessionByTokenHash(tokenHash);
  if (!result) return null;
  if (!result.user.isActive) return null;

  const role = result.user.role.toUpperCase();
  if (!isRole(role)) return null;

  await deps.sessionRepo.refreshSession(result.session.sessionId);

  return {
    userId: result.user.userId,
    role,
    sessionId: result.session.sessionId,
  };
}

// ---------------------------------------------------------------------------
// Service: Logout
// ---------------------------------------------------------------------------

export async function logout(
  deps: SessionManagementDeps,
  sessionId: string,
  userId: string,
): Promise<void> {
  await deps.sessionRepo.revokeSession(sessionId, 'logout');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId,
        action: AuditAction.AUTH_LOGOUT,
        category: AuditCategory.AUTH,
        resourceType: 'session',
        resourceId: sessionId,
      },
    ],
    notifications: [],
  });
}

// ---------------------------------------------------------------------------
// Service: Own profile
// ---------------------------------------------------------------------------

export async function getProfile(
  deps: IamServiceDeps,
  userId: string,
): Promise<PublicUser> {
  const user = await deps.userRepo.findUserById(userId);
  if (!user) throw new NotFoundError('User');
  return toPublicUser(user);
}

export async function updateProfile(
  deps: IamServiceDeps,
  userId: string,
  data: UpdateProfile,
): Promise<PublicUser> {
  const updated = await deps.userRepo.updateUser(userId, {
    fullName: data.full_name,
    phone: data.phone,
  });
  if (!updated) throw new NotFoundError('User');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId,
        action: AuditAction.USER_UPDATED,
        category: AuditCategory.ACCOUNT,
        resourceType: 'user',
        resourceId: userId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return toPublicUser(updated);
}

// ---------------------------------------------------------------------------
// Service: User management (admin)
// ---------------------------------------------------------------------------

export async function listUsers(
  deps: IamServiceDeps,
  filters: UserListFilters,
): Promise<{ data: PublicUser[]; total: number }> {
  const result = await deps.userRepo.listUsers(filters);
  return { data: result.data.map(toPublicUser), total: result.total };
}

export async function getUser(
  deps: IamServiceDeps,
  userId: string,
): Promise<PublicUser> {
  const user = await deps.userRepo.findUserById(userId);
  if (!user) throw new NotFoundError('User');
  return toPublicUser(user);
}

export async function createUser(
  deps: IamServiceDeps,
  actorId: string,
  data: CreateUser,
): Promise<PublicUser> {
  const email = data.email.toLowerCase();
  if (await deps.userRepo.findUserByEmail(email)) {
    throw new ConflictError('Email already registered');
  }

  const user = await deps.userRepo.createUser({
    email,
    passwordHash: await hashPassword(deps, data.password),
    fullName: data.full_name,
    phone: data.phone ?? null,
    role: data.role,
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.USER_CREATED,
        category: AuditCategory.ACCOUNT,
        resourceType: 'user',
        resourceId: user.userId,
        detail: { email, role: data.role },
      },
    ],
    notifications: [],
  });

  return toPublicUser(user);
}

export async function updateUser(
  deps: IamServiceDeps,
  actorId: string,
  userId: string,
  data: UpdateUser,
): Promise<PublicUser> {
  if (actorId === userId && (data.role !== undefined || data.is_active === false)) {
    throw new ValidationError('Administrators cannot change their own role or deactivate themselves');
  }

  const updated = await deps.userRepo.updateUser(userId, {
    fullName: data.full_name,
    phone: data.phone,
    role: data.role,
    isActive: data.is_active,
  });
  if (!updated) throw new NotFoundError('User');

  if (data.is_active === false || data.role !== undefined) {
    await deps.sessionRepo.revokeAllUserSessions(userId, 'account_changed');
  }

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.USER_UPDATED,
        category: AuditCategory.ACCOUNT,
        resourceType: 'user',
        resourceId: userId,
        detail: { fields: Object.keys(data) },
      },
    ],
    notifications: [],
  });

  return toPublicUser(updated);
}

/** Soft delete: the user row stays, flagged inactive, and its sessions end. */
export async function deactivateUser(
  deps: IamServiceDeps,
  actorId: string,
  userId: string,
): Promise<void> {
  if (actorId === userId) {
    throw new ValidationError('Administrators cannot deactivate themselves');
  }

  const updated = await deps.userRepo.deactivateUser(userId);
  if (!updated) throw new NotFoundError('User');

  await deps.sessionRepo.revokeAllUserSessions(userId, 'account_deactivated');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: AuditAction.USER_DEACTIVATED,
        category: AuditCategory.ACCOUNT,
        resourceType: 'user',
        resourceId: userId,
      },
    ],
    notifications: [],
  });
}

// ---------------------------------------------------------------------------
// Service: Audit log
// ---------------------------------------------------------------------------

export async function queryAuditLog(
  deps: IamServiceDeps,
  filters: AuditLogFilters,
): Promise<{ data: SelectAuditLog[]; total: number }> {
  return deps.auditLogRepo.queryAuditLog(filters);
}
