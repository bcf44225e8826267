import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AuditAction,
  Role,
} from '@medclaims/shared/constants/iam.constants.js';
import {
  hashToken,
  toPublicUser,
  registerUser,
  loginUser,
  validateSession,
  logout,
  updateProfile,
  createUser,
  updateUser,
  deactivateUser,
  listUsers,
  queryAuditLog,
  type IamServiceDeps,
} from './iam.service.js';
import { createMemoryStore, type MemoryStore } from '../../../test/helpers/memory-store.js';
import { createTestDeps, seedUser } from '../../../test/helpers/test-app.js';

// argon2 is slow by design; a reversible stand-in keeps these tests fast.
vi.mock('@node-rs/argon2', () => ({
  hash: vi.fn(async (password: string) => `hashed:${password}`),
  verify: vi.fn(async (hash: string, password: string) => hash === `hashed:${password}`),
}));

const meta = { ipAddress: '10.0.0.1', userAgent: 'vitest' };
const PASSWORD = 'Placeholder#Pass1';

let store: MemoryStore;
let deps: IamServiceDeps;

beforeEach(() => {
  store = createMemoryStore();
  deps = createTestDeps(store).deps.iam.serviceDeps;
});

async function register(email = 'Jane@Example.com') {
  return registerUser(deps, { email, password: PASSWORD, full_name: 'Jane Holder' }, meta);
}

describe('hashToken', () => {
  it('produces a 64-character hex SHA-256 digest', () => {
    expect(hashToken('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});

describe('toPublicUser', () => {
  it('drops the password hash', async () => {
    const { user } = await seedUser(store, Role.HR);
    expect(toPublicUser(user)).not.toHaveProperty('passwordHash');
    expect(toPublicUser(user).email).toBe(user.email);
  });
});

// ---------------------------------------------------------------------------
// Registration and login
// ---------------------------------------------------------------------------

describe('registerUser', () => {
  it('creates an active POLICYHOLDER with a lower-cased email', async () => {
    const user = await register();

    expect(user.role).toBe(Role.POLICYHOLDER);
    expect(user.email).toBe('jane@example.com');
    expect(user.isActive).toBe(true);
    expect(store.tables.users[0]?.passwordHash).toBe(`hashed:${PASSWORD}`);
    await deps.sideEffects.settled();
    expect(store.tables.auditLog[0]?.action).toBe(AuditAction.AUTH_REGISTERED);
    expect(store.tables.auditLog[0]?.ipAddress).toBe('10.0.0.1');
  });

  it('refuses a duplicate email in any case', async () => {
    await register();
    await expect(register('JANE@example.com')).rejects.toMatchObject({
      statusCode: 409,
      message: 'Email already registered',
    });
  });
});

describe('loginUser', () => {
  it('opens a session whose token resolves back to the user', async () => {
    const user = await register();

    const result = await loginUser(deps, 'jane@example.com', PASSWORD, meta);

    expect(result.user.userId).toBe(user.userId);
    expect(result.sessionToken).toMatch(/^[0-9a-f]{64}$/);
    expect(store.tables.sessions[0]?.tokenHash).toBe(hashToken(result.sessionToken));
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)?.action).toBe(AuditAction.AUTH_LOGIN_SUCCESS);
  });

  it('gives the same error for an unknown email and a wrong password', async () => {
    await register();

    await expect(loginUser(deps, 'nobody@example.com', PASSWORD, meta)).rejects.toMatchObject({
      statusCode: 401,
      message: 'Invalid credentials',
    });
    await expect(loginUser(deps, 'jane@example.com', 'wrong', meta)).rejects.toMatchObject({
      statusCode: 401,
      message: 'Invalid credentials',
    });
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)?.action).toBe(AuditAction.AUTH_LOGIN_FAILED);
    expect(store.tables.auditLog.at(-1)?.detail).toEqual({ reason: 'invalid_password' });
  });

  it('refuses a deactivated account', async () => {
    const user = await register();
    await store.userRepo.deactivateUser(user.userId);

    await expect(loginUser(deps, 'jane@example.com', PASSWORD, meta)).rejects.toMatchObject({
      statusCode: 401,
    });
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)?.detail).toEqual({ reason: 'account_inactive' });
    expect(store.tables.sessions).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

describe('validateSession', () => {
  it('returns the auth context for a live session', async () => {
    const seeded = await seedUser(store, Role.CLAIMS);

    const ctx = await validateSession(deps, hashToken(seeded.token));

    expect(ctx).toEqual({
      userId: seeded.user.userId,
      role: Role.CLAIMS,
      sessionId: store.tables.sessions[0]?.sessionId,
    });
  });

  it('returns null for an unknown token', async () => {
    expect(await validateSession(deps, hashToken('missing'))).toBeNull();
  });

  it('returns null once the user is deactivated', async () => {
    const seeded = await seedUser(store, Role.CLAIMS);
    await store.userRepo.deactivateUser(seeded.user.userId);

    expect(await validateSession(deps, hashToken(seeded.token))).toBeNull();
  });

  it('returns null after logout', async () => {
    const seeded = await seedUser(store, Role.HR);
    const ctx = await validateSession(deps, hashToken(seeded.token));
    if (!ctx) throw new Error('expected a session');

    await logout(deps, ctx.sessionId, ctx.userId);

    expect(await validateSession(deps, hashToken(seeded.token))).toBeNull();
    expect(store.tables.sessions[0]?.revokedReason).toBe('logout');
  });
});

// ---------------------------------------------------------------------------
// Profile and user management
// ---------------------------------------------------------------------------

describe('updateProfile', () => {
  it('updates name and clears phone', async () => {
    const user = await registerUser(
      deps,
      { email: 'p@example.com', password: PASSWORD, full_name: 'Old Name', phone: '555-0100' },
      meta,
    );

    const updated = await updateProfile(deps, user.userId, { full_name: 'New Name', phone: null });

    expect(updated.fullName).toBe('New Name');
    expect(updated.phone).toBeNull();
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)?.detail).toEqual({ fields: ['full_name', 'phone'] });
  });
});

describe('user management', () => {
  it('creates staff accounts with the requested role', async () => {
    const admin = await seedUser(store, Role.ADMIN);

    const created = await createUser(deps, admin.user.userId, {
      email: 'Finance@Example.com',
      password: PASSWORD,
      full_name: 'Fin Ance',
      role: Role.FINANCE,
    });

    expect(created.role).toBe(Role.FINANCE);
    expect(created.email).toBe('finance@example.com');
    await deps.sideEffects.settled();
    expect(store.tables.auditLog.at(-1)).toMatchObject({
      userId: admin.user.userId,
      action: AuditAction.USER_CREATED,
      detail: { email: 'finance@example.com', role: Role.FINANCE },
    });
  });

  it('revokes sessions when a role changes', async () => {
    const admin = await seedUser(store, Role.ADMIN);
    const target = await seedUser(store, Role.CLAIMS);

    await updateUser(deps, admin.user.userId, target.user.userId, { role: Role.MD });

    expect(await validateSession(deps, hashToken(target.token))).toBeNull();
    expect(store.tables.users.find((u) => u.userId === target.user.userId)?.role).toBe(Role.MD);
  });

  it('stops an admin from demoting or deactivating themselves', async () => {
    const admin = await seedUser(store, Role.ADMIN);

    await expect(
      updateUser(deps, admin.user.userId, admin.user.userId, { role: Role.HR }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    await expect(
      deactivateUser(deps, admin.user.userId, admin.user.userId),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('deactivates a user and ends their sessions', async () => {
    const admin = await seedUser(store, Role.ADMIN);
    const target = await seedUser(store, Role.HR);

    await deactivateUser(deps, admin.user.userId, target.user.userId);

    expect(store.tables.users.find((u) => u.userId === target.user.userId)?.isActive).toBe(false);
    expect(
      store.tables.sessions.find((s) => s.userId === target.user.userId)?.revokedReason,
    ).toBe('account_deactivated');
  });

  it('returns 404 when deactivating an unknown user', async () => {
    await expect(
      deactivateUser(deps, 'admin', '00000000-0000-4000-8000-000000000000'),
    ).rejects.toMatchObject({ statusCode: 404, message: 'User not found' });
  });

  it('lists users filtered by role without password hashes', async () => {
    await seedUser(store, Role.HR);
    await seedUser(store, Role.HR);
    await seedUser(store, Role.MD);

    const result = await listUsers(deps, { role: Role.HR, page: 1, pageSize: 10 });

    expect(result.total).toBe(2);
    expect(result.data.every((u) => !('passwordHash' in u))).toBe(true);
  });
});

describe('queryAuditLog', () => {
  it('filters entries by action, newest first', async () => {
    await register('a@example.com');
    await register('b@example.com');
    await loginUser(deps, 'a@example.com', PASSWORD, meta);

    const result = await queryAuditLog(deps, {
      action: AuditAction.AUTH_REGISTERED,
      page: 1,
      pageSize: 10,
    });

    expect(result.total).toBe(2);
    expect(result.data.map((e) => e.detail)).toEqual([
      { email: 'b@example.com' },
      { email: 'a@example.com' },
    ]);
  });
});
