import Fastify, { type FastifyInstance } from 'fastify';
import { randomBytes } from 'node:crypto';
import { vi } from 'vitest';
import { type Role } from '@medclaims/shared/constants/iam.constants.js';
import { type SelectUser } from '@medclaims/shared/schemas/db/iam.schema.js';
import { registerApi, type ApiDeps } from '../../src/server.js';
import { type FileStorage } from '../../src/lib/file-storage.js';
import {
  createSideEffectDispatcher,
  type ServiceLogger,
} from '../../src/lib/side-effects.js';
import { hashToken } from '../../src/domains/iam/iam.service.js';
import { createClaimNotifier } from '../../src/domains/notification/notification.service.js';
import { type EmailClient } from '../../src/domains/notification/email-client.js';
import { createMemoryStore, type MemoryStore } from './memory-store.js';

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ServiceLogger;
}

/** Keeps saved uploads in a map keyed by storage key. */
export function createMemoryFileStorage(): FileStorage & { files: Map<string, Buffer> } {
  const files = new Map<string, Buffer>();
  return {
    files,
    async save(key, content) {
      files.set(key, content);
      return `memory://${key}`;
    },
    async delete(storedPath) {
      files.delete(storedPath.replace(/^memory:\/\//, ''));
    },
  };
}

export interface TestDepsOptions {
  emailClient?: EmailClient;
  inAppEnabled?: boolean;
}

export function createTestDeps(store: MemoryStore, opts: TestDepsOptions = {}) {
  const logger = createTestLogger();
  const storage = createMemoryFileStorage();

  const notifier = createClaimNotifier({
    notificationRepo: store.notificationRepo,
    userRepo: store.userRepo,
    paymentRepo: store.paymentRepo,
    auditRepo: store.auditRepo,
    emailClient: opts.emailClient,
    email: {
      enabled: opts.emailClient !== undefined,
      fromAddress: 'noreply@medclaims.test',
      fromName: 'Medical Claims',
    },
    inAppEnabled: opts.inAppEnabled ?? true,
    logger,
  });
  const sideEffects = createSideEffectDispatcher({
    auditRepo: store.auditRepo,
    notifier,
    logger,
  });

  const deps: ApiDeps = {
    sideEffects,
    iam: {
      serviceDeps: {
        userRepo: store.userRepo,
        sessionRepo: store.sessionRepo,
        auditLogRepo: store.auditRepo,
        sideEffects,
        argon2: { memoryCost: 1024, timeCost: 1 },
      },
      sessionCookieMaxAge: 24 * 60 * 60,
      secureCookies: false,
    },
    sessionRepo: store.sessionRepo,
    auditRepo: store.auditRepo,
    policy: {
      employerRepo: store.employerRepo,
      providerRepo: store.providerRepo,
      policyRepo: store.policyRepo,
      userRepo: store.userRepo,
      sideEffects,
    },
    claim: {
      claimRepo: store.claimRepo,
      policyRepo: store.policyRepo,
      notificationRepo: store.notificationRepo,
      claimTx: store.claimTx,
      storage,
      uploads: { maxSize: 1024 * 1024, allowedExtensions: ['.pdf', '.png', '.jpg'] },
      sideEffects,
      logger,
    },
    review: {
      reviewRepo: store.reviewRepo,
      claimRepo: store.claimRepo,
      reviewTx: store.reviewTx,
      sideEffects,
    },
    payment: {
      paymentRepo: store.paymentRepo,
      claimRepo: store.claimRepo,
      paymentTx: store.paymentTx,
      sideEffects,
    },
    notification: { notificationRepo: store.notificationRepo, sideEffects },
  };

  return { deps, logger, storage, sideEffects };
}

export async function buildTestApp(
  deps: ApiDeps,
  opts: { rateLimitMax?: number } = {},
): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await registerApi(app, deps, {
    corsOrigin: 'http://localhost:5173',
    rateLimitMax: opts.rateLimitMax ?? 1000,
  });
  await app.ready();
  return app;
}

export interface SeededUser {
  user: SelectUser;
  token: string;
  cookie: string;
}

/**
 * Insert a user with an open session. The password hash is a placeholder;
 * these users never go through login.
 */
export async function seedUser(
  store: MemoryStore,
  role: Role,
  overrides: { email?: string; fullName?: string } = {},
): Promise<SeededUser> {
  const user = await store.userRepo.createUser({
    email: overrides.email ?? `${role.toLowerCase()}-${randomBytes(4).toString('hex')}@example.com`,
    passwordHash: 'not-a-real-hash',
    fullName: overrides.fullName ?? `Test ${role}`,
    role,
  });
  const token = randomBytes(32).toString('hex');
  await store.sessionRepo.createSession({
    userId: user.userId,
    tokenHash: hashToken(token),
    ipAddress: '127.0.0.1',
    userAgent: 'vitest',
  });
  return { user, token, cookie: `session=${token}` };
}

export async function seedPolicy(
  store: MemoryStore,
  policyholderId: string,
  memberNumber = 'MBR-0001',
) {
  return store.policyRepo.createPolicy({
    memberNumber,
    planType: 'Gold',
    policyholderId,
    startDate: '2026-01-01',
  });
}

export { createMemoryStore };
