import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { Role } from '@medclaims/shared/constants/iam.constants.js';
import { ClaimStatus } from '@medclaims/shared/constants/claim.constants.js';
import {
  createMemoryStore,
  createTestDeps,
  buildTestApp,
  seedPolicy,
  seedUser,
  type SeededUser,
} from '../../helpers/test-app.js';
import { type MemoryStore } from '../../helpers/memory-store.js';
import { RATE_LIMIT_TIERS } from '../../../src/plugins/rate-limit.plugin.js';

let store: MemoryStore;
let app: FastifyInstance;
let holder: SeededUser;
let otherHolder: SeededUser;
let claimId: string;

beforeEach(async () => {
  store = createMemoryStore();
  app = await buildTestApp(createTestDeps(store).deps);

  holder = await seedUser(store, Role.POLICYHOLDER);
  otherHolder = await seedUser(store, Role.POLICYHOLDER);
  const policy = await seedPolicy(store, holder.user.userId);
  const claim = await store.claimRepo.createClaim({
    referenceNumber: 'CLM-0000SEC1',
    policyId: policy.policyId,
    hospitalPharmacy: 'City Hospital',
    reasonForClaim: 'Checkup',
    requestedAmount: '120.00',
    approvedAmount: '120.00',
    status: ClaimStatus.APPROVED,
    submittedBy: holder.user.userId,
  });
  claimId = claim.claimId;
});

afterEach(async () => {
  await app.close();
});

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

describe('authentication', () => {
  it.each([
    ['GET', '/api/v1/claims'],
    ['GET', '/api/v1/users/me'],
    ['GET', '/api/v1/notifications'],
    ['GET', '/api/v1/payments'],
    ['GET', '/api/v1/reviews'],
  ] as const)('%s %s requires a session', async (method, url) => {
    const res = await app.inject({ method, url });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
    });
  });

  it('rejects an unknown session token', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims',
      headers: { cookie: 'session=not-a-session' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().error.message).toBe('Invalid or expired session');
  });

  it('accepts a bearer token', async () => {
    const token = holder.cookie.slice('session='.length);
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims',
      headers: { authorization: `Bearer ${token}` },
    });

    expect(res.statusCode).toBe(200);
  });

  it('rejects a session after logout', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/v1/auth/logout',
      headers: { cookie: holder.cookie },
    });

    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims',
      headers: { cookie: holder.cookie },
    });
    expect(res.statusCode).toBe(401);
  });
});

// ---------------------------------------------------------------------------
// Role capabilities
// ---------------------------------------------------------------------------

describe('role capabilities', () => {
  it('keeps policyholders away from payment scheduling', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/claims/${claimId}/payments`,
      headers: { cookie: holder.cookie },
      payload: { invoice_number: 'INV-1', amount: '120.00', payment_date: '2026-11-01' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: { code: 'FORBIDDEN', message: 'Insufficient permissions' },
    });
    expect(store.tables.payments).toHaveLength(0);
  });

  it('keeps HR from reviewing claims', async () => {
    const hr = await seedUser(store, Role.HR);
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/claims/${claimId}/reviews`,
      headers: { cookie: hr.cookie },
      payload: { decision: 'APPROVED' },
    });

    expect(res.statusCode).toBe(403);
    expect(store.tables.reviews).toHaveLength(0);
  });

  it('keeps finance from overriding claim status', async () => {
    const finance = await seedUser(store, Role.FINANCE);
    const res = await app.inject({
      method: 'PUT',
      url: `/api/v1/claims/${claimId}/status`,
      headers: { cookie: finance.cookie },
      payload: { status: 'PAID' },
    });

    expect(res.statusCode).toBe(403);
  });

  it('keeps finance from editing claims', async () => {
    const finance = await seedUser(store, Role.FINANCE);
    const res = await app.inject({
      method: 'PATCH',
      url: `/api/v1/claims/${claimId}`,
      headers: { cookie: finance.cookie },
      payload: { hospital_pharmacy: 'Elsewhere' },
    });

    expect(res.statusCode).toBe(403);
  });

  it('reserves user management for admins', async () => {
    const cs = await seedUser(store, Role.CUSTOMER_SERVICE);
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/users',
      headers: { cookie: cs.cookie },
    });

    expect(res.statusCode).toBe(403);
  });
});

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------

describe('rate limiting', () => {
  function attemptLogin() {
    return app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { email: 'nobody@example.com', password: 'not-the-password' },
    });
  }

  it('answers login attempts past the auth tier with 429 RATE_LIMITED', async () => {
    for (let i = 0; i < RATE_LIMIT_TIERS.auth; i++) {
      expect((await attemptLogin()).statusCode).toBe(401);
    }

    const res = await attemptLogin();

    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: expect.stringMatching(/^Rate limit exceeded\. Retry after \d+ seconds\.$/),
      },
    });
  });

  it('counts the auth tier separately from other routes', async () => {
    for (let i = 0; i < RATE_LIMIT_TIERS.auth + 1; i++) {
      await attemptLogin();
    }

    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims',
      headers: { cookie: holder.cookie },
    });
    expect(res.statusCode).toBe(200);
  });
});

// ---------------------------------------------------------------------------
// Ownership scoping
// ---------------------------------------------------------------------------

describe('ownership scoping', () => {
  it('hides another holder\'s claim', async () => {
    const res = await app.inject({
      method: 'GET',
      url: `/api/v1/claims/${claimId}`,
      headers: { cookie: otherHolder.cookie },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('FORBIDDEN');
  });

  it('omits another holder\'s claims from the list', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims',
      headers: { cookie: otherHolder.cookie },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual([]);
  });

  it('keeps another holder from editing the claim', async () => {
    const res = await app.inject({
      method: 'PATCH',
      url: `/api/v1/claims/${claimId}`,
      headers: { cookie: otherHolder.cookie },
      payload: { reason_for_claim: 'Changed' },
    });

    expect(res.statusCode).toBe(403);
    expect(store.tables.claims[0]?.reasonForClaim).toBe('Checkup');
  });

  it('keeps another holder from deleting an attachment', async () => {
    const attachment = await store.claimRepo.addAttachment({
      claimId,
      fileName: 'receipt.pdf',
      storagePath: 'memory://receipt.pdf',
      contentType: 'application/pdf',
      sizeBytes: 10,
      uploadedBy: holder.user.userId,
    });

    const res = await app.inject({
      method: 'DELETE',
      url: `/api/v1/claims/${claimId}/attachments/${attachment.attachmentId}`,
      headers: { cookie: otherHolder.cookie },
    });

    expect(res.statusCode).toBe(403);
    expect(store.tables.attachments).toHaveLength(1);
  });

  it('lets the owner read their claim', async () => {
    const res = await app.inject({
      method: 'GET',
      url: `/api/v1/claims/${claimId}`,
      headers: { cookie: holder.cookie },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.referenceNumber).toBe('CLM-0000SEC1');
  });
});

// ---------------------------------------------------------------------------
// Error envelope
// ---------------------------------------------------------------------------

describe('error envelope', () => {
  it('reports a malformed id as a validation error', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims/not-a-uuid',
      headers: { cookie: holder.cookie },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('reports an unknown claim as not found', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/claims/00000000-0000-4000-8000-000000000000',
      headers: { cookie: holder.cookie },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toMatchObject({ code: 'NOT_FOUND', message: 'Claim not found' });
  });

  it('never returns password hashes', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/users/me',
      headers: { cookie: holder.cookie },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.passwordHash).toBeUndefined();
  });
});
