import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { type AppConfig } from './lib/env.js';
import { type DbClient } from './lib/db.js';
import { errorHandler } from './lib/error-handler.js';
import { createTransactionRunner } from './lib/unit-of-work.js';
import { createLocalFileStorage, type FileStorage } from './lib/file-storage.js';
import {
  createSideEffectDispatcher,
  type SideEffectDispatcher,
  type AuditRepo,
  type ServiceLogger,
} from './lib/side-effects.js';
import { authPluginFp, auditLogPluginFp } from './plugins/auth.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import {
  createUserRepository,
  createSessionRepository,
  createAuditLogRepository,
} from './domains/iam/iam.repository.js';
import { type SessionRepo } from './domains/iam/iam.service.js';
import { iamRoutes } from './domains/iam/iam.routes.js';
import { type IamHandlerDeps } from './domains/iam/iam.handlers.js';
import {
  createEmployerRepository,
  createProviderRepository,
  createPolicyRepository,
} from './domains/policy/policy.repository.js';
import { policyRoutes } from './domains/policy/policy.routes.js';
import { type PolicyServiceDeps } from './domains/policy/policy.service.js';
import { createClaimRepository } from './domains/claim/claim.repository.js';
import { claimRoutes } from './domains/claim/claim.routes.js';
import { type ClaimServiceDeps } from './domains/claim/claim.service.js';
import { createReviewRepository } from './domains/review/review.repository.js';
import { reviewRoutes } from './domains/review/review.routes.js';
import { type ReviewServiceDeps } from './domains/review/review.service.js';
import { createPaymentRepository } from './domains/payment/payment.repository.js';
import { paymentRoutes } from './domains/payment/payment.routes.js';
import { type PaymentServiceDeps } from './domains/payment/payment.service.js';
import { createNotificationRepository } from './domains/notification/notification.repository.js';
import { notificationRoutes } from './domains/notification/notification.routes.js';
import {
  createClaimNotifier,
  type NotificationFeedDeps,
} from './domains/notification/notification.service.js';
import { createPostmarkEmailClient } from './domains/notification/email-client.js';

// ---------------------------------------------------------------------------
// Dependency graph
// ---------------------------------------------------------------------------

export interface ApiDeps {
  sideEffects: SideEffectDispatcher;
  iam: IamHandlerDeps;
  sessionRepo: SessionRepo;
  auditRepo: AuditRepo;
  policy: PolicyServiceDeps;
  claim: ClaimServiceDeps;
  review: ReviewServiceDeps;
  payment: PaymentServiceDeps;
  notification: NotificationFeedDeps;
}

export interface ApiDepsOverrides {
  storage?: FileStorage;
}

/**
 * Wire Drizzle repositories, transaction runners and the notifier into the
 * per-domain service dependencies.
 */
export function createApiDeps(
  db: NodePgDatabase,
  config: Readonly<AppConfig>,
  logger: ServiceLogger,
  overrides: ApiDepsOverrides = {},
): ApiDeps {
  const userRepo = createUserRepository(db);
  const sessionRepo = createSessionRepository(db, {
    absoluteTtlMs: config.session.absoluteTtlHours * 60 * 60 * 1000,
    idleTtlMs: config.session.idleTtlMinutes * 60 * 1000,
  });
  const auditRepo = createAuditLogRepository(db);
  const employerRepo = createEmployerRepository(db);
  const providerRepo = createProviderRepository(db);
  const policyRepo = createPolicyRepository(db);
  const claimRepo = createClaimRepository(db);
  const reviewRepo = createReviewRepository(db);
  const paymentRepo = createPaymentRepository(db);
  const notificationRepo = createNotificationRepository(db);

  const emailClient = config.email.apiKey
    ? createPostmarkEmailClient({
        apiKey: config.email.apiKey,
        timeoutSeconds: config.email.timeoutSeconds,
      })
    : undefined;

  const notifier = createClaimNotifier({
    notificationRepo,
    userRepo,
    paymentRepo,
    auditRepo,
    emailClient,
    email: config.email,
    inAppEnabled: config.notifications.inAppEnabled,
    logger,
  });

  const sideEffects = createSideEffectDispatcher({ auditRepo, notifier, logger });

  return {
    sideEffects,
    iam: {
      serviceDeps: {
        userRepo,
        sessionRepo,
        auditLogRepo: auditRepo,
        sideEffects,
        argon2: config.argon2,
      },
      sessionCookieMaxAge: config.session.absoluteTtlHours * 60 * 60,
      secureCookies: config.nodeEnv === 'production',
    },
    sessionRepo,
    auditRepo,
    policy: { employerRepo, providerRepo, policyRepo, userRepo, sideEffects },
    claim: {
      claimRepo,
      policyRepo,
      notificationRepo,
      claimTx: createTransactionRunner(db, (tx: DbClient) => ({
        claimRepo: createClaimRepository(tx),
      })),
      storage: overrides.storage ?? createLocalFileStorage(config.uploads.directory),
      uploads: config.uploads,
      sideEffects,
      logger,
    },
    review: {
      reviewRepo,
      claimRepo,
      reviewTx: createTransactionRunner(db, (tx: DbClient) => ({
        reviewRepo: createReviewRepository(tx),
        claimRepo: createClaimRepository(tx),
      })),
      sideEffects,
    },
    payment: {
      paymentRepo,
      claimRepo,
      paymentTx: createTransactionRunner(db, (tx: DbClient) => ({
        paymentRepo: createPaymentRepository(tx),
        claimRepo: createClaimRepository(tx),
      })),
      sideEffects,
    },
    notification: { notificationRepo, sideEffects },
  };
}

// ---------------------------------------------------------------------------
// Plugins and routes
// ---------------------------------------------------------------------------

export interface RegisterApiOptions {
  corsOrigin: string;
  /** Override the default rate limit (tests). */
  rateLimitMax?: number;
}

export async function registerApi(
  app: FastifyInstance,
  deps: ApiDeps,
  opts: RegisterApiOptions,
): Promise<void> {
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  app.setErrorHandler(errorHandler);

  await app.register(helmet);
  await app.register(cors, { origin: opts.corsOrigin, credentials: true });
  await app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  await app.register(authPluginFp, { sessionDeps: { sessionRepo: deps.sessionRepo } });
  await app.register(auditLogPluginFp, { auditRepo: deps.auditRepo });

  // Let dispatched audit entries and notifications finish before shutdown
  app.addHook('onClose', async () => {
    await deps.sideEffects.settled();
  });

  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(iamRoutes, { deps: deps.iam });
  await app.register(policyRoutes, { serviceDeps: deps.policy });
  await app.register(claimRoutes, { serviceDeps: deps.claim });
  await app.register(reviewRoutes, { serviceDeps: deps.review });
  await app.register(paymentRoutes, { serviceDeps: deps.payment });
  await app.register(notificationRoutes, { serviceDeps: deps.notification });
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export async function buildApp(
  config: Readonly<AppConfig>,
  db: NodePgDatabase,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    genReqId: () => randomUUID(),
  });

  const deps = createApiDeps(db, config, app.log);
  await registerApi(app, deps, { corsOrigin: config.corsOrigin });

  return app;
}
