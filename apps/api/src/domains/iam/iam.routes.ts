import { type FastifyInstance } from 'fastify';
import {
  registerSchema,
  loginSchema,
  createUserSchema,
  updateUserSchema,
  updateProfileSchema,
  userIdParamSchema,
  listUsersQuerySchema,
  auditLogQuerySchema,
  type Register,
  type Login,
  type CreateUser,
  type UpdateUser,
  type UpdateProfile,
  type UserIdParam,
  type ListUsersQuery,
  type AuditLogQuery,
} from '@medclaims/shared/schemas/iam.schema.js';
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { authRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createIamHandlers, type IamHandlerDeps } from './iam.handlers.js';

// ---------------------------------------------------------------------------
// IAM Routes
// ---------------------------------------------------------------------------

export async function iamRoutes(app: FastifyInstance, opts: { deps: IamHandlerDeps }) {
  const handlers = createIamHandlers(opts.deps);

  // ===== Public auth routes (no auth required, auth rate-limited) =====

  app.post<{ Body: Register }>('/api/v1/auth/register', {
    schema: { body: registerSchema },
    config: { rateLimit: authRateLimit() },
    handler: handlers.registerHandler,
  });

  app.post<{ Body: Login }>('/api/v1/auth/login', {
    schema: { body: loginSchema },
    config: { rateLimit: authRateLimit() },
    handler: handlers.loginHandler,
  });

  // ===== Authenticated =====

  app.post('/api/v1/auth/logout', {
    preHandler: [app.authenticate],
    handler: handlers.logoutHandler,
  });

  app.get('/api/v1/users/me', {
    preHandler: [app.authenticate],
    handler: handlers.getMeHandler,
  });

  app.put<{ Body: UpdateProfile }>('/api/v1/users/me', {
    schema: { body: updateProfileSchema },
    preHandler: [app.authenticate],
    handler: handlers.updateMeHandler,
  });

  // ===== User management (admin) =====

  app.get<{ Querystring: ListUsersQuery }>('/api/v1/users', {
    schema: { querystring: listUsersQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.USER_MANAGE)],
    handler: handlers.listUsersHandler,
  });

  app.post<{ Body: CreateUser }>('/api/v1/users', {
    schema: { body: createUserSchema },
    preHandler: [app.authenticate, app.authorize(Permission.USER_MANAGE)],
    handler: handlers.createUserHandler,
  });

  app.get<{ Params: UserIdParam }>('/api/v1/users/:id', {
    schema: { params: userIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.USER_MANAGE)],
    handler: handlers.getUserHandler,
  });

  app.put<{ Params: UserIdParam; Body: UpdateUser }>('/api/v1/users/:id', {
    schema: { params: userIdParamSchema, body: updateUserSchema },
    preHandler: [app.authenticate, app.authorize(Permission.USER_MANAGE)],
    handler: handlers.updateUserHandler,
  });

  app.delete<{ Params: UserIdParam }>('/api/v1/users/:id', {
    schema: { params: userIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.USER_MANAGE)],
    handler: handlers.deactivateUserHandler,
  });

  // ===== Audit log =====

  app.get<{ Querystring: AuditLogQuery }>('/api/v1/audit-logs', {
    schema: { querystring: auditLogQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.AUDIT_VIEW)],
    handler: handlers.auditLogHandler,
  });
}
