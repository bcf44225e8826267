import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type Register,
  type Login,
  type CreateUser,
  type UpdateUser,
  type UpdateProfile,
  type UserIdParam,
  type ListUsersQuery,
  type AuditLogQuery,
} from '@medclaims/shared/schemas/iam.schema.js';
import { SESSION_COOKIE_NAME } from '@medclaims/shared/constants/iam.constants.js';
import {
  registerUser,
  loginUser,
  logout,
  getProfile,
  updateProfile,
  listUsers,
  getUser,
  createUser,
  updateUser,
  deactivateUser,
  queryAuditLog,
  type IamServiceDeps,
} from './iam.service.js';
import { toPagination } from '../../lib/pagination.js';

// ---------------------------------------------------------------------------
// Handler factory — creates all IAM handlers with injected dependencies
// ---------------------------------------------------------------------------

export interface IamHandlerDeps {
  serviceDeps: IamServiceDeps;
  /** Session cookie Max-Age, matching the absolute session lifetime. */
  sessionCookieMaxAge: number;
  secureCookies: boolean;
}

export function createIamHandlers(deps: IamHandlerDeps) {
  const secure = deps.secureCookies ? ' Secure;' : '';

  function setSessionCookie(reply: FastifyReply, token: string): void {
    reply.header(
      'Set-Cookie',
      `${SESSION_COOKIE_NAME}=${token}; HttpOnly;${secure} SameSite=Lax; Path=/; Max-Age=${deps.sessionCookieMaxAge}`,
    );
  }

  function clearSessionCookie(reply: FastifyReply): void {
    reply.header(
      'Set-Cookie',
      `${SESSION_COOKIE_NAME}=; HttpOnly;${secure} SameSite=Lax; Path=/; Max-Age=0`,
    );
  }

  function requestMeta(request: FastifyRequest) {
    return {
      ipAddress: request.ip,
      userAgent: request.headers['user-agent'] ?? '',
    };
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/register
  // -------------------------------------------------------------------------

  async function registerHandler(
    request: FastifyRequest<{ Body: Register }>,
    reply: FastifyReply,
  ) {
    const user = await registerUser(deps.serviceDeps, request.body, requestMeta(request));
    return reply.code(201).send({ data: user });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/login
  // -------------------------------------------------------------------------

  async function loginHandler(
    request: FastifyRequest<{ Body: Login }>,
    reply: FastifyReply,
  ) {
    const result = await loginUser(
      deps.serviceDeps,
      request.body.email,
      request.body.password,
      requestMeta(request),
    );
    setSessionCookie(reply, result.sessionToken);
    return reply.code(200).send({
      data: {
        session_token: result.sessionToken,
        token_type: 'bearer',
        user: result.user,
      },
    });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/logout
  // -------------------------------------------------------------------------

  async function logoutHandler(request: FastifyRequest, reply: FastifyReply) {
    await logout(
      deps.serviceDeps,
      request.authContext.sessionId,
      request.authContext.userId,
    );
    clearSessionCookie(reply);
    return reply.code(200).send({
      data: { message: 'Logged out successfully' },
    });
  }

  // -------------------------------------------------------------------------
  // GET / PUT /api/v1/users/me
  // -------------------------------------------------------------------------

  async function getMeHandler(request: FastifyRequest, reply: FastifyReply) {
    const user = await getProfile(deps.serviceDeps, request.authContext.userId);
    return reply.code(200).send({ data: user });
  }

  async function updateMeHandler(
    request: FastifyRequest<{ Body: UpdateProfile }>,
    reply: FastifyReply,
  ) {
    const user = await updateProfile(
      deps.serviceDeps,
      request.authContext.userId,
      request.body,
    );
    return reply.code(200).send({ data: user });
  }

  // -------------------------------------------------------------------------
  // /api/v1/users (admin)
  // -------------------------------------------------------------------------

  async function listUsersHandler(
    request: FastifyRequest<{ Querystring: ListUsersQuery }>,
    reply: FastifyReply,
  ) {
    const { role, is_active, page, page_size } = request.query;
    const result = await listUsers(deps.serviceDeps, {
      role,
      isActive: is_active,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getUserHandler(
    request: FastifyRequest<{ Params: UserIdParam }>,
    reply: FastifyReply,
  ) {
    const user = await getUser(deps.serviceDeps, request.params.id);
    return reply.code(200).send({ data: user });
  }

  async function createUserHandler(
    request: FastifyRequest<{ Body: CreateUser }>,
    reply: FastifyReply,
  ) {
    const user = await createUser(
      deps.serviceDeps,
      request.authContext.userId,
      request.body,
    );
    return reply.code(201).send({ data: user });
  }

  async function updateUserHandler(
    request: FastifyRequest<{ Params: UserIdParam; Body: UpdateUser }>,
    reply: FastifyReply,
  ) {
    const user = await updateUser(
      deps.serviceDeps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: user });
  }

  async function deactivateUserHandler(
    request: FastifyRequest<{ Params: UserIdParam }>,
    reply: FastifyReply,
  ) {
    await deactivateUser(
      deps.serviceDeps,
      request.authContext.userId,
      request.params.id,
    );
    return reply.code(204).send();
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/audit-logs
  // -------------------------------------------------------------------------

  async function auditLogHandler(
    request: FastifyRequest<{ Querystring: AuditLogQuery }>,
    reply: FastifyReply,
  ) {
    const { user_id, action, resource_type, page, page_size } = request.query;
    const result = await queryAuditLog(deps.serviceDeps, {
      userId: user_id,
      action,
      resourceType: resource_type,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  return {
    registerHandler,
    loginHandler,
    logoutHandler,
    getMeHandler,
    updateMeHandler,
    listUsersHandler,
    getUserHandler,
    createUserHandler,
    updateUserHandler,
    deactivateUserHandler,
    auditLogHandler,
  };
}
