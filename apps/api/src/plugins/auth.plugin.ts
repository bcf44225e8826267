import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import {
  AuditCategory,
  SESSION_COOKIE_NAME,
  roleHasPermission,
  type Permission,
} from '@medclaims/shared/constants/iam.constants.js';
import {
  hashToken,
  validateSession,
  type AuthContext,
  type IamServiceDeps,
} from '../domains/iam/iam.service.js';
import { type AuditRepo } from '../lib/side-effects.js';

// ---------------------------------------------------------------------------
// Type augmentation: add authContext to Fastify request
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    authorize: (...permissions: Permission[]) => (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
  interface FastifyContextConfig {
    /** Force the audit hook on or off for a route. */
    auditLog?: boolean;
  }
}

// ---------------------------------------------------------------------------
// Sensitive body fields to strip from audit log
// ---------------------------------------------------------------------------

const SENSITIVE_BODY_FIELDS = new Set([
  'password',
  'new_password',
  'session_token',
]);

// ---------------------------------------------------------------------------
// Helper: sanitize request body for audit logging
// ---------------------------------------------------------------------------

function sanitizeBody(body: unknown): Record<string, unknown> | undefined {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return undefined;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (SENSITIVE_BODY_FIELDS.has(key)) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

// ---------------------------------------------------------------------------
// Token extraction: session cookie first, then Authorization: Bearer
// ---------------------------------------------------------------------------

function extractToken(request: FastifyRequest): string | null {
  const cookieHeader = request.headers.cookie;
  if (cookieHeader) {
    const token = parseCookie(cookieHeader, SESSION_COOKIE_NAME);
    if (token) return token;
  }

  const authorization = request.headers.authorization;
  if (authorization) {
    const [scheme, value] = authorization.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && value) return value.trim();
  }

  return null;
}

// ---------------------------------------------------------------------------
// Plugin: authenticate / authorize
// ---------------------------------------------------------------------------

export interface AuthPluginOptions {
  sessionDeps: Pick<IamServiceDeps, 'sessionRepo'>;
}

async function authPlugin(app: FastifyInstance, opts: AuthPluginOptions) {
  const { sessionDeps } = opts;

  /**
   * authenticate — preHandler that extracts the session token, validates it,
   * and populates request.authContext.
   */
  app.decorate('authenticate', async function authenticate(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const token = extractToken(request);
    if (!token) {
      reply.code(401).send({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
      return;
    }

    const authContext = await validateSession(sessionDeps, hashToken(token));

    if (!authContext) {
      reply.code(401).send({
        error: { code: 'UNAUTHORIZED', message: 'Invalid or expired session' },
      });
      return;
    }

    request.authContext = authContext;
  });

  /**
   * authorize — returns a preHandler that checks the role's capability table
   * holds every required permission.
   */
  app.decorate('authorize', function authorize(
    ...requiredPermissions: Permission[]
  ) {
    return async function authorizeHandler(
      request: FastifyRequest,
      reply: FastifyReply,
    ) {
      const ctx = request.authContext;
      if (!ctx) {
        reply.code(401).send({
          error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
        });
        return;
      }

      const missing = requiredPermissions.filter(
        (p) => !roleHasPermission(ctx.role, p),
      );

      if (missing.length > 0) {
        reply.code(403).send({
          error: { code: 'FORBIDDEN', message: 'Insufficient permissions' },
        });
      }
    };
  });
}

// ---------------------------------------------------------------------------
// Plugin: auditLog (onResponse hook)
// ---------------------------------------------------------------------------

export interface AuditLogPluginOptions {
  auditRepo: AuditRepo;
}

const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

async function auditLogPlugin(app: FastifyInstance, opts: AuditLogPluginOptions) {
  const { auditRepo } = opts;

  app.addHook('onResponse', async (request, reply) => {
    const shouldLog =
      request.routeOptions.config.auditLog ?? STATE_CHANGING_METHODS.has(request.method);

    if (!shouldLog) return;

    const userId = request.authContext?.userId ?? null;
    const action = `${request.method} ${request.routeOptions.url ?? request.url}`;

    try {
      await auditRepo.appendAuditLog({
        userId,
        action,
        category: AuditCategory.HTTP,
        detail: {
          statusCode: reply.statusCode,
          body: sanitizeBody(request.body) ?? null,
        },
        ipAddress: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
      });
    } catch (err) {
      // Audit logging failure should not break the request
      request.log.error({ err }, 'Failed to write audit log');
    }
  });
}

// ---------------------------------------------------------------------------
// Cookie parsing utility
// ---------------------------------------------------------------------------

function parseCookie(cookieHeader: string, name: string): string | null {
  const pairs = cookieHeader.split(';');
  for (const pair of pairs) {
    const [key, ...rest] = pair.trim().split('=');
    if (key === name) {
      return rest.join('=') || null;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Exports
// ---------------------------------------------------------------------------

export const authPluginFp = fp(authPlugin, {
  name: 'auth-plugin',
});

export const auditLogPluginFp = fp(auditLogPlugin, {
  name: 'audit-log-plugin',
});

// Named exports for direct use in tests
export { authPlugin, auditLogPlugin, parseCookie, sanitizeBody, extractToken };
