import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

/** Requests per minute for each tier. */
export const RATE_LIMIT_TIERS = {
  /** Per signed-in user, or per IP before sign-in. */
  default: 100,
  /** Login and registration, per IP. */
  auth: 10,
  /** Claim submission and attachment upload, per user. */
  upload: 5,
} as const;

const WINDOW = '1 minute';

export interface RateLimitPluginOptions {
  /** Replaces the default tier (tests raise it). */
  defaultMax?: number;
}

function userOrIp(request: FastifyRequest): string {
  return request.authContext?.userId ?? request.ip;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  await app.register(rateLimit, {
    max: opts.defaultMax ?? RATE_LIMIT_TIERS.default,
    timeWindow: WINDOW,
    keyGenerator: userOrIp,
    onExceeded: (request, key) => {
      request.log.warn({ key, url: request.url }, 'Rate limit exceeded');
    },
    // Thrown by the plugin and shaped into the error envelope by errorHandler
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      code: 'RATE_LIMITED',
      message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
    }),
  });
}

// ---------------------------------------------------------------------------
// Route-level tiers: { config: { rateLimit: authRateLimit() } }
// ---------------------------------------------------------------------------

export function authRateLimit() {
  return {
    max: RATE_LIMIT_TIERS.auth,
    timeWindow: WINDOW,
    keyGenerator: (request: FastifyRequest) => request.ip,
  };
}

export function uploadRateLimit() {
  return {
    max: RATE_LIMIT_TIERS.upload,
    timeWindow: WINDOW,
    keyGenerator: userOrIp,
  };
}

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});
