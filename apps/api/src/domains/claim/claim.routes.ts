import { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import {
  claimIdParamSchema,
  listClaimsQuerySchema,
  claimStatusUpdateSchema,
  updateClaimSchema,
  attachmentParamSchema,
  updateAttachmentSchema,
  type ClaimIdParam,
  type ListClaimsQuery,
  type ClaimStatusUpdate,
  type UpdateClaim,
  type AttachmentParam,
  type UpdateAttachment,
} from '@medclaims/shared/schemas/claim.schema.js';
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { uploadRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createClaimHandlers } from './claim.handlers.js';
import { type ClaimServiceDeps } from './claim.service.js';

const MAX_FILES_PER_REQUEST = 10;

// ---------------------------------------------------------------------------
// Claim Routes
// ---------------------------------------------------------------------------

export async function claimRoutes(
  app: FastifyInstance,
  opts: { serviceDeps: ClaimServiceDeps },
) {
  const handlers = createClaimHandlers(opts.serviceDeps);

  await app.register(multipart, {
    limits: {
      fileSize: opts.serviceDeps.uploads.maxSize,
      files: MAX_FILES_PER_REQUEST,
    },
  });

  // Submission accepts multipart or JSON, so the body is validated in the
  // handler rather than by a route schema.
  app.post('/api/v1/claims', {
    config: { rateLimit: uploadRateLimit() },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_CREATE)],
    handler: handlers.submitClaimHandler,
  });

  app.get<{ Querystring: ListClaimsQuery }>('/api/v1/claims', {
    schema: { querystring: listClaimsQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_VIEW)],
    handler: handlers.listClaimsHandler,
  });

  app.get<{ Params: ClaimIdParam }>('/api/v1/claims/:id', {
    schema: { params: claimIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_VIEW)],
    handler: handlers.getClaimHandler,
  });

  app.patch<{ Params: ClaimIdParam; Body: UpdateClaim }>('/api/v1/claims/:id', {
    schema: { params: claimIdParamSchema, body: updateClaimSchema },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_EDIT)],
    handler: handlers.updateClaimHandler,
  });

  app.put<{ Params: ClaimIdParam; Body: ClaimStatusUpdate }>('/api/v1/claims/:id/status', {
    schema: { params: claimIdParamSchema, body: claimStatusUpdateSchema },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_STATUS_OVERRIDE)],
    handler: handlers.overrideStatusHandler,
  });

  // ===== Attachments =====

  app.post<{ Params: ClaimIdParam }>('/api/v1/claims/:id/attachments', {
    schema: { params: claimIdParamSchema },
    config: { rateLimit: uploadRateLimit() },
    preHandler: [app.authenticate, app.authorize(Permission.ATTACHMENT_UPLOAD)],
    handler: handlers.uploadAttachmentsHandler,
  });

  app.get<{ Params: ClaimIdParam }>('/api/v1/claims/:id/attachments', {
    schema: { params: claimIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_VIEW)],
    handler: handlers.listAttachmentsHandler,
  });

  app.patch<{ Params: AttachmentParam; Body: UpdateAttachment }>(
    '/api/v1/claims/:id/attachments/:attachmentId',
    {
      schema: { params: attachmentParamSchema, body: updateAttachmentSchema },
      preHandler: [app.authenticate, app.authorize(Permission.ATTACHMENT_UPLOAD)],
      handler: handlers.renameAttachmentHandler,
    },
  );

  app.delete<{ Params: AttachmentParam }>('/api/v1/claims/:id/attachments/:attachmentId', {
    schema: { params: attachmentParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.ATTACHMENT_UPLOAD)],
    handler: handlers.deleteAttachmentHandler,
  });

  // ===== Policyholder dashboard =====
  // Figures are always the caller's own; CLAIM_CREATE limits it to the
  // roles that hold policies or act for them.

  app.get('/api/v1/policyholder/dashboard', {
    preHandler: [app.authenticate, app.authorize(Permission.CLAIM_CREATE)],
    handler: handlers.dashboardHandler,
  });
}
