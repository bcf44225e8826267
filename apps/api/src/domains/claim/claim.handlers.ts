import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  submitClaimSchema,
  type SubmitClaim,
  type ClaimIdParam,
  type ListClaimsQuery,
  type ClaimStatusUpdate,
  type UpdateClaim,
  type AttachmentParam,
  type UpdateAttachment,
} from '@medclaims/shared/schemas/claim.schema.js';
import { ValidationError } from '../../lib/errors.js';
import { toPagination } from '../../lib/pagination.js';
import {
  submitClaim,
  listClaims,
  getClaimDetail,
  updateClaim,
  overrideClaimStatus,
  uploadAttachments,
  listAttachments,
  renameAttachment,
  deleteAttachment,
  getPolicyholderDashboard,
  type ClaimServiceDeps,
  type UploadedFile,
} from './claim.service.js';

// ---------------------------------------------------------------------------
// Multipart parsing
// ---------------------------------------------------------------------------

function isMultipart(request: FastifyRequest): boolean {
  return (request.headers['content-type'] ?? '').includes('multipart/form-data');
}

/**
 * Drain a multipart request: text parts become fields, every file part is
 * buffered as an attachment regardless of its field name.
 */
async function readMultipart(
  request: FastifyRequest,
): Promise<{ fields: Record<string, unknown>; files: UploadedFile[] }> {
  const fields: Record<string, unknown> = {};
  const files: UploadedFile[] = [];

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const content = await part.toBuffer();
      // Browsers send an empty file part when no file was picked
      if (content.length === 0 && !part.filename) continue;
      files.push({
        fileName: part.filename,
        contentType: part.mimetype,
        content,
      });
    } else {
      fields[part.fieldname] = part.value;
    }
  }

  return { fields, files };
}

function parseSubmission(body: unknown): SubmitClaim {
  const parsed = submitClaimSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid claim data', parsed.error.issues);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createClaimHandlers(deps: ClaimServiceDeps) {
  // -------------------------------------------------------------------------
  // POST /api/v1/claims (multipart or JSON)
  // -------------------------------------------------------------------------

  async function submitClaimHandler(request: FastifyRequest, reply: FastifyReply) {
    let data: SubmitClaim;
    let files: UploadedFile[] = [];

    if (isMultipart(request)) {
      const multipart = await readMultipart(request);
      data = parseSubmission(multipart.fields);
      files = multipart.files;
    } else {
      data = parseSubmission(request.body);
    }

    const result = await submitClaim(deps, request.authContext, data, files);
    return reply.code(201).send({
      data: { ...result.claim, attachments: result.attachments },
    });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/claims
  // -------------------------------------------------------------------------

  async function listClaimsHandler(
    request: FastifyRequest<{ Querystring: ListClaimsQuery }>,
    reply: FastifyReply,
  ) {
    const { status, policy_id, page, page_size } = request.query;
    const result = await listClaims(deps, request.authContext, {
      status,
      policyId: policy_id,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/claims/:id
  // -------------------------------------------------------------------------

  async function getClaimHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const detail = await getClaimDetail(deps, request.authContext, request.params.id);
    return reply.code(200).send({
      data: {
        ...detail.claim,
        reviews: detail.reviews,
        payments: detail.payments,
        attachments: detail.attachments,
      },
    });
  }

  // -------------------------------------------------------------------------
  // PATCH /api/v1/claims/:id
  // -------------------------------------------------------------------------

  async function updateClaimHandler(
    request: FastifyRequest<{ Params: ClaimIdParam; Body: UpdateClaim }>,
    reply: FastifyReply,
  ) {
    const claim = await updateClaim(
      deps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: claim });
  }

  // -------------------------------------------------------------------------
  // PUT /api/v1/claims/:id/status
  // -------------------------------------------------------------------------

  async function overrideStatusHandler(
    request: FastifyRequest<{ Params: ClaimIdParam; Body: ClaimStatusUpdate }>,
    reply: FastifyReply,
  ) {
    const claim = await overrideClaimStatus(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body.status,
      request.body.reason,
    );
    return reply.code(200).send({ data: claim });
  }

  // -------------------------------------------------------------------------
  // POST / GET /api/v1/claims/:id/attachments
  // -------------------------------------------------------------------------

  async function uploadAttachmentsHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    if (!isMultipart(request)) {
      throw new ValidationError('Attachments must be sent as multipart/form-data');
    }
    const { files } = await readMultipart(request);
    const attachments = await uploadAttachments(
      deps,
      request.authContext,
      request.params.id,
      files,
    );
    return reply.code(201).send({ data: attachments });
  }

  async function listAttachmentsHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const attachments = await listAttachments(deps, request.authContext, request.params.id);
    return reply.code(200).send({ data: attachments });
  }

  // -------------------------------------------------------------------------
  // PATCH / DELETE /api/v1/claims/:id/attachments/:attachmentId
  // -------------------------------------------------------------------------

  async function renameAttachmentHandler(
    request: FastifyRequest<{ Params: AttachmentParam; Body: UpdateAttachment }>,
    reply: FastifyReply,
  ) {
    const attachment = await renameAttachment(
      deps,
      request.authContext,
      request.params.id,
      request.params.attachmentId,
      request.body.file_name,
    );
    return reply.code(200).send({ data: attachment });
  }

  async function deleteAttachmentHandler(
    request: FastifyRequest<{ Params: AttachmentParam }>,
    reply: FastifyReply,
  ) {
    await deleteAttachment(
      deps,
      request.authContext,
      request.params.id,
      request.params.attachmentId,
    );
    return reply.code(204).send();
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/policyholder/dashboard
  // -------------------------------------------------------------------------

  async function dashboardHandler(request: FastifyRequest, reply: FastifyReply) {
    const dashboard = await getPolicyholderDashboard(deps, request.authContext);
    return reply.code(200).send({ data: dashboard });
  }

  return {
    submitClaimHandler,
    listClaimsHandler,
    getClaimHandler,
    updateClaimHandler,
    overrideStatusHandler,
    uploadAttachmentsHandler,
    listAttachmentsHandler,
    renameAttachmentHandler,
    deleteAttachmentHandler,
    dashboardHandler,
  };
}
