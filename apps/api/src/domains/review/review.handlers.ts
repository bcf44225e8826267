import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type CreateReview,
  type UpdateReview,
  type ReviewIdParam,
  type ReviewItemParam,
  type ListReviewsQuery,
  type CreateReviewItem,
  type UpdateReviewItem,
} from '@medclaims/shared/schemas/review.schema.js';
import { type ClaimIdParam } from '@medclaims/shared/schemas/claim.schema.js';
import { toPagination } from '../../lib/pagination.js';
import {
  createReview,
  listReviews,
  getReview,
  updateReview,
  addReviewItem,
  updateReviewItem,
  type ReviewServiceDeps,
} from './review.service.js';

export function createReviewHandlers(deps: ReviewServiceDeps) {
  async function createReviewHandler(
    request: FastifyRequest<{ Params: ClaimIdParam; Body: CreateReview }>,
    reply: FastifyReply,
  ) {
    const review = await createReview(
      deps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(201).send({ data: review });
  }

  async function listReviewsHandler(
    request: FastifyRequest<{ Querystring: ListReviewsQuery }>,
    reply: FastifyReply,
  ) {
    const { claim_id, review_type, page, page_size } = request.query;
    const result = await listReviews(deps, request.authContext, {
      claimId: claim_id,
      reviewType: review_type,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getReviewHandler(
    request: FastifyRequest<{ Params: ReviewIdParam }>,
    reply: FastifyReply,
  ) {
    const review = await getReview(deps, request.authContext, request.params.id);
    return reply.code(200).send({ data: review });
  }

  async function updateReviewHandler(
    request: FastifyRequest<{ Params: ReviewIdParam; Body: UpdateReview }>,
    reply: FastifyReply,
  ) {
    const review = await updateReview(
      deps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: review });
  }

  async function addItemHandler(
    request: FastifyRequest<{ Params: ReviewIdParam; Body: CreateReviewItem }>,
    reply: FastifyReply,
  ) {
    const item = await addReviewItem(
      deps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(201).send({ data: item });
  }

  async function updateItemHandler(
    request: FastifyRequest<{ Params: ReviewItemParam; Body: UpdateReviewItem }>,
    reply: FastifyReply,
  ) {
    const item = await updateReviewItem(
      deps,
      request.authContext,
      request.params.id,
      request.params.itemId,
      request.body,
    );
    return reply.code(200).send({ data: item });
  }

  return {
    createReviewHandler,
    listReviewsHandler,
    getReviewHandler,
    updateReviewHandler,
    addItemHandler,
    updateItemHandler,
  };
}
