import { type FastifyInstance } from 'fastify';
import {
  createReviewSchema,
  updateReviewSchema,
  reviewIdParamSchema,
  reviewItemParamSchema,
  listReviewsQuerySchema,
  createReviewItemSchema,
  updateReviewItemSchema,
  type CreateReview,
  type UpdateReview,
  type ReviewIdParam,
  type ReviewItemParam,
  type ListReviewsQuery,
  type CreateReviewItem,
  type UpdateReviewItem,
} from '@medclaims/shared/schemas/review.schema.js';
import {
  claimIdParamSchema,
  type ClaimIdParam,
} from '@medclaims/shared/schemas/claim.schema.js';
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { createReviewHandlers } from './review.handlers.js';
import { type ReviewServiceDeps } from './review.service.js';

// ---------------------------------------------------------------------------
// Review Routes
// ---------------------------------------------------------------------------

export async function reviewRoutes(
  app: FastifyInstance,
  opts: { serviceDeps: ReviewServiceDeps },
) {
  const handlers = createReviewHandlers(opts.serviceDeps);

  app.get<{ Querystring: ListReviewsQuery }>('/api/v1/reviews', {
    schema: { querystring: listReviewsQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.REVIEW_VIEW)],
    handler: handlers.listReviewsHandler,
  });

  app.post<{ Params: ClaimIdParam; Body: CreateReview }>('/api/v1/claims/:id/reviews', {
    schema: { params: claimIdParamSchema, body: createReviewSchema },
    preHandler: [app.authenticate, app.authorize(Permission.REVIEW_CREATE)],
    handler: handlers.createReviewHandler,
  });

  app.get<{ Params: ReviewIdParam }>('/api/v1/reviews/:id', {
    schema: { params: reviewIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.REVIEW_VIEW)],
    handler: handlers.getReviewHandler,
  });

  app.put<{ Params: ReviewIdParam; Body: UpdateReview }>('/api/v1/reviews/:id', {
    schema: { params: reviewIdParamSchema, body: updateReviewSchema },
    preHandler: [app.authenticate, app.authorize(Permission.REVIEW_EDIT)],
    handler: handlers.updateReviewHandler,
  });

  // ===== Items =====

  app.post<{ Params: ReviewIdParam; Body: CreateReviewItem }>('/api/v1/reviews/:id/items', {
    schema: { params: reviewIdParamSchema, body: createReviewItemSchema },
    preHandler: [app.authenticate, app.authorize(Permission.REVIEW_EDIT)],
    handler: handlers.addItemHandler,
  });

  app.put<{ Params: ReviewItemParam; Body: UpdateReviewItem }>(
    '/api/v1/reviews/:id/items/:itemId',
    {
      schema: { params: reviewItemParamSchema, body: updateReviewItemSchema },
      preHandler: [app.authenticate, app.authorize(Permission.REVIEW_EDIT)],
      handler: handlers.updateItemHandler,
    },
  );
}
