import { type FastifyInstance } from 'fastify';
import {
  createPaymentSchema,
  updatePaymentSchema,
  paymentIdParamSchema,
  listPaymentsQuerySchema,
  type CreatePayment,
  type UpdatePayment,
  type PaymentIdParam,
  type ListPaymentsQuery,
} from '@medclaims/shared/schemas/payment.schema.js';
import {
  claimIdParamSchema,
  type ClaimIdParam,
} from '@medclaims/shared/schemas/claim.schema.js';
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { createPaymentHandlers } from './payment.handlers.js';
import { type PaymentServiceDeps } from './payment.service.js';

// ---------------------------------------------------------------------------
// Payment Routes
// ---------------------------------------------------------------------------

export async function paymentRoutes(
  app: FastifyInstance,
  opts: { serviceDeps: PaymentServiceDeps },
) {
  const handlers = createPaymentHandlers(opts.serviceDeps);

  app.get<{ Querystring: ListPaymentsQuery }>('/api/v1/payments', {
    schema: { querystring: listPaymentsQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.PAYMENT_VIEW)],
    handler: handlers.listPaymentsHandler,
  });

  app.post<{ Params: ClaimIdParam; Body: CreatePayment }>('/api/v1/claims/:id/payments', {
    schema: { params: claimIdParamSchema, body: createPaymentSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PAYMENT_MANAGE)],
    handler: handlers.createPaymentHandler,
  });

  app.get<{ Params: PaymentIdParam }>('/api/v1/payments/:id', {
    schema: { params: paymentIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PAYMENT_VIEW)],
    handler: handlers.getPaymentHandler,
  });

  app.put<{ Params: PaymentIdParam; Body: UpdatePayment }>('/api/v1/payments/:id', {
    schema: { params: paymentIdParamSchema, body: updatePaymentSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PAYMENT_MANAGE)],
    handler: handlers.updatePaymentHandler,
  });
}
