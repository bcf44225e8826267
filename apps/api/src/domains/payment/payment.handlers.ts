import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type CreatePayment,
  type UpdatePayment,
  type PaymentIdParam,
  type ListPaymentsQuery,
} from '@medclaims/shared/schemas/payment.schema.js';
import { type ClaimIdParam } from '@medclaims/shared/schemas/claim.schema.js';
import { toPagination } from '../../lib/pagination.js';
import {
  createPayment,
  updatePayment,
  listPayments,
  getPayment,
  type PaymentServiceDeps,
} from './payment.service.js';

export function createPaymentHandlers(deps: PaymentServiceDeps) {
  async function createPaymentHandler(
    request: FastifyRequest<{ Params: ClaimIdParam; Body: CreatePayment }>,
    reply: FastifyReply,
  ) {
    const payment = await createPayment(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(201).send({ data: payment });
  }

  async function listPaymentsHandler(
    request: FastifyRequest<{ Querystring: ListPaymentsQuery }>,
    reply: FastifyReply,
  ) {
    const { claim_id, payment_status, page, page_size } = request.query;
    const result = await listPayments(deps, request.authContext, {
      claimId: claim_id,
      status: payment_status,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getPaymentHandler(
    request: FastifyRequest<{ Params: PaymentIdParam }>,
    reply: FastifyReply,
  ) {
    const payment = await getPayment(deps, request.authContext, request.params.id);
    return reply.code(200).send({ data: payment });
  }

  async function updatePaymentHandler(
    request: FastifyRequest<{ Params: PaymentIdParam; Body: UpdatePayment }>,
    reply: FastifyReply,
  ) {
    const payment = await updatePayment(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: payment });
  }

  return {
    createPaymentHandler,
    listPaymentsHandler,
    getPaymentHandler,
    updatePaymentHandler,
  };
}
