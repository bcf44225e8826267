import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type CreateEmployer,
  type UpdateEmployer,
  type EmployerIdParam,
  type ListEmployersQuery,
  type CreateProvider,
  type UpdateProvider,
  type ProviderIdParam,
  type ListProvidersQuery,
  type CreatePolicy,
  type UpdatePolicy,
  type PolicyIdParam,
  type ListPoliciesQuery,
} from '@medclaims/shared/schemas/policy.schema.js';
import {
  createEmployer,
  listEmployers,
  getEmployer,
  updateEmployer,
  deleteEmployer,
  createProvider,
  listProviders,
  getProvider,
  updateProvider,
  deleteProvider,
  createPolicy,
  listPolicies,
  getPolicy,
  updatePolicy,
  deletePolicy,
  type PolicyServiceDeps,
} from './policy.service.js';
import { toPagination } from '../../lib/pagination.js';

export function createPolicyHandlers(deps: PolicyServiceDeps) {
  // -------------------------------------------------------------------------
  // /api/v1/employers
  // -------------------------------------------------------------------------

  async function createEmployerHandler(
    request: FastifyRequest<{ Body: CreateEmployer }>,
    reply: FastifyReply,
  ) {
    const employer = await createEmployer(deps, request.authContext.userId, request.body);
    return reply.code(201).send({ data: employer });
  }

  async function listEmployersHandler(
    request: FastifyRequest<{ Querystring: ListEmployersQuery }>,
    reply: FastifyReply,
  ) {
    const { page, page_size } = request.query;
    const result = await listEmployers(deps, page, page_size);
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getEmployerHandler(
    request: FastifyRequest<{ Params: EmployerIdParam }>,
    reply: FastifyReply,
  ) {
    const employer = await getEmployer(deps, request.params.id);
    return reply.code(200).send({ data: employer });
  }

  async function updateEmployerHandler(
    request: FastifyRequest<{ Params: EmployerIdParam; Body: UpdateEmployer }>,
    reply: FastifyReply,
  ) {
    const employer = await updateEmployer(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: employer });
  }

  async function deleteEmployerHandler(
    request: FastifyRequest<{ Params: EmployerIdParam }>,
    reply: FastifyReply,
  ) {
    await deleteEmployer(deps, request.authContext.userId, request.params.id);
    return reply.code(204).send();
  }

  // -------------------------------------------------------------------------
  // /api/v1/providers
  // -------------------------------------------------------------------------

  async function createProviderHandler(
    request: FastifyRequest<{ Body: CreateProvider }>,
    reply: FastifyReply,
  ) {
    const provider = await createProvider(deps, request.authContext.userId, request.body);
    return reply.code(201).send({ data: provider });
  }

  async function listProvidersHandler(
    request: FastifyRequest<{ Querystring: ListProvidersQuery }>,
    reply: FastifyReply,
  ) {
    const { page, page_size } = request.query;
    const result = await listProviders(deps, page, page_size);
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getProviderHandler(
    request: FastifyRequest<{ Params: ProviderIdParam }>,
    reply: FastifyReply,
  ) {
    const provider = await getProvider(deps, request.params.id);
    return reply.code(200).send({ data: provider });
  }

  async function updateProviderHandler(
    request: FastifyRequest<{ Params: ProviderIdParam; Body: UpdateProvider }>,
    reply: FastifyReply,
  ) {
    const provider = await updateProvider(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: provider });
  }

  async function deleteProviderHandler(
    request: FastifyRequest<{ Params: ProviderIdParam }>,
    reply: FastifyReply,
  ) {
    await deleteProvider(deps, request.authContext.userId, request.params.id);
    return reply.code(204).send();
  }

  // -------------------------------------------------------------------------
  // /api/v1/policies
  // -------------------------------------------------------------------------

  async function createPolicyHandler(
    request: FastifyRequest<{ Body: CreatePolicy }>,
    reply: FastifyReply,
  ) {
    const policy = await createPolicy(deps, request.authContext.userId, request.body);
    return reply.code(201).send({ data: policy });
  }

  async function listPoliciesHandler(
    request: FastifyRequest<{ Querystring: ListPoliciesQuery }>,
    reply: FastifyReply,
  ) {
    const { policyholder_id, employer_id, page, page_size } = request.query;
    const result = await listPolicies(deps, request.authContext, {
      policyholderId: policyholder_id,
      employerId: employer_id,
      page,
      pageSize: page_size,
    });
    return reply.code(200).send({
      data: result.data,
      pagination: toPagination(result.total, page, page_size),
    });
  }

  async function getPolicyHandler(
    request: FastifyRequest<{ Params: PolicyIdParam }>,
    reply: FastifyReply,
  ) {
    const policy = await getPolicy(deps, request.authContext, request.params.id);
    return reply.code(200).send({ data: policy });
  }

  async function updatePolicyHandler(
    request: FastifyRequest<{ Params: PolicyIdParam; Body: UpdatePolicy }>,
    reply: FastifyReply,
  ) {
    const policy = await updatePolicy(
      deps,
      request.authContext.userId,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: policy });
  }

  async function deletePolicyHandler(
    request: FastifyRequest<{ Params: PolicyIdParam }>,
    reply: FastifyReply,
  ) {
    await deletePolicy(deps, request.authContext.userId, request.params.id);
    return reply.code(204).send();
  }

  return {
    createEmployerHandler,
    listEmployersHandler,
    getEmployerHandler,
    updateEmployerHandler,
    deleteEmployerHandler,
    createProviderHandler,
    listProvidersHandler,
    getProviderHandler,
    updateProviderHandler,
    deleteProviderHandler,
    createPolicyHandler,
    listPoliciesHandler,
    getPolicyHandler,
    updatePolicyHandler,
    deletePolicyHandler,
  };
}
