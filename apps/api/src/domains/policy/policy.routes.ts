import { type FastifyInstance } from 'fastify';
import {
  createEmployerSchema,
  updateEmployerSchema,
  employerIdParamSchema,
  listEmployersQuerySchema,
  createProviderSchema,
  updateProviderSchema,
  providerIdParamSchema,
  listProvidersQuerySchema,
  createPolicySchema,
  updatePolicySchema,
  policyIdParamSchema,
  listPoliciesQuerySchema,
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
import { Permission } from '@medclaims/shared/constants/iam.constants.js';
import { createPolicyHandlers } from './policy.handlers.js';
import { type PolicyServiceDeps } from './policy.service.js';

// ---------------------------------------------------------------------------
// Employer, Provider & Policy Routes
// ---------------------------------------------------------------------------

export async function policyRoutes(
  app: FastifyInstance,
  opts: { serviceDeps: PolicyServiceDeps },
) {
  const handlers = createPolicyHandlers(opts.serviceDeps);

  // ===== Employers =====

  app.get<{ Querystring: ListEmployersQuery }>('/api/v1/employers', {
    schema: { querystring: listEmployersQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.EMPLOYER_VIEW)],
    handler: handlers.listEmployersHandler,
  });

  app.post<{ Body: CreateEmployer }>('/api/v1/employers', {
    schema: { body: createEmployerSchema },
    preHandler: [app.authenticate, app.authorize(Permission.EMPLOYER_MANAGE)],
    handler: handlers.createEmployerHandler,
  });

  app.get<{ Params: EmployerIdParam }>('/api/v1/employers/:id', {
    schema: { params: employerIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.EMPLOYER_VIEW)],
    handler: handlers.getEmployerHandler,
  });

  app.put<{ Params: EmployerIdParam; Body: UpdateEmployer }>('/api/v1/employers/:id', {
    schema: { params: employerIdParamSchema, body: updateEmployerSchema },
    preHandler: [app.authenticate, app.authorize(Permission.EMPLOYER_MANAGE)],
    handler: handlers.updateEmployerHandler,
  });

  app.delete<{ Params: EmployerIdParam }>('/api/v1/employers/:id', {
    schema: { params: employerIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.EMPLOYER_MANAGE)],
    handler: handlers.deleteEmployerHandler,
  });

  // ===== Providers =====

  app.get<{ Querystring: ListProvidersQuery }>('/api/v1/providers', {
    schema: { querystring: listProvidersQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.PROVIDER_VIEW)],
    handler: handlers.listProvidersHandler,
  });

  app.post<{ Body: CreateProvider }>('/api/v1/providers', {
    schema: { body: createProviderSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PROVIDER_MANAGE)],
    handler: handlers.createProviderHandler,
  });

  app.get<{ Params: ProviderIdParam }>('/api/v1/providers/:id', {
    schema: { params: providerIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PROVIDER_VIEW)],
    handler: handlers.getProviderHandler,
  });

  app.put<{ Params: ProviderIdParam; Body: UpdateProvider }>('/api/v1/providers/:id', {
    schema: { params: providerIdParamSchema, body: updateProviderSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PROVIDER_MANAGE)],
    handler: handlers.updateProviderHandler,
  });

  app.delete<{ Params: ProviderIdParam }>('/api/v1/providers/:id', {
    schema: { params: providerIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.PROVIDER_MANAGE)],
    handler: handlers.deleteProviderHandler,
  });

  // ===== Policies =====

  app.get<{ Querystring: ListPoliciesQuery }>('/api/v1/policies', {
    schema: { querystring: listPoliciesQuerySchema },
    preHandler: [app.authenticate, app.authorize(Permission.POLICY_VIEW)],
    handler: handlers.listPoliciesHandler,
  });

  app.post<{ Body: CreatePolicy }>('/api/v1/policies', {
    schema: { body: createPolicySchema },
    preHandler: [app.authenticate, app.authorize(Permission.POLICY_MANAGE)],
    handler: handlers.createPolicyHandler,
  });

  app.get<{ Params: PolicyIdParam }>('/api/v1/policies/:id', {
    schema: { params: policyIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.POLICY_VIEW)],
    handler: handlers.getPolicyHandler,
  });

  app.put<{ Params: PolicyIdParam; Body: UpdatePolicy }>('/api/v1/policies/:id', {
    schema: { params: policyIdParamSchema, body: updatePolicySchema },
    preHandler: [app.authenticate, app.authorize(Permission.POLICY_MANAGE)],
    handler: handlers.updatePolicyHandler,
  });

  app.delete<{ Params: PolicyIdParam }>('/api/v1/policies/:id', {
    schema: { params: policyIdParamSchema },
    preHandler: [app.authenticate, app.authorize(Permission.POLICY_MANAGE)],
    handler: handlers.deletePolicyHandler,
  });
}
