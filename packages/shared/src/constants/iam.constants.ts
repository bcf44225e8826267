// ============================================================================
// Identity & Access — Constants
// ============================================================================

// --- Roles ---

export const Role = {
  POLICYHOLDER: 'POLICYHOLDER',
  HR: 'HR',
  CUSTOMER_SERVICE: 'CUSTOMER_SERVICE',
  CLAIMS: 'CLAIMS',
  MD: 'MD',
  FINANCE: 'FINANCE',
  ADMIN: 'ADMIN',
  USER: 'USER',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const ROLES = [
  Role.POLICYHOLDER,
  Role.HR,
  Role.CUSTOMER_SERVICE,
  Role.CLAIMS,
  Role.MD,
  Role.FINANCE,
  Role.ADMIN,
  Role.USER,
] as const;

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

// --- Permission Keys ---

export const Permission = {
  CLAIM_CREATE: 'CLAIM_CREATE',
  CLAIM_VIEW: 'CLAIM_VIEW',
  CLAIM_EDIT: 'CLAIM_EDIT',
  CLAIM_STATUS_OVERRIDE: 'CLAIM_STATUS_OVERRIDE',
  ATTACHMENT_UPLOAD: 'ATTACHMENT_UPLOAD',

  REVIEW_VIEW: 'REVIEW_VIEW',
  REVIEW_CREATE: 'REVIEW_CREATE',
  REVIEW_EDIT: 'REVIEW_EDIT',

  PAYMENT_VIEW: 'PAYMENT_VIEW',
  PAYMENT_MANAGE: 'PAYMENT_MANAGE',

  POLICY_VIEW: 'POLICY_VIEW',
  POLICY_MANAGE: 'POLICY_MANAGE',

  EMPLOYER_VIEW: 'EMPLOYER_VIEW',
  EMPLOYER_MANAGE: 'EMPLOYER_MANAGE',

  PROVIDER_VIEW: 'PROVIDER_VIEW',
  PROVIDER_MANAGE: 'PROVIDER_MANAGE',

  USER_MANAGE: 'USER_MANAGE',
  AUDIT_VIEW: 'AUDIT_VIEW',

  NOTIFICATION_VIEW: 'NOTIFICATION_VIEW',
} as const;

export type Permission = (typeof Permission)[keyof typeof Permission];

const ALL_PERMISSIONS: readonly Permission[] = Object.values(Permission);

// --- Capability table: role -> permitted operations ---
// Checked centrally by the authorize() preHandler. ADMIN holds every
// permission; ownership scoping for POLICYHOLDER is applied in the services.

export const RolePermissions: Readonly<Record<Role, readonly Permission[]>> =
  Object.freeze({
    [Role.POLICYHOLDER]: [
      Permission.CLAIM_CREATE,
      Permission.CLAIM_VIEW,
      Permission.CLAIM_EDIT,
      Permission.ATTACHMENT_UPLOAD,
      Permission.REVIEW_VIEW,
      Permission.PAYMENT_VIEW,
      Permission.POLICY_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.HR]: [
      Permission.CLAIM_VIEW,
      Permission.POLICY_VIEW,
      Permission.POLICY_MANAGE,
      Permission.EMPLOYER_VIEW,
      Permission.EMPLOYER_MANAGE,
      Permission.PROVIDER_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.CUSTOMER_SERVICE]: [
      Permission.CLAIM_VIEW,
      Permission.CLAIM_EDIT,
      Permission.ATTACHMENT_UPLOAD,
      Permission.REVIEW_VIEW,
      Permission.REVIEW_CREATE,
      Permission.REVIEW_EDIT,
      Permission.POLICY_VIEW,
      Permission.EMPLOYER_VIEW,
      Permission.PROVIDER_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.CLAIMS]: [
      Permission.CLAIM_VIEW,
      Permission.REVIEW_VIEW,
      Permission.REVIEW_CREATE,
      Permission.REVIEW_EDIT,
      Permission.POLICY_VIEW,
      Permission.EMPLOYER_VIEW,
      Permission.PROVIDER_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.MD]: [
      Permission.CLAIM_VIEW,
      Permission.REVIEW_VIEW,
      Permission.REVIEW_CREATE,
      Permission.REVIEW_EDIT,
      Permission.POLICY_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.FINANCE]: [
      Permission.CLAIM_VIEW,
      Permission.PAYMENT_VIEW,
      Permission.PAYMENT_MANAGE,
      Permission.POLICY_VIEW,
      Permission.EMPLOYER_VIEW,
      Permission.PROVIDER_VIEW,
      Permission.NOTIFICATION_VIEW,
    ],
    [Role.ADMIN]: ALL_PERMISSIONS,
    [Role.USER]: [Permission.NOTIFICATION_VIEW],
  });

export function roleHasPermission(role: Role, permission: Permission): boolean {
  return RolePermissions[role].includes(permission);
}

// --- Session Cookie ---

export const SESSION_COOKIE_NAME = 'session';

// --- Audit Actions ---

export const AuditAction = {
  AUTH_REGISTERED: 'auth.registered',
  AUTH_LOGIN_SUCCESS: 'auth.login_success',
  AUTH_LOGIN_FAILED: 'auth.login_failed',
  AUTH_LOGOUT: 'auth.logout',
  USER_CREATED: 'user.created',
  USER_UPDATED: 'user.updated',
  USER_DEACTIVATED: 'user.deactivated',
  EMPLOYER_CREATED: 'employer.created',
  EMPLOYER_UPDATED: 'employer.updated',
  EMPLOYER_DELETED: 'employer.deleted',
  PROVIDER_CREATED: 'provider.created',
  PROVIDER_UPDATED: 'provider.updated',
  PROVIDER_DELETED: 'provider.deleted',
  POLICY_CREATED: 'policy.created',
  POLICY_UPDATED: 'policy.updated',
  POLICY_DELETED: 'policy.deleted',
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

// --- Audit Categories ---

export const AuditCategory = {
  AUTH: 'auth',
  ACCOUNT: 'account',
  REFERENCE: 'reference',
  CLAIM: 'claim',
  REVIEW: 'review',
  PAYMENT: 'payment',
  NOTIFICATION: 'notification',
  HTTP: 'http',
} as const;

export type AuditCategory = (typeof AuditCategory)[keyof typeof AuditCategory];
