// Barrel export for Drizzle DB schemas
export { users, sessions, auditLog } from './iam.schema.js';
export type {
  InsertUser,
  SelectUser,
  InsertSession,
  SelectSession,
  InsertAuditLog,
  SelectAuditLog,
} from './iam.schema.js';

export { employers, providers, policies } from './policy.schema.js';
export type {
  InsertEmployer,
  SelectEmployer,
  InsertProvider,
  SelectProvider,
  InsertPolicy,
  SelectPolicy,
} from './policy.schema.js';

export {
  claims,
  claimAttachments,
  reviews,
  reviewItems,
  payments,
} from './claim.schema.js';
export type {
  InsertClaim,
  SelectClaim,
  InsertClaimAttachment,
  SelectClaimAttachment,
  InsertReview,
  SelectReview,
  InsertReviewItem,
  SelectReviewItem,
  InsertPayment,
  SelectPayment,
} from './claim.schema.js';

export { notifications } from './notification.schema.js';
export type {
  InsertNotification,
  SelectNotification,
} from './notification.schema.js';
