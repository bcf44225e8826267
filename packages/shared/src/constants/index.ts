export {
  Role,
  ROLES,
  isRole,
  Permission,
  RolePermissions,
  roleHasPermission,
  SESSION_COOKIE_NAME,
  AuditAction,
  AuditCategory,
} from './iam.constants.js';

export {
  ClaimStatus,
  CLAIM_STATUSES,
  isClaimStatus,
  TERMINAL_CLAIM_STATUSES,
  PAYABLE_CLAIM_STATUSES,
  IN_REVIEW_CLAIM_STATUSES,
  APPROVED_CLAIM_STATUSES,
  CLAIM_STATUS_DESCRIPTIONS,
  ReviewType,
  REVIEW_TYPES,
  ReviewDecision,
  REVIEW_DECISIONS,
  isReviewDecision,
  ReviewItemStatus,
  REVIEW_ITEM_STATUSES,
  PaymentStatus,
  PAYMENT_STATUSES,
  isPaymentStatus,
  REVIEW_TRANSITIONS,
  REVIEW_STAGE_STATUSES,
  ROLE_REVIEW_TYPE,
  DEFAULT_ALLOWED_UPLOAD_EXTENSIONS,
  DEFAULT_MAX_UPLOAD_SIZE,
  CLAIM_REFERENCE_PREFIX,
  MEMBER_NUMBER_PREFIX,
  ClaimAuditAction,
} from './claim.constants.js';

export {
  NotificationType,
  NotificationEvent,
  NotificationAuditAction,
} from './notification.constants.js';
