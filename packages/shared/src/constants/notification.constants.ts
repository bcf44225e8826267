// ============================================================================
// Notifications — Constants
// ============================================================================

// --- Notification Channel ---

export const NotificationType = {
  EMAIL: 'EMAIL',
  SMS: 'SMS',
  IN_APP: 'IN_APP',
} as const;

export type NotificationType =
  (typeof NotificationType)[keyof typeof NotificationType];

// --- Notification Events ---
// Emitted by the workflow services after commit.

export const NotificationEvent = {
  CLAIM_SUBMITTED: 'CLAIM_SUBMITTED',
  CLAIM_RECEIVED_FOR_REVIEW: 'CLAIM_RECEIVED_FOR_REVIEW',
  CLAIM_STATUS_UPDATED: 'CLAIM_STATUS_UPDATED',
  PAYMENT_SCHEDULED: 'PAYMENT_SCHEDULED',
} as const;

export type NotificationEvent =
  (typeof NotificationEvent)[keyof typeof NotificationEvent];

export const NotificationAuditAction = {
  NOTIFICATION_READ: 'notification.read',
  NOTIFICATION_EMAIL_FAILED: 'notification.email_failed',
} as const;

export type NotificationAuditAction =
  (typeof NotificationAuditAction)[keyof typeof NotificationAuditAction];
