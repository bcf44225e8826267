import { AuditCategory, Role } from '@medclaims/shared/constants/iam.constants.js';
import { CLAIM_STATUS_DESCRIPTIONS } from '@medclaims/shared/constants/claim.constants.js';
import {
  NotificationEvent,
  NotificationType,
  NotificationAuditAction,
} from '@medclaims/shared/constants/notification.constants.js';
import {
  type InsertNotification,
  type SelectNotification,
} from '@medclaims/shared/schemas/db/notification.schema.js';
import { type SelectUser } from '@medclaims/shared/schemas/db/iam.schema.js';
import { NotFoundError } from '../../lib/errors.js';
import {
  type AuditRepo,
  type ClaimNotification,
  type ClaimNotifier,
  type ServiceLogger,
  type SideEffectDispatcher,
} from '../../lib/side-effects.js';
import { type EmailClient } from './email-client.js';
import {
  type ClaimContext,
  type ListNotificationsOpts,
} from './notification.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface NotificationRepo {
  createNotification(data: InsertNotification): Promise<SelectNotification>;
  listNotifications(userId: string, opts: ListNotificationsOpts): Promise<SelectNotification[]>;
  countUnread(userId: string): Promise<number>;
  markRead(notificationId: string, userId: string): Promise<SelectNotification | undefined>;
  markAllRead(userId: string): Promise<number>;
  findClaimContext(claimId: string): Promise<ClaimContext | undefined>;
}

export interface StaffLookup {
  findActiveUsersByRoles(roles: readonly Role[]): Promise<SelectUser[]>;
}

export interface PaymentLookup {
  findPaymentById(
    paymentId: string,
  ): Promise<{ amount: string; paymentDate: string } | undefined>;
}

export interface EmailSettings {
  enabled: boolean;
  fromAddress: string;
  fromName: string;
}

export interface ClaimNotifierDeps {
  notificationRepo: NotificationRepo;
  userRepo: StaffLookup;
  paymentRepo: PaymentLookup;
  auditRepo: AuditRepo;
  emailClient?: EmailClient;
  email: EmailSettings;
  inAppEnabled: boolean;
  logger: ServiceLogger;
}

// ---------------------------------------------------------------------------
// Message rendering
// ---------------------------------------------------------------------------

export interface Recipient {
  userId: string;
  email: string;
  fullName: string;
}

export interface RenderedMessage {
  recipient: Recipient;
  eventType: NotificationEvent;
  title: string;
  message: string;
  emailSubject: string;
}

export interface MessageContext {
  claim: ClaimContext;
  hrUsers: readonly Recipient[];
  csUsers: readonly Recipient[];
  payment?: { amount: string; paymentDate: string };
}

/**
 * Word a claim notification for each of its recipients. Submissions reach the
 * policyholder, HR and customer service; every other event reaches only the
 * policyholder.
 */
export function buildClaimMessages(
  notification: ClaimNotification,
  ctx: MessageContext,
): RenderedMessage[] {
  const ref = ctx.claim.referenceNumber;
  const holder = ctx.claim.policyholder;

  switch (notification.event) {
    case 'CLAIM_SUBMITTED':
      return [
        {
          recipient: holder,
          eventType: NotificationEvent.CLAIM_SUBMITTED,
          title: 'Claim Submitted',
          message: `Your claim with reference number ${ref} has been successfully submitted.`,
          emailSubject: `Claim Submission Confirmation - ${ref}`,
        },
        ...ctx.hrUsers.map((recipient) => ({
          recipient,
          eventType: NotificationEvent.CLAIM_SUBMITTED,
          title: 'New Claim Submission',
          message: `A new claim with reference number ${ref} has been submitted by ${holder.fullName}.`,
          emailSubject: `New Claim Submission - ${ref}`,
        })),
        ...ctx.csUsers.map((recipient) => ({
          recipient,
          eventType: NotificationEvent.CLAIM_RECEIVED_FOR_REVIEW,
          title: 'New Claim for Review',
          message: `A new claim with reference number ${ref} has been submitted and requires your review.`,
          emailSubject: `New Claim for Review - ${ref}`,
        })),
      ];

    case 'CLAIM_STATUS_UPDATED':
      return [
        {
          recipient: holder,
          eventType: NotificationEvent.CLAIM_STATUS_UPDATED,
          title: 'Claim Status Update',
          message: `Your claim with reference number ${ref} is now ${CLAIM_STATUS_DESCRIPTIONS[notification.newStatus]}.`,
          emailSubject: `Claim Status Update - ${ref}`,
        },
      ];

    case 'PAYMENT_SCHEDULED': {
      const message = ctx.payment
        ? `A payment of ${ctx.payment.amount} for your claim with reference number ${ref} has been scheduled for ${ctx.payment.paymentDate}.`
        : `A payment for your claim with reference number ${ref} has been scheduled.`;
      return [
        {
          recipient: holder,
          eventType: NotificationEvent.PAYMENT_SCHEDULED,
          title: 'Payment Scheduled',
          message,
          emailSubject: `Payment Scheduled - Claim ${ref}`,
        },
      ];
    }
  }
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderEmailHtml(msg: RenderedMessage): string {
  return [
    `<h1>${escapeHtml(msg.title)}</h1>`,
    `<p>Dear ${escapeHtml(msg.recipient.fullName)},</p>`,
    `<p>${escapeHtml(msg.message)}</p>`,
    '<p>You can log in to your account to view more details.</p>',
  ].join('\n');
}

function toRecipient(user: SelectUser): Recipient {
  return { userId: user.userId, email: user.email, fullName: user.fullName };
}

// ---------------------------------------------------------------------------
// Notifier
// ---------------------------------------------------------------------------

/**
 * Delivers claim notifications in-app and by email. Each message is attempted
 * on its own; an email failure is logged and audited, never rethrown.
 */
export function createClaimNotifier(deps: ClaimNotifierDeps): ClaimNotifier {
  async function loadContext(
    notification: ClaimNotification,
  ): Promise<MessageContext | undefined> {
    const claim = await deps.notificationRepo.findClaimContext(notification.claimId);
    if (!claim) return undefined;

    let hrUsers: Recipient[] = [];
    let csUsers: Recipient[] = [];
    if (notification.event === 'CLAIM_SUBMITTED') {
      const staff = await deps.userRepo.findActiveUsersByRoles([
        Role.HR,
        Role.CUSTOMER_SERVICE,
      ]);
      hrUsers = staff.filter((u) => u.role === Role.HR).map(toRecipient);
      csUsers = staff.filter((u) => u.role === Role.CUSTOMER_SERVICE).map(toRecipient);
    }

    let payment: MessageContext['payment'];
    if (notification.event === 'PAYMENT_SCHEDULED') {
      const found = await deps.paymentRepo.findPaymentById(notification.paymentId);
      if (found) payment = { amount: found.amount, paymentDate: found.paymentDate };
    }

    return { claim, hrUsers, csUsers, payment };
  }

  async function sendEmail(claimId: string, msg: RenderedMessage): Promise<void> {
    if (!deps.email.enabled || !deps.emailClient) return;

    try {
      await deps.emailClient.sendEmail({
        From: `${deps.email.fromName} <${deps.email.fromAddress}>`,
        To: msg.recipient.email,
        Subject: msg.emailSubject,
        HtmlBody: renderEmailHtml(msg),
        TextBody: msg.message,
        MessageStream: 'outbound',
      });
    } catch (err) {
      deps.logger.error(
        { err, claimId, userId: msg.recipient.userId, eventType: msg.eventType },
        'Failed to send notification email',
      );
      await deps.auditRepo.appendAuditLog({
        userId: msg.recipient.userId,
        action: NotificationAuditAction.NOTIFICATION_EMAIL_FAILED,
        category: AuditCategory.NOTIFICATION,
        resourceType: 'claim',
        resourceId: claimId,
        detail: {
          eventType: msg.eventType,
          reason: err instanceof Error ? err.message : String(err),
        },
      });
    }
  }

  async function deliver(claimId: string, msg: RenderedMessage): Promise<void> {
    if (deps.inAppEnabled) {
      await deps.notificationRepo.createNotification({
        userId: msg.recipient.userId,
        claimId,
        eventType: msg.eventType,
        notificationType: NotificationType.IN_APP,
        title: msg.title,
        message: msg.message,
      });
    }
    await sendEmail(claimId, msg);
  }

  return {
    async notify(notification) {
      const ctx = await loadContext(notification);
      if (!ctx) {
        deps.logger.warn(
          { claimId: notification.claimId, event: notification.event },
          'Notification skipped: claim not found',
        );
        return;
      }

      const messages = buildClaimMessages(notification, ctx);
      const results = await Promise.allSettled(
        messages.map((msg) => deliver(notification.claimId, msg)),
      );
      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          deps.logger.error(
            {
              err: result.reason,
              claimId: notification.claimId,
              userId: messages[i]?.recipient.userId,
            },
            'Failed to deliver notification',
          );
        }
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Feed
// ---------------------------------------------------------------------------

export interface NotificationFeedDeps {
  notificationRepo: NotificationRepo;
  sideEffects: SideEffectDispatcher;
}

export async function listNotifications(
  deps: NotificationFeedDeps,
  userId: string,
  opts: ListNotificationsOpts,
): Promise<{ data: SelectNotification[]; unreadCount: number }> {
  const [data, unreadCount] = await Promise.all([
    deps.notificationRepo.listNotifications(userId, opts),
    deps.notificationRepo.countUnread(userId),
  ]);
  return { data, unreadCount };
}

/** Only the recipient may mark a notification read; anyone else gets 404. */
export async function markNotificationRead(
  deps: NotificationFeedDeps,
  userId: string,
  notificationId: string,
): Promise<SelectNotification> {
  const updated = await deps.notificationRepo.markRead(notificationId, userId);
  if (!updated) throw new NotFoundError('Notification');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId,
        action: NotificationAuditAction.NOTIFICATION_READ,
        category: AuditCategory.NOTIFICATION,
        resourceType: 'notification',
        resourceId: notificationId,
      },
    ],
    notifications: [],
  });

  return updated;
}

export async function markAllNotificationsRead(
  deps: NotificationFeedDeps,
  userId: string,
): Promise<number> {
  return deps.notificationRepo.markAllRead(userId);
}
