import { type ClaimStatus } from '@medclaims/shared/constants/claim.constants.js';

// ---------------------------------------------------------------------------
// Logger seam (pino-compatible subset)
// ---------------------------------------------------------------------------

export interface ServiceLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export interface AuditEntry {
  userId?: string | null;
  action: string;
  category: string;
  resourceType?: string | null;
  resourceId?: string | null;
  detail?: Record<string, unknown> | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuditRepo {
  appendAuditLog(entry: AuditEntry): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Claim notifications
// ---------------------------------------------------------------------------

export type ClaimNotification =
  | { event: 'CLAIM_SUBMITTED'; claimId: string }
  | {
      event: 'CLAIM_STATUS_UPDATED';
      claimId: string;
      previousStatus: ClaimStatus;
      newStatus: ClaimStatus;
    }
  | { event: 'PAYMENT_SCHEDULED'; claimId: string; paymentId: string };

export interface ClaimNotifier {
  notify(notification: ClaimNotification): Promise<void>;
}

// ---------------------------------------------------------------------------
// Outbox
// ---------------------------------------------------------------------------

/**
 * Work a service wants done once its transaction has committed.
 */
export interface SideEffects {
  audit: AuditEntry[];
  notifications: ClaimNotification[];
}

export interface SideEffectDispatcher {
  /** Hands the effects off and returns without waiting for delivery. */
  dispatch(effects: SideEffects): void;
  /** Resolves once every effect dispatched so far has been attempted. */
  settled(): Promise<void>;
}

export interface SideEffectDispatcherDeps {
  auditRepo: AuditRepo;
  notifier: ClaimNotifier;
  logger: ServiceLogger;
}

/**
 * Fire-and-forget delivery: the caller's transaction has already committed,
 * so each audit entry and notification is attempted independently and a
 * failure is logged, never rethrown.
 */
export function createSideEffectDispatcher(
  deps: SideEffectDispatcherDeps,
): SideEffectDispatcher {
  const inFlight = new Set<Promise<void>>();

  async function deliver(effects: SideEffects): Promise<void> {
    const auditResults = await Promise.allSettled(
      effects.audit.map((entry) => deps.auditRepo.appendAuditLog(entry)),
    );
    auditResults.forEach((result, i) => {
      if (result.status === 'rejected') {
        deps.logger.error(
          { err: result.reason, action: effects.audit[i]?.action },
          'Failed to write audit log',
        );
      }
    });

    const notifyResults = await Promise.allSettled(
      effects.notifications.map((n) => deps.notifier.notify(n)),
    );
    notifyResults.forEach((result, i) => {
      if (result.status === 'rejected') {
        deps.logger.error(
          {
            err: result.reason,
            event: effects.notifications[i]?.event,
            claimId: effects.notifications[i]?.claimId,
          },
          'Failed to dispatch notification',
        );
      }
    });
  }

  return {
    dispatch(effects) {
      const task = deliver(effects)
        .catch((err: unknown) => {
          deps.logger.error({ err }, 'Side-effect dispatch failed');
        })
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);
    },

    async settled() {
      while (inFlight.size > 0) {
        await Promise.all(inFlight);
      }
    },
  };
}
