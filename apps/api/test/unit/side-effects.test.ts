import { describe, it, expect, vi } from 'vitest';
import {
  createSideEffectDispatcher,
  type AuditEntry,
  type ClaimNotification,
} from '../../src/lib/side-effects.js';
import { createTestLogger } from '../helpers/test-app.js';

const entry: AuditEntry = {
  userId: 'u-1',
  action: 'claim.submitted',
  category: 'claim',
  resourceType: 'claim',
  resourceId: 'c-1',
};

const submitted: ClaimNotification = { event: 'CLAIM_SUBMITTED', claimId: 'c-1' };

describe('createSideEffectDispatcher', () => {
  it('returns from dispatch while delivery is still pending', async () => {
    let release: () => void = () => {};
    const appendAuditLog = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const notify = vi.fn(async () => {});
    const dispatcher = createSideEffectDispatcher({
      auditRepo: { appendAuditLog },
      notifier: { notify },
      logger: createTestLogger(),
    });

    dispatcher.dispatch({ audit: [entry], notifications: [submitted] });

    expect(appendAuditLog).toHaveBeenCalledWith(entry);
    expect(notify).not.toHaveBeenCalled();

    release();
    await dispatcher.settled();
    expect(notify).toHaveBeenCalledWith(submitted);
  });

  it('logs a failed audit write and still sends the notifications', async () => {
    const logger = createTestLogger();
    const notify = vi.fn(async () => {});
    const dispatcher = createSideEffectDispatcher({
      auditRepo: {
        async appendAuditLog() {
          throw new Error('audit table locked');
        },
      },
      notifier: { notify },
      logger,
    });

    dispatcher.dispatch({ audit: [entry], notifications: [submitted] });
    await dispatcher.settled();

    expect(notify).toHaveBeenCalledWith(submitted);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { err: new Error('audit table locked'), action: 'claim.submitted' },
      'Failed to write audit log',
    );
  });

  it('logs each failed notification with its event and claim', async () => {
    const logger = createTestLogger();
    const dispatcher = createSideEffectDispatcher({
      auditRepo: { appendAuditLog: vi.fn(async () => {}) },
      notifier: {
        async notify() {
          throw new Error('notifier down');
        },
      },
      logger,
    });

    dispatcher.dispatch({ audit: [], notifications: [submitted] });
    await dispatcher.settled();

    expect(logger.error).toHaveBeenCalledWith(
      { err: new Error('notifier down'), event: 'CLAIM_SUBMITTED', claimId: 'c-1' },
      'Failed to dispatch notification',
    );
  });

  it('logs a notifier that throws before returning a promise', async () => {
    const logger = createTestLogger();
    const dispatcher = createSideEffectDispatcher({
      auditRepo: { appendAuditLog: vi.fn(async () => {}) },
      notifier: {
        notify() {
          throw new Error('not configured');
        },
      },
      logger,
    });

    expect(() => dispatcher.dispatch({ audit: [], notifications: [submitted] })).not.toThrow();
    await dispatcher.settled();

    expect(logger.error).toHaveBeenCalledWith(
      { err: new Error('not configured') },
      'Side-effect dispatch failed',
    );
  });

  it('settles at once when nothing was dispatched', async () => {
    const dispatcher = createSideEffectDispatcher({
      auditRepo: { appendAuditLog: vi.fn(async () => {}) },
      notifier: { notify: vi.fn(async () => {}) },
      logger: createTestLogger(),
    });

    await expect(dispatcher.settled()).resolves.toBeUndefined();
  });
});
