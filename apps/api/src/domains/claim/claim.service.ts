import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  type SubmitClaim,
  type UpdateClaim,
} from '@medclaims/shared/schemas/claim.schema.js';
import { AuditCategory } from '@medclaims/shared/constants/iam.constants.js';
import {
  ClaimStatus,
  ClaimAuditAction,
  CLAIM_STATUSES,
  IN_REVIEW_CLAIM_STATUSES,
  APPROVED_CLAIM_STATUSES,
  isClaimStatus,
} from '@medclaims/shared/constants/claim.constants.js';
import { sumAmounts } from '@medclaims/shared/utils/money.utils.js';
import {
  type SelectClaim,
  type InsertClaim,
  type InsertClaimAttachment,
  type SelectClaimAttachment,
} from '@medclaims/shared/schemas/db/claim.schema.js';
import { type SelectPolicy } from '@medclaims/shared/schemas/db/policy.schema.js';
import {
  InconsistentStateError,
  InvalidDecisionError,
  NotFoundError,
  ValidationError,
} from '../../lib/errors.js';
import {
  type AuditEntry,
  type ServiceLogger,
  type SideEffectDispatcher,
} from '../../lib/side-effects.js';
import { type TransactionRunner } from '../../lib/unit-of-work.js';
import { type FileStorage } from '../../lib/file-storage.js';
import {
  assertOwnerAccess,
  policyholderScope,
  type Principal,
} from '../../lib/access-gate.js';
import { generateClaimReference } from '../../lib/reference-numbers.js';
import {
  type ClaimDetail,
  type ClaimEdit,
  type ClaimListFilters,
  type ClaimStatusSummary,
  type ClaimWithOwner,
} from './claim.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface ClaimRepo {
  createClaim(data: InsertClaim): Promise<SelectClaim>;
  findClaimById(claimId: string): Promise<ClaimWithOwner | undefined>;
  findClaimByReference(referenceNumber: string): Promise<SelectClaim | undefined>;
  listClaims(
    filters: ClaimListFilters,
  ): Promise<{ data: ClaimWithOwner[]; total: number }>;
  updateClaimStatus(
    claimId: string,
    status: ClaimStatus,
  ): Promise<SelectClaim | undefined>;
  updateClaim(claimId: string, data: ClaimEdit): Promise<SelectClaim | undefined>;
  addAttachment(data: InsertClaimAttachment): Promise<SelectClaimAttachment>;
  listAttachments(claimId: string): Promise<SelectClaimAttachment[]>;
  findAttachment(
    claimId: string,
    attachmentId: string,
  ): Promise<SelectClaimAttachment | undefined>;
  renameAttachment(
    attachmentId: string,
    fileName: string,
  ): Promise<SelectClaimAttachment | undefined>;
  deleteAttachment(attachmentId: string): Promise<SelectClaimAttachment | undefined>;
  findClaimDetail(claimId: string): Promise<ClaimDetail | undefined>;
  summariseClaimsByStatus(policyholderId: string): Promise<ClaimStatusSummary[]>;
}

export interface ClaimPolicyLookup {
  findPolicyById(policyId: string): Promise<SelectPolicy | undefined>;
  countPoliciesForHolder(
    policyholderId: string,
  ): Promise<{ total: number; active: number }>;
}

export interface UnreadNotificationCounter {
  countUnread(userId: string): Promise<number>;
}

export interface UploadLimits {
  maxSize: number;
  allowedExtensions: readonly string[];
}

export interface ClaimServiceDeps {
  claimRepo: ClaimRepo;
  policyRepo: ClaimPolicyLookup;
  notificationRepo: UnreadNotificationCounter;
  claimTx: TransactionRunner<{ claimRepo: ClaimRepo }>;
  storage: FileStorage;
  uploads: UploadLimits;
  sideEffects: SideEffectDispatcher;
  logger: ServiceLogger;
}

/** A file received with a submission or upload, fully buffered. */
export interface UploadedFile {
  fileName: string;
  contentType: string;
  content: Buffer;
}

const REFERENCE_ATTEMPTS = 5;

// ---------------------------------------------------------------------------
// Attachments
// ---------------------------------------------------------------------------

/**
 * Reject files whose extension is not allow-listed or whose size exceeds the
 * configured maximum. Extensions compare case-insensitively.
 */
export function validateUploads(files: readonly UploadedFile[], limits: UploadLimits): void {
  const allowed = new Set(limits.allowedExtensions.map((e) => e.toLowerCase()));
  for (const file of files) {
    const ext = path.extname(file.fileName).toLowerCase();
    if (!allowed.has(ext)) {
      throw new ValidationError(`File type not allowed: ${file.fileName}`, {
        allowedExtensions: [...allowed],
      });
    }
    if (file.content.length > limits.maxSize) {
      throw new ValidationError(`File too large: ${file.fileName}`, {
        maxSize: limits.maxSize,
      });
    }
  }
}

/**
 * Write each file to storage and record it. Every stored path is pushed onto
 * `written` as soon as it exists so the caller can remove the files if the
 * surrounding transaction rolls back.
 */
async function storeAttachments(
  deps: Pick<ClaimServiceDeps, 'storage'>,
  claimRepo: Pick<ClaimRepo, 'addAttachment'>,
  claimId: string,
  uploadedBy: string,
  files: readonly UploadedFile[],
  written: string[],
): Promise<SelectClaimAttachment[]> {
  const saved: SelectClaimAttachment[] = [];
  for (const file of files) {
    const ext = path.extname(file.fileName).toLowerCase();
    const storagePath = await deps.storage.save(
      `${claimId}/${randomUUID()}${ext}`,
      file.content,
      file.contentType,
    );
    written.push(storagePath);
    saved.push(
      await claimRepo.addAttachment({
        claimId,
        fileName: file.fileName,
        storagePath,
        contentType: file.contentType,
        sizeBytes: file.content.length,
        uploadedBy,
      }),
    );
  }
  return saved;
}

/** Remove stored files; failures are logged, not thrown. */
async function discardStoredFiles(
  deps: Pick<ClaimServiceDeps, 'storage' | 'logger'>,
  storedPaths: readonly string[],
): Promise<void> {
  const results = await Promise.allSettled(
    storedPaths.map((storedPath) => deps.storage.delete(storedPath)),
  );
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      deps.logger.error(
        { err: result.reason, storagePath: storedPaths[i] },
        'Failed to remove stored upload',
      );
    }
  });
}

/**
 * Run `work` in a claim transaction; if it rejects, delete whatever files it
 * wrote before rethrowing.
 */
async function runWithUploads<T>(
  deps: ClaimServiceDeps,
  work: (claimRepo: ClaimRepo, written: string[]) => Promise<T>,
): Promise<T> {
  const written: string[] = [];
  try {
    return await deps.claimTx.run(({ claimRepo }) => work(claimRepo, written));
  } catch (err) {
    await discardStoredFiles(deps, written);
    throw err;
  }
}

function attachmentAudit(
  actorId: string,
  claimId: string,
  attachments: readonly SelectClaimAttachment[],
): AuditEntry[] {
  return attachments.map((a) => ({
    userId: actorId,
    action: ClaimAuditAction.ATTACHMENT_UPLOADED,
    category: AuditCategory.CLAIM,
    resourceType: 'claim',
    resourceId: claimId,
    detail: { attachmentId: a.attachmentId, fileName: a.fileName, sizeBytes: a.sizeBytes },
  }));
}

// ---------------------------------------------------------------------------
// Submission
// ---------------------------------------------------------------------------

async function uniqueClaimReference(claimRepo: Pick<ClaimRepo, 'findClaimByReference'>) {
  for (let attempt = 0; attempt < REFERENCE_ATTEMPTS; attempt++) {
    const candidate = generateClaimReference();
    if (!(await claimRepo.findClaimByReference(candidate))) return candidate;
  }
  throw new Error('Could not allocate a unique claim reference');
}

/**
 * Submit a claim against a policy. The claim starts SUBMITTED; attachments
 * are stored in the same transaction as the claim row.
 */
export async function submitClaim(
  deps: ClaimServiceDeps,
  principal: Principal,
  data: SubmitClaim,
  files: readonly UploadedFile[] = [],
): Promise<{ claim: SelectClaim; attachments: SelectClaimAttachment[] }> {
  const policy = await deps.policyRepo.findPolicyById(data.policy_id);
  if (!policy) throw new NotFoundError('Policy');
  assertOwnerAccess(principal, policy.policyholderId);

  validateUploads(files, deps.uploads);

  const result = await runWithUploads(deps, async (claimRepo, written) => {
    const claim = await claimRepo.createClaim({
      referenceNumber: await uniqueClaimReference(claimRepo),
      policyId: policy.policyId,
      hospitalPharmacy: data.hospital_pharmacy,
      reasonForClaim: data.reason_for_claim,
      requestedAmount: data.requested_amount,
      status: ClaimStatus.SUBMITTED,
      submittedBy: principal.userId,
    });
    const attachments = await storeAttachments(
      deps,
      claimRepo,
      claim.claimId,
      principal.userId,
      files,
      written,
    );
    return { claim, attachments };
  });

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.CLAIM_SUBMITTED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: result.claim.claimId,
        detail: {
          referenceNumber: result.claim.referenceNumber,
          requestedAmount: result.claim.requestedAmount,
          attachmentCount: result.attachments.length,
        },
      },
      ...attachmentAudit(principal.userId, result.claim.claimId, result.attachments),
    ],
    notifications: [{ event: 'CLAIM_SUBMITTED', claimId: result.claim.claimId }],
  });

  return result;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function listClaims(
  deps: ClaimServiceDeps,
  principal: Principal,
  filters: ClaimListFilters,
): Promise<{ data: ClaimWithOwner[]; total: number }> {
  return deps.claimRepo.listClaims({
    ...filters,
    policyholderId: policyholderScope(principal),
  });
}

export async function getClaimDetail(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
): Promise<ClaimDetail> {
  const detail = await deps.claimRepo.findClaimDetail(claimId);
  if (!detail) throw new NotFoundError('Claim');
  assertOwnerAccess(principal, detail.claim.policyholderId);
  return detail;
}

async function getAccessibleClaim(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
): Promise<ClaimWithOwner> {
  const claim = await deps.claimRepo.findClaimById(claimId);
  if (!claim) throw new NotFoundError('Claim');
  assertOwnerAccess(principal, claim.policyholderId);
  return claim;
}

// ---------------------------------------------------------------------------
// Editing
// ---------------------------------------------------------------------------

/**
 * Correct a claim's descriptive fields. Only a claim nobody has picked up
 * yet (still SUBMITTED) can change.
 */
export async function updateClaim(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
  data: UpdateClaim,
): Promise<SelectClaim> {
  const claim = await getAccessibleClaim(deps, principal, claimId);
  if (claim.status !== ClaimStatus.SUBMITTED) {
    throw new InconsistentStateError('Only a submitted claim can be edited', {
      status: claim.status,
    });
  }

  const changes: ClaimEdit = {
    hospitalPharmacy: data.hospital_pharmacy,
    reasonForClaim: data.reason_for_claim,
    requestedAmount: data.requested_amount,
  };
  const updated = await deps.claimRepo.updateClaim(claimId, changes);
  if (!updated) throw new NotFoundError('Claim');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.CLAIM_UPDATED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: {
          fields: Object.entries(changes)
            .filter(([, value]) => value !== undefined)
            .map(([field]) => field),
        },
      },
    ],
    notifications: [],
  });

  return updated;
}

// ---------------------------------------------------------------------------
// Administrative status override
// ---------------------------------------------------------------------------

/**
 * Force a claim into `status`. The value is checked against ClaimStatus here
 * so unknown statuses surface as INVALID_DECISION. Setting the status the
 * claim already has is a no-op and sends no notification.
 */
export async function overrideClaimStatus(
  deps: ClaimServiceDeps,
  actorId: string,
  claimId: string,
  status: string,
  reason?: string,
): Promise<SelectClaim> {
  if (!isClaimStatus(status)) {
    throw new InvalidDecisionError(`Unknown claim status: ${status}`, {
      allowed: CLAIM_STATUSES,
    });
  }

  const claim = await deps.claimRepo.findClaimById(claimId);
  if (!claim) throw new NotFoundError('Claim');
  if (claim.status === status) return claim;

  const updated = await deps.claimRepo.updateClaimStatus(claimId, status);
  if (!updated) throw new NotFoundError('Claim');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: actorId,
        action: ClaimAuditAction.CLAIM_STATUS_OVERRIDDEN,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: { from: claim.status, to: status, reason: reason ?? null },
      },
    ],
    notifications: [
      {
        event: 'CLAIM_STATUS_UPDATED',
        claimId,
        previousStatus: claim.status,
        newStatus: status,
      },
    ],
  });

  return updated;
}

// ---------------------------------------------------------------------------
// Attachments after submission
// ---------------------------------------------------------------------------

export async function uploadAttachments(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
  files: readonly UploadedFile[],
): Promise<SelectClaimAttachment[]> {
  if (files.length === 0) {
    throw new ValidationError('At least one file is required');
  }
  await getAccessibleClaim(deps, principal, claimId);
  validateUploads(files, deps.uploads);

  const saved = await runWithUploads(deps, (claimRepo, written) =>
    storeAttachments(deps, claimRepo, claimId, principal.userId, files, written),
  );

  deps.sideEffects.dispatch({
    audit: attachmentAudit(principal.userId, claimId, saved),
    notifications: [],
  });

  return saved;
}

async function getClaimAttachment(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
  attachmentId: string,
): Promise<SelectClaimAttachment> {
  await getAccessibleClaim(deps, principal, claimId);
  const attachment = await deps.claimRepo.findAttachment(claimId, attachmentId);
  if (!attachment) throw new NotFoundError('Attachment');
  return attachment;
}

export async function renameAttachment(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
  attachmentId: string,
  fileName: string,
): Promise<SelectClaimAttachment> {
  const attachment = await getClaimAttachment(deps, principal, claimId, attachmentId);
  const renamed = await deps.claimRepo.renameAttachment(attachmentId, fileName);
  if (!renamed) throw new NotFoundError('Attachment');

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.ATTACHMENT_RENAMED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: { attachmentId, from: attachment.fileName, to: fileName },
      },
    ],
    notifications: [],
  });

  return renamed;
}

/**
 * Remove an attachment row and its stored file. The row goes first; a file
 * that cannot be removed afterwards is logged.
 */
export async function deleteAttachment(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
  attachmentId: string,
): Promise<void> {
  const attachment = await getClaimAttachment(deps, principal, claimId, attachmentId);
  const removed = await deps.claimRepo.deleteAttachment(attachmentId);
  if (!removed) throw new NotFoundError('Attachment');

  await discardStoredFiles(deps, [attachment.storagePath]);

  deps.sideEffects.dispatch({
    audit: [
      {
        userId: principal.userId,
        action: ClaimAuditAction.ATTACHMENT_DELETED,
        category: AuditCategory.CLAIM,
        resourceType: 'claim',
        resourceId: claimId,
        detail: { attachmentId, fileName: attachment.fileName },
      },
    ],
    notifications: [],
  });
}

export async function listAttachments(
  deps: ClaimServiceDeps,
  principal: Principal,
  claimId: string,
): Promise<SelectClaimAttachment[]> {
  await getAccessibleClaim(deps, principal, claimId);
  return deps.claimRepo.listAttachments(claimId);
}

// ---------------------------------------------------------------------------
// Policyholder dashboard
// ---------------------------------------------------------------------------

export interface PolicyholderDashboard {
  totalPolicies: number;
  activePolicies: number;
  totalClaims: number;
  inReviewClaims: number;
  approvedClaims: number;
  rejectedClaims: number;
  claimsByStatus: Record<ClaimStatus, number>;
  totalRequestedAmount: string;
  totalApprovedAmount: string;
  unreadNotifications: number;
}

/** Fold per-status rows into the dashboard's claim figures. */
export function summariseClaims(
  rows: readonly ClaimStatusSummary[],
): Pick<
  PolicyholderDashboard,
  | 'totalClaims'
  | 'inReviewClaims'
  | 'approvedClaims'
  | 'rejectedClaims'
  | 'claimsByStatus'
  | 'totalRequestedAmount'
  | 'totalApprovedAmount'
> {
  const claimsByStatus: Record<ClaimStatus, number> = {
    [ClaimStatus.SUBMITTED]: 0,
    [ClaimStatus.UNDER_REVIEW_CS]: 0,
    [ClaimStatus.UNDER_REVIEW_CLAIMS]: 0,
    [ClaimStatus.PENDING_MD_APPROVAL]: 0,
    [ClaimStatus.APPROVED]: 0,
    [ClaimStatus.PARTIALLY_APPROVED]: 0,
    [ClaimStatus.REJECTED]: 0,
    [ClaimStatus.PENDING_PAYMENT]: 0,
    [ClaimStatus.PAID]: 0,
  };
  let totalClaims = 0;
  let inReviewClaims = 0;
  let approvedClaims = 0;
  for (const row of rows) {
    claimsByStatus[row.status] += row.count;
    totalClaims += row.count;
    if (IN_REVIEW_CLAIM_STATUSES.has(row.status)) inReviewClaims += row.count;
    if (APPROVED_CLAIM_STATUSES.has(row.status)) approvedClaims += row.count;
  }

  return {
    totalClaims,
    inReviewClaims,
    approvedClaims,
    rejectedClaims: claimsByStatus[ClaimStatus.REJECTED],
    claimsByStatus,
    totalRequestedAmount: sumAmounts(rows.map((r) => r.requestedTotal)),
    totalApprovedAmount: sumAmounts(
      rows
        .filter((r) => APPROVED_CLAIM_STATUSES.has(r.status))
        .map((r) => r.approvedTotal),
    ),
  };
}

export async function getPolicyholderDashboard(
  deps: ClaimServiceDeps,
  principal: Principal,
): Promise<PolicyholderDashboard> {
  const [policyCounts, rows, unreadNotifications] = await Promise.all([
    deps.policyRepo.countPoliciesForHolder(principal.userId),
    deps.claimRepo.summariseClaimsByStatus(principal.userId),
    deps.notificationRepo.countUnread(principal.userId),
  ]);

  return {
    totalPolicies: policyCounts.total,
    activePolicies: policyCounts.active,
    ...summariseClaims(rows),
    unreadNotifications,
  };
}
