/**
 * Fulfillment State Machine
 *
 * Received → Assessing → Completed | Pending, for one claim at a time.
 *
 * A claim collects evidence across exchanges: a reply that references a
 * pending claim adds its content and attachments to what was already
 * staged, and the whole lot is assessed again. Completion uploads every
 * artifact before the record is finalized, and staged files are removed
 * only after that write.
 */

import { findClaimReference } from "./claim-correlation.js";
import { KeyedMutex, mapSettled, withTimeout } from "./concurrency.js";
import { appendExchange, composeFollowUpEmail, formatExchange } from "./email-templates.js";
import { deriveClaimId } from "./ids.js";
import { AssessmentTimeoutError, errorMessage } from "../errors.js";
import type { ArchivalUploader, UploadedArtifacts } from "./archival-uploader.js";
import type { CompletenessAssessor } from "./assessment-client.js";
import type { AttachmentStager, PruneResult } from "./attachment-staging.js";
import type { Logger } from "./logger.js";
import type { MailSender } from "./mail-sender.js";
import type { UserValidator } from "./user-validator.js";
import type { FulfillmentGateway } from "../storage/fulfillments.js";
import {
  ASSESSMENT_UNAVAILABLE,
  PROCESSING_FAILED,
  SYSTEM_PENDING_REASONS,
  UPLOAD_FAILED,
  type FulfillmentRecord,
  type PendingReason,
} from "../types/fulfillment.js";
import type { Policyholder } from "../types/policyholder.js";
import type { ClaimSubmission, SubmissionAttachment } from "../types/submission.js";
import {
  COMPLETENESS_REQUIREMENTS,
  type AssessmentEvidence,
  type CompletenessVerdict,
  type EvidenceAttachment,
} from "../types/verdict.js";

/** Missing item used when the model says "incomplete" without naming anything. */
export const GENERIC_MISSING_ITEM = "additional information required";

const ASSESSMENT_TRIES = 2;
const MAX_INLINE_IMAGE_BYTES = 5 * 1024 * 1024;

export type FulfillmentOutcome =
  | { kind: "completed"; claimId: string; record: FulfillmentRecord }
  | {
      kind: "pending";
      claimId: string;
      record: FulfillmentRecord;
      reason: PendingReason;
      followUpSent: boolean;
    }
  | { kind: "duplicate"; claimId: string; record: FulfillmentRecord };

export interface FulfillmentStateMachineOptions {
  gateway: FulfillmentGateway;
  assessor: CompletenessAssessor;
  uploader: ArchivalUploader;
  mailer: MailSender;
  stager: AttachmentStager;
  assessmentTimeoutMs: number;

  /** Sweep retries per claim between two exchanges from the sender */
  maxAttempts: number;
  logger?: Logger;
}

/** Everything known about a claim while it is being assessed. */
interface ClaimInProgress {
  claimId: string;
  senderAddress: string;
  policyholder: Policyholder;
  mailSubject: string;
  mailContent: string;
  localAttachmentPaths: string[];
  sourceMessageIds: string[];
  attempts: number;
  systemRetries: number;
}

function isSystemPending(record: FulfillmentRecord): boolean {
  return (
    record.status === "pending" &&
    record.pendingReason !== null &&
    SYSTEM_PENDING_REASONS.includes(record.pendingReason)
  );
}

function toDataUrl(attachment: SubmissionAttachment): string | undefined {
  if (!attachment.contentType.startsWith("image/")) return undefined;
  if (attachment.content.length > MAX_INLINE_IMAGE_BYTES) return undefined;
  return `data:${attachment.contentType};base64,${attachment.content.toString("base64")}`;
}

export class FulfillmentStateMachine {
  private readonly claimLocks = new KeyedMutex();
  private readonly logger: Logger;

  constructor(private readonly options: FulfillmentStateMachineOptions) {
    this.logger = options.logger ?? console;
  }

  /**
   * Claim a submission belongs to. A claim reference only counts when the
   * referenced claim exists and belongs to the same sender.
   */
  async resolveClaimId(submission: ClaimSubmission): Promise<string> {
    const reference = findClaimReference(submission.subject, submission.body);
    if (reference) {
      const existing = await this.options.gateway.find({ claimId: reference });
      if (existing?.senderAddress === submission.senderAddress) {
        return reference;
      }
      this.logger.warn(
        existing
          ? `[Fulfillment] ${submission.senderAddress} referenced ${reference} owned by another sender, opening a new claim`
          : `[Fulfillment] ${submission.senderAddress} referenced unknown claim ${reference}, opening a new claim`
      );
    }
    return deriveClaimId(submission.senderAddress, submission.messageId, submission.receivedAt);
  }

  async process(
    submission: ClaimSubmission,
    policyholder: Policyholder
  ): Promise<FulfillmentOutcome> {
    const claimId = await this.resolveClaimId(submission);
    return this.claimLocks.runExclusive(claimId, () =>
      this.receive(claimId, submission, policyholder)
    );
  }

  /**
   * Re-run claims that are pending on our side (assessment, upload or a
   * store write failed) and have retries left.
   */
  async resumeStalled(validator: UserValidator, limit = 20): Promise<FulfillmentOutcome[]> {
    const stalled = await this.options.gateway.listStalled(this.options.maxAttempts, limit);
    if (stalled.length === 0) return [];

    this.logger.log(`[Fulfillment] Resuming ${stalled.length} stalled claim(s)`);

    const outcomes = await mapSettled(
      stalled,
      2,
      (record) =>
        this.claimLocks.runExclusive(record.claimId, () => this.resume(record.claimId, validator)),
      (record, err) => {
        this.logger.error(`[Fulfillment] Resume of ${record.claimId} failed: ${errorMessage(err)}`);
      }
    );

    return outcomes.filter((outcome): outcome is FulfillmentOutcome => outcome !== null);
  }

  /**
   * Delete staging directories older than `maxAgeMs` that no pending claim
   * points at and no transition is using.
   */
  async pruneStaging(maxAgeMs: number, now: Date = new Date()): Promise<PruneResult> {
    const pending = await this.options.gateway.list("pending");
    const pendingIds = new Set(pending.map((record) => record.claimId));

    const result = await this.options.stager.pruneOlderThan(
      maxAgeMs,
      (claimId) => pendingIds.has(claimId) || this.claimLocks.isLocked(claimId),
      now
    );

    if (result.pruned.length > 0) {
      this.logger.log(`[Fulfillment] Pruned ${result.pruned.length} stale staging dir(s)`);
    }
    if (result.failed.length > 0) {
      this.logger.warn(`[Fulfillment] Could not prune: ${result.failed.join(", ")}`);
    }
    return result;
  }

  // ============================================================================
  // Received
  // ============================================================================

  private async receive(
    claimId: string,
    submission: ClaimSubmission,
    policyholder: Policyholder
  ): Promise<FulfillmentOutcome> {
    const { gateway, stager } = this.options;
    const existing = await gateway.find({ claimId });

    if (existing?.status === "completed") {
      this.logger.log(`[Fulfillment] ${claimId} already completed, ignoring ${submission.messageId}`);
      return { kind: "duplicate", claimId, record: existing };
    }
    if (existing?.sourceMessageIds.includes(submission.messageId)) {
      this.logger.log(`[Fulfillment] ${submission.messageId} already folded into ${claimId}`);
      return { kind: "duplicate", claimId, record: existing };
    }

    const stagedPaths = await stager.stage(
      claimId,
      submission.attachments,
      existing?.localAttachmentPaths.length ?? 0
    );

    const exchange = formatExchange(submission, claimId);
    return this.assessOrPark({
      claimId,
      senderAddress: submission.senderAddress,
      policyholder,
      mailSubject: existing?.mailSubject ?? submission.subject,
      mailContent: appendExchange(existing?.mailContent, exchange),
      localAttachmentPaths: [...(existing?.localAttachmentPaths ?? []), ...stagedPaths],
      sourceMessageIds: [...(existing?.sourceMessageIds ?? []), submission.messageId],
      attempts: (existing?.attempts ?? 0) + 1,
      // A new exchange gives the claim a fresh set of sweep retries.
      systemRetries: 0,
    });
  }

  private async resume(
    claimId: string,
    validator: UserValidator
  ): Promise<FulfillmentOutcome | null> {
    const { gateway } = this.options;
    const current = await gateway.find({ claimId });
    if (!current || !isSystemPending(current) || current.systemRetries >= this.options.maxAttempts) {
      return null;
    }

    const validation = await validator.validate(current.senderAddress);
    if (validation.status === "not_found") {
      this.logger.warn(
        `[Fulfillment] ${current.senderAddress} is no longer registered, leaving ${claimId} pending`
      );
      return null;
    }

    return this.assessOrPark({
      claimId,
      senderAddress: current.senderAddress,
      policyholder: validation.user,
      mailSubject: current.mailSubject,
      mailContent: current.mailContent,
      localAttachmentPaths: current.localAttachmentPaths,
      sourceMessageIds: current.sourceMessageIds,
      attempts: current.attempts + 1,
      systemRetries: current.systemRetries + 1,
    });
  }

  /**
   * Assess a claim whose evidence is staged. If anything fails on the way,
   * the claim is recorded as pending so the sweep picks it up; only a
   * failure of that write itself propagates.
   */
  private async assessOrPark(claim: ClaimInProgress): Promise<FulfillmentOutcome> {
    try {
      return await this.assess(claim);
    } catch (err) {
      this.logger.error(
        `[Fulfillment] Processing ${claim.claimId} failed, parking it for retry: ${errorMessage(err)}`
      );
      return this.markPending(claim, "processing_failed", [PROCESSING_FAILED]);
    }
  }

  // ============================================================================
  // Assessing
  // ============================================================================

  private async assess(claim: ClaimInProgress): Promise<FulfillmentOutcome> {
    const attachments = await this.options.stager.read(claim.localAttachmentPaths);
    const verdict = await this.requestVerdict(this.buildEvidence(claim, attachments));

    if (!verdict) {
      this.logger.warn(`[Fulfillment] Assessment unavailable for ${claim.claimId}, leaving it pending`);
      return this.markPending(claim, "assessment_unavailable", [ASSESSMENT_UNAVAILABLE]);
    }

    if (verdict.claimId !== claim.claimId) {
      this.logger.warn(
        `[Fulfillment] Verdict names ${verdict.claimId} for ${claim.claimId}, keeping ${claim.claimId}`
      );
    }

    if (verdict.complete) {
      return this.complete(claim, attachments);
    }
    return this.requestMissingItems(claim, verdict.missingItems);
  }

  private buildEvidence(
    claim: ClaimInProgress,
    attachments: SubmissionAttachment[]
  ): AssessmentEvidence {
    const evidenceAttachments: EvidenceAttachment[] = attachments.map((attachment) => {
      const imageDataUrl = toDataUrl(attachment);
      return {
        filename: attachment.filename,
        contentType: attachment.contentType,
        sizeBytes: attachment.content.length,
        ...(imageDataUrl ? { imageDataUrl } : {}),
      };
    });

    return {
      claimId: claim.claimId,
      senderAddress: claim.senderAddress,
      policyType: claim.policyholder.policyType,
      policyIssuedDate: claim.policyholder.policyIssuedDate,
      subject: claim.mailSubject,
      content: claim.mailContent,
      attachments: evidenceAttachments,
      requirements: COMPLETENESS_REQUIREMENTS,
    };
  }

  /** Ask the assessor, retrying once. Null when both tries fail. */
  private async requestVerdict(evidence: AssessmentEvidence): Promise<CompletenessVerdict | null> {
    const { assessor, assessmentTimeoutMs } = this.options;

    for (let attempt = 1; attempt <= ASSESSMENT_TRIES; attempt++) {
      try {
        return await withTimeout(
          assessmentTimeoutMs,
          (signal) => assessor.assess(evidence, signal),
          () => new AssessmentTimeoutError(assessmentTimeoutMs)
        );
      } catch (err) {
        this.logger.warn(
          `[Fulfillment] Assessment try ${attempt}/${ASSESSMENT_TRIES} for ${evidence.claimId} failed: ${errorMessage(err)}`
        );
      }
    }
    return null;
  }

  // ============================================================================
  // Completed
  // ============================================================================

  private async complete(
    claim: ClaimInProgress,
    attachments: SubmissionAttachment[]
  ): Promise<FulfillmentOutcome> {
    const { gateway, uploader, stager } = this.options;

    let uploaded: UploadedArtifacts;
    try {
      uploaded = await uploader.uploadClaim({
        senderAddress: claim.senderAddress,
        claimId: claim.claimId,
        mailContent: claim.mailContent,
        attachments,
      });
    } catch (err) {
      this.logger.error(`[Fulfillment] Upload for ${claim.claimId} failed: ${errorMessage(err)}`);
      return this.markPending(claim, "upload_failed", [UPLOAD_FAILED]);
    }

    const { written, record } = await gateway.finalize({
      senderAddress: claim.senderAddress,
      claimId: claim.claimId,
      mailSubject: claim.mailSubject,
      mailContent: claim.mailContent,
      mailContentUrl: uploaded.mailContentUrl,
      mailContentKey: uploaded.mailContentKey,
      attachmentCount: attachments.length,
      localAttachmentPaths: [],
      attachmentUrls: uploaded.attachmentUrls,
      attachmentKeys: uploaded.attachmentKeys,
      sourceMessageIds: claim.sourceMessageIds,
      attempts: claim.attempts,
      systemRetries: claim.systemRetries,
      uploadedAt: new Date(),
    });

    if (!written) {
      this.logger.log(`[Fulfillment] ${claim.claimId} was finalized by another writer`);
      return { kind: "duplicate", claimId: claim.claimId, record };
    }

    this.logger.log(
      `[Fulfillment] ${claim.claimId} completed with ${attachments.length} attachment(s)`
    );

    const cleanup = await stager.cleanup(claim.claimId, claim.localAttachmentPaths);
    if (cleanup.failed.length > 0) {
      this.logger.warn(
        `[Fulfillment] Could not remove staged files for ${claim.claimId}: ${cleanup.failed.join(", ")}`
      );
    }

    return { kind: "completed", claimId: claim.claimId, record };
  }

  // ============================================================================
  // Pending
  // ============================================================================

  private async requestMissingItems(
    claim: ClaimInProgress,
    missingItems: string[]
  ): Promise<FulfillmentOutcome> {
    const items = missingItems.length > 0 ? missingItems : [GENERIC_MISSING_ITEM];
    const outcome = await this.markPending(claim, "incomplete", items);
    if (outcome.kind !== "pending") return outcome;

    const email = composeFollowUpEmail({
      claimId: claim.claimId,
      missingItems: items,
      attachmentCount: claim.localAttachmentPaths.length,
      policyholder: claim.policyholder,
    });

    try {
      await this.options.mailer.send(claim.senderAddress, email.subject, email.body);
      this.logger.log(`[Fulfillment] Follow-up sent for ${claim.claimId} (${items.length} missing)`);
      return { ...outcome, followUpSent: true };
    } catch (err) {
      this.logger.error(
        `[Fulfillment] Follow-up for ${claim.claimId} could not be sent: ${errorMessage(err)}`
      );
      return outcome;
    }
  }

  private async markPending(
    claim: ClaimInProgress,
    reason: PendingReason,
    missingItems: string[]
  ): Promise<FulfillmentOutcome> {
    const { written, record } = await this.options.gateway.upsert({
      senderAddress: claim.senderAddress,
      claimId: claim.claimId,
      mailSubject: claim.mailSubject,
      mailContent: claim.mailContent,
      mailContentUrl: null,
      mailContentKey: null,
      attachmentCount: claim.localAttachmentPaths.length,
      localAttachmentPaths: claim.localAttachmentPaths,
      attachmentUrls: [],
      attachmentKeys: [],
      status: "pending",
      missingItems,
      pendingReason: reason,
      sourceMessageIds: claim.sourceMessageIds,
      attempts: claim.attempts,
      systemRetries: claim.systemRetries,
      uploadedAt: null,
    });

    if (!written) {
      return { kind: "duplicate", claimId: claim.claimId, record };
    }

    this.logger.log(`[Fulfillment] ${claim.claimId} pending (${reason})`);
    return { kind: "pending", claimId: claim.claimId, record, reason, followUpSent: false };
  }
}
