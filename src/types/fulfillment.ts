/**
 * Fulfillment records.
 *
 * Durable record of one claim's intake: what was received, where its
 * artifacts live, and whether the claim is complete.
 */

export const FULFILLMENT_STATUSES = ["pending", "completed"] as const;
export type FulfillmentStatus = (typeof FULFILLMENT_STATUSES)[number];

/**
 * Why a claim is pending. `incomplete` waits on the sender; the others
 * wait on us and are picked up again by the stalled-claim sweep.
 */
export const PENDING_REASONS = [
  "incomplete",
  "assessment_unavailable",
  "upload_failed",
  "processing_failed",
] as const;
export type PendingReason = (typeof PENDING_REASONS)[number];

/** Pending reasons the pipeline retries on its own. */
export const SYSTEM_PENDING_REASONS: readonly PendingReason[] = [
  "assessment_unavailable",
  "upload_failed",
  "processing_failed",
];

export const ASSESSMENT_UNAVAILABLE = "assessment unavailable";
export const UPLOAD_FAILED = "upload failed";
export const PROCESSING_FAILED = "processing failed";

export interface FulfillmentRecord {
  /** Fulfillment identifier (FULFILL_XXXXXXXX) */
  id: string;

  senderAddress: string;
  claimId: string;

  /** Subject of the first exchange */
  mailSubject: string;

  /** Accumulated plain-text content of every exchange for this claim */
  mailContent: string;
  mailContentUrl: string | null;

  /** Blob-store key of the archived mail content; URLs are re-signed from it */
  mailContentKey: string | null;

  attachmentCount: number;
  localAttachmentPaths: string[];
  attachmentUrls: string[];
  attachmentKeys: string[];

  status: FulfillmentStatus;
  missingItems: string[] | null;
  pendingReason: PendingReason | null;

  /** Inbox message ids already folded into this record */
  sourceMessageIds: string[];

  /** Processing attempts so far, exchanges and retries alike */
  attempts: number;

  /** Sweep retries since the last exchange from the sender */
  systemRetries: number;

  uploadedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type UpsertFulfillmentInput = Omit<
  FulfillmentRecord,
  "id" | "createdAt" | "updatedAt"
>;

export type CompletedFulfillmentInput = Omit<
  UpsertFulfillmentInput,
  | "status"
  | "missingItems"
  | "pendingReason"
  | "mailContentUrl"
  | "mailContentKey"
  | "uploadedAt"
> & {
  mailContentUrl: string;
  mailContentKey: string;
  uploadedAt: Date;
};

export type FulfillmentLookup = { id: string } | { claimId: string };
