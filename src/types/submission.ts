/**
 * Claim submissions.
 *
 * One inbound email, as read from the inbox and held by the ingestion queue
 * until a worker picks it up. Never persisted as such.
 */

export interface SubmissionAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface ClaimSubmission {
  /** Stable message identity reported by the inbox */
  messageId: string;

  /** Lower-cased sender address */
  senderAddress: string;

  subject: string;

  /** Plain-text body */
  body: string;

  /** Attachments in message order */
  attachments: SubmissionAttachment[];

  receivedAt: Date;
}
