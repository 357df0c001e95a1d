/**
 * Mailbox Poller
 *
 * One poll cycle: read the checkpoint, fetch what arrived after it, hand
 * every message to the ingestion queue and only then move the checkpoint.
 * A crash between enqueue and checkpoint re-delivers messages, which the
 * state machine recognizes by message id.
 */

import type { CheckpointStore } from "../storage/checkpoints.js";
import type { IngestionQueue } from "./ingestion-queue.js";
import type { Logger } from "./logger.js";
import type { MailInbox } from "./mail-inbox.js";
import type { ClaimSubmission } from "../types/submission.js";

export interface MailboxPollerOptions {
  inbox: MailInbox;
  checkpoints: CheckpointStore;
  queue: IngestionQueue<ClaimSubmission>;

  /** Enqueue the messages already in the inbox on the very first poll */
  ingestExistingOnFirstRun?: boolean;
  logger?: Logger;
}

export class MailboxPoller {
  private readonly inbox: MailInbox;
  private readonly checkpoints: CheckpointStore;
  private readonly queue: IngestionQueue<ClaimSubmission>;
  private readonly ingestExistingOnFirstRun: boolean;
  private readonly logger: Logger;

  constructor(options: MailboxPollerOptions) {
    this.inbox = options.inbox;
    this.checkpoints = options.checkpoints;
    this.queue = options.queue;
    this.ingestExistingOnFirstRun = options.ingestExistingOnFirstRun ?? false;
    this.logger = options.logger ?? console;
  }

  /**
   * Run one cycle. Returns the submissions enqueued.
   */
  async poll(): Promise<ClaimSubmission[]> {
    const mailbox = this.inbox.mailbox;
    const checkpoint = await this.checkpoints.get(mailbox);

    if (!checkpoint && !this.ingestExistingOnFirstRun) {
      const messageCount = await this.inbox.getMessageCount();
      await this.checkpoints.save(mailbox, messageCount);
      this.logger.log(
        `[MailboxPoller] First run on ${mailbox}: starting after message ${messageCount}`
      );
      return [];
    }

    const since = checkpoint?.messageCount ?? 0;
    const batch = await this.inbox.listNewMessages(since);

    if (batch.messageCount < since) {
      this.logger.warn(
        `[MailboxPoller] ${mailbox} shrank from ${since} to ${batch.messageCount} messages, resetting checkpoint`
      );
      await this.checkpoints.save(mailbox, batch.messageCount);
      return [];
    }

    for (const submission of batch.messages) {
      await this.queue.enqueue(submission);
    }

    await this.checkpoints.save(mailbox, batch.messageCount);

    const skipped = batch.messageCount - since - batch.messages.length;
    if (batch.messages.length > 0 || skipped > 0) {
      this.logger.log(
        `[MailboxPoller] ${mailbox}: enqueued ${batch.messages.length} message(s)` +
          (skipped > 0 ? `, skipped ${skipped} unreadable` : "")
      );
    }

    return batch.messages;
  }
}
