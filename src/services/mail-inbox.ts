/**
 * Mail Inbox
 *
 * The poller's view of the mailbox: a message count that only grows while
 * mail is kept, and the messages after a given position.
 */

import { ImapFlow } from "imapflow";
import { simpleParser, type ParsedMail } from "mailparser";
import { toTransient } from "../errors.js";
import type { Logger } from "./logger.js";
import type { ClaimSubmission, SubmissionAttachment } from "../types/submission.js";

export interface InboxBatch {
  /** Parsed messages after the requested position, oldest first */
  messages: ClaimSubmission[];

  /** Position to checkpoint once the batch is handled */
  messageCount: number;
}

export interface MailInbox {
  readonly mailbox: string;
  getMessageCount(): Promise<number>;
  listNewMessages(sinceCount: number): Promise<InboxBatch>;
}

export interface ImapInboxOptions {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox?: string;
  socketTimeoutMs?: number;
}

const INBOX = "imap inbox";

function toDate(value: Date | string | undefined): Date {
  if (value instanceof Date) return value;
  return value ? new Date(value) : new Date();
}

/**
 * Turn a raw RFC 822 message into a submission. Returns null when the sender
 * address cannot be read.
 */
export async function parseInboundMessage(
  source: Buffer | string,
  fallback: { messageId: string; receivedAt: Date }
): Promise<ClaimSubmission | null> {
  const parsed: ParsedMail = await simpleParser(source);

  const senderAddress = parsed.from?.value[0]?.address?.trim().toLowerCase();
  if (!senderAddress) return null;

  const attachments: SubmissionAttachment[] = parsed.attachments
    .filter((attachment) => !attachment.related)
    .map((attachment, index) => ({
      filename: attachment.filename || `attachment-${index + 1}`,
      content: attachment.content,
      contentType: attachment.contentType || "application/octet-stream",
    }));

  return {
    messageId: parsed.messageId ?? fallback.messageId,
    senderAddress,
    subject: parsed.subject?.trim() || "No Subject",
    body: parsed.text?.trim() || "No content found",
    attachments,
    receivedAt: parsed.date ?? fallback.receivedAt,
  };
}

export class ImapMailInbox implements MailInbox {
  readonly mailbox: string;

  constructor(
    private readonly options: ImapInboxOptions,
    private readonly logger: Logger = console
  ) {
    this.mailbox = options.mailbox ?? "INBOX";
  }

  async getMessageCount(): Promise<number> {
    return this.withMailbox(async (_client, exists) => exists);
  }

  async listNewMessages(sinceCount: number): Promise<InboxBatch> {
    return this.withMailbox(async (client, exists) => {
      const messages: ClaimSubmission[] = [];
      if (exists <= sinceCount) {
        return { messages, messageCount: exists };
      }

      const range = `${sinceCount + 1}:${exists}`;
      for await (const message of client.fetch(range, {
        uid: true,
        source: true,
        internalDate: true,
      })) {
        if (!message.source) {
          this.logger.warn(`[Inbox] Message ${message.seq} has no source, skipping`);
          continue;
        }

        const submission = await parseInboundMessage(message.source, {
          messageId: `imap:${this.mailbox}:${message.uid}`,
          receivedAt: toDate(message.internalDate),
        });
        if (!submission) {
          this.logger.warn(`[Inbox] Message ${message.seq} has no readable sender, skipping`);
          continue;
        }
        messages.push(submission);
      }

      return { messages, messageCount: exists };
    });
  }

  private async withMailbox<T>(
    fn: (client: ImapFlow, exists: number) => Promise<T>
  ): Promise<T> {
    const client = new ImapFlow({
      host: this.options.host,
      port: this.options.port,
      secure: this.options.secure,
      logger: false,
      socketTimeout: this.options.socketTimeoutMs ?? 60000,
      auth: {
        user: this.options.user,
        pass: this.options.password,
      },
    });

    try {
      await client.connect();
      const mailbox = await client.mailboxOpen(this.mailbox, { readOnly: true });
      return await fn(client, mailbox.exists);
    } catch (err) {
      throw toTransient(INBOX, err);
    } finally {
      try {
        await client.logout();
      } catch (err) {
        this.logger.warn(`[Inbox] Logout failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
