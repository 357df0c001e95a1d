/**
 * Mailbox checkpoint: last processed inbox position, one row per mailbox.
 */

export interface MailboxCheckpoint {
  mailbox: string;

  /** Message count at the last successful poll */
  messageCount: number;

  lastConnectedAt: Date;
}
