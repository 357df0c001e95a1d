/**
 * Mailbox Checkpoint Storage
 *
 * Tracks the last processed inbox position per mailbox so a poll only
 * ingests messages that arrived since the previous successful cycle.
 */

import type Database from "better-sqlite3";
import type { MailboxCheckpoint } from "../types/checkpoint.js";
import { toTransient } from "../errors.js";

const STORE = "checkpoint store";

export interface CheckpointStore {
  get(mailbox: string): Promise<MailboxCheckpoint | null>;
  save(mailbox: string, messageCount: number, connectedAt?: Date): Promise<MailboxCheckpoint>;
}

type CheckpointRow = {
  mailbox: string;
  message_count: number;
  last_connected_at: string;
};

export class SqliteCheckpointStore implements CheckpointStore {
  constructor(private readonly database: Database.Database) {}

  async get(mailbox: string): Promise<MailboxCheckpoint | null> {
    try {
      const row = this.database
        .prepare(
          `SELECT mailbox, message_count, last_connected_at
           FROM mailbox_checkpoints
           WHERE mailbox = ?`
        )
        .get(mailbox) as CheckpointRow | undefined;

      if (!row) return null;

      return {
        mailbox: row.mailbox,
        messageCount: row.message_count,
        lastConnectedAt: new Date(row.last_connected_at),
      };
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  async save(
    mailbox: string,
    messageCount: number,
    connectedAt: Date = new Date()
  ): Promise<MailboxCheckpoint> {
    try {
      this.database
        .prepare(
          `INSERT INTO mailbox_checkpoints (mailbox, message_count, last_connected_at, updated_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(mailbox) DO UPDATE SET
             message_count = excluded.message_count,
             last_connected_at = excluded.last_connected_at,
             updated_at = excluded.updated_at`
        )
        .run(mailbox, messageCount, connectedAt.toISOString(), new Date().toISOString());

      return { mailbox, messageCount, lastConnectedAt: connectedAt };
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }
}
