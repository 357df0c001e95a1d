/**
 * Fulfillment Gateway
 *
 * Sole writer of fulfillment records. Every write is a read-check-write
 * inside one SQLite transaction, and the upsert itself refuses to touch a
 * row that is already completed, so a claim is finalized at most once even
 * with several writers on the same database.
 */

import type Database from "better-sqlite3";
import { createDateReviver, createSqliteRepository } from "./sqlite.js";
import type { IndexedRepository } from "./repository.js";
import { generateFulfillmentId } from "../services/ids.js";
import { toTransient } from "../errors.js";
import {
  SYSTEM_PENDING_REASONS,
  type CompletedFulfillmentInput,
  type FulfillmentLookup,
  type FulfillmentRecord,
  type FulfillmentStatus,
  type UpsertFulfillmentInput,
} from "../types/fulfillment.js";

const STORE = "fulfillment store";

const DATE_FIELDS = ["uploadedAt", "createdAt", "updatedAt"] as const;
const reviver = createDateReviver(DATE_FIELDS);

export interface WriteResult {
  /** False when the claim was already completed and nothing was written */
  written: boolean;
  record: FulfillmentRecord;
}

export class FulfillmentGateway {
  private readonly records: IndexedRepository<FulfillmentRecord>;
  private readonly writeTx: (input: UpsertFulfillmentInput) => WriteResult;

  constructor(private readonly database: Database.Database) {
    this.records = createSqliteRepository<FulfillmentRecord>(
      database,
      "fulfillments",
      [
        { column: "claim_id", property: "claimId" },
        { column: "sender_address", property: "senderAddress" },
        { column: "status", property: "status" },
      ],
      DATE_FIELDS
    );

    const selectByClaim = database.prepare(
      "SELECT data FROM fulfillments WHERE claim_id = ? LIMIT 1"
    );

    // The WHERE clause keeps completed rows immutable at the storage level.
    const upsertRow = database.prepare(`
      INSERT INTO fulfillments (
        id, data, claim_id, sender_address, status, pending_reason, attempts, system_retries,
        created_at, updated_at
      ) VALUES (
        @id, @data, @claimId, @senderAddress, @status, @pendingReason, @attempts, @systemRetries,
        @createdAt, @updatedAt
      )
      ON CONFLICT(claim_id) DO UPDATE SET
        data = excluded.data,
        status = excluded.status,
        pending_reason = excluded.pending_reason,
        attempts = excluded.attempts,
        system_retries = excluded.system_retries,
        updated_at = excluded.updated_at
      WHERE fulfillments.status <> 'completed'
    `);

    this.writeTx = database.transaction((input: UpsertFulfillmentInput): WriteResult => {
      const row = selectByClaim.get(input.claimId) as { data: string } | undefined;
      const existing = row ? (JSON.parse(row.data, reviver) as FulfillmentRecord) : null;

      if (existing?.status === "completed") {
        return { written: false, record: existing };
      }

      const now = new Date();
      const record: FulfillmentRecord = {
        ...input,
        id: existing?.id ?? generateFulfillmentId(),
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };

      const result = upsertRow.run({
        id: record.id,
        data: JSON.stringify(record),
        claimId: record.claimId,
        senderAddress: record.senderAddress,
        status: record.status,
        pendingReason: record.pendingReason,
        attempts: record.attempts,
        systemRetries: record.systemRetries,
        createdAt: record.createdAt.toISOString(),
        updatedAt: record.updatedAt.toISOString(),
      });

      return { written: result.changes > 0, record };
    });
  }

  /**
   * Insert or update the record for `input.claimId`. A completed record is
   * never downgraded: the stored completed record is returned unchanged.
   */
  async upsert(input: UpsertFulfillmentInput): Promise<WriteResult> {
    try {
      return this.writeTx(input);
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  /**
   * Mark a claim completed with all of its archive URLs. Only the first
   * caller for a claim gets `written: true`.
   */
  async finalize(input: CompletedFulfillmentInput): Promise<WriteResult> {
    if (
      input.attachmentUrls.length !== input.attachmentCount ||
      input.attachmentKeys.length !== input.attachmentCount
    ) {
      throw new Error(
        `Cannot finalize ${input.claimId}: ${input.attachmentUrls.length} URLs and ` +
          `${input.attachmentKeys.length} keys for ${input.attachmentCount} attachments`
      );
    }

    return this.upsert({
      ...input,
      status: "completed",
      missingItems: null,
      pendingReason: null,
      localAttachmentPaths: [],
    });
  }

  async find(lookup: FulfillmentLookup): Promise<FulfillmentRecord | null> {
    try {
      return "id" in lookup
        ? await this.records.get(lookup.id)
        : await this.records.findByIndex("claimId", lookup.claimId);
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  async list(status?: FulfillmentStatus): Promise<FulfillmentRecord[]> {
    try {
      return status
        ? await this.records.findAllByIndex("status", status)
        : await this.records.getAll();
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  /**
   * Pending records waiting on us rather than on the sender, with fewer than
   * `maxRetries` sweep retries since the sender last wrote. Oldest first.
   */
  async listStalled(maxRetries: number, limit = 20): Promise<FulfillmentRecord[]> {
    try {
      const placeholders = SYSTEM_PENDING_REASONS.map(() => "?").join(", ");
      const rows = this.database
        .prepare(
          `SELECT data FROM fulfillments
           WHERE status = 'pending' AND pending_reason IN (${placeholders}) AND system_retries < ?
           ORDER BY updated_at
           LIMIT ?`
        )
        .all(...SYSTEM_PENDING_REASONS, maxRetries, limit) as { data: string }[];

      return rows.map((row) => JSON.parse(row.data, reviver) as FulfillmentRecord);
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  async countByStatus(): Promise<Record<FulfillmentStatus, number>> {
    try {
      return {
        pending: await this.records.countByIndex("status", "pending"),
        completed: await this.records.countByIndex("status", "completed"),
      };
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }
}
