/**
 * SQLite Storage Backend
 *
 * Indexed storage using better-sqlite3. Entities are stored as JSON in a
 * `data` column, with the fields we query on mirrored into indexed columns.
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import * as fs from "node:fs";
import type { IndexedRepository } from "./repository.js";

/** Default database location relative to the working directory */
export const DEFAULT_DB_PATH = path.join("data", "claim-intake.db");

/**
 * Open a database and make sure the schema exists.
 *
 * Pass ":memory:" for a throwaway in-process database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  initializeSchema(db);
  return db;
}

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- Fulfillment records, one per claim
    CREATE TABLE IF NOT EXISTS fulfillments (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      claim_id TEXT NOT NULL,
      sender_address TEXT NOT NULL,
      status TEXT NOT NULL,
      pending_reason TEXT,
      attempts INTEGER NOT NULL DEFAULT 0,
      system_retries INTEGER NOT NULL DEFAULT 0,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_fulfillments_claim_id ON fulfillments(claim_id);
    CREATE INDEX IF NOT EXISTS idx_fulfillments_status ON fulfillments(status);
    CREATE INDEX IF NOT EXISTS idx_fulfillments_sender ON fulfillments(sender_address);
    CREATE INDEX IF NOT EXISTS idx_fulfillments_pending_reason ON fulfillments(pending_reason);

    -- Mailbox checkpoints (last processed inbox position)
    CREATE TABLE IF NOT EXISTS mailbox_checkpoints (
      mailbox TEXT PRIMARY KEY,
      message_count INTEGER NOT NULL,
      last_connected_at TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    -- Registered policyholders
    CREATE TABLE IF NOT EXISTS policyholders (
      email TEXT PRIMARY KEY,
      policy_type TEXT NOT NULL,
      policy_issued_date TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );
  `);
}

/**
 * JSON reviver that turns the named ISO date fields back into Dates.
 */
export function createDateReviver(dateFields: readonly string[]) {
  const fields = new Set(dateFields);
  return (key: string, value: unknown): unknown => {
    if (fields.has(key) && typeof value === "string") {
      return new Date(value);
    }
    return value;
  };
}

/**
 * Field mapping from entity property to indexed database column.
 */
export interface FieldMapping {
  column: string;
  property: string;
}

/**
 * Create a read repository over a SQLite table. Writes stay with the
 * owning gateway so they can run inside its transactions.
 *
 * @param tableName - The database table name
 * @param fieldMappings - Entity properties mirrored into indexed columns
 * @param dateFields - Properties revived as Dates when reading
 */
export function createSqliteRepository<T extends { id: string }>(
  database: Database.Database,
  tableName: string,
  fieldMappings: FieldMapping[] = [],
  dateFields: readonly string[] = []
): IndexedRepository<T> {
  const reviver = createDateReviver(dateFields);
  const parse = (data: string): T => JSON.parse(data, reviver) as T;

  const columnFor = (property: string): string => {
    const mapping = fieldMappings.find((f) => f.property === property);
    if (!mapping) {
      throw new Error(`${tableName}.${property} is not an indexed field`);
    }
    return mapping.column;
  };

  const toSearchValue = (value: unknown): unknown =>
    value instanceof Date ? value.toISOString() : value;

  return {
    async get(id: string): Promise<T | null> {
      const row = database
        .prepare(`SELECT data FROM ${tableName} WHERE id = ?`)
        .get(id) as { data: string } | undefined;

      if (!row) return null;
      return parse(row.data);
    },

    async getAll(): Promise<T[]> {
      const rows = database
        .prepare(`SELECT data FROM ${tableName} ORDER BY rowid`)
        .all() as { data: string }[];

      return rows.map((row) => parse(row.data));
    },

    async findByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T | null> {
      const row = database
        .prepare(`SELECT data FROM ${tableName} WHERE ${columnFor(String(field))} = ? LIMIT 1`)
        .get(toSearchValue(value)) as { data: string } | undefined;

      if (!row) return null;
      return parse(row.data);
    },

    async findAllByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T[]> {
      const rows = database
        .prepare(`SELECT data FROM ${tableName} WHERE ${columnFor(String(field))} = ? ORDER BY rowid`)
        .all(toSearchValue(value)) as { data: string }[];

      return rows.map((row) => parse(row.data));
    },

    async countByIndex<K extends keyof T>(field: K, value: T[K]): Promise<number> {
      const row = database
        .prepare(`SELECT COUNT(*) as count FROM ${tableName} WHERE ${columnFor(String(field))} = ?`)
        .get(toSearchValue(value)) as { count: number };

      return row.count;
    },
  };
}
