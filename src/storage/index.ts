/**
 * Storage Layer
 *
 * SQLite-backed storage for fulfillment records, mailbox checkpoints and
 * the local policyholder directory.
 */

export {
  openDatabase,
  createSqliteRepository,
  createDateReviver,
  DEFAULT_DB_PATH,
  type FieldMapping,
} from "./sqlite.js";

export { type Repository, type IndexedRepository } from "./repository.js";

export { FulfillmentGateway, type WriteResult } from "./fulfillments.js";
export { SqliteCheckpointStore, type CheckpointStore } from "./checkpoints.js";
export { SqlitePolicyholderStore, normalizeEmail } from "./policyholders.js";
