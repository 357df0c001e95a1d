/**
 * Policyholder storage: the local user directory.
 */

import type Database from "better-sqlite3";
import type {
  CreatePolicyholderInput,
  Policyholder,
  PolicyholderDirectory,
} from "../types/policyholder.js";
import { toTransient } from "../errors.js";

const STORE = "policyholder store";

type PolicyholderRow = {
  email: string;
  policy_type: string;
  policy_issued_date: string;
};

function fromRow(row: PolicyholderRow): Policyholder {
  return {
    email: row.email,
    policyType: row.policy_type,
    policyIssuedDate: row.policy_issued_date,
  };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class SqlitePolicyholderStore implements PolicyholderDirectory {
  constructor(private readonly database: Database.Database) {}

  async lookup(email: string): Promise<Policyholder | null> {
    try {
      const row = this.database
        .prepare(
          "SELECT email, policy_type, policy_issued_date FROM policyholders WHERE email = ?"
        )
        .get(normalizeEmail(email)) as PolicyholderRow | undefined;

      return row ? fromRow(row) : null;
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }

  /**
   * Register a policyholder. Resolves `created: false` with the existing
   * entry when the address is already registered.
   */
  async create(
    input: CreatePolicyholderInput
  ): Promise<{ created: boolean; policyholder: Policyholder }> {
    const policyholder: Policyholder = { ...input, email: normalizeEmail(input.email) };
    try {
      const result = this.database
        .prepare(
          `INSERT INTO policyholders (email, policy_type, policy_issued_date)
           VALUES (?, ?, ?)
           ON CONFLICT(email) DO NOTHING`
        )
        .run(policyholder.email, policyholder.policyType, policyholder.policyIssuedDate);

      if (result.changes > 0) {
        return { created: true, policyholder };
      }
      const existing = await this.lookup(policyholder.email);
      return { created: false, policyholder: existing ?? policyholder };
    } catch (err) {
      throw toTransient(STORE, err);
    }
  }
}
