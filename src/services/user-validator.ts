/**
 * User Validator
 *
 * Decides whether a sender is a registered policyholder. A directory outage
 * is retryable; "not found" is an answer.
 */

import { z } from "zod";
import { toTransient } from "../errors.js";
import { normalizeEmail } from "../storage/policyholders.js";
import type { Policyholder, PolicyholderDirectory } from "../types/policyholder.js";

export type ValidationResult =
  | { status: "found"; user: Policyholder }
  | { status: "not_found" };

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class UserValidator {
  constructor(private readonly directory: PolicyholderDirectory) {}

  async validate(senderAddress: string): Promise<ValidationResult> {
    const email = normalizeEmail(senderAddress);
    if (!EMAIL_PATTERN.test(email)) {
      return { status: "not_found" };
    }

    let user: Policyholder | null;
    try {
      user = await this.directory.lookup(email);
    } catch (err) {
      throw toTransient("user directory", err);
    }

    return user ? { status: "found", user } : { status: "not_found" };
  }
}

const lookupResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      mail_id: z.string(),
      policy_type: z.string(),
      policy_issued_date: z.string(),
    })
    .nullish(),
});

/**
 * Policyholder directory served over HTTP:
 * `GET {base}/user/{email}` → `{ success, data?: { mail_id, policy_type, policy_issued_date } }`.
 */
export class HttpPolicyholderDirectory implements PolicyholderDirectory {
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly timeoutMs = 10000) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async lookup(email: string): Promise<Policyholder | null> {
    const response = await fetch(`${this.baseUrl}/user/${encodeURIComponent(email)}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`User lookup failed: ${response.status} ${response.statusText}`);
    }

    const body = lookupResponseSchema.parse(await response.json());
    if (!body.success || !body.data) {
      return null;
    }

    return {
      email: normalizeEmail(body.data.mail_id),
      policyType: body.data.policy_type,
      policyIssuedDate: body.data.policy_issued_date,
    };
  }
}
