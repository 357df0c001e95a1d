/**
 * Outbound email and archived mail-content formats.
 */

import type { ClaimSubmission } from "../types/submission.js";
import type { Policyholder } from "../types/policyholder.js";

export interface ComposedEmail {
  subject: string;
  body: string;
}

const SIGNATURE = "Best regards,\nInsurance Claims Team";

/** Subject tag that lets a reply be correlated back to its claim. */
export function claimReference(claimId: string): string {
  return `[Claim ${claimId}]`;
}

export function composeFollowUpEmail(input: {
  claimId: string;
  missingItems: string[];
  attachmentCount: number;
  policyholder: Policyholder;
}): ComposedEmail {
  const received =
    input.attachmentCount > 0
      ? `- Your message and ${input.attachmentCount} attachment${input.attachmentCount === 1 ? "" : "s"}`
      : "- Your message (no attachments)";

  return {
    subject: `Insurance Claim - Additional Information Required ${claimReference(input.claimId)}`,
    body: [
      "Dear Customer,",
      "",
      `Thank you for submitting a claim under your ${input.policyholder.policyType} policy. ` +
        "We have reviewed your submission.",
      "",
      "RECEIVED SO FAR:",
      received,
      "",
      "MISSING REQUIREMENTS:",
      ...input.missingItems.map((item) => `- ${item}`),
      "",
      "Please reply to this email with the missing information and supporting documents. " +
        `Keep the claim reference ${input.claimId} in the subject so we can match your reply.`,
      "",
      SIGNATURE,
    ].join("\n"),
  };
}

export function composeRegistrationRequiredEmail(input: {
  senderAddress: string;
  claimId: string;
}): ComposedEmail {
  return {
    subject: "Insurance Claim - Registration Required",
    body: [
      "Dear Customer,",
      "",
      `We received a claim from ${input.senderAddress}, but this address is not registered ` +
        "with any policy in our system.",
      "",
      `Claim reference: ${input.claimId}`,
      "",
      "Please write from the email address registered on your policy, or contact customer " +
        "service to update your details.",
      "",
      SIGNATURE,
    ].join("\n"),
  };
}

/**
 * One exchange as it is stored in the record and archived as mail content.
 */
export function formatExchange(submission: ClaimSubmission, claimId: string): string {
  return [
    `Subject: ${submission.subject}`,
    `From: ${submission.senderAddress}`,
    `Received: ${submission.receivedAt.toISOString()}`,
    `Claim ID: ${claimId}`,
    "",
    "Content:",
    submission.body,
  ].join("\n");
}

const EXCHANGE_SEPARATOR = "\n\n-----\n\n";

export function appendExchange(previous: string | undefined, exchange: string): string {
  return previous ? `${previous}${EXCHANGE_SEPARATOR}${exchange}` : exchange;
}
