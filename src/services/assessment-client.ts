/**
 * Completeness Assessment
 *
 * Asks a chat model whether a claim submission carries everything a claim
 * needs. The model answers in JSON; anything else is a malformed verdict.
 */

import OpenAI from "openai";
import { z } from "zod";
import { MalformedVerdictError, TransientIntegrationError, toTransient } from "../errors.js";
import type { AssessmentEvidence, CompletenessVerdict } from "../types/verdict.js";

export interface CompletenessAssessor {
  assess(evidence: AssessmentEvidence, signal: AbortSignal): Promise<CompletenessVerdict>;
}

const SYSTEM_PROMPT = [
  "You review insurance claim submissions received by email.",
  "Decide whether the submission contains every listed requirement.",
  "Accept any clear monetary value in any currency or number format as the claim amount.",
  "Attachments count as supporting proof when they plausibly relate to the claim.",
  'Respond with a JSON object only: {"complete": boolean, "missing_items": string[], "claim_id": string}.',
  "missing_items names each requirement that is absent, in plain words a customer understands.",
  "It is empty when complete is true. claim_id repeats the claim id you were given.",
].join("\n");

const verdictSchema = z.object({
  complete: z.boolean(),
  missing_items: z.array(z.string()).default([]),
  claim_id: z.string().min(1),
});

/**
 * Parse the model's answer. Throws MalformedVerdictError for anything that
 * is not a verdict object.
 */
export function parseVerdict(raw: string): CompletenessVerdict {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new MalformedVerdictError("Assessment response is not JSON", { cause: err });
  }

  const result = verdictSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MalformedVerdictError(`Assessment response is not a verdict: ${issues}`);
  }

  return {
    complete: result.data.complete,
    missingItems: result.data.missing_items.map((item) => item.trim()).filter(Boolean),
    claimId: result.data.claim_id,
  };
}

/**
 * Text part of the assessment request.
 */
export function buildAssessmentPrompt(evidence: AssessmentEvidence): string {
  const attachmentLines =
    evidence.attachments.length > 0
      ? evidence.attachments.map(
          (attachment, index) =>
            `${index + 1}. ${attachment.filename} (${attachment.contentType}, ${attachment.sizeBytes} bytes)`
        )
      : ["No attachments provided"];

  return [
    "CLAIM COMPLETENESS ASSESSMENT",
    "",
    "CUSTOMER DETAILS:",
    `Email: ${evidence.senderAddress}`,
    `Policy type: ${evidence.policyType}`,
    `Policy issued: ${evidence.policyIssuedDate}`,
    `Subject: ${evidence.subject}`,
    `Claim ID: ${evidence.claimId}`,
    "",
    "EMAIL CONTENT:",
    evidence.content,
    "",
    `ATTACHMENTS PROVIDED (${evidence.attachments.length}):`,
    ...attachmentLines,
    "",
    "REQUIREMENTS:",
    ...evidence.requirements.map((requirement) => `- ${requirement}`),
  ].join("\n");
}

export function buildAssessmentContent(
  evidence: AssessmentEvidence
): OpenAI.Chat.ChatCompletionContentPart[] {
  const parts: OpenAI.Chat.ChatCompletionContentPart[] = [
    { type: "text", text: buildAssessmentPrompt(evidence) },
  ];
  for (const attachment of evidence.attachments) {
    if (attachment.imageDataUrl) {
      parts.push({ type: "image_url", image_url: { url: attachment.imageDataUrl } });
    }
  }
  return parts;
}

export interface OpenAiAssessorOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAiAssessor implements CompletenessAssessor {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiAssessorOptions
  ) {}

  async assess(evidence: AssessmentEvidence, signal: AbortSignal): Promise<CompletenessVerdict> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildAssessmentContent(evidence) },
          ],
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
          response_format: { type: "json_object" },
        },
        { signal, maxRetries: 0 }
      );
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      throw toTransient("assessment", err);
    }

    if (!content) {
      throw new TransientIntegrationError("assessment", "Empty response from model");
    }
    return parseVerdict(content);
  }
}
