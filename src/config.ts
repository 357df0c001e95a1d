/**
 * Configuration
 *
 * Read from the environment (a .env file is loaded by main) and validated
 * once at startup.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const booleanFromEnv = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const envSchema = z.object({
  DATABASE_PATH: z.string().default("data/claim-intake.db"),
  ATTACHMENTS_DIR: z.string().default("data/attachments"),

  POLL_INTERVAL_MS: intFromEnv(30_000, 1),
  POLL_MAX_BACKOFF_MS: intFromEnv(300_000, 1),
  WORKER_COUNT: intFromEnv(2, 1),
  QUEUE_CAPACITY: intFromEnv(0),
  MAX_ATTEMPTS: intFromEnv(5, 1),
  INGEST_EXISTING_ON_FIRST_RUN: booleanFromEnv.default("false"),
  SWEEP_INTERVAL_MS: intFromEnv(30_000, 1),
  STAGING_PRUNE_INTERVAL_MS: intFromEnv(3_600_000, 1),
  STAGING_MAX_AGE_MS: intFromEnv(86_400_000, 1),

  IMAP_HOST: z.string().min(1),
  IMAP_PORT: intFromEnv(993, 1),
  IMAP_SECURE: booleanFromEnv.default("true"),
  IMAP_USER: z.string().min(1),
  IMAP_PASSWORD: z.string().min(1),
  IMAP_MAILBOX: z.string().default("INBOX"),

  SMTP_HOST: z.string().min(1),
  SMTP_PORT: intFromEnv(587, 1),
  SMTP_SECURE: booleanFromEnv.default("false"),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  MAIL_FROM: z.string().min(1),

  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  ASSESSMENT_TIMEOUT_MS: intFromEnv(60_000, 1),
  ASSESSMENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  ASSESSMENT_MAX_TOKENS: intFromEnv(1500, 1),

  S3_BUCKET: z.string().min(1),
  AWS_REGION: z.string().default("us-east-1"),
  S3_PREFIX: z.string().default("claim-intake"),
  S3_URL_EXPIRY_SECONDS: intFromEnv(3600, 1),

  USER_DIRECTORY_URL: optionalString.pipe(z.string().url().optional()),

  API_PORT: intFromEnv(3001, 1),
});

export interface AppConfig {
  databasePath: string;
  attachmentsDir: string;
  pipeline: {
    pollIntervalMs: number;
    pollMaxBackoffMs: number;
    workerCount: number;
    /** 0 means unbounded */
    queueCapacity: number;
    maxAttempts: number;
    ingestExistingOnFirstRun: boolean;
    sweepIntervalMs: number;
    stagingPruneIntervalMs: number;
    stagingMaxAgeMs: number;
  };
  imap: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    mailbox: string;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user: string | undefined;
    password: string | undefined;
    from: string;
  };
  assessment: {
    apiKey: string;
    model: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
  };
  archive: {
    bucket: string;
    region: string;
    prefix: string;
    urlExpirySeconds: number;
  };
  userDirectoryUrl: string | undefined;
  apiPort: number;
}

/**
 * Validate the environment and build the application config.
 *
 * @throws ConfigurationError naming every invalid or missing key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration\n  ${problems.join("\n  ")}`);
  }

  const e = parsed.data;
  return {
    databasePath: e.DATABASE_PATH,
    attachmentsDir: e.ATTACHMENTS_DIR,
    pipeline: {
      pollIntervalMs: e.POLL_INTERVAL_MS,
      pollMaxBackoffMs: e.POLL_MAX_BACKOFF_MS,
      workerCount: e.WORKER_COUNT,
      queueCapacity: e.QUEUE_CAPACITY,
      maxAttempts: e.MAX_ATTEMPTS,
      ingestExistingOnFirstRun: e.INGEST_EXISTING_ON_FIRST_RUN,
      sweepIntervalMs: e.SWEEP_INTERVAL_MS,
      stagingPruneIntervalMs: e.STAGING_PRUNE_INTERVAL_MS,
      stagingMaxAgeMs: e.STAGING_MAX_AGE_MS,
    },
    imap: {
      host: e.IMAP_HOST,
      port: e.IMAP_PORT,
      secure: e.IMAP_SECURE,
      user: e.IMAP_USER,
      password: e.IMAP_PASSWORD,
      mailbox: e.IMAP_MAILBOX,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
      from: e.MAIL_FROM,
    },
    assessment: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      timeoutMs: e.ASSESSMENT_TIMEOUT_MS,
      temperature: e.ASSESSMENT_TEMPERATURE,
      maxTokens: e.ASSESSMENT_MAX_TOKENS,
    },
    archive: {
      bucket: e.S3_BUCKET,
      region: e.AWS_REGION,
      prefix: e.S3_PREFIX,
      urlExpirySeconds: e.S3_URL_EXPIRY_SECONDS,
    },
    userDirectoryUrl: e.USER_DIRECTORY_URL,
    apiPort: e.API_PORT,
  };
}
