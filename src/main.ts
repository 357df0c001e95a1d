/**
 * Claim intake service.
 *
 * Wires the adapters to the pipeline, starts polling and the JSON API, and
 * shuts both down on SIGINT/SIGTERM.
 */

import "dotenv/config";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { startApiServer } from "./server/api.js";
import { ArchivalUploader, S3BlobStore } from "./services/archival-uploader.js";
import { OpenAiAssessor } from "./services/assessment-client.js";
import { AttachmentStager } from "./services/attachment-staging.js";
import { FulfillmentStateMachine } from "./services/fulfillment-machine.js";
import { IngestionQueue } from "./services/ingestion-queue.js";
import { IntakePipeline } from "./services/intake-pipeline.js";
import { ImapMailInbox } from "./services/mail-inbox.js";
import { SmtpMailSender } from "./services/mail-sender.js";
import { MailboxPoller } from "./services/mailbox-poller.js";
import { HttpPolicyholderDirectory, UserValidator } from "./services/user-validator.js";
import {
  FulfillmentGateway,
  SqliteCheckpointStore,
  SqlitePolicyholderStore,
  openDatabase,
} from "./storage/index.js";
import type { ClaimSubmission } from "./types/submission.js";

function openStore(config: AppConfig) {
  try {
    return openDatabase(config.databasePath);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot open database at ${config.databasePath}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const database = openStore(config);

  const gateway = new FulfillmentGateway(database);
  const policyholders = new SqlitePolicyholderStore(database);
  const validator = new UserValidator(
    config.userDirectoryUrl ? new HttpPolicyholderDirectory(config.userDirectoryUrl) : policyholders
  );

  const mailer = new SmtpMailSender(config.smtp);
  const archive = new ArchivalUploader(new S3BlobStore(config.archive), config.archive.prefix);
  const queue = new IngestionQueue<ClaimSubmission>(config.pipeline.queueCapacity);

  const poller = new MailboxPoller({
    inbox: new ImapMailInbox(config.imap),
    checkpoints: new SqliteCheckpointStore(database),
    queue,
    ingestExistingOnFirstRun: config.pipeline.ingestExistingOnFirstRun,
  });

  const machine = new FulfillmentStateMachine({
    gateway,
    assessor: new OpenAiAssessor(new OpenAI({ apiKey: config.assessment.apiKey }), {
      model: config.assessment.model,
      temperature: config.assessment.temperature,
      maxTokens: config.assessment.maxTokens,
    }),
    uploader: archive,
    mailer,
    stager: new AttachmentStager(config.attachmentsDir),
    assessmentTimeoutMs: config.assessment.timeoutMs,
    maxAttempts: config.pipeline.maxAttempts,
  });

  const pipeline = new IntakePipeline({
    queue,
    poller,
    validator,
    machine,
    mailer,
    ...config.pipeline,
  });

  pipeline.start();
  const server = startApiServer(
    { gateway, policyholders, archive, stats: () => pipeline.stats() },
    config.apiPort
  );

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Main] ${signal} received, shutting down...`);

    await pipeline.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    mailer.close();
    database.close();
    console.log("[Main] Shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("[Main] Shutdown failed:", err);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`[Main] ${err.message}`);
  } else {
    console.error("[Main] Fatal error:", err);
  }
  process.exit(1);
});
