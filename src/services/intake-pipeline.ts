/**
 * Intake Pipeline
 *
 * One poll loop feeding the ingestion queue, and a fixed pool of workers
 * draining it:
 *
 *   poll → queue → validate → (registration email | state machine)
 *
 * The poll loop never overlaps itself and backs off after failures. A worker
 * that hits a transient failure keeps the submission and retries it with
 * exponential backoff until `maxAttempts` is used up.
 *
 * Two background jobs run on their own timers so they never hold up a poll:
 * the stalled-claim sweep, and pruning of staging directories nobody needs.
 */

import { provisionalClaimId } from "./claim-correlation.js";
import { PeriodicTask, sleep } from "./concurrency.js";
import { composeRegistrationRequiredEmail } from "./email-templates.js";
import { TransientIntegrationError, errorMessage } from "../errors.js";
import type { FulfillmentOutcome, FulfillmentStateMachine } from "./fulfillment-machine.js";
import type { IngestionQueue } from "./ingestion-queue.js";
import type { Logger } from "./logger.js";
import type { MailboxPoller } from "./mailbox-poller.js";
import type { MailSender } from "./mail-sender.js";
import type { UserValidator } from "./user-validator.js";
import type { ClaimSubmission } from "../types/submission.js";

const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;
const DEFAULT_STAGING_PRUNE_INTERVAL_MS = 60 * 60 * 1000;
const DEFAULT_STAGING_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export type IntakeOutcome =
  | FulfillmentOutcome
  | { kind: "user_not_found"; claimId: string; senderAddress: string; noticeSent: boolean };

export interface IntakePipelineOptions {
  queue: IngestionQueue<ClaimSubmission>;
  poller: MailboxPoller;
  validator: UserValidator;
  machine: FulfillmentStateMachine;
  mailer: MailSender;
  pollIntervalMs: number;
  pollMaxBackoffMs: number;
  workerCount: number;
  maxAttempts: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;

  /** Stalled-claim sweep cadence; defaults to `pollIntervalMs` */
  sweepIntervalMs?: number;
  stagingPruneIntervalMs?: number;
  stagingMaxAgeMs?: number;
  logger?: Logger;
}

export interface PipelineStats {
  running: boolean;
  queueSize: number;
  inFlight: number;
  processed: number;
  failed: number;
  outcomes: Record<IntakeOutcome["kind"], number>;

  /** Stalled claims the sweep has re-run */
  resumed: number;
  lastPollAt: string | null;
  lastPollError: string | null;
  consecutivePollFailures: number;
}

export class IntakePipeline {
  private readonly logger: Logger;
  private running = false;
  private isPolling = false;
  private pollTimer: NodeJS.Timeout | undefined;
  private activePoll: Promise<void> | null = null;
  private workers: Promise<void>[] = [];
  private readonly sweepTask: PeriodicTask;
  private readonly pruneTask: PeriodicTask;

  private inFlight = 0;
  private processed = 0;
  private failed = 0;
  private resumed = 0;
  private outcomes: Record<IntakeOutcome["kind"], number> = {
    completed: 0,
    pending: 0,
    duplicate: 0,
    user_not_found: 0,
  };
  private lastPollAt: Date | null = null;
  private lastPollError: string | null = null;
  private consecutivePollFailures = 0;

  constructor(private readonly options: IntakePipelineOptions) {
    this.logger = options.logger ?? console;

    this.sweepTask = new PeriodicTask(
      options.sweepIntervalMs ?? options.pollIntervalMs,
      () => this.sweepStalled(),
      (err) => this.logger.error(`[IntakePipeline] Stalled-claim sweep failed: ${errorMessage(err)}`)
    );
    this.pruneTask = new PeriodicTask(
      options.stagingPruneIntervalMs ?? DEFAULT_STAGING_PRUNE_INTERVAL_MS,
      () => this.pruneStaging(),
      (err) => this.logger.error(`[IntakePipeline] Staging prune failed: ${errorMessage(err)}`)
    );
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.logger.log(
      `[IntakePipeline] Starting: poll every ${this.options.pollIntervalMs / 1000}s, ` +
        `${this.options.workerCount} worker(s)`
    );

    this.workers = Array.from({ length: this.options.workerCount }, (_, index) =>
      this.runWorker(index + 1)
    );
    this.scheduleNextPoll(0);
    this.sweepTask.start();
    this.pruneTask.start();
  }

  /**
   * Stop polling and the background jobs, let running ones finish, then
   * close the queue and wait for the workers to drain it.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    clearTimeout(this.pollTimer);
    this.pollTimer = undefined;
    await Promise.all([this.activePoll, this.sweepTask.stop(), this.pruneTask.stop()]);

    this.options.queue.close();
    await Promise.all(this.workers);
    this.workers = [];

    this.logger.log(
      `[IntakePipeline] Stopped after ${this.processed} processed, ${this.failed} failed`
    );
  }

  /**
   * One poll cycle. Skipped when a cycle is already running. Failures
   * propagate.
   */
  async runPollCycle(): Promise<number> {
    if (this.isPolling) {
      this.logger.log("[IntakePipeline] Skipping poll - already running");
      return 0;
    }

    this.isPolling = true;
    try {
      const enqueued = await this.options.poller.poll();
      this.lastPollAt = new Date();
      this.lastPollError = null;
      this.consecutivePollFailures = 0;
      return enqueued.length;
    } catch (err) {
      this.lastPollError = errorMessage(err);
      this.consecutivePollFailures++;
      throw err;
    } finally {
      this.isPolling = false;
    }
  }

  /**
   * Retry claims stalled on our side. Joins a sweep that is already running.
   */
  runSweep(): Promise<void> {
    return this.sweepTask.run();
  }

  /**
   * Prune stale staging directories. Joins a prune that is already running.
   */
  runStagingPrune(): Promise<void> {
    return this.pruneTask.run();
  }

  /**
   * Validate the sender and run one submission through the state machine.
   */
  async processSubmission(submission: ClaimSubmission): Promise<IntakeOutcome> {
    const validation = await this.options.validator.validate(submission.senderAddress);

    if (validation.status === "found") {
      return this.options.machine.process(submission, validation.user);
    }

    const claimId = provisionalClaimId(submission);
    const email = composeRegistrationRequiredEmail({
      senderAddress: submission.senderAddress,
      claimId,
    });

    let noticeSent = false;
    try {
      await this.options.mailer.send(submission.senderAddress, email.subject, email.body);
      noticeSent = true;
    } catch (err) {
      this.logger.error(
        `[IntakePipeline] Registration notice to ${submission.senderAddress} failed: ${errorMessage(err)}`
      );
    }

    this.logger.log(`[IntakePipeline] ${submission.senderAddress} is not registered (${claimId})`);
    return { kind: "user_not_found", claimId, senderAddress: submission.senderAddress, noticeSent };
  }

  stats(): PipelineStats {
    return {
      running: this.running,
      queueSize: this.options.queue.size(),
      inFlight: this.inFlight,
      processed: this.processed,
      failed: this.failed,
      outcomes: { ...this.outcomes },
      resumed: this.resumed,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      lastPollError: this.lastPollError,
      consecutivePollFailures: this.consecutivePollFailures,
    };
  }

  // ============================================================================
  // Background jobs
  // ============================================================================

  private async sweepStalled(): Promise<void> {
    const outcomes = await this.options.machine.resumeStalled(this.options.validator);
    this.resumed += outcomes.length;
  }

  private async pruneStaging(): Promise<void> {
    await this.options.machine.pruneStaging(
      this.options.stagingMaxAgeMs ?? DEFAULT_STAGING_MAX_AGE_MS
    );
  }

  // ============================================================================
  // Poll loop
  // ============================================================================

  private scheduleNextPoll(delayMs: number): void {
    if (!this.running) return;
    this.pollTimer = setTimeout(() => {
      this.pollTimer = undefined;
      this.activePoll = this.pollAndReschedule();
    }, delayMs);
  }

  private async pollAndReschedule(): Promise<void> {
    let delayMs = this.options.pollIntervalMs;
    try {
      await this.runPollCycle();
    } catch (err) {
      delayMs = Math.min(
        this.options.pollIntervalMs * 2 ** this.consecutivePollFailures,
        this.options.pollMaxBackoffMs
      );
      if (this.running) {
        this.logger.error(
          `[IntakePipeline] Poll failed (${this.consecutivePollFailures} in a row), ` +
            `next try in ${delayMs / 1000}s: ${errorMessage(err)}`
        );
      }
    } finally {
      this.activePoll = null;
    }
    this.scheduleNextPoll(delayMs);
  }

  // ============================================================================
  // Workers
  // ============================================================================

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      const submission = await this.options.queue.dequeue();
      if (submission === null) return;

      this.inFlight++;
      try {
        await this.handle(workerId, submission);
      } finally {
        this.inFlight--;
      }
    }
  }

  private retryDelay(attempt: number): number {
    const base = this.options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    const max = this.options.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
    return Math.min(base * 2 ** attempt, max);
  }

  private async handle(workerId: number, submission: ClaimSubmission): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        const outcome = await this.processSubmission(submission);
        this.processed++;
        this.outcomes[outcome.kind]++;
        this.logger.log(
          `[IntakePipeline] Worker ${workerId}: ${submission.messageId} → ${outcome.kind} (${outcome.claimId})`
        );
        return;
      } catch (err) {
        const retryable =
          err instanceof TransientIntegrationError && attempt + 1 < this.options.maxAttempts;

        if (!retryable) {
          this.failed++;
          this.logger.error(
            `[IntakePipeline] DROPPED ${submission.messageId} from ${submission.senderAddress} ` +
              `after ${attempt + 1} attempt(s): ${errorMessage(err)}`
          );
          return;
        }

        const delayMs = this.retryDelay(attempt);
        this.logger.warn(
          `[IntakePipeline] Worker ${workerId}: ${submission.messageId} failed (${errorMessage(err)}), ` +
            `retrying in ${delayMs}ms`
        );
        await sleep(delayMs);
      }
    }
  }
}
