import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type Database from "better-sqlite3";
import { MalformedVerdictError } from "../../../src/errors.js";
import { ArchivalUploader } from "../../../src/services/archival-uploader.js";
import { AttachmentStager, type CleanupResult } from "../../../src/services/attachment-staging.js";
import {
  FulfillmentStateMachine,
  GENERIC_MISSING_ITEM,
} from "../../../src/services/fulfillment-machine.js";
import { deriveClaimId } from "../../../src/services/ids.js";
import type { Logger } from "../../../src/services/logger.js";
import { UserValidator } from "../../../src/services/user-validator.js";
import { FulfillmentGateway } from "../../../src/storage/fulfillments.js";
import { openDatabase } from "../../../src/storage/sqlite.js";
import type { ClaimSubmission, SubmissionAttachment } from "../../../src/types/submission.js";
import type { AssessmentEvidence, CompletenessVerdict } from "../../../src/types/verdict.js";
import type { CompletenessAssessor } from "../../../src/services/assessment-client.js";
import {
  FakeBlobStore,
  FakeDirectory,
  FakeMailSender,
  JANE,
  ScriptedAssessor,
  makeSubmission,
  silentLogger,
  type ScriptedAnswer,
} from "../fakes.js";

const COMPLETE: ScriptedAnswer = { verdict: { complete: true, claimId: "C100" } };

function incomplete(...missingItems: string[]): ScriptedAnswer {
  return { verdict: { complete: false, missingItems } };
}

function claimIdOf(submission: ClaimSubmission): string {
  return deriveClaimId(submission.senderAddress, submission.messageId, submission.receivedAt);
}

function pdf(filename: string) {
  return { filename, content: Buffer.from(`%PDF ${filename}`), contentType: "application/pdf" };
}

describe("FulfillmentStateMachine", () => {
  let tempDir: string;
  let database: Database.Database;
  let gateway: FulfillmentGateway;
  let store: FakeBlobStore;
  let mailer: FakeMailSender;
  let logger: Logger;
  let validator: UserValidator;

  function buildMachine(
    assessor: CompletenessAssessor,
    options: { maxAttempts?: number; stager?: AttachmentStager } = {}
  ) {
    return new FulfillmentStateMachine({
      gateway,
      assessor,
      uploader: new ArchivalUploader(store, "claim-intake"),
      mailer,
      stager: options.stager ?? new AttachmentStager(tempDir),
      assessmentTimeoutMs: 20,
      maxAttempts: options.maxAttempts ?? 3,
      logger,
    });
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fulfillment-"));
    database = openDatabase(":memory:");
    gateway = new FulfillmentGateway(database);
    store = new FakeBlobStore();
    mailer = new FakeMailSender();
    logger = silentLogger();
    validator = new UserValidator(new FakeDirectory());
  });

  afterEach(() => {
    database.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("complete submissions", () => {
    it("archives a registered sender's complete claim and removes the local file", async () => {
      const assessor = new ScriptedAssessor([COMPLETE]);
      const machine = buildMachine(assessor);
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);

      const outcome = await machine.process(submission, JANE);

      const root = `claim-intake/jane@x.com/claims/${claimId}`;
      expect(outcome.kind).toBe("completed");
      expect(outcome.claimId).toBe(claimId);
      expect(store.keys.filter((key) => key.includes("/attachments/"))).toEqual([
        `${root}/attachments/0_repair-bill.pdf`,
      ]);

      const record = await gateway.find({ claimId });
      expect(record).toMatchObject({
        status: "completed",
        attachmentCount: 1,
        attachmentUrls: [`memory://${root}/attachments/0_repair-bill.pdf`],
        mailContentUrl: `memory://${root}/mail_content.txt`,
        localAttachmentPaths: [],
        missingItems: null,
        pendingReason: null,
      });
      expect(record?.uploadedAt).toBeInstanceOf(Date);
      expect(fs.existsSync(path.join(tempDir, claimId))).toBe(false);
      expect(mailer.sent).toEqual([]);
    });

    it("keeps its own claim id when the verdict names another", async () => {
      const machine = buildMachine(new ScriptedAssessor([COMPLETE]));
      const submission = makeSubmission();

      const outcome = await machine.process(submission, JANE);

      expect(outcome.claimId).toBe(claimIdOf(submission));
      expect(await gateway.find({ claimId: "C100" })).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        `[Fulfillment] Verdict names C100 for ${claimIdOf(submission)}, keeping ${claimIdOf(submission)}`
      );
    });

    it("hands the assessor the policy, content and requirements", async () => {
      const assessor = new ScriptedAssessor([COMPLETE]);
      const submission = makeSubmission();

      await buildMachine(assessor).process(submission, JANE);

      const [evidence] = assessor.evidence;
      expect(evidence?.claimId).toBe(claimIdOf(submission));
      expect(evidence?.policyType).toBe("motor");
      expect(evidence?.content).toContain(`Claim ID: ${claimIdOf(submission)}`);
      expect(evidence?.attachments).toEqual([
        {
          filename: "repair-bill.pdf",
          contentType: "application/pdf",
          sizeBytes: Buffer.byteLength("%PDF-1.4 repair bill"),
        },
      ]);
      expect(evidence?.requirements).toHaveLength(3);
    });

    it("is a no-op when the same message is processed again", async () => {
      const assessor = new ScriptedAssessor([COMPLETE]);
      const machine = buildMachine(assessor);
      const submission = makeSubmission();

      await machine.process(submission, JANE);
      const again = await machine.process(submission, JANE);

      expect(again.kind).toBe("duplicate");
      expect(assessor.calls).toBe(1);
      expect(store.calls).toBe(2);
    });

    it("ignores a reply to a claim that is already completed", async () => {
      const assessor = new ScriptedAssessor([COMPLETE]);
      const machine = buildMachine(assessor);
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);

      const reply = makeSubmission({ subject: `Re: [Claim ${claimId}]` });
      const outcome = await machine.process(reply, JANE);

      expect(outcome).toMatchObject({ kind: "duplicate", claimId });
      expect(assessor.calls).toBe(1);
      expect(store.calls).toBe(2);
      expect(mailer.sent).toEqual([]);
    });

    it("reports a duplicate when another writer finalized the claim first", async () => {
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);
      const racingAssessor: CompletenessAssessor = {
        async assess(evidence: AssessmentEvidence): Promise<CompletenessVerdict> {
          await gateway.finalize({
            senderAddress: evidence.senderAddress,
            claimId,
            mailSubject: evidence.subject,
            mailContent: evidence.content,
            mailContentUrl: "memory://other-writer/mail_content.txt",
            mailContentKey: "other-writer/mail_content.txt",
            attachmentCount: 0,
            localAttachmentPaths: [],
            attachmentUrls: [],
            attachmentKeys: [],
            sourceMessageIds: ["<other@x.com>"],
            attempts: 1,
            systemRetries: 0,
            uploadedAt: new Date(),
          });
          return { complete: true, missingItems: [], claimId };
        },
      };

      const outcome = await buildMachine(racingAssessor).process(submission, JANE);

      expect(outcome.kind).toBe("duplicate");
      expect(outcome.record.mailContentUrl).toBe("memory://other-writer/mail_content.txt");
      expect((await gateway.list("completed")).length).toBe(1);
    });

    it("stays completed when staged files cannot be removed", async () => {
      class StuckStager extends AttachmentStager {
        override async cleanup(claimId: string): Promise<CleanupResult> {
          return { removed: 0, failed: [this.claimDir(claimId)] };
        }
      }
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);
      const machine = buildMachine(new ScriptedAssessor([COMPLETE]), {
        stager: new StuckStager(tempDir),
      });

      const outcome = await machine.process(submission, JANE);

      expect(outcome.kind).toBe("completed");
      expect((await gateway.find({ claimId }))?.status).toBe("completed");
      expect(logger.warn).toHaveBeenCalledWith(
        `[Fulfillment] Could not remove staged files for ${claimId}: ${path.join(tempDir, claimId)}`
      );
    });
  });

  describe("incomplete submissions", () => {
    it("records missing items and sends one follow-up", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete("policy_number")]));
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);

      const outcome = await machine.process(submission, JANE);

      expect(outcome).toMatchObject({ kind: "pending", reason: "incomplete", followUpSent: true });
      expect(await gateway.find({ claimId })).toMatchObject({
        status: "pending",
        missingItems: ["policy_number"],
        pendingReason: "incomplete",
        attachmentCount: 1,
        attachmentUrls: [],
      });

      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0]?.to).toBe("jane@x.com");
      expect(mailer.sent[0]?.subject).toBe(
        `Insurance Claim - Additional Information Required [Claim ${claimId}]`
      );
      expect(mailer.sent[0]?.body.split("\n")).toContain("- policy_number");
      expect(store.calls).toBe(0);
      expect(fs.existsSync(path.join(tempDir, claimId, "0_repair-bill.pdf"))).toBe(true);
    });

    it("names a generic item when the verdict lists none", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete()]));
      const submission = makeSubmission();

      await machine.process(submission, JANE);

      expect((await gateway.find({ claimId: claimIdOf(submission) }))?.missingItems).toEqual([
        GENERIC_MISSING_ITEM,
      ]);
      expect(mailer.sent[0]?.body.split("\n")).toContain(`- ${GENERIC_MISSING_ITEM}`);
    });

    it("stays pending when the follow-up cannot be sent", async () => {
      mailer.failWith = new Error("smtp down");
      const machine = buildMachine(new ScriptedAssessor([incomplete("claim amount")]));
      const submission = makeSubmission();

      const outcome = await machine.process(submission, JANE);

      expect(outcome).toMatchObject({ kind: "pending", followUpSent: false });
      expect((await gateway.find({ claimId: claimIdOf(submission) }))?.status).toBe("pending");
    });

    it("does not email twice for a re-polled message", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete("claim amount")]));
      const submission = makeSubmission();

      await machine.process(submission, JANE);
      const again = await machine.process(submission, JANE);

      expect(again.kind).toBe("duplicate");
      expect(mailer.sent).toHaveLength(1);
    });
  });

  describe("replies", () => {
    it("completes the original claim with the evidence of both exchanges", async () => {
      const assessor = new ScriptedAssessor([incomplete("photos of the damage"), COMPLETE]);
      const machine = buildMachine(assessor);
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);

      const reply = makeSubmission({
        subject: `Re: Insurance Claim - Additional Information Required [Claim ${claimId}]`,
        body: "Photo attached.",
        attachments: [
          { filename: "bumper.png", content: Buffer.from("png-bytes"), contentType: "image/png" },
        ],
      });
      const outcome = await machine.process(reply, JANE);

      expect(outcome).toMatchObject({ kind: "completed", claimId });
      const record = await gateway.find({ claimId });
      const root = `claim-intake/jane@x.com/claims/${claimId}`;
      expect(record?.attachmentUrls).toEqual([
        `memory://${root}/attachments/0_repair-bill.pdf`,
        `memory://${root}/attachments/1_bumper.png`,
      ]);
      expect(record?.sourceMessageIds).toEqual([first.messageId, reply.messageId]);
      expect(record?.mailSubject).toBe("Car accident claim");

      const second = assessor.evidence[1];
      expect(second?.content).toContain("Content:\nMy parked car was hit");
      expect(second?.content).toContain("Content:\nPhoto attached.");
      expect(second?.attachments[1]?.imageDataUrl).toBe(
        `data:image/png;base64,${Buffer.from("png-bytes").toString("base64")}`
      );
    });

    it("opens a new claim when the reference belongs to another sender", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete("claim amount")]));
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);

      const stranger = makeSubmission({
        senderAddress: "mallory@x.com",
        subject: `Re: [Claim ${claimId}]`,
      });
      const outcome = await machine.process(stranger, { ...JANE, email: "mallory@x.com" });

      expect(outcome.claimId).toBe(claimIdOf(stranger));
      expect((await gateway.find({ claimId }))?.sourceMessageIds).toEqual([first.messageId]);
    });

    it("folds concurrent replies to one claim in one at a time", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete("claim amount")]));
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);

      const replies = ["a.pdf", "b.pdf"].map((filename) =>
        makeSubmission({ subject: `Re: [Claim ${claimId}]`, attachments: [pdf(filename)] })
      );
      await Promise.all(replies.map((reply) => machine.process(reply, JANE)));

      const record = await gateway.find({ claimId });
      expect(record?.sourceMessageIds).toHaveLength(3);
      expect(record?.attachmentCount).toBe(3);
      const names = record?.localAttachmentPaths.map((stagedPath) => path.basename(stagedPath)) ?? [];
      expect(names.map((name) => name.split("_")[0])).toEqual(["0", "1", "2"]);
      expect(names.map((name) => name.replace(/^\d+_/, "")).sort()).toEqual([
        "a.pdf",
        "b.pdf",
        "repair-bill.pdf",
      ]);
      expect(record?.attempts).toBe(3);
    });
  });

  describe("failures on our side", () => {
    it("keeps every local file when the second of three attachment uploads fails", async () => {
      store.failOnCall = 3; // mail content, first attachment, then this one
      const machine = buildMachine(new ScriptedAssessor([COMPLETE]));
      const submission = makeSubmission({
        attachments: [pdf("a.pdf"), pdf("b.pdf"), pdf("c.pdf")],
      });
      const claimId = claimIdOf(submission);

      const outcome = await machine.process(submission, JANE);

      expect(outcome).toMatchObject({ kind: "pending", reason: "upload_failed" });
      const record = await gateway.find({ claimId });
      expect(record).toMatchObject({
        status: "pending",
        missingItems: ["upload failed"],
        attachmentUrls: [],
        attachmentCount: 3,
      });
      expect(record?.localAttachmentPaths).toHaveLength(3);
      for (const stagedPath of record?.localAttachmentPaths ?? []) {
        expect(fs.existsSync(stagedPath)).toBe(true);
      }
      expect(await gateway.list("completed")).toEqual([]);
      expect(mailer.sent).toEqual([]);
    });

    it("retries a failed upload from the stalled-claim sweep", async () => {
      store.failOnCall = 2;
      const machine = buildMachine(new ScriptedAssessor([COMPLETE]));
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);
      await machine.process(submission, JANE);

      const outcomes = await machine.resumeStalled(validator);

      expect(outcomes.map((outcome) => outcome.kind)).toEqual(["completed"]);
      const record = await gateway.find({ claimId });
      expect(record?.status).toBe("completed");
      expect(record?.attempts).toBe(2);
      expect(record?.systemRetries).toBe(1);
      expect(fs.existsSync(path.join(tempDir, claimId))).toBe(false);
    });

    it("sweeps a reply's failed upload even when earlier exchanges used up the attempt count", async () => {
      const assessor = new ScriptedAssessor([incomplete("photos of the damage"), COMPLETE]);
      const machine = buildMachine(assessor, { maxAttempts: 2 });
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);

      store.failOnCall = 1;
      const reply = makeSubmission({
        subject: `Re: [Claim ${claimId}]`,
        attachments: [pdf("photo.pdf")],
      });
      const replyOutcome = await machine.process(reply, JANE);
      expect(replyOutcome).toMatchObject({ kind: "pending", reason: "upload_failed" });
      expect(await gateway.find({ claimId })).toMatchObject({ attempts: 2, systemRetries: 0 });

      const outcomes = await machine.resumeStalled(validator);

      expect(outcomes.map((outcome) => outcome.kind)).toEqual(["completed"]);
      expect(await gateway.find({ claimId })).toMatchObject({
        status: "completed",
        attempts: 3,
        systemRetries: 1,
      });
    });

    it("starts the sweep retries over when the sender writes again", async () => {
      const assessor = new ScriptedAssessor(["hang"]);
      const machine = buildMachine(assessor, { maxAttempts: 1 });
      const first = makeSubmission();
      const claimId = claimIdOf(first);
      await machine.process(first, JANE);
      await machine.resumeStalled(validator);
      expect(await machine.resumeStalled(validator)).toEqual([]);

      await machine.process(makeSubmission({ subject: `Re: [Claim ${claimId}]` }), JANE);

      expect((await gateway.find({ claimId }))?.systemRetries).toBe(0);
      expect((await machine.resumeStalled(validator)).map((outcome) => outcome.kind)).toEqual([
        "pending",
      ]);
    });

    it("falls back to pending when the assessor times out twice, then resumes", async () => {
      const assessor = new ScriptedAssessor(["hang", "hang", COMPLETE]);
      const machine = buildMachine(assessor);
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);

      const outcome = await machine.process(submission, JANE);

      expect(outcome).toMatchObject({ kind: "pending", reason: "assessment_unavailable" });
      expect((await gateway.find({ claimId }))?.missingItems).toEqual(["assessment unavailable"]);
      expect(assessor.calls).toBe(2);
      expect(mailer.sent).toEqual([]);

      const resumed = await machine.resumeStalled(validator);

      expect(resumed.map((result) => result.kind)).toEqual(["completed"]);
      expect(assessor.calls).toBe(3);
    });

    it("treats a malformed verdict like a timeout", async () => {
      const assessor = new ScriptedAssessor([{ error: new MalformedVerdictError("not JSON") }]);
      const machine = buildMachine(assessor);

      const outcome = await machine.process(makeSubmission(), JANE);

      expect(outcome).toMatchObject({ kind: "pending", reason: "assessment_unavailable" });
      expect(assessor.calls).toBe(2);
    });

    it("stops resuming a claim once its sweep retries are used up", async () => {
      const assessor = new ScriptedAssessor(["hang"]);
      const machine = buildMachine(assessor, { maxAttempts: 2 });
      const submission = makeSubmission();

      await machine.process(submission, JANE);
      const firstSweep = await machine.resumeStalled(validator);
      const secondSweep = await machine.resumeStalled(validator);
      const thirdSweep = await machine.resumeStalled(validator);

      expect(firstSweep.map((result) => result.kind)).toEqual(["pending"]);
      expect(secondSweep.map((result) => result.kind)).toEqual(["pending"]);
      expect(thirdSweep).toEqual([]);
      expect(await gateway.find({ claimId: claimIdOf(submission) })).toMatchObject({
        attempts: 3,
        systemRetries: 2,
      });
      expect(assessor.calls).toBe(6);
    });

    it("parks the claim as pending when reading staged files fails", async () => {
      class UnreadableStager extends AttachmentStager {
        override async read(): Promise<SubmissionAttachment[]> {
          throw new Error("disk unreadable");
        }
      }
      const assessor = new ScriptedAssessor([COMPLETE]);
      const machine = buildMachine(assessor, { stager: new UnreadableStager(tempDir) });
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);

      const outcome = await machine.process(submission, JANE);

      expect(outcome).toMatchObject({ kind: "pending", reason: "processing_failed" });
      expect(await gateway.find({ claimId })).toMatchObject({
        status: "pending",
        pendingReason: "processing_failed",
        missingItems: ["processing failed"],
        attachmentCount: 1,
      });
      expect(fs.existsSync(path.join(tempDir, claimId, "0_repair-bill.pdf"))).toBe(true);
      expect(assessor.calls).toBe(0);
      expect((await gateway.listStalled(3)).map((record) => record.claimId)).toEqual([claimId]);
    });

    it("leaves claims waiting on the sender out of the sweep", async () => {
      const assessor = new ScriptedAssessor([incomplete("claim amount")]);
      const machine = buildMachine(assessor);
      await machine.process(makeSubmission(), JANE);

      expect(await machine.resumeStalled(validator)).toEqual([]);
      expect(assessor.calls).toBe(1);
    });
  });

  describe("staging pruning", () => {
    const LATER = () => new Date(Date.now() + 60_000);

    it("prunes orphaned directories but keeps pending claims", async () => {
      const machine = buildMachine(new ScriptedAssessor([incomplete("claim amount")]));
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);
      await machine.process(submission, JANE);
      fs.mkdirSync(path.join(tempDir, "CLAIM_0RPHAN00_20260101"));

      const result = await machine.pruneStaging(0, LATER());

      expect(result).toEqual({ pruned: ["CLAIM_0RPHAN00_20260101"], failed: [] });
      expect(fs.existsSync(path.join(tempDir, claimId, "0_repair-bill.pdf"))).toBe(true);
      expect(logger.log).toHaveBeenCalledWith("[Fulfillment] Pruned 1 stale staging dir(s)");
    });

    it("keeps the directory of a claim that is mid-transition", async () => {
      const submission = makeSubmission();
      const claimId = claimIdOf(submission);
      let duringAssessment: string[] = [];
      const machine: FulfillmentStateMachine = buildMachine({
        async assess(): Promise<CompletenessVerdict> {
          duringAssessment = (await machine.pruneStaging(0, LATER())).pruned;
          return { complete: false, missingItems: ["claim amount"], claimId };
        },
      });

      await machine.process(submission, JANE);

      expect(duringAssessment).toEqual([]);
      expect(fs.existsSync(path.join(tempDir, claimId, "0_repair-bill.pdf"))).toBe(true);
    });
  });
});
