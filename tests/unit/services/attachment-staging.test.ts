import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  AttachmentStager,
  contentTypeFor,
  sanitizeFilename,
} from "../../../src/services/attachment-staging.js";

const CLAIM = "CLAIM_1A2B3C4D_20260105";

describe("AttachmentStager", () => {
  let tempDir: string;
  let stager: AttachmentStager;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "staging-"));
    stager = new AttachmentStager(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("stages attachments under numbered, sanitized names", async () => {
    const paths = await stager.stage(
      CLAIM,
      [
        { filename: "bill.pdf", content: Buffer.from("bill"), contentType: "application/pdf" },
        { filename: "front bumper.png", content: Buffer.from("png"), contentType: "image/png" },
      ],
      0
    );

    expect(paths).toEqual([
      path.join(tempDir, CLAIM, "0_bill.pdf"),
      path.join(tempDir, CLAIM, "1_front_bumper.png"),
    ]);
    expect(fs.readFileSync(paths[1] ?? "", "utf-8")).toBe("png");
  });

  it("continues numbering after earlier exchanges", async () => {
    const paths = await stager.stage(
      CLAIM,
      [{ filename: "report.pdf", content: Buffer.from("r"), contentType: "application/pdf" }],
      2
    );

    expect(paths).toEqual([path.join(tempDir, CLAIM, "2_report.pdf")]);
  });

  it("reads staged files back with their original names", async () => {
    const paths = await stager.stage(
      CLAIM,
      [{ filename: "photo.JPG", content: Buffer.from("jpeg"), contentType: "image/jpeg" }],
      0
    );

    const [attachment] = await stager.read(paths);
    expect(attachment?.filename).toBe("photo.JPG");
    expect(attachment?.contentType).toBe("image/jpeg");
    expect(attachment?.content.toString()).toBe("jpeg");
  });

  it("removes staged files and the claim directory", async () => {
    const paths = await stager.stage(
      CLAIM,
      [{ filename: "bill.pdf", content: Buffer.from("bill"), contentType: "application/pdf" }],
      0
    );

    const result = await stager.cleanup(CLAIM, paths);

    expect(result).toEqual({ removed: 1, failed: [] });
    expect(fs.existsSync(stager.claimDir(CLAIM))).toBe(false);
  });

  it("writes nothing for a message without attachments", async () => {
    expect(await stager.stage(CLAIM, [], 0)).toEqual([]);
    expect(fs.existsSync(stager.claimDir(CLAIM))).toBe(false);
  });

  describe("pruneOlderThan", () => {
    const NOW = new Date("2026-01-10T12:00:00Z");
    const DAY_MS = 24 * 60 * 60 * 1000;

    function stageDir(claimId: string, modifiedAt: Date): string {
      const dir = stager.claimDir(claimId);
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(path.join(dir, "0_bill.pdf"), "bill");
      fs.utimesSync(dir, modifiedAt, modifiedAt);
      return dir;
    }

    it("removes old directories and leaves recent ones", async () => {
      const old = stageDir("CLAIM_00000001_20260101", new Date("2026-01-08T12:00:00Z"));
      const recent = stageDir("CLAIM_00000002_20260110", new Date("2026-01-10T06:00:00Z"));

      const result = await stager.pruneOlderThan(DAY_MS, () => false, NOW);

      expect(result).toEqual({ pruned: ["CLAIM_00000001_20260101"], failed: [] });
      expect(fs.existsSync(old)).toBe(false);
      expect(fs.existsSync(recent)).toBe(true);
    });

    it("skips claims the caller keeps, however old", async () => {
      const kept = stageDir("CLAIM_00000003_20260101", new Date("2026-01-01T00:00:00Z"));
      stageDir("CLAIM_00000004_20260101", new Date("2026-01-01T00:00:00Z"));

      const result = await stager.pruneOlderThan(
        DAY_MS,
        (claimId) => claimId === "CLAIM_00000003_20260101",
        NOW
      );

      expect(result.pruned).toEqual(["CLAIM_00000004_20260101"]);
      expect(fs.existsSync(path.join(kept, "0_bill.pdf"))).toBe(true);
    });

    it("ignores loose files in the staging root", async () => {
      fs.writeFileSync(path.join(tempDir, "notes.txt"), "x");

      const result = await stager.pruneOlderThan(0, () => false, NOW);

      expect(result).toEqual({ pruned: [], failed: [] });
      expect(fs.existsSync(path.join(tempDir, "notes.txt"))).toBe(true);
    });

    it("returns nothing when the staging root does not exist yet", async () => {
      const missing = new AttachmentStager(path.join(tempDir, "absent"));
      expect(await missing.pruneOlderThan(DAY_MS, () => false, NOW)).toEqual({
        pruned: [],
        failed: [],
      });
    });
  });
});

describe("filename helpers", () => {
  it("strips directories and unsafe characters", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\Users\\jane\\claim form (1).pdf")).toBe("claim_form_1_.pdf");
    expect(sanitizeFilename("...")).toBe("attachment");
  });

  it("maps extensions to content types", () => {
    expect(contentTypeFor("scan.PDF")).toBe("application/pdf");
    expect(contentTypeFor("notes")).toBe("application/octet-stream");
  });
});
