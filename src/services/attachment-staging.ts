/**
 * Attachment Staging
 *
 * Local copies of a claim's attachments under `<root>/<claimId>/`, kept
 * until the claim is archived. File names are `<index>_<filename>` so the
 * same attachment always lands on the same path.
 */

import type { Dirent } from "node:fs";
import { mkdir, readFile, readdir, rm, rmdir, stat, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { toTransient } from "../errors.js";
import type { SubmissionAttachment } from "../types/submission.js";

const STAGING = "attachment staging";

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".txt": "text/plain",
  ".csv": "text/csv",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".zip": "application/zip",
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] ?? "application/octet-stream";
}

export function sanitizeFilename(filename: string): string {
  const cleaned = basename(filename.replace(/\\/g, "/"))
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^\.+/, "");
  return cleaned || "attachment";
}

/** Staged name for the attachment at `index`, e.g. `2_receipt.pdf`. */
export function stagedName(index: number, filename: string): string {
  return `${index}_${sanitizeFilename(filename)}`;
}

/** Original (sanitized) filename of a staged file. */
export function originalName(stagedPath: string): string {
  return basename(stagedPath).replace(/^\d+_/, "");
}

export interface CleanupResult {
  removed: number;
  failed: string[];
}

export interface PruneResult {
  /** Claim directories deleted */
  pruned: string[];
  failed: string[];
}

export class AttachmentStager {
  constructor(private readonly rootDir: string) {}

  claimDir(claimId: string): string {
    return join(this.rootDir, claimId);
  }

  /**
   * Write attachments to disk, numbering from `startIndex`. Returns the
   * staged paths in attachment order.
   */
  async stage(
    claimId: string,
    attachments: SubmissionAttachment[],
    startIndex: number
  ): Promise<string[]> {
    if (attachments.length === 0) return [];

    const dir = this.claimDir(claimId);
    try {
      await mkdir(dir, { recursive: true });
      const paths: string[] = [];
      for (const [offset, attachment] of attachments.entries()) {
        const path = join(dir, stagedName(startIndex + offset, attachment.filename));
        await writeFile(path, attachment.content);
        paths.push(path);
      }
      return paths;
    } catch (err) {
      throw toTransient(STAGING, err);
    }
  }

  /** Read staged files back as attachments. */
  async read(paths: string[]): Promise<SubmissionAttachment[]> {
    try {
      return await Promise.all(
        paths.map(async (path) => {
          const filename = originalName(path);
          return {
            filename,
            content: await readFile(path),
            contentType: contentTypeFor(filename),
          };
        })
      );
    } catch (err) {
      throw toTransient(STAGING, err);
    }
  }

  /**
   * Delete staged files and the claim directory once it is empty. Never
   * throws; failures are reported in the result.
   */
  async cleanup(claimId: string, paths: string[]): Promise<CleanupResult> {
    const result: CleanupResult = { removed: 0, failed: [] };

    for (const path of paths) {
      try {
        await rm(path, { force: true });
        result.removed++;
      } catch {
        result.failed.push(path);
      }
    }

    const dir = this.claimDir(claimId);
    try {
      const remaining = await readdir(dir);
      if (remaining.length === 0) {
        await rmdir(dir);
      }
    } catch (err) {
      if (!isMissing(err)) result.failed.push(dir);
    }

    return result;
  }

  /**
   * Delete claim directories not modified for `maxAgeMs`, except claims
   * for which `keep` answers true. Never throws for a single directory;
   * those land in `failed`.
   */
  async pruneOlderThan(
    maxAgeMs: number,
    keep: (claimId: string) => boolean,
    now: Date = new Date()
  ): Promise<PruneResult> {
    const result: PruneResult = { pruned: [], failed: [] };
    const cutoff = now.getTime() - maxAgeMs;

    let entries: Dirent[];
    try {
      entries = await readdir(this.rootDir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return result;
      throw toTransient(STAGING, err);
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || keep(entry.name)) continue;

      const dir = this.claimDir(entry.name);
      try {
        const { mtimeMs } = await stat(dir);
        if (mtimeMs >= cutoff) continue;
        await rm(dir, { recursive: true, force: true });
        result.pruned.push(entry.name);
      } catch (err) {
        if (!isMissing(err)) result.failed.push(dir);
      }
    }

    return result;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
