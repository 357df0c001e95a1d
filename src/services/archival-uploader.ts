/**
 * Archival Uploader
 *
 * Puts a completed claim's mail content and attachments into blob storage
 * under deterministic keys, so a retried upload overwrites rather than
 * duplicates.
 */

import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { PartialUploadFailure, toTransient } from "../errors.js";
import type { SubmissionAttachment } from "../types/submission.js";

export interface BlobStore {
  /** Store the bytes and return a URL they can be read back from. */
  put(
    content: Buffer,
    key: string,
    contentType: string,
    metadata?: Record<string, string>
  ): Promise<string>;

  /** A new time-limited URL for an object already stored under `key`. */
  signedUrl(key: string): Promise<string>;
}

export interface S3BlobStoreOptions {
  bucket: string;
  region: string;
  urlExpirySeconds: number;
}

export class S3BlobStore implements BlobStore {
  private client: S3Client;

  constructor(private readonly options: S3BlobStoreOptions, client?: S3Client) {
    this.client = client ?? new S3Client({ region: options.region });
  }

  async put(
    content: Buffer,
    key: string,
    contentType: string,
    metadata: Record<string, string> = {}
  ): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: content,
        ContentType: contentType,
        Metadata: metadata,
      })
    );

    return this.signedUrl(key);
  }

  async signedUrl(key: string): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.options.bucket, Key: key }),
      { expiresIn: this.options.urlExpirySeconds }
    );
  }
}

/** Object-key safe version of a filename. */
export function sanitizeKeySegment(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._@+-]+/g, "_").replace(/^\.+/, "");
  return cleaned || "file";
}

export interface ClaimArtifacts {
  senderAddress: string;
  claimId: string;
  mailContent: string;
  attachments: SubmissionAttachment[];
}

export interface ArchivedKeys {
  mailContentKey: string;
  attachmentKeys: string[];
}

export interface ArchivedUrls {
  mailContentUrl: string;
  attachmentUrls: string[];
}

export type UploadedArtifacts = ArchivedKeys & ArchivedUrls;

export class ArchivalUploader {
  private readonly prefix: string;

  constructor(private readonly store: BlobStore, prefix: string) {
    this.prefix = prefix.replace(/^\/+|\/+$/g, "");
  }

  private claimRoot(senderAddress: string, claimId: string): string {
    const root = `${sanitizeKeySegment(senderAddress)}/claims/${claimId}`;
    return this.prefix ? `${this.prefix}/${root}` : root;
  }

  mailContentKey(senderAddress: string, claimId: string): string {
    return `${this.claimRoot(senderAddress, claimId)}/mail_content.txt`;
  }

  attachmentKey(senderAddress: string, claimId: string, index: number, filename: string): string {
    return `${this.claimRoot(senderAddress, claimId)}/attachments/${index}_${sanitizeKeySegment(filename)}`;
  }

  /**
   * Upload one artifact. No retry here: the caller decides what a failure
   * means for the claim.
   */
  async upload(
    content: Buffer,
    key: string,
    contentType: string,
    metadata?: Record<string, string>
  ): Promise<string> {
    try {
      return await this.store.put(content, key, contentType, metadata);
    } catch (err) {
      throw toTransient("blob store", err);
    }
  }

  /**
   * Upload mail content, then each attachment in order. Stops at the first
   * failure with a PartialUploadFailure.
   */
  async uploadClaim(artifacts: ClaimArtifacts): Promise<UploadedArtifacts> {
    const { senderAddress, claimId } = artifacts;
    const total = artifacts.attachments.length + 1;
    const metadata = { "claim-id": claimId, sender: senderAddress };
    let uploaded = 0;

    try {
      const mailContentKey = this.mailContentKey(senderAddress, claimId);
      const mailContentUrl = await this.upload(
        Buffer.from(artifacts.mailContent, "utf-8"),
        mailContentKey,
        "text/plain; charset=utf-8",
        metadata
      );
      uploaded++;

      const attachmentKeys: string[] = [];
      const attachmentUrls: string[] = [];
      for (const [index, attachment] of artifacts.attachments.entries()) {
        const key = this.attachmentKey(senderAddress, claimId, index, attachment.filename);
        attachmentUrls.push(await this.upload(attachment.content, key, attachment.contentType, metadata));
        attachmentKeys.push(key);
        uploaded++;
      }

      return { mailContentKey, mailContentUrl, attachmentKeys, attachmentUrls };
    } catch (err) {
      throw new PartialUploadFailure(uploaded, total, { cause: err });
    }
  }

  /**
   * Re-sign download URLs for archived objects; the URLs stored at upload
   * time expire.
   */
  async signedUrls(keys: ArchivedKeys): Promise<ArchivedUrls> {
    try {
      return {
        mailContentUrl: await this.store.signedUrl(keys.mailContentKey),
        attachmentUrls: await Promise.all(
          keys.attachmentKeys.map((key) => this.store.signedUrl(key))
        ),
      };
    } catch (err) {
      throw toTransient("blob store", err);
    }
  }
}
