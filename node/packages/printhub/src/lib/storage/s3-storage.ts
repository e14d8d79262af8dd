import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NotFound,
  NoSuchKey,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { createLogger } from "../logger/index.js";
import { validateKey } from "./files.js";
import type { FileContent, FileInfo, FileStorage } from "./types.js";

const logger = createLogger("printhub:storage:s3");

export type S3StorageConfig = {
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  region: string;
  endpoint?: string;
};

/**
 * S3-compatible object storage (AWS, MinIO, Yandex Object Storage, ...)
 */
export class S3Storage implements FileStorage {
  readonly kind = "s3" as const;
  private client: S3Client;

  constructor(private config: S3StorageConfig) {
    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.endpoint !== undefined,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  async save(key: string, body: Buffer, contentType: string): Promise<FileInfo> {
    const safeKey = validateKey(key);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: safeKey,
        Body: body,
        ContentType: contentType,
      }),
    );
    logger.info("Uploaded object", { key: safeKey, size: body.length });
    return {
      key: safeKey,
      url: this.publicUrl(safeKey),
      size: body.length,
      contentType,
      lastModified: Date.now(),
    };
  }

  async read(key: string): Promise<FileContent | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.config.bucket, Key: validateKey(key) }),
      );
      if (!response.Body) return null;
      const bytes = await response.Body.transformToByteArray();
      return { body: Buffer.from(bytes), contentType: response.ContentType };
    } catch (error) {
      if (error instanceof NoSuchKey) return null;
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    const existing = await this.info(key);
    if (!existing) return false;
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.config.bucket, Key: existing.key }),
    );
    logger.info("Deleted object", { key: existing.key });
    return true;
  }

  async list(prefix?: string): Promise<FileInfo[]> {
    const files: FileInfo[] = [];
    let continuationToken: string | undefined;
    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.config.bucket,
          Prefix: prefix ? validateKey(prefix, "folder") : undefined,
          ContinuationToken: continuationToken,
        }),
      );
      for (const object of response.Contents ?? []) {
        if (!object.Key) continue;
        files.push({
          key: object.Key,
          url: this.publicUrl(object.Key),
          size: object.Size ?? 0,
          lastModified: object.LastModified?.getTime(),
        });
      }
      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);
    return files;
  }

  async info(key: string): Promise<FileInfo | null> {
    const safeKey = validateKey(key);
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.config.bucket, Key: safeKey }),
      );
      return {
        key: safeKey,
        url: this.publicUrl(safeKey),
        size: response.ContentLength ?? 0,
        contentType: response.ContentType,
        lastModified: response.LastModified?.getTime(),
      };
    } catch (error) {
      if (error instanceof NotFound) return null;
      throw error;
    }
  }

  publicUrl(key: string): string {
    if (this.config.endpoint) {
      return `${this.config.endpoint.replace(/\/+$/, "")}/${this.config.bucket}/${key}`;
    }
    return `https://${this.config.bucket}.s3.${this.config.region}.amazonaws.com/${key}`;
  }

  async presignedUrl(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.config.bucket, Key: validateKey(key) }),
      { expiresIn: expiresInSeconds },
    );
  }
}
