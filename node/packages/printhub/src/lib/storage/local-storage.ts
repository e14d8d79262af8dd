import { resolve, sep, dirname, relative } from "path";
import { mkdir, readFile, readdir, stat, unlink, writeFile } from "fs/promises";
import { createLogger } from "../logger/index.js";
import { ValidationError } from "../core/index.js";
import { contentTypeFor, validateKey } from "./files.js";
import type { FileContent, FileInfo, FileStorage } from "./types.js";

const logger = createLogger("printhub:storage:local");

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Files on local disk under `rootDir`, served by the API at
 * `<publicBaseUrl>/<key>`.
 */
export class LocalStorage implements FileStorage {
  readonly kind = "local" as const;
  private root: string;

  constructor(
    rootDir: string,
    private publicBaseUrl: string = "/api/v1/files/raw",
  ) {
    this.root = resolve(rootDir);
  }

  /**
   * Resolve a key inside the storage root; anything escaping it is rejected
   */
  resolvePath(key: string): string {
    const resolvedPath = resolve(this.root, validateKey(key));
    if (!resolvedPath.startsWith(this.root + sep)) {
      logger.error("Path traversal attempt detected", { key });
      throw new ValidationError("Path traversal attempt detected");
    }
    return resolvedPath;
  }

  async save(key: string, body: Buffer, contentType: string): Promise<FileInfo> {
    const path = this.resolvePath(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, body);
    logger.info("Stored file", { key, size: body.length });
    return {
      key,
      url: this.publicUrl(key),
      size: body.length,
      contentType,
      lastModified: Date.now(),
    };
  }

  async read(key: string): Promise<FileContent | null> {
    try {
      const body = await readFile(this.resolvePath(key));
      return { body, contentType: contentTypeFor(key) };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.resolvePath(key));
      logger.info("Deleted file", { key });
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async list(prefix?: string): Promise<FileInfo[]> {
    const start = prefix ? this.resolvePath(prefix) : this.root;
    const files: FileInfo[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true }).catch(
        (error: unknown) => {
          if (isNotFound(error)) return null;
          throw error;
        },
      );
      if (!entries) return;
      for (const entry of entries) {
        const full = resolve(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          const key = relative(this.root, full).split(sep).join("/");
          const info = await stat(full);
          files.push({
            key,
            url: this.publicUrl(key),
            size: info.size,
            contentType: contentTypeFor(key),
            lastModified: info.mtimeMs,
          });
        }
      }
    };

    await walk(start);
    return files.sort((a, b) => a.key.localeCompare(b.key));
  }

  async info(key: string): Promise<FileInfo | null> {
    try {
      const info = await stat(this.resolvePath(key));
      if (!info.isFile()) return null;
      return {
        key,
        url: this.publicUrl(key),
        size: info.size,
        contentType: contentTypeFor(key),
        lastModified: info.mtimeMs,
      };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  publicUrl(key: string): string {
    return `${this.publicBaseUrl}/${key}`;
  }

  async presignedUrl(_key: string, _expiresInSeconds: number): Promise<string> {
    throw new ValidationError("Presigned URLs require S3 storage");
  }
}
