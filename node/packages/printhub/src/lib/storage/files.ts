/**
 * Upload validation and file naming
 */

import { extname, posix } from "path";
import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "../core/index.js";

const UNSAFE_CHARS = /[/\\:*?"<>|]/g;

// Folders and keys: letters, digits, dot, underscore, hyphen, slash
const SAFE_KEY_REGEX = /^[a-zA-Z0-9._\-/]+$/;

const CONTENT_TYPES: Record<string, string> = {
  ".stl": "model/stl",
  ".obj": "model/obj",
  ".3mf": "model/3mf",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".pdf": "application/pdf",
};

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp"];

export const MODEL_EXTENSIONS = [".stl", ".obj", ".3mf"];

export type FileCategory = "model" | "image" | "document" | "other";

export function fileCategory(filename: string): FileCategory {
  const ext = fileExtension(filename);
  if (MODEL_EXTENSIONS.includes(ext)) return "model";
  if (IMAGE_EXTENSIONS.includes(ext)) return "image";
  if (ext === ".pdf") return "document";
  return "other";
}

/**
 * Replace path separators and other unsafe characters with `_`,
 * trim surrounding spaces and strip leading dots
 */
export function sanitizeFilename(filename: string): string {
  const sanitized = filename
    .replace(UNSAFE_CHARS, "_")
    .trim()
    .replace(/^\.+/, "");
  return sanitized.length > 0
    ? sanitized
    : `file_${uuidv4().replace(/-/g, "").slice(0, 8)}`;
}

/**
 * Storage name for an upload: uuid prefix plus the sanitized name,
 * reduced to key-safe characters
 */
export function uniqueFilename(originalFilename: string): string {
  const safe = sanitizeFilename(originalFilename).replace(/[^a-zA-Z0-9._-]/g, "_");
  return `${uuidv4()}-${safe}`;
}

export function fileExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[fileExtension(filename)] ?? "application/octet-stream";
}

export type UploadRules = {
  allowedExtensions: string[];
  maxFileSize: number;
};

export function validateUpload(
  filename: string,
  size: number,
  rules: UploadRules,
): void {
  if (!filename) {
    throw new ValidationError("File name is required");
  }
  const ext = fileExtension(filename);
  if (!rules.allowedExtensions.includes(ext)) {
    throw new ValidationError(
      `File type ${ext || "(none)"} is not allowed. Allowed: ${rules.allowedExtensions.join(", ")}`,
    );
  }
  if (size === 0) {
    throw new ValidationError("File is empty");
  }
  if (size > rules.maxFileSize) {
    throw new ValidationError(
      `File exceeds maximum size of ${rules.maxFileSize} bytes`,
    );
  }
}

/**
 * Validate a storage key or folder: relative, no `..` segments
 */
export function validateKey(key: string, kind: "key" | "folder" = "key"): string {
  const trimmed = key.replace(/^\/+|\/+$/g, "");
  if (
    trimmed.length === 0 ||
    !SAFE_KEY_REGEX.test(trimmed) ||
    trimmed.split("/").some((segment) => segment === ".." || segment === "")
  ) {
    throw new ValidationError(`Invalid ${kind}: "${key}"`);
  }
  return trimmed;
}

export function buildKey(folder: string, originalFilename: string): string {
  return posix.join(validateKey(folder, "folder"), uniqueFilename(originalFilename));
}
