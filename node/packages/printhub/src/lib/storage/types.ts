export type StorageKind = "local" | "s3";

export type FileInfo = {
  key: string;
  url: string;
  size: number;
  contentType?: string;
  lastModified?: number;
};

export type FileContent = {
  body: Buffer;
  contentType?: string;
};

/**
 * Object storage addressed by slash-separated keys such as
 * `projects/<id>/stl/<uuid>-model.stl`.
 */
export interface FileStorage {
  readonly kind: StorageKind;
  save(key: string, body: Buffer, contentType: string): Promise<FileInfo>;
  read(key: string): Promise<FileContent | null>;
  delete(key: string): Promise<boolean>;
  list(prefix?: string): Promise<FileInfo[]>;
  info(key: string): Promise<FileInfo | null>;
  publicUrl(key: string): string;
  presignedUrl(key: string, expiresInSeconds: number): Promise<string>;
}
