import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * A file part for multipart uploads: binary content plus the file name sent
 * in the part's `Content-Disposition`.
 */
export class FileUpload {
  readonly blob: Blob;
  readonly filename: string;

  constructor(blob: Blob, filename: string) {
    this.blob = blob;
    this.filename = filename;
  }

  /**
   * Opens a file from disk without reading it into memory up front.
   * The file name defaults to the path's base name.
   */
  static async fromPath(path: string, filename: string = basename(path)): SafeWrapAsync<Error, FileUpload> {
    const [err, blob] = await safeWrapAsync(() => openAsBlob(path));
    if (err) {
      return [new Error(`error opening ${path} for upload`, { cause: err }), null];
    }

    return [null, new FileUpload(blob, filename)];
  }
}

/** Type guard for values that are multipart file parts. */
export function isFilePart(value: unknown): value is Blob | FileUpload {
  return value instanceof Blob || value instanceof FileUpload;
}
