/**
 * ## LocalDiskFileStore
 *
 * `FileStore` over a single upload directory. Stored paths are generated file
 * names (`<uuid v7><ext>`) relative to that directory; nothing outside it is
 * ever read or removed.
 *
 * @example
 * ```typescript
 * const store = new LocalDiskFileStore({ uploadDir: config.uploadDir });
 *
 * const storedPath = await store.store(bytes, "Cover.JPG"); // "0190a7c4-...-1234.jpg"
 * await store.delete(storedPath);
 * ```
 */

import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { NotFoundError, uuidv7 } from "@atrium/core";
import type { FileStore } from "../types.js";

export interface LocalDiskFileStoreOptions {
  uploadDir: string;
}

export class PathOutsideUploadDirError extends Error {
  readonly storedPath: string;

  constructor(storedPath: string) {
    super(`Refusing to access ${storedPath}: outside the upload directory`);
    this.name = "PathOutsideUploadDirError";
    this.storedPath = storedPath;
  }
}

/**
 * Lower-cased extension of `name` with a leading dot, letters and digits only;
 * empty when there is none.
 */
export function extensionOf(name: string): string {
  const cleaned = path.extname(name).slice(1).toLowerCase().replace(/[^a-z0-9]/g, "");
  return cleaned ? `.${cleaned}` : "";
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class LocalDiskFileStore implements FileStore {
  readonly uploadDir: string;

  constructor(options: LocalDiskFileStoreOptions) {
    this.uploadDir = path.resolve(options.uploadDir);
  }

  async store(bytes: Uint8Array, suggestedName: string): Promise<string> {
    await mkdir(this.uploadDir, { recursive: true });
    const fileName = `${uuidv7()}${extensionOf(suggestedName)}`;
    await writeFile(path.join(this.uploadDir, fileName), bytes, { flag: "wx" });
    return fileName;
  }

  /**
   * A missing file counts as deleted.
   *
   * @throws PathOutsideUploadDirError if `storedPath` escapes the upload directory
   */
  async delete(storedPath: string): Promise<void> {
    if (storedPath === "") {
      return;
    }
    const target = this.resolve(storedPath);
    try {
      await rm(target);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
  }

  /**
   * Absolute path of a stored file.
   *
   * @throws NotFoundError if the file does not exist
   * @throws PathOutsideUploadDirError if `storedPath` escapes the upload directory
   */
  async locate(storedPath: string): Promise<string> {
    const target = this.resolve(storedPath);
    try {
      await stat(target);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError("StoredFile", storedPath);
      }
      throw error;
    }
    return target;
  }

  /**
   * @throws PathOutsideUploadDirError if `storedPath` escapes the upload directory
   */
  resolve(storedPath: string): string {
    const target = path.resolve(this.uploadDir, storedPath);
    const relative = path.relative(this.uploadDir, target);
    if (
      relative === "" ||
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new PathOutsideUploadDirError(storedPath);
    }
    return target;
  }
}
