import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { NotFoundError, ValidationError } from "@sitedocs/errors";
import type { IFileStorage } from "./storage.interface.js";

/**
 * Local-disk storage rooted at a single directory. Stored paths are
 * resolved against the root and may not leave it.
 */
export class LocalFileStorage implements IFileStorage {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = resolve(rootDir);
  }

  async read(path: string): Promise<Uint8Array> {
    const fullPath = this.resolvePath(path);
    try {
      const buffer = await readFile(fullPath);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error: unknown) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new NotFoundError(`Stored file not found: ${path}`, { cause: error });
      }
      throw error;
    }
  }

  resolvePath(path: string): string {
    const fullPath = resolve(this.root, path);
    const rel = relative(this.root, fullPath);
    if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
      throw new ValidationError("Storage path escapes the storage root", { path });
    }
    return fullPath;
  }
}
