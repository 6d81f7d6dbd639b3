import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NotFoundError, ValidationError } from "@sitedocs/errors";
import { LocalFileStorage } from "./local-storage.js";

describe("LocalFileStorage", () => {
  let root: string;
  let storage: LocalFileStorage;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "sitedocs-storage-"));
    await mkdir(join(root, "uploads"));
    await writeFile(join(root, "uploads", "boq.pdf"), Buffer.from("%PDF-1.4 test"));
    storage = new LocalFileStorage(root);
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads bytes of a stored file", async () => {
    const bytes = await storage.read("uploads/boq.pdf");
    expect(Buffer.from(bytes).toString("utf8")).toBe("%PDF-1.4 test");
  });

  it("raises NotFoundError for a missing file", async () => {
    await expect(storage.read("uploads/missing.pdf")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects paths that leave the root", async () => {
    await expect(storage.read("../etc/passwd")).rejects.toBeInstanceOf(ValidationError);
    expect(() => storage.resolvePath("/etc/passwd")).toThrow(ValidationError);
  });

  it("rejects the root itself", () => {
    expect(() => storage.resolvePath(".")).toThrow("Storage path escapes the storage root");
  });
});
