import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  buildManifest,
  listDirectoryFiles,
  ManifestError,
  normalizeManifestPath,
  parseManifest,
  readManifest,
  removeOutgoingFiles,
  verifyManifest,
  writeManifest
} from "../../server/updater/manifest.js";
import { createTempDir, writeTree } from "../helpers/tempDir.js";

const helloSha256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

describe("version manifest", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const temp = await createTempDir();
    dir = temp.dir;
    cleanup = temp.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  it("normalizes relative paths and rejects escapes", () => {
    expect(normalizeManifestPath("lib\\./util.js")).toBe("lib/util.js");
    expect(() => normalizeManifestPath("../etc/passwd")).toThrow(ManifestError);
    expect(() => normalizeManifestPath("/etc/passwd")).toThrow("must be relative");
    expect(() => normalizeManifestPath("manifest.json")).toThrow("is reserved");
  });

  it("lists files sorted, skipping excluded paths and the manifest itself", async () => {
    await writeTree(dir, {
      "index.js": "main",
      "lib/util.js": "util",
      "data/state.db": "runtime",
      "node_modules/pkg/index.js": "dep",
      "manifest.json": "{}"
    });

    expect(await listDirectoryFiles(dir, ["data", "node_modules"])).toEqual(["index.js", "lib/util.js"]);
    expect(await listDirectoryFiles(path.join(dir, "missing"))).toEqual([]);
  });

  it("hashes listed files and round-trips through disk", async () => {
    await writeTree(dir, { "b.txt": "hello", "a/c.txt": "hello" });

    const manifest = await buildManifest("v1", dir, ["b.txt", "a/c.txt", "b.txt"]);
    expect(manifest.version).toBe("v1");
    expect(manifest.files).toEqual([
      { path: "a/c.txt", sha256: helloSha256, size: 5 },
      { path: "b.txt", sha256: helloSha256, size: 5 }
    ]);

    await writeManifest(dir, manifest);
    expect(await readManifest(dir)).toEqual(manifest);
    expect(await readManifest(path.join(dir, "a"))).toBeNull();
  });

  it("rejects manifests with unsafe paths", () => {
    expect(() =>
      parseManifest({
        version: "v1",
        createdAt: "2026-03-01T00:00:00.000Z",
        files: [{ path: "../outside.js", sha256: helloSha256, size: 5 }]
      })
    ).toThrow("escapes its directory");
  });

  it("reports missing and modified files", async () => {
    await writeTree(dir, { "a.txt": "hello", "b.txt": "hello" });
    const manifest = await buildManifest("v1", dir, ["a.txt", "b.txt"]);

    await writeFile(path.join(dir, "a.txt"), "tampered", "utf8");
    await writeFile(path.join(dir, "b.txt"), "hello", "utf8");
    await expect(verifyManifest(dir, manifest)).rejects.toThrow("Version v1 is incomplete: a.txt (checksum mismatch)");

    const withMissing = { ...manifest, files: [...manifest.files, { path: "c.txt", sha256: helloSha256, size: 5 }] };
    await writeFile(path.join(dir, "a.txt"), "hello", "utf8");
    await expect(verifyManifest(dir, withMissing)).rejects.toThrow("Version v1 is incomplete: c.txt (missing)");
  });

  it("removes files only the outgoing version listed", async () => {
    await writeTree(dir, { "keep.js": "k", "old.js": "o", "data/state.db": "runtime" });
    const entry = { sha256: helloSha256, size: 5 };

    const removed = await removeOutgoingFiles(
      dir,
      { files: [{ path: "keep.js", ...entry }] },
      { files: [{ path: "keep.js", ...entry }, { path: "old.js", ...entry }] }
    );

    expect(removed).toEqual(["old.js"]);
    expect(await listDirectoryFiles(dir)).toEqual(["data/state.db", "keep.js"]);
    expect(await readFile(path.join(dir, "data", "state.db"), "utf8")).toBe("runtime");
  });
});
