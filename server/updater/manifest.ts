import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { ManifestFileEntry, VersionManifest } from "./types.js";

export const MANIFEST_FILE_NAME = "manifest.json";

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

const manifestSchema = z.object({
  version: z.string().min(1),
  createdAt: z.string().min(1),
  files: z.array(
    z.object({
      path: z.string().min(1),
      sha256: z.string().regex(/^[0-9a-f]{64}$/),
      size: z.number().int().min(0)
    })
  )
});

function nowIso(): string {
  return new Date().toISOString();
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Normalizes a manifest path to a relative POSIX path and rejects anything that
 * could land outside the directory it is resolved against.
 */
export function normalizeManifestPath(raw: string): string {
  const unified = raw.replace(/\\/g, "/").trim();
  if (unified.length === 0 || unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) {
    throw new ManifestError(`Manifest path "${raw}" must be relative.`);
  }

  const segments = unified.split("/").filter((segment) => segment.length > 0 && segment !== ".");
  if (segments.length === 0 || segments.some((segment) => segment === "..")) {
    throw new ManifestError(`Manifest path "${raw}" escapes its directory.`);
  }

  const normalized = segments.join("/");
  if (normalized === MANIFEST_FILE_NAME) {
    throw new ManifestError(`Manifest path "${raw}" is reserved.`);
  }
  return normalized;
}

function resolveEntryPath(rootDir: string, relativePath: string): string {
  return path.join(rootDir, ...normalizeManifestPath(relativePath).split("/"));
}

export async function hashFile(filePath: string): Promise<{ sha256: string; size: number }> {
  const content = await fs.readFile(filePath);
  return {
    sha256: createHash("sha256").update(content).digest("hex"),
    size: content.byteLength
  };
}

function isExcluded(relativePath: string, excludePaths: readonly string[]): boolean {
  return excludePaths.some((excluded) => {
    const normalized = excluded.replace(/\\/g, "/").replace(/^\/+|\/+$/g, "");
    return normalized.length > 0 && (relativePath === normalized || relativePath.startsWith(`${normalized}/`));
  });
}

/**
 * Lists regular files under `rootDir` as sorted relative POSIX paths. The top-level
 * manifest file and anything under `excludePaths` are left out.
 */
export async function listDirectoryFiles(rootDir: string, excludePaths: readonly string[] = []): Promise<string[]> {
  const collected: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const absoluteDir = relativeDir.length > 0 ? path.join(rootDir, ...relativeDir.split("/")) : rootDir;
    const entries = await fs.readdir(absoluteDir, { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = relativeDir.length > 0 ? `${relativeDir}/${entry.name}` : entry.name;
      if (isExcluded(relativePath, excludePaths)) {
        continue;
      }
      if (entry.isDirectory()) {
        await walk(relativePath);
        continue;
      }
      if (entry.isFile() && relativePath !== MANIFEST_FILE_NAME) {
        collected.push(relativePath);
      }
    }
  };

  try {
    await walk("");
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }

  return collected.sort();
}

export async function buildManifest(
  version: string,
  rootDir: string,
  relativePaths: readonly string[]
): Promise<VersionManifest> {
  const files: ManifestFileEntry[] = [];
  const seen = new Set<string>();
  for (const rawPath of relativePaths) {
    const relativePath = normalizeManifestPath(rawPath);
    if (seen.has(relativePath)) {
      continue;
    }
    seen.add(relativePath);
    const { sha256, size } = await hashFile(resolveEntryPath(rootDir, relativePath));
    files.push({ path: relativePath, sha256, size });
  }

  files.sort((left, right) => left.path.localeCompare(right.path));
  return {
    version,
    createdAt: nowIso(),
    files
  };
}

export function parseManifest(raw: unknown): VersionManifest {
  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestError(`Invalid version manifest: ${result.error.issues[0]?.message ?? "unknown issue"}`);
  }

  return {
    version: result.data.version,
    createdAt: result.data.createdAt,
    files: result.data.files.map((entry) => ({
      path: normalizeManifestPath(entry.path),
      sha256: entry.sha256,
      size: entry.size
    }))
  };
}

export async function readManifest(dir: string): Promise<VersionManifest | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(dir, MANIFEST_FILE_NAME), "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ManifestError(`Manifest in ${dir} is not valid JSON.`);
  }
  return parseManifest(parsed);
}

export async function writeManifest(dir: string, manifest: VersionManifest): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, MANIFEST_FILE_NAME), `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
}

/**
 * Throws when a listed file is missing from `dir` or its contents no longer match.
 */
export async function verifyManifest(dir: string, manifest: VersionManifest): Promise<void> {
  const problems: string[] = [];
  for (const entry of manifest.files) {
    try {
      const { sha256 } = await hashFile(resolveEntryPath(dir, entry.path));
      if (sha256 !== entry.sha256) {
        problems.push(`${entry.path} (checksum mismatch)`);
      }
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      problems.push(`${entry.path} (missing)`);
    }
  }

  if (problems.length > 0) {
    throw new ManifestError(`Version ${manifest.version} is incomplete: ${problems.join(", ")}`);
  }
}

export async function copyRelativeFiles(
  relativePaths: readonly string[],
  fromDir: string,
  toDir: string
): Promise<void> {
  for (const relativePath of relativePaths) {
    const target = resolveEntryPath(toDir, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(resolveEntryPath(fromDir, relativePath), target);
  }
}

/**
 * Deletes files that `outgoing` listed but `incoming` does not, so the directory
 * holds exactly the incoming version's files (excluded paths aside).
 */
export async function removeOutgoingFiles(
  dir: string,
  incoming: Pick<VersionManifest, "files">,
  outgoing: Pick<VersionManifest, "files">
): Promise<string[]> {
  const keep = new Set(incoming.files.map((entry) => entry.path));
  const removed: string[] = [];
  for (const entry of outgoing.files) {
    if (keep.has(entry.path)) {
      continue;
    }
    await fs.rm(resolveEntryPath(dir, entry.path), { force: true });
    removed.push(entry.path);
  }
  return removed;
}
