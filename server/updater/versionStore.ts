import fs from "node:fs";
import { rm } from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import { z } from "zod";

import { toErrorMessage } from "../abort.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import {
  buildManifest,
  copyRelativeFiles,
  listDirectoryFiles,
  readManifest,
  removeOutgoingFiles,
  verifyManifest,
  writeManifest
} from "./manifest.js";
import type { VersionHistorySnapshot, VersionIdentifier, VersionManifest } from "./types.js";

export const HISTORY_FILE_NAME = "versions.json";

export class VersionStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VersionStoreError";
  }
}

export interface VersionStoreOptions {
  versionsDir: string;
  maxVersions: number;
  logger: SupervisorLogger;
  /** Live-directory paths that never belong to a version (runtime data, logs). */
  excludePaths?: string[];
}

const historySchema = z.object({
  versions: z.array(z.string())
});

function normalizeHistory(raw: unknown): VersionIdentifier[] {
  const parsed = historySchema.parse(raw);
  const seen = new Set<string>();
  const versions: VersionIdentifier[] = [];
  for (const entry of parsed.versions) {
    const version = entry.trim();
    if (version.length === 0 || seen.has(version)) {
      continue;
    }
    seen.add(version);
    versions.push(version);
  }
  return versions;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Maps an identifier to a directory name. Characters outside [A-Za-z0-9._-] are
 * percent-encoded byte by byte, so distinct identifiers never share a directory.
 */
export function encodeVersionSegment(version: VersionIdentifier): string {
  const trimmed = version.trim();
  if (trimmed.length === 0) {
    throw new VersionStoreError("Version identifier must not be empty.");
  }

  let encoded = "";
  for (const byte of Buffer.from(trimmed, "utf8")) {
    const char = String.fromCharCode(byte);
    encoded += /[A-Za-z0-9._-]/.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }

  if (encoded === "." || encoded === "..") {
    throw new VersionStoreError(`Version identifier "${version}" cannot name a directory.`);
  }
  return encoded;
}

export class VersionStore {
  readonly versionsDir: string;
  readonly historyPath: string;
  readonly maxVersions: number;
  private readonly logger: SupervisorLogger;
  private readonly excludePaths: string[];
  private versions: VersionIdentifier[];

  constructor(options: VersionStoreOptions) {
    this.versionsDir = options.versionsDir;
    this.historyPath = path.join(options.versionsDir, HISTORY_FILE_NAME);
    this.maxVersions = Math.max(1, Math.trunc(options.maxVersions));
    this.logger = options.logger;
    this.excludePaths = options.excludePaths ?? [];

    fs.mkdirSync(this.versionsDir, { recursive: true });
    this.versions = this.load();
    this.logger.info(`Version history: [${this.versions.join(", ")}]`);
  }

  private load(): VersionIdentifier[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.historyPath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      this.logger.error(`Unable to read version history ${this.historyPath}.`, error);
      return [];
    }

    try {
      return normalizeHistory(JSON.parse(raw));
    } catch (error) {
      this.logger.error(`Version history ${this.historyPath} is corrupt; starting empty.`, error);
      return [];
    }
  }

  private persist(versions: VersionIdentifier[]): void {
    const snapshot: VersionHistorySnapshot = { versions };
    const tempPath = `${this.historyPath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.historyPath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
      fs.renameSync(tempPath, this.historyPath);
    } catch (error) {
      throw new VersionStoreError(`Unable to persist version history: ${toErrorMessage(error)}`);
    }
  }

  hasHistory(): boolean {
    return this.versions.length > 0;
  }

  getHistory(): VersionIdentifier[] {
    return [...this.versions];
  }

  getCurrent(): VersionIdentifier | null {
    return this.versions.at(-1) ?? null;
  }

  getPrevious(): VersionIdentifier | null {
    return this.versions.length > 1 ? (this.versions.at(-2) ?? null) : null;
  }

  versionDir(version: VersionIdentifier): string {
    return path.join(this.versionsDir, encodeVersionSegment(version));
  }

  /**
   * Records `version` as current. The new history is written before it replaces the
   * in-memory copy; if the write fails nothing changes and the error propagates.
   * An identifier already in history moves to the end instead of being duplicated.
   */
  async setCurrent(version: VersionIdentifier): Promise<void> {
    const normalized = version.trim();
    encodeVersionSegment(normalized);
    if (this.getCurrent() === normalized) {
      return;
    }

    const candidate = [...this.versions.filter((entry) => entry !== normalized), normalized];
    const overflow = Math.max(0, candidate.length - this.maxVersions);
    const evicted = candidate.slice(0, overflow);
    const next = candidate.slice(overflow);

    this.persist(next);
    this.versions = next;

    for (const stale of evicted) {
      await this.evict(stale);
    }
  }

  private async evict(version: VersionIdentifier): Promise<void> {
    const dir = this.versionDir(version);
    try {
      await rm(dir, { recursive: true, force: true });
      this.logger.info(`Cleaned up old version: ${version}`);
    } catch (error) {
      this.logger.warn(`Unable to remove directory of evicted version ${version}.`, error);
    }
  }

  /** A fresh directory beside the version directories for an incoming download. */
  stagingDir(version: VersionIdentifier): string {
    return path.join(this.versionsDir, `.staging-${encodeVersionSegment(version)}-${nanoid(8)}`);
  }

  /**
   * Moves a completed download into `version`'s directory. A directory already held
   * for that version is only deleted once the staged copy has taken its place.
   */
  async commitStaged(version: VersionIdentifier, stagingDir: string): Promise<void> {
    const dir = this.versionDir(version);
    const retired = `${stagingDir}.retired`;
    let replacing = true;
    try {
      await fs.promises.rename(dir, retired);
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      replacing = false;
    }

    try {
      await fs.promises.rename(stagingDir, dir);
    } catch (error) {
      if (replacing) {
        await fs.promises.rename(retired, dir);
      }
      throw error;
    }

    if (replacing) {
      await this.discardStaged(retired);
    }
  }

  async discardStaged(stagingDir: string): Promise<void> {
    try {
      await rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Unable to remove staging directory ${stagingDir}.`, error);
    }
  }

  async readManifest(version: VersionIdentifier): Promise<VersionManifest | null> {
    return readManifest(this.versionDir(version));
  }

  private async filesBelongingTo(version: VersionIdentifier, appDir: string): Promise<string[]> {
    const manifest = await this.readManifest(version);
    if (!manifest) {
      return listDirectoryFiles(appDir, this.excludePaths);
    }

    const present = new Set(await listDirectoryFiles(appDir, this.excludePaths));
    const files: string[] = [];
    for (const entry of manifest.files) {
      if (present.has(entry.path)) {
        files.push(entry.path);
      } else {
        this.logger.warn(`File ${entry.path} of version ${version} is missing from ${appDir}.`);
      }
    }
    return files;
  }

  private async snapshot(version: VersionIdentifier, appDir: string, files: string[]): Promise<VersionManifest> {
    const dir = this.versionDir(version);
    await fs.promises.mkdir(dir, { recursive: true });
    await copyRelativeFiles(files, appDir, dir);
    const manifest = await buildManifest(version, dir, files);
    await writeManifest(dir, manifest);
    return manifest;
  }

  /**
   * Copies the running version's files from the live directory into its version
   * directory. Safe to repeat; each call overwrites the previous snapshot.
   */
  async backupCurrent(appDir: string): Promise<VersionManifest> {
    const current = this.getCurrent();
    if (!current) {
      throw new VersionStoreError("No current version to back up.");
    }

    const files = await this.filesBelongingTo(current, appDir);
    const manifest = await this.snapshot(current, appDir, files);
    this.logger.info(`Backed up version ${current} (${manifest.files.length} files).`);
    return manifest;
  }

  /**
   * First-run recovery: adopts whatever is in the live directory as `defaultVersion`.
   * Returns false without touching anything once a history exists.
   */
  async initializeFromExisting(appDir: string, defaultVersion: VersionIdentifier): Promise<boolean> {
    if (this.hasHistory()) {
      return false;
    }

    const files = await listDirectoryFiles(appDir, this.excludePaths);
    if (files.length === 0) {
      this.logger.warn(`Application directory ${appDir} is empty; recording ${defaultVersion} without files.`);
    }
    await this.snapshot(defaultVersion, appDir, files);
    await this.setCurrent(defaultVersion);
    this.logger.info(`Initialized version history with ${defaultVersion}.`);
    return true;
  }

  /**
   * Copies `version`'s files from its version directory into `appDir` after checking
   * them against the manifest. Files only `replacing` listed are removed.
   */
  async restoreVersion(
    version: VersionIdentifier,
    appDir: string,
    replacing: VersionManifest | null = null
  ): Promise<VersionManifest> {
    const dir = this.versionDir(version);
    const manifest = await this.readManifest(version);
    if (!manifest) {
      throw new VersionStoreError(`Version ${version} has no manifest in ${dir}.`);
    }

    await verifyManifest(dir, manifest);
    await fs.promises.mkdir(appDir, { recursive: true });
    await copyRelativeFiles(
      manifest.files.map((entry) => entry.path),
      dir,
      appDir
    );
    if (replacing) {
      const removed = await removeOutgoingFiles(appDir, manifest, replacing);
      if (removed.length > 0) {
        this.logger.debug(`Removed ${removed.length} files not shipped by ${version}: ${removed.join(", ")}`);
      }
    }
    return manifest;
  }
}
