import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { mergeAbortSignals, throwIfAborted } from "../abort.js";
import type { GitHubSourceConfig } from "../runtime/config.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import { buildManifest, normalizeManifestPath, writeManifest } from "./manifest.js";
import type { RemoteRelease, VersionManifest } from "./types.js";

export interface RemoteSource {
  /** Latest published version, or null when the remote has nothing to offer. */
  checkLatest(signal?: AbortSignal): Promise<RemoteRelease | null>;
  /** Downloads `release` into `destinationDir` and returns the manifest written there. */
  fetch(release: RemoteRelease, destinationDir: string, signal?: AbortSignal): Promise<VersionManifest>;
}

export class RemoteSourceError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "RemoteSourceError";
    this.statusCode = statusCode;
  }
}

const githubApiBase = "https://api.github.com";
const commitIdLength = 7;
const maxContentDepth = 32;

const releaseSchema = z.object({
  id: z.union([z.number(), z.string()]),
  tag_name: z.string().min(1),
  published_at: z.string().nullish(),
  assets: z
    .array(
      z.object({
        name: z.string().min(1),
        browser_download_url: z.string().url()
      })
    )
    .default([])
});

const commitSchema = z.object({
  sha: z.string().min(commitIdLength),
  commit: z
    .object({
      committer: z.object({ date: z.string().nullish() }).nullish()
    })
    .nullish()
});

const contentEntrySchema = z.object({
  type: z.string(),
  path: z.string().min(1),
  download_url: z.string().nullish()
});

const contentListingSchema = z.union([z.array(contentEntrySchema), contentEntrySchema]);

type ContentEntry = z.infer<typeof contentEntrySchema>;

function normalizeIsoDate(raw: string | null | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }

  const parsed = Date.parse(raw);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }

  return new Date(parsed).toISOString();
}

function encodePathSegments(value: string): string {
  return value
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

export interface GitHubRemoteSourceOptions extends GitHubSourceConfig {
  logger: SupervisorLogger;
  apiBaseUrl?: string;
}

/**
 * Tagged releases first; a repository without releases is tracked by the head
 * commit of `branch`, whose files under `sourcePath` make up the version.
 */
export class GitHubRemoteSource implements RemoteSource {
  private readonly options: GitHubRemoteSourceOptions;
  private readonly logger: SupervisorLogger;
  private readonly repoUrl: string;

  constructor(options: GitHubRemoteSourceOptions) {
    const owner = options.owner.trim();
    const repo = options.repo.trim();
    if (owner.length === 0 || repo.length === 0) {
      throw new RemoteSourceError("OTA_GITHUB_OWNER and OTA_GITHUB_REPO must be configured.");
    }

    this.options = options;
    this.logger = options.logger;
    const base = (options.apiBaseUrl ?? githubApiBase).replace(/\/+$/, "");
    this.repoUrl = `${base}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
  }

  private buildHeaders(accept: string): Headers {
    const headers = new Headers();
    headers.set("Accept", accept);
    const token = this.options.token.trim();
    if (token.length > 0) {
      headers.set("Authorization", `Bearer ${token}`);
    }
    return headers;
  }

  private async request(url: string, accept: string, signal: AbortSignal | undefined): Promise<Response> {
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;
    const timeout = setTimeout(() => {
      controller.abort(`GitHub request timed out after ${timeoutMs}ms`);
    }, timeoutMs);
    const merged = mergeAbortSignals([controller.signal, signal]);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: this.buildHeaders(accept),
        signal: merged.signal
      });

      if (!response.ok) {
        const body = (await response.text()).trim();
        throw new RemoteSourceError(
          body.length > 0 ? `GitHub request ${url} failed with ${response.status}: ${body}` : `GitHub request ${url} failed with ${response.status}`,
          response.status
        );
      }

      return response;
    } finally {
      clearTimeout(timeout);
      merged.dispose();
    }
  }

  private async fetchJson(url: string, signal: AbortSignal | undefined): Promise<unknown> {
    const response = await this.request(url, "application/vnd.github+json", signal);
    return response.json();
  }

  private async download(url: string, target: string, signal: AbortSignal | undefined): Promise<void> {
    const response = await this.request(url, "application/octet-stream", signal);
    const content = Buffer.from(await response.arrayBuffer());
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }

  async checkLatest(signal?: AbortSignal): Promise<RemoteRelease | null> {
    try {
      const payload = releaseSchema.parse(await this.fetchJson(`${this.repoUrl}/releases/latest`, signal));
      return {
        version: payload.tag_name.trim(),
        kind: "release",
        ref: String(payload.id),
        publishedAt: normalizeIsoDate(payload.published_at)
      };
    } catch (error) {
      if (!(error instanceof RemoteSourceError) || error.statusCode !== 404) {
        throw error;
      }
    }

    this.logger.debug("No published release found; falling back to the latest commit.");
    const branch = encodePathSegments(this.options.branch);
    const commit = commitSchema.parse(await this.fetchJson(`${this.repoUrl}/commits/${branch}`, signal));
    return {
      version: commit.sha.slice(0, commitIdLength),
      kind: "commit",
      ref: commit.sha,
      publishedAt: normalizeIsoDate(commit.commit?.committer?.date)
    };
  }

  async fetch(release: RemoteRelease, destinationDir: string, signal?: AbortSignal): Promise<VersionManifest> {
    await fs.rm(destinationDir, { recursive: true, force: true });
    await fs.mkdir(destinationDir, { recursive: true });

    const files =
      release.kind === "release"
        ? await this.downloadReleaseAssets(release, destinationDir, signal)
        : await this.downloadCommitTree(release, destinationDir, signal);

    if (files.length === 0) {
      throw new RemoteSourceError(`Version ${release.version} contains no files.`);
    }

    const manifest = await buildManifest(release.version, destinationDir, files);
    await writeManifest(destinationDir, manifest);
    this.logger.info(`Downloaded version ${release.version} (${manifest.files.length} files).`);
    return manifest;
  }

  private async downloadReleaseAssets(
    release: RemoteRelease,
    destinationDir: string,
    signal: AbortSignal | undefined
  ): Promise<string[]> {
    const url = `${this.repoUrl}/releases/${encodeURIComponent(release.ref)}`;
    const payload = releaseSchema.parse(await this.fetchJson(url, signal));

    const files: string[] = [];
    for (const asset of payload.assets) {
      throwIfAborted(signal, "Download aborted");
      const relativePath = normalizeManifestPath(asset.name);
      this.logger.debug(`Downloading ${relativePath}...`);
      await this.download(asset.browser_download_url, path.join(destinationDir, relativePath), signal);
      files.push(relativePath);
    }
    return files;
  }

  private async downloadCommitTree(
    release: RemoteRelease,
    destinationDir: string,
    signal: AbortSignal | undefined
  ): Promise<string[]> {
    const sourcePath = this.options.sourcePath.replace(/^\/+|\/+$/g, "");
    const prefix = sourcePath.length > 0 ? `${sourcePath}/` : "";
    const files: string[] = [];

    const walk = async (repoPath: string, depth: number): Promise<void> => {
      if (depth > maxContentDepth) {
        throw new RemoteSourceError(`Directory ${repoPath} is nested too deeply.`);
      }

      const url = `${this.repoUrl}/contents/${encodePathSegments(repoPath)}?ref=${encodeURIComponent(release.ref)}`;
      const listing = contentListingSchema.parse(await this.fetchJson(url, signal));
      const entries: ContentEntry[] = Array.isArray(listing) ? listing : [listing];

      for (const entry of entries) {
        throwIfAborted(signal, "Download aborted");
        if (entry.type === "dir") {
          await walk(entry.path, depth + 1);
          continue;
        }
        if (entry.type !== "file" || !entry.download_url) {
          continue;
        }

        const relativeRaw = prefix.length > 0 && entry.path.startsWith(prefix) ? entry.path.slice(prefix.length) : entry.path;
        const relativePath = normalizeManifestPath(relativeRaw);
        this.logger.debug(`Downloading ${relativePath}...`);
        await this.download(entry.download_url, path.join(destinationDir, ...relativePath.split("/")), signal);
        files.push(relativePath);
      }
    };

    await walk(sourcePath, 0);
    return files;
  }
}
