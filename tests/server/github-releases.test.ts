import { readFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createMemoryLogger } from "../../server/runtime/logger.js";
import { ManifestError, readManifest } from "../../server/updater/manifest.js";
import { GitHubRemoteSource, RemoteSourceError } from "../../server/updater/releases.js";
import { createTempDir } from "../helpers/tempDir.js";

const repoUrl = "https://api.github.com/repos/acme/widget";
const sha = "abcdef0123456789abcdef0123456789abcdef01";

type RouteReply = { status?: number; json?: unknown; text?: string };

function stubGitHub(routes: Record<string, RouteReply>) {
  const requests: Array<{ url: string; authorization: string | null }> = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requests.push({ url, authorization: new Headers(init?.headers).get("authorization") });

    const reply = routes[url];
    if (!reply) {
      return new Response("Not Found", { status: 404 });
    }
    const body = reply.json === undefined ? (reply.text ?? "") : JSON.stringify(reply.json);
    return new Response(body, { status: reply.status ?? 200 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return requests;
}

function createSource(overrides: { token?: string } = {}) {
  const { logger } = createMemoryLogger();
  return new GitHubRemoteSource({
    owner: "acme",
    repo: "widget",
    token: overrides.token ?? "",
    branch: "main",
    sourcePath: "application",
    timeoutMs: 1_000,
    logger
  });
}

describe("GitHub remote source", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const temp = await createTempDir();
    dir = temp.dir;
    cleanup = temp.cleanup;
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await cleanup();
  });

  it("reports the latest tagged release", async () => {
    const requests = stubGitHub({
      [`${repoUrl}/releases/latest`]: {
        json: { id: 42, tag_name: "v1.2.0", published_at: "2026-01-02T03:04:05Z", assets: [] }
      }
    });

    const release = await createSource({ token: "test-token" }).checkLatest();

    expect(release).toEqual({
      version: "v1.2.0",
      kind: "release",
      ref: "42",
      publishedAt: "2026-01-02T03:04:05.000Z"
    });
    expect(requests).toEqual([{ url: `${repoUrl}/releases/latest`, authorization: "Bearer test-token" }]);
  });

  it("falls back to the latest commit when there are no releases", async () => {
    const requests = stubGitHub({
      [`${repoUrl}/commits/main`]: {
        json: { sha, commit: { committer: { date: "2026-02-03T04:05:06Z" } } }
      }
    });

    const release = await createSource().checkLatest();

    expect(release).toEqual({
      version: "abcdef0",
      kind: "commit",
      ref: sha,
      publishedAt: "2026-02-03T04:05:06.000Z"
    });
    expect(requests.map((request) => request.url)).toEqual([`${repoUrl}/releases/latest`, `${repoUrl}/commits/main`]);
    expect(requests[0]?.authorization).toBeNull();
  });

  it("surfaces other failures with their status code", async () => {
    stubGitHub({ [`${repoUrl}/releases/latest`]: { status: 500, text: "boom" } });

    const error = await createSource()
      .checkLatest()
      .then(
        () => null,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(RemoteSourceError);
    expect(error instanceof RemoteSourceError ? error.statusCode : undefined).toBe(500);
    expect(error instanceof Error ? error.message : "").toBe(
      `GitHub request ${repoUrl}/releases/latest failed with 500: boom`
    );
  });

  it("downloads release assets and writes their manifest", async () => {
    stubGitHub({
      [`${repoUrl}/releases/42`]: {
        json: {
          id: 42,
          tag_name: "v1.2.0",
          assets: [
            { name: "index.js", browser_download_url: "https://downloads.example.test/index.js" },
            { name: "config.json", browser_download_url: "https://downloads.example.test/config.json" }
          ]
        }
      },
      "https://downloads.example.test/index.js": { text: "console.log('v1.2.0');\n" },
      "https://downloads.example.test/config.json": { text: "{\"interval\":5}\n" }
    });
    const destination = path.join(dir, "v1.2.0");

    const manifest = await createSource().fetch({ version: "v1.2.0", kind: "release", ref: "42" }, destination);

    expect(manifest.version).toBe("v1.2.0");
    expect(manifest.files.map((entry) => entry.path)).toEqual(["config.json", "index.js"]);
    expect(await readFile(path.join(destination, "index.js"), "utf8")).toBe("console.log('v1.2.0');\n");
    expect(await readManifest(destination)).toEqual(manifest);
  });

  it("walks the source directory of a commit", async () => {
    stubGitHub({
      [`${repoUrl}/contents/application?ref=${sha}`]: {
        json: [
          { type: "file", path: "application/index.js", download_url: "https://raw.example.test/index.js" },
          { type: "dir", path: "application/lib", download_url: null }
        ]
      },
      [`${repoUrl}/contents/application/lib?ref=${sha}`]: {
        json: [{ type: "file", path: "application/lib/util.js", download_url: "https://raw.example.test/lib/util.js" }]
      },
      "https://raw.example.test/index.js": { text: "main" },
      "https://raw.example.test/lib/util.js": { text: "util" }
    });
    const destination = path.join(dir, "abcdef0");

    const manifest = await createSource().fetch({ version: "abcdef0", kind: "commit", ref: sha }, destination);

    expect(manifest.files.map((entry) => entry.path)).toEqual(["index.js", "lib/util.js"]);
    expect(await readFile(path.join(destination, "lib", "util.js"), "utf8")).toBe("util");
  });

  it("refuses asset names that leave the version directory", async () => {
    stubGitHub({
      [`${repoUrl}/releases/7`]: {
        json: {
          id: 7,
          tag_name: "v0.0.1",
          assets: [{ name: "../escape.js", browser_download_url: "https://downloads.example.test/escape.js" }]
        }
      }
    });

    await expect(
      createSource().fetch({ version: "v0.0.1", kind: "release", ref: "7" }, path.join(dir, "v0.0.1"))
    ).rejects.toThrow(ManifestError);
  });

  it("rejects a release without files", async () => {
    stubGitHub({ [`${repoUrl}/releases/8`]: { json: { id: 8, tag_name: "v0.0.2", assets: [] } } });

    await expect(
      createSource().fetch({ version: "v0.0.2", kind: "release", ref: "8" }, path.join(dir, "v0.0.2"))
    ).rejects.toThrow("Version v0.0.2 contains no files.");
  });
});
