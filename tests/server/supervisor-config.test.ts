import { writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolveDataRootPath } from "../../server/runtime/dataPaths.js";
import {
  ConfigError,
  parseBooleanEnv,
  parseIntEnv,
  resolveCorsOrigins,
  resolveSupervisorConfig
} from "../../server/runtime/config.js";
import { createTempDir } from "../helpers/tempDir.js";

const requiredEnv = {
  OTA_GITHUB_OWNER: "acme",
  OTA_GITHUB_REPO: "widget"
};

function captureConfigError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ConfigError.");
}

describe("supervisor config", () => {
  let cwd: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const temp = await createTempDir();
    cwd = temp.dir;
    cleanup = temp.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  it("uses defaults", () => {
    const config = resolveSupervisorConfig(requiredEnv, cwd);
    const dataDir = path.join(cwd, "data");
    const appDir = path.join(cwd, "application");

    expect(config.configFilePath).toBeUndefined();
    expect(config.appDir).toBe(appDir);
    expect(config.dataDir).toBe(dataDir);
    expect(config.versionsDir).toBe(path.join(dataDir, "versions"));
    expect(config.lockPath).toBe(path.join(dataDir, "supervisor.lock"));
    expect(config.maxVersions).toBe(5);
    expect(config.pollIntervalMs).toBe(300_000);
    expect(config.defaultVersion).toBe("1.0.0");
    expect(config.logLevel).toBe("info");
    expect(config.process.command).toBe(process.execPath);
    expect(config.process.args).toEqual([path.join(appDir, "index.js")]);
    expect(config.process.processMatch).toBe(path.join(appDir, "index.js"));
    expect(config.process.gracePeriodMs).toBe(20_000);
    expect(config.health.mode).toBe("record");
    expect(config.health.timeoutMs).toBe(30_000);
    expect(config.health.recordPath).toBe(path.join(dataDir, "health.json"));
    expect(config.health.connectedMarkers).toEqual(["Successfully connected"]);
    expect(config.github.branch).toBe("main");
    expect(config.github.sourcePath).toBe("application");
    expect(config.control.port).toBe(0);
  });

  it("parses environment overrides", () => {
    const config = resolveSupervisorConfig(
      {
        ...requiredEnv,
        OTA_DATA_DIR: "/var/lib/ota",
        OTA_APP_DIR: "app",
        OTA_MAX_VERSIONS: "1",
        OTA_POLL_INTERVAL_MS: "90000",
        OTA_APP_COMMAND: "/usr/bin/env",
        OTA_APP_ARGS: "sensor-app.js  --quiet",
        OTA_HEALTH_MODE: "LOG",
        OTA_GITHUB_TOKEN: "test-token",
        OTA_GITHUB_SOURCE_PATH: "/src/app/",
        OTA_CONTROL_PORT: "8790",
        OTA_CONTROL_TOKEN: " test-secret ",
        OTA_CONTROL_CORS_ORIGINS: "https://ops.example.com,*",
        OTA_LOG_LEVEL: "debug"
      },
      cwd
    );

    expect(config.dataDir).toBe("/var/lib/ota");
    expect(config.versionsDir).toBe("/var/lib/ota/versions");
    expect(config.appDir).toBe(path.join(cwd, "app"));
    expect(config.maxVersions).toBe(2);
    expect(config.pollIntervalMs).toBe(90_000);
    expect(config.process.command).toBe("/usr/bin/env");
    expect(config.process.args).toEqual(["sensor-app.js", "--quiet"]);
    expect(config.process.processMatch).toBe("sensor-app.js --quiet");
    expect(config.health.mode).toBe("log");
    expect(config.github.token).toBe("test-token");
    expect(config.github.sourcePath).toBe("src/app");
    expect(config.control.port).toBe(8790);
    expect(config.control.authToken).toBe("test-secret");
    expect(config.control.corsOrigins).toEqual(["https://ops.example.com", "*"]);
    expect(config.control.allowAnyCorsOrigin).toBe(true);
    expect(config.logLevel).toBe("debug");
  });

  it("reads the configuration file and lets the environment win", async () => {
    await writeFile(
      path.join(cwd, "ota.config.json"),
      JSON.stringify({
        maxVersions: 3,
        health: { mode: "log", settleMs: 0 },
        github: { owner: "acme", repo: "widget", branch: "release" }
      }),
      "utf8"
    );

    const fromFile = resolveSupervisorConfig({}, cwd);
    expect(fromFile.configFilePath).toBe(path.join(cwd, "ota.config.json"));
    expect(fromFile.maxVersions).toBe(3);
    expect(fromFile.health.mode).toBe("log");
    expect(fromFile.health.settleMs).toBe(0);
    expect(fromFile.github.branch).toBe("release");

    const overridden = resolveSupervisorConfig({ OTA_MAX_VERSIONS: "7" }, cwd);
    expect(overridden.maxVersions).toBe(7);
  });

  it("rejects unknown keys in the configuration file", async () => {
    await writeFile(path.join(cwd, "ota.config.json"), JSON.stringify({ maxVersion: 3 }), "utf8");

    const error = captureConfigError(() => resolveSupervisorConfig(requiredEnv, cwd));
    expect(error.issues).toEqual(["(root): Unrecognized key(s) in object: 'maxVersion'"]);
  });

  it("fails when an explicit configuration file is missing", () => {
    const error = captureConfigError(() =>
      resolveSupervisorConfig({ ...requiredEnv, OTA_CONFIG_FILE: "missing.json" }, cwd)
    );
    expect(error.message).toContain(`Unable to read configuration file ${path.join(cwd, "missing.json")}.`);
  });

  it("lists every invalid combination", () => {
    const error = captureConfigError(() =>
      resolveSupervisorConfig({ OTA_HEALTH_MODE: "http", OTA_CONTROL_PORT: "8790" }, cwd)
    );
    expect(error.issues).toEqual([
      "OTA_GITHUB_OWNER and OTA_GITHUB_REPO must be configured.",
      "OTA_HEALTH_URL is required when the health mode is http.",
      "OTA_CONTROL_TOKEN is required when the control API is enabled."
    ]);
  });

  it("lets an explicit flag override the wildcard origin", () => {
    const config = resolveSupervisorConfig(
      { ...requiredEnv, OTA_CONTROL_CORS_ORIGINS: "*", OTA_CONTROL_CORS_ALLOW_ANY: "no" },
      cwd
    );
    expect(config.control.corsOrigins).toEqual(["*"]);
    expect(config.control.allowAnyCorsOrigin).toBe(false);
  });
});

describe("config helpers", () => {
  it("normalizes boolean parsing helper", () => {
    expect(parseBooleanEnv("true", false)).toBe(true);
    expect(parseBooleanEnv("NO", true)).toBe(false);
    expect(parseBooleanEnv(undefined, true)).toBe(true);
    expect(parseBooleanEnv("unknown", false)).toBe(false);
  });

  it("clamps integers and falls back on garbage", () => {
    expect(parseIntEnv("abc", 5, 2, 50)).toBe(5);
    expect(parseIntEnv("100", 5, 2, 50)).toBe(50);
    expect(parseIntEnv("0", 5, 2, 50)).toBe(2);
    expect(parseIntEnv("12", 5, 2, 50)).toBe(12);
  });

  it("splits CORS origins and falls back when empty", () => {
    expect(resolveCorsOrigins(" , ", ["http://localhost:5173"])).toEqual({
      corsOrigins: ["http://localhost:5173"],
      allowAnyCorsOrigin: false
    });
  });

  it("resolves the data directory with environment precedence", () => {
    expect(resolveDataRootPath({}, "/srv")).toBe("/srv/data");
    expect(resolveDataRootPath({}, "/srv", "state")).toBe("/srv/state");
    expect(resolveDataRootPath({ OTA_DATA_DIR: "/tmp/ota" }, "/srv", "state")).toBe("/tmp/ota");
  });
});
