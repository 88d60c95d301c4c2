import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { resolveDataRootPath } from "./dataPaths.js";
import { logLevels, type LogLevel } from "./logger.js";

export type HealthMode = "record" | "http" | "log";

export interface ProcessConfig {
  command: string;
  args: string[];
  processMatch: string;
  gracePeriodMs: number;
  stopPollIntervalMs: number;
  startupProbeMs: number;
  logFile: string;
}

export interface HealthConfig {
  mode: HealthMode;
  timeoutMs: number;
  settleMs: number;
  pollIntervalMs: number;
  freshnessMs: number;
  recordPath: string;
  url: string;
  connectedMarkers: string[];
  activityMarkers: string[];
}

export interface GitHubSourceConfig {
  owner: string;
  repo: string;
  token: string;
  branch: string;
  sourcePath: string;
  timeoutMs: number;
}

export interface ControlApiConfig {
  port: number;
  authToken: string;
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
}

export interface SupervisorConfig {
  configFilePath?: string;
  appDir: string;
  dataDir: string;
  versionsDir: string;
  maxVersions: number;
  pollIntervalMs: number;
  defaultVersion: string;
  excludePaths: string[];
  lockPath: string;
  logLevel: LogLevel;
  process: ProcessConfig;
  health: HealthConfig;
  github: GitHubSourceConfig;
  control: ControlApiConfig;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message} ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const healthModes = ["record", "http", "log"] as const;

const processFileSchema = z
  .object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()).max(64).optional(),
    processMatch: z.string().min(1).optional(),
    gracePeriodMs: z.number().int().min(0).max(300_000).optional(),
    stopPollIntervalMs: z.number().int().min(10).max(10_000).optional(),
    startupProbeMs: z.number().int().min(0).max(60_000).optional(),
    logFile: z.string().min(1).optional()
  })
  .strict();

const healthFileSchema = z
  .object({
    mode: z.enum(healthModes).optional(),
    timeoutMs: z.number().int().min(100).max(600_000).optional(),
    settleMs: z.number().int().min(0).max(120_000).optional(),
    pollIntervalMs: z.number().int().min(10).max(60_000).optional(),
    freshnessMs: z.number().int().min(1_000).max(3_600_000).optional(),
    recordPath: z.string().min(1).optional(),
    url: z.string().url().optional(),
    connectedMarkers: z.array(z.string().min(1)).min(1).max(20).optional(),
    activityMarkers: z.array(z.string().min(1)).min(1).max(20).optional()
  })
  .strict();

const githubFileSchema = z
  .object({
    owner: z.string().min(1).optional(),
    repo: z.string().min(1).optional(),
    branch: z.string().min(1).optional(),
    sourcePath: z.string().optional(),
    timeoutMs: z.number().int().min(1_000).max(120_000).optional()
  })
  .strict();

const controlFileSchema = z
  .object({
    port: z.number().int().min(0).max(65535).optional(),
    corsOrigins: z.array(z.string().min(1)).max(40).optional()
  })
  .strict();

export const supervisorFileConfigSchema = z
  .object({
    appDir: z.string().min(1).optional(),
    dataDir: z.string().min(1).optional(),
    versionsDir: z.string().min(1).optional(),
    maxVersions: z.number().int().min(2).max(50).optional(),
    pollIntervalMs: z.number().int().min(1_000).max(86_400_000).optional(),
    defaultVersion: z.string().min(1).max(200).optional(),
    excludePaths: z.array(z.string().min(1)).max(100).optional(),
    lockPath: z.string().min(1).optional(),
    logLevel: z.enum(logLevels).optional(),
    process: processFileSchema.optional(),
    health: healthFileSchema.optional(),
    github: githubFileSchema.optional(),
    control: controlFileSchema.optional()
  })
  .strict();

export type SupervisorFileConfig = z.infer<typeof supervisorFileConfigSchema>;

const defaultConfigFileName = "ota.config.json";
const defaultMaxVersions = 5;
const defaultPollIntervalMs = 300_000;
const defaultVersion = "1.0.0";
const defaultExcludePaths = ["data", "logs", "node_modules"];
const defaultGracePeriodMs = 20_000;
const defaultStopPollIntervalMs = 1_000;
const defaultStartupProbeMs = 1_000;
const defaultHealthTimeoutMs = 30_000;
const defaultHealthSettleMs = 5_000;
const defaultHealthPollIntervalMs = 2_000;
const defaultHealthFreshnessMs = 60_000;
const defaultConnectedMarkers = ["Successfully connected"];
const defaultActivityMarkers = ["Data stored:"];
const defaultGitHubTimeoutMs = 15_000;
const defaultCorsOrigins = ["http://localhost:5173", "http://127.0.0.1:5173"];

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

function envString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeHealthMode(raw: string | undefined, fallback: HealthMode): HealthMode {
  const normalized = raw?.trim().toLowerCase();
  return healthModes.find((mode) => mode === normalized) ?? fallback;
}

function normalizeLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return logLevels.find((level) => level === normalized) ?? fallback;
}

export function resolveCorsOrigins(raw: string | undefined, fallback: string[] = defaultCorsOrigins): {
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const corsOrigins = configured.length > 0 ? configured : fallback;

  return {
    corsOrigins,
    allowAnyCorsOrigin: corsOrigins.includes("*")
  };
}

function splitArgs(raw: string | undefined): string[] | undefined {
  const value = envString(raw);
  if (!value) {
    return undefined;
  }
  return value.split(/\s+/).filter((entry) => entry.length > 0);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

export function parseSupervisorFileConfig(raw: unknown): SupervisorFileConfig {
  const result = supervisorFileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid supervisor configuration.", formatIssues(result.error));
  }
  return result.data;
}

export function loadSupervisorFileConfig(filePath: string, required: boolean): SupervisorFileConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT" && !required) {
      return {};
    }
    throw new ConfigError(`Unable to read configuration file ${filePath}.`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file ${filePath} is not valid JSON.`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  return parseSupervisorFileConfig(parsed);
}

export function resolveSupervisorConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SupervisorConfig {
  const explicitConfigFile = envString(env.OTA_CONFIG_FILE);
  const configFilePath = path.resolve(cwd, explicitConfigFile ?? defaultConfigFileName);
  const file = loadSupervisorFileConfig(configFilePath, explicitConfigFile !== undefined);
  const fileProcess = file.process ?? {};
  const fileHealth = file.health ?? {};
  const fileGitHub = file.github ?? {};
  const fileControl = file.control ?? {};

  const dataDir = resolveDataRootPath(env, cwd, file.dataDir);
  const appDir = path.resolve(cwd, envString(env.OTA_APP_DIR) ?? file.appDir ?? "application");
  const resolveDataFile = (envValue: string | undefined, fileValue: string | undefined, fallback: string) =>
    path.resolve(cwd, envString(envValue) ?? fileValue ?? path.join(dataDir, fallback));

  const args = splitArgs(env.OTA_APP_ARGS) ?? fileProcess.args ?? [path.join(appDir, "index.js")];
  const command = envString(env.OTA_APP_COMMAND) ?? fileProcess.command ?? process.execPath;
  const processMatch =
    envString(env.OTA_APP_PROCESS_MATCH) ?? fileProcess.processMatch ?? (args.length > 0 ? args.join(" ") : command);

  const healthMode = normalizeHealthMode(env.OTA_HEALTH_MODE, fileHealth.mode ?? "record");
  const { corsOrigins, allowAnyCorsOrigin } = resolveCorsOrigins(
    env.OTA_CONTROL_CORS_ORIGINS,
    fileControl.corsOrigins ?? defaultCorsOrigins
  );

  const config: SupervisorConfig = {
    ...(fs.existsSync(configFilePath) ? { configFilePath } : {}),
    appDir,
    dataDir,
    versionsDir: resolveDataFile(env.OTA_VERSIONS_DIR, file.versionsDir, "versions"),
    maxVersions: parseIntEnv(env.OTA_MAX_VERSIONS, file.maxVersions ?? defaultMaxVersions, 2, 50),
    pollIntervalMs: parseIntEnv(
      env.OTA_POLL_INTERVAL_MS,
      file.pollIntervalMs ?? defaultPollIntervalMs,
      1_000,
      86_400_000
    ),
    defaultVersion: envString(env.OTA_DEFAULT_VERSION) ?? file.defaultVersion ?? defaultVersion,
    excludePaths: file.excludePaths ?? defaultExcludePaths,
    lockPath: resolveDataFile(env.OTA_LOCK_FILE, file.lockPath, "supervisor.lock"),
    logLevel: normalizeLogLevel(env.OTA_LOG_LEVEL, file.logLevel ?? "info"),
    process: {
      command,
      args,
      processMatch,
      gracePeriodMs: parseIntEnv(
        env.OTA_GRACE_PERIOD_MS,
        fileProcess.gracePeriodMs ?? defaultGracePeriodMs,
        0,
        300_000
      ),
      stopPollIntervalMs: fileProcess.stopPollIntervalMs ?? defaultStopPollIntervalMs,
      startupProbeMs: fileProcess.startupProbeMs ?? defaultStartupProbeMs,
      logFile: resolveDataFile(env.OTA_APP_LOG_FILE, fileProcess.logFile, "app.log")
    },
    health: {
      mode: healthMode,
      timeoutMs: parseIntEnv(env.OTA_HEALTH_TIMEOUT_MS, fileHealth.timeoutMs ?? defaultHealthTimeoutMs, 100, 600_000),
      settleMs: fileHealth.settleMs ?? defaultHealthSettleMs,
      pollIntervalMs: fileHealth.pollIntervalMs ?? defaultHealthPollIntervalMs,
      freshnessMs: fileHealth.freshnessMs ?? defaultHealthFreshnessMs,
      recordPath: resolveDataFile(env.OTA_HEALTH_FILE, fileHealth.recordPath, "health.json"),
      url: envString(env.OTA_HEALTH_URL) ?? fileHealth.url ?? "",
      connectedMarkers: fileHealth.connectedMarkers ?? defaultConnectedMarkers,
      activityMarkers: fileHealth.activityMarkers ?? defaultActivityMarkers
    },
    github: {
      owner: envString(env.OTA_GITHUB_OWNER) ?? fileGitHub.owner ?? "",
      repo: envString(env.OTA_GITHUB_REPO) ?? fileGitHub.repo ?? "",
      token: envString(env.OTA_GITHUB_TOKEN) ?? envString(env.GITHUB_TOKEN) ?? "",
      branch: envString(env.OTA_GITHUB_BRANCH) ?? fileGitHub.branch ?? "main",
      sourcePath: (envString(env.OTA_GITHUB_SOURCE_PATH) ?? fileGitHub.sourcePath ?? "application").replace(
        /^\/+|\/+$/g,
        ""
      ),
      timeoutMs: parseIntEnv(
        env.OTA_GITHUB_TIMEOUT_MS,
        fileGitHub.timeoutMs ?? defaultGitHubTimeoutMs,
        1_000,
        120_000
      )
    },
    control: {
      port: parseIntEnv(env.OTA_CONTROL_PORT, fileControl.port ?? 0, 0, 65535),
      authToken: (env.OTA_CONTROL_TOKEN ?? "").trim(),
      corsOrigins,
      allowAnyCorsOrigin: parseBooleanEnv(env.OTA_CONTROL_CORS_ALLOW_ANY, allowAnyCorsOrigin)
    }
  };

  const issues: string[] = [];
  if (config.github.owner.length === 0 || config.github.repo.length === 0) {
    issues.push("OTA_GITHUB_OWNER and OTA_GITHUB_REPO must be configured.");
  }
  if (config.health.mode === "http" && config.health.url.length === 0) {
    issues.push("OTA_HEALTH_URL is required when the health mode is http.");
  }
  if (config.control.port > 0 && config.control.authToken.length === 0) {
    issues.push("OTA_CONTROL_TOKEN is required when the control API is enabled.");
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid supervisor configuration.", issues);
  }

  return config;
}
