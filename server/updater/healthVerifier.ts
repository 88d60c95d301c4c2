import fs from "node:fs/promises";
import { z } from "zod";

import { sleep, toErrorMessage } from "../abort.js";
import type { HealthConfig } from "../runtime/config.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import type { CoreHealthSnapshot, HealthRecord, ProcessHandle } from "./types.js";

export interface ProcessLiveness {
  isRunning(): boolean;
  getHandle(): ProcessHandle | null;
  outputTail(): string[];
}

export interface HealthCheckContext {
  expectedVersion: string;
  processStartedAt: string | null;
  now: Date;
}

export interface HealthObservation {
  healthy: boolean;
  detail: string;
}

export interface HealthSignal {
  readonly name: string;
  check(context: HealthCheckContext): Promise<HealthObservation>;
}

const healthRecordSchema = z.object({
  ok: z.boolean(),
  version: z.string(),
  updatedAt: z.string(),
  detail: z.string().optional()
});

export function parseHealthRecord(raw: unknown): HealthRecord | null {
  const result = healthRecordSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function evaluateHealthRecord(
  record: HealthRecord,
  context: HealthCheckContext,
  freshnessMs: number
): HealthObservation {
  if (!record.ok) {
    return { healthy: false, detail: `application reports not ok${record.detail ? `: ${record.detail}` : ""}` };
  }
  if (record.version !== context.expectedVersion) {
    return { healthy: false, detail: `application reports version ${record.version}` };
  }

  const updatedAtMs = Date.parse(record.updatedAt);
  if (!Number.isFinite(updatedAtMs)) {
    return { healthy: false, detail: "health record has no valid timestamp" };
  }

  const startedAtMs = context.processStartedAt ? Date.parse(context.processStartedAt) : Number.NaN;
  if (Number.isFinite(startedAtMs) && updatedAtMs < startedAtMs) {
    return { healthy: false, detail: "health record predates the running process" };
  }
  if (context.now.getTime() - updatedAtMs > freshnessMs) {
    return { healthy: false, detail: "health record is stale" };
  }

  return { healthy: true, detail: `application reports ok on ${record.version}` };
}

export function createHealthRecordSignal(options: { recordPath: string; freshnessMs: number }): HealthSignal {
  return {
    name: "record",
    async check(context) {
      let raw: string;
      try {
        raw = await fs.readFile(options.recordPath, "utf8");
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          return { healthy: false, detail: "health record not written yet" };
        }
        throw error;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        return { healthy: false, detail: "health record is not valid JSON" };
      }

      const record = parseHealthRecord(parsed);
      if (!record) {
        return { healthy: false, detail: "health record has an unexpected shape" };
      }
      return evaluateHealthRecord(record, context, options.freshnessMs);
    }
  };
}

async function fetchCoreHealth(url: string, timeoutMs: number): Promise<CoreHealthSnapshot | null> {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(`Health lookup timed out after ${timeoutMs}ms`);
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: "GET",
      signal: controller.signal
    });

    if (!response.ok) {
      return null;
    }

    const payload: unknown = await response.json();
    if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
      return null;
    }

    return {
      ok: "ok" in payload && payload.ok === true,
      version: "version" in payload && typeof payload.version === "string" ? payload.version.trim() : undefined,
      now: "now" in payload && typeof payload.now === "string" ? payload.now : undefined
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function createHttpHealthSignal(options: { url: string; timeoutMs: number }): HealthSignal {
  return {
    name: "http",
    async check(context) {
      const snapshot = await fetchCoreHealth(options.url, options.timeoutMs);
      if (!snapshot) {
        return { healthy: false, detail: `no usable response from ${options.url}` };
      }
      if (!snapshot.ok) {
        return { healthy: false, detail: "health endpoint reports not ok" };
      }
      if (snapshot.version && snapshot.version !== context.expectedVersion) {
        return { healthy: false, detail: `health endpoint reports version ${snapshot.version}` };
      }
      return { healthy: true, detail: `health endpoint ok${snapshot.version ? ` on ${snapshot.version}` : ""}` };
    }
  };
}

/**
 * Heuristic: the captured output must show the application both reached its
 * dependencies and produced work since it started.
 */
export function createLogMarkerSignal(options: {
  liveness: Pick<ProcessLiveness, "outputTail">;
  connectedMarkers: string[];
  activityMarkers: string[];
}): HealthSignal {
  return {
    name: "log",
    async check() {
      const lines = options.liveness.outputTail();
      const contains = (markers: string[]) =>
        markers.some((marker) => lines.some((line) => line.includes(marker)));

      if (!contains(options.connectedMarkers)) {
        return { healthy: false, detail: "no connection marker in application output" };
      }
      if (!contains(options.activityMarkers)) {
        return { healthy: false, detail: "no activity marker in application output" };
      }
      return { healthy: true, detail: "application output shows connection and activity" };
    }
  };
}

export function createHealthSignal(config: HealthConfig, liveness: ProcessLiveness): HealthSignal {
  switch (config.mode) {
    case "http":
      return createHttpHealthSignal({ url: config.url, timeoutMs: Math.min(config.pollIntervalMs * 5, 10_000) });
    case "log":
      return createLogMarkerSignal({
        liveness,
        connectedMarkers: config.connectedMarkers,
        activityMarkers: config.activityMarkers
      });
    case "record":
      return createHealthRecordSignal({ recordPath: config.recordPath, freshnessMs: config.freshnessMs });
  }
}

export interface HealthVerifierOptions {
  liveness: ProcessLiveness;
  signal: HealthSignal;
  settleMs: number;
  pollIntervalMs: number;
  logger: SupervisorLogger;
  now?: () => Date;
}

export class HealthVerifier {
  private readonly options: HealthVerifierOptions;
  private readonly now: () => Date;

  constructor(options: HealthVerifierOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Polls until the liveness signal confirms `expectedVersion` or `timeoutMs` runs out.
   * A process that exits at any point fails verification.
   */
  async verify(timeoutMs: number, expectedVersion: string): Promise<boolean> {
    const { liveness, signal, logger } = this.options;
    logger.info(`Verifying version ${expectedVersion} (${signal.name} signal, timeout ${timeoutMs}ms)...`);

    if (this.options.settleMs > 0) {
      await sleep(this.options.settleMs);
    }

    const deadline = Date.now() + timeoutMs;
    let lastDetail = "no observation";
    for (;;) {
      if (!liveness.isRunning()) {
        logger.error("Application process has terminated");
        return false;
      }

      let observation: HealthObservation;
      try {
        observation = await signal.check({
          expectedVersion,
          processStartedAt: liveness.getHandle()?.startedAt ?? null,
          now: this.now()
        });
      } catch (error) {
        observation = { healthy: false, detail: `health check failed: ${toErrorMessage(error)}` };
        logger.warn(`Error during verification: ${toErrorMessage(error)}`);
      }

      if (observation.healthy) {
        if (!liveness.isRunning()) {
          logger.error("Application process has terminated");
          return false;
        }
        logger.info(`Verification passed: ${observation.detail}.`);
        return true;
      }

      lastDetail = observation.detail;
      logger.debug(`Verification pending: ${lastDetail}.`);
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }

    logger.error(`Update verification timed out (${lastDetail}).`);
    return false;
  }
}
