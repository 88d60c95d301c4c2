import type { Server } from "node:http";

import { createControlApp } from "../http/appFactory.js";
import { UpdateController } from "../updater/controller.js";
import { HealthVerifier, createHealthSignal } from "../updater/healthVerifier.js";
import { ProcessSupervisor } from "../updater/processSupervisor.js";
import { GitHubRemoteSource, type RemoteSource } from "../updater/releases.js";
import { VersionStore } from "../updater/versionStore.js";
import type { ControlApiConfig, SupervisorConfig } from "./config.js";
import type { SupervisorLogger } from "./logger.js";

export interface SupervisorComponents {
  store: VersionStore;
  supervisor: ProcessSupervisor;
  verifier: HealthVerifier;
  remote: RemoteSource;
  controller: UpdateController;
}

export interface SupervisorComponentOverrides {
  remote?: RemoteSource;
}

export function createSupervisorComponents(
  config: SupervisorConfig,
  logger: SupervisorLogger,
  overrides: SupervisorComponentOverrides = {}
): SupervisorComponents {
  const store = new VersionStore({
    versionsDir: config.versionsDir,
    maxVersions: config.maxVersions,
    excludePaths: config.excludePaths,
    logger: logger.child("versions")
  });

  const supervisor = new ProcessSupervisor({
    command: config.process.command,
    args: config.process.args,
    cwd: config.appDir,
    processMatch: config.process.processMatch,
    gracePeriodMs: config.process.gracePeriodMs,
    stopPollIntervalMs: config.process.stopPollIntervalMs,
    startupProbeMs: config.process.startupProbeMs,
    logFile: config.process.logFile,
    logger: logger.child("process")
  });

  const verifier = new HealthVerifier({
    liveness: supervisor,
    signal: createHealthSignal(config.health, supervisor),
    settleMs: config.health.settleMs,
    pollIntervalMs: config.health.pollIntervalMs,
    logger: logger.child("health")
  });

  const remote =
    overrides.remote ??
    new GitHubRemoteSource({
      ...config.github,
      logger: logger.child("github")
    });

  const controller = new UpdateController({
    store,
    supervisor,
    verifier,
    remote,
    appDir: config.appDir,
    pollIntervalMs: config.pollIntervalMs,
    healthTimeoutMs: config.health.timeoutMs,
    defaultVersion: config.defaultVersion,
    healthRecordPath: config.health.recordPath,
    logger: logger.child("updater")
  });

  return { store, supervisor, verifier, remote, controller };
}

export interface ControlServerHandle {
  port: number;
  close: () => Promise<void>;
}

/** Starts the control API when a port is configured; resolves null otherwise. */
export async function startControlServer(
  config: ControlApiConfig,
  controller: UpdateController,
  logger: SupervisorLogger
): Promise<ControlServerHandle | null> {
  if (config.port <= 0) {
    logger.debug("Control API disabled.");
    return null;
  }

  const app = createControlApp({ config, controller, logger });
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, () => {
      listening.off("error", reject);
      resolve(listening);
    });
    listening.once("error", reject);
  });

  logger.info(`Control API listening on http://localhost:${config.port}`);
  return {
    port: config.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      })
  };
}
