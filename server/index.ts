#!/usr/bin/env node
import { createAbortError, toErrorMessage } from "./abort.js";
import { createSupervisorComponents, startControlServer } from "./runtime/bootstrap.js";
import { ConfigError, resolveSupervisorConfig, type SupervisorConfig } from "./runtime/config.js";
import { createConsoleLogger } from "./runtime/logger.js";
import { acquireInstanceLock } from "./updater/instanceLock.js";

async function main(): Promise<number> {
  let config: SupervisorConfig;
  try {
    config = resolveSupervisorConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[supervisor-config-error] ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = createConsoleLogger({ level: config.logLevel });
  if (config.configFilePath) {
    logger.info(`Loaded configuration from ${config.configFilePath}.`);
  }

  const lock = acquireInstanceLock(config.lockPath, logger.child("lock"));
  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}; shutting down.`);
    shutdown.abort(createAbortError(`Received ${signal}`));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const { controller } = createSupervisorComponents(config, logger);
    const control = await startControlServer(config.control, controller, logger.child("control"));
    try {
      await controller.run(shutdown.signal);
    } finally {
      await control?.close();
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    lock.release();
  }

  logger.info("Supervisor stopped.");
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`[supervisor-fatal] ${toErrorMessage(error)}`, error);
    process.exitCode = 1;
  });
