import { nanoid } from "nanoid";

import { isAbortError, mergeAbortSignals, sleep, toErrorMessage } from "../abort.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import type { RemoteSource } from "./releases.js";
import type { StartOptions } from "./processSupervisor.js";
import type { VersionStore } from "./versionStore.js";
import type {
  CycleOutcome,
  ProcessHandle,
  RemoteRelease,
  StartResult,
  UpdatePhase,
  UpdateStatus,
  VersionIdentifier,
  VersionManifest
} from "./types.js";

export class UpdateBusyError extends Error {
  readonly code = "update_busy";

  constructor(message = "An update cycle is already in progress.") {
    super(message);
    this.name = "UpdateBusyError";
  }
}

export class RollbackUnavailableError extends Error {
  readonly code = "rollback_unavailable";

  constructor(message: string) {
    super(message);
    this.name = "RollbackUnavailableError";
  }
}

export interface ManagedProcess {
  start(options?: StartOptions): Promise<StartResult>;
  stop(signal?: AbortSignal): Promise<void>;
  isRunning(): boolean;
  getHandle(): ProcessHandle | null;
}

export interface VersionVerifier {
  verify(timeoutMs: number, expectedVersion: VersionIdentifier): Promise<boolean>;
}

export interface UpdateControllerOptions {
  store: VersionStore;
  supervisor: ManagedProcess;
  verifier: VersionVerifier;
  remote: RemoteSource;
  logger: SupervisorLogger;
  appDir: string;
  pollIntervalMs: number;
  healthTimeoutMs: number;
  defaultVersion: VersionIdentifier;
  healthRecordPath: string;
  createCycleId?: () => string;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class UpdateController {
  private readonly options: UpdateControllerOptions;
  private readonly store: VersionStore;
  private readonly supervisor: ManagedProcess;
  private readonly logger: SupervisorLogger;
  private readonly createCycleId: () => string;
  private readonly rejected = new Set<VersionIdentifier>();
  private phase: UpdatePhase = "idle";
  private busy = false;
  private wake: AbortController | null = null;
  private checkRequested = false;
  private latestVersion?: VersionIdentifier;
  private lastCheckedAt?: string;
  private lastAppliedAt?: string;
  private lastOutcome?: CycleOutcome["kind"];
  private lastError?: string;

  constructor(options: UpdateControllerOptions) {
    this.options = options;
    this.store = options.store;
    this.supervisor = options.supervisor;
    this.logger = options.logger;
    this.createCycleId = options.createCycleId ?? (() => nanoid(8));
  }

  getStatus(): UpdateStatus {
    const previousVersion = this.store.getPrevious();
    return {
      phase: this.phase,
      busy: this.busy,
      currentVersion: this.store.getCurrent(),
      previousVersion,
      history: this.store.getHistory(),
      ...(this.latestVersion ? { latestVersion: this.latestVersion } : {}),
      rejectedVersions: [...this.rejected],
      rollbackAvailable: !this.busy && previousVersion !== null && !this.rejected.has(previousVersion),
      process: this.supervisor.getHandle(),
      ...(this.lastCheckedAt ? { lastCheckedAt: this.lastCheckedAt } : {}),
      ...(this.lastAppliedAt ? { lastAppliedAt: this.lastAppliedAt } : {}),
      ...(this.lastOutcome ? { lastOutcome: this.lastOutcome } : {}),
      ...(this.lastError ? { lastError: this.lastError } : {})
    };
  }

  private startEnv(version: VersionIdentifier): Record<string, string> {
    return {
      OTA_VERSION: version,
      OTA_HEALTH_FILE: this.options.healthRecordPath
    };
  }

  private async lookupLatest(signal?: AbortSignal): Promise<RemoteRelease | null> {
    const release = await this.options.remote.checkLatest(signal);
    this.lastCheckedAt = nowIso();
    if (release) {
      this.latestVersion = release.version;
    }
    return release;
  }

  /**
   * Returns the remote release when it differs from the current version. Remote
   * failures are logged and reported as "nothing to do".
   */
  async checkForUpdate(signal?: AbortSignal): Promise<RemoteRelease | null> {
    try {
      const release = await this.lookupLatest(signal);
      return release && release.version !== this.store.getCurrent() ? release : null;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Error checking for updates: ${toErrorMessage(error)}`);
      return null;
    }
  }

  /** Runs one check-download-apply-verify cycle. Throws UpdateBusyError when one is already running. */
  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    if (this.busy) {
      throw new UpdateBusyError();
    }

    this.busy = true;
    const log = this.logger.child(`cycle:${this.createCycleId()}`);
    let outcome: CycleOutcome;
    try {
      outcome = await this.cycle(log, signal);
    } finally {
      this.busy = false;
      this.phase = "idle";
    }

    this.lastOutcome = outcome.kind;
    this.lastError = "error" in outcome ? outcome.error : undefined;
    return outcome;
  }

  private async cycle(log: SupervisorLogger, signal: AbortSignal | undefined): Promise<CycleOutcome> {
    this.phase = "checking";
    let release: RemoteRelease | null;
    try {
      release = await this.lookupLatest(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = toErrorMessage(error);
      log.warn(`Error checking for updates: ${message}`);
      return { kind: "check_failed", error: message };
    }

    const current = this.store.getCurrent();
    if (!release || release.version === current) {
      log.debug(`No update available (current ${current ?? "none"}).`);
      return { kind: "up_to_date", current };
    }

    const version = release.version;
    if (this.rejected.has(version)) {
      const reason = "failed verification earlier in this run";
      log.info(`Skipping version ${version}: ${reason}.`);
      return { kind: "skipped", version, reason };
    }

    log.info(`Update available: ${current ?? "none"} -> ${version}`);
    this.phase = "downloading";
    const stagingDir = this.store.stagingDir(version);
    let staged: VersionManifest;
    try {
      staged = await this.options.remote.fetch(release, stagingDir, signal);
      await this.store.commitStaged(version, stagingDir);
    } catch (error) {
      await this.store.discardStaged(stagingDir);
      if (signal?.aborted) {
        throw error;
      }
      const message = toErrorMessage(error);
      log.error(`Failed to download version ${version}: ${message}`);
      return { kind: "download_failed", version, error: message };
    }

    return this.apply(version, staged, log);
  }

  private async apply(version: VersionIdentifier, staged: VersionManifest, log: SupervisorLogger): Promise<CycleOutcome> {
    this.phase = "applying";
    log.info(`Applying version ${version}...`);
    try {
      await this.supervisor.stop();
      const outgoing = this.store.getCurrent() ? await this.store.backupCurrent(this.options.appDir) : null;
      await this.store.restoreVersion(version, this.options.appDir, outgoing);
      await this.store.setCurrent(version);
    } catch (error) {
      return this.rollback(version, staged, `Apply failed: ${toErrorMessage(error)}`, log);
    }

    this.phase = "verifying";
    const started = await this.supervisor.start({ env: this.startEnv(version) });
    if (!started.ok) {
      return this.rollback(version, staged, `Start failed: ${started.error}`, log);
    }

    const healthy = await this.options.verifier.verify(this.options.healthTimeoutMs, version);
    if (!healthy) {
      return this.rollback(version, staged, "Health verification failed", log);
    }

    this.phase = "committed";
    this.lastAppliedAt = nowIso();
    log.info(`Update to version ${version} committed.`);
    return { kind: "committed", version };
  }

  private restoreTarget(failedVersion: VersionIdentifier): VersionIdentifier | null {
    return this.store.getCurrent() === failedVersion ? this.store.getPrevious() : this.store.getCurrent();
  }

  private async rollback(
    failedVersion: VersionIdentifier,
    failedManifest: VersionManifest | null,
    reason: string,
    log: SupervisorLogger
  ): Promise<CycleOutcome> {
    this.phase = "rolling_back";
    this.rejected.add(failedVersion);
    log.warn(`${reason}; rolling back from ${failedVersion}.`);

    const target = this.restoreTarget(failedVersion);
    if (!target) {
      const error = `No previous version to roll back to; leaving ${failedVersion} in place.`;
      log.error(error);
      await this.ensureRunning(failedVersion, log);
      return { kind: "rollback_failed", failedVersion, error };
    }

    try {
      await this.restoreTo(target, failedManifest);
    } catch (error) {
      const message = `Rollback to ${target} failed: ${toErrorMessage(error)}`;
      log.error(message, error);
      await this.ensureRunning(this.store.getCurrent() ?? failedVersion, log);
      return { kind: "rollback_failed", failedVersion, error: message };
    }

    log.info(`Rolled back to version ${target}.`);
    return { kind: "rolled_back", failedVersion, restoredVersion: target, error: reason };
  }

  /** Best effort: brings up whatever the live directory holds. */
  private async ensureRunning(version: VersionIdentifier, log: SupervisorLogger): Promise<void> {
    if (this.supervisor.isRunning()) {
      return;
    }
    const started = await this.supervisor.start({ env: this.startEnv(version) });
    if (!started.ok) {
      log.error(`Unable to restart ${version}: ${started.error}`);
    }
  }

  private async restoreTo(target: VersionIdentifier, outgoing: VersionManifest | null): Promise<void> {
    await this.supervisor.stop();
    await this.store.restoreVersion(target, this.options.appDir, outgoing);
    await this.store.setCurrent(target);
    const started = await this.supervisor.start({ env: this.startEnv(target) });
    if (!started.ok) {
      throw new Error(started.error);
    }
  }

  /**
   * Operator-triggered rollback to the previous version. The version rolled back
   * from is not re-applied until the remote publishes something else.
   */
  async rollbackNow(): Promise<CycleOutcome> {
    if (this.busy) {
      throw new UpdateBusyError();
    }

    const current = this.store.getCurrent();
    const previous = this.store.getPrevious();
    if (!current || !previous) {
      throw new RollbackUnavailableError("No previous version to roll back to.");
    }
    if (this.rejected.has(previous)) {
      throw new RollbackUnavailableError(`Version ${previous} failed verification earlier in this run.`);
    }

    this.busy = true;
    this.phase = "rolling_back";
    const log = this.logger.child(`rollback:${this.createCycleId()}`);
    log.info(`Manual rollback from ${current} to ${previous}.`);

    let outcome: CycleOutcome;
    try {
      this.rejected.add(current);
      await this.restoreTo(previous, await this.store.readManifest(current));
      log.info(`Rolled back to version ${previous}.`);
      outcome = { kind: "rolled_back", failedVersion: current, restoredVersion: previous, error: "Manual rollback requested." };
    } catch (error) {
      const message = `Rollback to ${previous} failed: ${toErrorMessage(error)}`;
      log.error(message, error);
      await this.ensureRunning(this.store.getCurrent() ?? current, log);
      outcome = { kind: "rollback_failed", failedVersion: current, error: message };
    } finally {
      this.busy = false;
      this.phase = "idle";
    }

    this.lastOutcome = outcome.kind;
    this.lastError = outcome.error;
    return outcome;
  }

  /**
   * Brings the managed application up. Without a history the live directory is
   * adopted as the default version first; a failed start triggers that same
   * initialization and one more attempt.
   */
  async bootstrap(signal?: AbortSignal): Promise<StartResult> {
    const { appDir, defaultVersion } = this.options;
    if (!this.store.hasHistory()) {
      await this.store.initializeFromExisting(appDir, defaultVersion);
    }

    const version = this.store.getCurrent() ?? defaultVersion;
    const started = await this.supervisor.start({ env: this.startEnv(version), signal });
    if (started.ok || signal?.aborted) {
      return started;
    }

    this.logger.warn(`Failed to start application (${started.error}); initializing from ${appDir}.`);
    await this.store.initializeFromExisting(appDir, defaultVersion);
    const retried = await this.supervisor.start({
      env: this.startEnv(this.store.getCurrent() ?? defaultVersion),
      signal
    });
    if (!retried.ok) {
      this.logger.error(`Application could not be started: ${retried.error}`);
    }
    return retried;
  }

  /** Skips the rest of the current wait so the next cycle starts right away. */
  requestCheck(): void {
    this.checkRequested = true;
    this.wake?.abort();
  }

  private async waitForNextCycle(signal: AbortSignal): Promise<void> {
    if (this.checkRequested) {
      this.checkRequested = false;
      return;
    }

    const wake = new AbortController();
    this.wake = wake;
    const merged = mergeAbortSignals([signal, wake.signal]);
    try {
      await sleep(this.options.pollIntervalMs, merged.signal);
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
    } finally {
      merged.dispose();
      this.wake = null;
      this.checkRequested = false;
    }
  }

  /**
   * Bootstraps, then polls until `signal` aborts. A cycle that reached applying
   * finishes before the loop exits; the application is stopped on the way out.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info(`Supervisor started (poll interval ${this.options.pollIntervalMs}ms).`);
    try {
      await this.bootstrap(signal);
      while (!signal.aborted) {
        try {
          const outcome = await this.runCycle(signal);
          this.logger.debug(`Cycle finished: ${outcome.kind}.`);
        } catch (error) {
          if (signal.aborted && isAbortError(error)) {
            break;
          }
          this.logger.error(`Update cycle failed: ${toErrorMessage(error)}`, error);
        }

        if (signal.aborted) {
          break;
        }
        await this.waitForNextCycle(signal);
      }
    } catch (error) {
      if (!(signal.aborted && isAbortError(error))) {
        throw error;
      }
    } finally {
      this.logger.info("Shutting down supervisor...");
      try {
        await this.supervisor.stop();
      } catch (error) {
        this.logger.error("Unable to stop application during shutdown.", error);
      }
    }
  }
}
