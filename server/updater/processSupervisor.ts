import { execFile, spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";

import { isAbortError, sleep, throwIfAborted, toErrorMessage } from "../abort.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import type { ProcessHandle, StartResult } from "./types.js";

export interface CommandRunResult {
  code: number;
  stdout: string;
}

/** Runs a short host command; resolves with its exit code instead of rejecting on non-zero. */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandRunResult>;

export interface ProcessSupervisorOptions {
  command: string;
  args: string[];
  cwd: string;
  processMatch: string;
  gracePeriodMs: number;
  stopPollIntervalMs: number;
  startupProbeMs: number;
  logger: SupervisorLogger;
  env?: Record<string, string>;
  logFile?: string;
  outputTailLines?: number;
  killWaitMs?: number;
  commandRunner?: CommandRunner;
}

export interface StartOptions {
  env?: Record<string, string>;
  signal?: AbortSignal;
}

interface TrackedProcess {
  child: ChildProcess;
  handle: ProcessHandle | null;
  exited: boolean;
  exitCode: number | null;
  exitSignal: NodeJS.Signals | null;
  spawnError: Error | null;
  whenExited: Promise<void>;
  logStream: fs.WriteStream | null;
}

const defaultOutputTailLines = 200;
const defaultKillWaitMs = 5_000;

export const defaultCommandRunner: CommandRunner = (command, args) =>
  new Promise<CommandRunResult>((resolve, reject) => {
    execFile(command, args, { timeout: 10_000, maxBuffer: 1024 * 1024 }, (error, stdout) => {
      if (!error) {
        resolve({ code: 0, stdout });
        return;
      }
      if (typeof error.code === "number") {
        resolve({ code: error.code, stdout });
        return;
      }
      reject(error);
    });
  });

function describeExit(tracked: TrackedProcess): string {
  if (tracked.spawnError) {
    return tracked.spawnError.message;
  }
  if (tracked.exitSignal) {
    return `terminated by ${tracked.exitSignal}`;
  }
  return `exited with code ${tracked.exitCode ?? "unknown"}`;
}

/**
 * Waits `ms` unless `signal` aborts first. Returns false when the wait was cut short.
 */
async function waitUnlessAborted(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
  try {
    await sleep(ms, signal);
    return true;
  } catch (error) {
    if (isAbortError(error)) {
      return false;
    }
    throw error;
  }
}

function waitForExit(tracked: TrackedProcess, timeoutMs: number): Promise<boolean> {
  if (tracked.exited) {
    return Promise.resolve(true);
  }

  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(tracked.exited), Math.max(0, timeoutMs));
    void tracked.whenExited.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

/** waitForExit that resolves false as soon as `signal` aborts. */
function waitForExitUnlessAborted(
  tracked: TrackedProcess,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<boolean> {
  if (!signal) {
    return waitForExit(tracked, timeoutMs);
  }
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const onAbort = () => resolve(false);
    signal.addEventListener("abort", onAbort, { once: true });
    void waitForExit(tracked, timeoutMs).then((exited) => {
      signal.removeEventListener("abort", onAbort);
      resolve(exited);
    });
  });
}

export class ProcessSupervisor {
  private readonly options: ProcessSupervisorOptions;
  private readonly logger: SupervisorLogger;
  private readonly runCommand: CommandRunner;
  private readonly tailLimit: number;
  private current: TrackedProcess | null = null;
  private tail: string[] = [];
  private partialLine = "";

  constructor(options: ProcessSupervisorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.runCommand = options.commandRunner ?? defaultCommandRunner;
    this.tailLimit = Math.max(1, options.outputTailLines ?? defaultOutputTailLines);
  }

  isRunning(): boolean {
    return this.current !== null && !this.current.exited;
  }

  getHandle(): ProcessHandle | null {
    return this.isRunning() ? (this.current?.handle ?? null) : null;
  }

  /** Most recent output lines of the process started last, oldest first. */
  outputTail(): string[] {
    return this.partialLine.length > 0 ? [...this.tail, this.partialLine] : [...this.tail];
  }

  private recordOutput(chunk: Buffer | string, logStream: fs.WriteStream | null): void {
    const text = chunk.toString();
    logStream?.write(text);

    const lines = `${this.partialLine}${text}`.split(/\r?\n/);
    this.partialLine = lines.pop() ?? "";
    for (const line of lines) {
      this.tail.push(line);
    }
    if (this.tail.length > this.tailLimit) {
      this.tail.splice(0, this.tail.length - this.tailLimit);
    }
  }

  private openLogStream(): fs.WriteStream | null {
    const logFile = this.options.logFile;
    if (!logFile) {
      return null;
    }

    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    const stream = fs.createWriteStream(logFile, { flags: "a" });
    stream.on("error", (error) => {
      this.logger.warn(`Unable to write application log ${logFile}.`, error);
    });
    return stream;
  }

  private track(child: ChildProcess, logStream: fs.WriteStream | null): TrackedProcess {
    let markExited: () => void = () => undefined;
    const tracked: TrackedProcess = {
      child,
      handle: null,
      exited: false,
      exitCode: null,
      exitSignal: null,
      spawnError: null,
      whenExited: new Promise<void>((resolve) => {
        markExited = resolve;
      }),
      logStream
    };

    const finish = () => {
      if (tracked.exited) {
        return;
      }
      tracked.exited = true;
      tracked.logStream?.end();
      markExited();
    };

    child.once("error", (error) => {
      tracked.spawnError = error;
      finish();
    });
    child.once("exit", (code, signal) => {
      tracked.exitCode = code;
      tracked.exitSignal = signal;
      if (tracked.handle) {
        this.logger.info(`Application (PID ${tracked.handle.pid}) ${describeExit(tracked)}.`);
      }
      finish();
    });

    child.stdout?.on("data", (chunk: Buffer | string) => this.recordOutput(chunk, tracked.logStream));
    child.stderr?.on("data", (chunk: Buffer | string) => this.recordOutput(chunk, tracked.logStream));
    return tracked;
  }

  /**
   * Launches the configured command. A spawn error or an exit inside the startup
   * probe window is reported as `{ ok: false }`; the process is then not tracked.
   */
  async start(options: StartOptions = {}): Promise<StartResult> {
    throwIfAborted(options.signal, "Start aborted");

    const running = this.getHandle();
    if (running) {
      this.logger.warn(`Application already running with PID ${running.pid}.`);
      return { ok: true, handle: running };
    }

    this.logger.info("Starting application...");
    this.tail = [];
    this.partialLine = "";

    const logStream = this.openLogStream();
    let child: ChildProcess;
    try {
      child = spawn(this.options.command, this.options.args, {
        cwd: this.options.cwd,
        env: {
          ...process.env,
          ...(this.options.env ?? {}),
          ...(options.env ?? {})
        },
        stdio: ["ignore", "pipe", "pipe"]
      });
    } catch (error) {
      logStream?.end();
      const message = toErrorMessage(error);
      this.logger.error(`Error starting application: ${message}`);
      return { ok: false, error: message };
    }

    const spawnedAt = new Date().toISOString();
    const tracked = this.track(child, logStream);
    this.current = tracked;

    const exitedEarly = await waitForExitUnlessAborted(tracked, this.options.startupProbeMs, options.signal);

    if (exitedEarly || typeof child.pid !== "number") {
      // A failed spawn has no pid and reports its error on a later tick.
      await waitForExit(tracked, this.options.killWaitMs ?? defaultKillWaitMs);
      this.current = null;
      const message = `Application ${describeExit(tracked)} during startup.`;
      this.logger.error(message);
      return { ok: false, error: message };
    }

    tracked.handle = {
      pid: child.pid,
      startedAt: spawnedAt
    };

    if (options.signal?.aborted) {
      await this.stop();
      return { ok: false, error: "Start aborted." };
    }

    this.logger.info(`Application started with PID ${child.pid}.`);
    return { ok: true, handle: tracked.handle };
  }

  /**
   * SIGTERM, then poll for exit until the grace period ends, then SIGKILL. Aborting
   * `signal` cuts the grace period short. Without a tracked process, falls back to
   * matching the command line.
   */
  async stop(signal?: AbortSignal): Promise<void> {
    const tracked = this.current;
    if (!tracked) {
      await this.stopByCommandMatch(signal);
      return;
    }

    if (tracked.exited) {
      this.current = null;
      return;
    }

    const pid = tracked.handle?.pid ?? tracked.child.pid;
    this.logger.info(`Stopping application with PID ${pid ?? "unknown"}`);
    tracked.child.kill("SIGTERM");

    const deadline = Date.now() + this.options.gracePeriodMs;
    while (!tracked.exited && Date.now() < deadline) {
      const remaining = deadline - Date.now();
      const completed = await waitUnlessAborted(Math.min(this.options.stopPollIntervalMs, remaining), signal);
      if (!completed) {
        this.logger.warn("Stop requested during shutdown; skipping the rest of the grace period.");
        break;
      }
    }

    if (!tracked.exited) {
      this.logger.warn("Force killing application");
      tracked.child.kill("SIGKILL");
      const exited = await waitForExit(tracked, this.options.killWaitMs ?? defaultKillWaitMs);
      if (!exited) {
        this.logger.error(`Application with PID ${pid ?? "unknown"} did not exit after SIGKILL.`);
      }
    }

    if (this.current === tracked) {
      this.current = null;
    }
    this.logger.info("Application stopped");
  }

  private async stopByCommandMatch(signal: AbortSignal | undefined): Promise<void> {
    const pattern = this.options.processMatch.trim();
    if (pattern.length === 0) {
      return;
    }

    const term = await this.runCommand("pkill", ["-TERM", "-f", pattern]);
    if (term.code === 1) {
      this.logger.debug(`No running process matches "${pattern}".`);
      return;
    }
    if (term.code !== 0) {
      this.logger.warn(`pkill -TERM exited with code ${term.code} for "${pattern}".`);
    } else {
      this.logger.info(`Sent SIGTERM to processes matching "${pattern}".`);
    }

    const deadline = Date.now() + this.options.gracePeriodMs;
    while (Date.now() < deadline) {
      const probe = await this.runCommand("pgrep", ["-f", pattern]);
      if (probe.code === 1) {
        this.logger.info(`Processes matching "${pattern}" stopped.`);
        return;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await waitUnlessAborted(Math.min(this.options.stopPollIntervalMs, remaining), signal))) {
        break;
      }
    }

    this.logger.warn(`Force killing processes matching "${pattern}".`);
    const kill = await this.runCommand("pkill", ["-KILL", "-f", pattern]);
    if (kill.code > 1) {
      this.logger.error(`pkill -KILL exited with code ${kill.code} for "${pattern}".`);
    }
  }
}
