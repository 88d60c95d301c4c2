import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

import type { SupervisorLogger } from "../runtime/logger.js";

export class InstanceLockError extends Error {
  readonly holderPid?: number;

  constructor(message: string, holderPid?: number) {
    super(message);
    this.name = "InstanceLockError";
    this.holderPid = holderPid;
  }
}

export interface LockRecord {
  pid: number;
  startedAt: string;
  hostname: string;
}

const lockRecordSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
  hostname: z.string()
});

export type PidProbe = (pid: number) => boolean;

export const defaultPidProbe: PidProbe = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the pid exists but belongs to someone else.
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
};

function readLockRecord(lockPath: string): LockRecord | null {
  let raw: string;
  try {
    raw = fs.readFileSync(lockPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }

  try {
    const result = lockRecordSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export interface InstanceLock {
  readonly lockPath: string;
  readonly record: LockRecord;
  release(): void;
}

/**
 * Claims `lockPath` for this process. A lock left behind by a pid that no longer
 * runs on this host is reclaimed; a live holder raises InstanceLockError.
 */
export function acquireInstanceLock(
  lockPath: string,
  logger: SupervisorLogger,
  options: { pid?: number; isAlive?: PidProbe } = {}
): InstanceLock {
  const pid = options.pid ?? process.pid;
  const isAlive = options.isAlive ?? defaultPidProbe;
  const record: LockRecord = {
    pid,
    startedAt: new Date().toISOString(),
    hostname: os.hostname()
  };

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      fs.writeFileSync(lockPath, `${JSON.stringify(record, null, 2)}\n`, { encoding: "utf8", flag: "wx" });
      logger.debug(`Acquired instance lock ${lockPath}.`);
      return {
        lockPath,
        record,
        release() {
          const holder = readLockRecord(lockPath);
          if (holder && holder.pid !== pid) {
            logger.warn(`Instance lock ${lockPath} now belongs to PID ${holder.pid}; leaving it.`);
            return;
          }
          fs.rmSync(lockPath, { force: true });
          logger.debug(`Released instance lock ${lockPath}.`);
        }
      };
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw error;
      }
    }

    const holder = readLockRecord(lockPath);
    if (holder && holder.hostname === os.hostname() && holder.pid !== pid && isAlive(holder.pid)) {
      throw new InstanceLockError(
        `Another supervisor (PID ${holder.pid}, started ${holder.startedAt}) holds ${lockPath}.`,
        holder.pid
      );
    }
    if (holder && holder.hostname !== os.hostname()) {
      throw new InstanceLockError(`${lockPath} is held by ${holder.hostname} (PID ${holder.pid}).`, holder.pid);
    }

    logger.warn(`Reclaiming stale instance lock ${lockPath}${holder ? ` from PID ${holder.pid}` : ""}.`);
    fs.rmSync(lockPath, { force: true });
  }

  throw new InstanceLockError(`Unable to acquire ${lockPath}.`);
}
