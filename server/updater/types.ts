export type VersionIdentifier = string;

export interface ManifestFileEntry {
  path: string;
  sha256: string;
  size: number;
}

export interface VersionManifest {
  version: VersionIdentifier;
  createdAt: string;
  files: ManifestFileEntry[];
}

export interface VersionHistorySnapshot {
  versions: VersionIdentifier[];
}

export type ReleaseKind = "release" | "commit";

export interface RemoteRelease {
  version: VersionIdentifier;
  kind: ReleaseKind;
  /** Release id for tagged releases, full commit sha for commits. */
  ref: string;
  publishedAt?: string;
}

export interface ProcessHandle {
  pid: number;
  startedAt: string;
}

export type StartResult =
  | { ok: true; handle: ProcessHandle }
  | { ok: false; error: string };

export interface HealthRecord {
  ok: boolean;
  version: string;
  updatedAt: string;
  detail?: string;
}

export interface CoreHealthSnapshot {
  ok: boolean;
  version?: string;
  now?: string;
}

export type UpdatePhase =
  | "idle"
  | "checking"
  | "downloading"
  | "applying"
  | "verifying"
  | "committed"
  | "rolling_back";

export type CycleOutcome =
  | { kind: "up_to_date"; current: VersionIdentifier | null }
  | { kind: "skipped"; version: VersionIdentifier; reason: string }
  | { kind: "check_failed"; error: string }
  | { kind: "download_failed"; version: VersionIdentifier; error: string }
  | { kind: "committed"; version: VersionIdentifier }
  | { kind: "rolled_back"; failedVersion: VersionIdentifier; restoredVersion: VersionIdentifier; error: string }
  | { kind: "rollback_failed"; failedVersion: VersionIdentifier; error: string };

export interface UpdateStatus {
  phase: UpdatePhase;
  busy: boolean;
  currentVersion: VersionIdentifier | null;
  previousVersion: VersionIdentifier | null;
  history: VersionIdentifier[];
  latestVersion?: VersionIdentifier;
  rejectedVersions: VersionIdentifier[];
  rollbackAvailable: boolean;
  process: ProcessHandle | null;
  lastCheckedAt?: string;
  lastAppliedAt?: string;
  lastOutcome?: CycleOutcome["kind"];
  lastError?: string;
}
