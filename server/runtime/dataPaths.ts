import path from "node:path";

const DEFAULT_DATA_DIR = "data";

function normalizeDataDir(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveDataRootPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  configured?: string
): string {
  const dataDir = normalizeDataDir(env.OTA_DATA_DIR) ?? normalizeDataDir(configured) ?? DEFAULT_DATA_DIR;
  return path.resolve(cwd, dataDir);
}
