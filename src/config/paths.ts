import * as path from 'node:path';

const DATA_DIR_NAME = '.family-intake';

export function getDataRootDir(projectDir: string): string {
  const normalized = path.resolve(projectDir);
  if (path.basename(normalized) === DATA_DIR_NAME) return normalized;
  return path.join(normalized, DATA_DIR_NAME);
}

export function getConfigPath(projectDir: string): string {
  return path.join(getDataRootDir(projectDir), 'config.json');
}

export function getStoreDir(projectDir: string): string {
  return path.join(getDataRootDir(projectDir), 'store');
}

export function getAuditDir(projectDir: string): string {
  return path.join(getDataRootDir(projectDir), 'audit');
}
