import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError, formatSchemaIssues } from '../errors';
import { createLogger } from '../utils/logger';
import { getConfigPath } from './paths';
import {
  type PipelineConfig,
  type PipelineConfigInput,
  PipelineConfigSchema,
} from './schema';

const logger = createLogger('config');

const CONFIG_PATH_ENV = 'FAMILY_INTAKE_CONFIG';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

export function resolveConfigPath(projectDir: string): string {
  const override = process.env[CONFIG_PATH_ENV]?.trim();
  if (!override) return getConfigPath(projectDir);
  if (path.isAbsolute(override)) return path.normalize(override);
  return path.normalize(path.join(projectDir, override));
}

function readConfigFile(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (isPlainObject(parsed)) return parsed;
    logger.log('ignoring non-object config file', { file });
  } catch (error) {
    logger.log('ignoring malformed config file', { file, error });
  }
  return {};
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input ?? {});
  if (parsed.success) return parsed.data;
  throw new ConfigError(formatSchemaIssues(parsed.error.issues));
}

/**
 * Reads `<projectDir>/.family-intake/config.json` (or the file named by
 * FAMILY_INTAKE_CONFIG) and layers `overrides` on top.
 */
export function loadPipelineConfig(
  projectDir: string,
  overrides: PipelineConfigInput = {},
): PipelineConfig {
  const fromFile = readConfigFile(resolveConfigPath(projectDir));
  return parsePipelineConfig(deepMerge(fromFile, overrides));
}
