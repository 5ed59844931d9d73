import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { env } from 'node:process';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { debug } from '../debug.js';
import { UsageError } from '../errors.js';
import { ReportConfigSchema, type ConfigOverrides, type ReportConfig } from './types.js';

const parseByExtension = (raw: string, path: string): unknown => {
  debug('parseByExtension start', { path });
  if (path.endsWith('.json')) {
    const parsed: unknown = JSON.parse(raw);
    debug('parseByExtension end', { format: 'json' });
    return parsed;
  }
  const parsed = yaml.load(raw);
  debug('parseByExtension end', { format: 'yaml' });
  return parsed;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readConfigFile = async (configPath: string): Promise<Record<string, unknown>> => {
  const absPath = resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf8');
  } catch (error) {
    debug('loadConfig readFile failed', { absPath, error });
    throw new UsageError(`Config file not found: ${absPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseByExtension(raw, absPath);
  } catch (error) {
    debug('loadConfig parse failed', { absPath, error });
    throw new UsageError(`Invalid config format in ${absPath}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    debug('loadConfig invalid parsed type', { parsedType: typeof parsed });
    throw new UsageError(`Invalid config format in ${absPath}`);
  }
  return { ...parsed };
};

const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`).join('; ');

/**
 * Resolves the run configuration. Without a config file only the schema defaults,
 * the `KUBECTL_BINARY` environment variable and the CLI overrides apply.
 */
export const loadConfig = async (configPath?: string, overrides?: ConfigOverrides): Promise<ReportConfig> => {
  debug('loadConfig start', { configPath, overrides });
  const configInput: Record<string, unknown> = configPath ? await readConfigFile(configPath) : {};

  if (typeof env.KUBECTL_BINARY === 'string' && env.KUBECTL_BINARY.trim().length > 0) {
    configInput.kubectl = env.KUBECTL_BINARY.trim();
    debug('KUBECTL_BINARY env override applied');
  }

  if (overrides?.csvPath !== undefined) {
    debug('loadConfig applying csvPath override', { csvPath: overrides.csvPath });
    configInput.csvPath = overrides.csvPath;
  }

  if (overrides?.context !== undefined) {
    debug('loadConfig applying context override', { context: overrides.context });
    configInput.context = overrides.context;
  }

  const result = ReportConfigSchema.safeParse(configInput);
  if (!result.success) {
    debug('loadConfig schema validation failed', { issues: result.error.issues });
    throw new UsageError(`Invalid configuration: ${describeIssues(result.error)}`, { cause: result.error });
  }

  debug('loadConfig end', result.data);
  return result.data;
};
