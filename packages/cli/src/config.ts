import { promises as fsPromises } from 'fs';
import path from 'path';

import YAML from 'yaml';
import { z } from 'zod';

import { ConfigError } from '@logsweep/core';
import { sourceSettingsSchema, type SourceSettingsInput } from '@logsweep/engine';

export const DEFAULT_SOURCE_NAME = 'circleci';
export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_BUFFER_SIZE = 64;
export const TOKEN_ENV = 'CIRCLECI_TOKEN';

/** Same fields as the source settings, plus where and how the CLI writes chunks. */
export const configFileSchema = z
  .object({
    name: z.string().optional(),
    jobId: z.number().int().optional(),
    sourceId: z.number().int().optional(),
    verify: z.boolean().optional(),
    connection: z
      .object({
        token: z.string().optional(),
      })
      .strict()
      .optional(),
    concurrency: z.number().int().optional(),
    baseUrl: z.string().optional(),
    dashboardUrl: z.string().optional(),
    maxLogBytes: z.number().int().optional(),
    output: z.string().optional(),
    buffer: z.number().int().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ScanCliOptions {
  config?: string;
  token?: string;
  name?: string;
  jobId?: number;
  sourceId?: number;
  concurrency?: number;
  verify?: boolean;
  baseUrl?: string;
  dashboardUrl?: string;
  maxLogBytes?: number;
  output?: string;
  buffer?: number;
}

export interface ResolvedScanConfig {
  settings: SourceSettingsInput;
  output?: string;
  buffer: number;
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export const loadConfigFile = async (filePath: string): Promise<ConfigFile> => {
  const absolutePath = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fsPromises.readFile(absolutePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file ${absolutePath}: ${reason}`);
  }

  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${absolutePath} is not valid YAML: ${reason}`);
  }

  const parsed = configFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join('; ')}`, issues);
  }

  // Relative output paths follow the config file, not the working directory.
  if (parsed.data.output && !path.isAbsolute(parsed.data.output)) {
    return { ...parsed.data, output: path.resolve(path.dirname(absolutePath), parsed.data.output) };
  }
  return parsed.data;
};

/**
 * Merges the config file, the environment and the command line flags, in that
 * order of precedence, and validates the result.
 */
export const resolveScanConfig = async (
  options: ScanCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedScanConfig> => {
  const file = options.config ? await loadConfigFile(options.config) : {};
  const envToken = env[TOKEN_ENV]?.trim() || undefined;

  const settings: SourceSettingsInput = {
    name: options.name ?? file.name ?? DEFAULT_SOURCE_NAME,
    jobId: options.jobId ?? file.jobId ?? 0,
    sourceId: options.sourceId ?? file.sourceId ?? 0,
    verify: options.verify ?? file.verify ?? false,
    connection: {
      token: options.token ?? envToken ?? file.connection?.token ?? '',
    },
    concurrency: options.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
    baseUrl: options.baseUrl ?? file.baseUrl,
    dashboardUrl: options.dashboardUrl ?? file.dashboardUrl,
    maxLogBytes: options.maxLogBytes ?? file.maxLogBytes,
  };

  const parsed = sourceSettingsSchema.safeParse(settings);
  const issues = parsed.success ? [] : formatIssues(parsed.error);
  const buffer = options.buffer ?? file.buffer ?? DEFAULT_BUFFER_SIZE;
  if (!Number.isInteger(buffer) || buffer < 1) {
    issues.push('buffer: buffer must be a positive integer.');
  }
  if (issues.length > 0) {
    throw new ConfigError(`Invalid scan configuration: ${issues.join('; ')}`, issues);
  }

  return {
    settings,
    output: options.output ?? file.output,
    buffer,
  };
};
