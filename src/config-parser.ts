// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * Settings resolution: environment defaults < YAML config file < CLI flags.
 */

import { fs, YAML } from 'zx';
import { z } from 'zod';
import { ScanError, errorMessage } from './services/error-handling.js';
import { ErrorCode } from './types/errors.js';
import { type Result, ok, err } from './types/result.js';
import {
  PROBE_CATEGORIES,
  REPORT_FORMATS,
  type ProbeCategory,
  type ReportFormat,
  type ResolvedSettings,
  type ScanConfig,
} from './types/config.js';

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const MAX_TIMEOUT_SECONDS = 3600;
export const DEFAULT_OUTPUT_DIR = './reports';
export const DEFAULT_FORMAT: ReportFormat = 'markdown';

const probeCategorySchema = z.enum(['nmap', 'headers', 'tls', 'sqli', 'xss']);

export const scanConfigSchema = z
  .object({
    skip: z.array(probeCategorySchema).optional(),
    timeout_seconds: z.union([z.number(), z.string()]).optional(),
    output_dir: z.string().min(1).optional(),
    format: z.enum(['markdown', 'json', 'html', 'both', 'all']).optional(),
    verbose: z.union([z.boolean(), z.string()]).optional(),
    log_file: z.string().min(1).optional(),
  })
  .strict();

/** Flags collected from the command line; only set keys override. */
export interface CliOverrides {
  skip?: ProbeCategory[];
  timeoutSeconds?: string;
  outputDir?: string;
  format?: string;
  verbose?: boolean;
  logFile?: string;
}

export type EnvSource = Record<string, string | undefined>;

export function toSafeInt(
  value: number | string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.floor(parsed)));
}

export function toSafeBool(value: boolean | string | undefined, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
  }
  return fallback;
}

function isProbeCategory(value: string): value is ProbeCategory {
  return PROBE_CATEGORIES.some((category) => category === value);
}

export function isReportFormat(value: string | undefined): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * Parse a comma-separated skip list such as "nmap,tls". Unknown names are ignored.
 */
export function parseSkipList(value: string | undefined): ProbeCategory[] {
  if (!value) return [];
  const categories = value
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter(isProbeCategory);
  return Array.from(new Set(categories));
}

export function parseConfigContent(content: string, source: string): Result<ScanConfig, ScanError> {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    return err(
      new ScanError(
        `invalid YAML in ${source}: ${errorMessage(error)}`,
        'config',
        ErrorCode.CONFIG_VALIDATION_FAILED,
        { source },
        { cause: error }
      )
    );
  }

  // Empty file
  if (raw === null || raw === undefined) {
    return ok({});
  }

  const parsed = scanConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return err(
      new ScanError(
        `config validation failed for ${source}: ${issues}`,
        'config',
        ErrorCode.CONFIG_VALIDATION_FAILED,
        { source }
      )
    );
  }
  return ok(parsed.data);
}

export async function loadConfigFile(configPath: string): Promise<Result<ScanConfig, ScanError>> {
  if (!(await fs.pathExists(configPath))) {
    return err(
      new ScanError(
        `config file not found: ${configPath}`,
        'config',
        ErrorCode.CONFIG_VALIDATION_FAILED,
        { source: configPath }
      )
    );
  }
  const content = await fs.readFile(configPath, 'utf8');
  return parseConfigContent(content, configPath);
}

/**
 * Merge the three layers into final settings. Skip lists are unioned;
 * scalar values take the most specific layer that sets them.
 */
export function resolveSettings(
  env: EnvSource,
  fileConfig: ScanConfig,
  cli: CliOverrides
): ResolvedSettings {
  const skip = new Set<ProbeCategory>([
    ...parseSkipList(env['SITEPROBE_SKIP']),
    ...(fileConfig.skip ?? []),
    ...(cli.skip ?? []),
  ]);

  const envTimeout = toSafeInt(
    env['SITEPROBE_TIMEOUT_SECONDS'],
    DEFAULT_TIMEOUT_SECONDS,
    1,
    MAX_TIMEOUT_SECONDS
  );
  const fileTimeout = toSafeInt(fileConfig.timeout_seconds, envTimeout, 1, MAX_TIMEOUT_SECONDS);
  const timeoutSeconds = toSafeInt(cli.timeoutSeconds, fileTimeout, 1, MAX_TIMEOUT_SECONDS);

  const outputDir =
    cli.outputDir ?? fileConfig.output_dir ?? env['SITEPROBE_OUTPUT_DIR'] ?? DEFAULT_OUTPUT_DIR;

  const format: ReportFormat = isReportFormat(cli.format)
    ? cli.format
    : fileConfig.format ?? DEFAULT_FORMAT;

  const verbose = cli.verbose ?? toSafeBool(fileConfig.verbose, false);
  const logFile = cli.logFile ?? fileConfig.log_file;

  return {
    skip,
    timeoutMs: timeoutSeconds * 1000,
    outputDir,
    format,
    verbose,
    ...(logFile !== undefined && { logFile }),
  };
}
