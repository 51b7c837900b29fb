// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Configuration type definitions
 */

export type ProbeCategory = 'nmap' | 'headers' | 'tls' | 'sqli' | 'xss';

export const PROBE_CATEGORIES: readonly ProbeCategory[] = ['nmap', 'headers', 'tls', 'sqli', 'xss'];

/** `both` is markdown plus JSON; `all` adds HTML. */
export type ReportFormat = 'markdown' | 'json' | 'html' | 'both' | 'all';

export const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json', 'html', 'both', 'all'];

/**
 * Contents of an optional YAML config file.
 *
 * Note: values may arrive as strings from YAML parsing and are coerced by
 * the config parser.
 */
export interface ScanConfig {
  skip?: ProbeCategory[];
  timeout_seconds?: number | string;
  output_dir?: string;
  format?: ReportFormat;
  verbose?: boolean | string;
  log_file?: string;
}

/** Fully resolved settings after merging environment, config file and CLI flags. */
export interface ResolvedSettings {
  skip: Set<ProbeCategory>;
  timeoutMs: number;
  outputDir: string;
  format: ReportFormat;
  verbose: boolean;
  logFile?: string;
}
