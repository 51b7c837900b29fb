// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Error type definitions
 */

export enum ErrorCode {
  // Probe failures
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  TLS_CONNECTION_ERROR = 'TLS_CONNECTION_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  TIMEOUT_EXCEEDED = 'TIMEOUT_EXCEEDED',

  // Port probe
  PORT_SCAN_FAILED = 'PORT_SCAN_FAILED',

  // Target validation
  DNS_RESOLUTION_FAILED = 'DNS_RESOLUTION_FAILED',
  TARGET_UNREACHABLE = 'TARGET_UNREACHABLE',

  // CLI surface
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  REPORT_WRITE_FAILED = 'REPORT_WRITE_FAILED',
}

export type ScanErrorType =
  | 'network'
  | 'tls'
  | 'input'
  | 'timeout'
  | 'tool'
  | 'config'
  | 'filesystem';

export interface ScanErrorContext {
  analyzer?: string;
  url?: string;
  [key: string]: unknown;
}
