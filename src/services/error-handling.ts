// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { ErrorCode, type ScanErrorContext, type ScanErrorType } from '../types/errors.js';

/** Maps error codes to remediation hints shown next to the message. */
const REMEDIATION_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONNECTION_ERROR]: 'Verify the target is reachable from this host.',
  [ErrorCode.TLS_CONNECTION_ERROR]: 'Check that the target port speaks TLS.',
  [ErrorCode.PARSE_ERROR]: 'Verify the target URL is well formed.',
  [ErrorCode.TIMEOUT_EXCEEDED]: 'Raise --timeout or skip slow probes.',
  [ErrorCode.DNS_RESOLUTION_FAILED]: 'Check the domain name and your resolver.',
  [ErrorCode.CONFIG_VALIDATION_FAILED]: 'Check your config file path and contents.',
};

export class ScanError extends Error {
  override name = 'ScanError' as const;
  readonly type: ScanErrorType;
  readonly code: ErrorCode;
  readonly context: ScanErrorContext;
  readonly timestamp: string;

  constructor(
    message: string,
    type: ScanErrorType,
    code: ErrorCode,
    context: ScanErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.type = type;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      type: this.type,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an unexpected throw from an analyzer into a ScanError. */
export function toScanError(
  error: unknown,
  fallbackType: ScanErrorType,
  fallbackCode: ErrorCode,
  context: ScanErrorContext = {}
): ScanError {
  if (error instanceof ScanError) {
    return error;
  }
  return new ScanError(errorMessage(error), fallbackType, fallbackCode, context, { cause: error });
}

/**
 * Format a ScanError as a pipe-delimited line: origin, code, message and hint.
 */
export function formatScanError(error: ScanError): string {
  const segments: string[] = [];
  if (error.context.analyzer) {
    segments.push(`${error.context.analyzer} failed`);
  }
  segments.push(error.code);
  // Keep the delimiter unambiguous
  segments.push(error.message.replaceAll('|', '/'));

  const hint = REMEDIATION_HINTS[error.code];
  if (hint) {
    segments.push(`Hint: ${hint}`);
  }
  return segments.join('|');
}
