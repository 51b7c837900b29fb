// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Security header analyzer
 *
 * Sends one lightweight request (HEAD, falling back to GET) without following
 * redirects and grades seven browser hardening headers.
 */

import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { Analyzer } from '../types/analyzer.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { HeaderScan, SecurityHeader, Severity, TargetInfo } from '../types/scan.js';
import { ScanError, errorMessage } from '../services/error-handling.js';
import { probe, type FetchLike, type ProbeResponse } from '../services/http-client.js';
import { calculateHeaderScore } from '../services/scoring.js';

export interface SecurityHeaderDefinition {
  name: string;
  description: string;
  severity: Severity;
}

export const SECURITY_HEADERS: readonly SecurityHeaderDefinition[] = [
  {
    name: 'Strict-Transport-Security',
    description: 'Enforces secure HTTPS connections',
    severity: 'high',
  },
  {
    name: 'Content-Security-Policy',
    description: 'Prevents XSS and data injection attacks',
    severity: 'high',
  },
  { name: 'X-Frame-Options', description: 'Prevents clickjacking attacks', severity: 'medium' },
  { name: 'X-Content-Type-Options', description: 'Prevents MIME-type sniffing', severity: 'medium' },
  { name: 'Referrer-Policy', description: 'Controls referrer information', severity: 'low' },
  {
    name: 'Permissions-Policy',
    description: 'Controls browser features and APIs',
    severity: 'medium',
  },
  {
    name: 'X-XSS-Protection',
    description: 'Legacy XSS filter (deprecated but still useful)',
    severity: 'low',
  },
];

/** Six months. */
export const HSTS_MIN_MAX_AGE = 15_552_000;

const HEADER_TIMEOUT_MS = 15_000;

/** Value of the first `max-age=` directive, or 0 when absent or unparseable. */
export function extractMaxAge(value: string): number {
  for (const part of value.toLowerCase().split(';')) {
    const match = /^max-age=(\d+)/.exec(part.trim());
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }
  return 0;
}

export function isWeakHeader(name: string, value: string): boolean {
  const lowerValue = value.toLowerCase();

  switch (name) {
    case 'Strict-Transport-Security':
      return !lowerValue.includes('max-age=') || extractMaxAge(lowerValue) < HSTS_MIN_MAX_AGE;
    case 'Content-Security-Policy':
      if (lowerValue.includes('unsafe-inline') || lowerValue.includes('unsafe-eval')) {
        return true;
      }
      return lowerValue.includes('*') && !lowerValue.includes("'*'");
    case 'X-Frame-Options':
      return lowerValue.includes('allow');
    case 'X-XSS-Protection':
      return lowerValue.includes('0');
    default:
      return false;
  }
}

/** `content-security-policy` -> `Content-Security-Policy` */
function canonicalHeaderName(name: string): string {
  return name
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join('-');
}

/**
 * Grade a header set against the fixed definitions. Every definition lands in
 * exactly one of the three lists.
 */
export function analyzeHeaders(headers: Headers): HeaderScan {
  const scan: HeaderScan = {
    headers: {},
    missingHeaders: [],
    weakHeaders: [],
    presentHeaders: [],
    securityScore: 0,
  };

  headers.forEach((value, key) => {
    scan.headers[canonicalHeaderName(key)] = value;
  });

  for (const definition of SECURITY_HEADERS) {
    const value = headers.get(definition.name);

    if (value === null) {
      scan.missingHeaders.push({
        name: definition.name,
        value: '',
        status: 'missing',
        severity: definition.severity,
        description: definition.description,
      });
      continue;
    }

    const entry: SecurityHeader = isWeakHeader(definition.name, value)
      ? {
          name: definition.name,
          value,
          status: 'weak',
          severity: definition.severity,
          description: `${definition.description} (weak configuration)`,
        }
      : {
          name: definition.name,
          value,
          status: 'present',
          severity: 'info',
          description: definition.description,
        };
    (entry.status === 'weak' ? scan.weakHeaders : scan.presentHeaders).push(entry);
  }

  scan.securityScore = calculateHeaderScore(scan.presentHeaders.length, SECURITY_HEADERS.length);
  return scan;
}

export interface HeaderAnalyzerDeps {
  fetch?: FetchLike;
}

export class HeaderAnalyzer implements Analyzer<HeaderScan> {
  readonly name = 'Security Headers';
  private readonly fetchImpl: FetchLike;

  constructor(deps: HeaderAnalyzerDeps = {}) {
    this.fetchImpl = deps.fetch ?? fetch;
  }

  async run(target: TargetInfo, logger: ActivityLogger): Promise<Result<HeaderScan, ScanError>> {
    logger.debug('Starting security headers scan', { url: target.url });

    let response: ProbeResponse | undefined;
    try {
      response = await probe(this.fetchImpl, target.url, {
        method: 'HEAD',
        timeoutMs: HEADER_TIMEOUT_MS,
      });
    } catch (error) {
      logger.debug(`HEAD request failed, trying GET: ${errorMessage(error)}`);
    }

    if (!response || response.status >= 400) {
      try {
        response = await probe(this.fetchImpl, target.url, { timeoutMs: HEADER_TIMEOUT_MS });
      } catch (error) {
        return err(
          new ScanError(
            `failed to connect: ${errorMessage(error)}`,
            'network',
            ErrorCode.CONNECTION_ERROR,
            { analyzer: this.name, url: target.url },
            { cause: error }
          )
        );
      }
    }

    logger.debug(`Response status: ${response.status}`);
    const scan = analyzeHeaders(response.headers);

    logger.info(
      `Security headers scan completed: Score ${scan.securityScore}/100, ` +
        `${scan.missingHeaders.length} missing, ${scan.weakHeaders.length} weak, ` +
        `${scan.presentHeaders.length} present`
    );
    return ok(scan);
  }
}
