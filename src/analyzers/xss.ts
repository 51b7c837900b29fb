// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Reflected cross-site scripting analyzer
 *
 * Verbatim reflection of a payload is high severity. A weaker, deliberately
 * permissive signal flags bodies that still contain "alert" or "xss" once
 * markup characters are stripped from the payload; it will also fire on pages
 * that merely talk about XSS. The DOM check is a text search for client-side
 * sinks; nothing is executed.
 */

import { type Result, ok, isErr } from '../types/result.js';
import type { Analyzer } from '../types/analyzer.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { TargetInfo, Vulnerability } from '../types/scan.js';
import type { ScanError } from '../services/error-handling.js';
import { errorMessage } from '../services/error-handling.js';
import { probe, type FetchLike } from '../services/http-client.js';
import {
  INTER_REQUEST_DELAY_MS,
  extractParameters,
  injectPayload,
  parseTargetUrl,
  sleep,
  type InjectionAnalyzerDeps,
  type TestParameter,
} from './injection.js';

export interface XssPayload {
  payload: string;
  description: string;
}

export const XSS_PAYLOADS: readonly XssPayload[] = [
  { payload: "<script>alert('XSS')</script>", description: 'Basic script injection' },
  { payload: "<img src=x onerror=alert('XSS')>", description: 'Image tag with onerror handler' },
  { payload: "<svg/onload=alert('XSS')>", description: 'SVG with onload handler' },
  { payload: "\"><script>alert('XSS')</script>", description: 'Breaking out of attribute' },
  { payload: "javascript:alert('XSS')", description: 'JavaScript protocol handler' },
  { payload: "<iframe src=javascript:alert('XSS')>", description: 'Iframe with JavaScript URL' },
  { payload: "<body onload=alert('XSS')>", description: 'Body tag with onload' },
  { payload: "<input onfocus=alert('XSS') autofocus>", description: 'Input with autofocus' },
  { payload: "<marquee onstart=alert('XSS')>", description: 'Marquee tag exploitation' },
  { payload: "<details open ontoggle=alert('XSS')>", description: 'Details tag with ontoggle' },
];

export const XSS_FALLBACK_PARAMETERS: readonly TestParameter[] = [
  'q',
  'search',
  'query',
  'keyword',
  'name',
  'comment',
  'message',
  'input',
].map((name) => ({ name, baseline: 'test' }));

export const DOM_PROBE_FRAGMENT = "#<script>alert('XSS')</script>";

/** Client-side sinks, matched against the lowercased body in this order. */
export const DANGEROUS_DOM_SINKS: readonly string[] = [
  'location.hash',
  'window.location.hash',
  'document.location.hash',
  'location.href',
  'document.write(',
  'eval(',
  'innerhtml',
  'outerhtml',
];

export function isReflected(body: string, payload: string): boolean {
  return body.toLowerCase().includes(payload.toLowerCase());
}

/** Reflection that survived partial encoding. */
export function checkPartialReflection(body: string, payload: string): boolean {
  const lowerBody = body.toLowerCase();
  const residual = payload.replace(/[<>'"]/g, '').toLowerCase();

  if (residual.includes('alert') && lowerBody.includes('alert')) {
    return true;
  }
  return residual.includes('xss') && lowerBody.includes('xss');
}

export function findDomSink(body: string): string | undefined {
  const lowerBody = body.toLowerCase();
  return DANGEROUS_DOM_SINKS.find((sink) => lowerBody.includes(sink));
}

export class XssAnalyzer implements Analyzer<Vulnerability[]> {
  readonly name = 'XSS';
  private readonly fetchImpl: FetchLike;
  private readonly pause: (ms: number) => Promise<void>;

  constructor(deps: InjectionAnalyzerDeps = {}) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.pause = deps.sleep ?? sleep;
  }

  async run(target: TargetInfo, logger: ActivityLogger): Promise<Result<Vulnerability[], ScanError>> {
    logger.debug('Starting XSS scan', { url: target.url });

    const parsed = parseTargetUrl(target.url, this.name);
    if (isErr(parsed)) {
      return parsed;
    }
    const url = parsed.value;

    const params = extractParameters(url, XSS_FALLBACK_PARAMETERS);
    if (url.searchParams.toString() === '') {
      logger.debug('No query parameters found, testing common parameter names');
    }

    const vulnerabilities: Vulnerability[] = [];
    for (const param of params) {
      const finding = await this.testParameter(url, params, param.name, logger);
      if (finding) {
        vulnerabilities.push(finding);
      }
    }

    const domFinding = await this.testDomSinks(url, logger);
    if (domFinding) {
      vulnerabilities.push(domFinding);
    }

    logger.info(`XSS scan completed: found ${vulnerabilities.length} potential vulnerabilities`);
    return ok(vulnerabilities);
  }

  private async testParameter(
    url: URL,
    params: readonly TestParameter[],
    paramName: string,
    logger: ActivityLogger
  ): Promise<Vulnerability | undefined> {
    logger.debug(`Testing parameter: ${paramName}`);

    for (const entry of XSS_PAYLOADS) {
      const testUrl = injectPayload(url, params, paramName, entry.payload);

      let body: string | undefined;
      try {
        body = (await probe(this.fetchImpl, testUrl)).body;
      } catch (error) {
        logger.debug(`Request failed for payload '${entry.payload}': ${errorMessage(error)}`);
      }

      if (body !== undefined) {
        if (isReflected(body, entry.payload)) {
          logger.warn(`XSS vulnerability detected in parameter '${paramName}'`);
          return {
            type: 'xss',
            severity: 'high',
            location: paramName,
            payload: entry.payload,
            evidence: 'Payload reflected unescaped in response',
            description: `${entry.description} - Payload found in response without proper encoding`,
          };
        }

        if (checkPartialReflection(body, entry.payload)) {
          logger.warn(`Potential XSS (partial reflection) in parameter '${paramName}'`);
          return {
            type: 'xss',
            severity: 'medium',
            location: paramName,
            payload: entry.payload,
            evidence: 'Payload partially reflected, may be bypassable',
            description: `${entry.description} - Input reflected with partial encoding`,
          };
        }
      }

      await this.pause(INTER_REQUEST_DELAY_MS);
    }
    return undefined;
  }

  private async testDomSinks(url: URL, logger: ActivityLogger): Promise<Vulnerability | undefined> {
    const testUrl = `${url.origin}${url.pathname}${DOM_PROBE_FRAGMENT}`;

    let body: string;
    try {
      body = (await probe(this.fetchImpl, testUrl)).body;
    } catch (error) {
      logger.debug(`DOM probe failed: ${errorMessage(error)}`);
      return undefined;
    }

    const sink = findDomSink(body);
    if (!sink) {
      return undefined;
    }

    logger.warn('Potential DOM-based XSS vulnerability detected');
    return {
      type: 'xss',
      severity: 'medium',
      location: 'DOM',
      payload: DOM_PROBE_FRAGMENT.slice(1),
      evidence: sink,
      description: 'Page uses potentially unsafe DOM manipulation that could lead to XSS',
    };
  }
}
