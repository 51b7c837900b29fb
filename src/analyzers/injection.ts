// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Shared plumbing for the reflected-injection analyzers: parameter
 * discovery, payload substitution and the fixed pacing delay.
 */

import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { ScanError, errorMessage } from '../services/error-handling.js';
import type { FetchLike } from '../services/http-client.js';

/** Pause after every payload attempt that produced no finding. Not configurable. */
export const INTER_REQUEST_DELAY_MS = 100;

export interface TestParameter {
  name: string;
  baseline: string;
}

export interface InjectionAnalyzerDeps {
  fetch?: FetchLike;
  /** Test seam for the pacing delay; the interval itself stays fixed. */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function parseTargetUrl(rawUrl: string, analyzer: string): Result<URL, ScanError> {
  try {
    return ok(new URL(rawUrl));
  } catch (error) {
    return err(
      new ScanError(
        `failed to parse URL: ${errorMessage(error)}`,
        'input',
        ErrorCode.PARSE_ERROR,
        { analyzer, url: rawUrl },
        { cause: error }
      )
    );
  }
}

/**
 * Query parameters of the URL (unique names, first value as baseline), or
 * the fallback set when the URL has none.
 */
export function extractParameters(
  url: URL,
  fallback: readonly TestParameter[]
): TestParameter[] {
  const params: TestParameter[] = [];
  const seen = new Set<string>();
  for (const [name, value] of url.searchParams) {
    if (seen.has(name)) continue;
    seen.add(name);
    params.push({ name, baseline: value });
  }
  return params.length > 0 ? params : fallback.map((param) => ({ ...param }));
}

/**
 * Build a request URL where `target` carries the payload and every other
 * parameter keeps its baseline value. The fragment is dropped.
 */
export function injectPayload(
  url: URL,
  params: readonly TestParameter[],
  target: string,
  payload: string
): string {
  const testUrl = new URL(url.href);
  testUrl.hash = '';
  for (const param of params) {
    if (!testUrl.searchParams.has(param.name)) {
      testUrl.searchParams.append(param.name, param.baseline);
    }
  }
  testUrl.searchParams.set(target, payload);
  return testUrl.toString();
}
