// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Thin wrapper over global fetch used by every HTTP probe.
 *
 * Redirects are never followed: the analyzers inspect the first response the
 * target sends back, including 3xx responses.
 */

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_USER_AGENT = 'siteprobe/1.0';
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export interface ProbeRequestInit {
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface ProbeResponse {
  status: number;
  headers: Headers;
  body: string;
  /** Size of the raw body in bytes. */
  length: number;
}

function buildRequestInit(init: ProbeRequestInit, signal: AbortSignal): RequestInit {
  return {
    method: init.method ?? 'GET',
    redirect: 'manual',
    signal,
    headers: {
      'user-agent': DEFAULT_USER_AGENT,
      accept: '*/*',
      ...init.headers,
    },
  };
}

/**
 * Issue a request and read the whole body. The timeout covers both the
 * response headers and the body.
 */
export async function probe(
  fetchImpl: FetchLike,
  targetUrl: string,
  init: ProbeRequestInit = {}
): Promise<ProbeResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), init.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  try {
    const response = await fetchImpl(targetUrl, buildRequestInit(init, controller.signal));
    const bytes = Buffer.from(await response.arrayBuffer());
    return {
      status: response.status,
      headers: response.headers,
      body: bytes.toString('utf8'),
      length: bytes.length,
    };
  } finally {
    clearTimeout(timer);
  }
}
