// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * In-process stand-in for global fetch. Each call is recorded and answered by
 * a handler; a handler may throw to simulate a network failure.
 */

import type { FetchLike } from '../../src/services/http-client.js';
import type { TargetInfo } from '../../src/types/scan.js';

export interface FakeRequest {
  url: string;
  method: string;
}

export interface FakeReply {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

export type FakeHandler = (request: FakeRequest) => FakeReply;

export interface FakeFetch {
  fetch: FetchLike;
  requests: FakeRequest[];
}

export function createFakeFetch(handler: FakeHandler): FakeFetch {
  const requests: FakeRequest[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const request: FakeRequest = { url: input, method: init?.method ?? 'GET' };
    requests.push(request);
    const reply = handler(request);
    return new Response(reply.body ?? '', {
      status: reply.status ?? 200,
      headers: reply.headers ?? {},
    });
  };
  return { fetch: fetchImpl, requests };
}

export const noSleep = async (): Promise<void> => undefined;

export function makeTarget(overrides: Partial<TargetInfo> = {}): TargetInfo {
  return {
    url: 'https://app.test/search',
    domain: 'app.test',
    ip: '192.0.2.10',
    protocol: 'https',
    port: 443,
    ...overrides,
  };
}

/** Value of one query parameter of a recorded request URL. */
export function queryValue(url: string, name: string): string | null {
  return new URL(url).searchParams.get(name);
}
