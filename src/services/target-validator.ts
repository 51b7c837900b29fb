// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Target validation
 *
 * Turns a user-supplied URL into the TargetInfo every probe consumes:
 * scheme defaulting and checking, port derivation, DNS resolution and one
 * reachability request.
 */

import dns from 'dns/promises';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { TargetInfo, TargetProtocol } from '../types/scan.js';
import { ScanError, errorMessage } from './error-handling.js';
import { probe, type FetchLike } from './http-client.js';

const REACHABILITY_TIMEOUT_MS = 10_000;
const SENSITIVE_PARAM_MARKERS = ['token', 'key', 'secret', 'password'];

export interface ParsedTarget {
  url: string;
  domain: string;
  protocol: TargetProtocol;
  port: number;
}

export type AddressLookup = (hostname: string) => Promise<Array<{ address: string; family: number }>>;

export interface TargetValidatorDeps {
  lookup?: AddressLookup;
  fetch?: FetchLike;
}

const defaultLookup: AddressLookup = (hostname) => dns.lookup(hostname, { all: true });

/** Parse and normalise a raw URL without touching the network. */
export function parseTarget(rawUrl: string): Result<ParsedTarget, ScanError> {
  const trimmed = rawUrl.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch (error) {
    return err(
      new ScanError(`invalid URL format: ${errorMessage(error)}`, 'input', ErrorCode.PARSE_ERROR, {
        url: rawUrl,
      })
    );
  }

  const scheme = parsed.protocol.replace(/:$/, '');
  const protocol: TargetProtocol | undefined =
    scheme === 'http' || scheme === 'https' ? scheme : undefined;
  if (!protocol) {
    return err(
      new ScanError(
        `unsupported protocol: ${scheme} (only http/https allowed)`,
        'input',
        ErrorCode.PARSE_ERROR,
        { url: rawUrl }
      )
    );
  }

  const domain = parsed.hostname.replace(/^\[|\]$/g, '');
  if (!domain) {
    return err(
      new ScanError('could not extract domain from URL', 'input', ErrorCode.PARSE_ERROR, { url: rawUrl })
    );
  }

  const port = parsed.port ? Number.parseInt(parsed.port, 10) : protocol === 'https' ? 443 : 80;
  return ok({ url: withScheme, domain, protocol, port });
}

/** First IPv4 address, else the first address of any family. */
export async function resolveIP(domain: string, lookup: AddressLookup = defaultLookup): Promise<string> {
  const addresses = await lookup(domain);
  const first = addresses.find((entry) => entry.family === 4) ?? addresses[0];
  if (!first) {
    throw new Error('no IP addresses found for domain');
  }
  return first.address;
}

export async function validateAndParseURL(
  rawUrl: string,
  logger: ActivityLogger,
  deps: TargetValidatorDeps = {}
): Promise<Result<TargetInfo, ScanError>> {
  const parsed = parseTarget(rawUrl);
  if (!parsed.ok) {
    return parsed;
  }
  const { url, domain, protocol, port } = parsed.value;

  let ip: string;
  try {
    ip = await resolveIP(domain, deps.lookup);
  } catch (error) {
    return err(
      new ScanError(
        `DNS resolution failed: ${errorMessage(error)}`,
        'network',
        ErrorCode.DNS_RESOLUTION_FAILED,
        { domain },
        { cause: error }
      )
    );
  }
  logger.debug(`Resolved ${domain} to ${ip}`);

  try {
    await probe(deps.fetch ?? fetch, url, { timeoutMs: REACHABILITY_TIMEOUT_MS });
  } catch (error) {
    return err(
      new ScanError(
        `target unreachable: ${errorMessage(error)}`,
        'network',
        ErrorCode.TARGET_UNREACHABLE,
        { url: sanitizeUrl(url) },
        { cause: error }
      )
    );
  }

  return ok({ url, domain, ip, protocol, port });
}

/** Drop credentials and redact sensitive query values before logging a URL. */
export function sanitizeUrl(rawUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return rawUrl;
  }

  parsed.username = '';
  parsed.password = '';
  for (const key of new Set(parsed.searchParams.keys())) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_PARAM_MARKERS.some((marker) => lowerKey.includes(marker))) {
      parsed.searchParams.set(key, '[REDACTED]');
    }
  }
  return parsed.toString();
}
