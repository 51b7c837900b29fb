// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect, jest } from '@jest/globals';
import {
  SCAN_TIMEOUT_MESSAGE,
  runSecurityScan,
  type OrchestratorDeps,
} from '../../../src/orchestrator/scan-orchestrator.js';
import type { ProgressReporter } from '../../../src/orchestrator/progress.js';
import type { PortProbe } from '../../../src/analyzers/port-scan.js';
import { ScanError } from '../../../src/services/error-handling.js';
import { ErrorCode } from '../../../src/types/errors.js';
import { type Result, ok, err } from '../../../src/types/result.js';
import type { Analyzer } from '../../../src/types/analyzer.js';
import type { HeaderScan, PortScan, TLSScan, Vulnerability } from '../../../src/types/scan.js';
import { createMockLogger } from '../../helpers/logger-mock.js';
import { makeTarget } from '../../helpers/fake-http.js';

const HEADER_SCAN: HeaderScan = {
  headers: {},
  missingHeaders: [],
  weakHeaders: [],
  presentHeaders: [],
  securityScore: 100,
};

const TLS_SCAN: TLSScan = {
  protocol: 'TLS 1.3',
  cipherSuite: 'TLS_AES_128_GCM_SHA256',
  vulnerabilities: [],
  score: 100,
  isSecure: true,
};

const PORT_SCAN: PortScan = {
  openPorts: [{ number: 443, protocol: 'tcp', state: 'open', service: 'https', version: '' }],
  durationMs: 5,
};

function analyzer<T>(name: string, run: () => Promise<Result<T, ScanError>>): Analyzer<T> {
  return { name, run };
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function instantDeps(overrides: OrchestratorDeps = {}): OrchestratorDeps {
  return {
    headers: analyzer('Security Headers', async () => ok(HEADER_SCAN)),
    tls: analyzer('TLS/SSL', async () => ok(TLS_SCAN)),
    sqli: analyzer<Vulnerability[]>('SQL Injection', async () => ok([])),
    xss: analyzer<Vulnerability[]>('XSS', async () => ok([])),
    portProbe: async () => ok(PORT_SCAN),
    isPortProbeAvailable: async () => true,
    ...overrides,
  };
}

function recordingProgress(): ProgressReporter & { percents: number[]; statuses: string[]; steps: string[] } {
  const percents: number[] = [];
  const statuses: string[] = [];
  const steps: string[] = [];
  return {
    percents,
    statuses,
    steps,
    updateProgress(step, percent) {
      steps.push(step);
      percents.push(percent);
    },
    updateStatus(message) {
      statuses.push(message);
    },
  };
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('runSecurityScan', () => {
  it('collects every result when all five probes finish', async () => {
    const progress = recordingProgress();

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 5_000, progress, logger: createMockLogger() },
      instantDeps()
    );

    expect(result.errors).toEqual([]);
    expect(result.headerResults).toEqual(HEADER_SCAN);
    expect(result.tlsResults).toEqual(TLS_SCAN);
    expect(result.portResults).toEqual(PORT_SCAN);
    expect(result.sqliResults).toEqual([]);
    expect(result.xssResults).toEqual([]);
    expect(result.riskLevel).toBe('LOW');
    expect(result.endTime.getTime()).toBeGreaterThanOrEqual(result.startTime.getTime());
    expect(progress.statuses).toEqual([
      'Scanning HTTP security headers...',
      'Analyzing TLS/SSL configuration...',
      'Testing for SQL injection vulnerabilities...',
      'Testing for Cross-Site Scripting (XSS)...',
      'Running Nmap port scan...',
    ]);
    expect(progress.percents).toEqual([20, 40, 60, 80, 100, 100]);
    expect(progress.steps.at(-1)).toBe('All scans complete');
  });

  it('finalises promptly with a timeout error when probes hang', async () => {
    const gates = {
      tls: deferred<Result<TLSScan, ScanError>>(),
      sqli: deferred<Result<Vulnerability[], ScanError>>(),
      xss: deferred<Result<Vulnerability[], ScanError>>(),
    };
    const logger = createMockLogger();

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 20, skipNmap: true, progress: recordingProgress(), logger },
      instantDeps({
        tls: analyzer('TLS/SSL', () => gates.tls.promise),
        sqli: analyzer('SQL Injection', () => gates.sqli.promise),
        xss: analyzer('XSS', () => gates.xss.promise),
      })
    );

    expect(result.endTime.getTime() - result.startTime.getTime()).toBeLessThan(1_000);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.code).toBe(ErrorCode.TIMEOUT_EXCEEDED);
    expect(result.errors[0]?.message).toBe(SCAN_TIMEOUT_MESSAGE);
    expect(result.errors[0]?.context).toEqual({ timeoutMs: 20, completedUnits: 1, totalUnits: 4 });
    expect(result.headerResults).toEqual(HEADER_SCAN);
    expect(result.riskLevel).toBe('LOW');

    gates.tls.resolve(ok(TLS_SCAN));
    gates.sqli.resolve(ok([]));
    gates.xss.resolve(ok([]));
    await flush();

    expect(result.tlsResults).toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith('Dropped late result from TLS/SSL');
  });

  it('records failures and keeps the results of the other probes', async () => {
    const tlsError = new ScanError('TLS connection failed: refused', 'tls', ErrorCode.TLS_CONNECTION_ERROR, {
      analyzer: 'TLS/SSL',
    });

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 5_000, progress: recordingProgress(), logger: createMockLogger() },
      instantDeps({
        tls: analyzer<TLSScan>('TLS/SSL', async () => err(tlsError)),
        sqli: analyzer<Vulnerability[]>('SQL Injection', async () => {
          throw new Error('unexpected failure');
        }),
      })
    );

    expect(result.errors).toHaveLength(2);
    expect(result.errors).toContain(tlsError);
    const thrown = result.errors.find((error) => error !== tlsError);
    expect(thrown?.code).toBe(ErrorCode.CONNECTION_ERROR);
    expect(thrown?.message).toBe('unexpected failure');
    expect(thrown?.context.analyzer).toBe('SQL Injection');
    expect(result.tlsResults).toBeUndefined();
    expect(result.headerResults).toEqual(HEADER_SCAN);
    expect(result.portResults).toEqual(PORT_SCAN);
  });

  it('launches only the enabled probes', async () => {
    const progress = recordingProgress();
    const isPortProbeAvailable = jest.fn(async () => true);
    const headersRun = jest.fn(async (): Promise<Result<HeaderScan, ScanError>> => ok(HEADER_SCAN));

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 5_000, skipNmap: true, skipHeaders: true, skipTls: true, progress, logger: createMockLogger() },
      instantDeps({ isPortProbeAvailable, headers: analyzer('Security Headers', headersRun) })
    );

    expect(isPortProbeAvailable).not.toHaveBeenCalled();
    expect(headersRun).not.toHaveBeenCalled();
    expect(progress.percents).toEqual([50, 100, 100]);
    expect(result.headerResults).toBeUndefined();
    expect(result.tlsResults).toBeUndefined();
    expect(result.portResults).toBeUndefined();
  });

  it('skips the port probe with a warning when nmap is unavailable', async () => {
    const logger = createMockLogger();
    const portProbe = jest.fn<PortProbe>(async () => ok(PORT_SCAN));

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 5_000, progress: recordingProgress(), logger },
      instantDeps({ portProbe, isPortProbeAvailable: async () => false })
    );

    expect(portProbe).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('nmap not found in PATH, skipping port scan');
    expect(result.errors).toEqual([]);
    expect(result.portResults).toBeUndefined();
  });

  it('gives the port probe half of the scan deadline', async () => {
    const portProbe = jest.fn<PortProbe>(async () => ok(PORT_SCAN));
    const logger = createMockLogger();

    await runSecurityScan(
      makeTarget(),
      { timeoutMs: 1_001, progress: recordingProgress(), logger },
      instantDeps({ portProbe })
    );

    expect(portProbe).toHaveBeenCalledWith('app.test', 500, logger);
  });

  it('derives the risk level from the collected findings', async () => {
    const critical: Vulnerability = {
      type: 'sqli',
      severity: 'critical',
      location: 'id',
      payload: "'",
      evidence: 'SQL error detected: sql syntax',
      description: 'Single quote test - SQL error exposed',
    };

    const result = await runSecurityScan(
      makeTarget(),
      { timeoutMs: 5_000, skipNmap: true, progress: recordingProgress(), logger: createMockLogger() },
      instantDeps({ sqli: analyzer<Vulnerability[]>('SQL Injection', async () => ok([critical])) })
    );

    expect(result.sqliResults).toEqual([critical]);
    expect(result.riskLevel).toBe('CRITICAL');
  });
});
