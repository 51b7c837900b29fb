// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Probe orchestrator
 *
 * Launches every enabled probe as an independent unit, bounds the whole run by
 * one deadline and folds unit outcomes into a ScanResult. Units never touch
 * the result: each posts a single message to a mailbox and the aggregator
 * loop below is the only writer. When the deadline wins, the aggregator stops
 * reading, closes the mailbox and finalises with whatever has arrived.
 *
 * Orchestration never rejects; failures end up in ScanResult.errors.
 */

import { ErrorCode } from '../types/errors.js';
import { type Result, err } from '../types/result.js';
import type { Analyzer } from '../types/analyzer.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type {
  CompletedScanResult,
  HeaderScan,
  PortScan,
  ScanResult,
  TLSScan,
  TargetInfo,
  Vulnerability,
} from '../types/scan.js';
import { ScanError, errorMessage, toScanError } from '../services/error-handling.js';
import { calculateRiskLevel } from '../services/scoring.js';
import { HeaderAnalyzer } from '../analyzers/headers.js';
import { TlsAnalyzer } from '../analyzers/tls.js';
import { SqliAnalyzer } from '../analyzers/sqli.js';
import { XssAnalyzer } from '../analyzers/xss.js';
import { createNmapProbe, isNmapInstalled, type PortProbe } from '../analyzers/port-scan.js';
import { createConsoleLogger } from '../audit/console-logger.js';
import { Mailbox } from './mailbox.js';
import { ConsoleProgress, type ProgressReporter } from './progress.js';

export interface ScanOptions {
  skipNmap?: boolean;
  skipHeaders?: boolean;
  skipTls?: boolean;
  skipSqli?: boolean;
  skipXss?: boolean;
  timeoutMs: number;
  progress?: ProgressReporter;
  logger?: ActivityLogger;
}

/** Probe implementations; defaults hit the network and the local nmap binary. */
export interface OrchestratorDeps {
  headers?: Analyzer<HeaderScan>;
  tls?: Analyzer<TLSScan>;
  sqli?: Analyzer<Vulnerability[]>;
  xss?: Analyzer<Vulnerability[]>;
  portProbe?: PortProbe;
  /** Checked once before launch. */
  isPortProbeAvailable?: () => Promise<boolean>;
}

export const SCAN_TIMEOUT_MESSAGE = 'scan timeout exceeded';

type UnitMessage =
  | { kind: 'nmap'; label: string; result: Result<PortScan, ScanError> }
  | { kind: 'headers'; label: string; result: Result<HeaderScan, ScanError> }
  | { kind: 'tls'; label: string; result: Result<TLSScan, ScanError> }
  | { kind: 'sqli'; label: string; result: Result<Vulnerability[], ScanError> }
  | { kind: 'xss'; label: string; result: Result<Vulnerability[], ScanError> };

type UnitKind = UnitMessage['kind'];

interface ProbeUnit {
  kind: UnitKind;
  label: string;
  status: string;
  enabled: boolean;
  run: () => Promise<UnitMessage>;
}

const TIMED_OUT = Symbol('timed-out');

interface Deadline {
  promise: Promise<typeof TIMED_OUT>;
  cancel(): void;
}

function startDeadline(timeoutMs: number): Deadline {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, timeoutMs));
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

function buildUnits(
  target: TargetInfo,
  options: ScanOptions,
  deps: Required<Omit<OrchestratorDeps, 'isPortProbeAvailable'>>,
  portProbeEnabled: boolean,
  logger: ActivityLogger
): ProbeUnit[] {
  return [
    {
      kind: 'headers',
      label: 'Security Headers',
      status: 'Scanning HTTP security headers...',
      enabled: !options.skipHeaders,
      run: async () => ({
        kind: 'headers',
        label: 'Security Headers',
        result: await deps.headers.run(target, logger),
      }),
    },
    {
      kind: 'tls',
      label: 'TLS/SSL',
      status: 'Analyzing TLS/SSL configuration...',
      enabled: !options.skipTls,
      run: async () => ({ kind: 'tls', label: 'TLS/SSL', result: await deps.tls.run(target, logger) }),
    },
    {
      kind: 'sqli',
      label: 'SQL Injection',
      status: 'Testing for SQL injection vulnerabilities...',
      enabled: !options.skipSqli,
      run: async () => ({
        kind: 'sqli',
        label: 'SQL Injection',
        result: await deps.sqli.run(target, logger),
      }),
    },
    {
      kind: 'xss',
      label: 'XSS',
      status: 'Testing for Cross-Site Scripting (XSS)...',
      enabled: !options.skipXss,
      run: async () => ({ kind: 'xss', label: 'XSS', result: await deps.xss.run(target, logger) }),
    },
    {
      kind: 'nmap',
      label: 'Nmap',
      status: 'Running Nmap port scan...',
      enabled: portProbeEnabled,
      // Half the global budget; the probe kills its child process on overrun
      run: async () => ({
        kind: 'nmap',
        label: 'Nmap',
        result: await deps.portProbe(target.domain, Math.floor(options.timeoutMs / 2), logger),
      }),
    },
  ];
}

/** Turn a throw from a unit into the same message shape as an Err result. */
function failedMessage(unit: ProbeUnit, error: unknown): UnitMessage {
  const scanError = toScanError(error, 'network', ErrorCode.CONNECTION_ERROR, { analyzer: unit.label });
  switch (unit.kind) {
    case 'nmap':
      return { kind: 'nmap', label: unit.label, result: err(scanError) };
    case 'headers':
      return { kind: 'headers', label: unit.label, result: err(scanError) };
    case 'tls':
      return { kind: 'tls', label: unit.label, result: err(scanError) };
    case 'sqli':
      return { kind: 'sqli', label: unit.label, result: err(scanError) };
    case 'xss':
      return { kind: 'xss', label: unit.label, result: err(scanError) };
  }
}

/** Fold one unit outcome into the result. Only the aggregator calls this. */
function applyMessage(result: ScanResult, message: UnitMessage, logger: ActivityLogger): void {
  if (!message.result.ok) {
    const failure = message.result.error;
    if (message.kind === 'nmap') {
      logger.warn(`Nmap scan failed: ${failure.message}`);
    } else {
      logger.error(`${message.label} scan failed: ${failure.message}`);
    }
    result.errors.push(failure);
    return;
  }

  switch (message.kind) {
    case 'headers': {
      const scan = message.result.value;
      result.headerResults = scan;
      logger.info(`Headers scan complete (Score: ${scan.securityScore}/100)`);
      break;
    }
    case 'tls': {
      const scan = message.result.value;
      result.tlsResults = scan;
      logger.info(`TLS scan complete ${scan.isSecure ? 'secure' : 'insecure'} (Score: ${scan.score}/100)`);
      break;
    }
    case 'sqli': {
      const vulns = message.result.value;
      result.sqliResults = vulns;
      if (vulns.length > 0) {
        logger.warn(`SQLi scan complete - Found ${vulns.length} vulnerabilities!`);
      } else {
        logger.info('SQLi scan complete - No vulnerabilities found');
      }
      break;
    }
    case 'xss': {
      const vulns = message.result.value;
      result.xssResults = vulns;
      if (vulns.length > 0) {
        logger.warn(`XSS scan complete - Found ${vulns.length} vulnerabilities!`);
      } else {
        logger.info('XSS scan complete - No vulnerabilities found');
      }
      break;
    }
    case 'nmap': {
      const scan = message.result.value;
      result.portResults = scan;
      logger.info(`Nmap scan complete - Found ${scan.openPorts.length} open ports`);
      break;
    }
  }
}

/**
 * Run every enabled probe against the target concurrently and return the
 * finalised result. Resolves no later than the deadline plus finalisation.
 */
export async function runSecurityScan(
  target: TargetInfo,
  options: ScanOptions,
  deps: OrchestratorDeps = {}
): Promise<CompletedScanResult> {
  const progress = options.progress ?? new ConsoleProgress();
  const logger = options.logger ?? createConsoleLogger();

  const result: ScanResult = {
    target: { ...target },
    startTime: new Date(),
    sqliResults: [],
    xssResults: [],
    errors: [],
  };

  // Tool availability is decided once, before launch
  let portProbeEnabled = false;
  if (!options.skipNmap) {
    const isAvailable = deps.isPortProbeAvailable ?? isNmapInstalled;
    try {
      portProbeEnabled = await isAvailable();
    } catch (error) {
      logger.warn(`Could not check for nmap: ${errorMessage(error)}`);
    }
    if (!portProbeEnabled) {
      logger.warn('nmap not found in PATH, skipping port scan');
    }
  }

  const units = buildUnits(
    target,
    options,
    {
      headers: deps.headers ?? new HeaderAnalyzer(),
      tls: deps.tls ?? new TlsAnalyzer(),
      sqli: deps.sqli ?? new SqliAnalyzer(),
      xss: deps.xss ?? new XssAnalyzer(),
      portProbe: deps.portProbe ?? createNmapProbe(),
    },
    portProbeEnabled,
    logger
  ).filter((unit) => unit.enabled);

  // Fixed at launch; not recomputed when a unit fails
  const totalUnits = units.length;
  const mailbox = new Mailbox<UnitMessage>();
  const deadline = startDeadline(options.timeoutMs);

  for (const unit of units) {
    progress.updateStatus(unit.status);
    void unit
      .run()
      .catch((error: unknown) => failedMessage(unit, error))
      .then((message) => {
        if (!mailbox.post(message)) {
          logger.debug(`Dropped late result from ${message.label}`);
        }
      });
  }

  let completed = 0;
  while (completed < totalUnits) {
    const next = await Promise.race([mailbox.receive(), deadline.promise]);
    if (next === TIMED_OUT) {
      logger.warn('Scan timeout reached, some scans may be incomplete');
      result.errors.push(
        new ScanError(SCAN_TIMEOUT_MESSAGE, 'timeout', ErrorCode.TIMEOUT_EXCEEDED, {
          timeoutMs: options.timeoutMs,
          completedUnits: completed,
          totalUnits,
        })
      );
      break;
    }

    applyMessage(result, next, logger);
    completed += 1;
    progress.updateProgress(`Completed ${next.label}`, Math.floor((completed * 100) / totalUnits));
  }

  if (completed === totalUnits) {
    logger.debug('All scans completed successfully');
  }
  mailbox.close();
  deadline.cancel();

  const finalized: CompletedScanResult = {
    ...result,
    endTime: new Date(),
    riskLevel: calculateRiskLevel(result),
  };
  progress.updateProgress('All scans complete', 100);
  return finalized;
}
