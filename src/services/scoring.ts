// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Scoring & classification
 *
 * Pure functions that turn analyzer output into numeric scores and the
 * overall risk verdict. No I/O.
 */

import type {
  HeaderScan,
  RiskLevel,
  TLSScan,
  Vulnerability,
  VulnerabilitySeverity,
} from '../types/scan.js';

/** Header score below this counts as one medium finding in the risk verdict. */
export const HEADER_SCORE_RISK_THRESHOLD = 50;

/**
 * Percentage of definitions that are present with a strong value.
 * Floors, so 2 of 7 scores 28.
 */
export function calculateHeaderScore(strongCount: number, totalDefinitions: number): number {
  if (totalDefinitions <= 0) {
    return 0;
  }
  const bounded = Math.min(Math.max(strongCount, 0), totalDefinitions);
  return Math.floor((bounded * 100) / totalDefinitions);
}

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export type SeverityCounts = Record<VulnerabilitySeverity, number>;

export function countBySeverity(vulnerabilities: readonly Vulnerability[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const vuln of vulnerabilities) {
    counts[vuln.severity] += 1;
  }
  return counts;
}

export interface RiskInputs {
  sqliResults: readonly Vulnerability[];
  xssResults: readonly Vulnerability[];
  tlsResults?: Pick<TLSScan, 'isSecure'> | undefined;
  headerResults?: Pick<HeaderScan, 'securityScore'> | undefined;
}

/**
 * Strict precedence: any critical wins, then any high (an insecure TLS result
 * counts as one), then any medium (a header score under 50 counts as one).
 * Counts never outweigh precedence.
 */
export function calculateRiskLevel(inputs: RiskInputs): RiskLevel {
  const counts = countBySeverity([...inputs.sqliResults, ...inputs.xssResults]);

  if (inputs.tlsResults && !inputs.tlsResults.isSecure) {
    counts.high += 1;
  }
  if (inputs.headerResults && inputs.headerResults.securityScore < HEADER_SCORE_RISK_THRESHOLD) {
    counts.medium += 1;
  }

  if (counts.critical > 0) return 'CRITICAL';
  if (counts.high > 0) return 'HIGH';
  if (counts.medium > 0) return 'MEDIUM';
  return 'LOW';
}
