// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { countBySeverity, type SeverityCounts } from '../services/scoring.js';
import type { CompletedScanResult } from '../types/scan.js';

export interface JsonReport {
  generatedAt: string;
  summary: SeverityCounts & { riskLevel: string; totalVulnerabilities: number; errorCount: number };
  result: CompletedScanResult;
}

export function buildJsonReport(result: CompletedScanResult, now: Date = new Date()): JsonReport {
  const vulnerabilities = [...result.sqliResults, ...result.xssResults];
  return {
    generatedAt: now.toISOString(),
    summary: {
      riskLevel: result.riskLevel,
      totalVulnerabilities: vulnerabilities.length,
      errorCount: result.errors.length,
      ...countBySeverity(vulnerabilities),
    },
    result,
  };
}

/** ScanError instances serialise through their toJSON; dates as ISO strings. */
export function stringifyJsonReport(report: JsonReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
