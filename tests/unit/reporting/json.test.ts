// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect } from '@jest/globals';
import { buildJsonReport, stringifyJsonReport } from '../../../src/reporting/json.js';
import { makeCompletedScan } from '../../helpers/scan-fixture.js';

describe('buildJsonReport', () => {
  it('summarises findings by severity', () => {
    const report = buildJsonReport(makeCompletedScan(), new Date('2026-01-02T03:05:00.000Z'));
    expect(report.generatedAt).toBe('2026-01-02T03:05:00.000Z');
    expect(report.summary).toEqual({
      riskLevel: 'HIGH',
      totalVulnerabilities: 1,
      errorCount: 1,
      critical: 0,
      high: 1,
      medium: 0,
      low: 0,
    });
  });

  it('serialises dates and scan errors', () => {
    const text = stringifyJsonReport(buildJsonReport(makeCompletedScan()));
    const parsed: unknown = JSON.parse(text);
    expect(parsed).toMatchObject({
      result: {
        startTime: '2026-01-02T03:04:05.000Z',
        errors: [
          {
            name: 'ScanError',
            code: 'PORT_SCAN_FAILED',
            type: 'tool',
            message: 'nmap execution failed: exit code 2',
            context: { analyzer: 'Nmap' },
          },
        ],
      },
    });
    expect(text.endsWith('\n')).toBe(true);
  });
});
