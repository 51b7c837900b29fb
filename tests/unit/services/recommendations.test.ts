// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect } from '@jest/globals';
import {
  getHeaderRecommendations,
  getPriorityActions,
  getSqliRecommendations,
  getTlsRecommendations,
  getXssRecommendations,
} from '../../../src/services/recommendations.js';
import type { Vulnerability } from '../../../src/types/scan.js';

const DOM_FINDING: Vulnerability = {
  type: 'xss',
  severity: 'medium',
  location: 'DOM',
  payload: "<script>alert('XSS')</script>",
  evidence: 'eval(',
  description: 'Page uses potentially unsafe DOM manipulation that could lead to XSS',
};

describe('getHeaderRecommendations', () => {
  it('suggests fixes for missing headers and flags weak ones', () => {
    const recommendations = getHeaderRecommendations({
      headers: {},
      missingHeaders: [
        { name: 'X-Content-Type-Options', value: '', status: 'missing', severity: 'medium', description: '' },
        { name: 'X-XSS-Protection', value: '', status: 'missing', severity: 'low', description: '' },
      ],
      weakHeaders: [
        { name: 'X-Frame-Options', value: 'ALLOWALL', status: 'weak', severity: 'medium', description: '' },
      ],
      presentHeaders: [],
      securityScore: 0,
    });
    expect(recommendations).toEqual([
      'Add X-Content-Type-Options: nosniff to prevent MIME sniffing',
      'Strengthen X-Frame-Options: Current value is weak',
    ]);
  });
});

describe('getTlsRecommendations', () => {
  it('covers protocol, certificate and vulnerability advice', () => {
    const recommendations = getTlsRecommendations({
      protocol: 'TLS 1.0',
      cipherSuite: 'TLS_RSA_WITH_AES_128_CBC_SHA',
      certificate: {
        issuer: 'CN=Test CA',
        subject: 'CN=app.test',
        validFrom: new Date('2024-01-01T00:00:00Z'),
        validTo: new Date('2025-01-01T00:00:00Z'),
        isExpired: true,
        daysToExpiry: -10,
      },
      vulnerabilities: ['Certificate has expired'],
      score: 0,
      isSecure: false,
    });
    expect(recommendations).toEqual([
      'Upgrade to TLS 1.3 for best security',
      'Disable TLS 1.0 and 1.1 (known vulnerabilities)',
      'Renew SSL certificate immediately',
      'Address identified TLS vulnerabilities',
      'Consider using Mozilla SSL Configuration Generator',
    ]);
  });

  it('has nothing to add for a clean TLS 1.3 session', () => {
    expect(
      getTlsRecommendations({
        protocol: 'TLS 1.3',
        cipherSuite: 'TLS_AES_128_GCM_SHA256',
        vulnerabilities: [],
        score: 100,
        isSecure: true,
      })
    ).toEqual([]);
  });
});

describe('injection recommendations', () => {
  it('are empty without findings', () => {
    expect(getSqliRecommendations([])).toEqual([]);
    expect(getXssRecommendations([])).toEqual([]);
  });

  it('add DOM-specific advice for DOM findings', () => {
    const recommendations = getXssRecommendations([DOM_FINDING]);
    expect(recommendations).toHaveLength(8);
    expect(recommendations.at(-1)).toBe(
      'Avoid using location.hash, location.search directly without sanitization'
    );
  });
});

describe('getPriorityActions', () => {
  const SQLI_FINDING: Vulnerability = {
    type: 'sqli',
    severity: 'critical',
    location: 'id',
    payload: "'",
    evidence: 'SQL error: you have an error in your sql syntax',
    description: 'SQL error message detected in response',
  };

  it('orders critical findings first, then each affected area', () => {
    expect(
      getPriorityActions({
        sqliResults: [SQLI_FINDING, SQLI_FINDING],
        xssResults: [DOM_FINDING],
        tlsResults: { protocol: 'TLS 1.0', cipherSuite: 'x', vulnerabilities: [], score: 70, isSecure: false },
      })
    ).toEqual([
      'CRITICAL: Fix 2 critical vulnerabilities immediately',
      'Implement parameterized queries to prevent SQL injection',
      'Add proper input validation and output encoding for XSS prevention',
      'Upgrade TLS configuration to TLS 1.3 with strong ciphers',
    ]);
  });

  it('is empty for a clean scan with a header score of 50', () => {
    expect(
      getPriorityActions({
        sqliResults: [],
        xssResults: [],
        headerResults: {
          headers: {},
          missingHeaders: [],
          weakHeaders: [],
          presentHeaders: [],
          securityScore: 50,
        },
      })
    ).toEqual([]);
  });
});
