// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Remediation hints per finding category, rendered into reports.
 */

import type { CompletedScanResult, HeaderScan, TLSScan, Vulnerability } from '../types/scan.js';
import { HEADER_SCORE_RISK_THRESHOLD, countBySeverity } from './scoring.js';

const MISSING_HEADER_FIXES: Record<string, string> = {
  'Strict-Transport-Security':
    'Add HSTS header: Strict-Transport-Security: max-age=31536000; includeSubDomains; preload',
  'Content-Security-Policy':
    "Add CSP header: Content-Security-Policy: default-src 'self'; script-src 'self'; object-src 'none'",
  'X-Frame-Options': 'Add X-Frame-Options: DENY or SAMEORIGIN to prevent clickjacking',
  'X-Content-Type-Options': 'Add X-Content-Type-Options: nosniff to prevent MIME sniffing',
  'Referrer-Policy': 'Add Referrer-Policy: strict-origin-when-cross-origin or no-referrer',
  'Permissions-Policy': 'Add Permissions-Policy to control browser features',
};

export function getHeaderRecommendations(scan: HeaderScan): string[] {
  const recommendations: string[] = [];
  for (const header of scan.missingHeaders) {
    const fix = MISSING_HEADER_FIXES[header.name];
    if (fix) {
      recommendations.push(fix);
    }
  }
  for (const header of scan.weakHeaders) {
    recommendations.push(`Strengthen ${header.name}: Current value is weak`);
  }
  return recommendations;
}

export function getTlsRecommendations(scan: TLSScan): string[] {
  const recommendations: string[] = [];

  if (!scan.isSecure) {
    recommendations.push('Upgrade to TLS 1.3 for best security');
  }
  if (scan.protocol === 'TLS 1.0' || scan.protocol === 'TLS 1.1') {
    recommendations.push('Disable TLS 1.0 and 1.1 (known vulnerabilities)');
  }
  if (scan.certificate?.isExpired) {
    recommendations.push('Renew SSL certificate immediately');
  } else if (scan.certificate && scan.certificate.daysToExpiry < 30) {
    recommendations.push('Plan certificate renewal soon');
  }
  if (scan.vulnerabilities.length > 0) {
    recommendations.push('Address identified TLS vulnerabilities');
    recommendations.push('Consider using Mozilla SSL Configuration Generator');
  }
  return recommendations;
}

export function getSqliRecommendations(vulnerabilities: readonly Vulnerability[]): string[] {
  if (vulnerabilities.length === 0) {
    return [];
  }
  return [
    'Use parameterized queries (prepared statements) for all database operations',
    'Implement input validation and sanitization',
    'Use ORM frameworks that handle SQL escaping automatically',
    'Apply principle of least privilege to database accounts',
    'Enable WAF (Web Application Firewall) with SQL injection rules',
    'Never concatenate user input directly into SQL queries',
    "Implement proper error handling (don't expose SQL errors to users)",
  ];
}

export function getXssRecommendations(vulnerabilities: readonly Vulnerability[]): string[] {
  if (vulnerabilities.length === 0) {
    return [];
  }
  const recommendations = [
    'Implement proper output encoding based on context (HTML, JavaScript, URL, CSS)',
    'Use Content-Security-Policy (CSP) headers to mitigate XSS impact',
    'Validate and sanitize all user input on the server side',
    'Use security-focused template engines with auto-escaping',
    'Avoid using dangerous functions like eval(), innerHTML, document.write()',
    'Set HttpOnly flag on cookies to prevent JavaScript access',
  ];
  if (vulnerabilities.some((vuln) => vuln.location === 'DOM')) {
    recommendations.push(
      'Review all client-side JavaScript for unsafe DOM manipulation',
      'Avoid using location.hash, location.search directly without sanitization'
    );
  }
  return recommendations;
}

export const NO_PRIORITY_ACTIONS = 'No immediate priority actions required. Continue monitoring security posture.';

/** Ordered most urgent first; empty when nothing needs attention. */
export function getPriorityActions(
  result: Pick<CompletedScanResult, 'sqliResults' | 'xssResults' | 'tlsResults' | 'headerResults'>
): string[] {
  const actions: string[] = [];
  const critical = countBySeverity([...result.sqliResults, ...result.xssResults]).critical;

  if (critical > 0) {
    actions.push(`CRITICAL: Fix ${critical} critical vulnerabilities immediately`);
  }
  if (result.sqliResults.length > 0) {
    actions.push('Implement parameterized queries to prevent SQL injection');
  }
  if (result.xssResults.length > 0) {
    actions.push('Add proper input validation and output encoding for XSS prevention');
  }
  if (result.tlsResults && !result.tlsResults.isSecure) {
    actions.push('Upgrade TLS configuration to TLS 1.3 with strong ciphers');
  }
  if (result.headerResults && result.headerResults.securityScore < HEADER_SCORE_RISK_THRESHOLD) {
    actions.push('Implement missing security headers (HSTS, CSP, X-Frame-Options)');
  }
  return actions;
}
