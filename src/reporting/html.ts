// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * Standalone HTML rendering of a completed scan: inline styles, no scripts,
 * every scanned value escaped.
 */

import { formatScanError } from '../services/error-handling.js';
import {
  NO_PRIORITY_ACTIONS,
  getHeaderRecommendations,
  getPriorityActions,
  getSqliRecommendations,
  getTlsRecommendations,
  getXssRecommendations,
} from '../services/recommendations.js';
import { countBySeverity } from '../services/scoring.js';
import type { CompletedScanResult, RiskLevel, Severity, Vulnerability } from '../types/scan.js';
import { truncate } from './markdown.js';

export const RISK_COLORS: Record<RiskLevel, string> = {
  CRITICAL: '#dc3545',
  HIGH: '#fd7e14',
  MEDIUM: '#ffc107',
  LOW: '#28a745',
};

export const SEVERITY_COLORS: Record<Severity, string> = {
  critical: '#dc3545',
  high: '#fd7e14',
  medium: '#ffc107',
  low: '#28a745',
  info: '#6c757d',
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function severityBadge(severity: Severity): string {
  return `<span class="badge" style="background-color: ${SEVERITY_COLORS[severity]};">${severity.toUpperCase()}</span>`;
}

function list(items: readonly string[], ordered = false): string {
  const tag = ordered ? 'ol' : 'ul';
  return `<${tag}>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join('')}</${tag}>`;
}

function recommendations(title: string, items: readonly string[], ordered: boolean): string {
  if (items.length === 0) return '';
  return `<h3>${title}</h3>${list(items, ordered)}`;
}

function vulnerabilityTable(vulnerabilities: readonly Vulnerability[]): string {
  const rows = vulnerabilities
    .map(
      (vuln) =>
        `<tr><td>${severityBadge(vuln.severity)}</td><td>${escapeHtml(vuln.location)}</td>` +
        `<td><code>${escapeHtml(truncate(vuln.payload, 60))}</code></td><td>${escapeHtml(vuln.evidence)}</td></tr>`
    )
    .join('');
  return `<table><tr><th>Severity</th><th>Location</th><th>Payload</th><th>Evidence</th></tr>${rows}</table>`;
}

function headersSection(result: CompletedScanResult): string {
  const headers = result.headerResults;
  if (!headers) return '';

  const rows = [...headers.missingHeaders, ...headers.weakHeaders, ...headers.presentHeaders]
    .map(
      (header) =>
        `<tr><td><code>${escapeHtml(header.name)}</code></td><td>${header.status}</td>` +
        `<td>${severityBadge(header.severity)}</td><td>${escapeHtml(truncate(header.value, 80))}</td></tr>`
    )
    .join('');

  return `<section>
<h2>HTTP Security Headers</h2>
<p class="score">Security Score: ${headers.securityScore}/100</p>
<table><tr><th>Header</th><th>Status</th><th>Severity</th><th>Value</th></tr>${rows}</table>
${recommendations('Header Recommendations', getHeaderRecommendations(headers), false)}
</section>`;
}

function tlsSection(result: CompletedScanResult): string {
  const tls = result.tlsResults;
  if (!tls) return '';

  const details: string[] = [];
  if (tls.protocol) {
    details.push(`Protocol Version: ${tls.protocol}`, `Cipher Suite: ${tls.cipherSuite}`);
  }
  if (tls.certificate) {
    details.push(
      `Subject: ${tls.certificate.subject}`,
      `Issuer: ${tls.certificate.issuer}`,
      `Valid To: ${tls.certificate.validTo.toISOString().slice(0, 10)}`,
      tls.certificate.isExpired ? 'Status: EXPIRED' : `Days Until Expiry: ${tls.certificate.daysToExpiry}`
    );
  }

  return `<section>
<h2>TLS/SSL Configuration</h2>
<p class="score">Security Score: ${tls.score}/100 (${tls.isSecure ? 'Secure' : 'Insecure'})</p>
${details.length > 0 ? list(details) : ''}
${tls.vulnerabilities.length > 0 ? `<h3>Detected Issues</h3>${list(tls.vulnerabilities)}` : ''}
${recommendations('TLS Recommendations', getTlsRecommendations(tls), false)}
</section>`;
}

function findingsSection(title: string, vulnerabilities: readonly Vulnerability[], advice: string[]): string {
  if (vulnerabilities.length === 0) return '';
  return `<section>
<h2>${title}</h2>
<p>Found: ${vulnerabilities.length}</p>
${vulnerabilityTable(vulnerabilities)}
${recommendations('Remediation', advice, true)}
</section>`;
}

function portsSection(result: CompletedScanResult): string {
  const ports = result.portResults;
  if (!ports || ports.openPorts.length === 0) return '';
  const rows = ports.openPorts
    .map(
      (port) =>
        `<tr><td>${port.number}</td><td>${escapeHtml(port.protocol)}</td><td>${escapeHtml(port.state)}</td>` +
        `<td>${escapeHtml(port.service)}</td><td>${escapeHtml(truncate(port.version, 40))}</td></tr>`
    )
    .join('');
  return `<section>
<h2>Open Ports</h2>
<table><tr><th>Port</th><th>Protocol</th><th>State</th><th>Service</th><th>Version</th></tr>${rows}</table>
</section>`;
}

const STYLES = `
body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; color: #1f2937; max-width: 960px; margin: 0 auto; padding: 20px; background: #f9fafb; }
section { background: #fff; border-radius: 8px; padding: 20px 30px; margin-bottom: 20px; box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
table { width: 100%; border-collapse: collapse; }
th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #e5e7eb; vertical-align: top; }
.badge { color: #fff; padding: 2px 8px; border-radius: 4px; font-size: 12px; font-weight: 600; }
.risk { color: #fff; padding: 4px 12px; border-radius: 6px; font-weight: 700; }
.score { font-weight: 600; }`;

export function buildHtmlReport(result: CompletedScanResult, now: Date = new Date()): string {
  const vulnerabilities = [...result.sqliResults, ...result.xssResults];
  const counts = countBySeverity(vulnerabilities);
  const actions = getPriorityActions(result);
  const durationSeconds = ((result.endTime.getTime() - result.startTime.getTime()) / 1000).toFixed(1);

  const summary = [
    `Total Vulnerabilities: ${vulnerabilities.length}`,
    `Critical: ${counts.critical}`,
    `High: ${counts.high}`,
    `Medium: ${counts.medium}`,
    `Low: ${counts.low}`,
  ];
  if (result.headerResults) summary.push(`Header Security Score: ${result.headerResults.securityScore}/100`);
  if (result.tlsResults) summary.push(`TLS Security Score: ${result.tlsResults.score}/100`);
  if (result.portResults) summary.push(`Open Ports: ${result.portResults.openPorts.length}`);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Security Scan Report - ${escapeHtml(result.target.domain)}</title>
<style>${STYLES}
</style>
</head>
<body>
<section>
<h1>Security Scan Report</h1>
<p>Overall Risk Level: <span class="risk" style="background-color: ${RISK_COLORS[result.riskLevel]};">${result.riskLevel}</span></p>
${list([
  `Target: ${result.target.url}`,
  `Domain: ${result.target.domain}`,
  `IP Address: ${result.target.ip}`,
  `Started: ${result.startTime.toISOString()}`,
  `Duration: ${durationSeconds}s`,
  `Generated: ${now.toISOString()}`,
])}
</section>
<section>
<h2>Executive Summary</h2>
${list(summary)}
</section>
${headersSection(result)}
${tlsSection(result)}
${findingsSection('SQL Injection Vulnerabilities', result.sqliResults, getSqliRecommendations(result.sqliResults))}
${findingsSection('Cross-Site Scripting (XSS) Vulnerabilities', result.xssResults, getXssRecommendations(result.xssResults))}
${portsSection(result)}
<section>
<h2>Priority Actions</h2>
${actions.length > 0 ? list(actions, true) : `<p>${NO_PRIORITY_ACTIONS}</p>`}
</section>
${
  result.errors.length > 0
    ? `<section>\n<h2>Scan Errors</h2>\n${list(result.errors.map((error) => formatScanError(error)))}\n</section>`
    : ''
}
</body>
</html>
`;
}
