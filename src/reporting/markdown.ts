// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * Markdown rendering of a completed scan.
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
import type { CompletedScanResult, SecurityHeader, Vulnerability } from '../types/scan.js';

export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  return `${value.slice(0, Math.max(0, max - 3))}...`;
}

/** Make a value safe to place inside a Markdown table cell. */
export function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, ' ').replaceAll('|', '\\|');
}

function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function pushRecommendations(lines: string[], title: string, items: string[], numbered: boolean): void {
  if (items.length === 0) return;
  lines.push(`### ${title}`);
  lines.push('');
  items.forEach((item, index) => {
    lines.push(numbered ? `${index + 1}. ${item}` : `- ${item}`);
  });
  lines.push('');
}

function pushVulnerabilityTable(lines: string[], vulnerabilities: readonly Vulnerability[]): void {
  lines.push('| Severity | Location | Payload | Evidence |');
  lines.push('|----------|----------|---------|----------|');
  for (const vuln of vulnerabilities) {
    lines.push(
      `| ${vuln.severity.toUpperCase()} | ${escapeCell(vuln.location)} | \`${escapeCell(
        truncate(vuln.payload, 30)
      )}\` | ${escapeCell(truncate(vuln.evidence, 40))} |`
    );
  }
  lines.push('');
}

function pushHeaderTable(lines: string[], headers: readonly SecurityHeader[]): void {
  lines.push('| Header | Severity | Description |');
  lines.push('|--------|----------|-------------|');
  for (const header of headers) {
    lines.push(`| \`${header.name}\` | ${header.severity.toUpperCase()} | ${escapeCell(header.description)} |`);
  }
  lines.push('');
}

export function buildMarkdownReport(result: CompletedScanResult): string {
  const lines: string[] = [];
  const vulnerabilities = [...result.sqliResults, ...result.xssResults];
  const counts = countBySeverity(vulnerabilities);

  lines.push('# Security Scan Report');
  lines.push('');
  lines.push('## Scan Information');
  lines.push(`- Target: ${result.target.url}`);
  lines.push(`- Domain: ${result.target.domain}`);
  lines.push(`- IP Address: ${result.target.ip}`);
  lines.push(`- Protocol: ${result.target.protocol.toUpperCase()}`);
  lines.push(`- Started: ${result.startTime.toISOString()}`);
  lines.push(`- Completed: ${result.endTime.toISOString()}`);
  lines.push(`- Duration: ${formatDuration(result.endTime.getTime() - result.startTime.getTime())}`);
  lines.push('');

  lines.push('## Executive Summary');
  lines.push(`- Overall Risk Level: **${result.riskLevel}**`);
  lines.push(`- Total Vulnerabilities: ${vulnerabilities.length}`);
  lines.push(`- Critical: ${counts.critical}`);
  lines.push(`- High: ${counts.high}`);
  lines.push(`- Medium: ${counts.medium}`);
  lines.push(`- Low: ${counts.low}`);
  if (result.headerResults) {
    lines.push(`- Header Security Score: ${result.headerResults.securityScore}/100`);
  }
  if (result.tlsResults) {
    lines.push(`- TLS Security Score: ${result.tlsResults.score}/100`);
  }
  if (result.portResults) {
    lines.push(`- Open Ports: ${result.portResults.openPorts.length}`);
  }
  lines.push('');

  const headers = result.headerResults;
  if (headers) {
    lines.push('## HTTP Security Headers');
    lines.push('');
    lines.push(`Security Score: ${headers.securityScore}/100`);
    lines.push('');
    if (headers.missingHeaders.length > 0) {
      lines.push('### Missing Headers');
      lines.push('');
      pushHeaderTable(lines, headers.missingHeaders);
    }
    if (headers.weakHeaders.length > 0) {
      lines.push('### Weak Headers');
      lines.push('');
      lines.push('| Header | Value | Issue |');
      lines.push('|--------|-------|-------|');
      for (const header of headers.weakHeaders) {
        lines.push(
          `| \`${header.name}\` | \`${escapeCell(truncate(header.value, 50))}\` | ${escapeCell(
            header.description
          )} |`
        );
      }
      lines.push('');
    }
    if (headers.presentHeaders.length > 0) {
      lines.push('### Present Headers');
      lines.push('');
      for (const header of headers.presentHeaders) {
        lines.push(`- **${header.name}**: \`${truncate(header.value, 80)}\``);
      }
      lines.push('');
    }
    pushRecommendations(lines, 'Header Recommendations', getHeaderRecommendations(headers), false);
  }

  const tls = result.tlsResults;
  if (tls) {
    lines.push('## TLS/SSL Configuration');
    lines.push('');
    lines.push(`Security Score: ${tls.score}/100`);
    lines.push(`Status: ${tls.isSecure ? 'Secure' : 'Insecure'}`);
    lines.push('');
    if (tls.protocol) {
      lines.push(`- Protocol Version: ${tls.protocol}`);
      lines.push(`- Cipher Suite: ${tls.cipherSuite}`);
      lines.push('');
    }
    if (tls.certificate) {
      lines.push('### Certificate');
      lines.push('');
      lines.push(`- Subject: ${tls.certificate.subject}`);
      lines.push(`- Issuer: ${tls.certificate.issuer}`);
      lines.push(`- Valid From: ${formatDate(tls.certificate.validFrom)}`);
      lines.push(`- Valid To: ${formatDate(tls.certificate.validTo)}`);
      lines.push(
        tls.certificate.isExpired
          ? '- Status: **EXPIRED**'
          : `- Days Until Expiry: ${tls.certificate.daysToExpiry}`
      );
      lines.push('');
    }
    if (tls.vulnerabilities.length > 0) {
      lines.push('### Detected Issues');
      lines.push('');
      for (const issue of tls.vulnerabilities) {
        lines.push(`- ${issue}`);
      }
      lines.push('');
    }
    pushRecommendations(lines, 'TLS Recommendations', getTlsRecommendations(tls), false);
  }

  if (result.sqliResults.length > 0) {
    lines.push('## SQL Injection Vulnerabilities');
    lines.push('');
    lines.push(`Found: ${result.sqliResults.length}`);
    lines.push('');
    pushVulnerabilityTable(lines, result.sqliResults);
    pushRecommendations(lines, 'SQL Injection Remediation', getSqliRecommendations(result.sqliResults), true);
  }

  if (result.xssResults.length > 0) {
    lines.push('## Cross-Site Scripting (XSS) Vulnerabilities');
    lines.push('');
    lines.push(`Found: ${result.xssResults.length}`);
    lines.push('');
    pushVulnerabilityTable(lines, result.xssResults);
    pushRecommendations(lines, 'XSS Remediation', getXssRecommendations(result.xssResults), true);
  }

  const ports = result.portResults;
  if (ports && ports.openPorts.length > 0) {
    lines.push('## Open Ports');
    lines.push('');
    lines.push(`Scan Duration: ${formatDuration(ports.durationMs)}`);
    lines.push('');
    lines.push('| Port | Protocol | State | Service | Version |');
    lines.push('|------|----------|-------|---------|---------|');
    for (const port of ports.openPorts) {
      lines.push(
        `| ${port.number} | ${port.protocol} | ${port.state} | ${escapeCell(port.service)} | ${escapeCell(
          truncate(port.version, 30)
        )} |`
      );
    }
    lines.push('');
  }

  lines.push('## Priority Actions');
  lines.push('');
  const actions = getPriorityActions(result);
  if (actions.length === 0) {
    lines.push(NO_PRIORITY_ACTIONS);
  }
  actions.forEach((action, index) => {
    lines.push(`${index + 1}. ${action}`);
  });
  lines.push('');

  if (result.errors.length > 0) {
    lines.push('## Scan Errors');
    lines.push('');
    for (const error of result.errors) {
      lines.push(`- ${formatScanError(error)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
