// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Scan data model shared by the analyzers, the orchestrator and the report renderers.
 */

import type { ScanError } from '../services/error-handling.js';

export type TargetProtocol = 'http' | 'https';

/** Resolved scan target. Produced once by target validation, read-only afterwards. */
export interface TargetInfo {
  readonly url: string;
  readonly domain: string;
  readonly ip: string;
  readonly protocol: TargetProtocol;
  readonly port: number;
}

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';
export type VulnerabilitySeverity = Exclude<Severity, 'info'>;

export type HeaderStatus = 'missing' | 'weak' | 'present';

export interface SecurityHeader {
  name: string;
  value: string;
  status: HeaderStatus;
  severity: Severity;
  description: string;
}

export interface HeaderScan {
  headers: Record<string, string>;
  missingHeaders: SecurityHeader[];
  weakHeaders: SecurityHeader[];
  presentHeaders: SecurityHeader[];
  securityScore: number;
}

export interface CertificateInfo {
  issuer: string;
  subject: string;
  validFrom: Date;
  validTo: Date;
  isExpired: boolean;
  /** Negative once the certificate has expired. */
  daysToExpiry: number;
}

export interface TLSScan {
  protocol: string;
  cipherSuite: string;
  certificate?: CertificateInfo;
  vulnerabilities: string[];
  score: number;
  isSecure: boolean;
}

export type VulnerabilityType = 'sqli' | 'xss';

export interface Vulnerability {
  type: VulnerabilityType;
  severity: VulnerabilitySeverity;
  location: string;
  payload: string;
  evidence: string;
  description: string;
}

export interface Port {
  number: number;
  protocol: string;
  state: string;
  service: string;
  version: string;
}

export interface PortScan {
  openPorts: Port[];
  durationMs: number;
}

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ScanResult {
  target: TargetInfo;
  startTime: Date;
  endTime?: Date;
  portResults?: PortScan;
  headerResults?: HeaderScan;
  tlsResults?: TLSScan;
  sqliResults: Vulnerability[];
  xssResults: Vulnerability[];
  errors: ScanError[];
  riskLevel?: RiskLevel;
}

/** A ScanResult after finalisation: end time and risk level are always set. */
export interface CompletedScanResult extends ScanResult {
  endTime: Date;
  riskLevel: RiskLevel;
}
