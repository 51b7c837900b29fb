// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * TLS posture analyzer
 *
 * Performs one handshake with certificate verification disabled so that
 * expired or untrusted certificates are still inspected, then tries two more
 * handshakes pinned to a legacy protocol and to weak cipher suites.
 * Trust problems are reported as findings, never enforced.
 */

import net from 'net';
import tls, { type Certificate, type PeerCertificate, type SecureVersion } from 'tls';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { Analyzer } from '../types/analyzer.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { CertificateInfo, TLSScan, TargetInfo } from '../types/scan.js';
import { ScanError, errorMessage } from '../services/error-handling.js';
import { clampScore } from '../services/scoring.js';

export interface HandshakeRequest {
  host: string;
  port: number;
  minVersion?: SecureVersion;
  maxVersion?: SecureVersion;
  ciphers?: string;
  timeoutMs: number;
}

export interface PeerCertificateSummary {
  issuer: string;
  subject: string;
  validFrom: Date;
  validTo: Date;
}

export interface HandshakeState {
  /** OpenSSL protocol name, e.g. `TLSv1.2`. */
  protocol: string;
  /** IANA cipher suite name, e.g. `TLS_AES_128_GCM_SHA256`. */
  cipherSuite: string;
  certificate?: PeerCertificateSummary;
}

export type TlsHandshaker = (request: HandshakeRequest) => Promise<HandshakeState>;

const HANDSHAKE_TIMEOUT_MS = 10_000;
const PROBE_HANDSHAKE_TIMEOUT_MS = 5_000;
const CERT_EXPIRY_WARNING_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

// OpenSSL 3 refuses TLS 1.0 and these suites at its default security level.
// Names the local build lacks (RC4, often 3DES) are skipped as long as one suite remains.
const LEGACY_CIPHERS = 'DEFAULT:@SECLEVEL=0';
export const WEAK_PROBE_CIPHERS = 'AES128-SHA:AES256-SHA:DES-CBC3-SHA:RC4-SHA:@SECLEVEL=0';

const LOCAL_CIPHER_ERROR = 'ERR_SSL_NO_CIPHER_MATCH';

export const TLS_DEDUCTIONS = {
  expiredCertificate: 50,
  expiringCertificate: 10,
  outdatedProtocol: 30,
  baselineProtocol: 5,
  weakCipher: 20,
  vulnerableProbe: 10,
} as const;

const PROTOCOL_VERSIONS: Record<string, { rank: number; label: string }> = {
  SSLv3: { rank: 0x0300, label: 'SSL 3.0' },
  TLSv1: { rank: 0x0301, label: 'TLS 1.0' },
  'TLSv1.1': { rank: 0x0302, label: 'TLS 1.1' },
  'TLSv1.2': { rank: 0x0303, label: 'TLS 1.2' },
  'TLSv1.3': { rank: 0x0304, label: 'TLS 1.3' },
};

const TLS12_RANK = 0x0303;

/** RC4, 3DES and CBC-mode suites with RSA key exchange. */
export const WEAK_CIPHER_SUITES: ReadonlySet<string> = new Set([
  'TLS_RSA_WITH_RC4_128_SHA',
  'TLS_RSA_WITH_3DES_EDE_CBC_SHA',
  'TLS_RSA_WITH_AES_128_CBC_SHA',
  'TLS_RSA_WITH_AES_256_CBC_SHA',
  'TLS_ECDHE_RSA_WITH_3DES_EDE_CBC_SHA',
  'TLS_ECDHE_RSA_WITH_RC4_128_SHA',
]);

export function tlsVersionName(protocol: string): string {
  return PROTOCOL_VERSIONS[protocol]?.label ?? `Unknown (${protocol})`;
}

export function isWeakCipher(cipherSuite: string): boolean {
  return WEAK_CIPHER_SUITES.has(cipherSuite);
}

export function describeCertificate(
  certificate: PeerCertificateSummary,
  now: Date = new Date()
): CertificateInfo {
  const remainingMs = certificate.validTo.getTime() - now.getTime();
  return {
    issuer: certificate.issuer,
    subject: certificate.subject,
    validFrom: certificate.validFrom,
    validTo: certificate.validTo,
    isExpired: remainingMs < 0,
    daysToExpiry: Math.trunc(remainingMs / DAY_MS),
  };
}

/**
 * Score the negotiated session: certificate validity, protocol version and
 * cipher suite. Probe findings are applied separately.
 */
export function evaluateHandshake(state: HandshakeState, now: Date = new Date()): TLSScan {
  const scan: TLSScan = {
    protocol: tlsVersionName(state.protocol),
    cipherSuite: state.cipherSuite,
    vulnerabilities: [],
    score: 100,
    isSecure: true,
  };

  if (state.certificate) {
    const certificate = describeCertificate(state.certificate, now);
    scan.certificate = certificate;

    if (certificate.isExpired) {
      scan.vulnerabilities.push('Certificate has expired');
      scan.isSecure = false;
      scan.score -= TLS_DEDUCTIONS.expiredCertificate;
    } else if (certificate.daysToExpiry < CERT_EXPIRY_WARNING_DAYS) {
      scan.vulnerabilities.push(`Certificate expires soon (${certificate.daysToExpiry} days)`);
      scan.score -= TLS_DEDUCTIONS.expiringCertificate;
    }
  }

  const rank = PROTOCOL_VERSIONS[state.protocol]?.rank;
  if (rank !== undefined && rank < TLS12_RANK) {
    scan.vulnerabilities.push(`Outdated TLS version: ${scan.protocol} (TLS 1.2+ recommended)`);
    scan.isSecure = false;
    scan.score -= TLS_DEDUCTIONS.outdatedProtocol;
  } else if (rank === TLS12_RANK) {
    scan.vulnerabilities.push('TLS 1.2 is acceptable but TLS 1.3 is recommended');
    scan.score -= TLS_DEDUCTIONS.baselineProtocol;
  }

  if (isWeakCipher(state.cipherSuite)) {
    scan.vulnerabilities.push(`Weak cipher suite: ${scan.cipherSuite}`);
    scan.isSecure = false;
    scan.score -= TLS_DEDUCTIONS.weakCipher;
  }

  scan.score = clampScore(scan.score);
  return scan;
}

/** Each successful vulnerable handshake costs a flat deduction and marks the target insecure. */
export function applyProbeFindings(scan: TLSScan, findings: readonly string[]): TLSScan {
  if (findings.length === 0) {
    return scan;
  }
  return {
    ...scan,
    vulnerabilities: [...scan.vulnerabilities, ...findings],
    score: clampScore(scan.score - TLS_DEDUCTIONS.vulnerableProbe * findings.length),
    isSecure: false,
  };
}

/** Render a distinguished name most-specific first: `CN=R3,O=Example CA,C=US`. */
function formatDistinguishedName(name: Certificate | undefined): string {
  if (!name) {
    return '';
  }
  return Object.entries(name)
    .filter(([, value]) => value !== '')
    .map(([key, value]) => `${key}=${String(value)}`)
    .reverse()
    .join(',');
}

type PeerFields = Partial<Pick<PeerCertificate, 'issuer' | 'subject' | 'valid_from' | 'valid_to'>>;

/** `getPeerCertificate()` yields an empty object when the peer sent no chain. */
export function summarizePeerCertificate(peer: PeerFields): PeerCertificateSummary | undefined {
  if (!peer.valid_from || !peer.valid_to) {
    return undefined;
  }
  return {
    issuer: formatDistinguishedName(peer.issuer),
    subject: formatDistinguishedName(peer.subject),
    validFrom: new Date(peer.valid_from),
    validTo: new Date(peer.valid_to),
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Default handshaker backed by node:tls. */
export const nodeTlsHandshake: TlsHandshaker = (request) =>
  new Promise<HandshakeState>((resolve, reject) => {
    const socket = tls.connect(
      {
        host: request.host,
        port: request.port,
        // SNI must not carry an IP literal
        ...(net.isIP(request.host) === 0 && { servername: request.host }),
        rejectUnauthorized: false,
        ...(request.minVersion !== undefined && { minVersion: request.minVersion }),
        ...(request.maxVersion !== undefined && { maxVersion: request.maxVersion }),
        ...(request.ciphers !== undefined && { ciphers: request.ciphers }),
      },
      () => {
        const cipher = socket.getCipher();
        const certificate = summarizePeerCertificate(socket.getPeerCertificate());
        const state: HandshakeState = {
          protocol: socket.getProtocol() ?? 'unknown',
          cipherSuite: cipher.standardName || cipher.name,
          ...(certificate && { certificate }),
        };
        socket.end();
        resolve(state);
      }
    );
    socket.setTimeout(request.timeoutMs, () => socket.destroy(new Error('TLS handshake timed out')));
    socket.on('error', reject);
  });

export interface TlsAnalyzerDeps {
  handshake?: TlsHandshaker;
  now?: () => Date;
}

export class TlsAnalyzer implements Analyzer<TLSScan> {
  readonly name = 'TLS/SSL';
  private readonly handshake: TlsHandshaker;
  private readonly now: () => Date;

  constructor(deps: TlsAnalyzerDeps = {}) {
    this.handshake = deps.handshake ?? nodeTlsHandshake;
    this.now = deps.now ?? (() => new Date());
  }

  async run(target: TargetInfo, logger: ActivityLogger): Promise<Result<TLSScan, ScanError>> {
    logger.debug('Starting TLS/SSL scan', { domain: target.domain });

    if (target.protocol !== 'https') {
      return ok({
        protocol: '',
        cipherSuite: '',
        vulnerabilities: ['Target is not using HTTPS'],
        score: 0,
        isSecure: false,
      });
    }

    let state: HandshakeState;
    try {
      state = await this.handshake({
        host: target.domain,
        port: target.port,
        timeoutMs: HANDSHAKE_TIMEOUT_MS,
      });
    } catch (error) {
      return err(
        new ScanError(
          `TLS connection failed: ${errorMessage(error)}`,
          'tls',
          ErrorCode.TLS_CONNECTION_ERROR,
          { analyzer: this.name, host: target.domain, port: target.port },
          { cause: error }
        )
      );
    }

    if (state.certificate) {
      logger.debug(
        `Certificate: ${state.certificate.subject}, valid until ${state.certificate.validTo.toISOString()}`
      );
    }

    const findings = await this.probeVulnerabilities(target, logger);
    const scan = applyProbeFindings(evaluateHandshake(state, this.now()), findings);

    logger.info(
      `TLS/SSL scan completed: Protocol=${scan.protocol}, Score=${scan.score}/100, Secure=${scan.isSecure}`
    );
    return ok(scan);
  }

  private async probeVulnerabilities(target: TargetInfo, logger: ActivityLogger): Promise<string[]> {
    const [legacyProtocol, weakCiphers] = await Promise.all([
      this.accepts(
        {
          host: target.domain,
          port: target.port,
          minVersion: 'TLSv1',
          maxVersion: 'TLSv1',
          ciphers: LEGACY_CIPHERS,
          timeoutMs: PROBE_HANDSHAKE_TIMEOUT_MS,
        },
        logger
      ),
      this.accepts(
        {
          host: target.domain,
          port: target.port,
          maxVersion: 'TLSv1.2',
          ciphers: WEAK_PROBE_CIPHERS,
          timeoutMs: PROBE_HANDSHAKE_TIMEOUT_MS,
        },
        logger
      ),
    ]);

    const findings: string[] = [];
    if (legacyProtocol) {
      findings.push('TLS 1.0 supported (BEAST vulnerability)');
    }
    if (weakCiphers) {
      findings.push('Weak cipher suites supported');
    }
    return findings;
  }

  /** True when the server completes a handshake under the pinned settings. */
  private async accepts(request: HandshakeRequest, logger: ActivityLogger): Promise<boolean> {
    try {
      await this.handshake(request);
      return true;
    } catch (error) {
      if (errorCode(error) === LOCAL_CIPHER_ERROR) {
        logger.warn(`Probe handshake not attempted, no local cipher matches: ${request.ciphers ?? ''}`);
        return false;
      }
      logger.debug(`Probe handshake rejected: ${errorMessage(error)}`, {
        minVersion: request.minVersion,
        ciphers: request.ciphers,
      });
      return false;
    }
  }
}
