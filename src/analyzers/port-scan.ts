// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Port probe collaborator
 *
 * Runs nmap as a child process under its own deadline and turns the XML
 * report into a list of open ports. The child is killed with SIGKILL when the
 * deadline passes.
 */

import { spawn } from 'child_process';
import { XMLParser } from 'fast-xml-parser';
import { which } from 'zx';
import { z } from 'zod';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { Port, PortScan } from '../types/scan.js';
import { ScanError, errorMessage } from '../services/error-handling.js';

export const NMAP_BINARY = 'nmap';

export function buildNmapArgs(domain: string): string[] {
  return [
    '-Pn', // skip host discovery
    '-sV', // service version detection
    '-T4',
    '--top-ports',
    '1000',
    '-oX',
    '-', // XML on stdout
    domain,
  ];
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: string;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/** Spawn a command, capture its output, kill it when the timeout elapses. Never rejects. */
export const runCommandCapture: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve) => {
    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        shell: false,
      });
    } catch (error) {
      resolve({ exitCode: null, stdout: '', stderr: '', timedOut: false, error: errorMessage(error) });
      return;
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    let timedOut = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, timeoutMs)
        : undefined;

    child.on('error', (error) => {
      clearTimeout(timer);
      resolve({
        exitCode: null,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
        error: error.message,
      });
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
        ...(timedOut && { error: 'Command timed out' }),
      });
    });
  });

/** True when the nmap binary is on PATH. */
export async function isNmapInstalled(): Promise<boolean> {
  return (await which(NMAP_BINARY, { nothrow: true })) !== null;
}

// === XML parsing ===

const attr = z.union([z.string(), z.number()]).transform(String);

const nmapPortSchema = z.object({
  protocol: attr,
  portid: z.coerce.number().int(),
  state: z.object({ state: attr }),
  service: z
    .object({
      name: attr.optional(),
      product: attr.optional(),
      version: attr.optional(),
    })
    .optional(),
});

const nmapRunSchema = z.object({
  nmaprun: z.object({
    host: z
      .array(
        z.object({
          ports: z
            .object({ port: z.array(nmapPortSchema).default([]) })
            .optional(),
        })
      )
      .default([]),
  }),
});

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => name === 'host' || name === 'port',
});

/** Open ports from an nmap `-oX` report. Service version is `product [version]`. */
export function parseNmapXml(xml: string): Result<Port[], ScanError> {
  let document: unknown;
  try {
    document = xmlParser.parse(xml, true);
  } catch (error) {
    return err(
      new ScanError(`failed to parse nmap output: ${errorMessage(error)}`, 'tool', ErrorCode.PORT_SCAN_FAILED)
    );
  }

  const parsed = nmapRunSchema.safeParse(document);
  if (!parsed.success) {
    return err(
      new ScanError(
        `unexpected nmap output: ${parsed.error.issues[0]?.message ?? 'invalid document'}`,
        'tool',
        ErrorCode.PORT_SCAN_FAILED
      )
    );
  }

  const openPorts: Port[] = [];
  for (const host of parsed.data.nmaprun.host) {
    for (const port of host.ports?.port ?? []) {
      if (port.state.state !== 'open') continue;

      const product = port.service?.product ?? '';
      const version = port.service?.version;
      openPorts.push({
        number: port.portid,
        protocol: port.protocol,
        state: port.state.state,
        service: port.service?.name ?? '',
        version: version ? `${product} ${version}` : product,
      });
    }
  }
  return ok(openPorts);
}

export interface PortScannerDeps {
  runCommand?: CommandRunner;
}

export type PortProbe = (
  domain: string,
  timeoutMs: number,
  logger: ActivityLogger
) => Promise<Result<PortScan, ScanError>>;

/** Availability is checked once by the caller before launch; the probe does not re-check it. */
export function createNmapProbe(deps: PortScannerDeps = {}): PortProbe {
  const runCommand = deps.runCommand ?? runCommandCapture;

  return async (domain, timeoutMs, logger) => {
    logger.debug('Starting Nmap scan', { domain });
    const startedAt = Date.now();

    const args = buildNmapArgs(domain);
    logger.debug(`Executing: ${NMAP_BINARY} ${args.join(' ')}`);
    const result = await runCommand(NMAP_BINARY, args, timeoutMs);

    if (result.timedOut || result.error !== undefined || result.exitCode !== 0) {
      const detail = result.error ?? `exit code ${String(result.exitCode)}`;
      return err(
        new ScanError(`nmap execution failed: ${detail}`, 'tool', ErrorCode.PORT_SCAN_FAILED, {
          analyzer: 'Nmap',
          domain,
          stderr: result.stderr.slice(0, 500),
        })
      );
    }

    const ports = parseNmapXml(result.stdout);
    if (!ports.ok) {
      return ports;
    }

    const durationMs = Date.now() - startedAt;
    logger.info(`Nmap scan completed: found ${ports.value.length} open ports in ${durationMs}ms`);
    return ok({ openPorts: ports.value, durationMs });
  };
}
