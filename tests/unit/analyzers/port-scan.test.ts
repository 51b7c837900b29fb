// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect, jest } from '@jest/globals';
import {
  buildNmapArgs,
  createNmapProbe,
  parseNmapXml,
  runCommandCapture,
  type CommandResult,
  type CommandRunner,
} from '../../../src/analyzers/port-scan.js';
import { ErrorCode } from '../../../src/types/errors.js';
import { createMockLogger } from '../../helpers/logger-mock.js';

const NMAP_XML = `<?xml version="1.0" encoding="UTF-8"?>
<nmaprun scanner="nmap" args="nmap -Pn -sV" version="7.94">
  <host>
    <status state="up" reason="user-set"/>
    <ports>
      <extraports state="closed" count="997"/>
      <port protocol="tcp" portid="22">
        <state state="open" reason="syn-ack"/>
        <service name="ssh" product="OpenSSH" version="9.6p1"/>
      </port>
      <port protocol="tcp" portid="80">
        <state state="open" reason="syn-ack"/>
        <service name="http" product="nginx"/>
      </port>
      <port protocol="tcp" portid="8080">
        <state state="filtered" reason="no-response"/>
        <service name="http-proxy"/>
      </port>
    </ports>
  </host>
</nmaprun>`;

function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: NMAP_XML, stderr: '', timedOut: false, ...overrides };
}

describe('buildNmapArgs', () => {
  it('requests XML output on stdout for the top 1000 ports', () => {
    expect(buildNmapArgs('app.test')).toEqual([
      '-Pn',
      '-sV',
      '-T4',
      '--top-ports',
      '1000',
      '-oX',
      '-',
      'app.test',
    ]);
  });
});

describe('parseNmapXml', () => {
  it('keeps only open ports and joins product and version', () => {
    const result = parseNmapXml(NMAP_XML);
    expect(result).toEqual({
      ok: true,
      value: [
        { number: 22, protocol: 'tcp', state: 'open', service: 'ssh', version: 'OpenSSH 9.6p1' },
        { number: 80, protocol: 'tcp', state: 'open', service: 'http', version: 'nginx' },
      ],
    });
  });

  it('returns no ports for a host without a ports section', () => {
    const result = parseNmapXml('<nmaprun><host><status state="down"/></host></nmaprun>');
    expect(result).toEqual({ ok: true, value: [] });
  });

  it('rejects malformed output', () => {
    const result = parseNmapXml('<nmaprun><host>');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PORT_SCAN_FAILED);
    }
  });
});

describe('createNmapProbe', () => {
  it('runs nmap with the sub-deadline and returns the parsed ports', async () => {
    const runCommand = jest.fn<CommandRunner>(async () => commandResult());
    const probe = createNmapProbe({ runCommand });

    const result = await probe('app.test', 1500, createMockLogger());

    expect(runCommand).toHaveBeenCalledWith('nmap', buildNmapArgs('app.test'), 1500);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.openPorts.map((port) => port.number)).toEqual([22, 80]);
      expect(result.value.durationMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('runs nmap without re-checking availability and reports a spawn failure', async () => {
    const runCommand = jest.fn<CommandRunner>(async () =>
      commandResult({ exitCode: null, stdout: '', error: 'spawn nmap ENOENT' })
    );
    const probe = createNmapProbe({ runCommand });

    const result = await probe('app.test', 1500, createMockLogger());

    expect(runCommand).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PORT_SCAN_FAILED);
      expect(result.error.message).toBe('nmap execution failed: spawn nmap ENOENT');
    }
  });

  it('reports a killed scan as a port scan failure', async () => {
    const probe = createNmapProbe({
      runCommand: async () =>
        commandResult({ exitCode: null, stdout: '', timedOut: true, error: 'Command timed out' }),
    });

    const result = await probe('app.test', 10, createMockLogger());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PORT_SCAN_FAILED);
      expect(result.error.message).toBe('nmap execution failed: Command timed out');
    }
  });

  it('reports a non-zero exit with its code', async () => {
    const probe = createNmapProbe({
      runCommand: async () => commandResult({ exitCode: 2, stdout: '', stderr: 'Failed to resolve' }),
    });

    const result = await probe('app.test', 1500, createMockLogger());

    expect(!result.ok && result.error.message).toBe('nmap execution failed: exit code 2');
  });
});

describe('runCommandCapture', () => {
  it('captures stdout and the exit code', async () => {
    const result = await runCommandCapture(process.execPath, ['-e', 'process.stdout.write("ready")'], 10_000);
    expect(result).toEqual({ exitCode: 0, stdout: 'ready', stderr: '', timedOut: false });
  });

  it('kills the process when the timeout elapses', async () => {
    const result = await runCommandCapture(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], 200);
    expect(result.timedOut).toBe(true);
    expect(result.error).toBe('Command timed out');
  });

  it('resolves with an error for a missing executable', async () => {
    const result = await runCommandCapture('siteprobe-missing-binary', [], 1000);
    expect(result.exitCode).toBeNull();
    expect(result.error).toContain('ENOENT');
  });
});
