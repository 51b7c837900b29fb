// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect, jest, beforeAll, afterAll, afterEach } from '@jest/globals';
import { fs, path } from 'zx';
import os from 'os';
import { createConsoleLogger, formatLogLine } from '../../../src/audit/console-logger.js';

describe('formatLogLine', () => {
  const at = new Date(2026, 0, 2, 3, 4, 5);

  it('prefixes the local time and level', () => {
    expect(formatLogLine('info', 'scan started', undefined, at)).toBe('03:04:05 INFO: scan started');
  });

  it('appends attributes as JSON', () => {
    expect(formatLogLine('warn', 'slow response', { ms: 900 }, at)).toBe(
      '03:04:05 WARN: slow response {"ms":900}'
    );
    expect(formatLogLine('debug', 'noop', {}, at)).toBe('03:04:05 DEBUG: noop');
  });
});

describe('createConsoleLogger', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'siteprobe-logs-'));
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops debug lines unless verbose and routes warnings to stderr', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.debug('hidden');
    logger.info('shown');
    logger.warn('careful');

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('mirrors lines to the log file without colour codes', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logFile = path.join(dir, 'scan.log');
    const logger = createConsoleLogger({ verbose: true, logFile });

    logger.debug('resolved app.test');
    logger.error('probe failed', { analyzer: 'XSS' });

    const lines = (await fs.readFile(logFile, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2} DEBUG: resolved app\.test$/);
    expect(lines[1]).toMatch(/^\d{2}:\d{2}:\d{2} ERROR: probe failed \{"analyzer":"XSS"\}$/);
  });
});
