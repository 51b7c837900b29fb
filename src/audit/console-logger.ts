// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Console-backed ActivityLogger, optionally mirrored to a log file.
 * Debug lines are only written in verbose mode.
 */

import { chalk, fs } from 'zx';
import type { ActivityLogger } from '../types/activity-logger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.blue('INFO'),
  warn: chalk.yellow('WARN'),
  error: chalk.red('ERROR'),
};

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  logFile?: string | undefined;
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  attrs?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const time = now.toTimeString().slice(0, 8);
  const suffix = attrs && Object.keys(attrs).length > 0 ? ` ${JSON.stringify(attrs)}` : '';
  return `${time} ${level.toUpperCase()}: ${message}${suffix}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ActivityLogger {
  const threshold: LogLevel = options.verbose ? 'debug' : 'info';
  const logFile = options.logFile;

  function write(level: LogLevel, message: string, attrs?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const line = formatLogLine(level, message, attrs);
    const stream = level === 'error' || level === 'warn' ? console.error : console.log;
    stream(line.replace(`${level.toUpperCase()}:`, `${LEVEL_LABELS[level]}:`));
    if (logFile) {
      fs.appendFileSync(logFile, `${line}\n`, 'utf8');
    }
  }

  return {
    debug: (message, attrs) => write('debug', message, attrs),
    info: (message, attrs) => write('info', message, attrs),
    warn: (message, attrs) => write('warn', message, attrs),
    error: (message, attrs) => write('error', message, attrs),
  };
}
