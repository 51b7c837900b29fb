// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { chalk } from 'zx';

/** Receives progress updates from a running scan. */
export interface ProgressReporter {
  updateProgress(step: string, percent: number): void;
  updateStatus(message: string): void;
}

function timestamp(date: Date = new Date()): string {
  return date.toTimeString().slice(0, 8);
}

/** Prints `[HH:MM:SS] → message` lines to stdout. */
export class ConsoleProgress implements ProgressReporter {
  updateProgress(step: string, percent: number): void {
    console.log(`${chalk.gray(`[${timestamp()}]`)} → ${step} ${chalk.cyan(`(${percent}%)`)}`);
  }

  updateStatus(message: string): void {
    console.log(`${chalk.gray(`[${timestamp()}]`)} → ${message}`);
  }
}
