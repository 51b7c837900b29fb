// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * Writes rendered reports to the output directory.
 */

import { fs, path } from 'zx';
import { ScanError, errorMessage } from '../services/error-handling.js';
import { ErrorCode } from '../types/errors.js';
import type { ReportFormat } from '../types/config.js';
import { type Result, ok, err } from '../types/result.js';
import type { CompletedScanResult } from '../types/scan.js';
import { buildJsonReport, stringifyJsonReport } from './json.js';
import { buildHtmlReport } from './html.js';
import { buildMarkdownReport } from './markdown.js';

/** File stem for a scan, e.g. "scan_example.com_2026-01-02T03-04-05". */
export function reportBaseName(result: CompletedScanResult): string {
  const domain = result.target.domain.replace(/[^a-zA-Z0-9.-]/g, '_');
  const stamp = result.startTime.toISOString().slice(0, 19).replace(/:/g, '-');
  return `scan_${domain}_${stamp}`;
}

const FORMAT_OUTPUTS: Record<ReportFormat, { markdown: boolean; json: boolean; html: boolean }> = {
  markdown: { markdown: true, json: false, html: false },
  json: { markdown: false, json: true, html: false },
  html: { markdown: false, json: false, html: true },
  both: { markdown: true, json: true, html: false },
  all: { markdown: true, json: true, html: true },
};

async function writeText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
}

export async function writeReports(
  result: CompletedScanResult,
  outputDir: string,
  format: ReportFormat
): Promise<Result<string[], ScanError>> {
  const baseName = path.join(outputDir, reportBaseName(result));
  const outputs = FORMAT_OUTPUTS[format];
  const written: string[] = [];
  try {
    if (outputs.markdown) {
      const filePath = `${baseName}.md`;
      await writeText(filePath, buildMarkdownReport(result));
      written.push(filePath);
    }
    if (outputs.json) {
      const filePath = `${baseName}.json`;
      await writeText(filePath, stringifyJsonReport(buildJsonReport(result)));
      written.push(filePath);
    }
    if (outputs.html) {
      const filePath = `${baseName}.html`;
      await writeText(filePath, buildHtmlReport(result));
      written.push(filePath);
    }
  } catch (error) {
    return err(
      new ScanError(
        `failed to write report: ${errorMessage(error)}`,
        'filesystem',
        ErrorCode.REPORT_WRITE_FAILED,
        { outputDir },
        { cause: error }
      )
    );
  }
  return ok(written);
}
