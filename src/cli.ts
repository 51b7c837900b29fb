#!/usr/bin/env node
// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


/**
 * siteprobe command line entry point.
 *
 * Usage:
 *   siteprobe <url> [options]
 *
 * Exits 1 when the scan rates HIGH or CRITICAL, or when the target cannot be
 * validated.
 *
 * Environment:
 *   SITEPROBE_TIMEOUT_SECONDS - default scan timeout (default: 300)
 *   SITEPROBE_OUTPUT_DIR      - default report directory (default: ./reports)
 *   SITEPROBE_SKIP            - comma-separated probes to skip (nmap,headers,tls,sqli,xss)
 */

import dotenv from 'dotenv';
import { chalk } from 'zx';
import { createConsoleLogger } from './audit/console-logger.js';
import { type CliOverrides, isReportFormat, loadConfigFile, resolveSettings } from './config-parser.js';
import { runSecurityScan } from './orchestrator/scan-orchestrator.js';
import { writeReports } from './reporting/writer.js';
import { formatScanError } from './services/error-handling.js';
import { sanitizeUrl, validateAndParseURL } from './services/target-validator.js';
import { countBySeverity } from './services/scoring.js';
import type { ProbeCategory, ScanConfig } from './types/config.js';
import type { CompletedScanResult, RiskLevel } from './types/scan.js';

dotenv.config();

function showUsage(): void {
  console.log('\nsiteprobe');
  console.log('Probe a web endpoint for common security weaknesses\n');
  console.log('Usage:');
  console.log('  siteprobe <url> [options]\n');
  console.log('Options:');
  console.log('  --skip-nmap           Skip the nmap port scan');
  console.log('  --skip-headers        Skip the security header check');
  console.log('  --skip-tls            Skip the TLS/SSL check');
  console.log('  --skip-sqli           Skip SQL injection tests');
  console.log('  --skip-xss            Skip XSS tests');
  console.log('  --timeout <seconds>   Overall scan timeout (default: 300)');
  console.log('  --config <path>       YAML configuration file');
  console.log('  --output <dir>        Report output directory (default: ./reports)');
  console.log('  --format <format>     markdown, json, html, both or all (default: markdown)');
  console.log('  --verbose             Print debug logs');
  console.log('  --log-file <path>     Also append logs to this file');
  console.log('  --help                Show this help\n');
  console.log('Examples:');
  console.log('  siteprobe https://example.com');
  console.log('  siteprobe example.com --skip-nmap --format both --output ./out\n');
}

// === CLI Argument Parsing ===

interface CliArgs {
  targetUrl: string;
  configPath?: string;
  overrides: CliOverrides;
}

const SKIP_FLAGS: Record<string, ProbeCategory> = {
  '--skip-nmap': 'nmap',
  '--skip-headers': 'headers',
  '--skip-tls': 'tls',
  '--skip-sqli': 'sqli',
  '--skip-xss': 'xss',
};

function parseCliArgs(argv: string[]): CliArgs {
  if (argv.includes('--help') || argv.includes('-h') || argv.length === 0) {
    showUsage();
    process.exit(0);
  }

  let targetUrl: string | undefined;
  let configPath: string | undefined;
  let timeoutSeconds: string | undefined;
  let outputDir: string | undefined;
  let format: string | undefined;
  let logFile: string | undefined;
  let verbose = false;
  const skip: ProbeCategory[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];
    const skipCategory = arg ? SKIP_FLAGS[arg] : undefined;
    if (skipCategory) {
      skip.push(skipCategory);
    } else if (arg === '--timeout') {
      if (nextArg && !nextArg.startsWith('-')) {
        timeoutSeconds = nextArg;
        i++;
      }
    } else if (arg === '--config') {
      if (nextArg && !nextArg.startsWith('-')) {
        configPath = nextArg;
        i++;
      }
    } else if (arg === '--output') {
      if (nextArg && !nextArg.startsWith('-')) {
        outputDir = nextArg;
        i++;
      }
    } else if (arg === '--format') {
      if (nextArg && !nextArg.startsWith('-')) {
        format = nextArg;
        i++;
      }
    } else if (arg === '--log-file') {
      if (nextArg && !nextArg.startsWith('-')) {
        logFile = nextArg;
        i++;
      }
    } else if (arg === '--verbose' || arg === '-v') {
      verbose = true;
    } else if (arg && !arg.startsWith('-')) {
      if (!targetUrl) {
        targetUrl = arg;
      }
    } else if (arg) {
      console.log(`Warning: ignoring unknown option ${arg}`);
    }
  }

  if (!targetUrl) {
    console.log('Error: target URL is required');
    showUsage();
    process.exit(1);
  }

  if (format !== undefined && !isReportFormat(format)) {
    console.log(`Error: unsupported format "${format}" (expected markdown, json, html, both or all)`);
    process.exit(1);
  }

  return {
    targetUrl,
    ...(configPath && { configPath }),
    overrides: {
      ...(skip.length > 0 && { skip }),
      ...(timeoutSeconds && { timeoutSeconds }),
      ...(outputDir && { outputDir }),
      ...(format && { format }),
      ...(verbose && { verbose }),
      ...(logFile && { logFile }),
    },
  };
}

const RISK_COLORS: Record<RiskLevel, (text: string) => string> = {
  LOW: chalk.green,
  MEDIUM: chalk.yellow,
  HIGH: chalk.red,
  CRITICAL: chalk.bgRed.white,
};

function printSummary(result: CompletedScanResult): void {
  const counts = countBySeverity([...result.sqliResults, ...result.xssResults]);
  console.log('');
  console.log(chalk.bold('Scan summary'));
  console.log(`  Risk level: ${RISK_COLORS[result.riskLevel](result.riskLevel)}`);
  console.log(
    `  Vulnerabilities: ${counts.critical} critical, ${counts.high} high, ${counts.medium} medium, ${counts.low} low`
  );
  if (result.headerResults) {
    console.log(`  Header score: ${result.headerResults.securityScore}/100`);
  }
  if (result.tlsResults) {
    console.log(`  TLS score: ${result.tlsResults.score}/100`);
  }
  if (result.portResults) {
    console.log(`  Open ports: ${result.portResults.openPorts.length}`);
  }
  for (const error of result.errors) {
    console.log(chalk.yellow(`  ! ${formatScanError(error)}`));
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  let fileConfig: ScanConfig = {};
  if (args.configPath) {
    const loaded = await loadConfigFile(args.configPath);
    if (!loaded.ok) {
      console.error(chalk.red(`Error: ${formatScanError(loaded.error)}`));
      return 1;
    }
    fileConfig = loaded.value;
  }

  const settings = resolveSettings(process.env, fileConfig, args.overrides);
  const logger = createConsoleLogger({ verbose: settings.verbose, logFile: settings.logFile });

  logger.info(`Validating target ${sanitizeUrl(args.targetUrl)}`);
  const target = await validateAndParseURL(args.targetUrl, logger);
  if (!target.ok) {
    logger.error(formatScanError(target.error));
    return 1;
  }

  logger.info(`Scanning ${sanitizeUrl(target.value.url)} (${target.value.ip})`, {
    timeoutMs: settings.timeoutMs,
    skip: Array.from(settings.skip),
  });

  const result = await runSecurityScan(target.value, {
    skipNmap: settings.skip.has('nmap'),
    skipHeaders: settings.skip.has('headers'),
    skipTls: settings.skip.has('tls'),
    skipSqli: settings.skip.has('sqli'),
    skipXss: settings.skip.has('xss'),
    timeoutMs: settings.timeoutMs,
    logger,
  });

  printSummary(result);

  const written = await writeReports(result, settings.outputDir, settings.format);
  if (!written.ok) {
    logger.error(formatScanError(written.error));
  } else {
    for (const filePath of written.value) {
      logger.info(`Report written to ${filePath}`);
    }
  }

  return result.riskLevel === 'HIGH' || result.riskLevel === 'CRITICAL' ? 1 : 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error);
    process.exitCode = 1;
  });
