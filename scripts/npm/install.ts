#!/usr/bin/env node
/**
 * install.ts
 *
 * pdfcat installer entry point. Takes no arguments; configuration comes from
 * the environment (PDFCAT_VERSION, PDFCAT_INSTALL_DIR,
 * PDFCAT_BUILD_FROM_SOURCE, PDFCAT_REPOSITORY, GITHUB_TOKEN).
 *
 * Usage:
 *   npm run install:pdfcat
 *   PDFCAT_VERSION=v1.2.0 npm run install:pdfcat
 */

import { DEFAULT_REPOSITORY, banner, log, runCommand } from './common';
import { loadConfig, type InstallerConfig } from './config';
import { InstallError } from './errors';
import { HttpsClient } from './http';
import { exitCode, printReport } from './report';
import { runInstaller, type InstallReport } from './setup';

async function main(): Promise<number> {
  banner('Installing pdfcat - PDF Concatenation Tool', 'bold');

  let config: InstallerConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (!(error instanceof InstallError)) {
      throw error;
    }
    const report: InstallReport = {
      outcome: 'failed',
      warnings: [],
      failure: { stage: error.stage, category: error.category, message: error.message, cause: error.causeText },
    };
    printReport(report, DEFAULT_REPOSITORY);
    return exitCode(report);
  }

  const report = await runInstaller(config, {
    http: new HttpsClient(),
    runner: runCommand,
    env: process.env,
    handleSignals: true,
  });
  printReport(report, config.repository);
  return exitCode(report);
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    log(`\nInstallation failed: ${err.message}`, 'red');
    process.exit(1);
  },
);
