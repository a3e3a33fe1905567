/**
 * report.ts
 *
 * Final summary printed after a run.
 */

import { BINARY_NAME, banner, log, repoUrl } from './common';
import type { InstallReport } from './setup';

export function exitCode(report: InstallReport): number {
  return report.outcome === 'failed' ? 1 : 0;
}

function printFailure(report: InstallReport, url: string): void {
  banner('Installation Failed', 'red');
  if (report.failure) {
    log(`\nStage:    ${report.failure.stage}`, 'red');
    log(`Category: ${report.failure.category}`, 'red');
    log(`Error:    ${report.failure.message}`, 'red');
    if (report.failure.cause !== report.failure.message) {
      log(`Cause:    ${report.failure.cause}`, 'red');
    }
  }

  log('\nFor help:', 'yellow');
  log(`  - Check the documentation: ${url}`, 'cyan');
  log(`  - Report an issue: ${url}/issues`, 'cyan');
  log(`  - Manual installation: ${url}#installation`, 'cyan');
}

function printWarnings(report: InstallReport): void {
  log('\nCompleted with warnings:', 'yellow');
  for (const warning of report.warnings) {
    log(`  [WARN] ${warning.category}: ${warning.message}`, 'yellow');
  }
}

function printSuccess(report: InstallReport, url: string): void {
  banner('Installation Complete!', 'green');

  if (report.artifact) {
    log(`\nInstalled: ${report.artifact.installedPath}`, 'green');
  }
  if (report.version) {
    log(`Version:   ${report.version}`, 'green');
  }

  if (report.outcome === 'degraded') {
    printWarnings(report);
  }

  if (report.path?.persistedTo) {
    log(`\n${report.artifact?.installDir ?? 'The installation directory'} was added to PATH in ${report.path.persistedTo}.`, 'cyan');
    log('Open a new shell session to pick it up.', 'cyan');
  }

  if (report.mode === 'SourceBuild') {
    log('\nDevelopment mode:', 'cyan');
    log('  Run: cargo run -- --help', 'bold');
    log(`  Or:  ${report.artifact?.installedPath ?? `./target/release/${BINARY_NAME}`} --help`, 'bold');
  } else {
    log('\nGet started:', 'cyan');
    log(`  ${BINARY_NAME} --help          Show help`, 'bold');
    log(`  ${BINARY_NAME} --version       Show version`, 'bold');
    log('\nExample usage:', 'cyan');
    log(`  ${BINARY_NAME} file1.pdf file2.pdf -o merged.pdf`, 'bold');
  }

  log(`\nDocumentation: ${url}`, 'cyan');
  log(`Report issues: ${url}/issues`, 'cyan');
}

export function printReport(report: InstallReport, repository: string): void {
  const url = repoUrl(repository);
  if (report.outcome === 'failed') {
    printFailure(report, url);
    if (report.warnings.length > 0) {
      printWarnings(report);
    }
    return;
  }
  printSuccess(report, url);
}
