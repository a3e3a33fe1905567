/**
 * verify-install.ts
 *
 * Post-install verification: the installed file must exist and be
 * executable; `pdfcat --version` is a smoke test whose failure only degrades
 * the result.
 */

import fs from 'fs';
import { checkCommand, log, quoteArg, type CommandRunner } from './common';
import { InstallError, ok, warn, type StageResult } from './errors';
import type { PlatformTag } from './platform';

export const VERSION_CHECK_TIMEOUT = 10_000;

export interface VerificationResult {
  /** Output of `--version`, when the smoke test passed. */
  version?: string;
}

function isExecutable(filePath: string, platform: PlatformTag): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    // Windows has no executable bit
    if (platform.os !== 'windows') {
      fs.accessSync(filePath, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

export function verifyInstallation(
  installedPath: string,
  platform: PlatformTag,
  runner: CommandRunner,
): StageResult<VerificationResult> {
  log('\n=== Verifying Installation ===', 'cyan');

  if (!isExecutable(installedPath, platform)) {
    throw new InstallError('InstalledBinaryMissing', `${installedPath} is missing or not executable`);
  }
  log('  [OK] Binary is executable', 'green');

  const check = checkCommand(quoteArg(installedPath), '--version', runner, VERSION_CHECK_TIMEOUT);
  if (!check.success) {
    log('  [WARN] Binary installed but version check failed', 'yellow');
    return warn({}, 'VersionCheckFailed', `${installedPath} --version failed: ${check.error ?? 'unknown error'}`);
  }

  log(`  [OK] ${check.version}`, 'green');
  return ok({ version: check.version });
}
