/**
 * check-prerequisites.ts
 *
 * Verifies that the external tools a run depends on are installed before any
 * work starts. Binary-fetch runs need none: archives are handled in-process.
 */

import { checkCommand, log, runCommand, type CommandCheckResult, type CommandRunner } from './common';
import { InstallError } from './errors';
import type { ModeDecision } from './mode';

interface CheckResult {
  name: string;
  result: CommandCheckResult;
}

export function hasCargo(runner: CommandRunner = runCommand): boolean {
  return checkCommand('cargo', '--version', runner).success;
}

export function checkPrerequisites(decision: ModeDecision, runner: CommandRunner = runCommand): void {
  log('Checking prerequisites...', 'cyan');

  const checks: CheckResult[] = [];
  if (decision.mode === 'SourceBuild') {
    checks.push({ name: 'cargo (Rust toolchain)', result: checkCommand('cargo', '--version', runner) });
  }

  const missing = checks.filter((check) => !check.result.success);
  if (missing.length > 0) {
    for (const check of missing) {
      log(`  [MISSING] ${check.name}`, 'red');
    }
    throw new InstallError(
      'MissingPrerequisite',
      `Missing required tools: ${missing.map((check) => check.name).join(', ')}`,
    );
  }

  for (const check of checks) {
    log(`  [OK] ${check.name} ${check.result.version ?? ''}`.trimEnd(), 'green');
  }
  log('All prerequisites met', 'green');
}

export function checkGit(runner: CommandRunner = runCommand): void {
  const result = checkCommand('git', '--version', runner);
  if (!result.success) {
    throw new InstallError('MissingPrerequisite', 'Missing required tools: git', { cause: result.error });
  }
}
