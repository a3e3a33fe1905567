/**
 * mode.ts
 *
 * Decides once per run whether pdfcat is built from a local checkout or
 * fetched as a pre-built release binary.
 *
 * A detected local project always wins: there is no way to force a binary
 * fetch from inside a pdfcat checkout.
 */

import fs from 'fs';
import path from 'path';
import { BINARY_NAME, log, quoteArg, repoUrl, type CommandRunner } from './common';
import type { InstallerConfig } from './config';
import { checkGit } from './check-prerequisites';
import { InstallError, ok, warn, type StageResult } from './errors';

export type InstallMode = 'SourceBuild' | 'BinaryFetch';

export type ModeDecision =
  | { mode: 'SourceBuild'; projectDir: string; cloned: boolean }
  | { mode: 'BinaryFetch' };

const MARKER_FILE = 'Cargo.toml';
const MARKER_NAME = new RegExp(`^\\s*name\\s*=\\s*"${BINARY_NAME}"\\s*$`, 'm');

export function isSourceProject(dir: string): boolean {
  const manifest = path.join(dir, MARKER_FILE);
  if (!fs.existsSync(manifest)) {
    return false;
  }
  return MARKER_NAME.test(fs.readFileSync(manifest, 'utf8'));
}

export interface ModeContext {
  /** Whether the build toolchain answers on this machine. */
  hasToolchain: () => boolean;
  runner: CommandRunner;
}

export function selectMode(config: InstallerConfig, context: ModeContext): StageResult<ModeDecision> {
  if (isSourceProject(config.cwd)) {
    log('Development mode detected', 'cyan');
    return ok({ mode: 'SourceBuild', projectDir: config.cwd, cloned: false });
  }

  if (!config.forceSourceBuild) {
    return ok({ mode: 'BinaryFetch' });
  }

  if (!context.hasToolchain()) {
    return warn(
      { mode: 'BinaryFetch' },
      'BuildToolchainUnavailable',
      'PDFCAT_BUILD_FROM_SOURCE is set but cargo was not found; downloading a release binary instead',
    );
  }

  log('Building from source (requested via PDFCAT_BUILD_FROM_SOURCE)', 'cyan');
  const checkoutDir = path.join(config.cwd, BINARY_NAME);

  if (isSourceProject(checkoutDir)) {
    log(`Reusing existing checkout at ${checkoutDir}`, 'dim');
    return ok({ mode: 'SourceBuild', projectDir: checkoutDir, cloned: false });
  }

  checkGit(context.runner);
  const url = repoUrl(config.repository);
  try {
    context.runner(`git clone ${quoteArg(url)} ${quoteArg(BINARY_NAME)}`, { cwd: config.cwd });
  } catch (error) {
    throw new InstallError('SourceCheckoutFailed', `Could not clone ${url}`, { cause: error });
  }

  if (!isSourceProject(checkoutDir)) {
    throw new InstallError('SourceCheckoutFailed', `Clone of ${url} did not produce a ${BINARY_NAME} project`);
  }
  return ok({ mode: 'SourceBuild', projectDir: checkoutDir, cloned: true });
}
