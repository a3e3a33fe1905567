/**
 * placement.ts
 *
 * Resolves the installation directory and puts the executable there.
 */

import fs from 'fs';
import path from 'path';
import { BINARY_NAME, log } from './common';
import type { InstallerConfig } from './config';
import { InstallError } from './errors';
import type { ModeDecision } from './mode';
import { executableName, type PlatformTag } from './platform';
import { releaseDir } from './build';

export interface InstallDirCandidate {
  dir: string;
  /** Create the directory when it does not exist yet. */
  create: boolean;
}

export interface InstalledArtifact {
  readonly sourcePath: string;
  readonly installDir: string;
  readonly installedPath: string;
  /** False when the built binary was adopted where it already was. */
  readonly copied: boolean;
}

export function defaultInstallDirs(
  platform: PlatformTag,
  config: Pick<InstallerConfig, 'homeDir' | 'localAppData'>,
): InstallDirCandidate[] {
  if (platform.os === 'windows') {
    return [
      { dir: path.win32.join(config.localAppData, 'Programs', BINARY_NAME, 'bin'), create: true },
      { dir: path.win32.join(config.homeDir, 'bin'), create: true },
    ];
  }
  return [
    { dir: '/usr/local/bin', create: false },
    { dir: path.posix.join(config.homeDir, '.local', 'bin'), create: false },
    { dir: path.posix.join(config.homeDir, 'bin'), create: true },
  ];
}

function isWritableDir(dir: string): boolean {
  try {
    fs.accessSync(dir, fs.constants.W_OK);
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

function tryCreate(dir: string): boolean {
  try {
    fs.mkdirSync(dir, { recursive: true });
    return isWritableDir(dir);
  } catch {
    return false;
  }
}

export function firstWritable(candidates: InstallDirCandidate[]): string | undefined {
  for (const candidate of candidates) {
    if (isWritableDir(candidate.dir)) {
      return candidate.dir;
    }
    if (candidate.create && !fs.existsSync(candidate.dir) && tryCreate(candidate.dir)) {
      return candidate.dir;
    }
  }
  return undefined;
}

/**
 * Explicit override, else the build output directory for source builds,
 * else the first usable default location for this OS.
 */
export function resolveInstallDir(
  config: InstallerConfig,
  decision: ModeDecision,
  platform: PlatformTag,
): string {
  if (config.installDirOverride) {
    return path.resolve(config.cwd, config.installDirOverride);
  }
  if (decision.mode === 'SourceBuild') {
    return releaseDir(decision.projectDir);
  }

  const candidates = defaultInstallDirs(platform, config);
  const dir = firstWritable(candidates);
  if (!dir) {
    throw new InstallError(
      'PlacementFailed',
      `No writable installation directory among: ${candidates.map((c) => c.dir).join(', ')}`,
    );
  }
  return dir;
}

function samePath(a: string, b: string, platform: PlatformTag): boolean {
  const left = path.resolve(a);
  const right = path.resolve(b);
  return platform.os === 'windows' ? left.toLowerCase() === right.toLowerCase() : left === right;
}

export function placeExecutable(
  sourcePath: string,
  installDir: string,
  decision: ModeDecision,
  platform: PlatformTag,
): InstalledArtifact {
  log(`Installation directory: ${installDir}`, 'cyan');
  const installedPath = path.join(installDir, executableName(platform));

  // Source builds already live in target/release
  if (decision.mode === 'SourceBuild' && samePath(sourcePath, installedPath, platform)) {
    log(`Binary built at: ${sourcePath}`, 'cyan');
    return { sourcePath, installDir, installedPath, copied: false };
  }

  try {
    fs.mkdirSync(installDir, { recursive: true });
    fs.copyFileSync(sourcePath, installedPath);
    if (platform.os !== 'windows') {
      fs.chmodSync(installedPath, 0o755);
    }
  } catch (error) {
    throw new InstallError('PlacementFailed', `Could not install to ${installedPath}`, { cause: error });
  }

  log(`  [OK] Installed to: ${installedPath}`, 'green');
  return { sourcePath, installDir, installedPath, copied: true };
}
