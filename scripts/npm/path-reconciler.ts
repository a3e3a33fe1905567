/**
 * path-reconciler.ts
 *
 * Makes the installation directory reachable through PATH for the current
 * user. Persists through the shell profile on linux/macOS and through the
 * user-scope Path variable on Windows.
 */

import fs from 'fs';
import path from 'path';
import { errorMessage, log, runCommand, type CommandRunner } from './common';
import type { InstallerConfig } from './config';
import { ok, warn, type StageResult } from './errors';
import type { ModeDecision } from './mode';
import type { PlatformTag } from './platform';

export interface PathStore {
  /** Human-readable location, e.g. the profile file. */
  readonly location: string;
  /** Whether `dir` is already persisted for future sessions. */
  contains(dir: string): boolean;
  append(dir: string): void;
}

export interface PathReconciliation {
  alreadyPresent: boolean;
  /** Set when a new entry was persisted; a new shell session picks it up. */
  persistedTo?: string;
}

type OsOnly = Pick<PlatformTag, 'os'>;

export function pathDelimiter(platform: OsOnly): string {
  return platform.os === 'windows' ? ';' : ':';
}

function normalizeSegment(segment: string, platform: OsOnly): string {
  let value = segment.trim();
  while (value.length > 1 && /[\\/]$/.test(value)) {
    value = value.slice(0, -1);
  }
  return platform.os === 'windows' ? value.toLowerCase() : value;
}

export function splitPath(pathValue: string, platform: OsOnly): string[] {
  return pathValue.split(pathDelimiter(platform)).filter((segment) => segment.trim() !== '');
}

/**
 * Whole-segment comparison: `/opt/bin` is not on `/opt/bin2:/usr/bin`.
 */
export function pathContains(pathValue: string, dir: string, platform: OsOnly): boolean {
  const wanted = normalizeSegment(dir, platform);
  return splitPath(pathValue, platform).some((segment) => normalizeSegment(segment, platform) === wanted);
}

export function appendToPath(pathValue: string, dir: string, platform: OsOnly): string {
  if (pathValue === '') {
    return dir;
  }
  return `${pathValue}${pathDelimiter(platform)}${dir}`;
}

const PROFILE_COMMENT = '# added by pdfcat installer';

export class ShellProfilePathStore implements PathStore {
  readonly location: string;
  private readonly fish: boolean;

  constructor(homeDir: string, shell: string | undefined) {
    const shellName = shell ? path.basename(shell) : '';
    this.fish = shellName === 'fish';
    this.location = ShellProfilePathStore.profileFor(homeDir, shellName);
  }

  static profileFor(homeDir: string, shellName: string): string {
    switch (shellName) {
      case 'bash':
        return path.join(homeDir, '.bashrc');
      case 'zsh':
        return path.join(homeDir, '.zshrc');
      case 'fish':
        return path.join(homeDir, '.config', 'fish', 'config.fish');
      default:
        return path.join(homeDir, '.profile');
    }
  }

  exportLine(dir: string): string {
    return this.fish ? `fish_add_path ${dir}` : `export PATH="${dir}:$PATH"`;
  }

  contains(dir: string): boolean {
    if (!fs.existsSync(this.location)) {
      return false;
    }
    const line = this.exportLine(dir);
    return fs.readFileSync(this.location, 'utf8').split(/\r?\n/).some((existing) => existing.trim() === line);
  }

  append(dir: string): void {
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    const current = fs.existsSync(this.location) ? fs.readFileSync(this.location, 'utf8') : '';
    const separator = current === '' || current.endsWith('\n') ? '' : '\n';
    fs.appendFileSync(this.location, `${separator}\n${PROFILE_COMMENT}\n${this.exportLine(dir)}\n`);
  }
}

const WINDOWS: OsOnly = { os: 'windows' };

/**
 * PowerShell invocation with the script passed as UTF-16LE base64, so that
 * cmd.exe neither expands `%VAR%` references nor mangles quotes in it.
 */
export function powershell(script: string): string {
  return `powershell -NoProfile -NonInteractive -EncodedCommand ${Buffer.from(script, 'utf16le').toString('base64')}`;
}

function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Expands `%NAME%` references the way Windows does: names are
 * case-insensitive and unknown references are kept verbatim.
 */
export function expandWindowsVariables(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/%([^%;]+)%/g, (reference, name: string) => {
    const key = Object.keys(env).find((candidate) => candidate.toLowerCase() === name.toLowerCase());
    const expanded = key === undefined ? undefined : env[key];
    return expanded ?? reference;
  });
}

/**
 * The user-scope Path in HKCU\Environment. Read and written raw, as an
 * expandable string, so references such as `%USERPROFILE%` survive.
 */
export class WindowsUserPathStore implements PathStore {
  readonly location = 'HKCU\\Environment (Path)';

  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  read(): string {
    const output = this.runner(
      powershell("(Get-Item -Path 'HKCU:\\Environment').GetValue('Path', '', 'DoNotExpandEnvironmentNames')"),
      { silent: true },
    );
    return (output ?? '').trim();
  }

  contains(dir: string): boolean {
    const raw = this.read();
    return pathContains(raw, dir, WINDOWS) || pathContains(expandWindowsVariables(raw, this.env), dir, WINDOWS);
  }

  append(dir: string): void {
    const next = appendToPath(this.read(), dir, WINDOWS);
    this.runner(
      powershell(
        `New-ItemProperty -Path 'HKCU:\\Environment' -Name Path -PropertyType ExpandString -Value ${quotePowerShell(next)} -Force | Out-Null`,
      ),
      { silent: true },
    );
  }
}

export function defaultPathStore(
  platform: PlatformTag,
  config: Pick<InstallerConfig, 'homeDir' | 'shell'>,
  runner: CommandRunner = runCommand,
): PathStore {
  if (platform.os === 'windows') {
    return new WindowsUserPathStore(runner);
  }
  return new ShellProfilePathStore(config.homeDir, config.shell);
}

/**
 * Adds `installDir` to PATH for the current user if it is missing from
 * `currentPath`. `env.PATH` is updated as well, so later steps of this run
 * see the new entry. Failures to persist become a PathUpdateFailed warning.
 */
export function reconcilePath(
  installDir: string,
  decision: ModeDecision,
  platform: PlatformTag,
  store: PathStore,
  currentPath: string,
  env: NodeJS.ProcessEnv,
): StageResult<PathReconciliation> {
  // Local dev runs leave user state alone
  if (decision.mode === 'SourceBuild') {
    return ok({ alreadyPresent: false });
  }

  if (pathContains(currentPath, installDir, platform)) {
    log('  [OK] Installation directory is in PATH', 'green');
    return ok({ alreadyPresent: true });
  }

  log('  [WARN] Installation directory is not in PATH', 'yellow');
  env.PATH = appendToPath(currentPath, installDir, platform);

  try {
    if (store.contains(installDir)) {
      log(`  Already configured in ${store.location}`, 'dim');
    } else {
      store.append(installDir);
      log(`  [OK] Added ${installDir} to ${store.location}`, 'green');
    }
  } catch (error) {
    return warn(
      { alreadyPresent: false },
      'PathUpdateFailed',
      `Could not add ${installDir} to ${store.location}: ${errorMessage(error)}`,
    );
  }

  return ok({ alreadyPresent: false, persistedTo: store.location });
}
