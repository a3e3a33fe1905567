/**
 * platform.ts
 *
 * Maps raw OS/architecture names to the canonical platform tag used to match
 * release assets and to pick per-OS behaviour (archive format, executable
 * suffix, default install locations).
 */

import { BINARY_NAME } from './common';
import { InstallError } from './errors';

export type OsFamily = 'windows' | 'linux' | 'macos';
export type CpuArch = 'x86_64' | 'aarch64';

export interface PlatformTag {
  readonly os: OsFamily;
  readonly arch: CpuArch;
  /** Canonical rendering, e.g. `windows-x86_64`. */
  readonly tag: string;
}

export type ArchiveExtension = '.zip' | '.tar.gz';

function normalizeOs(rawOs: string): OsFamily | undefined {
  const value = rawOs.trim().toLowerCase();

  // Node names first, then uname -s spellings
  switch (value) {
    case 'linux':
      return 'linux';
    case 'darwin':
    case 'macos':
      return 'macos';
    case 'win32':
    case 'windows':
    case 'windows_nt':
      return 'windows';
  }

  if (value.startsWith('mingw') || value.startsWith('msys') || value.startsWith('cygwin')) {
    return 'windows';
  }
  return undefined;
}

function normalizeArch(rawArch: string): CpuArch | undefined {
  switch (rawArch.trim().toLowerCase()) {
    case 'x64':
    case 'x86_64':
    case 'amd64':
      return 'x86_64';
    case 'arm64':
    case 'aarch64':
      return 'aarch64';
    default:
      return undefined;
  }
}

export function identifyPlatform(rawOs: string, rawArch: string): PlatformTag {
  const os = normalizeOs(rawOs);
  if (!os) {
    throw new InstallError('UnsupportedPlatform', `Unsupported operating system: ${rawOs}`);
  }

  const arch = normalizeArch(rawArch);
  if (!arch) {
    throw new InstallError('UnsupportedPlatform', `Unsupported architecture: ${rawArch}`);
  }

  return Object.freeze({ os, arch, tag: `${os}-${arch}` });
}

export function archiveExtension(platform: PlatformTag): ArchiveExtension {
  return platform.os === 'windows' ? '.zip' : '.tar.gz';
}

export function executableName(platform: PlatformTag): string {
  return platform.os === 'windows' ? `${BINARY_NAME}.exe` : BINARY_NAME;
}

/**
 * Release archives are named `pdfcat-<version>-<platform-tag><ext>`.
 */
export function assetPattern(platform: PlatformTag): string {
  return `${BINARY_NAME}-*-${platform.tag}${archiveExtension(platform)}`;
}
