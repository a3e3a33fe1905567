/**
 * config.ts
 *
 * Captures the installer's configuration once, at run start, from the
 * environment. Nothing downstream reads process.env.
 */

import os from 'os';
import path from 'path';
import { z, ZodError } from 'zod';
import { DEFAULT_REPOSITORY } from './common';
import { InstallError } from './errors';

const zBooleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const zOptionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const zEnvironment = z.object({
  PDFCAT_VERSION: zOptionalString,
  PDFCAT_INSTALL_DIR: zOptionalString,
  PDFCAT_BUILD_FROM_SOURCE: zBooleanFlag,
  PDFCAT_REPOSITORY: zOptionalString.pipe(
    z
      .string()
      .regex(/^[\w.-]+\/[\w.-]+$/, 'expected owner/repo')
      .optional(),
  ),
  GITHUB_TOKEN: zOptionalString,
  GH_TOKEN: zOptionalString,
  HOME: zOptionalString,
  USERPROFILE: zOptionalString,
  LOCALAPPDATA: zOptionalString,
  SHELL: zOptionalString,
  PATH: z.string().optional(),
  Path: z.string().optional(),
});

export interface InstallerConfig {
  /** `latest` or a concrete release tag. */
  version: string;
  installDirOverride?: string;
  forceSourceBuild: boolean;
  /** `owner/repo` */
  repository: string;
  token?: string;
  homeDir: string;
  localAppData: string;
  shell?: string;
  pathValue: string;
  rawOs: string;
  rawArch: string;
  cwd: string;
  tmpDir: string;
}

export interface HostFacts {
  platform: string;
  arch: string;
  cwd: string;
  tmpDir: string;
  homeDir: string;
}

export function currentHost(): HostFacts {
  return {
    platform: process.platform,
    arch: process.arch,
    cwd: process.cwd(),
    tmpDir: os.tmpdir(),
    homeDir: os.homedir(),
  };
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`)
    .join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv, host: HostFacts = currentHost()): InstallerConfig {
  const parsed = zEnvironment.safeParse(env);
  if (!parsed.success) {
    throw new InstallError(
      'InvalidConfiguration',
      `Invalid installer configuration: ${describeIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }

  const values = parsed.data;
  const homeDir = values.HOME ?? values.USERPROFILE ?? host.homeDir;

  return {
    version: values.PDFCAT_VERSION ?? 'latest',
    installDirOverride: values.PDFCAT_INSTALL_DIR,
    forceSourceBuild: values.PDFCAT_BUILD_FROM_SOURCE,
    repository: values.PDFCAT_REPOSITORY ?? DEFAULT_REPOSITORY,
    token: values.GITHUB_TOKEN ?? values.GH_TOKEN,
    homeDir,
    localAppData: values.LOCALAPPDATA ?? path.join(homeDir, 'AppData', 'Local'),
    shell: values.SHELL,
    pathValue: values.PATH ?? values.Path ?? '',
    rawOs: host.platform,
    rawArch: host.arch,
    cwd: host.cwd,
    tmpDir: host.tmpDir,
  };
}
