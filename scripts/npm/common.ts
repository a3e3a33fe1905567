/**
 * common.ts
 *
 * Shared utilities for the pdfcat installer scripts.
 */

import { execSync } from 'child_process';

export const BINARY_NAME = 'pdfcat';
export const DEFAULT_REPOSITORY = 'pdfcat/pdfcat';
export const GITHUB_API_URL = 'https://api.github.com';
export const USER_AGENT = 'pdfcat-installer';

export function repoUrl(repository: string): string {
  return `https://github.com/${repository}`;
}

export type ColorStyle = 'green' | 'red' | 'yellow' | 'cyan' | 'bold' | 'dim';

const ANSI_CODES: Record<ColorStyle, string> = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
};

const RESET = '\x1b[0m';

export function log(message: string, style: ColorStyle = 'dim'): void {
  const code = ANSI_CODES[style];
  console.log(`${code}${message}${RESET}`);
}

export function banner(title: string, style: ColorStyle): void {
  log('\n=========================================', style);
  log(`  ${title}`, style);
  log('=========================================', style);
}

export interface RunCommandOptions {
  silent?: boolean;
  allowFailure?: boolean;
  cwd?: string;
  /** Milliseconds; unbounded when omitted. */
  timeout?: number;
}

/**
 * Runs a shell command synchronously. Returns captured stdout when `silent`,
 * and null when the command failed under `allowFailure`.
 */
export type CommandRunner = (command: string, options?: RunCommandOptions) => string | null;

export const runCommand: CommandRunner = (command, options = {}) => {
  try {
    const output = execSync(command, {
      cwd: options.cwd ?? process.cwd(),
      encoding: 'utf8',
      stdio: options.silent ? 'pipe' : 'inherit',
      timeout: options.timeout,
    });
    // execSync returns null for inherited stdio
    return output ?? '';
  } catch (error) {
    if (!options.allowFailure) {
      throw error;
    }
    return null;
  }
};

export function quoteArg(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

export interface CommandCheckResult {
  success: boolean;
  version?: string;
  error?: string;
  command?: string;
}

export function checkCommand(
  command: string,
  versionFlag = '--version',
  runner: CommandRunner = runCommand,
  timeout?: number,
): CommandCheckResult {
  try {
    const result = runner(`${command} ${versionFlag}`, { silent: true, timeout });
    return { success: true, command, version: (result ?? '').trim() };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return { success: false, command, error: err.message };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
