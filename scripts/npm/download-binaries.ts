/**
 * download-binaries.ts
 *
 * Fetches the pre-built pdfcat release archive for the current platform into
 * the run's workspace, extracts it and locates the executable inside.
 * Handles .tar.gz and .zip archives.
 */

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { log, quoteArg, type CommandRunner } from './common';
import { InstallError, ok, warn, type StageResult } from './errors';
import { extractArchive } from './extract';
import type { HttpClient } from './http';
import { assetPattern, executableName, type PlatformTag } from './platform';
import { assetHeaders, type AssetDescriptor, type ReleaseDescriptor } from './release';
import type { Workspace } from './workspace';

export interface AcquireContext {
  http: HttpClient;
  runner: CommandRunner;
  workspace: Workspace;
  token?: string;
}

/**
 * First asset in index order whose name matches the platform pattern.
 */
export function selectAsset(release: ReleaseDescriptor, platform: PlatformTag): AssetDescriptor {
  const pattern = assetPattern(platform);
  const asset = release.assets.find((candidate) => minimatch(candidate.name, pattern));

  if (!asset) {
    log(`Available assets in release ${release.tag}:`, 'yellow');
    release.assets.forEach((candidate) => log(`  - ${candidate.name}`, 'dim'));
    throw new InstallError(
      'AssetNotFound',
      `No asset matching ${pattern} in release ${release.tag}`,
    );
  }
  return asset;
}

/**
 * Breadth-first search with entries sorted by name, so the shallowest match
 * wins and the result does not depend on directory read order.
 */
export function findExecutable(rootDir: string, fileName: string): string | undefined {
  let level = [rootDir];

  while (level.length > 0) {
    const next: string[] = [];
    for (const dir of level) {
      const entries = fs.readdirSync(dir, { withFileTypes: true })
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isFile() && entry.name === fileName) {
          return entryPath;
        }
        if (entry.isDirectory()) {
          next.push(entryPath);
        }
      }
    }
    level = next;
  }

  return undefined;
}

/**
 * Remove Apple quarantine attributes on macOS
 * This is needed for binaries downloaded from the internet
 */
export function removeAppleQuarantine(binaryPath: string, runner: CommandRunner): StageResult<void> {
  const failed: string[] = [];
  for (const attribute of ['com.apple.provenance', 'com.apple.quarantine']) {
    // xattr -d fails when the attribute is absent, so list first
    const present = runner(`xattr -p ${attribute} ${quoteArg(binaryPath)}`, { silent: true, allowFailure: true });
    if (present === null) {
      continue;
    }
    const removed = runner(`xattr -d ${attribute} ${quoteArg(binaryPath)}`, { silent: true, allowFailure: true });
    if (removed === null) {
      failed.push(attribute);
    }
  }

  if (failed.length > 0) {
    return warn(undefined, 'QuarantineNotCleared', `Could not remove ${failed.join(', ')} from ${binaryPath}`);
  }
  return ok(undefined);
}

export async function acquireArtifact(
  release: ReleaseDescriptor,
  platform: PlatformTag,
  context: AcquireContext,
): Promise<StageResult<string>> {
  const asset = selectAsset(release, platform);
  const { workspace } = context;

  const archivePath = workspace.resolve(asset.name);
  log(`\nDownloading ${asset.name}...`, 'yellow');
  try {
    await context.http.download(asset.downloadRef, assetHeaders(context.token), archivePath);
  } catch (error) {
    throw new InstallError('DownloadFailed', `Download of ${asset.name} failed`, { cause: error });
  }
  log('  [OK] Downloaded', 'green');

  const contentsDir = workspace.resolve('contents');
  log('\nExtracting...', 'yellow');
  try {
    await extractArchive(archivePath, contentsDir);
  } catch (error) {
    throw new InstallError('ExtractionFailed', `Could not extract ${asset.name}`, { cause: error });
  }
  log('  [OK] Extracted', 'green');

  const fileName = executableName(platform);
  const binaryPath = findExecutable(contentsDir, fileName);
  if (!binaryPath) {
    throw new InstallError('BinaryNotFoundInArchive', `${fileName} not found in ${asset.name}`);
  }
  log(`  [OK] Found ${path.relative(contentsDir, binaryPath)}`, 'dim');

  if (platform.os === 'macos') {
    const quarantine = removeAppleQuarantine(binaryPath, context.runner);
    if (quarantine.kind === 'warning') {
      return { kind: 'warning', value: binaryPath, warning: quarantine.warning };
    }
  }

  return ok(binaryPath);
}
