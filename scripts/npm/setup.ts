/**
 * setup.ts
 *
 * Runs the whole installation: mode selection, build or download, placement,
 * PATH reconciliation and verification, in that order.
 *
 * Every fatal condition is caught here, once, and turned into the failure
 * section of the report. The download workspace is removed on every way out,
 * including SIGINT/SIGTERM.
 */

import { log, type CommandRunner } from './common';
import type { InstallerConfig } from './config';
import {
  asInstallError,
  collect,
  InstallError,
  type FailureCategory,
  type InstallWarning,
  type Stage,
} from './errors';
import { buildFromSource } from './build';
import { checkPrerequisites, hasCargo } from './check-prerequisites';
import { acquireArtifact } from './download-binaries';
import type { HttpClient } from './http';
import { selectMode, type InstallMode } from './mode';
import { defaultPathStore, reconcilePath, type PathReconciliation, type PathStore } from './path-reconciler';
import { placeExecutable, resolveInstallDir, type InstalledArtifact } from './placement';
import { identifyPlatform, type PlatformTag } from './platform';
import { resolveCredential, resolveRelease } from './release';
import { verifyInstallation } from './verify-install';
import { Workspace } from './workspace';

export interface InstallerDeps {
  http: HttpClient;
  runner: CommandRunner;
  /** Receives the PATH update for this process. */
  env: NodeJS.ProcessEnv;
  pathStore?: (platform: PlatformTag, config: InstallerConfig) => PathStore;
  /** Remove the workspace and exit on SIGINT/SIGTERM. */
  handleSignals?: boolean;
}

export type InstallOutcome = 'success' | 'degraded' | 'failed';

export interface InstallFailure {
  stage: Stage;
  category: FailureCategory;
  message: string;
  cause: string;
}

export interface InstallReport {
  outcome: InstallOutcome;
  platform?: string;
  mode?: InstallMode;
  releaseTag?: string;
  artifact?: InstalledArtifact;
  path?: PathReconciliation;
  /** Output of `--version`; absent when the smoke test failed. */
  version?: string;
  warnings: InstallWarning[];
  failure?: InstallFailure;
  workspaceDir?: string;
}

function installSignalHandlers(current: () => Workspace | undefined): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    current()?.dispose();
    log(`\nInterrupted by ${signal}`, 'yellow');
    process.exit(130);
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

export async function runInstaller(config: InstallerConfig, deps: InstallerDeps): Promise<InstallReport> {
  const warnings: InstallWarning[] = [];
  const report: InstallReport = { outcome: 'failed', warnings };

  let workspace: Workspace | undefined;
  // Category used when a stage throws something other than InstallError
  let fallback: FailureCategory = 'UnsupportedPlatform';
  const removeSignalHandlers = deps.handleSignals ? installSignalHandlers(() => workspace) : undefined;

  try {
    const platform = identifyPlatform(config.rawOs, config.rawArch);
    report.platform = platform.tag;
    log(`Platform: ${platform.tag}`, 'cyan');

    fallback = 'SourceCheckoutFailed';
    const decision = collect(
      selectMode(config, { hasToolchain: () => hasCargo(deps.runner), runner: deps.runner }),
      warnings,
    );
    report.mode = decision.mode;

    fallback = 'MissingPrerequisite';
    checkPrerequisites(decision, deps.runner);

    let sourcePath: string;
    if (decision.mode === 'SourceBuild') {
      fallback = 'BuildFailed';
      sourcePath = collect(buildFromSource(decision.projectDir, platform, deps.runner), warnings);
    } else {
      try {
        workspace = Workspace.create(config.tmpDir);
      } catch (error) {
        throw new InstallError('DownloadFailed', `Could not create a download workspace in ${config.tmpDir}`, {
          cause: error,
        });
      }
      report.workspaceDir = workspace.dir;

      fallback = 'ReleaseLookupFailed';

      const token = resolveCredential(config.token, deps.runner);
      const release = await resolveRelease(deps.http, config.repository, config.version, token);
      report.releaseTag = release.tag;

      fallback = 'DownloadFailed';
      sourcePath = collect(
        await acquireArtifact(release, platform, { http: deps.http, runner: deps.runner, workspace, token }),
        warnings,
      );
    }

    fallback = 'PlacementFailed';
    log('\n=== Installing pdfcat ===', 'cyan');
    const installDir = resolveInstallDir(config, decision, platform);
    const artifact = placeExecutable(sourcePath, installDir, decision, platform);
    report.artifact = artifact;

    const store = (deps.pathStore ?? ((tag, cfg) => defaultPathStore(tag, cfg, deps.runner)))(platform, config);
    report.path = collect(
      reconcilePath(installDir, decision, platform, store, config.pathValue, deps.env),
      warnings,
    );

    fallback = 'InstalledBinaryMissing';
    const verification = collect(verifyInstallation(artifact.installedPath, platform, deps.runner), warnings);
    report.version = verification.version;

    report.outcome = warnings.length > 0 ? 'degraded' : 'success';
  } catch (error) {
    const failure = asInstallError(error, fallback, 'Unexpected error');
    report.outcome = 'failed';
    report.failure = {
      stage: failure.stage,
      category: failure.category,
      message: failure.message,
      cause: failure.causeText,
    };
  } finally {
    removeSignalHandlers?.();
    const cleanupError = workspace?.dispose();
    if (cleanupError) {
      warnings.push({ category: 'WorkspaceCleanupFailed', message: cleanupError });
      if (report.outcome === 'success') {
        report.outcome = 'degraded';
      }
    }
  }

  return report;
}
