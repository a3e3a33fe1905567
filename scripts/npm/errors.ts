/**
 * errors.ts
 *
 * Failure taxonomy for the installer. Fatal conditions are thrown as
 * InstallError and caught once by the run coordinator; warnings travel as
 * values inside StageResult.
 */

export type Stage =
  | 'configuration'
  | 'platform'
  | 'mode'
  | 'prerequisites'
  | 'release'
  | 'download'
  | 'extraction'
  | 'build'
  | 'placement'
  | 'path'
  | 'verification';

export type FailureCategory =
  | 'InvalidConfiguration'
  | 'UnsupportedPlatform'
  | 'MissingPrerequisite'
  | 'SourceCheckoutFailed'
  | 'ReleaseLookupFailed'
  | 'AssetNotFound'
  | 'DownloadFailed'
  | 'ExtractionFailed'
  | 'BinaryNotFoundInArchive'
  | 'BuildFailed'
  | 'PlacementFailed'
  | 'InstalledBinaryMissing';

export type WarningCategory =
  | 'TestsFailed'
  | 'PathUpdateFailed'
  | 'VersionCheckFailed'
  | 'BuildToolchainUnavailable'
  | 'QuarantineNotCleared'
  | 'WorkspaceCleanupFailed';

const STAGE_BY_CATEGORY: Record<FailureCategory, Stage> = {
  InvalidConfiguration: 'configuration',
  UnsupportedPlatform: 'platform',
  MissingPrerequisite: 'prerequisites',
  SourceCheckoutFailed: 'mode',
  ReleaseLookupFailed: 'release',
  AssetNotFound: 'download',
  DownloadFailed: 'download',
  ExtractionFailed: 'extraction',
  BinaryNotFoundInArchive: 'extraction',
  BuildFailed: 'build',
  PlacementFailed: 'placement',
  InstalledBinaryMissing: 'verification',
};

export class InstallError extends Error {
  readonly stage: Stage;

  constructor(
    readonly category: FailureCategory,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'InstallError';
    this.stage = STAGE_BY_CATEGORY[category];
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Text of the underlying cause, falling back to this error's message. */
  get causeText(): string {
    if (this.cause instanceof Error) {
      return this.cause.message;
    }
    if (this.cause !== undefined) {
      return String(this.cause);
    }
    return this.message;
  }
}

/**
 * Wraps anything that is not already an InstallError into the given category.
 */
export function asInstallError(error: unknown, category: FailureCategory, message: string): InstallError {
  if (error instanceof InstallError) {
    return error;
  }
  return new InstallError(category, message, { cause: error });
}

export interface InstallWarning {
  category: WarningCategory;
  message: string;
}

export type StageResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'warning'; value: T; warning: InstallWarning };

export function ok<T>(value: T): StageResult<T> {
  return { kind: 'ok', value };
}

export function warn<T>(value: T, category: WarningCategory, message: string): StageResult<T> {
  return { kind: 'warning', value, warning: { category, message } };
}

/**
 * Unwraps a stage result, appending its warning (if any) to `warnings`.
 */
export function collect<T>(result: StageResult<T>, warnings: InstallWarning[]): T {
  if (result.kind === 'warning') {
    warnings.push(result.warning);
  }
  return result.value;
}
