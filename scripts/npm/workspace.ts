/**
 * workspace.ts
 *
 * Ephemeral directory owned by a single run. Holds the downloaded archive and
 * its extracted contents; removed exactly once, whichever way the run ends.
 */

import fs from 'fs';
import path from 'path';
import { errorMessage } from './common';

export class Workspace {
  private disposed = false;

  private constructor(readonly dir: string) {}

  static create(tmpRoot: string, prefix = 'pdfcat-install-'): Workspace {
    return new Workspace(fs.mkdtempSync(path.join(tmpRoot, prefix)));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  resolve(...segments: string[]): string {
    return path.join(this.dir, ...segments);
  }

  /**
   * Removes the directory. Later calls are no-ops. Returns the failure
   * message when removal failed, so callers can report it without masking
   * the run's own outcome.
   */
  dispose(): string | undefined {
    if (this.disposed) {
      return undefined;
    }
    this.disposed = true;
    try {
      fs.rmSync(this.dir, { recursive: true, force: true });
      return undefined;
    } catch (error) {
      return `Could not remove ${this.dir}: ${errorMessage(error)}`;
    }
  }
}
