/**
 * Tests for build.ts
 *
 * cargo is replaced by a fake runner that writes (or not) the release binary.
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildFromSource, buildOutputPath } from '../build';
import type { CommandRunner } from '../common';
import { InstallError } from '../errors';
import { identifyPlatform } from '../platform';

const linux = identifyPlatform('linux', 'x64');

describe('buildFromSource', () => {
  let projectDir: string;
  let commands: string[];

  const fakeCargo = (options: { testsFail?: boolean; buildFails?: boolean; produce?: boolean }): CommandRunner =>
    (command, runOptions) => {
      commands.push(command);
      assert.strictEqual(runOptions?.cwd, projectDir);
      if (command === 'cargo test --release' && options.testsFail) {
        throw new Error('test result: FAILED. 3 passed; 1 failed');
      }
      if (command === 'cargo build --release') {
        if (options.buildFails) {
          throw new Error('error[E0425]: cannot find value');
        }
        if (options.produce !== false) {
          fs.mkdirSync(path.join(projectDir, 'target', 'release'), { recursive: true });
          fs.writeFileSync(buildOutputPath(projectDir, linux), 'binary', { mode: 0o755 });
        }
      }
      return '';
    };

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdfcat-build-'));
    commands = [];
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it('should run tests then build and return the output path', () => {
    const result = buildFromSource(projectDir, linux, fakeCargo({}));

    assert.deepStrictEqual(result, { kind: 'ok', value: path.join(projectDir, 'target', 'release', 'pdfcat') });
    assert.deepStrictEqual(commands, ['cargo test --release', 'cargo build --release']);
  });

  it('should keep building when tests fail and return a warning', () => {
    const result = buildFromSource(projectDir, linux, fakeCargo({ testsFail: true }));

    assert.strictEqual(result.kind, 'warning');
    assert.strictEqual(result.value, path.join(projectDir, 'target', 'release', 'pdfcat'));
    if (result.kind === 'warning') {
      assert.deepStrictEqual(result.warning, {
        category: 'TestsFailed',
        message: 'Test suite failed: test result: FAILED. 3 passed; 1 failed',
      });
    }
    assert.deepStrictEqual(commands, ['cargo test --release', 'cargo build --release']);
  });

  it('should fail with BuildFailed when cargo build fails', () => {
    assert.throws(
      () => buildFromSource(projectDir, linux, fakeCargo({ buildFails: true })),
      (error: unknown) =>
        error instanceof InstallError &&
        error.category === 'BuildFailed' &&
        error.causeText === 'error[E0425]: cannot find value',
    );
  });

  it('should fail with BuildFailed when the binary is absent afterwards', () => {
    assert.throws(
      () => buildFromSource(projectDir, linux, fakeCargo({ produce: false })),
      (error: unknown) => error instanceof InstallError && error.category === 'BuildFailed',
    );
  });

  it('should expect the .exe suffix on Windows', () => {
    assert.strictEqual(
      buildOutputPath('/src/pdfcat', identifyPlatform('win32', 'x64')),
      path.join('/src/pdfcat', 'target', 'release', 'pdfcat.exe'),
    );
  });
});
