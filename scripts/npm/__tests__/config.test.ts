/**
 * Tests for config.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { loadConfig, type HostFacts } from '../config';
import { InstallError } from '../errors';

const host: HostFacts = {
  platform: 'linux',
  arch: 'x64',
  cwd: '/work',
  tmpDir: '/tmp',
  homeDir: '/home/fallback',
};

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({}, host);

    assert.strictEqual(config.version, 'latest');
    assert.strictEqual(config.installDirOverride, undefined);
    assert.strictEqual(config.forceSourceBuild, false);
    assert.strictEqual(config.repository, 'pdfcat/pdfcat');
    assert.strictEqual(config.token, undefined);
    assert.strictEqual(config.homeDir, '/home/fallback');
    assert.strictEqual(config.localAppData, path.join('/home/fallback', 'AppData', 'Local'));
    assert.strictEqual(config.pathValue, '');
    assert.strictEqual(config.rawOs, 'linux');
    assert.strictEqual(config.rawArch, 'x64');
    assert.strictEqual(config.cwd, '/work');
    assert.strictEqual(config.tmpDir, '/tmp');
  });

  it('should read the recognized variables', () => {
    const config = loadConfig(
      {
        PDFCAT_VERSION: 'v1.2.0',
        PDFCAT_INSTALL_DIR: '/opt/pdfcat/bin',
        PDFCAT_BUILD_FROM_SOURCE: 'true',
        PDFCAT_REPOSITORY: 'someone/pdfcat-fork',
        GITHUB_TOKEN: 'test-secret',
        HOME: '/home/alex',
        SHELL: '/bin/zsh',
        PATH: '/usr/bin:/bin',
      },
      host,
    );

    assert.strictEqual(config.version, 'v1.2.0');
    assert.strictEqual(config.installDirOverride, '/opt/pdfcat/bin');
    assert.strictEqual(config.forceSourceBuild, true);
    assert.strictEqual(config.repository, 'someone/pdfcat-fork');
    assert.strictEqual(config.token, 'test-secret');
    assert.strictEqual(config.homeDir, '/home/alex');
    assert.strictEqual(config.shell, '/bin/zsh');
    assert.strictEqual(config.pathValue, '/usr/bin:/bin');
  });

  it('should fall back to GH_TOKEN and ignore blank values', () => {
    const config = loadConfig({ GITHUB_TOKEN: '  ', GH_TOKEN: 'test-token', PDFCAT_VERSION: '' }, host);
    assert.strictEqual(config.token, 'test-token');
    assert.strictEqual(config.version, 'latest');
  });

  it('should read the Windows spelling of Path', () => {
    const config = loadConfig({ Path: 'C:\\Windows;C:\\Tools', USERPROFILE: 'C:\\Users\\alex' }, host);
    assert.strictEqual(config.pathValue, 'C:\\Windows;C:\\Tools');
    assert.strictEqual(config.homeDir, 'C:\\Users\\alex');
  });

  it('should reject a malformed repository identity', () => {
    assert.throws(
      () => loadConfig({ PDFCAT_REPOSITORY: 'not a repo' }, host),
      (error: unknown) => error instanceof InstallError && error.category === 'InvalidConfiguration',
    );
  });

  it('should reject a build flag that is not a boolean', () => {
    assert.throws(
      () => loadConfig({ PDFCAT_BUILD_FROM_SOURCE: 'yes' }, host),
      (error: unknown) =>
        error instanceof InstallError &&
        error.category === 'InvalidConfiguration' &&
        error.stage === 'configuration' &&
        error.message.includes('PDFCAT_BUILD_FROM_SOURCE'),
    );
  });
});
