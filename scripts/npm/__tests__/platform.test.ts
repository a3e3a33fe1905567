/**
 * Tests for platform.ts
 *
 * Platform tag normalization and the per-OS values derived from it.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InstallError } from '../errors';
import { archiveExtension, assetPattern, executableName, identifyPlatform } from '../platform';

// ============================================================================
// Platform Detection Tests
// ============================================================================

describe('identifyPlatform', () => {
  it('should map Node names to canonical tags', () => {
    assert.strictEqual(identifyPlatform('linux', 'x64').tag, 'linux-x86_64');
    assert.strictEqual(identifyPlatform('linux', 'arm64').tag, 'linux-aarch64');
    assert.strictEqual(identifyPlatform('darwin', 'x64').tag, 'macos-x86_64');
    assert.strictEqual(identifyPlatform('darwin', 'arm64').tag, 'macos-aarch64');
    assert.strictEqual(identifyPlatform('win32', 'x64').tag, 'windows-x86_64');
    assert.strictEqual(identifyPlatform('win32', 'arm64').tag, 'windows-aarch64');
  });

  it('should map uname spellings to the same tags', () => {
    assert.strictEqual(identifyPlatform('Linux', 'x86_64').tag, 'linux-x86_64');
    assert.strictEqual(identifyPlatform('Darwin', 'aarch64').tag, 'macos-aarch64');
    assert.strictEqual(identifyPlatform('MINGW64_NT-10.0-19045', 'x86_64').tag, 'windows-x86_64');
    assert.strictEqual(identifyPlatform('MSYS_NT-10.0', 'x86_64').tag, 'windows-x86_64');
    assert.strictEqual(identifyPlatform('CYGWIN_NT-10.0', 'x86_64').tag, 'windows-x86_64');
    assert.strictEqual(identifyPlatform('Windows_NT', 'AMD64').tag, 'windows-x86_64');
  });

  it('should treat x64, x86_64 and amd64 as one architecture', () => {
    const tags = ['x64', 'x86_64', 'amd64', 'AMD64'].map((arch) => identifyPlatform('linux', arch).tag);
    assert.deepStrictEqual(new Set(tags), new Set(['linux-x86_64']));
  });

  it('should produce distinct tags for every supported pair', () => {
    const tags = ['linux', 'darwin', 'win32'].flatMap((os) =>
      ['x64', 'arm64'].map((arch) => identifyPlatform(os, arch).tag),
    );
    assert.strictEqual(new Set(tags).size, 6);
  });

  it('should return a frozen value', () => {
    const platform = identifyPlatform('linux', 'x64');
    assert.deepStrictEqual(platform, { os: 'linux', arch: 'x86_64', tag: 'linux-x86_64' });
    assert.ok(Object.isFrozen(platform));
  });

  it('should reject unsupported operating systems', () => {
    assert.throws(
      () => identifyPlatform('freebsd', 'x64'),
      (error: unknown) =>
        error instanceof InstallError &&
        error.category === 'UnsupportedPlatform' &&
        error.message === 'Unsupported operating system: freebsd',
    );
  });

  it('should reject unsupported architectures', () => {
    assert.throws(
      () => identifyPlatform('linux', 'ia32'),
      (error: unknown) =>
        error instanceof InstallError &&
        error.category === 'UnsupportedPlatform' &&
        error.message === 'Unsupported architecture: ia32',
    );
  });
});

// ============================================================================
// Derived Values
// ============================================================================

describe('Per-OS values', () => {
  it('should use zip and .exe on Windows only', () => {
    const windows = identifyPlatform('win32', 'x64');
    const linux = identifyPlatform('linux', 'x64');
    const macos = identifyPlatform('darwin', 'arm64');

    assert.strictEqual(archiveExtension(windows), '.zip');
    assert.strictEqual(archiveExtension(linux), '.tar.gz');
    assert.strictEqual(archiveExtension(macos), '.tar.gz');

    assert.strictEqual(executableName(windows), 'pdfcat.exe');
    assert.strictEqual(executableName(linux), 'pdfcat');
  });

  it('should build the asset pattern from tag and extension', () => {
    assert.strictEqual(assetPattern(identifyPlatform('linux', 'x64')), 'pdfcat-*-linux-x86_64.tar.gz');
    assert.strictEqual(assetPattern(identifyPlatform('win32', 'x64')), 'pdfcat-*-windows-x86_64.zip');
  });
});
