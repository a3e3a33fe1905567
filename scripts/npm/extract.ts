/**
 * extract.ts
 *
 * Archive extraction for release assets: `.tar.gz` through `tar`, `.zip`
 * through `yauzl`. Unix permission bits are kept in both formats.
 */

import fs from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as tar from 'tar';
import yauzl from 'yauzl';

export async function extractTarGz(archivePath: string, destDir: string): Promise<void> {
  await fs.promises.mkdir(destDir, { recursive: true });
  await tar.x({
    file: archivePath,
    cwd: destDir,
    strip: 0, // Keep directory structure from archive
  });
}

function openZip(archivePath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Could not open ${archivePath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, readStream) => {
      if (err || !readStream) {
        reject(err ?? new Error(`Could not read ${entry.fileName}`));
        return;
      }
      resolve(readStream);
    });
  });
}

async function writeZipEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry, destDir: string): Promise<void> {
  const entryPath = path.resolve(destDir, entry.fileName);

  if (entryPath !== destDir && !entryPath.startsWith(destDir + path.sep)) {
    throw new Error(`Path traversal detected in archive: ${entry.fileName}`);
  }

  if (entry.fileName.endsWith('/')) {
    await fs.promises.mkdir(entryPath, { recursive: true });
    return;
  }

  await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
  const readStream = await openEntryStream(zipfile, entry);
  await pipeline(readStream, fs.createWriteStream(entryPath));

  // Unix mode lives in the upper 16 bits of the external attributes
  const mode = (entry.externalFileAttributes >>> 16) & 0o777;
  if (mode !== 0) {
    await fs.promises.chmod(entryPath, mode);
  }
}

export async function extractZip(archivePath: string, destDir: string): Promise<void> {
  const root = path.resolve(destDir);
  await fs.promises.mkdir(root, { recursive: true });
  const zipfile = await openZip(archivePath);

  await new Promise<void>((resolve, reject) => {
    const fail = (error: unknown): void => {
      zipfile.close();
      reject(error);
    };

    zipfile.on('entry', (entry: yauzl.Entry) => {
      writeZipEntry(zipfile, entry, root).then(() => zipfile.readEntry(), fail);
    });
    zipfile.on('end', () => resolve());
    zipfile.on('error', fail);
    zipfile.readEntry();
  });
}

export async function extractArchive(archivePath: string, destDir: string): Promise<void> {
  const lowerPath = archivePath.toLowerCase();

  if (lowerPath.endsWith('.tar.gz') || lowerPath.endsWith('.tgz')) {
    return extractTarGz(archivePath, destDir);
  }

  if (lowerPath.endsWith('.zip')) {
    return extractZip(archivePath, destDir);
  }

  throw new Error(`Unsupported archive format: ${path.basename(archivePath)}`);
}
