/**
 * Release packager
 *
 * Builds `{name}_{version}.zip` whose only top-level directory is
 * `{name}_{version}/`. The archive is complete or absent: files are staged in
 * a scratch directory, the zip is written beside its destination under a
 * temporary name and renamed into place. Scratch and temporary files are
 * removed on every path.
 */

import * as fs from 'node:fs/promises';
import { existsSync, statSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import JSZip from 'jszip';
import {
  PackageNameSchema,
  PreconditionError,
  SemverSchema,
  type PackageManifest,
  type PackageResult,
} from '@kneeboard/ipc';
import { createLogger } from './logger.js';

const log = createLogger('packager');

export interface BuildPackageOptions {
  /** Directory holding the manifest files */
  sourceDir: string;
  /** Directory receiving the archive */
  outputDir: string;
  /** Parent of the staging directory; defaults to the OS temp dir */
  scratchRoot?: string;
}

export function packageRootName(manifest: Pick<PackageManifest, 'name' | 'version'>): string {
  return `${manifest.name}_${manifest.version}`;
}

export function archiveFileName(manifest: Pick<PackageManifest, 'name' | 'version'>): string {
  return `${packageRootName(manifest)}.zip`;
}

function validateManifest(manifest: PackageManifest): void {
  const name = PackageNameSchema.safeParse(manifest.name);
  if (!name.success) {
    throw new PreconditionError(`Invalid package name "${manifest.name}": ${name.error.issues[0]?.message ?? 'invalid'}`);
  }
  const version = SemverSchema.safeParse(manifest.version);
  if (!version.success) {
    throw new PreconditionError(
      `Invalid version "${manifest.version}": ${version.error.issues[0]?.message ?? 'invalid'}`,
      'kneeboard package --release 1.0.0',
    );
  }
  if (manifest.files.length === 0) {
    throw new PreconditionError('Package manifest lists no files');
  }
}

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export async function buildPackage(manifest: PackageManifest, options: BuildPackageOptions): Promise<PackageResult> {
  validateManifest(manifest);

  const sourceDir = path.resolve(options.sourceDir);
  const outputDir = path.resolve(options.outputDir);
  const rootDir = packageRootName(manifest);
  const archivePath = path.join(outputDir, archiveFileName(manifest));

  const missing = manifest.files.filter((file) => !isFile(path.join(sourceDir, file)));
  if (missing.length > 0) {
    throw new PreconditionError(
      `Missing package file${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      `Restore ${missing.join(', ')} in ${sourceDir}, then run: kneeboard package`,
    );
  }
  if (!existsSync(outputDir)) {
    throw new PreconditionError(`Output directory does not exist: ${outputDir}`, `mkdir -p ${outputDir}`);
  }

  const scratch = await fs.mkdtemp(path.join(options.scratchRoot ?? os.tmpdir(), 'kneeboard-package-'));
  const partialPath = path.join(outputDir, `.${archiveFileName(manifest)}.${process.pid}.partial`);

  try {
    const stageDir = path.join(scratch, rootDir);
    await fs.mkdir(stageDir, { recursive: true });

    for (const file of manifest.files) {
      const target = path.join(stageDir, file);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(path.join(sourceDir, file), target);
      const { mode } = await fs.stat(path.join(sourceDir, file));
      await fs.chmod(target, mode & 0o777);
    }

    const zip = new JSZip();
    for (const file of manifest.files) {
      const staged = path.join(stageDir, file);
      const stats = await fs.stat(staged);
      const entryName = path.posix.join(rootDir, file.split(path.sep).join('/'));
      zip.file(entryName, await fs.readFile(staged), {
        date: stats.mtime,
        unixPermissions: stats.mode & 0o777,
      });
    }

    const buffer = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      platform: 'UNIX',
    });

    await fs.writeFile(partialPath, buffer);
    await fs.rename(partialPath, archivePath);
    log.info({ archivePath, files: manifest.files.length }, 'Package created');

    return { archivePath, rootDir, fileCount: manifest.files.length };
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
    await fs.rm(partialPath, { force: true });
  }
}
