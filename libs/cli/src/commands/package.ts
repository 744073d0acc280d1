/**
 * Package command
 *
 * Builds the release archive from the project directory.
 */

import * as path from 'node:path';
import { Command } from 'commander';
import type { PackageResult } from '@kneeboard/ipc';
import { buildPackage } from '@kneeboard/deploy';
import { createContext, type CliContext, type GlobalOptions } from '../context.js';
import { success } from '../utils/output.js';

export interface PackageOptions {
  /** Version overriding the configured one */
  release?: string;
  /** Output directory, defaults to the project directory */
  output?: string;
}

export async function runPackage(ctx: CliContext, options: PackageOptions = {}): Promise<PackageResult> {
  const result = await buildPackage(
    {
      name: ctx.config.app.name,
      version: options.release ?? ctx.config.app.version,
      files: ctx.config.package.files,
    },
    {
      sourceDir: ctx.projectDir,
      outputDir: options.output ? path.resolve(ctx.projectDir, options.output) : ctx.projectDir,
    },
  );

  success(`Created ${result.archivePath} (${result.fileCount} files)`);
  return result;
}

/**
 * Create the package command
 */
export function createPackageCommand(): Command {
  return new Command('package')
    .description('Build the release archive')
    .option('-r, --release <version>', 'Release version (defaults to the configured version)')
    .option('-o, --output <dir>', 'Directory receiving the archive')
    .action(async (options: PackageOptions, command: Command) => {
      await runPackage(createContext(command.optsWithGlobals<GlobalOptions>()), options);
    });
}
