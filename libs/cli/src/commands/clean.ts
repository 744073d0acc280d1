/**
 * Clean command
 *
 * Removes bytecode, logs, editor backups and the toolkit cache.
 */

import { Command } from 'commander';
import { UserDeclinedError, type CleanupReport } from '@kneeboard/ipc';
import { cleanProject, defaultToolkitCacheDir } from '@kneeboard/deploy';
import { createContext, type CliContext, type GlobalOptions } from '../context.js';
import { banner, success, warning } from '../utils/output.js';

export async function runClean(ctx: CliContext): Promise<CleanupReport> {
  banner(`${ctx.config.app.displayName} Cleanup`);

  const proceed = await ctx.prompter.confirm('Are you sure you want to clean up temporary files? (y/n): ');
  if (!proceed) {
    throw new UserDeclinedError('Cleanup cancelled.');
  }

  const report = cleanProject({
    projectDir: ctx.projectDir,
    toolkitCacheDir:
      ctx.config.cleanup.toolkitCacheDir ?? (await defaultToolkitCacheDir({ runner: ctx.runner, env: ctx.env })),
  });

  for (const { path, error } of report.failed) {
    warning(`Could not remove ${path}: ${error}`);
  }
  success(`Cleanup complete (${report.removed.length} removed)`);
  return report;
}

/**
 * Create the clean command
 */
export function createCleanCommand(): Command {
  return new Command('clean')
    .description('Remove temporary and generated files')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runClean(createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}
