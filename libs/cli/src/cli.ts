#!/usr/bin/env node
/**
 * Kneeboard CLI
 *
 * Installs, runs, registers and packages the pilot kneeboard kiosk app.
 *
 * @example
 * ```bash
 * # Install dependencies on a fresh board
 * kneeboard install
 *
 * # Run in the foreground with the display rotated
 * kneeboard run
 *
 * # Start at boot (requires root)
 * sudo kneeboard service
 *
 * # Build pilot_kneeboard_1.1.0.zip
 * kneeboard package --release 1.1.0
 * ```
 */

import { Command } from 'commander';
import { APP_VERSION, UserDeclinedError, exitCodeFor } from '@kneeboard/ipc';
import { describePrivileges, detectPrivileges } from './utils/privileges.js';
import { printError } from './utils/output.js';
import {
  createInstallCommand,
  createRunCommand,
  createServiceCommand,
  createPackageCommand,
  createCleanCommand,
  createDoctorCommand,
} from './commands/index.js';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('kneeboard')
    .description('Pilot Kneeboard - deployment and kiosk launcher')
    .version(APP_VERSION, '-V, --version', 'Output the version number')
    .option('-C, --project-dir <dir>', 'Directory containing the kneeboard app', process.cwd())
    .option('--verbose', 'Log debug output to stderr')
    .addHelpText(
      'after',
      () => `
${describePrivileges(detectPrivileges())}

Examples:
  $ kneeboard install               Install dependencies
  $ kneeboard run                   Run the kneeboard
  $ sudo kneeboard service          Start the kneeboard at boot
  $ kneeboard package -r 1.1.0      Build the release archive
  $ kneeboard clean                 Remove temporary files
  $ kneeboard doctor                Check the host
`,
    );

  // Register commands
  program.addCommand(createInstallCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createServiceCommand());
  program.addCommand(createPackageCommand());
  program.addCommand(createCleanCommand());
  program.addCommand(createDoctorCommand());

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof UserDeclinedError) {
      console.log(err.message);
    } else {
      printError(err);
    }
    process.exitCode = exitCodeFor(err);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
