/**
 * apt-based package manager (Debian / Raspberry Pi OS)
 */

import type { DependencySpec } from '@kneeboard/ipc';
import type { CommandRunner, CommandResult } from '../exec.js';
import type { PerEntryPackageManager } from './types.js';

export class AptPackageManager implements PerEntryPackageManager {
  readonly strategy = 'per-entry' as const;
  readonly id = 'apt';

  constructor(private readonly runner: CommandRunner) {}

  prepare(): Promise<CommandResult> {
    return this.runner.run({ command: 'apt', args: ['update'], elevated: true }, { inherit: true });
  }

  /** Runs the entry's own install command; apt and pip install verbs are idempotent */
  install(dependency: DependencySpec): Promise<CommandResult> {
    return this.runner.run(dependency.install, { inherit: true });
  }
}
