/**
 * Manifest-based installer used on Windows: one `pip install -r` call
 * covers every missing entry.
 */

import * as path from 'node:path';
import { REQUIREMENTS_FILE, type CommandSpec } from '@kneeboard/ipc';
import type { CommandRunner, CommandResult } from '../exec.js';
import type { ManifestPackageManager } from './types.js';

export function manifestInstallCommand(projectDir: string, python = 'python'): CommandSpec {
  return {
    command: python,
    args: ['-m', 'pip', 'install', '-r', path.join(projectDir, REQUIREMENTS_FILE)],
  };
}

export class PipManifestPackageManager implements ManifestPackageManager {
  readonly strategy = 'manifest' as const;
  readonly id = 'pip-manifest';

  constructor(
    private readonly runner: CommandRunner,
    private readonly projectDir: string,
    private readonly python = 'python',
  ) {}

  installManifest(): Promise<CommandResult> {
    return this.runner.run(manifestInstallCommand(this.projectDir, this.python), {
      cwd: this.projectDir,
      inherit: true,
    });
  }
}
