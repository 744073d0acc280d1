/**
 * External command execution
 *
 * Every call into the OS (package manager, service manager, display tool)
 * goes through a CommandRunner so orchestration code can be exercised
 * against fakes.
 */

import { spawn } from 'node:child_process';
import type { CommandSpec } from '@kneeboard/ipc';

export interface CommandResult {
  ok: boolean;
  /** Exit status, or null when the process could not be started */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Spawn error message (e.g. ENOENT) */
  error?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

export interface CommandRunner {
  run(spec: CommandSpec, options?: RunOptions): Promise<CommandResult>;
  /** Absolute path of an executable on PATH, or null */
  which(command: string): Promise<string | null>;
}

/**
 * Whether the current process runs as root
 */
export function isRootUser(): boolean {
  return process.getuid?.() === 0;
}

/**
 * Render a command for display or copy-paste. Elevated commands always
 * carry `sudo` so the hint works from an unprivileged shell.
 */
export function formatCommand(spec: CommandSpec): string {
  const parts = [spec.command, ...spec.args].map((p) => (/[\s"'$]/.test(p) ? JSON.stringify(p) : p));
  return spec.elevated ? `sudo ${parts.join(' ')}` : parts.join(' ');
}

function resolveInvocation(spec: CommandSpec, asRoot: boolean): { command: string; args: string[] } {
  if (spec.elevated && !asRoot) {
    return { command: 'sudo', args: [spec.command, ...spec.args] };
  }
  return { command: spec.command, args: [...spec.args] };
}

/**
 * Default runner backed by child_process.spawn
 */
export function createCommandRunner(options: { platform?: NodeJS.Platform; asRoot?: boolean } = {}): CommandRunner {
  const platform = options.platform ?? process.platform;
  const asRoot = options.asRoot ?? isRootUser();

  const run = (spec: CommandSpec, runOptions: RunOptions = {}): Promise<CommandResult> => {
    const { command, args } = resolveInvocation(spec, asRoot);

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';

      const child = spawn(command, args, {
        cwd: runOptions.cwd,
        env: runOptions.env ?? process.env,
        stdio: runOptions.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8');
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8');
      });

      child.once('error', (err) => {
        resolve({ ok: false, status: null, stdout, stderr, error: err.message });
      });
      child.once('close', (code) => {
        resolve({ ok: code === 0, status: code, stdout, stderr });
      });
    });
  };

  return {
    run,
    async which(command: string): Promise<string | null> {
      const lookup = platform === 'win32' ? 'where' : 'which';
      const result = await run({ command: lookup, args: [command] });
      if (!result.ok) return null;
      const first = result.stdout.split(/\r?\n/).find((line) => line.trim().length > 0);
      return first?.trim() ?? null;
    },
  };
}
