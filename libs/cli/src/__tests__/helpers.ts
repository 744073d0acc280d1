/**
 * Test context for command specs
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DeployConfigSchema, type CommandSpec, type DeployConfigInput } from '@kneeboard/ipc';
import type { CommandResult, CommandRunner, HostFacts, Prompter } from '@kneeboard/deploy';
import type { CliContext } from '../context';

export const OK: CommandResult = { ok: true, status: 0, stdout: '', stderr: '' };
export const FAIL: CommandResult = { ok: false, status: 1, stdout: '', stderr: 'failed' };

export interface TestContext extends CliContext {
  lines: string[];
  questions: string[];
}

export interface TestContextOptions {
  config?: DeployConfigInput;
  answers?: boolean[];
  handler?: (line: string, spec: CommandSpec) => CommandResult;
  display?: boolean;
  targetBoard?: boolean;
  root?: boolean;
}

export function makeProjectDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'kneeboard-cli-'));
}

export function createTestContext(projectDir: string, options: TestContextOptions = {}): TestContext {
  const lines: string[] = [];
  const questions: string[] = [];
  const answers = [...(options.answers ?? [])];
  const handler = options.handler ?? (() => OK);

  const runner: CommandRunner = {
    run: async (spec) => {
      const line = [spec.command, ...spec.args].join(' ');
      lines.push(line);
      return handler(line, spec);
    },
    which: async (command) => (command === 'systemctl' ? '/usr/bin/systemctl' : null),
  };

  const prompter: Prompter = {
    confirm: async (question) => {
      questions.push(question);
      return answers.shift() ?? false;
    },
  };

  const files: Record<string, string> =
    options.targetBoard === false ? {} : { '/proc/device-tree/model': 'Raspberry Pi 4 Model B', '/etc/os-release': '' };
  const env: NodeJS.ProcessEnv = options.display === false ? {} : { DISPLAY: ':0' };
  const host: HostFacts = {
    platform: 'linux',
    env,
    readFile: (filePath) => files[filePath] ?? null,
    exists: (filePath) => filePath in files,
    which: (command) => runner.which(command),
  };

  return {
    projectDir,
    config: DeployConfigSchema.parse(options.config ?? {}),
    env,
    runner,
    prompter,
    host,
    isRoot: () => options.root ?? false,
    lines,
    questions,
  };
}
