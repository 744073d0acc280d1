/**
 * Recording fakes shared by the deploy specs
 */

import type { CommandSpec, DeviceProfile, Orientation } from '@kneeboard/ipc';
import type { CommandResult, CommandRunner, RunOptions } from '../exec';
import type { DisplayManager, Prompter } from '../adapters/types';

export const OK: CommandResult = { ok: true, status: 0, stdout: '', stderr: '' };
export const FAIL: CommandResult = { ok: false, status: 1, stdout: '', stderr: 'failed' };

export function commandLine(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

export type FakeRunner = CommandRunner & {
  calls: Array<{ line: string; spec: CommandSpec; options?: RunOptions }>;
};

/**
 * Runner answering from a handler keyed by the rendered command line
 */
export function createFakeRunner(
  handler: (line: string, spec: CommandSpec) => CommandResult = () => OK,
  paths: Record<string, string> = {},
): FakeRunner {
  const calls: FakeRunner['calls'] = [];
  return {
    calls,
    run: async (spec, options) => {
      const line = commandLine(spec);
      calls.push({ line, spec, options });
      return handler(line, spec);
    },
    which: async (command) => paths[command] ?? null,
  };
}

export function profile(overrides: Partial<DeviceProfile> = {}): DeviceProfile {
  return {
    osFamily: 'linux',
    isTargetBoard: true,
    hasDisplaySession: true,
    serviceManager: 'systemd',
    ...overrides,
  };
}

export function createPrompter(answers: boolean[]): Prompter & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    confirm: async (question) => {
      questions.push(question);
      return answers.shift() ?? false;
    },
  };
}

export type FakeDisplayManager = DisplayManager & {
  calls: Array<{ method: string; args: unknown[] }>;
};

export function createFakeDisplayManager(options: {
  available?: boolean;
  outputs?: string[];
  rotatable?: (outputId: string, orientation: Orientation) => boolean;
} = {}): FakeDisplayManager {
  const calls: FakeDisplayManager['calls'] = [];
  return {
    id: 'fake-display',
    calls,
    isAvailable: async () => {
      calls.push({ method: 'isAvailable', args: [] });
      return options.available ?? true;
    },
    connectedOutputs: async () => {
      calls.push({ method: 'connectedOutputs', args: [] });
      return options.outputs ?? [];
    },
    rotate: async (outputId, orientation) => {
      calls.push({ method: 'rotate', args: [outputId, orientation] });
      return (options.rotatable ?? (() => true))(outputId, orientation) ? OK : FAIL;
    },
  };
}
