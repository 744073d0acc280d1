/**
 * X11 output rotation via xrandr
 */

import type { Orientation } from '@kneeboard/ipc';
import type { CommandRunner, CommandResult } from '../exec.js';
import type { DisplayManager } from './types.js';

/** Portrait panels are mounted rotated clockwise */
const XRANDR_ROTATION: Record<Orientation, string> = {
  rotated: 'right',
  normal: 'normal',
};

/**
 * Names of outputs listed as " connected" in `xrandr` query output
 */
export function parseConnectedOutputs(query: string): string[] {
  return query
    .split(/\r?\n/)
    .filter((line) => line.includes(' connected'))
    .map((line) => line.split(' ')[0] ?? '')
    .filter((name) => name.length > 0);
}

export class XrandrDisplayManager implements DisplayManager {
  readonly id = 'xrandr';

  constructor(
    private readonly runner: CommandRunner,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async isAvailable(): Promise<boolean> {
    return (await this.runner.which('xrandr')) !== null;
  }

  async connectedOutputs(): Promise<string[]> {
    const result = await this.runner.run({ command: 'xrandr', args: [] }, { env: this.env });
    return result.ok ? parseConnectedOutputs(result.stdout) : [];
  }

  rotate(outputId: string, orientation: Orientation): Promise<CommandResult> {
    return this.runner.run(
      { command: 'xrandr', args: ['--output', outputId, '--rotate', XRANDR_ROTATION[orientation]] },
      { env: this.env },
    );
  }
}
