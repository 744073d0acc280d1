/**
 * systemd service manager via systemctl
 */

import type { CommandRunner, CommandResult } from '../exec.js';
import type { ServiceManager } from './types.js';

export class SystemdServiceManager implements ServiceManager {
  readonly id = 'systemd';

  constructor(private readonly runner: CommandRunner) {}

  reload(): Promise<CommandResult> {
    return this.systemctl('daemon-reload');
  }

  enable(unit: string): Promise<CommandResult> {
    return this.systemctl('enable', unit);
  }

  start(unit: string): Promise<CommandResult> {
    return this.systemctl('start', unit);
  }

  isActive(unit: string): Promise<CommandResult> {
    return this.systemctl('is-active', '--quiet', unit);
  }

  private systemctl(...args: string[]): Promise<CommandResult> {
    return this.runner.run({ command: 'systemctl', args, elevated: true });
  }
}
