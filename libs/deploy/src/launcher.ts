/**
 * Process launcher
 *
 * idle → display-configured → running → exited
 *
 * The kiosk app runs in the foreground; its exit is the one blocking wait.
 * Signal handlers and the display restore are in place before that wait
 * begins, so an interrupt still restores the panel. Crashes are reported,
 * not retried.
 */

import type { EventEmitter } from 'node:events';
import {
  HEADLESS_ENV,
  PreconditionError,
  type DeviceProfile,
  type LaunchResult,
  type LaunchState,
  type LaunchStrategy,
} from '@kneeboard/ipc';
import type { DisplayController } from './display.js';
import type { ManagedProcess, ProcessSpawner, SignalListener, SignalSource } from './adapters/types.js';
import { processSignals } from './adapters/child-process.adapter.js';
import { LAUNCH_EVENT, type LaunchEvent } from './events.js';
import { createLogger } from './logger.js';

const log = createLogger('launcher');

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Virtual framebuffer wrapper; `-a` picks a free server number */
const XVFB_RUN = 'xvfb-run';

export interface LaunchTarget {
  /** Interpreter command, e.g. `python3` */
  interpreter: string;
  /** Absolute path of the kiosk app entry point */
  entryPoint: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface LaunchCommand {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

export function selectLaunchStrategy(profile: Pick<DeviceProfile, 'hasDisplaySession'>): LaunchStrategy {
  return profile.hasDisplaySession ? 'direct' : 'virtual-framebuffer';
}

export function buildLaunchCommand(strategy: LaunchStrategy, target: LaunchTarget): LaunchCommand {
  const env: NodeJS.ProcessEnv = { ...(target.env ?? process.env) };

  if (strategy === 'virtual-framebuffer') {
    env[HEADLESS_ENV] = '1';
    return { command: XVFB_RUN, args: ['-a', target.interpreter, target.entryPoint], env };
  }
  return { command: target.interpreter, args: [target.entryPoint], env };
}

export interface ProcessLauncherDeps {
  display: DisplayController;
  spawner: ProcessSpawner;
  signals?: SignalSource;
  emitter?: EventEmitter | null;
}

export class ProcessLauncher {
  private readonly display: DisplayController;
  private readonly spawner: ProcessSpawner;
  private readonly signals: SignalSource;
  private readonly emitter: EventEmitter | null;
  private currentState: LaunchState = 'idle';

  constructor(deps: ProcessLauncherDeps) {
    this.display = deps.display;
    this.spawner = deps.spawner;
    this.signals = deps.signals ?? processSignals;
    this.emitter = deps.emitter ?? null;
  }

  get state(): LaunchState {
    return this.currentState;
  }

  private emit(event: LaunchEvent): void {
    this.emitter?.emit(LAUNCH_EVENT, event);
  }

  private transition(next: LaunchState): void {
    this.currentState = next;
    this.emit({ type: 'state', state: next });
  }

  async launch(profile: Readonly<DeviceProfile>, target: LaunchTarget): Promise<LaunchResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`Launcher already used (state: ${this.currentState})`);
    }

    const strategy = selectLaunchStrategy(profile);
    const { command, args, env } = buildLaunchCommand(strategy, target);

    let child: ManagedProcess | null = null;
    // Signal received before the child exists
    const pending: { signal: NodeJS.Signals | null } = { signal: null };
    const forward: SignalListener = (signal) => {
      this.emit({ type: 'signal', signal });
      if (child) {
        log.info({ signal }, 'Forwarding signal to kiosk app');
        child.kill(signal);
      } else {
        log.info({ signal }, 'Interrupted before launch');
        pending.signal = signal;
      }
    };
    for (const signal of FORWARDED_SIGNALS) {
      this.signals.on(signal, forward);
    }

    const configured = profile.hasDisplaySession;

    try {
      if (configured) {
        await this.display.configure();
      }
      this.transition('display-configured');

      if (pending.signal !== null) {
        this.transition('exited');
        return { strategy, exitCode: 1, signal: pending.signal };
      }

      try {
        child = this.spawner.spawn(command, args, { cwd: target.cwd, env });
        this.transition('running');
        this.emit({ type: 'spawned', strategy, command, args });

        const exit = await child.wait();
        this.transition('exited');

        const exitCode = exit.code ?? 1;
        if (exitCode !== 0) {
          log.warn({ exitCode, signal: exit.signal }, 'Kiosk app exited abnormally');
        }
        return { strategy, exitCode, signal: exit.signal };
      } catch (err) {
        this.transition('exited');
        const message = err instanceof Error ? err.message : String(err);
        throw new PreconditionError(
          `Failed to start ${command}: ${message}`,
          strategy === 'virtual-framebuffer'
            ? 'sudo apt install -y xvfb x11-xserver-utils'
            : `sudo apt install -y ${target.interpreter}`,
        );
      }
    } finally {
      for (const signal of FORWARDED_SIGNALS) {
        this.signals.off(signal, forward);
      }
      if (configured) {
        await this.display.restore();
      }
    }
  }
}
