/**
 * ProcessLauncher tests
 */

import { EventEmitter } from 'node:events';
import { PreconditionError, type LaunchState } from '@kneeboard/ipc';
import { DisplayController } from '../display';
import { ProcessLauncher, buildLaunchCommand, selectLaunchStrategy, type LaunchTarget } from '../launcher';
import type { ManagedProcess, ProcessExit, ProcessSpawner } from '../adapters/types';
import { LAUNCH_EVENT, type LaunchEvent } from '../events';
import { createFakeDisplayManager, profile } from './helpers';

const TARGET: LaunchTarget = {
  interpreter: 'python3',
  entryPoint: '/opt/kneeboard/kneeboard_gui.py',
  cwd: '/opt/kneeboard',
  env: { PATH: '/usr/bin' },
};

interface FakeSpawner extends ProcessSpawner {
  spawned: Array<{ command: string; args: readonly string[]; env: NodeJS.ProcessEnv }>;
  killed: NodeJS.Signals[];
}

/**
 * Spawner whose child exits with `exit`, or with the signal it is killed by.
 * `onWait` runs once the launcher starts waiting on the child.
 */
function createFakeSpawner(options: { exit?: ProcessExit; fail?: Error; onWait?: () => void } = {}): FakeSpawner {
  const spawned: FakeSpawner['spawned'] = [];
  const killed: NodeJS.Signals[] = [];
  return {
    spawned,
    killed,
    spawn(command, args, spawnOptions): ManagedProcess {
      spawned.push({ command, args, env: spawnOptions.env });
      if (options.fail) {
        const failure = options.fail;
        return { wait: () => Promise.reject(failure), kill: () => undefined };
      }
      let settle: (exit: ProcessExit) => void = () => undefined;
      const exited = new Promise<ProcessExit>((resolve) => {
        settle = resolve;
      });
      return {
        pid: 4242,
        wait: () => {
          if (options.exit) {
            settle(options.exit);
          }
          options.onWait?.();
          return exited;
        },
        kill: (signal) => {
          killed.push(signal);
          settle({ code: null, signal });
        },
      };
    },
  };
}

function rotations(manager: ReturnType<typeof createFakeDisplayManager>): unknown[] {
  return manager.calls.filter((c) => c.method === 'rotate').map((c) => c.args[1]);
}

describe('launch command', () => {
  it('selects the strategy from the display session', () => {
    expect(selectLaunchStrategy({ hasDisplaySession: true })).toBe('direct');
    expect(selectLaunchStrategy({ hasDisplaySession: false })).toBe('virtual-framebuffer');
  });

  it('wraps the interpreter in xvfb-run and marks the session headless', () => {
    const command = buildLaunchCommand('virtual-framebuffer', TARGET);

    expect(command.command).toBe('xvfb-run');
    expect(command.args).toEqual(['-a', 'python3', '/opt/kneeboard/kneeboard_gui.py']);
    expect(command.env).toEqual({ PATH: '/usr/bin', HEADLESS: '1' });
  });

  it('runs the interpreter directly with an unchanged environment', () => {
    const command = buildLaunchCommand('direct', TARGET);

    expect(command).toEqual({
      command: 'python3',
      args: ['/opt/kneeboard/kneeboard_gui.py'],
      env: { PATH: '/usr/bin' },
    });
  });
});

describe('ProcessLauncher', () => {
  it('walks the state machine and restores the display after a clean exit', async () => {
    const manager = createFakeDisplayManager();
    const emitter = new EventEmitter();
    const states: LaunchState[] = [];
    emitter.on(LAUNCH_EVENT, (event: LaunchEvent) => {
      if (event.type === 'state') states.push(event.state);
    });
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, profile()),
      spawner: createFakeSpawner({ exit: { code: 0, signal: null } }),
      signals: new EventEmitter(),
      emitter,
    });

    const result = await launcher.launch(profile(), TARGET);

    expect(result).toEqual({ strategy: 'direct', exitCode: 0, signal: null });
    expect(states).toEqual(['display-configured', 'running', 'exited']);
    expect(launcher.state).toBe('exited');
    expect(rotations(manager)).toEqual(['rotated', 'normal']);
  });

  it('propagates a non-zero exit code and still restores once', async () => {
    const manager = createFakeDisplayManager();
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, profile()),
      spawner: createFakeSpawner({ exit: { code: 3, signal: null } }),
      signals: new EventEmitter(),
    });

    const result = await launcher.launch(profile(), TARGET);

    expect(result.exitCode).toBe(3);
    expect(rotations(manager)).toEqual(['rotated', 'normal']);
  });

  it('forwards an interrupt to the child and restores the display', async () => {
    const manager = createFakeDisplayManager();
    const signals = new EventEmitter();
    const spawner = createFakeSpawner({ onWait: () => signals.emit('SIGTERM', 'SIGTERM') });
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, profile()),
      spawner,
      signals,
    });

    const result = await launcher.launch(profile(), TARGET);

    expect(spawner.killed).toEqual(['SIGTERM']);
    expect(result).toEqual({ strategy: 'direct', exitCode: 1, signal: 'SIGTERM' });
    expect(rotations(manager)).toEqual(['rotated', 'normal']);
  });

  it('does not start the app when interrupted while the display is configured', async () => {
    const signals = new EventEmitter();
    const manager = createFakeDisplayManager();
    manager.isAvailable = async () => {
      signals.emit('SIGINT', 'SIGINT');
      return true;
    };
    const spawner = createFakeSpawner({ exit: { code: 0, signal: null } });
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, profile()),
      spawner,
      signals,
    });

    const result = await launcher.launch(profile(), TARGET);

    expect(spawner.spawned).toEqual([]);
    expect(result).toEqual({ strategy: 'direct', exitCode: 1, signal: 'SIGINT' });
    expect(launcher.state).toBe('exited');
    expect(rotations(manager)).toEqual(['rotated', 'normal']);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('removes its signal handlers when the child exits', async () => {
    const signals = new EventEmitter();
    const launcher = new ProcessLauncher({
      display: new DisplayController(createFakeDisplayManager(), profile()),
      spawner: createFakeSpawner({ exit: { code: 0, signal: null } }),
      signals,
    });

    await launcher.launch(profile(), TARGET);

    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
    expect(signals.listenerCount('SIGHUP')).toBe(0);
  });

  it('uses only the virtual framebuffer on a headless host', async () => {
    const manager = createFakeDisplayManager();
    const headless = profile({ hasDisplaySession: false });
    const spawner = createFakeSpawner({ exit: { code: 0, signal: null } });
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, headless),
      spawner,
      signals: new EventEmitter(),
    });

    const result = await launcher.launch(headless, TARGET);

    expect(result.strategy).toBe('virtual-framebuffer');
    expect(spawner.spawned.map((s) => s.command)).toEqual(['xvfb-run']);
    expect(manager.calls).toEqual([]);
  });

  it('reports a spawn failure with a remediation and restores the display', async () => {
    const manager = createFakeDisplayManager();
    const launcher = new ProcessLauncher({
      display: new DisplayController(manager, profile()),
      spawner: createFakeSpawner({ fail: new Error('spawn python3 ENOENT') }),
      signals: new EventEmitter(),
    });

    const result = launcher.launch(profile(), TARGET);

    await expect(result).rejects.toBeInstanceOf(PreconditionError);
    await expect(result).rejects.toMatchObject({
      message: 'Failed to start python3: spawn python3 ENOENT',
      remediation: 'sudo apt install -y python3',
    });
    expect(launcher.state).toBe('exited');
    expect(rotations(manager)).toEqual(['rotated', 'normal']);
  });

  it('launches at most once', async () => {
    const launcher = new ProcessLauncher({
      display: new DisplayController(createFakeDisplayManager(), profile()),
      spawner: createFakeSpawner({ exit: { code: 0, signal: null } }),
      signals: new EventEmitter(),
    });

    await launcher.launch(profile(), TARGET);

    await expect(launcher.launch(profile(), TARGET)).rejects.toThrow('Launcher already used (state: exited)');
  });
});
