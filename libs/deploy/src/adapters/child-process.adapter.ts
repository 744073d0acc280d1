/**
 * Foreground child process spawning and process signal wiring
 */

import { spawn } from 'node:child_process';
import type { ManagedProcess, ProcessExit, ProcessSpawner, SignalListener, SignalSource, SpawnOptions } from './types.js';

export class ChildProcessSpawner implements ProcessSpawner {
  spawn(command: string, args: readonly string[], options: SpawnOptions): ManagedProcess {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: 'inherit',
    });

    // Created eagerly so a spawn error emitted before wait() is not lost
    const exited = new Promise<ProcessExit>((resolve, reject) => {
      child.once('error', reject);
      child.once('exit', (code, signal) => resolve({ code, signal }));
    });

    return {
      pid: child.pid,
      wait: () => exited,
      kill: (signal) => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill(signal);
        }
      },
    };
  }
}

/**
 * Signals delivered to this process
 */
export const processSignals: SignalSource = {
  on(signal: NodeJS.Signals, listener: SignalListener): void {
    process.on(signal, listener);
  },
  off(signal: NodeJS.Signals, listener: SignalListener): void {
    process.off(signal, listener);
  },
};
