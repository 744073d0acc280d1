/**
 * Adapter interfaces for the OS resources the orchestration logic mutates.
 * Production adapters shell out through a CommandRunner; tests substitute
 * recording fakes.
 */

import type { DependencySpec, Orientation } from '@kneeboard/ipc';
import type { CommandResult } from '../exec.js';

/**
 * Installs dependencies one entry at a time (apt and friends)
 */
export interface PerEntryPackageManager {
  readonly strategy: 'per-entry';
  readonly id: string;
  /** Refresh package indexes. Called at most once per provisioning run. */
  prepare(): Promise<CommandResult>;
  install(dependency: DependencySpec): Promise<CommandResult>;
}

/**
 * Installs every missing dependency with a single manifest call
 */
export interface ManifestPackageManager {
  readonly strategy: 'manifest';
  readonly id: string;
  installManifest(): Promise<CommandResult>;
}

export type PackageManager = PerEntryPackageManager | ManifestPackageManager;

export interface ServiceManager {
  readonly id: string;
  reload(): Promise<CommandResult>;
  enable(unit: string): Promise<CommandResult>;
  start(unit: string): Promise<CommandResult>;
  isActive(unit: string): Promise<CommandResult>;
}

export interface DisplayManager {
  readonly id: string;
  /** Whether the rotation tool is installed */
  isAvailable(): Promise<boolean>;
  /** Outputs reporting a "connected" status, in tool order */
  connectedOutputs(): Promise<string[]>;
  rotate(outputId: string, orientation: Orientation): Promise<CommandResult>;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ManagedProcess {
  readonly pid?: number;
  /** Resolves when the child exits; rejects when it could not be started */
  wait(): Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): void;
}

export interface SpawnOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface ProcessSpawner {
  spawn(command: string, args: readonly string[], options: SpawnOptions): ManagedProcess;
}

export type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): void;
  off(signal: NodeJS.Signals, listener: SignalListener): void;
}

export interface Prompter {
  /** True only for the exact affirmative answer */
  confirm(question: string): Promise<boolean>;
}
