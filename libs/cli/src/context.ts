/**
 * Per-invocation context shared by every command
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { EventEmitter } from 'node:events';
import { PreconditionError, type DeployConfig, type DeviceProfile } from '@kneeboard/ipc';
import {
  AptPackageManager,
  DependencyProvisioner,
  PipManifestPackageManager,
  createCommandRunner,
  createHostFacts,
  isRootUser,
  probeEnvironment,
  setLogLevel,
  type CommandRunner,
  type HostFacts,
  type Prompter,
} from '@kneeboard/deploy';
import { loadConfig } from './config/loader.js';
import { createTerminalPrompter } from './utils/prompt.js';

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  projectDir?: string;
  verbose?: boolean;
}

export interface CliContext {
  /** Absolute directory holding the kiosk app and its config */
  projectDir: string;
  config: DeployConfig;
  env: NodeJS.ProcessEnv;
  runner: CommandRunner;
  prompter: Prompter;
  host: HostFacts;
  isRoot: () => boolean;
}

export function createContext(options: GlobalOptions): CliContext {
  if (options.verbose) {
    setLogLevel('debug');
  }

  const projectDir = path.resolve(options.projectDir ?? process.cwd());
  const runner = createCommandRunner();

  return {
    projectDir,
    config: loadConfig(projectDir),
    env: process.env,
    runner,
    prompter: createTerminalPrompter(),
    host: createHostFacts(runner),
    isRoot: isRootUser,
  };
}

export function probeHost(ctx: CliContext): Promise<Readonly<DeviceProfile>> {
  const { board } = ctx.config;
  return probeEnvironment(ctx.host, {
    modelPath: board.modelPath,
    osReleasePath: board.osReleasePath,
    marker: board.marker,
  });
}

export function createProvisioner(ctx: CliContext, emitter: EventEmitter): DependencyProvisioner {
  return new DependencyProvisioner(
    ctx.runner,
    {
      linux: new AptPackageManager(ctx.runner),
      windows: new PipManifestPackageManager(ctx.runner, ctx.projectDir),
    },
    emitter,
  );
}

export function entryPointPath(ctx: CliContext): string {
  return path.join(ctx.projectDir, ctx.config.app.entryPoint);
}

/**
 * Absolute entry point, or a PreconditionError naming the directory searched
 */
export function requireEntryPoint(ctx: CliContext): string {
  const entry = entryPointPath(ctx);
  if (!fs.existsSync(entry)) {
    throw new PreconditionError(
      `${ctx.config.app.entryPoint} not found in ${ctx.projectDir}`,
      `kneeboard --project-dir <directory containing ${ctx.config.app.entryPoint}> ...`,
    );
  }
  return entry;
}

/**
 * chmod +x on POSIX hosts
 */
export function makeExecutable(filePath: string, profile: Pick<DeviceProfile, 'osFamily'>): void {
  if (profile.osFamily !== 'linux') return;
  const { mode } = fs.statSync(filePath);
  fs.chmodSync(filePath, mode | 0o111);
}

/**
 * Runtime command for interactive launches
 */
export function interpreterFor(ctx: CliContext, profile: Pick<DeviceProfile, 'osFamily'>): string {
  return profile.osFamily === 'windows' ? 'python' : ctx.config.app.interpreter;
}
