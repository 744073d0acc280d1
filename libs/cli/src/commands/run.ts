/**
 * Run command
 *
 * Ensures runtime dependencies, rotates the display and runs the kiosk app
 * in the foreground. Exits with the app's status.
 */

import { EventEmitter } from 'node:events';
import { Command } from 'commander';
import type { LaunchResult } from '@kneeboard/ipc';
import {
  ChildProcessSpawner,
  DisplayController,
  ProcessLauncher,
  XrandrDisplayManager,
  confirmTargetBoard,
  runDependencies,
  type DisplayManager,
  type ProcessSpawner,
  type SignalSource,
} from '@kneeboard/deploy';
import {
  createContext,
  createProvisioner,
  interpreterFor,
  makeExecutable,
  probeHost,
  requireEntryPoint,
  type CliContext,
  type GlobalOptions,
} from '../context.js';
import { banner, printWarnings, reportProvisioning, warning } from '../utils/output.js';

export interface RunDeps {
  display?: DisplayManager;
  spawner?: ProcessSpawner;
  signals?: SignalSource;
}

export async function runKiosk(ctx: CliContext, deps: RunDeps = {}): Promise<LaunchResult> {
  banner(`Starting ${ctx.config.app.displayName}`);

  const profile = await probeHost(ctx);
  if (!profile.isTargetBoard) {
    warning(`This does not appear to be a ${ctx.config.board.marker}.`);
  }
  await confirmTargetBoard(profile, ctx.prompter);

  const emitter = new EventEmitter();
  reportProvisioning(emitter);
  const report = await createProvisioner(ctx, emitter).provision(runDependencies(profile), profile);
  printWarnings(report);

  const entry = requireEntryPoint(ctx);
  makeExecutable(entry, profile);

  if (!profile.hasDisplaySession) {
    console.log('No display session found; using a virtual framebuffer.');
  }

  const display = new DisplayController(deps.display ?? new XrandrDisplayManager(ctx.runner, ctx.env), profile, {
    boardOutput: ctx.config.board.output,
  });
  const launcher = new ProcessLauncher({
    display,
    spawner: deps.spawner ?? new ChildProcessSpawner(),
    signals: deps.signals,
  });

  return launcher.launch(profile, {
    interpreter: interpreterFor(ctx, profile),
    entryPoint: entry,
    cwd: ctx.projectDir,
    env: ctx.env,
  });
}

/**
 * Create the run command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run the kneeboard in the foreground')
    .action(async (_options: Record<string, never>, command: Command) => {
      const result = await runKiosk(createContext(command.optsWithGlobals<GlobalOptions>()));
      process.exitCode = result.exitCode;
    });
}
