/**
 * Install command
 *
 * Provisions everything the kiosk app needs to build and run on this host,
 * then optionally registers a desktop autostart entry.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { EventEmitter } from 'node:events';
import { Command } from 'commander';
import type { AutostartEntry, DeviceProfile, ProvisionReport } from '@kneeboard/ipc';
import { confirmTargetBoard, installDependencies, invokingUserHome, writeAutostartEntry } from '@kneeboard/deploy';
import { createContext, createProvisioner, entryPointPath, makeExecutable, probeHost, type CliContext, type GlobalOptions } from '../context.js';
import { banner, hint, printWarnings, reportProvisioning, success, warning } from '../utils/output.js';

export interface InstallSummary {
  profile: Readonly<DeviceProfile>;
  report: ProvisionReport;
  autostart: AutostartEntry | null;
}

async function offerAutostart(ctx: CliContext, profile: Readonly<DeviceProfile>, entry: string): Promise<AutostartEntry | null> {
  if (profile.osFamily !== 'linux' || !profile.hasDisplaySession) {
    return null;
  }

  const wanted = await ctx.prompter.confirm(
    `Would you like ${ctx.config.app.displayName} to start automatically at login? (y/n): `,
  );
  if (!wanted) return null;

  const dir = ctx.config.autostart.dir ?? path.join(await invokingUserHome({ runner: ctx.runner, env: ctx.env }), '.config', 'autostart');
  const created = writeAutostartEntry({
    dir,
    exec: `${ctx.config.app.interpreter} ${entry}`,
    fileName: ctx.config.autostart.fileName,
    name: ctx.config.app.displayName,
  });
  success(`Autostart entry written to ${created.path}`);
  return created;
}

export async function runInstall(ctx: CliContext): Promise<InstallSummary> {
  banner(`${ctx.config.app.displayName} Installation`);

  const profile = await probeHost(ctx);
  if (!profile.isTargetBoard) {
    warning(`This does not appear to be a ${ctx.config.board.marker}.`);
  }
  await confirmTargetBoard(profile, ctx.prompter, 'Continue with installation anyway?');

  const emitter = new EventEmitter();
  reportProvisioning(emitter);
  const report = await createProvisioner(ctx, emitter).provision(installDependencies(profile), profile);
  printWarnings(report);

  const entry = entryPointPath(ctx);
  if (fs.existsSync(entry)) {
    makeExecutable(entry, profile);
  } else {
    warning(`${ctx.config.app.entryPoint} not found in ${ctx.projectDir}`);
  }

  console.log('');
  success('Installation complete');
  console.log(`Start the kneeboard with: ${hint('kneeboard run')}`);
  if (profile.serviceManager === 'systemd') {
    console.log(`Start it at boot with:    ${hint('sudo kneeboard service')}`);
  }
  console.log('');

  const autostart = await offerAutostart(ctx, profile, entry);
  return { profile, report, autostart };
}

/**
 * Create the install command
 */
export function createInstallCommand(): Command {
  return new Command('install')
    .description('Install the kneeboard and its dependencies on this host')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runInstall(createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}
