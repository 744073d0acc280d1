/**
 * Service command
 *
 * Registers the kneeboard as a systemd service started at boot.
 */

import { Command } from 'commander';
import type { ServiceRegistration } from '@kneeboard/ipc';
import {
  ServiceRegistrar,
  SystemdServiceManager,
  resolveInvokingUser,
  type RegistrationStep,
  type ServiceManager,
} from '@kneeboard/deploy';
import { createContext, type CliContext, type GlobalOptions } from '../context.js';
import { banner, hint, success, warning } from '../utils/output.js';

function reportStep(step: RegistrationStep): void {
  switch (step.step) {
    case 'written':
      success(`Service file written to ${step.unitPath} (user: ${step.user})`);
      break;
    case 'reloaded':
      if (step.ok) success('Service manager reloaded');
      else warning('Service manager reload failed');
      break;
    case 'enabled':
      if (step.ok) success('Service enabled at boot');
      else warning('Enabling the service failed');
      break;
    case 'started':
      if (!step.ok) warning('Starting the service failed');
      break;
    case 'probed':
      if (step.active) success('Service is running');
      else warning('Service is not running');
      break;
  }
}

export async function runService(ctx: CliContext, deps: { manager?: ServiceManager } = {}): Promise<ServiceRegistration> {
  banner(`${ctx.config.app.displayName} Service Setup`);

  const registrar = new ServiceRegistrar(
    {
      manager: deps.manager ?? new SystemdServiceManager(ctx.runner),
      prompter: ctx.prompter,
      isRoot: ctx.isRoot,
      resolveUser: () => resolveInvokingUser({ runner: ctx.runner, env: ctx.env }),
    },
    {
      installDir: ctx.projectDir,
      entryPoint: ctx.config.app.entryPoint,
      runtime: ctx.config.app.runtime,
      templateFile: ctx.config.service.templateFile,
      serviceName: ctx.config.service.name,
      unitDir: ctx.config.service.unitDir,
    },
  );

  const registration = await registrar.register(reportStep);
  const name = ctx.config.service.name;

  console.log('');
  console.log('Useful commands:');
  console.log(`  ${hint(`sudo systemctl start ${name}`)}    start now`);
  console.log(`  ${hint(`sudo systemctl status ${name}`)}   show status`);
  console.log(`  ${hint(`sudo journalctl -u ${name} -f`)}   follow logs`);
  console.log(`  ${hint(`sudo systemctl disable ${name}`)}  stop starting at boot`);

  return registration;
}

/**
 * Create the service command
 */
export function createServiceCommand(): Command {
  return new Command('service')
    .description('Register the kneeboard as a systemd service (requires root)')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runService(createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}
