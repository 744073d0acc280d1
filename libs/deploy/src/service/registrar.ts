/**
 * Service registrar
 *
 * Renders the shipped unit template for this install, writes it into the
 * service manager's configuration directory and enables it for boot.
 * Re-running overwrites the unit in place.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ENTRY_POINT,
  PreconditionError,
  RUNTIME_PATH,
  SERVICE_NAME,
  SERVICE_TEMPLATE_FILE,
  SYSTEMD_UNIT_DIR,
  type ServiceDescriptor,
  type ServiceRegistration,
} from '@kneeboard/ipc';
import type { Prompter, ServiceManager } from '../adapters/types.js';
import { ServiceTemplate } from './template.js';
import { createLogger } from '../logger.js';

const log = createLogger('service');

export interface ServiceRegistrarOptions {
  /** Absolute install directory containing the entry point and template */
  installDir: string;
  entryPoint?: string;
  runtime?: string;
  templateFile?: string;
  serviceName?: string;
  unitDir?: string;
}

export interface ServiceRegistrarDeps {
  manager: ServiceManager;
  prompter: Prompter;
  isRoot: () => boolean;
  resolveUser: () => Promise<string>;
}

export type RegistrationStep =
  | { step: 'written'; unitPath: string; user: string }
  | { step: 'reloaded'; ok: boolean }
  | { step: 'enabled'; ok: boolean }
  | { step: 'started'; ok: boolean }
  | { step: 'probed'; active: boolean };

export function buildServiceDescriptor(input: {
  runtime: string;
  entryPoint: string;
  installDir: string;
  user: string;
}): ServiceDescriptor {
  return {
    execPath: `${input.runtime} ${input.entryPoint}`,
    workingDirectory: input.installDir,
    runAsUser: input.user,
    autostart: true,
  };
}

export class ServiceRegistrar {
  private readonly deps: ServiceRegistrarDeps;
  private readonly installDir: string;
  private readonly entryPoint: string;
  private readonly runtime: string;
  private readonly templateFile: string;
  private readonly serviceName: string;
  private readonly unitDir: string;

  constructor(deps: ServiceRegistrarDeps, options: ServiceRegistrarOptions) {
    this.deps = deps;
    this.installDir = path.resolve(options.installDir);
    this.entryPoint = options.entryPoint ?? ENTRY_POINT;
    this.runtime = options.runtime ?? RUNTIME_PATH;
    this.templateFile = options.templateFile ?? SERVICE_TEMPLATE_FILE;
    this.serviceName = options.serviceName ?? SERVICE_NAME;
    this.unitDir = options.unitDir ?? SYSTEMD_UNIT_DIR;
  }

  get unitName(): string {
    return `${this.serviceName}.service`;
  }

  get unitPath(): string {
    return path.join(this.unitDir, this.unitName);
  }

  async register(onStep?: (step: RegistrationStep) => void): Promise<ServiceRegistration> {
    if (!this.deps.isRoot()) {
      throw new PreconditionError('Service setup requires root privileges.', 'sudo kneeboard service');
    }

    const entryPath = path.join(this.installDir, this.entryPoint);
    const templatePath = path.join(this.installDir, this.templateFile);
    for (const required of [entryPath, templatePath]) {
      if (!fs.existsSync(required)) {
        throw new PreconditionError(
          `${path.basename(required)} not found in ${this.installDir}`,
          `cd <directory containing ${this.entryPoint}> && sudo kneeboard service`,
        );
      }
    }

    const template = ServiceTemplate.parse(fs.readFileSync(templatePath, 'utf-8'), this.templateFile);
    const user = await this.deps.resolveUser();
    const descriptor = buildServiceDescriptor({
      runtime: this.runtime,
      entryPoint: entryPath,
      installDir: this.installDir,
      user,
    });

    fs.mkdirSync(this.unitDir, { recursive: true });
    fs.writeFileSync(this.unitPath, template.render(descriptor), { mode: 0o644 });
    fs.chmodSync(this.unitPath, 0o644);
    log.info({ unitPath: this.unitPath, user }, 'Service descriptor written');
    onStep?.({ step: 'written', unitPath: this.unitPath, user });

    const { manager } = this.deps;
    const reloaded = await manager.reload();
    if (!reloaded.ok) log.warn({ manager: manager.id, stderr: reloaded.stderr.trim() }, 'Service manager reload failed');
    onStep?.({ step: 'reloaded', ok: reloaded.ok });

    const enabled = await manager.enable(this.unitName);
    if (!enabled.ok) log.warn({ unit: this.unitName, stderr: enabled.stderr.trim() }, 'Enabling service failed');
    onStep?.({ step: 'enabled', ok: enabled.ok });

    const startNow = await this.deps.prompter.confirm(`Do you want to start the ${this.serviceName} service now? (y/n): `);
    if (!startNow) {
      return { descriptor, unitPath: this.unitPath, started: false };
    }

    const started = await manager.start(this.unitName);
    onStep?.({ step: 'started', ok: started.ok });
    if (!started.ok) {
      log.warn({ unit: this.unitName, stderr: started.stderr.trim() }, 'Starting service failed');
    }

    const probe = await manager.isActive(this.unitName);
    if (probe.error) {
      log.warn({ unit: this.unitName, kind: 'failed', error: probe.error }, 'Service state probe failed');
      return { descriptor, unitPath: this.unitPath, started: true };
    }
    onStep?.({ step: 'probed', active: probe.ok });
    return { descriptor, unitPath: this.unitPath, started: true, active: probe.ok };
  }
}
