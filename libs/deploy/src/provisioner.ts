/**
 * Dependency provisioner
 *
 * Ensures every entry of a DependencySet passes its check. A failing entry
 * gets one install attempt and exactly one re-check. Nothing is ever
 * uninstalled or pinned, so a second run over a satisfied set issues no
 * install commands at all.
 */

import type { EventEmitter } from 'node:events';
import {
  DependencyError,
  PreconditionError,
  type DependencySet,
  type DependencySpec,
  type DeviceProfile,
  type OsFamily,
  type ProvisionReport,
} from '@kneeboard/ipc';
import { formatCommand, type CommandResult, type CommandRunner } from './exec.js';
import type { ManifestPackageManager, PackageManager, PerEntryPackageManager } from './adapters/types.js';
import { PROVISION_EVENT, type ProvisionEvent } from './events.js';
import { createLogger } from './logger.js';

const log = createLogger('provisioner');

function describeFailure(result: CommandResult): string {
  return result.error ?? (result.stderr.trim() || `exit status ${result.status ?? 'unknown'}`);
}

/**
 * Copy-pasteable fix for an unmet entry
 */
export function dependencyRemediation(dependency: DependencySpec): string {
  return dependency.remediation ?? formatCommand(dependency.install);
}

export class DependencyProvisioner {
  private readonly runner: CommandRunner;
  private readonly managers: Partial<Record<OsFamily, PackageManager>>;
  private readonly emitter: EventEmitter | null;

  constructor(runner: CommandRunner, managers: Partial<Record<OsFamily, PackageManager>>, emitter?: EventEmitter | null) {
    this.runner = runner;
    this.managers = managers;
    this.emitter = emitter ?? null;
  }

  private emit(event: ProvisionEvent): void {
    this.emitter?.emit(PROVISION_EVENT, event);
  }

  private async check(dependency: DependencySpec): Promise<boolean> {
    const result = await this.runner.run(dependency.check);
    return result.ok;
  }

  async provision(set: DependencySet, profile: Readonly<DeviceProfile>): Promise<ProvisionReport> {
    const manager = this.managers[profile.osFamily];
    if (!manager) {
      throw new PreconditionError(`No package manager available for ${profile.osFamily}`);
    }

    const report: ProvisionReport = { satisfied: [], installed: [], warnings: [], installCalls: 0 };

    if (manager.strategy === 'manifest') {
      await this.provisionWithManifest(set, manager, report);
    } else {
      await this.provisionPerEntry(set, manager, report);
    }

    log.info(
      { satisfied: report.satisfied.length, installed: report.installed.length, installCalls: report.installCalls },
      'Provisioning finished',
    );
    return report;
  }

  private async provisionPerEntry(
    set: DependencySet,
    manager: PerEntryPackageManager,
    report: ProvisionReport,
  ): Promise<void> {
    let prepared = false;

    for (const dependency of set) {
      if (await this.check(dependency)) {
        report.satisfied.push(dependency.name);
        this.emit({ type: 'check:passed', dependency: dependency.name });
        continue;
      }
      this.emit({ type: 'check:failed', dependency: dependency.name, required: dependency.required });

      if (!prepared) {
        prepared = true;
        this.emit({ type: 'prepare:started', manager: manager.id });
        const refreshed = await manager.prepare();
        if (!refreshed.ok) {
          // A stale index is not fatal; the install below decides
          log.warn({ manager: manager.id, error: describeFailure(refreshed) }, 'Package index refresh failed');
          this.emit({ type: 'prepare:failed', manager: manager.id, error: describeFailure(refreshed) });
        }
      }

      this.emit({ type: 'install:started', manager: manager.id, dependencies: [dependency.name] });
      report.installCalls += 1;
      const installed = await manager.install(dependency);
      if (!installed.ok) {
        this.emit({
          type: 'install:failed',
          manager: manager.id,
          dependencies: [dependency.name],
          error: describeFailure(installed),
        });
      }

      await this.recheck(dependency, dependencyRemediation(dependency), report);
    }
  }

  private async provisionWithManifest(
    set: DependencySet,
    manager: ManifestPackageManager,
    report: ProvisionReport,
  ): Promise<void> {
    const missing: DependencySpec[] = [];

    for (const dependency of set) {
      if (await this.check(dependency)) {
        report.satisfied.push(dependency.name);
        this.emit({ type: 'check:passed', dependency: dependency.name });
      } else {
        missing.push(dependency);
        this.emit({ type: 'check:failed', dependency: dependency.name, required: dependency.required });
      }
    }

    if (missing.length === 0) return;

    const names = missing.map((d) => d.name);
    this.emit({ type: 'install:started', manager: manager.id, dependencies: names });
    report.installCalls += 1;
    const installed = await manager.installManifest();
    if (!installed.ok) {
      this.emit({ type: 'install:failed', manager: manager.id, dependencies: names, error: describeFailure(installed) });
    }

    for (const dependency of missing) {
      await this.recheck(dependency, dependencyRemediation(dependency), report);
    }
  }

  private async recheck(dependency: DependencySpec, remediation: string, report: ProvisionReport): Promise<void> {
    if (await this.check(dependency)) {
      report.installed.push(dependency.name);
      this.emit({ type: 'recheck:passed', dependency: dependency.name });
      return;
    }

    this.emit({ type: 'recheck:failed', dependency: dependency.name, required: dependency.required, remediation });

    if (dependency.required) {
      throw new DependencyError(dependency.name, remediation);
    }

    log.warn({ dependency: dependency.name, remediation }, 'Optional dependency unavailable');
    report.warnings.push({
      dependency: dependency.name,
      message: `${dependency.name} is not installed; some features may be unavailable`,
      remediation,
    });
  }
}
