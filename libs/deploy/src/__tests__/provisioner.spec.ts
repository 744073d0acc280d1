/**
 * DependencyProvisioner tests
 */

import { EventEmitter } from 'node:events';
import { DependencyError, PreconditionError, type DependencySpec } from '@kneeboard/ipc';
import { DependencyProvisioner } from '../provisioner';
import { AptPackageManager } from '../adapters/apt.adapter';
import { PipManifestPackageManager } from '../adapters/pip-manifest.adapter';
import { installDependencies, runDependencies } from '../dependencies';
import { PROVISION_EVENT, type ProvisionEvent } from '../events';
import { FAIL, OK, createFakeRunner, profile } from './helpers';

function dep(name: string, required = true): DependencySpec {
  return {
    name,
    check: { command: 'check', args: [name] },
    install: { command: 'apt', args: ['install', '-y', name], elevated: true },
    required,
  };
}

/**
 * Simulated host: `check X` passes once X is installed; `apt install -y X`
 * installs X unless it is broken.
 */
function createHost(options: { installed?: string[]; broken?: string[]; manifestProvides?: string[] } = {}) {
  const installed = new Set(options.installed ?? []);
  const broken = new Set(options.broken ?? []);
  const runner = createFakeRunner((line, spec) => {
    if (spec.command === 'check') {
      return installed.has(spec.args[0] ?? '') ? OK : FAIL;
    }
    if (line === 'apt update') return OK;
    if (line.startsWith('apt install -y ')) {
      const name = spec.args[2] ?? '';
      if (broken.has(name)) return FAIL;
      installed.add(name);
      return OK;
    }
    if (line.startsWith('python -m pip install -r ')) {
      (options.manifestProvides ?? []).forEach((name) => installed.add(name));
      return OK;
    }
    return FAIL;
  });
  const installLines = () => runner.calls.map((c) => c.line).filter((l) => l.startsWith('apt install') || l.includes('pip install'));
  return { runner, installed, installLines };
}

describe('DependencyProvisioner', () => {
  describe('per-entry strategy', () => {
    it('installs failing entries in declared order and re-checks each', async () => {
      const host = createHost({ installed: ['beta'] });
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });

      const report = await provisioner.provision([dep('alpha'), dep('beta'), dep('gamma')], profile());

      expect(host.installLines()).toEqual(['apt install -y alpha', 'apt install -y gamma']);
      expect(report).toEqual({
        satisfied: ['beta'],
        installed: ['alpha', 'gamma'],
        warnings: [],
        installCalls: 2,
      });
    });

    it('refreshes the package index once, lazily', async () => {
      const host = createHost();
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });

      await provisioner.provision([dep('alpha'), dep('beta')], profile());

      const lines = host.runner.calls.map((c) => c.line);
      expect(lines.filter((l) => l === 'apt update')).toHaveLength(1);
      expect(lines.indexOf('apt update')).toBeLessThan(lines.indexOf('apt install -y alpha'));
    });

    it('is idempotent: a second run issues no installs and no refresh', async () => {
      const host = createHost();
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });
      const set = [dep('alpha'), dep('beta', false), dep('gamma')];

      await provisioner.provision(set, profile());
      const stateAfterFirst = [...host.installed].sort();
      const callsAfterFirst = host.runner.calls.length;

      const second = await provisioner.provision(set, profile());
      const secondLines = host.runner.calls.slice(callsAfterFirst).map((c) => c.line);

      expect([...host.installed].sort()).toEqual(stateAfterFirst);
      expect(second.installCalls).toBe(0);
      expect(second.satisfied).toEqual(['alpha', 'beta', 'gamma']);
      expect(secondLines).toEqual(['check alpha', 'check beta', 'check gamma']);
    });

    it('aborts with the remediation command when a required entry stays unmet', async () => {
      const host = createHost({ broken: ['beta'] });
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });

      const result = provisioner.provision([dep('alpha'), dep('beta'), dep('gamma')], profile());

      await expect(result).rejects.toBeInstanceOf(DependencyError);
      await expect(result).rejects.toMatchObject({
        dependency: 'beta',
        remediation: 'sudo apt install -y beta',
      });
      const betaLines = host.runner.calls.map((c) => c.line).filter((l) => l.endsWith('beta'));
      expect(betaLines).toEqual(['check beta', 'apt install -y beta', 'check beta']);
      expect(host.installLines()).not.toContain('apt install -y gamma');
    });

    it('reports the entry remediation instead of the install command when one is given', async () => {
      const host = createHost({ broken: ['beta'] });
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });
      const beta: DependencySpec = { ...dep('beta'), remediation: 'Reinstall beta by hand' };

      await expect(provisioner.provision([beta], profile())).rejects.toMatchObject({
        dependency: 'beta',
        remediation: 'Reinstall beta by hand',
      });
    });

    it('warns and continues when an optional entry stays unmet', async () => {
      const host = createHost({ broken: ['beta'] });
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });

      const report = await provisioner.provision([dep('alpha'), dep('beta', false), dep('gamma')], profile());

      expect(report.installed).toEqual(['alpha', 'gamma']);
      expect(report.warnings).toEqual([
        {
          dependency: 'beta',
          message: 'beta is not installed; some features may be unavailable',
          remediation: 'sudo apt install -y beta',
        },
      ]);
    });

    it('emits progress events', async () => {
      const host = createHost({ installed: ['alpha'] });
      const emitter = new EventEmitter();
      const events: ProvisionEvent[] = [];
      emitter.on(PROVISION_EVENT, (e: ProvisionEvent) => events.push(e));
      const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) }, emitter);

      await provisioner.provision([dep('alpha'), dep('beta')], profile());

      expect(events.map((e) => e.type)).toEqual([
        'check:passed',
        'check:failed',
        'prepare:started',
        'install:started',
        'recheck:passed',
      ]);
    });
  });

  describe('manifest strategy', () => {
    const windows = profile({ osFamily: 'windows', serviceManager: 'none' });

    it('issues a single manifest install for every missing entry', async () => {
      const host = createHost({ installed: ['alpha'], manifestProvides: ['beta', 'gamma'] });
      const provisioner = new DependencyProvisioner(host.runner, {
        windows: new PipManifestPackageManager(host.runner, '/proj'),
      });

      const report = await provisioner.provision([dep('alpha'), dep('beta'), dep('gamma')], windows);

      expect(host.installLines()).toEqual(['python -m pip install -r /proj/requirements.txt']);
      expect(report).toEqual({ satisfied: ['alpha'], installed: ['beta', 'gamma'], warnings: [], installCalls: 1 });
    });

    it('does not call the manifest install when everything is present', async () => {
      const host = createHost({ installed: ['alpha', 'beta'] });
      const provisioner = new DependencyProvisioner(host.runner, {
        windows: new PipManifestPackageManager(host.runner, '/proj'),
      });

      const report = await provisioner.provision([dep('alpha'), dep('beta')], windows);

      expect(host.installLines()).toEqual([]);
      expect(report.installCalls).toBe(0);
    });

    it('keeps required and optional semantics after the manifest install', async () => {
      const host = createHost({ manifestProvides: ['alpha'] });
      const provisioner = new DependencyProvisioner(host.runner, {
        windows: new PipManifestPackageManager(host.runner, '/proj'),
      });

      const optionalOnly = provisioner.provision([dep('alpha'), dep('beta', false)], windows);
      await expect(optionalOnly).resolves.toMatchObject({ installed: ['alpha'], installCalls: 1 });

      const required = provisioner.provision([dep('gamma')], windows);
      await expect(required).rejects.toMatchObject({ dependency: 'gamma' });
    });
  });

  it('rejects a profile with no matching package manager', async () => {
    const host = createHost();
    const provisioner = new DependencyProvisioner(host.runner, { linux: new AptPackageManager(host.runner) });

    await expect(provisioner.provision([dep('alpha')], profile({ osFamily: 'windows' }))).rejects.toBeInstanceOf(
      PreconditionError,
    );
  });
});

describe('dependency sets', () => {
  it('adds the virtual framebuffer only for headless hosts', () => {
    const headed = runDependencies(profile({ hasDisplaySession: true })).map((d) => d.name);
    const headless = runDependencies(profile({ hasDisplaySession: false })).map((d) => d.name);

    expect(headed).toEqual(['Python 3', 'tkinter', 'Pillow']);
    expect(headless).toEqual(['Python 3', 'tkinter', 'Pillow', 'X virtual framebuffer']);
  });

  it('orders native libraries before the toolkit', () => {
    const names = installDependencies(profile()).map((d) => d.name);

    expect(names.indexOf('SDL2 development libraries')).toBeLessThan(names.indexOf('Kivy'));
    expect(names[0]).toBe('Python 3');
    expect(names[names.length - 1]).toBe('Kivy');
  });

  it('points windows users at the python installer for tkinter', () => {
    const tkinter = runDependencies(profile({ osFamily: 'windows' })).find((d) => d.name === 'tkinter');

    expect(tkinter?.remediation).toBe('Re-run the Python installer, choose Modify and enable "tcl/tk and IDLE"');
    expect(tkinter?.install.command).toBe('winget');
  });

  it('uses python instead of python3 on windows', () => {
    const checks = runDependencies(profile({ osFamily: 'windows' })).map((d) => d.check.command);
    expect(new Set(checks)).toEqual(new Set(['python']));
  });
});
