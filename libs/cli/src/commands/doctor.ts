/**
 * Doctor command
 *
 * Reports the detected host profile and the state of every runtime
 * dependency without installing anything.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import type { DeviceProfile } from '@kneeboard/ipc';
import { dependencyRemediation, runDependencies } from '@kneeboard/deploy';
import { createContext, entryPointPath, probeHost, type CliContext, type GlobalOptions } from '../context.js';
import { hint } from '../utils/output.js';

export interface DependencyStatus {
  name: string;
  required: boolean;
  installed: boolean;
  remediation: string;
}

export interface DoctorReport {
  profile: Readonly<DeviceProfile>;
  entryPoint: { path: string; found: boolean };
  dependencies: DependencyStatus[];
}

export async function diagnose(ctx: CliContext): Promise<DoctorReport> {
  const profile = await probeHost(ctx);
  const dependencies: DependencyStatus[] = [];

  for (const dependency of runDependencies(profile)) {
    const result = await ctx.runner.run(dependency.check);
    dependencies.push({
      name: dependency.name,
      required: dependency.required,
      installed: result.ok,
      remediation: dependencyRemediation(dependency),
    });
  }

  const entry = entryPointPath(ctx);
  return { profile, entryPoint: { path: entry, found: fs.existsSync(entry) }, dependencies };
}

function printReport(report: DoctorReport): void {
  const { profile } = report;

  console.log('Kneeboard Doctor');
  console.log('================');

  console.log('\nHost:');
  console.log(`  OS family:       ${profile.osFamily}`);
  console.log(`  Target board:    ${profile.isTargetBoard ? '✓' : '✗'} ${profile.boardModel ?? 'unknown model'}`);
  console.log(`  Display session: ${profile.hasDisplaySession ? '✓' : '○ none (virtual framebuffer)'}`);
  console.log(`  Service manager: ${profile.serviceManager}`);

  console.log('\nApplication:');
  console.log(`  ${report.entryPoint.found ? '✓' : '✗'} ${report.entryPoint.path}`);

  console.log('\nDependencies:');
  for (const dep of report.dependencies) {
    const marker = dep.installed ? '✓' : dep.required ? '✗' : '⚠';
    console.log(`  ${marker} ${dep.name}`);
    if (!dep.installed) {
      console.log(`      ${hint(dep.remediation)}`);
    }
  }

  console.log('\n─────────────────────');
  const missing = report.dependencies.filter((d) => d.required && !d.installed);
  if (missing.length === 0 && report.entryPoint.found) {
    console.log('✅ Ready to run');
  } else {
    console.log('⚠ Issues found - run "kneeboard install" or fix the items above');
  }
}

/**
 * Create the doctor command
 */
export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check the host and dependencies without changing anything')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const report = await diagnose(createContext(command.optsWithGlobals<GlobalOptions>()));
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printReport(report);
      }
    });
}
