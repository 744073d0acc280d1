/**
 * Terminal output helpers
 */

import { remediationFor, type ProvisionReport } from '@kneeboard/ipc';
import { PROVISION_EVENT, type ProvisionEvent } from '@kneeboard/deploy';
import type { EventEmitter } from 'node:events';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

export function banner(title: string): void {
  console.log(title);
  console.log('='.repeat(title.length));
  console.log('');
}

export function success(message: string): void {
  console.log(`${GREEN}✓${RESET} ${message}`);
}

export function failure(message: string): void {
  console.log(`${RED}✗${RESET} ${message}`);
}

export function warning(message: string): void {
  console.log(`${YELLOW}⚠${RESET} ${message}`);
}

export function hint(command: string): string {
  return `${CYAN}${command}${RESET}`;
}

/**
 * Print an error reaching the CLI boundary, with its remediation if any
 */
export function printError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${RED}Error:${RESET} ${message}`);
  const remediation = remediationFor(err);
  if (remediation) {
    console.error(`Try: ${remediation}`);
  }
}

/**
 * Mirror provisioning progress on the terminal
 */
export function reportProvisioning(emitter: EventEmitter): void {
  emitter.on(PROVISION_EVENT, (event: ProvisionEvent) => {
    switch (event.type) {
      case 'check:passed':
        success(`${event.dependency} is already installed`);
        break;
      case 'prepare:started':
        console.log(`Updating ${event.manager} package lists...`);
        break;
      case 'prepare:failed':
        warning(`Package list update failed: ${event.error}`);
        break;
      case 'install:started':
        console.log(`Installing ${event.dependencies.join(', ')}...`);
        break;
      case 'recheck:passed':
        success(`${event.dependency} installed`);
        break;
      case 'recheck:failed':
        if (event.required) failure(`${event.dependency} could not be installed`);
        break;
      default:
        break;
    }
  });
}

export function printWarnings(report: ProvisionReport): void {
  for (const w of report.warnings) {
    warning(w.message);
    console.log(`  Try: ${hint(w.remediation)}`);
  }
}
