/**
 * Progress events emitted by the provisioner and the launcher
 */

import type { LaunchState, LaunchStrategy } from '@kneeboard/ipc';

export const PROVISION_EVENT = 'provision-event';
export const LAUNCH_EVENT = 'launch-event';

export type ProvisionEvent =
  | { type: 'check:passed'; dependency: string }
  | { type: 'check:failed'; dependency: string; required: boolean }
  | { type: 'prepare:started'; manager: string }
  | { type: 'prepare:failed'; manager: string; error: string }
  | { type: 'install:started'; manager: string; dependencies: string[] }
  | { type: 'install:failed'; manager: string; dependencies: string[]; error: string }
  | { type: 'recheck:passed'; dependency: string }
  | { type: 'recheck:failed'; dependency: string; required: boolean; remediation: string };

export type LaunchEvent =
  | { type: 'state'; state: LaunchState }
  | { type: 'spawned'; strategy: LaunchStrategy; command: string; args: string[] }
  | { type: 'signal'; signal: NodeJS.Signals };
