/**
 * Environment probe
 *
 * Classifies the host into a DeviceProfile. Reads only; nothing on the
 * machine is changed.
 */

import * as fs from 'node:fs';
import {
  BOARD_MARKER,
  BOARD_MODEL_PATH,
  DISPLAY_ENV,
  OS_RELEASE_PATH,
  UserDeclinedError,
  type DeviceProfile,
  type OsFamily,
  type ServiceManagerKind,
} from '@kneeboard/ipc';
import type { CommandRunner } from './exec.js';
import type { Prompter } from './adapters/types.js';
import { createLogger } from './logger.js';

const log = createLogger('probe');

/**
 * Host facts the probe reads
 */
export interface HostFacts {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  /** File contents, or null when missing or unreadable */
  readFile(filePath: string): string | null;
  exists(filePath: string): boolean;
  which(command: string): Promise<string | null>;
}

export interface BoardIdentification {
  modelPath: string;
  osReleasePath: string;
  marker: string;
}

export const DEFAULT_BOARD_IDENTIFICATION: BoardIdentification = {
  modelPath: BOARD_MODEL_PATH,
  osReleasePath: OS_RELEASE_PATH,
  marker: BOARD_MARKER,
};

/**
 * Host facts backed by the real filesystem and environment
 */
export function createHostFacts(runner: CommandRunner): HostFacts {
  return {
    platform: process.platform,
    env: process.env,
    readFile(filePath) {
      try {
        return fs.readFileSync(filePath, 'utf-8');
      } catch {
        return null;
      }
    },
    exists: (filePath) => fs.existsSync(filePath),
    which: (command) => runner.which(command),
  };
}

export function classifyOsFamily(platform: NodeJS.Platform): OsFamily {
  return platform === 'win32' ? 'windows' : 'linux';
}

/**
 * Device-tree strings are NUL-terminated
 */
function readBoardModel(facts: HostFacts, board: BoardIdentification): string | null {
  const raw = facts.readFile(board.modelPath);
  if (raw === null) return null;
  const model = raw.replace(/\0/g, '').trim();
  return model.length > 0 ? model : null;
}

/**
 * Produce the profile for this run. Unreadable board metadata means
 * "not the target board", never a failure.
 */
export async function probeEnvironment(
  facts: HostFacts,
  board: BoardIdentification = DEFAULT_BOARD_IDENTIFICATION,
): Promise<Readonly<DeviceProfile>> {
  const osFamily = classifyOsFamily(facts.platform);

  let boardModel: string | null = null;
  let isTargetBoard = false;
  if (osFamily === 'linux') {
    boardModel = readBoardModel(facts, board);
    isTargetBoard = facts.exists(board.osReleasePath) && boardModel !== null && boardModel.includes(board.marker);
  }
  if (!isTargetBoard) {
    log.warn({ modelPath: board.modelPath, boardModel }, 'Host is not the target board');
  }

  const display = facts.env[DISPLAY_ENV];
  const hasDisplaySession = osFamily === 'windows' || (display !== undefined && display !== '');

  let serviceManager: ServiceManagerKind = 'none';
  if (osFamily === 'linux') {
    if ((await facts.which('systemctl')) !== null) {
      serviceManager = 'systemd';
    } else if (hasDisplaySession) {
      serviceManager = 'desktop_autostart';
    }
  }

  const profile: DeviceProfile = {
    osFamily,
    isTargetBoard,
    hasDisplaySession,
    serviceManager,
    ...(boardModel !== null ? { boardModel } : {}),
  };
  log.debug({ profile }, 'Environment probed');
  return Object.freeze(profile);
}

/**
 * Ask before continuing on a host that is not the target board.
 * Only the exact affirmative answer continues.
 */
export async function confirmTargetBoard(
  profile: Readonly<DeviceProfile>,
  prompter: Prompter,
  action = 'Continue anyway?',
): Promise<void> {
  if (profile.isTargetBoard) return;
  const proceed = await prompter.confirm(`${action} (y/n): `);
  if (!proceed) {
    throw new UserDeclinedError();
  }
}
