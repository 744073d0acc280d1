/**
 * Invoking-user resolution
 *
 * Under sudo the process runs as root; services and autostart entries must
 * belong to the person who ran the command.
 */

import * as os from 'node:os';
import type { CommandRunner } from './exec.js';
import { createLogger } from './logger.js';

const log = createLogger('identity');

export interface UserSources {
  runner: CommandRunner;
  env?: NodeJS.ProcessEnv;
  /** Current session user; defaults to os.userInfo() */
  sessionUser?: () => string;
}

/**
 * Original login name (`logname`), then SUDO_USER, then the session user
 */
export async function resolveInvokingUser(sources: UserSources): Promise<string> {
  const env = sources.env ?? process.env;

  const login = await sources.runner.run({ command: 'logname', args: [] });
  const loginName = login.ok ? login.stdout.trim() : '';
  if (loginName.length > 0) return loginName;

  const sudoUser = env['SUDO_USER'];
  if (sudoUser) return sudoUser;

  return (sources.sessionUser ?? (() => os.userInfo().username))();
}

/**
 * Home field of a passwd(5) line, or null when the line is malformed
 */
export function parsePasswdHome(line: string): string | null {
  const fields = line.trim().split(':');
  if (fields.length !== 7) return null;
  const home = fields[5] ?? '';
  return home.length > 0 ? home : null;
}

/**
 * Home directory of the invoking user, accounting for sudo
 */
export async function invokingUserHome(sources: Pick<UserSources, 'runner' | 'env'>): Promise<string> {
  const env = sources.env ?? process.env;
  const sudoUser = env['SUDO_USER'];
  if (!sudoUser) return os.homedir();

  const entry = await sources.runner.run({ command: 'getent', args: ['passwd', sudoUser] });
  const home = entry.ok ? parsePasswdHome(entry.stdout) : null;
  if (home === null) {
    log.warn({ user: sudoUser }, 'No passwd entry for invoking user, using current home');
    return os.homedir();
  }
  return home;
}
