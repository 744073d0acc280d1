/**
 * Privilege detection utilities
 */

import * as os from 'node:os';

/**
 * Information about the current user's privileges
 */
export interface PrivilegeInfo {
  /** Whether running as root (UID 0) */
  isRoot: boolean;
  /** Current user ID, -1 where the platform has none */
  uid: number;
  username: string;
  /** Login user behind sudo, if any */
  sudoUser?: string;
}

/**
 * Detect the current user's privileges
 */
export function detectPrivileges(env: NodeJS.ProcessEnv = process.env): PrivilegeInfo {
  const uid = process.getuid?.() ?? -1;
  const sudoUser = env['SUDO_USER'];

  return {
    isRoot: uid === 0,
    uid,
    username: os.userInfo().username,
    ...(sudoUser ? { sudoUser } : {}),
  };
}

/**
 * Help-text line describing who is running the CLI
 */
export function describePrivileges(priv: PrivilegeInfo): string {
  const via = priv.sudoUser ? ` via sudo from ${priv.sudoUser}` : '';
  return `Current user: ${priv.username} (UID: ${priv.uid})${priv.isRoot ? ' [ROOT]' : ''}${via}`;
}
