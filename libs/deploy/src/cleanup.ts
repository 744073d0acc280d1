/**
 * Project cleanup
 *
 * Removes generated artifacts (bytecode, toolkit cache, logs, editor
 * backups). Source and configuration are never matched. Each target is
 * removed independently; a failure is recorded and the sweep continues.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CleanupReport } from '@kneeboard/ipc';
import { invokingUserHome, type UserSources } from './identity.js';
import { createLogger } from './logger.js';

const log = createLogger('cleanup');

/** Directories removed wholesale */
export const CLEANUP_DIRECTORIES: readonly string[] = ['__pycache__'];

/** File name suffixes removed */
export const CLEANUP_SUFFIXES: readonly string[] = [
  // compiled bytecode
  '.pyc',
  '.pyo',
  '.pyd',
  // logs
  '.log',
  // editor backup and swap files
  '~',
  '.bak',
  '.swp',
  '.swo',
];

/** Never descended into */
const SKIPPED_DIRECTORIES: readonly string[] = ['.git', 'node_modules'];

export interface CleanupOptions {
  projectDir: string;
  /** Toolkit cache whose contents are removed, see defaultToolkitCacheDir */
  toolkitCacheDir: string;
  remove?: (target: string) => void;
}

/**
 * ~/.kivy/cache of the invoking user
 */
export async function defaultToolkitCacheDir(sources: Pick<UserSources, 'runner' | 'env'>): Promise<string> {
  return path.join(await invokingUserHome(sources), '.kivy', 'cache');
}

function removeTarget(target: string): void {
  fs.rmSync(target, { recursive: true, force: true });
}

export function isCleanupFile(name: string): boolean {
  return CLEANUP_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/**
 * Paths under `projectDir` that cleanup would remove, depth first
 */
export function findCleanupTargets(projectDir: string): string[] {
  const targets: string[] = [];

  const walk = (dir: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      log.warn({ dir, error: err instanceof Error ? err.message : String(err) }, 'Cannot read directory');
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (CLEANUP_DIRECTORIES.includes(entry.name)) {
          targets.push(fullPath);
        } else if (!SKIPPED_DIRECTORIES.includes(entry.name)) {
          walk(fullPath);
        }
      } else if (isCleanupFile(entry.name)) {
        targets.push(fullPath);
      }
    }
  };

  walk(path.resolve(projectDir));
  return targets;
}

function cacheEntries(cacheDir: string): string[] {
  try {
    return fs.readdirSync(cacheDir).map((name) => path.join(cacheDir, name));
  } catch {
    return [];
  }
}

export function cleanProject(options: CleanupOptions): CleanupReport {
  const report: CleanupReport = { removed: [], failed: [] };
  const targets = [
    ...findCleanupTargets(options.projectDir),
    ...cacheEntries(options.toolkitCacheDir),
  ];
  const remove = options.remove ?? removeTarget;

  for (const target of targets) {
    try {
      remove(target);
      report.removed.push(target);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ path: target, error: message }, 'Could not remove');
      report.failed.push({ path: target, error: message });
    }
  }

  return report;
}
