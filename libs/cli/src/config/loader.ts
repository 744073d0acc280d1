/**
 * Configuration loader
 *
 * Reads kneeboard.config.json from the project directory, or the file named
 * by KNEEBOARD_CONFIG. A missing project file means defaults.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_ENV, CONFIG_FILE, DeployConfigSchema, PreconditionError, type DeployConfig } from '@kneeboard/ipc';
import { createLogger } from '@kneeboard/deploy';

const log = createLogger('config');

export interface ConfigSource {
  path: string;
  /** True when the path came from the environment */
  explicit: boolean;
}

export function resolveConfigPath(projectDir: string, env: NodeJS.ProcessEnv = process.env): ConfigSource {
  const override = env[CONFIG_ENV];
  if (override) {
    return { path: path.resolve(projectDir, override), explicit: true };
  }
  return { path: path.join(projectDir, CONFIG_FILE), explicit: false };
}

function readJson(filePath: string): unknown {
  const text = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PreconditionError(`${filePath} is not valid JSON: ${reason}`);
  }
}

export function loadConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): DeployConfig {
  const source = resolveConfigPath(projectDir, env);

  if (!fs.existsSync(source.path)) {
    if (source.explicit) {
      throw new PreconditionError(
        `Configuration file not found: ${source.path}`,
        `unset ${CONFIG_ENV} or point it at an existing file`,
      );
    }
    log.debug({ path: source.path }, 'No configuration file, using defaults');
    return DeployConfigSchema.parse({});
  }

  const parsed = DeployConfigSchema.safeParse(readJson(source.path));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PreconditionError(`Invalid configuration in ${source.path}:\n  ${issues.join('\n  ')}`);
  }

  log.debug({ path: source.path }, 'Configuration loaded');
  return parsed.data;
}
