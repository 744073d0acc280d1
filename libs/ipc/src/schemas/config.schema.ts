/**
 * Zod schemas for kneeboard deployment configuration
 */

import { z } from 'zod';
import {
  APP_DISPLAY_NAME,
  APP_NAME,
  APP_VERSION,
  AUTOSTART_FILE,
  BOARD_MARKER,
  BOARD_MODEL_PATH,
  BOARD_OUTPUT,
  DEFAULT_MANIFEST_FILES,
  ENTRY_POINT,
  INTERPRETER,
  OS_RELEASE_PATH,
  RUNTIME_PATH,
  SERVICE_NAME,
  SERVICE_TEMPLATE_FILE,
  SYSTEMD_UNIT_DIR,
} from '../constants.js';

/**
 * Semantic version (`MAJOR.MINOR.PATCH` with optional pre-release and build)
 */
export const SemverSchema = z
  .string()
  .regex(
    /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/,
    'must be a semantic version such as 1.0.0',
  );

/**
 * Package name usable as a file name component
 */
export const PackageNameSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must contain only letters, digits, ".", "_" and "-"');

/**
 * Relative path inside the project directory
 */
const RelativePathSchema = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith('/') && !p.split(/[\\/]/).includes('..'), {
    message: 'must be a relative path inside the project directory',
  });

export const AppConfigSchema = z.object({
  name: PackageNameSchema.default(APP_NAME),
  displayName: z.string().min(1).default(APP_DISPLAY_NAME),
  version: SemverSchema.default(APP_VERSION),
  entryPoint: RelativePathSchema.default(ENTRY_POINT),
  runtime: z.string().startsWith('/').default(RUNTIME_PATH),
  interpreter: z.string().min(1).default(INTERPRETER),
});

export const BoardConfigSchema = z.object({
  modelPath: z.string().default(BOARD_MODEL_PATH),
  osReleasePath: z.string().default(OS_RELEASE_PATH),
  marker: z.string().min(1).default(BOARD_MARKER),
  output: z.string().min(1).default(BOARD_OUTPUT),
});

export const ServiceConfigSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9@._-]+$/).default(SERVICE_NAME),
  templateFile: RelativePathSchema.default(SERVICE_TEMPLATE_FILE),
  unitDir: z.string().startsWith('/').default(SYSTEMD_UNIT_DIR),
});

export const AutostartConfigSchema = z.object({
  /** Defaults to ~/.config/autostart of the invoking user */
  dir: z.string().optional(),
  fileName: z.string().min(1).default(AUTOSTART_FILE),
});

export const PackageConfigSchema = z.object({
  files: z.array(RelativePathSchema).min(1).default([...DEFAULT_MANIFEST_FILES]),
});

export const CleanupConfigSchema = z.object({
  /** Defaults to ~/.kivy/cache of the invoking user */
  toolkitCacheDir: z.string().optional(),
});

/**
 * Full deployment configuration (kneeboard.config.json)
 */
export const DeployConfigSchema = z.object({
  app: AppConfigSchema.default({}),
  board: BoardConfigSchema.default({}),
  service: ServiceConfigSchema.default({}),
  autostart: AutostartConfigSchema.default({}),
  package: PackageConfigSchema.default({}),
  cleanup: CleanupConfigSchema.default({}),
});

export type DeployConfig = z.infer<typeof DeployConfigSchema>;
export type DeployConfigInput = z.input<typeof DeployConfigSchema>;
