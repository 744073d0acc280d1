/**
 * Kneeboard Deploy Library
 *
 * Environment probing, dependency provisioning, display control, launch,
 * service registration, packaging and cleanup for the kneeboard kiosk app.
 * OS resources are reached only through the adapters in ./adapters.
 *
 * @packageDocumentation
 */

export * from './adapters/index.js';
export * from './service/index.js';
export { createCommandRunner, formatCommand, isRootUser, type CommandResult, type CommandRunner, type RunOptions } from './exec.js';
export { createLogger, setLogLevel, getLogLevel, type LogLevel } from './logger.js';
export {
  probeEnvironment,
  confirmTargetBoard,
  createHostFacts,
  classifyOsFamily,
  DEFAULT_BOARD_IDENTIFICATION,
  type HostFacts,
  type BoardIdentification,
} from './probe.js';
export { installDependencies, runDependencies } from './dependencies.js';
export { DependencyProvisioner, dependencyRemediation } from './provisioner.js';
export { DisplayController, type DisplayControllerOptions } from './display.js';
export {
  ProcessLauncher,
  selectLaunchStrategy,
  buildLaunchCommand,
  type LaunchTarget,
  type LaunchCommand,
  type ProcessLauncherDeps,
} from './launcher.js';
export { resolveInvokingUser, invokingUserHome, parsePasswdHome, type UserSources } from './identity.js';
export { buildPackage, packageRootName, archiveFileName, type BuildPackageOptions } from './packager.js';
export {
  cleanProject,
  findCleanupTargets,
  isCleanupFile,
  defaultToolkitCacheDir,
  CLEANUP_DIRECTORIES,
  CLEANUP_SUFFIXES,
  type CleanupOptions,
} from './cleanup.js';
export { PROVISION_EVENT, LAUNCH_EVENT, type ProvisionEvent, type LaunchEvent } from './events.js';
