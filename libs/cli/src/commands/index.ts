/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createInstallCommand, runInstall, type InstallSummary } from './install.js';
export { createRunCommand, runKiosk, type RunDeps } from './run.js';
export { createServiceCommand, runService } from './service.js';
export { createPackageCommand, runPackage, type PackageOptions } from './package.js';
export { createCleanCommand, runClean } from './clean.js';
export { createDoctorCommand, diagnose, type DoctorReport, type DependencyStatus } from './doctor.js';
