/**
 * Dependency provisioning types
 */

/**
 * A single external command invocation
 */
export interface CommandSpec {
  command: string;
  args: readonly string[];
  /** Run through sudo when the caller is not root */
  elevated?: boolean;
}

/**
 * One entry of a dependency set. The installed state must be verifiable by
 * running `check` any number of times.
 */
export interface DependencySpec {
  name: string;
  check: CommandSpec;
  install: CommandSpec;
  required: boolean;
  /** Shown instead of the install command when that command is not a fix on its own */
  remediation?: string;
}

/** Entries are applied in declared order */
export type DependencySet = readonly DependencySpec[];

export interface ProvisionWarning {
  dependency: string;
  message: string;
  remediation: string;
}

export interface ProvisionReport {
  /** Entries whose check passed without an install */
  satisfied: string[];
  /** Entries that passed their re-check after an install */
  installed: string[];
  /** Optional entries that remain unmet */
  warnings: ProvisionWarning[];
  /** Number of install invocations issued (manifest installs count once) */
  installCalls: number;
}
