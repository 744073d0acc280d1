/**
 * Typed error classes for kneeboard deployment tooling
 */

export class DeployError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Missing privilege, missing file, invalid template or config. Fatal.
 */
export class PreconditionError extends DeployError {
  /** Copy-pasteable command or instruction that resolves the failure */
  public readonly remediation?: string;

  constructor(message: string, remediation?: string) {
    super(message, 'PRECONDITION_FAILED');
    this.name = 'PreconditionError';
    this.remediation = remediation;
  }
}

/**
 * A required dependency still fails its check after one install attempt.
 */
export class DependencyError extends DeployError {
  public readonly dependency: string;
  public readonly remediation: string;

  constructor(dependency: string, remediation: string) {
    super(`Required dependency not satisfied: ${dependency}`, 'DEPENDENCY_UNMET');
    this.name = 'DependencyError';
    this.dependency = dependency;
    this.remediation = remediation;
  }
}

/**
 * A cosmetic or convenience tool failed. Components log and absorb it.
 */
export class ExternalToolError extends DeployError {
  public readonly tool: string;

  constructor(tool: string, message: string) {
    super(`${tool}: ${message}`, 'EXTERNAL_TOOL_FAILED');
    this.name = 'ExternalToolError';
    this.tool = tool;
  }
}

/**
 * The operator answered a confirmation prompt with anything but the
 * affirmative token. Ends the operation cleanly.
 */
export class UserDeclinedError extends DeployError {
  constructor(message = 'Operation cancelled.') {
    super(message, 'USER_DECLINED');
    this.name = 'UserDeclinedError';
  }
}

/**
 * Process exit code for an error reaching the CLI boundary
 */
export function exitCodeFor(err: unknown): 0 | 1 {
  return err instanceof UserDeclinedError ? 0 : 1;
}

/**
 * Remediation hint carried by an error, if any
 */
export function remediationFor(err: unknown): string | undefined {
  if (err instanceof DependencyError) return err.remediation;
  if (err instanceof PreconditionError) return err.remediation;
  return undefined;
}
