/**
 * Process launcher types
 */

export type LaunchState = 'idle' | 'display-configured' | 'running' | 'exited';

export type LaunchStrategy = 'direct' | 'virtual-framebuffer';

export interface LaunchResult {
  strategy: LaunchStrategy;
  /** Child exit status; 1 when the child was terminated by a signal */
  exitCode: number;
  signal: NodeJS.Signals | null;
}
