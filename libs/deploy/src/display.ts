/**
 * Display controller
 *
 * Rotates the attached panel to portrait before launch and back afterwards.
 * A missing or non-rotatable display is an expected condition: every outcome
 * is returned, logged, and never thrown.
 */

import { BOARD_OUTPUT, type DeviceProfile, type DisplayOutcome, type DisplayState, type Orientation } from '@kneeboard/ipc';
import type { DisplayManager } from './adapters/types.js';
import { createLogger } from './logger.js';

const log = createLogger('display');

export interface DisplayControllerOptions {
  /** Board-specific output tried before auto-detection */
  boardOutput?: string;
}

export class DisplayController {
  private readonly manager: DisplayManager;
  private readonly profile: Readonly<DeviceProfile>;
  private readonly boardOutput: string;
  private current: DisplayState = { orientation: 'normal', outputId: null };

  constructor(manager: DisplayManager, profile: Readonly<DeviceProfile>, options: DisplayControllerOptions = {}) {
    this.manager = manager;
    this.profile = profile;
    this.boardOutput = options.boardOutput ?? BOARD_OUTPUT;
  }

  get state(): DisplayState {
    return { ...this.current };
  }

  configure(): Promise<DisplayOutcome> {
    return this.apply('rotated');
  }

  restore(): Promise<DisplayOutcome> {
    return this.apply('normal');
  }

  private async apply(orientation: Orientation): Promise<DisplayOutcome> {
    const outcome = await this.attempt(orientation);

    if (outcome.kind === 'applied') {
      this.current = { orientation, outputId: outcome.outputId };
      log.info({ orientation, output: outcome.outputId }, 'Display orientation set');
    } else {
      log.warn({ orientation, kind: outcome.kind, reason: outcome.reason }, 'Display orientation unchanged');
    }
    return outcome;
  }

  /**
   * Board output first, then the first output reporting "connected"
   */
  private async attempt(orientation: Orientation): Promise<DisplayOutcome> {
    if (!this.profile.hasDisplaySession) {
      return { kind: 'not-applicable', reason: 'no display session' };
    }

    try {
      if (!(await this.manager.isAvailable())) {
        return { kind: 'not-applicable', reason: `${this.manager.id} is not installed` };
      }

      const board = await this.manager.rotate(this.boardOutput, orientation);
      if (board.ok) {
        return { kind: 'applied', outputId: this.boardOutput };
      }
      log.debug({ output: this.boardOutput, stderr: board.stderr.trim() }, 'Board output rotation failed, auto-detecting');

      const [detected] = await this.manager.connectedOutputs();
      if (detected === undefined) {
        return { kind: 'failed', reason: 'no connected output found' };
      }

      const fallback = await this.manager.rotate(detected, orientation);
      if (fallback.ok) {
        return { kind: 'applied', outputId: detected };
      }
      return { kind: 'failed', reason: fallback.error ?? (fallback.stderr.trim() || `could not rotate ${detected}`) };
    } catch (err) {
      return { kind: 'failed', reason: err instanceof Error ? err.message : String(err) };
    }
  }
}
