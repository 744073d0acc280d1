/**
 * Display orientation types
 */

export type Orientation = 'normal' | 'rotated';

export interface DisplayState {
  orientation: Orientation;
  /** Output that was last rotated, or null when none was touched */
  outputId: string | null;
}

/**
 * Result of a best-effort display operation. Both non-applied kinds are
 * non-fatal; they are kept apart so logs show why nothing happened.
 */
export type DisplayOutcome =
  | { kind: 'applied'; outputId: string }
  | { kind: 'not-applicable'; reason: string }
  | { kind: 'failed'; reason: string };
