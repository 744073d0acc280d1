/**
 * Device profile types
 */

export type OsFamily = 'linux' | 'windows';

export type ServiceManagerKind = 'systemd' | 'none' | 'desktop_autostart';

/**
 * Probed description of the current host. Derived once per run and frozen.
 */
export interface DeviceProfile {
  osFamily: OsFamily;
  /** Whether the board-identification metadata matched the target board */
  isTargetBoard: boolean;
  /** Whether a graphical session is available to the kiosk app */
  hasDisplaySession: boolean;
  serviceManager: ServiceManagerKind;
  /** Raw board model string, when it could be read */
  boardModel?: string;
}
