/**
 * Constants for kneeboard deployment tooling
 */

/** Package name used for release archives */
export const APP_NAME = 'pilot_kneeboard';

/** Human-readable application name */
export const APP_DISPLAY_NAME = 'Pilot Kneeboard';

/** Current release version */
export const APP_VERSION = '1.0.0';

/** Kiosk app entry point, relative to the install directory */
export const ENTRY_POINT = 'kneeboard_gui.py';

/** Absolute runtime used in service descriptors */
export const RUNTIME_PATH = '/usr/bin/python3';

/** Runtime command used for interactive launches and autostart entries */
export const INTERPRETER = 'python3';

// Board identification
/** Device-tree model file on the target board */
export const BOARD_MODEL_PATH = '/proc/device-tree/model';

/** OS release file that must exist on a supported board image */
export const OS_RELEASE_PATH = '/etc/os-release';

/** Substring of the board model identifying the target board */
export const BOARD_MARKER = 'Raspberry Pi';

/** Board-specific display output tried before auto-detection */
export const BOARD_OUTPUT = 'HDMI-1';

// Service registration
/** systemd unit name (without suffix) */
export const SERVICE_NAME = 'kneeboard';

/** Service template shipped next to the entry point */
export const SERVICE_TEMPLATE_FILE = 'kneeboard.service';

/** systemd unit directory */
export const SYSTEMD_UNIT_DIR = '/etc/systemd/system';

/** Desktop autostart entry file name */
export const AUTOSTART_FILE = 'kneeboard.desktop';

/** pip requirements manifest shipped with the app */
export const REQUIREMENTS_FILE = 'requirements.txt';

/** Project-level configuration file */
export const CONFIG_FILE = 'kneeboard.config.json';

/** Environment variable overriding the configuration file path */
export const CONFIG_ENV = 'KNEEBOARD_CONFIG';

/** Environment variable selecting the log level */
export const LOG_LEVEL_ENV = 'KNEEBOARD_LOG_LEVEL';

/** Display-session variable read by the environment probe */
export const DISPLAY_ENV = 'DISPLAY';

/** Headless flag exported to the kiosk app when no display session exists */
export const HEADLESS_ENV = 'HEADLESS';

/** Files that make up a distributable release */
export const DEFAULT_MANIFEST_FILES: readonly string[] = [
  'kneeboard_gui.py',
  'README.md',
  'LICENSE.txt',
  'requirements.txt',
  'install.sh',
  'setup_service.sh',
  'kneeboard.service',
  'run_kneeboard.bat',
  'install_windows.bat',
];

/** Exact token accepted by every y/n prompt */
export const AFFIRMATIVE = 'y';
