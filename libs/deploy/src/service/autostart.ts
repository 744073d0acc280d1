/**
 * Desktop session autostart entry (XDG), the alternative to a system
 * service on boards that boot into a desktop.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { APP_DISPLAY_NAME, AUTOSTART_FILE, type AutostartEntry } from '@kneeboard/ipc';

export interface AutostartOptions {
  /** Autostart directory, usually ~/.config/autostart */
  dir: string;
  /** Command line started with the session */
  exec: string;
  fileName?: string;
  name?: string;
}

export function renderAutostartEntry(exec: string, name = APP_DISPLAY_NAME): string {
  return [
    '[Desktop Entry]',
    'Type=Application',
    `Name=${name}`,
    'Comment=Digital kneeboard for pilots',
    `Exec=${exec}`,
    'Terminal=false',
    'X-GNOME-Autostart-enabled=true',
    '',
  ].join('\n');
}

export function writeAutostartEntry(options: AutostartOptions): AutostartEntry {
  const entryPath = path.join(options.dir, options.fileName ?? AUTOSTART_FILE);
  fs.mkdirSync(options.dir, { recursive: true });
  fs.writeFileSync(entryPath, renderAutostartEntry(options.exec, options.name));
  return { path: entryPath, exec: options.exec };
}
