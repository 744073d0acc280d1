/**
 * Dependency sets for the kiosk app
 *
 * Order matters: native libraries come before the toolkit that links
 * against them.
 */

import type { CommandSpec, DependencySet, DependencySpec, DeviceProfile } from '@kneeboard/ipc';

function apt(...packages: string[]): CommandSpec {
  return { command: 'apt', args: ['install', '-y', ...packages], elevated: true };
}

function aptFixBroken(...packages: string[]): CommandSpec {
  return { command: 'apt', args: ['install', '-y', '--fix-broken', ...packages], elevated: true };
}

function dpkgInstalled(...packages: string[]): CommandSpec {
  return { command: 'dpkg', args: ['-s', ...packages] };
}

function pythonImports(python: string, statement: string): CommandSpec {
  return { command: python, args: ['-c', statement] };
}

function pip(python: string, ...args: string[]): CommandSpec {
  return { command: python, args: ['-m', 'pip', 'install', ...args] };
}

const SDL2_PACKAGES = ['libsdl2-dev', 'libsdl2-image-dev', 'libsdl2-mixer-dev', 'libsdl2-ttf-dev'];
const GSTREAMER_PACKAGES = ['libgstreamer1.0-dev', 'libgstreamer-plugins-base1.0-dev'];
const FFMPEG_PACKAGES = [
  'libavcodec-dev',
  'libavdevice-dev',
  'libavfilter-dev',
  'libavformat-dev',
  'libavutil-dev',
  'libswscale-dev',
  'libswresample-dev',
];

const LINUX_PYTHON: DependencySpec = {
  name: 'Python 3',
  check: { command: 'python3', args: ['--version'] },
  install: apt('python3', 'python3-pip'),
  required: true,
};

const LINUX_PIP: DependencySpec = {
  name: 'pip',
  check: { command: 'python3', args: ['-m', 'pip', '--version'] },
  install: apt('python3-pip'),
  required: true,
};

const LINUX_TKINTER: DependencySpec = {
  name: 'tkinter',
  check: pythonImports('python3', 'import tkinter'),
  install: aptFixBroken('python3-tk'),
  required: true,
};

const LINUX_PILLOW: DependencySpec = {
  name: 'Pillow',
  check: pythonImports('python3', 'from PIL import Image, ImageTk'),
  install: aptFixBroken('python3-pil', 'python3-pil.imagetk'),
  required: true,
};

const LINUX_XVFB: DependencySpec = {
  name: 'X virtual framebuffer',
  check: dpkgInstalled('xvfb', 'x11-xserver-utils'),
  install: aptFixBroken('xvfb', 'x11-xserver-utils'),
  required: true,
};

const WINDOWS_PYTHON: DependencySpec = {
  name: 'Python 3',
  check: { command: 'python', args: ['--version'] },
  install: { command: 'winget', args: ['install', '-e', '--id', 'Python.Python.3.12'] },
  required: true,
};

/**
 * Everything needed to build and run the toolkit on a fresh image
 */
export function installDependencies(profile: Pick<DeviceProfile, 'osFamily'>): DependencySet {
  if (profile.osFamily === 'windows') {
    return [
      WINDOWS_PYTHON,
      {
        name: 'Kivy',
        check: pythonImports('python', 'import kivy'),
        install: pip('python', 'kivy'),
        required: true,
      },
    ];
  }

  return [
    LINUX_PYTHON,
    LINUX_PIP,
    {
      name: 'SDL2 development libraries',
      check: dpkgInstalled(...SDL2_PACKAGES),
      install: apt(...SDL2_PACKAGES),
      required: true,
    },
    {
      name: 'GStreamer development libraries',
      check: dpkgInstalled(...GSTREAMER_PACKAGES),
      install: apt(...GSTREAMER_PACKAGES),
      required: false,
    },
    {
      name: 'FFmpeg development libraries',
      check: dpkgInstalled(...FFMPEG_PACKAGES),
      install: apt(...FFMPEG_PACKAGES),
      required: false,
    },
    {
      name: 'Python development headers',
      check: dpkgInstalled('python3-dev'),
      install: apt('python3-dev'),
      required: true,
    },
    {
      name: 'Kivy',
      check: pythonImports('python3', 'import kivy'),
      install: { command: 'pip3', args: ['install', 'kivy'] },
      required: true,
    },
  ];
}

/**
 * What the launcher needs before starting the kiosk app. Headless hosts
 * also need the virtual framebuffer.
 */
export function runDependencies(profile: Pick<DeviceProfile, 'osFamily' | 'hasDisplaySession'>): DependencySet {
  if (profile.osFamily === 'windows') {
    return [
      WINDOWS_PYTHON,
      {
        name: 'tkinter',
        check: pythonImports('python', 'import tkinter'),
        // tkinter ships with the python.org installer, not with pip
        install: { command: 'winget', args: ['install', '-e', '--id', 'Python.Python.3.12', '--force'] },
        required: true,
        remediation: 'Re-run the Python installer, choose Modify and enable "tcl/tk and IDLE"',
      },
      {
        name: 'Pillow',
        check: pythonImports('python', 'from PIL import Image, ImageTk'),
        install: pip('python', 'pillow'),
        required: true,
      },
    ];
  }

  const set: DependencySpec[] = [LINUX_PYTHON, LINUX_TKINTER, LINUX_PILLOW];
  if (!profile.hasDisplaySession) {
    set.push(LINUX_XVFB);
  }
  return set;
}
