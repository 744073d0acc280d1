export type {
  PerEntryPackageManager,
  ManifestPackageManager,
  PackageManager,
  ServiceManager,
  DisplayManager,
  ProcessExit,
  ManagedProcess,
  SpawnOptions,
  ProcessSpawner,
  SignalListener,
  SignalSource,
  Prompter,
} from './types.js';
export { AptPackageManager } from './apt.adapter.js';
export { PipManifestPackageManager, manifestInstallCommand } from './pip-manifest.adapter.js';
export { SystemdServiceManager } from './systemd.adapter.js';
export { XrandrDisplayManager, parseConnectedOutputs } from './xrandr.adapter.js';
export { ChildProcessSpawner, processSignals } from './child-process.adapter.js';
