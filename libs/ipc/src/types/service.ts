/**
 * Service registration and autostart types
 */

export interface ServiceDescriptor {
  /** `<runtime> <entry point>`, both absolute */
  execPath: string;
  workingDirectory: string;
  runAsUser: string;
  autostart: boolean;
}

export interface ServiceRegistration {
  descriptor: ServiceDescriptor;
  /** Absolute path of the written unit file */
  unitPath: string;
  /** Whether the operator asked to start the service now */
  started: boolean;
  /** Result of the post-start probe; undefined when not started or unknown */
  active?: boolean;
}

export interface AutostartEntry {
  path: string;
  exec: string;
}
