/**
 * Release packaging types
 */

export interface PackageManifest {
  name: string;
  version: string;
  /** Paths relative to the source directory */
  files: readonly string[];
}

export interface PackageResult {
  archivePath: string;
  /** `{name}_{version}`, the archive's only top-level directory */
  rootDir: string;
  fileCount: number;
}

export interface CleanupReport {
  removed: string[];
  failed: Array<{ path: string; error: string }>;
}
