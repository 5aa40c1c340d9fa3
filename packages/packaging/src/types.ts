/**
 * Packaging Types
 */

export interface PackageMetadata {
  readonly name: string;
  readonly version: string;        // Debian version string, kept verbatim
  readonly architecture: string;   // dpkg architecture, e.g. amd64
}

export interface StagingTree {
  root: string;
  installDir: string;       // <root>/usr/bin
  controlDir: string;       // <root>/DEBIAN
  binaryPath: string;       // <installDir>/<installName>
  controlFilePath: string;  // <controlDir>/control
}

export interface OutputArchive {
  path: string;
  fileName: string;
  metadata: PackageMetadata;
}

export const DEB_EXTENSION = 'deb';
