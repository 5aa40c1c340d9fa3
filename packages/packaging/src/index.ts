/**
 * @debkit/packaging
 *
 * Debian package assembly.
 *
 * Responsibilities:
 * - Resolve name, version and architecture from the build descriptor
 * - Lay out and permission the staging tree
 * - Run dpkg-deb, optionally install, always clean up
 */

export {
  resolveMetadata,
  readManifest,
  hostArchitecture,
  archiveFileName,
  defaultBinaryPath,
  type ResolveMetadataOptions,
  type ManifestFields,
} from './metadata.js';

export {
  parseControl,
  renderControl,
  validateControl,
  type ControlFields,
  type RenderControlOptions,
} from './control.js';

export {
  buildStagingTree,
  removeStagingTree,
  withStagingTree,
  assertDedicatedStagingRoot,
  DEFAULT_INSTALL_DIR,
  CONTROL_DIR_NAME,
  type StagingOptions,
  type StagingScopeHooks,
  type StagingRootGuard,
} from './staging.js';

export {
  normalizePermissions,
  verifyPermissions,
  expectedMode,
  DIRECTORY_MODE,
  EXECUTABLE_MODE,
  CONTROL_FILE_MODE,
  type ModeMismatch,
  type TreeEntry,
} from './permissions.js';

export { DpkgDebArchiver, type Archiver, type DpkgDebArchiverConfig } from './archiver.js';
export { AptInstaller, type Installer, type AptInstallerConfig } from './installer.js';
export { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline.js';

export { DEB_EXTENSION, type PackageMetadata, type StagingTree, type OutputArchive } from './types.js';
