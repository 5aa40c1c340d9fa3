/**
 * Staging Area Builder
 *
 * Builds the ephemeral tree dpkg-deb packs:
 *
 *   <root>/
 *     usr/bin/<installName>
 *     DEBIAN/control
 *
 * and guarantees its removal through withStagingTree().
 */

import { writeFile } from 'node:fs/promises';
import { join, relative, resolve, isAbsolute, normalize, sep } from 'node:path';
import {
  CleanupError,
  ConfigError,
  ControlFileError,
  MissingArtifactError,
  StagingError,
} from '@debkit/core';
import {
  copyFile,
  ensureDir,
  getFileMode,
  isErrnoException,
  isFile,
  removePath,
  safeReadFile,
  type Logger,
} from '@debkit/utils';
import { parseControl, renderControl, validateControl } from './control.js';
import type { PackageMetadata, StagingTree } from './types.js';

export const DEFAULT_INSTALL_DIR = 'usr/bin';
export const CONTROL_DIR_NAME = 'DEBIAN';

export interface StagingOptions {
  metadata: PackageMetadata;
  binaryPath: string;
  stagingRoot: string;
  installName?: string;         // Public name, defaults to the package name
  installDir?: string;          // Relative to the staging root
  controlFile?: string;         // Static descriptor copied verbatim
  maintainer?: string;          // Used when rendering a descriptor
  description?: string;
}

export interface StagingRootGuard {
  cwd?: string;                                  // Defaults to process.cwd()
  preserve?: ReadonlyArray<string | undefined>;  // Inputs the run still reads
  outputDir?: string;
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * The staging root is removed recursively, so it must not hold anything
 * that outlives the run. Returns the resolved root.
 */
export function assertDedicatedStagingRoot(
  stagingRoot: string,
  guard: StagingRootGuard = {}
): string {
  const cwd = resolve(guard.cwd ?? process.cwd());
  const root = resolve(cwd, stagingRoot);
  const problems: string[] = [];

  if (isWithin(root, cwd)) {
    problems.push(`${root} contains the working directory ${cwd}`);
  }
  for (const path of guard.preserve ?? []) {
    if (path && isWithin(root, resolve(cwd, path))) {
      problems.push(`${root} contains ${resolve(cwd, path)}`);
    }
  }
  if (guard.outputDir && isWithin(root, resolve(cwd, guard.outputDir))) {
    problems.push(`output directory ${resolve(cwd, guard.outputDir)} is inside ${root}`);
  }

  if (problems.length > 0) {
    throw new ConfigError('stagingDir', problems);
  }
  return root;
}

/**
 * Lay out the staging tree. Fails before touching the staging root if the
 * release binary is absent or the root collides with the run's inputs.
 */
export async function buildStagingTree(options: StagingOptions): Promise<StagingTree> {
  const { metadata } = options;

  if (!(await isFile(options.binaryPath))) {
    throw new MissingArtifactError(options.binaryPath);
  }
  if (((await getFileMode(options.binaryPath)) & 0o111) === 0) {
    throw new MissingArtifactError(options.binaryPath, 'not executable');
  }

  const installDirRelative = normalizeInstallDir(options.installDir ?? DEFAULT_INSTALL_DIR);
  const installName = options.installName ?? metadata.name;
  if (installName.includes('/') || installName === '.' || installName === '..') {
    throw new ConfigError('installName', [`invalid install name "${installName}"`]);
  }

  const root = assertDedicatedStagingRoot(options.stagingRoot, {
    preserve: [options.binaryPath, options.controlFile],
  });
  const tree: StagingTree = {
    root,
    installDir: join(root, installDirRelative),
    controlDir: join(root, CONTROL_DIR_NAME),
    binaryPath: join(root, installDirRelative, installName),
    controlFilePath: join(root, CONTROL_DIR_NAME, 'control'),
  };

  try {
    // An interrupted run may have left a partial tree behind
    await removePath(root);
    await ensureDir(tree.installDir);
    await ensureDir(tree.controlDir);
  } catch (error) {
    throw new StagingError(root, describe(error), error);
  }

  try {
    await copyFile(options.binaryPath, tree.binaryPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT' && !(await isFile(options.binaryPath))) {
      throw new MissingArtifactError(options.binaryPath, 'removed while staging', error);
    }
    throw new StagingError(tree.binaryPath, describe(error), error);
  }

  await writeControlFile(options, tree.controlFilePath);

  return tree;
}

async function writeControlFile(options: StagingOptions, destination: string): Promise<void> {
  let content: string | null;
  let source: string;

  if (options.controlFile) {
    source = options.controlFile;
    try {
      content = await safeReadFile(options.controlFile);
    } catch {
      throw new ControlFileError(source, ['file is not readable']);
    }
    if (content === null) {
      throw new ControlFileError(source, ['file not found']);
    }
  } else {
    source = 'generated control';
    if (!options.maintainer || !options.description) {
      throw new ControlFileError(source, [
        'no control file given; maintainer and description are required to generate one',
      ]);
    }
    content = renderControl({
      metadata: options.metadata,
      maintainer: options.maintainer,
      description: options.description,
    });
  }

  const problems = validateControl(parseControl(content), options.metadata);
  if (problems.length > 0) {
    throw new ControlFileError(source, problems);
  }

  try {
    await writeFile(destination, content, 'utf8');
  } catch (error) {
    throw new StagingError(destination, describe(error), error);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function normalizeInstallDir(installDir: string): string {
  const relative = normalize(installDir).replace(/^[/\\]+/, '');
  if (isAbsolute(relative) || relative === '..' || relative.startsWith(`..${sep}`) || relative === '.') {
    throw new ConfigError('installDir', [`install directory must be inside the staging root`]);
  }
  if (relative.split(sep)[0] === CONTROL_DIR_NAME) {
    throw new ConfigError('installDir', [`install directory can't be inside ${CONTROL_DIR_NAME}/`]);
  }
  return relative;
}

/**
 * Remove the staging tree. Failure becomes a CleanupError, never thrown.
 */
export async function removeStagingTree(
  stagingRoot: string,
  log?: Logger
): Promise<CleanupError | undefined> {
  try {
    await removePath(stagingRoot);
    log?.debug({ stagingRoot }, 'Staging directory removed');
    return undefined;
  } catch (error) {
    const cleanupError = new CleanupError(stagingRoot, error);
    log?.warn({ err: cleanupError, stagingRoot }, cleanupError.message);
    return cleanupError;
  }
}

export interface StagingScopeHooks {
  beforeCleanup?: () => void;
  afterCleanup?: (error: CleanupError | undefined) => void;
  logger?: Logger;
  guard?: StagingRootGuard;
}

/**
 * Scoped staging root: `fn` runs with the root reserved, and the root is
 * removed afterwards on every exit path. A colliding root is rejected
 * before `fn` runs, and nothing is removed.
 */
export async function withStagingTree<T>(
  stagingRoot: string,
  fn: (stagingRoot: string) => Promise<T>,
  hooks: StagingScopeHooks = {}
): Promise<T> {
  const root = assertDedicatedStagingRoot(stagingRoot, hooks.guard);
  try {
    return await fn(root);
  } finally {
    hooks.beforeCleanup?.();
    const cleanupError = await removeStagingTree(root, hooks.logger);
    hooks.afterCleanup?.(cleanupError);
  }
}
