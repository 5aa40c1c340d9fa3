/**
 * Package Archiver
 *
 * Runs dpkg-deb against the staging tree. The only stage with a real
 * external-process boundary.
 */

import { join, resolve } from 'node:path';
import { ArchiveBuildError, getToolPath } from '@debkit/core';
import {
  ensureDir,
  executeCommand,
  isFile,
  removePath,
  type CommandRunner,
  type Logger,
} from '@debkit/utils';
import { archiveFileName } from './metadata.js';
import type { OutputArchive, PackageMetadata, StagingTree } from './types.js';

export interface Archiver {
  build(tree: StagingTree, metadata: PackageMetadata, outputDir: string): Promise<OutputArchive>;
}

export interface DpkgDebArchiverConfig {
  dpkgDebPath?: string;
  runner?: CommandRunner;
  rootOwnerGroup?: boolean;   // Files owned by root:root inside the archive
  logger?: Logger;
}

export class DpkgDebArchiver implements Archiver {
  private readonly config: DpkgDebArchiverConfig;

  constructor(config: DpkgDebArchiverConfig = {}) {
    this.config = config;
  }

  /**
   * Build args for dpkg-deb --build
   */
  buildArgs(stagingRoot: string, outputPath: string): string[] {
    const args = ['--build'];
    if (this.config.rootOwnerGroup ?? true) {
      args.push('--root-owner-group');
    }
    args.push(stagingRoot, outputPath);
    return args;
  }

  async build(
    tree: StagingTree,
    metadata: PackageMetadata,
    outputDir: string
  ): Promise<OutputArchive> {
    const fileName = archiveFileName(metadata);
    const outputPath = join(resolve(outputDir), fileName);
    const command = this.config.dpkgDebPath ?? getToolPath('dpkgDeb');
    const runner = this.config.runner ?? executeCommand;
    const args = this.buildArgs(tree.root, outputPath);

    await ensureDir(resolve(outputDir));
    this.config.logger?.debug({ command, args }, 'Running archiver');

    let exitCode: number;
    let stderr: string;
    try {
      // No timeout: the archiver runs as long as it needs
      const result = await runner(command, args, { timeout: 0 });
      exitCode = result.exitCode;
      stderr = result.stderr;
    } catch (error) {
      await removePath(outputPath);
      throw new ArchiveBuildError(command, 127, error instanceof Error ? error.message : String(error), error);
    }

    if (exitCode !== 0) {
      // Don't leave a truncated archive behind
      await removePath(outputPath);
      throw new ArchiveBuildError(command, exitCode, stderr);
    }

    if (!(await isFile(outputPath))) {
      throw new ArchiveBuildError(command, exitCode, `no archive written at ${outputPath}`);
    }

    return { path: outputPath, fileName, metadata };
  }
}
