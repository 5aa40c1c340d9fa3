/**
 * Packaging Pipeline
 *
 * Resolve metadata → build staging tree → normalize permissions →
 * archive → (install) → clean up.
 *
 * Stages from staging onwards run inside withStagingTree(), so the staging
 * root is removed whatever happens. Fatal errors are rethrown after cleanup;
 * install and cleanup failures are reported on the result. A staging root
 * that holds the run's inputs or output is rejected while resolving.
 */

import { randomUUID } from 'node:crypto';
import {
  CleanupError,
  InstallError,
  PermissionError,
  PipelineStateMachine,
  type PipelineState,
  type PipelineStateTransition,
} from '@debkit/core';
import { logger as rootLogger, type Logger } from '@debkit/utils';
import { DpkgDebArchiver, type Archiver } from './archiver.js';
import type { Installer } from './installer.js';
import { resolveMetadata, type ResolveMetadataOptions } from './metadata.js';
import { normalizePermissions, verifyPermissions } from './permissions.js';
import {
  assertDedicatedStagingRoot,
  buildStagingTree,
  withStagingTree,
  type StagingRootGuard,
} from './staging.js';
import type { OutputArchive, PackageMetadata } from './types.js';

export interface PipelineOptions {
  metadata: ResolveMetadataOptions;
  binaryPath: string;
  stagingRoot: string;
  outputDir?: string;
  installName?: string;
  installDir?: string;
  controlFile?: string;
  maintainer?: string;
  description?: string;

  archiver?: Archiver;
  installer?: Installer;    // Install only happens when one is supplied
  logger?: Logger;
  runId?: string;
  onTransition?: (transition: PipelineStateTransition) => void;
}

export interface PipelineResult {
  runId: string;
  state: PipelineState;
  metadata: PackageMetadata;
  archive: OutputArchive;
  installed: boolean;
  installError?: InstallError;
  cleanupError?: CleanupError;
  history: ReadonlyArray<PipelineStateTransition>;
}

interface StageOutcome {
  archive: OutputArchive;
  installed: boolean;
  installError?: InstallError;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const runId = options.runId ?? randomUUID();
  let log = (options.logger ?? rootLogger).child({ runId });

  const machine = new PipelineStateMachine(runId, (transition) => {
    log.debug({ from: transition.from, to: transition.to, reason: transition.reason }, 'Pipeline transition');
    options.onTransition?.(transition);
  });

  const outputDir = options.outputDir ?? process.cwd();
  const guard: StagingRootGuard = {
    preserve: [options.binaryPath, options.controlFile, options.metadata.manifestPath],
    outputDir,
  };

  let metadata: PackageMetadata;
  try {
    assertDedicatedStagingRoot(options.stagingRoot, guard);
    metadata = await resolveMetadata(options.metadata);
  } catch (error) {
    machine.transitionTo('FAILED', describe(error));
    throw error;
  }

  log = log.child({ package: metadata.name, version: metadata.version });
  log.info({ architecture: metadata.architecture }, 'Resolved package metadata');

  const archiver = options.archiver ?? new DpkgDebArchiver({ logger: log });
  const cleanup: { error?: CleanupError } = {};

  machine.transitionTo('STAGING');

  let outcome: StageOutcome;
  try {
    outcome = await withStagingTree(
      options.stagingRoot,
      async (stagingRoot): Promise<StageOutcome> => {
        const tree = await buildStagingTree({
          metadata,
          stagingRoot,
          binaryPath: options.binaryPath,
          installName: options.installName,
          installDir: options.installDir,
          controlFile: options.controlFile,
          maintainer: options.maintainer,
          description: options.description,
        });
        log.info({ stagingRoot: tree.root }, 'Staging tree built');

        machine.transitionTo('NORMALIZING');
        const count = await normalizePermissions(tree);
        const [mismatch] = await verifyPermissions(tree);
        if (mismatch) {
          throw new PermissionError(mismatch.path, mismatch.expected);
        }
        log.debug({ entries: count }, 'Permissions normalized');

        machine.transitionTo('ARCHIVING');
        const archive = await archiver.build(tree, metadata, outputDir);
        log.info({ archive: archive.path }, 'Archive built');

        const installer = options.installer;
        if (!installer) {
          return { archive, installed: false };
        }

        machine.transitionTo('INSTALLING');
        try {
          await installer.install(archive.path);
          log.info({ installer: installer.name }, 'Package installed');
          return { archive, installed: true };
        } catch (error) {
          // The archive stays valid for a manual install
          const installError = error instanceof InstallError
            ? error
            : new InstallError(archive.path, describe(error), error);
          log.error({ err: installError }, installError.message);
          return { archive, installed: false, installError };
        }
      },
      {
        beforeCleanup: () => {
          machine.transitionTo('CLEANING_UP');
        },
        afterCleanup: (error) => {
          cleanup.error = error;
        },
        logger: log,
        guard,
      }
    );
  } catch (error) {
    machine.transitionTo('FAILED', describe(error));
    log.error({ err: error }, 'Packaging failed');
    throw error;
  }

  machine.transitionTo('DONE');

  return {
    runId,
    state: machine.getState(),
    metadata,
    ...outcome,
    cleanupError: cleanup.error,
    history: machine.getHistory(),
  };
}
