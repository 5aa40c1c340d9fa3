/**
 * Build Command
 *
 * Package the release binary into a .deb, optionally installing it.
 */

import ora from 'ora';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, type PipelineState } from '@debkit/core';
import {
  AptInstaller,
  assertDedicatedStagingRoot,
  defaultBinaryPath,
  runPipeline,
  type PipelineOptions,
  type PipelineResult,
} from '@debkit/packaging';
import { logger } from '@debkit/utils';
import { loadConfig, type CliConfig } from '../config/index.js';
import { printFailure, printJson, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export const DEFAULT_CONTROL_FILE = 'packages/debian/DEBIAN/control';

export interface BuildOptions {
  manifest?: string;
  name?: string;
  pkgVersion?: string;
  arch?: string;
  binary?: string;
  installName?: string;
  installDir?: string;
  control?: string;
  maintainer?: string;
  description?: string;
  stagingDir?: string;
  outputDir?: string;
  install?: boolean;
  yes?: boolean;
  json?: boolean;
}

export type BuildPlan = Omit<PipelineOptions, 'archiver' | 'installer' | 'logger' | 'onTransition' | 'runId'>;

const STAGE_LABELS: Record<PipelineState, string> = {
  RESOLVING: 'Resolving package metadata...',
  STAGING: 'Building staging tree...',
  NORMALIZING: 'Normalizing permissions...',
  ARCHIVING: 'Running dpkg-deb...',
  INSTALLING: 'Installing package...',
  CLEANING_UP: 'Removing staging tree...',
  DONE: 'Done',
  FAILED: 'Failed',
};

/**
 * Merge flags over config and resolve every path against `cwd`
 */
export async function resolveBuildPlan(
  options: BuildOptions,
  config: CliConfig,
  cwd: string = process.cwd()
): Promise<BuildPlan> {
  const manifestPath = resolve(cwd, options.manifest ?? config.manifest);

  const binary = options.binary ?? config.binary;
  const binaryPath = binary ? resolve(cwd, binary) : await defaultBinaryPath(manifestPath);
  if (!binaryPath) {
    throw new ConfigError('binary', [
      `no release binary path given and none can be derived from ${manifestPath}`,
    ]);
  }

  let controlFile = options.control ?? config.controlFile;
  if (!controlFile && existsSync(resolve(cwd, DEFAULT_CONTROL_FILE))) {
    controlFile = DEFAULT_CONTROL_FILE;
  }

  const controlPath = controlFile ? resolve(cwd, controlFile) : undefined;
  const outputDir = resolve(cwd, options.outputDir ?? config.outputDir);
  const stagingRoot = assertDedicatedStagingRoot(options.stagingDir ?? config.stagingDir, {
    cwd,
    preserve: [binaryPath, controlPath, manifestPath],
    outputDir,
  });

  return {
    metadata: {
      manifestPath,
      name: options.name ?? config.name,
      version: options.pkgVersion,
      architecture: options.arch ?? config.architecture,
    },
    binaryPath,
    stagingRoot,
    outputDir,
    installName: options.installName ?? config.installName,
    installDir: options.installDir ?? config.installDir,
    controlFile: controlPath,
    maintainer: options.maintainer ?? config.maintainer,
    description: options.description ?? config.description,
  };
}

export async function buildCommand(options: BuildOptions): Promise<void> {
  const spinner = ora(STAGE_LABELS.RESOLVING).start();
  let result: PipelineResult;

  try {
    const plan = await resolveBuildPlan(options, loadConfig());
    result = await runPipeline({
      ...plan,
      installer: options.install
        ? new AptInstaller({ assumeYes: options.yes, logger })
        : undefined,
      onTransition: (transition) => {
        if (transition.to === 'INSTALLING') {
          // sudo and apt need the terminal
          spinner.stop();
          return;
        }
        spinner.text = STAGE_LABELS[transition.to];
      },
    });
  } catch (error) {
    spinner.fail('Packaging failed');
    process.exit(printFailure(error));
  }

  spinner.stop();

  if (options.json) {
    printJson({
      archive: result.archive.path,
      metadata: result.metadata,
      installed: result.installed,
      installError: result.installError?.message,
      cleanupError: result.cleanupError?.message,
    });
  } else {
    printSuccess(`Built ${result.archive.fileName}`);
    printKeyValue('Package', result.metadata.name);
    printKeyValue('Version', result.metadata.version);
    printKeyValue('Architecture', result.metadata.architecture);
    printKeyValue('Archive', result.archive.path);
    if (result.installed) {
      printSuccess('Package installed');
    }
  }

  if (result.cleanupError) {
    printWarning(`${result.cleanupError.message}; remove it before the next run`);
  }

  if (result.installError) {
    printWarning(result.installError.message);
    printWarning(`The archive is intact: install it manually with "debkit install ${result.archive.path}"`);
    process.exit(result.installError.exitCode);
  }
}
