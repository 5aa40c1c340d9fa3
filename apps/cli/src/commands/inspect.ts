/**
 * Inspect Command
 *
 * Show the metadata and archive name a build would use, without building.
 */

import chalk from 'chalk';
import { getToolPath, isToolAvailable } from '@debkit/core';
import { archiveFileName, resolveMetadata } from '@debkit/packaging';
import { loadConfig } from '../config/index.js';
import { printFailure, printHeader, printJson, printKeyValue } from '../lib/output.js';
import { resolveBuildPlan, type BuildOptions } from './build.js';

export async function inspectCommand(options: BuildOptions): Promise<void> {
  try {
    const config = loadConfig();
    const plan = await resolveBuildPlan(options, config);
    const metadata = await resolveMetadata(plan.metadata);
    const fileName = archiveFileName(metadata);
    const dpkgDeb = await isToolAvailable('dpkgDeb');

    if (options.json) {
      printJson({
        metadata,
        archive: fileName,
        binary: plan.binaryPath,
        controlFile: plan.controlFile ?? null,
        dpkgDeb,
      });
      return;
    }

    printHeader('Package');
    printKeyValue('Name', metadata.name);
    printKeyValue('Version', metadata.version);
    printKeyValue('Architecture', metadata.architecture);
    printKeyValue('Archive', fileName);
    printKeyValue('Binary', plan.binaryPath);
    printKeyValue('Control', plan.controlFile ?? '(generated)');
    printKeyValue('Staging', plan.stagingRoot);
    printKeyValue('dpkg-deb', dpkgDeb ? getToolPath('dpkgDeb') : chalk.red('not found'));
    if (config.configFile) {
      printKeyValue('Config', config.configFile);
    }
  } catch (error) {
    process.exit(printFailure(error));
  }
}
