/**
 * Install Command
 *
 * Install an already-built archive through apt.
 */

import { resolve } from 'node:path';
import { MissingArtifactError } from '@debkit/core';
import { AptInstaller } from '@debkit/packaging';
import { isFile, logger } from '@debkit/utils';
import { printFailure, printSuccess } from '../lib/output.js';

interface InstallOptions {
  yes?: boolean;
}

export async function installCommand(
  archive: string,
  options: InstallOptions
): Promise<void> {
  const archivePath = resolve(archive);

  try {
    if (!(await isFile(archivePath))) {
      throw new MissingArtifactError(archivePath);
    }
    await new AptInstaller({ assumeYes: options.yes, logger }).install(archivePath);
  } catch (error) {
    process.exit(printFailure(error));
  }

  printSuccess(`Installed ${archivePath}`);
}
