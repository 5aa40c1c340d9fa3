/**
 * Installer
 *
 * Installing is a capability handed to the pipeline, not something it does
 * on its own. The apt-backed implementation escalates through sudo and may
 * prompt on the terminal.
 */

import { resolve } from 'node:path';
import { getToolPath, InstallError } from '@debkit/core';
import { executeCommand, type CommandRunner, type Logger } from '@debkit/utils';

export interface Installer {
  readonly name: string;
  install(archivePath: string): Promise<void>;
}

export interface AptInstallerConfig {
  aptPath?: string;
  sudoPath?: string;
  runner?: CommandRunner;
  assumeYes?: boolean;      // apt --yes, for non-interactive runs
  isRoot?: boolean;         // Skip sudo; defaults to checking the uid
  logger?: Logger;
}

export class AptInstaller implements Installer {
  readonly name = 'apt';
  private readonly config: AptInstallerConfig;

  constructor(config: AptInstallerConfig = {}) {
    this.config = config;
  }

  /**
   * Command line for installing a local archive. apt only treats the
   * argument as a file when it contains a slash, so the path is made absolute.
   */
  buildCommand(archivePath: string): { command: string; args: string[] } {
    const apt = this.config.aptPath ?? getToolPath('apt');
    const aptArgs = ['install'];
    if (this.config.assumeYes) {
      aptArgs.push('--yes');
    }
    aptArgs.push(resolve(archivePath));

    const isRoot = this.config.isRoot ?? process.getuid?.() === 0;
    if (isRoot) {
      return { command: apt, args: aptArgs };
    }
    return {
      command: this.config.sudoPath ?? getToolPath('sudo'),
      args: [apt, ...aptArgs],
    };
  }

  async install(archivePath: string): Promise<void> {
    const { command, args } = this.buildCommand(archivePath);
    const runner = this.config.runner ?? executeCommand;
    this.config.logger?.debug({ command, args }, 'Running installer');

    let exitCode: number;
    try {
      // Interactive: sudo may ask for a password, apt for confirmation
      const result = await runner(command, args, { timeout: 0, interactive: true });
      exitCode = result.exitCode;
    } catch (error) {
      throw new InstallError(
        archivePath,
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    if (exitCode !== 0) {
      throw new InstallError(archivePath, `${command} exited with code ${exitCode}`);
    }
  }
}
