#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for debkit.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '@debkit/utils';

// Commands
import { buildCommand } from './commands/build.js';
import { installCommand } from './commands/install.js';
import { inspectCommand } from './commands/inspect.js';

const program = new Command();

program
  .name('debkit')
  .description('Package a prebuilt release binary as a Debian archive')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging');

program.hook('preAction', () => {
  // Keep pino quiet under the CLI's own output unless asked
  if (!process.env['LOG_LEVEL']) {
    logger.level = program.opts<{ debug?: boolean }>().debug ? 'debug' : 'warn';
  }
});

/**
 * Options shared by build and inspect
 */
function withPackageOptions(command: Command): Command {
  return command
    .option('-m, --manifest <path>', 'Build descriptor holding the version (Cargo.toml or package.json)')
    .option('-n, --name <name>', 'Package name (default: from the manifest)')
    .option('--pkg-version <version>', 'Override the manifest version')
    .option('-a, --arch <arch>', 'Target architecture (default: host)')
    .option('-b, --binary <path>', 'Release binary (default: target/release/<crate name>)')
    .option('--install-name <name>', 'Installed file name (default: package name)')
    .option('--install-dir <dir>', 'Install directory inside the package')
    .option('-c, --control <path>', 'Static DEBIAN/control file to copy')
    .option('--maintainer <maintainer>', 'Maintainer for a generated control file')
    .option('--description <text>', 'Description for a generated control file')
    .option('--staging-dir <dir>', 'Staging directory (removed after the run)')
    .option('-o, --output-dir <dir>', 'Where to write the .deb')
    .option('--json', 'Output in JSON format');
}

// ============================================
// PACKAGING COMMANDS
// ============================================

withPackageOptions(
  program
    .command('build')
    .description('Build the .deb from the release binary')
)
  .option('-i, --install', 'Install the package after building')
  .option('-y, --yes', 'Pass --yes to apt when installing')
  .action(buildCommand);

withPackageOptions(
  program
    .command('inspect')
    .description('Show resolved metadata and archive name without building')
).action(inspectCommand);

program
  .command('install <archive>')
  .description('Install a built .deb with apt')
  .option('-y, --yes', 'Pass --yes to apt')
  .action(installCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('debkit --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
