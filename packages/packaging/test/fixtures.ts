import { chmod, mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CommandRunner } from '@debkit/utils';

export const CONTROL = [
  'Package: roextract',
  'Version: 1.0.4',
  'Architecture: amd64',
  'Maintainer: Test Maintainer <maintainer@example.com>',
  'Description: Extract cached assets',
  ' Pulls cached files out of a local cache directory.',
  '',
].join('\n');

export const BINARY_CONTENT = '#!/bin/sh\necho roextract\n';

export interface ProjectFixture {
  dir: string;
  manifestPath: string;
  binaryPath: string;
  controlPath: string;
  stagingRoot: string;
  outputDir: string;
}

/**
 * A cargo-style project: Cargo.toml, a built release binary and a
 * static control file, all under a fresh temp directory.
 */
export async function createProject(): Promise<ProjectFixture> {
  const dir = await mkdtemp(join(tmpdir(), 'debkit-project-'));
  const manifestPath = join(dir, 'Cargo.toml');
  const binaryPath = join(dir, 'target', 'release', 'RoExtract');
  const controlPath = join(dir, 'packages', 'debian', 'DEBIAN', 'control');

  await writeFile(manifestPath, '[package]\nname = "RoExtract"\nversion = "1.0.4"\nedition = "2021"\n');

  await mkdir(dirname(binaryPath), { recursive: true });
  await writeFile(binaryPath, BINARY_CONTENT);
  await chmod(binaryPath, 0o700);

  await mkdir(dirname(controlPath), { recursive: true });
  await writeFile(controlPath, CONTROL);

  return {
    dir,
    manifestPath,
    binaryPath,
    controlPath,
    stagingRoot: join(dir, 'packages', 'debian', 'staging'),
    outputDir: join(dir, 'out'),
  };
}

/**
 * Stands in for dpkg-deb: writes the requested output path, or a
 * truncated one and a failing exit code.
 */
export function fakeDpkgDeb(
  options: { exitCode?: number; onBuild?: (stagingRoot: string) => Promise<void> } = {}
): CommandRunner {
  return async (_command, args) => {
    const outputPath = args[args.length - 1] ?? '';
    const stagingRoot = args[args.length - 2] ?? '';
    await options.onBuild?.(stagingRoot);

    const exitCode = options.exitCode ?? 0;
    await writeFile(outputPath, exitCode === 0 ? '!<arch>\n' : '!<ar');

    return {
      exitCode,
      stdout: exitCode === 0 ? `dpkg-deb: building package in '${outputPath}'.` : '',
      stderr: exitCode === 0 ? '' : 'dpkg-deb: error: control directory has bad permissions',
      duration: 1,
      timedOut: false,
    };
  };
}
