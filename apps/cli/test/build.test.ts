import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ConfigError } from '@debkit/core';
import { loadConfig } from '../src/config/index.js';
import { DEFAULT_CONTROL_FILE, resolveBuildPlan } from '../src/commands/build.js';

describe('resolveBuildPlan', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'debkit-plan-'));
    await writeFile(join(dir, 'Cargo.toml'), '[package]\nname = "RoExtract"\nversion = "1.0.4"\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('derives every path from the project directory', async () => {
    const controlPath = join(dir, DEFAULT_CONTROL_FILE);
    await mkdir(dirname(controlPath), { recursive: true });
    await writeFile(controlPath, 'Package: roextract\n');

    const plan = await resolveBuildPlan({}, loadConfig(dir, {}), dir);

    expect(plan).toEqual({
      metadata: {
        manifestPath: join(dir, 'Cargo.toml'),
        name: undefined,
        version: undefined,
        architecture: undefined,
      },
      binaryPath: join(dir, 'target', 'release', 'RoExtract'),
      stagingRoot: join(dir, 'packages', 'debian', 'staging'),
      outputDir: dir,
      installName: undefined,
      installDir: 'usr/bin',
      controlFile: controlPath,
      maintainer: undefined,
      description: undefined,
    });
  });

  it('lets flags win over config', async () => {
    const config = { ...loadConfig(dir, {}), binary: 'build/tool', outputDir: 'from-config' };

    const plan = await resolveBuildPlan(
      { binary: 'bin/tool', outputDir: 'from-flag', pkgVersion: '1.0.5', arch: 'arm64', maintainer: 'M <m@example.com>' },
      config,
      dir
    );

    expect(plan.binaryPath).toBe(join(dir, 'bin', 'tool'));
    expect(plan.outputDir).toBe(join(dir, 'from-flag'));
    expect(plan.metadata.version).toBe('1.0.5');
    expect(plan.metadata.architecture).toBe('arm64');
    expect(plan.maintainer).toBe('M <m@example.com>');
    expect(plan.controlFile).toBeUndefined();
  });

  it('needs an explicit binary for non-cargo manifests', async () => {
    await writeFile(join(dir, 'package.json'), JSON.stringify({ name: 'tool', version: '1.0.0' }));

    await expect(
      resolveBuildPlan({ manifest: 'package.json' }, loadConfig(dir, {}), dir)
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it.each([
    ['the project directory', '.'],
    ['a parent of the project', '..'],
    ['the directory holding the release binary', 'target'],
  ])('refuses %s as the staging directory', async (_label, stagingDir) => {
    await expect(
      resolveBuildPlan({ stagingDir }, loadConfig(dir, {}), dir)
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('refuses an output directory inside the staging directory', async () => {
    await expect(
      resolveBuildPlan(
        { stagingDir: 'staging', outputDir: 'staging/out' },
        loadConfig(dir, {}),
        dir
      )
    ).rejects.toThrow(`output directory ${join(dir, 'staging', 'out')} is inside ${join(dir, 'staging')}`);
  });
});
