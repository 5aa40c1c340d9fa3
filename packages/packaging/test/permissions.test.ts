import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { PermissionError } from '@debkit/core';
import { getFileMode } from '@debkit/utils';
import { normalizePermissions, verifyPermissions } from '../src/permissions.js';
import { buildStagingTree } from '../src/staging.js';
import type { StagingTree } from '../src/types.js';
import { createProject, type ProjectFixture } from './fixtures.js';

const metadata = { name: 'roextract', version: '1.0.4', architecture: 'amd64' };

describe('normalizePermissions', () => {
  let project: ProjectFixture;
  let tree: StagingTree;

  beforeEach(async () => {
    project = await createProject();
    tree = await buildStagingTree({
      metadata,
      binaryPath: project.binaryPath,
      stagingRoot: project.stagingRoot,
      controlFile: project.controlPath,
    });
    // Modes dpkg-deb would reject
    await chmod(tree.binaryPath, 0o600);
    await chmod(tree.controlFilePath, 0o666);
    await chmod(tree.controlDir, 0o775);
    await chmod(tree.root, 0o777);
  });

  afterEach(async () => {
    await rm(project.dir, { recursive: true, force: true });
  });

  it('sets the exact modes dpkg-deb validates', async () => {
    const count = await normalizePermissions(tree);

    expect(count).toBe(6);
    expect(await getFileMode(tree.root)).toBe(0o755);
    expect(await getFileMode(join(tree.root, 'usr'))).toBe(0o755);
    expect(await getFileMode(tree.installDir)).toBe(0o755);
    expect(await getFileMode(tree.binaryPath)).toBe(0o755);
    expect(await getFileMode(tree.controlDir)).toBe(0o755);
    expect(await getFileMode(tree.controlFilePath)).toBe(0o644);
  });

  it('leaves nothing for verifyPermissions to report', async () => {
    await normalizePermissions(tree);
    expect(await verifyPermissions(tree)).toEqual([]);
  });

  it('reports a drifted control file', async () => {
    await normalizePermissions(tree);
    await chmod(tree.controlFilePath, 0o664);

    expect(await verifyPermissions(tree)).toEqual([
      { path: tree.controlFilePath, expected: 0o644, actual: 0o664 },
    ]);
  });

  it('fails with PermissionError when a mode cannot be set', async () => {
    await rm(tree.root, { recursive: true, force: true });

    await expect(normalizePermissions(tree)).rejects.toBeInstanceOf(PermissionError);
  });
});
