/**
 * Permission Normalizer
 *
 * dpkg-deb refuses to build when the control area or its files carry the
 * wrong modes, so every entry in the staging tree gets an exact mode:
 * directories 0755, installed payload 0755, control file 0644.
 */

import { chmod, readdir } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { PermissionError } from '@debkit/core';
import { getFileMode } from '@debkit/utils';
import type { StagingTree } from './types.js';

export const DIRECTORY_MODE = 0o755;
export const EXECUTABLE_MODE = 0o755;
export const CONTROL_FILE_MODE = 0o644;

export interface ModeMismatch {
  path: string;
  expected: number;
  actual: number;
}

export interface TreeEntry {
  path: string;
  isDirectory: boolean;
}

async function walk(dir: string): Promise<TreeEntry[]> {
  const entries: TreeEntry[] = [{ path: dir, isDirectory: true }];
  for (const dirent of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      entries.push(...(await walk(path)));
    } else {
      entries.push({ path, isDirectory: false });
    }
  }
  return entries;
}

function isInside(parent: string, path: string): boolean {
  const rel = relative(parent, path);
  return rel !== '' && !rel.startsWith(`..${sep}`) && rel !== '..';
}

/**
 * Mode an entry must have for dpkg-deb to accept the tree
 */
export function expectedMode(tree: StagingTree, entry: TreeEntry): number {
  if (entry.isDirectory) return DIRECTORY_MODE;
  if (entry.path === tree.controlFilePath) return CONTROL_FILE_MODE;
  if (isInside(tree.installDir, entry.path)) return EXECUTABLE_MODE;
  return CONTROL_FILE_MODE;
}

/**
 * Set exact modes across the staging tree. A refused chmod is fatal.
 */
export async function normalizePermissions(tree: StagingTree): Promise<number> {
  // Root first so an over-restrictive leftover mode can't block the walk
  await setMode(tree.root, DIRECTORY_MODE);

  const entries = await walk(tree.root);
  for (const entry of entries) {
    await setMode(entry.path, expectedMode(tree, entry));
  }
  return entries.length;
}

async function setMode(path: string, mode: number): Promise<void> {
  try {
    await chmod(path, mode);
  } catch (error) {
    throw new PermissionError(path, mode, error);
  }
}

/**
 * List every entry whose mode differs from what dpkg-deb expects
 */
export async function verifyPermissions(tree: StagingTree): Promise<ModeMismatch[]> {
  const mismatches: ModeMismatch[] = [];
  for (const entry of await walk(tree.root)) {
    const expected = expectedMode(tree, entry);
    const actual = await getFileMode(entry.path);
    if (actual !== expected) {
      mismatches.push({ path: entry.path, expected, actual });
    }
  }
  return mismatches;
}
