/**
 * Metadata Resolver
 *
 * Determines package name, version and architecture before anything is
 * written to disk. The version comes from the application's own build
 * descriptor (Cargo.toml or package.json) so it can't drift from the
 * binary being packaged.
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { MetadataError } from '@debkit/core';
import { isErrnoException, isNonEmptyString } from '@debkit/utils';
import { DEB_EXTENSION, type PackageMetadata } from './types.js';

export interface ResolveMetadataOptions {
  manifestPath?: string;
  name?: string;
  version?: string;         // Skips reading the version from the manifest
  architecture?: string;
  hostArch?: string;        // Defaults to process.arch
}

const PACKAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9.+-]+$/;
const VERSION_PATTERN = /^[0-9][A-Za-z0-9.+~:-]*$/;
const ARCHITECTURE_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Node's process.arch → dpkg architecture
 */
const HOST_ARCHITECTURES: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64',
  ia32: 'i386',
  arm: 'armhf',
  ppc64: 'ppc64el',
  s390x: 's390x',
  riscv64: 'riscv64',
};

const cargoManifestSchema = z.object({
  package: z.object({
    name: z.string().optional(),
    version: z.unknown().optional(),
  }).optional(),
  workspace: z.object({
    package: z.object({
      version: z.string().optional(),
    }).optional(),
  }).optional(),
});

const npmManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

export interface ManifestFields {
  name?: string;
  version?: string;
}

export function hostArchitecture(arch: string = process.arch): string | undefined {
  return HOST_ARCHITECTURES[arch];
}

/**
 * Read name and version from a build descriptor. Pure read.
 */
export async function readManifest(manifestPath: string): Promise<ManifestFields> {
  let content: string;
  try {
    content = await readFile(manifestPath, 'utf8');
  } catch (error) {
    const reason = isErrnoException(error) && error.code === 'ENOENT'
      ? 'file not found'
      : 'file is not readable';
    throw new MetadataError(manifestPath, reason, error);
  }

  const fileName = basename(manifestPath).toLowerCase();
  if (fileName.endsWith('.toml')) {
    return parseCargoManifest(manifestPath, content);
  }
  if (fileName.endsWith('.json')) {
    return parseNpmManifest(manifestPath, content);
  }
  throw new MetadataError(manifestPath, 'unsupported build descriptor (expected Cargo.toml or package.json)');
}

function parseCargoManifest(source: string, content: string): ManifestFields {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new MetadataError(source, 'invalid TOML', error);
  }

  const parsed = cargoManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MetadataError(source, parsed.error.issues.map((i) => i.message).join(', '));
  }

  const { package: pkg, workspace } = parsed.data;
  // `version.workspace = true` inherits from [workspace.package]
  const ownVersion = pkg?.version;
  const version = isNonEmptyString(ownVersion) ? ownVersion : workspace?.package?.version;

  return { name: pkg?.name, version };
}

function parseNpmManifest(source: string, content: string): ManifestFields {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new MetadataError(source, 'invalid JSON', error);
  }

  const parsed = npmManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MetadataError(source, parsed.error.issues.map((i) => i.message).join(', '));
  }

  // Scoped npm names can't be Debian package names as-is
  const name = parsed.data.name?.replace(/^@[^/]+\//, '');
  return { name, version: parsed.data.version };
}

/**
 * Resolve the metadata for this run
 */
export async function resolveMetadata(
  options: ResolveMetadataOptions
): Promise<PackageMetadata> {
  const source = options.manifestPath ?? 'options';
  const needsManifest = !options.version || !options.name;

  let manifest: ManifestFields = {};
  if (needsManifest) {
    if (!options.manifestPath) {
      throw new MetadataError(source, 'no build descriptor given and no explicit name/version');
    }
    manifest = await readManifest(options.manifestPath);
  }

  const name = options.name ?? manifest.name?.toLowerCase();
  const version = options.version ?? manifest.version;
  const architecture = options.architecture ?? hostArchitecture(options.hostArch);

  if (!isNonEmptyString(name)) {
    throw new MetadataError(source, 'package name is missing');
  }
  if (!PACKAGE_NAME_PATTERN.test(name)) {
    throw new MetadataError(source, `"${name}" is not a valid Debian package name`);
  }
  if (!isNonEmptyString(version)) {
    throw new MetadataError(source, 'version is missing');
  }
  if (!VERSION_PATTERN.test(version)) {
    throw new MetadataError(source, `"${version}" is not a valid Debian version`);
  }
  if (!isNonEmptyString(architecture)) {
    throw new MetadataError(source, `unsupported host architecture "${options.hostArch ?? process.arch}"`);
  }
  if (!ARCHITECTURE_PATTERN.test(architecture)) {
    throw new MetadataError(source, `"${architecture}" is not a valid architecture`);
  }

  return Object.freeze({ name, version, architecture });
}

/**
 * `<name>_<version>_<arch>.deb`. The epoch is left out of the file name,
 * as dpkg-name does.
 */
export function archiveFileName(metadata: PackageMetadata): string {
  const version = metadata.version.replace(/^\d+:/, '');
  return `${metadata.name}_${version}_${metadata.architecture}.${DEB_EXTENSION}`;
}

/**
 * Where cargo leaves the release binary for a Cargo.toml manifest.
 * Other descriptors have no convention, so the caller must say.
 */
export async function defaultBinaryPath(manifestPath: string): Promise<string | undefined> {
  if (!basename(manifestPath).toLowerCase().endsWith('.toml')) {
    return undefined;
  }
  const { name } = await readManifest(manifestPath);
  return name ? join(dirname(manifestPath), 'target', 'release', name) : undefined;
}
