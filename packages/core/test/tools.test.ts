import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getToolsConfig } from '../src/config/tools.js';

describe('getToolsConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'debkit-tools-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to bare names on the PATH', () => {
    const config = getToolsConfig({});

    expect(config.dpkgDeb).toEqual({
      name: 'dpkg-deb',
      envVar: 'DPKG_DEB_PATH',
      resolvedPath: 'dpkg-deb',
      fromEnv: false,
    });
    expect(config.apt.resolvedPath).toBe('apt');
    expect(config.sudo.resolvedPath).toBe('sudo');
  });

  it('prefers an environment override that exists', async () => {
    const fake = join(dir, 'dpkg-deb');
    await writeFile(fake, '');

    const config = getToolsConfig({ DPKG_DEB_PATH: fake });

    expect(config.dpkgDeb.resolvedPath).toBe(fake);
    expect(config.dpkgDeb.fromEnv).toBe(true);
  });

  it('ignores an environment override pointing nowhere', () => {
    const config = getToolsConfig({ APT_PATH: join(dir, 'missing-apt') });
    expect(config.apt.resolvedPath).toBe('apt');
  });
});
