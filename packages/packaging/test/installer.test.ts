import { describe, it, expect, vi } from 'vitest';
import { resolve } from 'node:path';
import { InstallError } from '@debkit/core';
import { AptInstaller } from '../src/installer.js';

const ok = { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false };

describe('AptInstaller', () => {
  it('escalates through sudo when not root', () => {
    const installer = new AptInstaller({ aptPath: 'apt', sudoPath: 'sudo', isRoot: false });

    expect(installer.buildCommand('roextract_1.0.4_amd64.deb')).toEqual({
      command: 'sudo',
      args: ['apt', 'install', resolve('roextract_1.0.4_amd64.deb')],
    });
  });

  it('runs apt directly as root and passes --yes when asked', () => {
    const installer = new AptInstaller({ aptPath: 'apt', isRoot: true, assumeYes: true });

    expect(installer.buildCommand('/out/tool_1.0.0_amd64.deb')).toEqual({
      command: 'apt',
      args: ['install', '--yes', '/out/tool_1.0.0_amd64.deb'],
    });
  });

  it('runs interactively with no timeout', async () => {
    const runner = vi.fn().mockResolvedValue(ok);
    const installer = new AptInstaller({ aptPath: 'apt', isRoot: true, runner });

    await installer.install('/out/tool_1.0.0_amd64.deb');

    expect(runner).toHaveBeenCalledWith('apt', ['install', '/out/tool_1.0.0_amd64.deb'], {
      timeout: 0,
      interactive: true,
    });
  });

  it('reports a non-zero exit as InstallError', async () => {
    const runner = vi.fn().mockResolvedValue({ ...ok, exitCode: 100 });
    const installer = new AptInstaller({ aptPath: 'apt', sudoPath: 'sudo', isRoot: false, runner });

    const error = await installer.install('/out/tool_1.0.0_amd64.deb').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InstallError);
    expect(error).toMatchObject({
      message: 'Install of /out/tool_1.0.0_amd64.deb failed: sudo exited with code 100',
      fatal: false,
      exitCode: 2,
    });
  });
});
