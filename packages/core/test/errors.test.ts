import { describe, it, expect } from 'vitest';
import {
  ArchiveBuildError,
  CleanupError,
  DebkitError,
  InstallError,
  MissingArtifactError,
  PermissionError,
  StagingError,
  formatMode,
} from '../src/errors/index.js';

describe('error taxonomy', () => {
  it('marks artifact, permission and archive errors as fatal', () => {
    const errors = [
      new MissingArtifactError('target/release/tool'),
      new PermissionError('/tmp/stage', 0o755),
      new ArchiveBuildError('dpkg-deb', 2, 'bad control'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(DebkitError);
      expect(error.fatal).toBe(true);
      expect(error.exitCode).toBe(1);
    }
  });

  it('reports install failures with exit code 2 and as non-fatal', () => {
    const error = new InstallError('tool_1.0.0_amd64.deb', 'sudo exited with code 1');

    expect(error.fatal).toBe(false);
    expect(error.exitCode).toBe(2);
    expect(error.code).toBe('INSTALL_FAILURE');
    expect(error.message).toBe('Install of tool_1.0.0_amd64.deb failed: sudo exited with code 1');
  });

  it('keeps cleanup failures non-fatal and preserves the cause', () => {
    const cause = new Error('EBUSY');
    const error = new CleanupError('/tmp/stage', cause);

    expect(error.fatal).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('CleanupError');
  });

  it('names why an artifact is unusable', () => {
    expect(new MissingArtifactError('target/release/tool').message).toBe(
      'Missing build artifact: target/release/tool (build the release binary first)'
    );
    expect(new MissingArtifactError('target/release/tool', 'not executable').details).toEqual({
      artifactPath: 'target/release/tool',
      reason: 'not executable',
    });
  });

  it('types staging filesystem failures', () => {
    const cause = new Error('ENOSPC');
    const error = new StagingError('/tmp/stage/DEBIAN/control', 'ENOSPC', cause);

    expect(error).toBeInstanceOf(DebkitError);
    expect(error.code).toBe('STAGING_ERROR');
    expect(error.fatal).toBe(true);
    expect(error.cause).toBe(cause);
  });

  it('formats modes as four-digit octal', () => {
    expect(formatMode(0o644)).toBe('0644');
    expect(formatMode(0o755)).toBe('0755');
    expect(new PermissionError('/x', 0o644).message).toBe('Cannot set mode 0644 on /x');
  });

  it('truncates archiver stderr in details', () => {
    const error = new ArchiveBuildError('dpkg-deb', 2, 'e'.repeat(5000));
    expect(error.details?.['stderr']).toHaveLength(1000);
  });
});
