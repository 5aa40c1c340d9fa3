/**
 * Custom Error Classes
 */

import type { PipelineState } from '../stateMachine.js';

/**
 * Base error class for all debkit errors
 */
export class DebkitError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options: {
      exitCode?: number;
      fatal?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'DebkitError';
    this.code = code;
    this.exitCode = options.exitCode ?? 1;
    this.fatal = options.fatal ?? true;
    this.details = options.details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid debkit.json or environment
 */
export class ConfigError extends DebkitError {
  constructor(source: string, problems: string[]) {
    super(
      `Invalid configuration in ${source}: ${problems.join('; ')}`,
      'CONFIG_ERROR',
      { details: { source, problems } }
    );
    this.name = 'ConfigError';
  }
}

/**
 * Build descriptor missing, unreadable, or without a usable version
 */
export class MetadataError extends DebkitError {
  constructor(source: string, message: string, cause?: unknown) {
    super(
      `Cannot resolve package metadata from ${source}: ${message}`,
      'METADATA_ERROR',
      { details: { source }, cause }
    );
    this.name = 'MetadataError';
  }
}

/**
 * Release binary absent at the expected build-output path, or not executable
 */
export class MissingArtifactError extends DebkitError {
  constructor(artifactPath: string, reason = 'build the release binary first', cause?: unknown) {
    super(
      `Missing build artifact: ${artifactPath} (${reason})`,
      'MISSING_ARTIFACT',
      { details: { artifactPath, reason }, cause }
    );
    this.name = 'MissingArtifactError';
  }
}

/**
 * Filesystem failure while laying out the staging tree
 */
export class StagingError extends DebkitError {
  constructor(path: string, message: string, cause?: unknown) {
    super(
      `Cannot stage ${path}: ${message}`,
      'STAGING_ERROR',
      { details: { path }, cause }
    );
    this.name = 'StagingError';
  }
}

/**
 * Control descriptor missing required fields or disagreeing with the metadata
 */
export class ControlFileError extends DebkitError {
  constructor(controlPath: string, problems: string[]) {
    super(
      `Invalid control descriptor ${controlPath}: ${problems.join('; ')}`,
      'CONTROL_FILE_ERROR',
      { details: { controlPath, problems } }
    );
    this.name = 'ControlFileError';
  }
}

/**
 * Filesystem refused a mode change in the staging tree
 */
export class PermissionError extends DebkitError {
  constructor(path: string, mode: number, cause?: unknown) {
    super(
      `Cannot set mode ${formatMode(mode)} on ${path}`,
      'PERMISSION_ERROR',
      { details: { path, mode: formatMode(mode) }, cause }
    );
    this.name = 'PermissionError';
  }
}

/**
 * External archiver exited non-zero or produced no archive
 */
export class ArchiveBuildError extends DebkitError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string,
    cause?: unknown
  ) {
    super(
      `Archive build failed: ${command} exited with code ${exitCode}`,
      'ARCHIVE_BUILD_FAILURE',
      { details: { command, exitCode, stderr: stderr.substring(0, 1000) }, cause }
    );
    this.name = 'ArchiveBuildError';
  }
}

/**
 * Installer failed; the archive is still usable for a manual install
 */
export class InstallError extends DebkitError {
  constructor(archivePath: string, message: string, cause?: unknown) {
    super(
      `Install of ${archivePath} failed: ${message}`,
      'INSTALL_FAILURE',
      { exitCode: 2, fatal: false, details: { archivePath }, cause }
    );
    this.name = 'InstallError';
  }
}

/**
 * Staging tree could not be removed; leaves residue for the next run
 */
export class CleanupError extends DebkitError {
  constructor(stagingRoot: string, cause?: unknown) {
    super(
      `Failed to remove staging directory ${stagingRoot}`,
      'CLEANUP_FAILURE',
      { fatal: false, details: { stagingRoot }, cause }
    );
    this.name = 'CleanupError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends DebkitError {
  constructor(
    runId: string,
    fromState: PipelineState,
    toState: PipelineState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { details: { runId, fromState, toState } }
    );
    this.name = 'StateTransitionError';
  }
}

export function formatMode(mode: number): string {
  return `0${mode.toString(8).padStart(3, '0')}`;
}
