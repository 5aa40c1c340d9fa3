/**
 * @debkit/core
 *
 * Core package containing:
 * - Pipeline state machine
 * - Error taxonomy
 * - External tool resolution
 */

// State machine
export {
  PIPELINE_STATES,
  PipelineStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  PipelineState,
  PipelineStateTransition,
} from './stateMachine.js';

// Errors
export {
  DebkitError,
  ConfigError,
  MetadataError,
  MissingArtifactError,
  StagingError,
  ControlFileError,
  PermissionError,
  ArchiveBuildError,
  InstallError,
  CleanupError,
  StateTransitionError,
  formatMode,
} from './errors/index.js';

// Tool configuration
export {
  getToolsConfig,
  tools,
  getToolPath,
  isToolAvailable,
  type ToolConfig,
  type ToolsConfig,
} from './config/tools.js';
