/**
 * Pipeline State Machine
 *
 * Strict state machine for one packaging run.
 *
 * State Flow:
 * RESOLVING → STAGING → NORMALIZING → ARCHIVING → [INSTALLING] → CLEANING_UP → DONE
 *     ↘ FAILED            ↘ CLEANING_UP (from any staged state) → FAILED
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Once the staging tree exists, every path to a terminal state goes through CLEANING_UP
 */

import { StateTransitionError } from './errors/index.js';

export const PIPELINE_STATES = [
  'RESOLVING',
  'STAGING',
  'NORMALIZING',
  'ARCHIVING',
  'INSTALLING',
  'CLEANING_UP',
  'DONE',
  'FAILED',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

/**
 * Represents a state transition with metadata
 */
export interface PipelineStateTransition {
  from: PipelineState;
  to: PipelineState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<PipelineState, Set<PipelineState>> = {
  RESOLVING: new Set<PipelineState>([
    'STAGING',
    'FAILED', // Nothing on disk yet, nothing to clean
  ]),
  STAGING: new Set<PipelineState>([
    'NORMALIZING',
    'CLEANING_UP',
  ]),
  NORMALIZING: new Set<PipelineState>([
    'ARCHIVING',
    'CLEANING_UP',
  ]),
  ARCHIVING: new Set<PipelineState>([
    'INSTALLING',
    'CLEANING_UP', // Install not requested, or archiving failed
  ]),
  INSTALLING: new Set<PipelineState>([
    'CLEANING_UP',
  ]),
  CLEANING_UP: new Set<PipelineState>([
    'DONE',
    'FAILED',
  ]),
  DONE: new Set<PipelineState>([]),
  FAILED: new Set<PipelineState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: PipelineState, to: PipelineState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: PipelineState): PipelineState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Pipeline State Machine class
 * Manages state transitions with validation and an optional transition listener
 */
export class PipelineStateMachine {
  private currentState: PipelineState;
  private history: PipelineStateTransition[];
  private readonly runId: string;
  private readonly onTransition?: (transition: PipelineStateTransition) => void;

  constructor(
    runId: string,
    onTransition?: (transition: PipelineStateTransition) => void
  ) {
    this.runId = runId;
    this.currentState = 'RESOLVING';
    this.history = [];
    this.onTransition = onTransition;
  }

  /**
   * Get the current state
   */
  getState(): PipelineState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<PipelineStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: PipelineState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: PipelineState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): PipelineStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.runId, this.currentState, targetState);
    }

    const transition: PipelineStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;
    this.onTransition?.(transition);

    return transition;
  }

  /**
   * Check if the run is in a terminal state
   */
  isTerminal(): boolean {
    return this.currentState === 'DONE' || this.currentState === 'FAILED';
  }

  hasFailed(): boolean {
    return this.currentState === 'FAILED';
  }

  isComplete(): boolean {
    return this.currentState === 'DONE';
  }

  /**
   * True once a staging tree may exist on disk and must be removed
   */
  requiresCleanup(): boolean {
    return (
      this.currentState === 'STAGING' ||
      this.currentState === 'NORMALIZING' ||
      this.currentState === 'ARCHIVING' ||
      this.currentState === 'INSTALLING'
    );
  }
}
