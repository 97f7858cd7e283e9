/**
 * Conversion State Machine
 * 
 * Strict state machine for one video → audio conversion.
 * 
 * State Flow:
 * IDLE → RESOLVING → DOWNLOADING → TRANSCODING → SENDING → DONE
 *                 ↘ TRANSCODING (source already local)
 *        ↘ FAILED (from any non-terminal state)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - DONE and FAILED are terminal
 */

import { StateTransitionError } from './errors/index.js';

export const CONVERSION_STATES = [
  'IDLE',
  'RESOLVING',
  'DOWNLOADING',
  'TRANSCODING',
  'SENDING',
  'DONE',
  'FAILED',
] as const;

export type ConversionState = typeof CONVERSION_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface ConversionStateTransition {
  from: ConversionState;
  to: ConversionState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<ConversionState, ReadonlySet<ConversionState>> = {
  IDLE: new Set<ConversionState>(['RESOLVING', 'FAILED']),
  RESOLVING: new Set<ConversionState>([
    'DOWNLOADING',
    'TRANSCODING', // Local cache hit skips the download
    'FAILED',
  ]),
  DOWNLOADING: new Set<ConversionState>(['TRANSCODING', 'FAILED']),
  TRANSCODING: new Set<ConversionState>(['SENDING', 'FAILED']),
  SENDING: new Set<ConversionState>(['DONE', 'FAILED']),
  DONE: new Set<ConversionState>(), // Terminal state
  FAILED: new Set<ConversionState>(), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: ConversionState, to: ConversionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Conversion State Machine class
 * Tracks the current stage of one request and its history
 */
export class ConversionStateMachine {
  private currentState: ConversionState;
  private readonly history: ConversionStateTransition[] = [];
  private readonly conversionId: string;

  constructor(conversionId: string, initialState: ConversionState = 'IDLE') {
    this.conversionId = conversionId;
    this.currentState = initialState;
  }

  /**
   * Get the current state
   */
  getState(): ConversionState {
    return this.currentState;
  }

  /**
   * Ordered list of every state visited, starting with the initial one
   */
  getPath(): ConversionState[] {
    const first = this.history[0]?.from ?? this.currentState;
    return [first, ...this.history.map((t) => t.to)];
  }

  canTransitionTo(targetState: ConversionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: ConversionState, reason?: string): ConversionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.conversionId, this.currentState, targetState);
    }

    const transition: ConversionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'DONE' || this.currentState === 'FAILED';
  }

  /**
   * Fail the conversion with a reason. A no-op once terminal.
   */
  fail(reason: string): ConversionStateTransition | undefined {
    if (this.isTerminal()) {
      return undefined;
    }
    return this.transitionTo('FAILED', reason);
  }
}
