import { describe, it, expect } from 'vitest';
import {
  CONVERSION_STATES,
  ConversionStateMachine,
  isValidTransition,
} from '../src/stateMachine.js';
import { StateTransitionError } from '../src/errors/index.js';

describe('transition table', () => {
  it('allows the download path and the local-cache shortcut', () => {
    expect(isValidTransition('RESOLVING', 'DOWNLOADING')).toBe(true);
    expect(isValidTransition('RESOLVING', 'TRANSCODING')).toBe(true);
    expect(isValidTransition('DOWNLOADING', 'SENDING')).toBe(false);
    expect(isValidTransition('IDLE', 'TRANSCODING')).toBe(false);
  });

  it('has no exits from terminal states', () => {
    for (const state of CONVERSION_STATES) {
      expect(isValidTransition('DONE', state)).toBe(false);
      expect(isValidTransition('FAILED', state)).toBe(false);
    }
  });

  it('reaches FAILED from every non-terminal state', () => {
    for (const state of ['IDLE', 'RESOLVING', 'DOWNLOADING', 'TRANSCODING', 'SENDING'] as const) {
      expect(isValidTransition(state, 'FAILED')).toBe(true);
    }
  });
});

describe('ConversionStateMachine', () => {
  it('records the visited path', () => {
    const machine = new ConversionStateMachine('c-1');
    machine.transitionTo('RESOLVING');
    machine.transitionTo('DOWNLOADING');
    machine.transitionTo('TRANSCODING');
    machine.transitionTo('SENDING');
    machine.transitionTo('DONE');

    expect(machine.getPath()).toEqual(['IDLE', 'RESOLVING', 'DOWNLOADING', 'TRANSCODING', 'SENDING', 'DONE']);
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getState()).toBe('DONE');
  });

  it('reports only the initial state before any transition', () => {
    expect(new ConversionStateMachine('c-2').getPath()).toEqual(['IDLE']);
  });

  it('rejects invalid transitions', () => {
    const machine = new ConversionStateMachine('c-3');
    expect(() => machine.transitionTo('SENDING')).toThrow(StateTransitionError);
    expect(machine.getState()).toBe('IDLE');
  });

  it('fails once and ignores later failures', () => {
    const machine = new ConversionStateMachine('c-4');
    machine.transitionTo('RESOLVING');

    const transition = machine.fail('network down');
    expect(transition?.reason).toBe('network down');
    expect(machine.fail('again')).toBeUndefined();
    expect(machine.getState()).toBe('FAILED');
    expect(machine.getPath()).toEqual(['IDLE', 'RESOLVING', 'FAILED']);
  });
});
