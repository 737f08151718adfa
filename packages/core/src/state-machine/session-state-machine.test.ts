/**
 * Session State Machine Tests
 */
import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { SESSION_STATES, InvalidTransitionError } from '@chatscribe/shared';
import { SessionStateMachine } from './session-state-machine.js';
import { TransitionValidator, transitionValidator } from './transitions.js';

describe('SessionStateMachine', () => {
  let machine: SessionStateMachine;

  beforeEach(() => {
    machine = new SessionStateMachine('test-session');
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start in IDLE and not be open', () => {
    expect(machine.getState()).toBe(SESSION_STATES.IDLE);
    expect(machine.isOpen()).toBe(false);
    expect(machine.isTerminal()).toBe(false);
  });

  it('should emit state:changed for each transition', () => {
    const changes: string[] = [];
    machine.on('state:changed', ({ from, to, reason }) => changes.push(`${from}->${to}:${reason}`));

    machine.transition(SESSION_STATES.CONNECTING, 'connect_requested');
    machine.transition(SESSION_STATES.CONNECTED, 'socket_open');

    expect(changes).toEqual([
      'IDLE->CONNECTING:connect_requested',
      'CONNECTING->CONNECTED:socket_open',
    ]);
    expect(machine.isOpen()).toBe(true);
  });

  it('should report session duration when closed', () => {
    const closed = vi.fn();
    machine.on('session:closed', closed);

    machine.transition(SESSION_STATES.CONNECTING, 'connect_requested');
    machine.transition(SESSION_STATES.CONNECTED, 'socket_open');
    vi.advanceTimersByTime(5000);
    machine.transition(SESSION_STATES.CLOSING, 'cancelled');
    machine.transition(SESSION_STATES.CLOSED, 'cancelled');

    expect(closed).toHaveBeenCalledWith({ reason: 'cancelled', duration: 5000 });
    expect(machine.isTerminal()).toBe(true);
  });

  it('should report zero duration when the connection never opened', () => {
    const closed = vi.fn();
    machine.on('session:closed', closed);

    machine.transition(SESSION_STATES.CONNECTING, 'connect_requested');
    machine.transition(SESSION_STATES.CLOSED, 'connect_failed');

    expect(closed).toHaveBeenCalledWith({ reason: 'connect_failed', duration: 0 });
  });

  it('should reject transitions that skip states', () => {
    expect(() => machine.transition(SESSION_STATES.CONNECTED, 'socket_open')).toThrow(
      InvalidTransitionError
    );
    expect(machine.getState()).toBe(SESSION_STATES.IDLE);
  });

  it('should not leave CLOSED', () => {
    machine.transition(SESSION_STATES.CONNECTING, 'connect_requested');
    machine.transition(SESSION_STATES.CLOSED, 'connect_failed');

    expect(() => machine.transition(SESSION_STATES.CONNECTING, 'connect_requested')).toThrow(
      'Invalid state transition: CLOSED -> CONNECTING'
    );
  });
});

describe('TransitionValidator', () => {
  it('should list the exits from CONNECTED', () => {
    expect(transitionValidator.getValidTransitions(SESSION_STATES.CONNECTED)).toEqual([
      SESSION_STATES.CLOSING,
      SESSION_STATES.CLOSED,
    ]);
  });

  it('should treat only states without exits as terminal', () => {
    expect(transitionValidator.isTerminalState(SESSION_STATES.CLOSED)).toBe(true);
    expect(transitionValidator.isTerminalState(SESSION_STATES.CLOSING)).toBe(false);
  });

  it('should validate against a supplied table', () => {
    const validator = new TransitionValidator({
      IDLE: ['CONNECTING'],
      CONNECTING: ['CLOSED'],
      CONNECTED: ['CLOSED'],
      CLOSING: ['CLOSED'],
      CLOSED: [],
    });

    expect(() =>
      validator.validateTransition(SESSION_STATES.CONNECTING, SESSION_STATES.CONNECTED)
    ).toThrow('Invalid state transition: CONNECTING -> CONNECTED');
    expect(validator.getValidTransitions(SESSION_STATES.CONNECTING)).toEqual(['CLOSED']);
  });

  it('should attach the valid transitions to the error context', () => {
    let caught: unknown;
    try {
      transitionValidator.validateTransition(SESSION_STATES.CLOSING, SESSION_STATES.CONNECTED);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught instanceof InvalidTransitionError && caught.context.validTransitions).toEqual([
      SESSION_STATES.CLOSED,
    ]);
  });
});
