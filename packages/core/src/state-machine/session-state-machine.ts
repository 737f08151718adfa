/**
 * Ingest session state machine
 * Drives a single connection from IDLE through to CLOSED; an instance is never reused.
 */

import { EventEmitter } from 'eventemitter3';
import { SESSION_STATES, type SessionState } from '@chatscribe/shared';
import { logStateTransition } from '@chatscribe/shared';
import { transitionValidator } from './transitions.js';
import type { SessionStateMachineEvents } from './types.js';

export class SessionStateMachine extends EventEmitter<SessionStateMachineEvents> {
  private currentState: SessionState = SESSION_STATES.IDLE;
  private openedAt: Date | null = null;

  constructor(private readonly sessionId: string) {
    super();
  }

  getState(): SessionState {
    return this.currentState;
  }

  /**
   * Whether the session may still read or write
   */
  isOpen(): boolean {
    return this.currentState === SESSION_STATES.CONNECTED;
  }

  isTerminal(): boolean {
    return transitionValidator.isTerminalState(this.currentState);
  }

  /**
   * Transition to a new state
   */
  transition(toState: SessionState, reason: string): void {
    const fromState = this.currentState;

    transitionValidator.validateTransition(fromState, toState);

    this.currentState = toState;
    if (toState === SESSION_STATES.CONNECTED) {
      this.openedAt = new Date();
    }

    logStateTransition(this.sessionId, fromState, toState, reason);
    this.emit('state:changed', { from: fromState, to: toState, reason });

    if (toState === SESSION_STATES.CLOSED) {
      const duration = this.openedAt ? Date.now() - this.openedAt.getTime() : 0;
      this.emit('session:closed', { reason, duration });
    }
  }
}
