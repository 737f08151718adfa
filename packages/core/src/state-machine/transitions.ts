/**
 * Session state transition table and validation
 */

import { SESSION_STATES, InvalidTransitionError, type SessionState } from '@chatscribe/shared';

export type TransitionTable = Readonly<Record<SessionState, readonly SessionState[]>>;

// Exits are listed in the order the ingestor normally takes them; CLOSED has none
const SESSION_TRANSITIONS: TransitionTable = {
  [SESSION_STATES.IDLE]: [SESSION_STATES.CONNECTING],
  [SESSION_STATES.CONNECTING]: [SESSION_STATES.CONNECTED, SESSION_STATES.CLOSED],
  [SESSION_STATES.CONNECTED]: [SESSION_STATES.CLOSING, SESSION_STATES.CLOSED],
  [SESSION_STATES.CLOSING]: [SESSION_STATES.CLOSED],
  [SESSION_STATES.CLOSED]: [],
};

export class TransitionValidator {
  constructor(private readonly table: TransitionTable = SESSION_TRANSITIONS) {}

  getValidTransitions(from: SessionState): SessionState[] {
    return [...this.table[from]];
  }

  /**
   * Throws InvalidTransitionError, with the allowed exits in its context
   */
  validateTransition(from: SessionState, to: SessionState): void {
    const exits = this.table[from];
    if (!exits.includes(to)) {
      throw new InvalidTransitionError(from, to, { validTransitions: [...exits] });
    }
  }

  isTerminalState(state: SessionState): boolean {
    return this.table[state].length === 0;
  }
}

export const transitionValidator = new TransitionValidator();
