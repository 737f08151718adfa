/**
 * Ingest Session State Machine
 *
 * States: IDLE → CONNECTING → CONNECTED → CLOSING → CLOSED
 */

export { SessionStateMachine } from './session-state-machine.js';
export { TransitionValidator, transitionValidator } from './transitions.js';
export type { TransitionTable } from './transitions.js';
export type { SessionStateMachineEvents } from './types.js';
