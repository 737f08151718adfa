/**
 * State machine types
 */

import type { SessionState } from '@chatscribe/shared';

export interface SessionStateMachineEvents {
  'state:changed': { from: SessionState; to: SessionState; reason: string };
  'session:closed': { reason: string; duration: number };
}
