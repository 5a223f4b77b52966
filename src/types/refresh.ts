import type { CallerId, Nanos } from './ids.js';

export enum RefreshPhase {
  IDLE = 'IDLE',
  FETCHING = 'FETCHING',
  COOLDOWN_ACTIVE = 'COOLDOWN_ACTIVE'
}

export interface RefreshState {
  lastSuccessTime: Nanos;
  lastTriggeredBy?: CallerId;
  history: Map<CallerId, Nanos>;
}

export interface RefreshStatus {
  phase: RefreshPhase;
  lastSuccessTime: Nanos;
  lastTriggeredBy?: CallerId;
  cooldownNs: Nanos;
  cooldownRemainingNs: Nanos;
}
