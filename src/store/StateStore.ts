import type { PersistedState } from '../types/persisted.js';

export interface StateStore {
  save(state: PersistedState): void;
  load(): PersistedState | undefined;
}
