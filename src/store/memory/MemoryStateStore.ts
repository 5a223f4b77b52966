import type { StateStore } from '../StateStore.js';
import type { PersistedState } from '../../types/persisted.js';

export class MemoryStateStore implements StateStore {
  private saved?: PersistedState;
  private saves = 0;

  save(state: PersistedState): void {
    this.saved = structuredClone(state);
    this.saves += 1;
  }

  load(): PersistedState | undefined {
    return this.saved ? structuredClone(this.saved) : undefined;
  }

  saveCount(): number {
    return this.saves;
  }
}
