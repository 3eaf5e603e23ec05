/**
 * Active store cell.
 *
 * Holds the QuadStore every reader works against. Only the refresh
 * orchestrator replaces it (swap strategy) or clears it (in-place strategy);
 * HTTP handlers and the notes parser read it through getActiveStore().
 */

import { createStore } from "zustand/vanilla";
import { QuadStore } from "./quadStore";

interface ActiveStoreState {
  store: QuadStore;
  /** Bumped on every swap so readers can tell a replaced store apart. */
  generation: number;
  swap: (next: QuadStore) => QuadStore;
}

export const activeStore = createStore<ActiveStoreState>()((set, get) => ({
  store: new QuadStore(),
  generation: 0,
  swap: (next) => {
    const previous = get().store;
    set((state) => ({ store: next, generation: state.generation + 1 }));
    return previous;
  },
}));

export const getActiveStore = (): QuadStore => activeStore.getState().store;

/** Replaces the active store and returns the one it displaced. */
export const setActiveStore = (next: QuadStore): QuadStore => activeStore.getState().swap(next);
