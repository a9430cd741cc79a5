/**
 * Preferences Store
 * Zustand vanilla store holding the active preferences
 */

import { createStore } from "zustand/vanilla";
import { DEFAULT_PREFERENCES, resolvePreferences, type Preferences } from "./preferences";

// ============================================================================
// Store Interface
// ============================================================================

export interface PreferencesState {
  preferences: Preferences;

  // Actions
  apply: (input: unknown) => Preferences;
  reset: () => void;
}

export type PreferencesStore = ReturnType<typeof createPreferencesStore>;

// ============================================================================
// Store Implementation
// ============================================================================

export function createPreferencesStore(initial: Preferences = DEFAULT_PREFERENCES) {
  return createStore<PreferencesState>()((set) => ({
    preferences: initial,

    apply: (input) => {
      const preferences = resolvePreferences(input);
      set({ preferences });
      return preferences;
    },

    reset: () => set({ preferences: DEFAULT_PREFERENCES }),
  }));
}

export const preferencesStore = createPreferencesStore();

export const getPreferences = (store: PreferencesStore = preferencesStore): Preferences =>
  store.getState().preferences;
