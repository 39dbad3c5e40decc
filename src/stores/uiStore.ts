import { create } from 'zustand';
import { referenceToString } from '../workspace/reference';
import type { Outcome } from '../workspace/workspace';

interface ScrollTarget {
  key: string;
  // bumped on every request so refocusing the same item scrolls again
  seq: number;
}

interface UiState {
  darkMode: boolean;
  finderOpen: boolean;
  scrollTarget: ScrollTarget | null;
  toggleDarkMode: () => void;
  openFinder: () => void;
  closeFinder: () => void;
  applyWorkspaceOutcome: (outcome: Outcome) => void;
}

export const useUiStore = create<UiState>((set) => ({
  darkMode: false,
  finderOpen: false,
  scrollTarget: null,
  toggleDarkMode: () =>
    set((s) => {
      const next = !s.darkMode;
      if (typeof document !== 'undefined') document.documentElement.classList.toggle('dark', next);
      return { darkMode: next };
    }),
  openFinder: () => set({ finderOpen: true }),
  closeFinder: () => set({ finderOpen: false }),
  applyWorkspaceOutcome: (outcome) => {
    switch (outcome.type) {
      case 'focused':
        set((s) => ({ scrollTarget: { key: referenceToString(outcome.ref), seq: (s.scrollTarget?.seq ?? 0) + 1 } }));
        break;
      case 'emptied':
        set({ scrollTarget: null });
        break;
      case 'showFinderRequest':
        set({ finderOpen: true });
        break;
      case 'none':
        break;
    }
  },
}));
