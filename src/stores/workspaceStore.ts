import { create } from 'zustand';
import type { Item, ZoomLevel } from '../types/definition';
import { fetchDefinition } from '../api/queryClient';
import { referenceToString, type Reference } from '../workspace/reference';
import type { Shortcut } from '../workspace/keyboardShortcut';
import * as Workspace from '../workspace/workspace';
import type { Outcome, Transition, WorkspaceModel } from '../workspace/workspace';
import { useUiStore } from './uiStore';

export interface WorkspaceDeps {
  fetchDefinition: (ref: Reference) => Promise<Item>;
  onOutcome?: (outcome: Outcome) => void;
  now?: () => number;
}

export interface WorkspaceState {
  model: WorkspaceModel;

  reset: (initialRef?: Reference) => Outcome;
  open: (ref: Reference, relativeTo?: Reference) => Outcome;
  close: (ref: Reference) => Outcome;
  focus: (ref: Reference) => Outcome;
  cycleZoom: (ref: Reference) => void;
  changeZoom: (ref: Reference, zoom: ZoomLevel) => void;
  toggleDocFold: (ref: Reference, foldId: string) => void;
  keydown: (key: string) => { outcome: Outcome; shortcut: Shortcut | null };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createWorkspaceStore(deps: WorkspaceDeps) {
  const now = deps.now ?? Date.now;

  return create<WorkspaceState>((set, get) => {
    const commit = (t: Transition): Outcome => {
      if (t.model !== get().model) set({ model: t.model });
      deps.onOutcome?.(t.outcome);
      return t.outcome;
    };

    // Results for references closed in the meantime fall through `replace` untouched.
    const load = (ref: Reference) => {
      void deps.fetchDefinition(ref).then(
        (item) => {
          commit(Workspace.fetchCompleted(get().model, ref, { ok: true, item }));
        },
        (err: unknown) => {
          const error = toError(err);
          console.warn('[workspace] fetch failed', referenceToString(ref), error.message);
          commit(Workspace.fetchCompleted(get().model, ref, { ok: false, error }));
        },
      );
    };

    return {
      model: Workspace.init(),

      reset: (initialRef) => {
        const outcome = commit({
          model: Workspace.init(initialRef),
          outcome: initialRef ? { type: 'focused', ref: initialRef } : { type: 'emptied' },
        });
        if (initialRef) load(initialRef);
        return outcome;
      },
      open: (ref, relativeTo) => {
        const t = Workspace.open(get().model, ref, relativeTo);
        const outcome = commit(t);
        if (t.fetch) load(t.fetch);
        return outcome;
      },
      close: (ref) => commit(Workspace.close(get().model, ref)),
      focus: (ref) => commit(Workspace.focus(get().model, ref)),
      cycleZoom: (ref) => { commit(Workspace.cycleZoom(get().model, ref)); },
      changeZoom: (ref, zoom) => { commit(Workspace.changeZoom(get().model, ref, zoom)); },
      toggleDocFold: (ref, foldId) => { commit(Workspace.toggleDocFold(get().model, ref, foldId)); },
      keydown: (key) => {
        const t = Workspace.keydown(get().model, key, now());
        return { outcome: commit(t), shortcut: t.shortcut };
      },
    };
  });
}

export const useWorkspaceStore = createWorkspaceStore({
  fetchDefinition: (ref) => fetchDefinition(ref),
  onOutcome: (outcome) => useUiStore.getState().applyWorkspaceOutcome(outcome),
});
