import { useHotkeys } from 'react-hotkeys-hook';
import { normalizeKey } from '../workspace/keyboardShortcut';
import { useWorkspaceStore } from '../stores/workspaceStore';
import { useUiStore } from '../stores/uiStore';

/** Routes every keydown on the page through the workspace shortcut recognizer. */
export function useWorkspaceHotkeys() {
  const keydown = useWorkspaceStore((s) => s.keydown);
  const finderOpen = useUiStore((s) => s.finderOpen);

  useHotkeys('*', (e) => {
    if (finderOpen) return;
    const { shortcut } = keydown(normalizeKey(e));
    // Space would otherwise scroll the page
    if (shortcut) e.preventDefault();
  }, { enableOnFormTags: false }, [finderOpen, keydown]);
}
