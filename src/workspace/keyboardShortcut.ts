export type Shortcut =
  | 'nextItem'
  | 'prevItem'
  | 'moveItemUp'
  | 'moveItemDown'
  | 'focusFirstItem'
  | 'focusLastItem'
  | 'cycleZoom'
  | 'closeItem'
  | 'showFinder';

export interface KeyboardShortcutState {
  sequence: string[];
  lastKeyAt: number | null;
}

export interface KeyLike {
  key: string;
  ctrlKey?: boolean;
  metaKey?: boolean;
  altKey?: boolean;
  shiftKey?: boolean;
}

interface Binding {
  keys: string[];
  shortcut: Shortcut;
}

export const SEQUENCE_TIMEOUT_MS = 1000;

const MODIFIER_KEYS = new Set(['shift', 'control', 'meta', 'alt']);

export const BINDINGS: readonly Binding[] = [
  { keys: ['j'], shortcut: 'nextItem' },
  { keys: ['arrowdown'], shortcut: 'nextItem' },
  { keys: ['k'], shortcut: 'prevItem' },
  { keys: ['arrowup'], shortcut: 'prevItem' },
  { keys: ['shift+arrowup'], shortcut: 'moveItemUp' },
  { keys: ['shift+arrowdown'], shortcut: 'moveItemDown' },
  { keys: ['g', 'g'], shortcut: 'focusFirstItem' },
  { keys: ['G'], shortcut: 'focusLastItem' },
  { keys: ['space'], shortcut: 'cycleZoom' },
  { keys: ['x'], shortcut: 'closeItem' },
  { keys: ['/'], shortcut: 'showFinder' },
  { keys: ['ctrl+k'], shortcut: 'showFinder' },
  { keys: ['meta+k'], shortcut: 'showFinder' },
];

export function initKeyboardShortcut(): KeyboardShortcutState {
  return { sequence: [], lastKeyAt: null };
}

/**
 * Normalizes a keyboard event to a binding key: named keys are lower-cased,
 * single characters keep their case (so `G` already implies shift), and
 * modifiers are prefixed as `ctrl+`, `meta+`, `alt+`, `shift+`.
 */
export function normalizeKey(e: KeyLike): string {
  const printable = e.key.length === 1 && e.key !== ' ';
  const base = e.key === ' ' ? 'space' : printable ? e.key : e.key.toLowerCase();
  let prefix = '';
  if (e.ctrlKey) prefix += 'ctrl+';
  if (e.metaKey) prefix += 'meta+';
  if (e.altKey) prefix += 'alt+';
  if (e.shiftKey && !printable) prefix += 'shift+';
  return prefix + base;
}

function endsWith(sequence: readonly string[], keys: readonly string[]): boolean {
  if (keys.length > sequence.length) return false;
  const offset = sequence.length - keys.length;
  return keys.every((k, i) => sequence[offset + i] === k);
}

function startsSomeBinding(sequence: readonly string[]): boolean {
  return BINDINGS.some(
    (b) => b.keys.length > sequence.length && sequence.every((k, i) => b.keys[i] === k),
  );
}

/** Feeds one normalized key into the recognizer. */
export function recognize(
  state: KeyboardShortcutState,
  key: string,
  now: number,
): { state: KeyboardShortcutState; shortcut: Shortcut | null } {
  const base = key.slice(key.lastIndexOf('+') + 1);
  if (MODIFIER_KEYS.has(base)) return { state, shortcut: null };

  const expired = state.lastKeyAt !== null && now - state.lastKeyAt > SEQUENCE_TIMEOUT_MS;
  const sequence = [...(expired ? [] : state.sequence), key];

  // Longer bindings win so `g g` is not shadowed by a single-key binding.
  const match = [...BINDINGS]
    .sort((a, b) => b.keys.length - a.keys.length)
    .find((b) => endsWith(sequence, b.keys));
  if (match) {
    return { state: { sequence: [], lastKeyAt: now }, shortcut: match.shortcut };
  }

  if (startsSomeBinding(sequence)) {
    return { state: { sequence, lastKeyAt: now }, shortcut: null };
  }
  return {
    state: { sequence: startsSomeBinding([key]) ? [key] : [], lastKeyAt: now },
    shortcut: null,
  };
}
