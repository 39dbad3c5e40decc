import type { Reference } from './reference';
import { isSameReference, loading, reference, type WorkspaceItem } from './workspaceItem';

/**
 * Ordered list of open workspace items with a single focused element.
 *
 * `before` and `after` are both kept in linear (display) order, so the full
 * list is always `[...before, focus, ...after]`. Every operation returns a new
 * value; when nothing changes the input is returned as-is so store selectors
 * can compare by identity.
 */
export type WorkspaceItems =
  | { tag: 'empty' }
  | {
      tag: 'nonEmpty';
      before: readonly WorkspaceItem[];
      focus: WorkspaceItem;
      after: readonly WorkspaceItem[];
    };

type NonEmptyItems = Extract<WorkspaceItems, { tag: 'nonEmpty' }>;

export const empty: WorkspaceItems = { tag: 'empty' };

export function singleton(item: WorkspaceItem): WorkspaceItems {
  return { tag: 'nonEmpty', before: [], focus: item, after: [] };
}

export function fromItems(
  before: readonly WorkspaceItem[],
  focus: WorkspaceItem,
  after: readonly WorkspaceItem[],
): WorkspaceItems {
  return { tag: 'nonEmpty', before, focus, after };
}

export function init(initialRef?: Reference): WorkspaceItems {
  return initialRef ? singleton(loading(initialRef)) : empty;
}

export function isEmpty(items: WorkspaceItems): boolean {
  return items.tag === 'empty';
}

export function length(items: WorkspaceItems): number {
  if (items.tag === 'empty') return 0;
  return items.before.length + 1 + items.after.length;
}

export function toList(items: WorkspaceItems): WorkspaceItem[] {
  if (items.tag === 'empty') return [];
  return [...items.before, items.focus, ...items.after];
}

export function references(items: WorkspaceItems): Reference[] {
  return toList(items).map(reference);
}

export function head(items: WorkspaceItems): WorkspaceItem | null {
  return toList(items)[0] ?? null;
}

export function last(items: WorkspaceItems): WorkspaceItem | null {
  if (items.tag === 'empty') return null;
  return items.after.length > 0 ? items.after[items.after.length - 1] : items.focus;
}

export function focus(items: WorkspaceItems): WorkspaceItem | null {
  return items.tag === 'empty' ? null : items.focus;
}

export function focusIndex(items: WorkspaceItems): number {
  return items.tag === 'empty' ? -1 : items.before.length;
}

export function member(items: WorkspaceItems, ref: Reference): boolean {
  return get(items, ref) !== null;
}

export function get(items: WorkspaceItems, ref: Reference): WorkspaceItem | null {
  return toList(items).find((item) => isSameReference(item, ref)) ?? null;
}

export function isFocused(items: WorkspaceItems, ref: Reference): boolean {
  return items.tag === 'nonEmpty' && isSameReference(items.focus, ref);
}

/** Rebuilds a zipper from a flat list, focusing `index`. */
function focusAt(list: readonly WorkspaceItem[], index: number): WorkspaceItems {
  if (index < 0 || index >= list.length) return empty;
  return {
    tag: 'nonEmpty',
    before: list.slice(0, index),
    focus: list[index],
    after: list.slice(index + 1),
  };
}

function indexOf(items: WorkspaceItems, ref: Reference): number {
  return toList(items).findIndex((item) => isSameReference(item, ref));
}

// ── Insertion ────────────────────────────────────────────────────

export function prependWithFocus(items: WorkspaceItems, newItem: WorkspaceItem): WorkspaceItems {
  return { tag: 'nonEmpty', before: [], focus: newItem, after: toList(items) };
}

export function appendWithFocus(items: WorkspaceItems, newItem: WorkspaceItem): WorkspaceItems {
  return { tag: 'nonEmpty', before: toList(items), focus: newItem, after: [] };
}

export function insertWithFocusBefore(
  items: WorkspaceItems,
  anchorRef: Reference,
  newItem: WorkspaceItem,
): WorkspaceItems {
  const at = indexOf(items, anchorRef);
  if (at === -1) return prependWithFocus(items, newItem);
  const list = toList(items);
  return { tag: 'nonEmpty', before: list.slice(0, at), focus: newItem, after: list.slice(at) };
}

export function insertWithFocusAfter(
  items: WorkspaceItems,
  anchorRef: Reference,
  newItem: WorkspaceItem,
): WorkspaceItems {
  const at = indexOf(items, anchorRef);
  if (at === -1) return appendWithFocus(items, newItem);
  const list = toList(items);
  return { tag: 'nonEmpty', before: list.slice(0, at + 1), focus: newItem, after: list.slice(at + 1) };
}

// ── Update ───────────────────────────────────────────────────────

export function replace(items: WorkspaceItems, ref: Reference, newItem: WorkspaceItem): WorkspaceItems {
  if (!member(items, ref)) return items;
  return map(items, (item) => (isSameReference(item, ref) ? newItem : item));
}

export function map(items: WorkspaceItems, f: (item: WorkspaceItem) => WorkspaceItem): WorkspaceItems {
  if (items.tag === 'empty') return items;
  return {
    tag: 'nonEmpty',
    before: items.before.map(f),
    focus: f(items.focus),
    after: items.after.map(f),
  };
}

export function updateFocus(items: WorkspaceItems, f: (item: WorkspaceItem) => WorkspaceItem): WorkspaceItems {
  if (items.tag === 'empty') return items;
  return { ...items, focus: f(items.focus) };
}

export function remove(items: WorkspaceItems, ref: Reference): WorkspaceItems {
  if (items.tag === 'empty') return items;

  if (isSameReference(items.focus, ref)) {
    return removeFocused(items);
  }

  const before = items.before.filter((item) => !isSameReference(item, ref));
  const after = items.after.filter((item) => !isSameReference(item, ref));
  if (before.length === items.before.length && after.length === items.after.length) return items;
  return { ...items, before, after };
}

// Focus goes to the next element, else the previous one, else nothing.
function removeFocused(items: NonEmptyItems): WorkspaceItems {
  if (items.after.length > 0) {
    return { tag: 'nonEmpty', before: items.before, focus: items.after[0], after: items.after.slice(1) };
  }
  if (items.before.length > 0) {
    return {
      tag: 'nonEmpty',
      before: items.before.slice(0, -1),
      focus: items.before[items.before.length - 1],
      after: [],
    };
  }
  return empty;
}

// ── Focus movement ───────────────────────────────────────────────

export function focusOn(items: WorkspaceItems, ref: Reference): WorkspaceItems {
  if (isFocused(items, ref)) return items;
  const at = indexOf(items, ref);
  if (at === -1) return items;
  return focusAt(toList(items), at);
}

export function focusFirst(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.before.length === 0) return items;
  return focusAt(toList(items), 0);
}

export function focusLast(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.after.length === 0) return items;
  return focusAt(toList(items), length(items) - 1);
}

export function next(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.after.length === 0) return items;
  return {
    tag: 'nonEmpty',
    before: [...items.before, items.focus],
    focus: items.after[0],
    after: items.after.slice(1),
  };
}

export function prev(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.before.length === 0) return items;
  return {
    tag: 'nonEmpty',
    before: items.before.slice(0, -1),
    focus: items.before[items.before.length - 1],
    after: [items.focus, ...items.after],
  };
}

export function moveUp(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.before.length === 0) return items;
  return {
    tag: 'nonEmpty',
    before: items.before.slice(0, -1),
    focus: items.focus,
    after: [items.before[items.before.length - 1], ...items.after],
  };
}

export function moveDown(items: WorkspaceItems): WorkspaceItems {
  if (items.tag === 'empty' || items.after.length === 0) return items;
  return {
    tag: 'nonEmpty',
    before: [...items.before, items.after[0]],
    focus: items.focus,
    after: items.after.slice(1),
  };
}

// ── Projection ───────────────────────────────────────────────────

export function mapToList<T>(items: WorkspaceItems, f: (item: WorkspaceItem, isFocused: boolean) => T): T[] {
  if (items.tag === 'empty') return [];
  return [
    ...items.before.map((item) => f(item, false)),
    f(items.focus, true),
    ...items.after.map((item) => f(item, false)),
  ];
}
