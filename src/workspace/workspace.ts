import type { ZoomLevel } from '../types/definition';
import type { Reference } from './reference';
import {
  initKeyboardShortcut,
  recognize,
  type KeyboardShortcutState,
  type Shortcut,
} from './keyboardShortcut';
import * as WorkspaceItem from './workspaceItem';
import * as WorkspaceItems from './workspaceItems';

export interface WorkspaceModel {
  items: WorkspaceItems.WorkspaceItems;
  keyboard: KeyboardShortcutState;
}

/** What the surrounding UI should do after an update. */
export type Outcome =
  | { type: 'none' }
  | { type: 'focused'; ref: Reference }
  | { type: 'emptied' }
  | { type: 'showFinderRequest' };

export interface Transition {
  model: WorkspaceModel;
  outcome: Outcome;
}

export interface OpenTransition extends Transition {
  /** Reference whose definition must now be fetched, if any. */
  fetch: Reference | null;
}

export interface KeydownTransition extends Transition {
  shortcut: Shortcut | null;
}

const NONE: Outcome = { type: 'none' };

export function init(initialRef?: Reference): WorkspaceModel {
  return { items: WorkspaceItems.init(initialRef), keyboard: initKeyboardShortcut() };
}

function outcomeFromFocus(items: WorkspaceItems.WorkspaceItems): Outcome {
  const focused = WorkspaceItems.focus(items);
  return focused ? { type: 'focused', ref: WorkspaceItem.reference(focused) } : { type: 'emptied' };
}

function withItems(model: WorkspaceModel, items: WorkspaceItems.WorkspaceItems): WorkspaceModel {
  return items === model.items ? model : { ...model, items };
}

export function open(model: WorkspaceModel, ref: Reference, relativeTo?: Reference): OpenTransition {
  if (WorkspaceItems.member(model.items, ref)) {
    return {
      model: withItems(model, WorkspaceItems.focusOn(model.items, ref)),
      outcome: { type: 'focused', ref },
      fetch: null,
    };
  }

  const placeholder = WorkspaceItem.loading(ref);
  const items = relativeTo
    ? WorkspaceItems.insertWithFocusBefore(model.items, relativeTo, placeholder)
    : WorkspaceItems.prependWithFocus(model.items, placeholder);

  return { model: withItems(model, items), outcome: { type: 'focused', ref }, fetch: ref };
}

export function fetchCompleted(
  model: WorkspaceModel,
  ref: Reference,
  result: WorkspaceItem.FetchResult,
): Transition {
  const items = WorkspaceItems.replace(model.items, ref, WorkspaceItem.fromFetchResult(ref, result));
  return { model: withItems(model, items), outcome: outcomeFromFocus(items) };
}

export function close(model: WorkspaceModel, ref: Reference): Transition {
  const items = WorkspaceItems.remove(model.items, ref);
  return { model: withItems(model, items), outcome: outcomeFromFocus(items) };
}

export function focus(model: WorkspaceModel, ref: Reference): Transition {
  if (!WorkspaceItems.member(model.items, ref)) return { model, outcome: NONE };
  return {
    model: withItems(model, WorkspaceItems.focusOn(model.items, ref)),
    outcome: { type: 'focused', ref },
  };
}

function updateItem(
  model: WorkspaceModel,
  ref: Reference,
  f: (item: WorkspaceItem.WorkspaceItem) => WorkspaceItem.WorkspaceItem,
): Transition {
  if (!WorkspaceItems.member(model.items, ref)) return { model, outcome: NONE };
  const items = WorkspaceItems.map(model.items, (item) =>
    WorkspaceItem.isSameReference(item, ref) ? f(item) : item,
  );
  return { model: withItems(model, items), outcome: NONE };
}

export function changeZoom(model: WorkspaceModel, ref: Reference, zoom: ZoomLevel): Transition {
  return updateItem(model, ref, (item) => WorkspaceItem.setZoom(item, zoom));
}

export function cycleZoom(model: WorkspaceModel, ref: Reference): Transition {
  return updateItem(model, ref, WorkspaceItem.cycleZoom);
}

export function toggleDocFold(model: WorkspaceModel, ref: Reference, foldId: string): Transition {
  return updateItem(model, ref, (item) => WorkspaceItem.toggleDocFold(item, foldId));
}

function navigate(
  model: WorkspaceModel,
  move: (items: WorkspaceItems.WorkspaceItems) => WorkspaceItems.WorkspaceItems,
): Transition {
  if (WorkspaceItems.isEmpty(model.items)) return { model, outcome: NONE };
  const items = move(model.items);
  return { model: withItems(model, items), outcome: outcomeFromFocus(items) };
}

function applyShortcut(model: WorkspaceModel, shortcut: Shortcut): Transition {
  switch (shortcut) {
    case 'nextItem': return navigate(model, WorkspaceItems.next);
    case 'prevItem': return navigate(model, WorkspaceItems.prev);
    case 'moveItemUp': return navigate(model, WorkspaceItems.moveUp);
    case 'moveItemDown': return navigate(model, WorkspaceItems.moveDown);
    case 'focusFirstItem': return navigate(model, WorkspaceItems.focusFirst);
    case 'focusLastItem': return navigate(model, WorkspaceItems.focusLast);
    case 'cycleZoom':
      return { model: withItems(model, WorkspaceItems.updateFocus(model.items, WorkspaceItem.cycleZoom)), outcome: NONE };
    case 'closeItem': {
      const focused = WorkspaceItems.focus(model.items);
      if (!focused) return { model, outcome: NONE };
      return close(model, WorkspaceItem.reference(focused));
    }
    case 'showFinder': return { model, outcome: { type: 'showFinderRequest' } };
  }
}

export function keydown(model: WorkspaceModel, key: string, now: number): KeydownTransition {
  const recognized = recognize(model.keyboard, key, now);
  const threaded: WorkspaceModel =
    recognized.state === model.keyboard ? model : { ...model, keyboard: recognized.state };
  if (!recognized.shortcut) {
    return { model: threaded, outcome: NONE, shortcut: null };
  }
  return { ...applyShortcut(threaded, recognized.shortcut), shortcut: recognized.shortcut };
}
