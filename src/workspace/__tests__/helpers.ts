import type { TermItem } from '../../types/definition';
import { hqToString, type Reference } from '../reference';
import { loading, reference, success, type WorkspaceItem } from '../workspaceItem';
import { mapToList, type WorkspaceItems } from '../workspaceItems';

export function ref(name: string): Reference {
  return { kind: 'term', hq: { tag: 'name', name } };
}

export function termItem(name: string): TermItem {
  return {
    kind: 'term',
    hash: `#${name.toLowerCase()}hash`,
    name,
    otherNames: [],
    category: 'plain',
    signature: [{ text: `${name} : Nat`, ref: null }],
    source: [{ text: `${name} = 1`, ref: null }],
    doc: null,
  };
}

export function loaded(name: string): WorkspaceItem {
  return success(ref(name), termItem(name));
}

export function pending(name: string): WorkspaceItem {
  return loading(ref(name));
}

/** Linear order as names, with the focused one suffixed by `*`. */
export function render(items: WorkspaceItems): string[] {
  return mapToList(items, (item, isFocused) => `${hqToString(reference(item).hq)}${isFocused ? '*' : ''}`);
}

