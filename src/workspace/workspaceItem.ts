import type { Item, ZoomLevel } from '../types/definition';
import { referenceEquals, referenceToString, type Reference } from './reference';

export interface LoadedItem {
  item: Item;
  zoom: ZoomLevel;
  docFoldState: ReadonlySet<string>;
}

export type WorkspaceItem =
  | { status: 'loading'; ref: Reference }
  | { status: 'failure'; ref: Reference; error: Error }
  | { status: 'success'; ref: Reference; data: LoadedItem };

export type FetchResult =
  | { ok: true; item: Item }
  | { ok: false; error: Error };

const NEXT_ZOOM: Record<ZoomLevel, ZoomLevel> = {
  far: 'medium',
  medium: 'near',
  near: 'far',
};

export function loading(ref: Reference): WorkspaceItem {
  return { status: 'loading', ref };
}

export function failure(ref: Reference, error: Error): WorkspaceItem {
  return { status: 'failure', ref, error };
}

export function success(ref: Reference, item: Item): WorkspaceItem {
  return { status: 'success', ref, data: { item, zoom: 'medium', docFoldState: new Set() } };
}

export function fromFetchResult(ref: Reference, result: FetchResult): WorkspaceItem {
  return result.ok ? success(ref, result.item) : failure(ref, result.error);
}

export function reference(item: WorkspaceItem): Reference {
  return item.ref;
}

export function isSameReference(item: WorkspaceItem, ref: Reference): boolean {
  return referenceEquals(reference(item), ref);
}

export function isSameByReference(a: WorkspaceItem, b: WorkspaceItem): boolean {
  return referenceEquals(reference(a), reference(b));
}

export function cycleZoomLevel(zoom: ZoomLevel): ZoomLevel {
  return NEXT_ZOOM[zoom];
}

function updateLoaded(item: WorkspaceItem, f: (data: LoadedItem) => LoadedItem): WorkspaceItem {
  if (item.status !== 'success') return item;
  return { ...item, data: f(item.data) };
}

export function cycleZoom(item: WorkspaceItem): WorkspaceItem {
  return updateLoaded(item, (data) => ({ ...data, zoom: cycleZoomLevel(data.zoom) }));
}

export function setZoom(item: WorkspaceItem, zoom: ZoomLevel): WorkspaceItem {
  return updateLoaded(item, (data) => ({ ...data, zoom }));
}

export function toggleDocFold(item: WorkspaceItem, foldId: string): WorkspaceItem {
  return updateLoaded(item, (data) => {
    const next = new Set(data.docFoldState);
    if (next.has(foldId)) {
      next.delete(foldId);
    } else {
      next.add(foldId);
    }
    return { ...data, docFoldState: next };
  });
}

export function isDocFolded(item: WorkspaceItem, foldId: string): boolean {
  return item.status === 'success' && item.data.docFoldState.has(foldId);
}

export function itemName(item: WorkspaceItem): string {
  return item.status === 'success' ? item.data.item.name : referenceToString(item.ref);
}
