import type { Item } from '../../types/definition';
import { syntaxToSegments } from '../../api/definitions';
import { referenceToString, type Reference } from '../../workspace/reference';
import type { Outcome } from '../../workspace/workspace';
import { focus, length, toList } from '../../workspace/workspaceItems';
import { ref, render, termItem } from '../../workspace/__tests__/helpers';
import { createWorkspaceStore } from '../workspaceStore';

interface Pending {
  resolve: (item: Item) => void;
  reject: (err: unknown) => void;
}

function setup() {
  const pending = new Map<string, Pending>();
  const outcomes: Outcome[] = [];
  const fetchDefinition = jest.fn(
    (r: Reference) => new Promise<Item>((resolve, reject) => {
      pending.set(referenceToString(r), { resolve, reject });
    }),
  );
  let clock = 0;
  const store = createWorkspaceStore({
    fetchDefinition,
    onOutcome: (o) => outcomes.push(o),
    now: () => (clock += 10),
  });
  return { store, pending, outcomes, fetchDefinition };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('workspaceStore', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('open focuses a placeholder and fetches its definition', () => {
    const { store, outcomes, fetchDefinition } = setup();

    const outcome = store.getState().open(ref('X'));

    expect(outcome).toEqual({ type: 'focused', ref: ref('X') });
    expect(outcomes).toEqual([{ type: 'focused', ref: ref('X') }]);
    expect(fetchDefinition).toHaveBeenCalledTimes(1);
    expect(fetchDefinition).toHaveBeenCalledWith(ref('X'));
    expect(focus(store.getState().model.items)?.status).toBe('loading');
  });

  test('a resolved fetch replaces the placeholder and reports the focus', async () => {
    const { store, pending, outcomes } = setup();
    store.getState().open(ref('X'));

    pending.get('term/X')?.resolve(termItem('X'));
    await flush();

    const focused = focus(store.getState().model.items);
    expect(focused?.status).toBe('success');
    expect(outcomes).toEqual([
      { type: 'focused', ref: ref('X') },
      { type: 'focused', ref: ref('X') },
    ]);
  });

  test('a fetch finishing after the focus moved reports the current focus', async () => {
    const { store, pending, outcomes } = setup();
    store.getState().open(ref('X'));
    store.getState().open(ref('Y'), ref('X'));

    pending.get('term/X')?.resolve(termItem('X'));
    await flush();

    expect(render(store.getState().model.items)).toEqual(['Y*', 'X']);
    expect(outcomes[outcomes.length - 1]).toEqual({ type: 'focused', ref: ref('Y') });
  });

  test('a reference followed from an item opens right before that item', () => {
    const { store, fetchDefinition } = setup();
    store.getState().open(ref('A'));
    store.getState().open(ref('B'));
    const [link] = syntaxToSegments([{ segment: 'Optional', annotation: { tag: 'TypeReference', contents: '#opt' } }]);
    const target = link.ref;
    if (!target) throw new Error('expected a reference');

    expect(store.getState().open(target, ref('A'))).toEqual({ type: 'focused', ref: target });
    expect(render(store.getState().model.items)).toEqual(['B', '#opt*', 'A']);
    expect(fetchDefinition).toHaveBeenLastCalledWith({ kind: 'type', hq: { tag: 'hash', hash: '#opt' } });
  });

  test('reopening an open reference only focuses it', () => {
    const { store, fetchDefinition } = setup();
    store.getState().open(ref('X'));
    store.getState().open(ref('Y'));

    expect(store.getState().open(ref('X'))).toEqual({ type: 'focused', ref: ref('X') });
    expect(fetchDefinition).toHaveBeenCalledTimes(2);
    expect(render(store.getState().model.items)).toEqual(['Y', 'X*']);
  });

  test('a result for a closed item is discarded', async () => {
    const { store, pending, outcomes } = setup();
    store.getState().open(ref('X'));
    store.getState().open(ref('Y'));
    store.getState().close(ref('X'));
    const before = store.getState().model;

    pending.get('term/X')?.resolve(termItem('X'));
    await flush();

    expect(store.getState().model).toBe(before);
    expect(render(store.getState().model.items)).toEqual(['Y*']);
    expect(outcomes[outcomes.length - 1]).toEqual({ type: 'focused', ref: ref('Y') });
  });

  test('a rejected fetch becomes a failure and is logged', async () => {
    const { store, pending } = setup();
    store.getState().open(ref('X'));

    pending.get('term/X')?.reject(new Error('offline'));
    await flush();

    const [item] = toList(store.getState().model.items);
    expect(item.status).toBe('failure');
    expect(item.status === 'failure' && item.error.message).toBe('offline');
    expect(warn).toHaveBeenCalledWith('[workspace] fetch failed', 'term/X', 'offline');
  });

  test('non-Error rejections are wrapped', async () => {
    const { store, pending } = setup();
    store.getState().open(ref('X'));

    pending.get('term/X')?.reject('nope');
    await flush();

    const [item] = toList(store.getState().model.items);
    expect(item.status === 'failure' && item.error.message).toBe('nope');
  });

  test('reset starts over from a single loading reference', () => {
    const { store, fetchDefinition } = setup();
    store.getState().open(ref('X'));
    store.getState().open(ref('Y'));

    expect(store.getState().reset(ref('Z'))).toEqual({ type: 'focused', ref: ref('Z') });
    expect(render(store.getState().model.items)).toEqual(['Z*']);
    expect(fetchDefinition).toHaveBeenLastCalledWith(ref('Z'));

    expect(store.getState().reset()).toEqual({ type: 'emptied' });
    expect(length(store.getState().model.items)).toBe(0);
  });

  test('keydown drives navigation and closing', () => {
    const { store, outcomes } = setup();
    store.getState().open(ref('A'));
    store.getState().open(ref('B'));
    store.getState().open(ref('C'));
    expect(render(store.getState().model.items)).toEqual(['C*', 'B', 'A']);

    expect(store.getState().keydown('j')).toEqual({ outcome: { type: 'focused', ref: ref('B') }, shortcut: 'nextItem' });
    store.getState().keydown('shift+arrowdown');
    expect(render(store.getState().model.items)).toEqual(['C', 'A', 'B*']);

    store.getState().keydown('x');
    expect(render(store.getState().model.items)).toEqual(['C', 'A*']);
    expect(outcomes[outcomes.length - 1]).toEqual({ type: 'focused', ref: ref('A') });

    expect(store.getState().keydown('/').outcome).toEqual({ type: 'showFinderRequest' });
  });

  test('a bare modifier key does not replace the model', () => {
    const { store } = setup();
    store.getState().open(ref('A'));
    const before = store.getState().model;

    expect(store.getState().keydown('control')).toEqual({ outcome: { type: 'none' }, shortcut: null });
    expect(store.getState().model).toBe(before);
  });

  test('item actions update zoom and folds', async () => {
    const { store, pending } = setup();
    store.getState().open(ref('A'));
    pending.get('term/A')?.resolve(termItem('A'));
    await flush();

    store.getState().changeZoom(ref('A'), 'far');
    store.getState().cycleZoom(ref('A'));
    store.getState().toggleDocFold(ref('A'), 'doc-0');

    const [item] = toList(store.getState().model.items);
    expect(item.status === 'success' && item.data.zoom).toBe('medium');
    expect(item.status === 'success' && item.data.docFoldState.has('doc-0')).toBe(true);
  });

  test('focus reports nothing for a reference that is not open', () => {
    const { store } = setup();
    store.getState().open(ref('A'));
    expect(store.getState().focus(ref('Z'))).toEqual({ type: 'none' });
  });
});
