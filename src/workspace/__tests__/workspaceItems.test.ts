import * as WorkspaceItems from '../workspaceItems';
import { loaded, pending, ref, render } from './helpers';

function abc(focusName: 'A' | 'B' | 'C') {
  const all = [pending('A'), pending('B'), pending('C')];
  const at = ['A', 'B', 'C'].indexOf(focusName);
  return WorkspaceItems.fromItems(all.slice(0, at), all[at], all.slice(at + 1));
}

describe('init', () => {
  test('without a reference is empty', () => {
    const items = WorkspaceItems.init();
    expect(items).toEqual({ tag: 'empty' });
    expect(WorkspaceItems.isEmpty(items)).toBe(true);
    expect(WorkspaceItems.focus(items)).toBeNull();
    expect(render(items)).toEqual([]);
  });

  test('with a reference focuses a loading placeholder', () => {
    const items = WorkspaceItems.init(ref('X'));
    expect(items).toEqual({ tag: 'nonEmpty', before: [], focus: pending('X'), after: [] });
  });
});

describe('member / get', () => {
  test('finds elements before, at and after the focus', () => {
    const items = abc('B');
    expect(WorkspaceItems.member(items, ref('A'))).toBe(true);
    expect(WorkspaceItems.member(items, ref('B'))).toBe(true);
    expect(WorkspaceItems.member(items, ref('C'))).toBe(true);
    expect(WorkspaceItems.member(items, ref('D'))).toBe(false);
    expect(WorkspaceItems.get(items, ref('C'))).toEqual(pending('C'));
    expect(WorkspaceItems.get(items, ref('D'))).toBeNull();
  });

  test('distinguishes references by kind', () => {
    const items = WorkspaceItems.init(ref('A'));
    expect(WorkspaceItems.member(items, { kind: 'type', hq: { tag: 'name', name: 'A' } })).toBe(false);
  });
});

describe('insertion', () => {
  test('prependWithFocus puts the new item first and focuses it', () => {
    let items = WorkspaceItems.init();
    items = WorkspaceItems.prependWithFocus(items, pending('A'));
    items = WorkspaceItems.prependWithFocus(items, pending('B'));
    items = WorkspaceItems.prependWithFocus(items, pending('C'));
    expect(render(items)).toEqual(['C*', 'B', 'A']);
  });

  test('prependWithFocus keeps relative order when the focus was in the middle', () => {
    const items = WorkspaceItems.prependWithFocus(abc('B'), pending('D'));
    expect(render(items)).toEqual(['D*', 'A', 'B', 'C']);
  });

  test('insertWithFocusBefore places the item right before the anchor', () => {
    const items = WorkspaceItems.insertWithFocusBefore(abc('A'), ref('C'), pending('D'));
    expect(render(items)).toEqual(['A', 'B', 'D*', 'C']);
  });

  test('insertWithFocusBefore a first anchor makes the item first', () => {
    const items = WorkspaceItems.insertWithFocusBefore(WorkspaceItems.singleton(loaded('X')), ref('X'), pending('Y'));
    expect(items).toEqual({ tag: 'nonEmpty', before: [], focus: pending('Y'), after: [loaded('X')] });
  });

  test('insertWithFocusBefore a missing anchor falls back to prepending', () => {
    const items = WorkspaceItems.insertWithFocusBefore(abc('C'), ref('Z'), pending('D'));
    expect(render(items)).toEqual(['D*', 'A', 'B', 'C']);
  });

  test('a chain of related opens always focuses the newest item', () => {
    let items = WorkspaceItems.init(ref('A'));
    items = WorkspaceItems.insertWithFocusBefore(items, ref('A'), pending('B'));
    items = WorkspaceItems.insertWithFocusBefore(items, ref('A'), pending('C'));
    items = WorkspaceItems.prependWithFocus(items, pending('D'));
    items = WorkspaceItems.insertWithFocusBefore(items, ref('B'), pending('E'));
    expect(render(items)).toEqual(['D', 'E*', 'B', 'C', 'A']);
  });

  test('appendWithFocus puts the item last', () => {
    expect(render(WorkspaceItems.appendWithFocus(abc('A'), pending('D')))).toEqual(['A', 'B', 'C', 'D*']);
    expect(render(WorkspaceItems.appendWithFocus(WorkspaceItems.empty, pending('D')))).toEqual(['D*']);
  });

  test('insertWithFocusAfter places the item right after the anchor', () => {
    expect(render(WorkspaceItems.insertWithFocusAfter(abc('C'), ref('A'), pending('D')))).toEqual(['A', 'D*', 'B', 'C']);
    expect(render(WorkspaceItems.insertWithFocusAfter(abc('C'), ref('Z'), pending('D')))).toEqual(['A', 'B', 'C', 'D*']);
  });
});

describe('replace', () => {
  test.each(['A', 'B', 'C'] as const)('replacing %s keeps its index and the focus', (name) => {
    for (const focusName of ['A', 'B', 'C'] as const) {
      const items = abc(focusName);
      const before = render(items);
      const replaced = WorkspaceItems.replace(items, ref(name), loaded(name));

      expect(render(replaced)).toEqual(before);
      expect(WorkspaceItems.focusIndex(replaced)).toBe(WorkspaceItems.focusIndex(items));
      const index = ['A', 'B', 'C'].indexOf(name);
      expect(WorkspaceItems.toList(replaced)[index]).toEqual(loaded(name));
    }
  });

  test('is the identity for a missing reference', () => {
    const items = abc('B');
    expect(WorkspaceItems.replace(items, ref('Z'), loaded('Z'))).toBe(items);
    expect(WorkspaceItems.replace(WorkspaceItems.empty, ref('Z'), loaded('Z'))).toBe(WorkspaceItems.empty);
  });
});

describe('map', () => {
  test('applies to every element and preserves the focus position', () => {
    const items = WorkspaceItems.map(abc('B'), (item) => ({ status: 'failure', ref: item.ref, error: new Error('x') }));
    expect(render(items)).toEqual(['A', 'B*', 'C']);
    expect(WorkspaceItems.toList(items).every((i) => i.status === 'failure')).toBe(true);
  });
});

describe('remove', () => {
  test('removing a non-focused item keeps the focus', () => {
    expect(render(WorkspaceItems.remove(abc('B'), ref('A')))).toEqual(['B*', 'C']);
    expect(render(WorkspaceItems.remove(abc('B'), ref('C')))).toEqual(['A', 'B*']);
  });

  test('removing the focused first item focuses the next one', () => {
    expect(render(WorkspaceItems.remove(abc('A'), ref('A')))).toEqual(['B*', 'C']);
  });

  test('removing the focused middle item focuses the next one', () => {
    expect(render(WorkspaceItems.remove(abc('B'), ref('B')))).toEqual(['A', 'C*']);
  });

  test('removing the focused last item focuses the previous one', () => {
    expect(render(WorkspaceItems.remove(abc('C'), ref('C')))).toEqual(['A', 'B*']);
  });

  test('removing the sole item empties the collection', () => {
    const items = WorkspaceItems.remove(WorkspaceItems.init(ref('A')), ref('A'));
    expect(items).toEqual({ tag: 'empty' });
  });

  test('member is false afterwards', () => {
    for (const name of ['A', 'B', 'C']) {
      expect(WorkspaceItems.member(WorkspaceItems.remove(abc('B'), ref(name)), ref(name))).toBe(false);
    }
  });

  test('is the identity for a missing reference', () => {
    const items = abc('A');
    expect(WorkspaceItems.remove(items, ref('Z'))).toBe(items);
  });
});

describe('next / prev', () => {
  test('prev at the first element is a no-op', () => {
    const items = abc('A');
    expect(WorkspaceItems.prev(items)).toBe(items);
  });

  test('next saturates at the last element', () => {
    let items = abc('A');
    items = WorkspaceItems.next(items);
    expect(render(items)).toEqual(['A', 'B*', 'C']);
    items = WorkspaceItems.next(items);
    expect(render(items)).toEqual(['A', 'B', 'C*']);
    items = WorkspaceItems.next(items);
    expect(render(items)).toEqual(['A', 'B', 'C*']);
    expect(WorkspaceItems.length(items)).toBe(3);
  });

  test('prev walks back to the first element', () => {
    const items = WorkspaceItems.prev(WorkspaceItems.prev(abc('C')));
    expect(render(items)).toEqual(['A*', 'B', 'C']);
  });

  test('are no-ops on an empty collection', () => {
    expect(WorkspaceItems.next(WorkspaceItems.empty)).toBe(WorkspaceItems.empty);
    expect(WorkspaceItems.prev(WorkspaceItems.empty)).toBe(WorkspaceItems.empty);
  });
});

describe('moveUp / moveDown', () => {
  test('moveUp swaps with the previous element and keeps the focus', () => {
    expect(render(WorkspaceItems.moveUp(abc('C')))).toEqual(['A', 'C*', 'B']);
  });

  test('moveDown swaps with the next element and keeps the focus', () => {
    expect(render(WorkspaceItems.moveDown(abc('A')))).toEqual(['B', 'A*', 'C']);
  });

  test('are no-ops at their boundary', () => {
    const first = abc('A');
    const lastItems = abc('C');
    expect(WorkspaceItems.moveUp(first)).toBe(first);
    expect(WorkspaceItems.moveDown(lastItems)).toBe(lastItems);
  });
});

describe('focusOn / focusFirst / focusLast', () => {
  test('focusOn keeps order and count', () => {
    const items = WorkspaceItems.focusOn(abc('A'), ref('C'));
    expect(render(items)).toEqual(['A', 'B', 'C*']);
    expect(WorkspaceItems.focusOn(items, ref('Z'))).toBe(items);
  });

  test('focusFirst and focusLast jump to the ends', () => {
    expect(render(WorkspaceItems.focusFirst(abc('C')))).toEqual(['A*', 'B', 'C']);
    expect(render(WorkspaceItems.focusLast(abc('A')))).toEqual(['A', 'B', 'C*']);
  });
});

describe('queries', () => {
  test('head, last, length and focusIndex', () => {
    const items = abc('B');
    expect(WorkspaceItems.head(items)).toEqual(pending('A'));
    expect(WorkspaceItems.last(items)).toEqual(pending('C'));
    expect(WorkspaceItems.length(items)).toBe(3);
    expect(WorkspaceItems.focusIndex(items)).toBe(1);
    expect(WorkspaceItems.isFocused(items, ref('B'))).toBe(true);
    expect(WorkspaceItems.isFocused(items, ref('A'))).toBe(false);
    expect(WorkspaceItems.focusIndex(WorkspaceItems.empty)).toBe(-1);
    expect(WorkspaceItems.last(WorkspaceItems.empty)).toBeNull();
  });

  test('updateFocus only touches the focused element', () => {
    const items = WorkspaceItems.updateFocus(abc('B'), () => loaded('B'));
    expect(WorkspaceItems.toList(items)).toEqual([pending('A'), loaded('B'), pending('C')]);
  });
});
