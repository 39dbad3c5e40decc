import { useState, type FormEvent } from 'react';
import { useHotkeys } from 'react-hotkeys-hook';
import { hqFromString, type ReferenceKind } from '../../workspace/reference';
import { useUiStore } from '../../stores/uiStore';
import { useWorkspaceStore } from '../../stores/workspaceStore';

const KIND_OPTIONS: { value: ReferenceKind; label: string }[] = [
  { value: 'term', label: 'Term' },
  { value: 'type', label: 'Type' },
  { value: 'data-constructor', label: 'Constructor' },
  { value: 'ability-constructor', label: 'Ability constructor' },
];

const inputCls = 'px-2 py-1.5 text-sm border border-gray-300 dark:border-gray-600 rounded bg-white dark:bg-gray-700';

export function FinderDialog() {
  const finderOpen = useUiStore((s) => s.finderOpen);
  const closeFinder = useUiStore((s) => s.closeFinder);
  const open = useWorkspaceStore((s) => s.open);
  const [kind, setKind] = useState<ReferenceKind>('term');
  const [query, setQuery] = useState('');
  const [error, setError] = useState('');

  useHotkeys('escape', () => closeFinder(), { enabled: finderOpen, enableOnFormTags: true }, [closeFinder]);

  if (!finderOpen) return null;

  const submit = (e: FormEvent) => {
    e.preventDefault();
    const hq = hqFromString(query);
    if (!hq) {
      setError('Enter a name, #hash or name#hash');
      return;
    }
    open({ kind, hq });
    setQuery('');
    setError('');
    closeFinder();
  };

  return (
    <div className="fixed inset-0 z-40 flex items-start justify-center pt-24 bg-black/30" onClick={closeFinder}>
      <form
        onSubmit={submit}
        onClick={(e) => e.stopPropagation()}
        className="w-full max-w-lg p-4 space-y-2 bg-white dark:bg-gray-800 rounded-lg shadow-xl"
      >
        <div className="flex gap-2">
          <select className={inputCls} value={kind} onChange={(e) => {
            const next = KIND_OPTIONS.find((o) => o.value === e.target.value);
            if (next) setKind(next.value);
          }}>
            {KIND_OPTIONS.map((o) => <option key={o.value} value={o.value}>{o.label}</option>)}
          </select>
          <input
            autoFocus
            className={`${inputCls} flex-1 font-mono`}
            placeholder="List.map"
            value={query}
            onChange={(e) => setQuery(e.target.value)}
          />
        </div>
        {error && <p className="text-xs text-red-600 dark:text-red-400">{error}</p>}
      </form>
    </div>
  );
}
