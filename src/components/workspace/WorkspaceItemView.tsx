import type { DocSection, Item, SyntaxSegment, ZoomLevel } from '../../types/definition';
import { referenceToString, type Reference } from '../../workspace/reference';
import { isDocFolded, itemName, type WorkspaceItem } from '../../workspace/workspaceItem';
import { itemKindLabel } from '../../utils/colors';
import { useWorkspaceStore } from '../../stores/workspaceStore';
import { CodeBlock } from '../common/CodeBlock';
import { StatusBadge } from '../common/StatusBadge';
import { Tip } from '../common/Tip';
import { SyntaxView } from './SyntaxView';

const ZOOM_LABELS: Record<ZoomLevel, string> = { far: 'Far', medium: 'Medium', near: 'Near' };

const btnCls = 'px-2 py-0.5 text-xs rounded border border-gray-300 dark:border-gray-600 hover:bg-gray-100 dark:hover:bg-gray-700';

export function domIdForKey(key: string): string {
  return `workspace-item-${encodeURIComponent(key)}`;
}

export function workspaceItemDomId(item: WorkspaceItem): string {
  return domIdForKey(referenceToString(item.ref));
}

function signatureOf(item: Item): SyntaxSegment[] {
  return item.kind === 'type' ? [] : item.signature;
}

function docsOf(item: Item): DocSection[] {
  return (item.kind === 'term' || item.kind === 'type') && item.doc ? item.doc : [];
}

function DocSections({ wsItem, sections }: { wsItem: WorkspaceItem; sections: DocSection[] }) {
  const toggleDocFold = useWorkspaceStore((s) => s.toggleDocFold);
  if (sections.length === 0) return null;
  return (
    <div className="mt-2 space-y-1">
      {sections.map((section) => {
        const folded = isDocFolded(wsItem, section.id);
        return (
          <div key={section.id} className="text-sm">
            <button
              onClick={() => toggleDocFold(wsItem.ref, section.id)}
              className="text-xs font-medium text-gray-600 dark:text-gray-300 hover:underline"
            >
              {folded ? '▸' : '▾'} {section.title || 'Documentation'}
            </button>
            {!folded && <p className="ml-4 whitespace-pre-line text-gray-700 dark:text-gray-300">{section.body}</p>}
          </div>
        );
      })}
    </div>
  );
}

function LoadedBody({ wsItem, item, zoom }: { wsItem: WorkspaceItem; item: Item; zoom: ZoomLevel }) {
  const open = useWorkspaceStore((s) => s.open);
  // definitions opened from here land right before this item
  const openFromHere = (target: Reference) => { open(target, wsItem.ref); };
  const signature = signatureOf(item);
  if (zoom === 'far') {
    if (signature.length === 0) return null;
    return (
      <p className="text-xs font-mono text-gray-500 truncate">
        <SyntaxView segments={signature} onOpen={openFromHere} />
      </p>
    );
  }
  return (
    <>
      <CodeBlock maxHeight={zoom === 'near' ? 'max-h-none' : 'max-h-48'}>
        <SyntaxView segments={item.source.length > 0 ? item.source : signature} onOpen={openFromHere} />
      </CodeBlock>
      {zoom === 'near' && (
        <>
          {item.otherNames.length > 0 && (
            <p className="mt-1 text-xs text-gray-500">Also known as {item.otherNames.join(', ')}</p>
          )}
          <DocSections wsItem={wsItem} sections={docsOf(item)} />
        </>
      )}
    </>
  );
}

export function WorkspaceItemView({ wsItem, isFocused }: { wsItem: WorkspaceItem; isFocused: boolean }) {
  const focus = useWorkspaceStore((s) => s.focus);
  const close = useWorkspaceStore((s) => s.close);
  const cycleZoom = useWorkspaceStore((s) => s.cycleZoom);

  const borderCls = isFocused
    ? 'border-accent dark:border-accent-dark ring-1 ring-accent/40'
    : 'border-gray-200 dark:border-gray-700';

  return (
    <article
      id={workspaceItemDomId(wsItem)}
      onClick={() => focus(wsItem.ref)}
      className={`p-3 rounded-lg border bg-white dark:bg-gray-800 ${borderCls}`}
    >
      <header className="flex items-center gap-2 mb-2">
        <h2 className="font-mono text-sm font-semibold truncate">{itemName(wsItem)}</h2>
        {wsItem.status === 'success' && <StatusBadge label={itemKindLabel(wsItem.data.item)} />}
        <div className="ml-auto flex gap-1">
          {wsItem.status === 'success' && (
            <Tip text="Cycle zoom (Space)">
              <button className={btnCls} onClick={(e) => { e.stopPropagation(); cycleZoom(wsItem.ref); }}>
                {ZOOM_LABELS[wsItem.data.zoom]}
              </button>
            </Tip>
          )}
          <Tip text="Close (x)">
            <button className={btnCls} onClick={(e) => { e.stopPropagation(); close(wsItem.ref); }}>
              ✕
            </button>
          </Tip>
        </div>
      </header>

      {wsItem.status === 'loading' && <p className="text-sm text-gray-500 dark:text-gray-400">Loading...</p>}
      {wsItem.status === 'failure' && (
        <p className="text-xs font-mono text-red-700 dark:text-red-300">{wsItem.error.message}</p>
      )}
      {wsItem.status === 'success' && <LoadedBody wsItem={wsItem} item={wsItem.data.item} zoom={wsItem.data.zoom} />}
    </article>
  );
}
