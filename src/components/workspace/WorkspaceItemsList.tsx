import { useEffect } from 'react';
import { mapToList } from '../../workspace/workspaceItems';
import { referenceToString } from '../../workspace/reference';
import { useWorkspaceStore } from '../../stores/workspaceStore';
import { useUiStore } from '../../stores/uiStore';
import { ErrorBoundary } from '../common/ErrorBoundary';
import { WorkspaceItemView, domIdForKey, workspaceItemDomId } from './WorkspaceItemView';

export function WorkspaceItemsList() {
  const items = useWorkspaceStore((s) => s.model.items);
  const scrollTarget = useUiStore((s) => s.scrollTarget);

  useEffect(() => {
    if (!scrollTarget) {
      window.scrollTo({ top: 0 });
      return;
    }
    const el = document.getElementById(domIdForKey(scrollTarget.key));
    el?.scrollIntoView({ behavior: 'smooth', block: 'start' });
  }, [scrollTarget]);

  const rendered = mapToList(items, (wsItem, isFocused) => (
    <ErrorBoundary key={workspaceItemDomId(wsItem)} label={referenceToString(wsItem.ref)}>
      <WorkspaceItemView wsItem={wsItem} isFocused={isFocused} />
    </ErrorBoundary>
  ));

  if (rendered.length === 0) {
    return (
      <div className="py-16 text-center text-sm text-gray-500 dark:text-gray-400">
        No definitions open. Press <kbd className="px-1 border rounded">/</kbd> to find one.
      </div>
    );
  }
  return <div className="space-y-3">{rendered}</div>;
}
