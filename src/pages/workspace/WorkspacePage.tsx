import { useEffect } from 'react';
import { useSearchParams } from 'react-router-dom';
import { referenceFromString } from '../../workspace/reference';
import { useWorkspaceStore } from '../../stores/workspaceStore';
import { useWorkspaceHotkeys } from '../../hooks/useWorkspaceHotkeys';
import { WorkspaceItemsList } from '../../components/workspace/WorkspaceItemsList';
import { FinderDialog } from '../../components/workspace/FinderDialog';

export function WorkspacePage() {
  const [searchParams] = useSearchParams();
  const initial = searchParams.get('open');
  const reset = useWorkspaceStore((s) => s.reset);

  useEffect(() => {
    const ref = initial ? referenceFromString(initial) : null;
    reset(ref ?? undefined);
  }, [initial, reset]);

  useWorkspaceHotkeys();

  return (
    <>
      <WorkspaceItemsList />
      <FinderDialog />
    </>
  );
}
