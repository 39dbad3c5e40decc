import { Outlet } from 'react-router-dom';
import { useUiStore } from '../../stores/uiStore';
import { useWorkspaceStore } from '../../stores/workspaceStore';
import { length } from '../../workspace/workspaceItems';
import { appConfig } from '../../config';
import { Tip } from '../common/Tip';

const btnCls = 'px-3 py-1 text-xs rounded border border-gray-300 dark:border-gray-600 hover:bg-gray-100 dark:hover:bg-gray-700';

export function AppShell() {
  const darkMode = useUiStore((s) => s.darkMode);
  const toggleDarkMode = useUiStore((s) => s.toggleDarkMode);
  const openFinder = useUiStore((s) => s.openFinder);
  const openCount = useWorkspaceStore((s) => length(s.model.items));

  return (
    <div className="min-h-screen bg-gray-50 dark:bg-gray-900 text-gray-900 dark:text-gray-100">
      <header className="sticky top-0 z-30 flex items-center gap-3 px-4 py-2 border-b border-gray-200 dark:border-gray-700 bg-white dark:bg-gray-800">
        <h1 className="text-sm font-semibold">Codebase Workspace</h1>
        <span className="text-xs text-gray-500 dark:text-gray-400">{openCount} open</span>
        <div className="ml-auto flex items-center gap-2">
          <Tip text="Find a definition (/ or Ctrl+K)">
            <button className={btnCls} onClick={openFinder}>Find</button>
          </Tip>
          <button className={btnCls} onClick={toggleDarkMode}>{darkMode ? 'Light' : 'Dark'}</button>
          <span className="text-[10px] text-gray-400">build {appConfig.buildId}</span>
        </div>
      </header>
      <main className="max-w-4xl mx-auto p-4">
        <Outlet />
      </main>
    </div>
  );
}
