import { lazy, Suspense, type ComponentType } from 'react';
import { HashRouter, Routes, Route } from 'react-router-dom';
import { QueryClientProvider } from '@tanstack/react-query';
import { queryClient } from './api/queryClient';
import { AppShell } from './components/layout/AppShell';
import { ErrorBoundary } from './components/common/ErrorBoundary';

const WorkspacePage = lazy(() =>
  import('./pages/workspace/WorkspacePage').then((module) => ({ default: module.WorkspacePage })),
);

function RouteFallback() {
  return (
    <div className="text-sm text-gray-500 dark:text-gray-400">
      Loading workspace...
    </div>
  );
}

function wrap(Component: ComponentType) {
  return (
    <ErrorBoundary label="workspace">
      <Suspense fallback={<RouteFallback />}>
        <Component />
      </Suspense>
    </ErrorBoundary>
  );
}

export default function App() {
  return (
    <QueryClientProvider client={queryClient}>
      <HashRouter>
        <Routes>
          <Route element={<AppShell />}>
            <Route index element={wrap(WorkspacePage)} />
          </Route>
        </Routes>
      </HashRouter>
    </QueryClientProvider>
  );
}
