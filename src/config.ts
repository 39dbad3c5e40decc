// Vite replaces these at build time; under tests they are undeclared at runtime.
const apiBase = typeof __API_BASE__ === 'string' ? __API_BASE__ : '/api';
const buildId = typeof __BUILD_ID__ === 'string' ? __BUILD_ID__ : 'dev';

export const appConfig = {
  apiBasePath: apiBase.replace(/\/+$/, ''),
  buildId,
  // Definitions are content-addressed by hash.
  definitionStaleTime: Infinity,
  queryRetry: 1,
} as const;
