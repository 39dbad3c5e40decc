import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const buildId = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
const apiTarget = process.env.CODEBASE_API_URL || 'http://127.0.0.1:5858';

export default defineConfig({
  plugins: [react()],
  define: {
    __BUILD_ID__: JSON.stringify(buildId),
    __API_BASE__: JSON.stringify(process.env.CODEBASE_API_BASE || '/api'),
  },
  build: {
    rollupOptions: {
      output: {
        manualChunks: {
          'vendor-react': ['react', 'react-dom', 'react-router-dom'],
          'vendor-query': ['@tanstack/react-query'],
          'vendor-ui': ['zustand', '@radix-ui/react-tooltip', 'react-hotkeys-hook'],
        },
      },
    },
  },
  server: {
    port: 5173,
    proxy: {
      '/api': {
        target: apiTarget,
        changeOrigin: true,
      },
    },
  },
});
