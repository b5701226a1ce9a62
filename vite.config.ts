import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// web/ is served from its own root; shared DTO types live under ../src
export default defineConfig({
  root: 'web',
  plugins: [react()],
  server: {
    port: 5173,
  },
  build: {
    outDir: '../dist/web',
    emptyOutDir: true,
  },
});
