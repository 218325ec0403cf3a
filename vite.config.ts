import { defineConfig } from 'vite';
import { resolve } from 'path';

// Browser bundle for the web UI; Express serves the output from public/
export default defineConfig({
  root: resolve(__dirname, 'client'),
  publicDir: false,
  build: {
    outDir: resolve(__dirname, 'public'),
    emptyOutDir: true,
  },
  server: {
    port: 5173,
    proxy: {
      '/api': { target: 'http://localhost:8080', changeOrigin: true },
      '/events': { target: 'http://localhost:8080', changeOrigin: true },
      '/uploads': { target: 'http://localhost:8080', changeOrigin: true },
      '/upload': { target: 'http://localhost:8080', changeOrigin: true },
    },
  },
});
