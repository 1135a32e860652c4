import { defineConfig } from 'vite';
import { resolve } from 'path';

export default defineConfig({
  publicDir: false,
  build: {
    outDir: 'media',
    emptyOutDir: false,
    sourcemap: false,
    target: 'es2019',
    assetsDir: '.',
    rollupOptions: {
      input: resolve(__dirname, 'webview/src/viewer.ts'),
      output: {
        entryFileNames: 'viewer.js',
        format: 'iife'
      }
    }
  }
});
