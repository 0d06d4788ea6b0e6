import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');
  const apiBase = env.VITE_API_BASE_URL ?? `http://localhost:${env.PORT ?? 4100}`;
  return {
    plugins: [react()],
    server: {
      port: 5173,
      proxy: {
        '/api': apiBase,
      },
    },
    build: {
      outDir: 'dist',
      emptyOutDir: true,
    },
  };
});
