import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// The board talks to the task API started by `npm run dev`; PORT moves both.
const apiTarget = process.env.VITE_API_PROXY_TARGET ?? `http://127.0.0.1:${process.env.PORT ?? '8787'}`

export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
    proxy: {
      '/api': { target: apiTarget, changeOrigin: true },
    },
  },
  preview: {
    proxy: {
      '/api': { target: apiTarget, changeOrigin: true },
    },
  },
  build: {
    outDir: 'dist',
    emptyOutDir: true,
  },
})
