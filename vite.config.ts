import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const SUPERVISOR = 'http://127.0.0.1:8080'

export default defineConfig({
  plugins: [react()],
  base: './',
  build: {
    outDir: 'dist',
    emptyOutDir: true,
  },
  server: {
    proxy: {
      '/ws': {
        target: SUPERVISOR.replace(/^http/, 'ws'),
        ws: true,
      },
      '/batteries': SUPERVISOR,
    },
  },
})
