import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  base: '/',
  // 'mpa' answers 404 for a missing CSV instead of serving index.html
  appType: 'mpa',
  server: {
    port: 5173
  }
})
