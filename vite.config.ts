/// <reference types="vitest" />
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  plugins: [
    dts({ include: ['src'], rollupTypes: true })
  ],
  build: {
    lib: {
      entry: {
        index: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
        cli: fileURLToPath(new URL('./src/cli.ts', import.meta.url)),
      },
      formats: ['es'],
    },
    target: 'node20',
    rollupOptions: {
      external: ['better-sqlite3', 'zod', /^node:/]
    }
  }
})
