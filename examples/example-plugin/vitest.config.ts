import { defineConfig } from 'vitest/config'
import { dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@tiledash/core': fileURLToPath(new URL('../../packages/@tiledash/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'example-plugin',
    root: __dirname,
    include: ['src/**/*.test.ts'],
    globals: true,
    environment: 'node',
  },
})
