import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per workspace package
    projects: ['packages/@tiledash/*/vitest.config.ts', 'examples/*/vitest.config.ts', 'benchmark/vitest.config.ts'],

    // Global test settings
    globals: true,
    environment: 'node',
    testTimeout: 30000,

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.{idea,git,cache,output,temp}/**'],
  },
})
