import { defineConfig } from 'vitest/config'

/**
 * Tests touch the real filesystem under os.tmpdir(), so they run in the
 * node environment. Each test owns its temporary directory.
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'src/cli/bin.ts'],
    },
  },
})
