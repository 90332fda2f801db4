import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      // Plain, uncolored output so tests can assert exact lines
      NO_COLOR: '1',
      FORCE_COLOR: '0'
    }
  },
})
