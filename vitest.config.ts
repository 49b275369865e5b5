import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    testTimeout: 30000,
    hookTimeout: 10000,
  },
})
