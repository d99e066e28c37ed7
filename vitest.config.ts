import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      exclude: ['node_modules/', 'dist/', 'logs/', 'src/__tests__/', '*.config.*', 'coverage/'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
