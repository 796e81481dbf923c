import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'sdk/src/**/*.test.ts',
      'server/typescript/tests/**/*.test.ts',
      'tests/**/*.test.ts',
    ],
    testTimeout: 10000,
  },
})
