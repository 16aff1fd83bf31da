import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    env: {
      // Tests assert on warnings and errors; keep info lines out of the output
      LOG_LEVEL: 'warn',
    },
  },
})
