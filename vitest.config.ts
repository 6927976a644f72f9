import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      PROMPTLINE_DEBUG_LOG: 'off',
    },
  },
})
