import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['{apps,packages}/*/src/**/__tests__/**/*.test.ts'],
  },
})
