import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'mcp/*/tests/**/*.test.ts',
      'packages/*/src/__tests__/**/*.test.ts',
    ],
    environment: 'node',
    restoreMocks: true,
  },
});
