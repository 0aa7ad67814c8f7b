/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [
    // Resolves the @core/, @adapter/, @helpers/, @utils/ and @test-helper/ aliases.
    tsconfigPaths(),
  ],
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: 'tests/vitest.setup.ts',
  },
});
