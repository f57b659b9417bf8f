import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['iac/**/*.test.ts', 'lambda/**/*.test.ts', 'utils/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'cdk.out/**', 'dist/**'],
    testTimeout: 30000,
  },
});
