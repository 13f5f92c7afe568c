import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    include: [
      'src/**/__tests__/**/*.test.ts'     // Colocated tests in __tests__/ subdirectories
    ],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],
    reporters: 'default',
    env: {
      NODE_ENV: 'test'
    }
  }
});
