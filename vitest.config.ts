import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'src/shared'),
      '@core': path.resolve(__dirname, 'src/joblog-core'),
      '@momentum-client': path.resolve(__dirname, 'src/momentum-client'),
      '@api': path.resolve(__dirname, 'src/joblog-api'),
      '@worker': path.resolve(__dirname, 'src/joblog-worker'),
      '@db': path.resolve(__dirname, 'src/db'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
