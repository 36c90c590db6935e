import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['tests/test-setup.ts'],
    include: ['tests/**/*.spec.ts']
  },
  resolve: {
    alias: {
      '@/lib': path.resolve(__dirname, 'lib'),
      '@/config': path.resolve(__dirname, 'config'),
      '@/scripts': path.resolve(__dirname, 'scripts')
    }
  }
});
