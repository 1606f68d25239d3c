import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    setupFiles: ['tests/test-setup.ts']
  },
  resolve: {
    alias: {
      '@/lib': path.resolve(__dirname, 'lib'),
      '@/types': path.resolve(__dirname, 'types'),
      '@/config': path.resolve(__dirname, 'config'),
      '@/app': path.resolve(__dirname, 'app'),
      '@/scripts': path.resolve(__dirname, 'scripts')
    }
  }
});
