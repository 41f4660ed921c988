import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export default defineConfig(() => {
  const packageDir = path.dirname(fileURLToPath(import.meta.url));
  return {
    test: {
      include: [path.join(packageDir, 'tests', '**', '*.{test,spec,e2e-spec}.?(c|m)[jt]s?(x)')],
      exclude: [
        path.join(packageDir, '**', 'node_modules', '**'),
        path.join(packageDir, '**', 'dist', '**'),
        path.join(packageDir, '**', 'coverage', '**'),
      ],
      silent: false,
      testTimeout: 10000,
    },
    resolve: {
      alias: {
        '@': path.join(packageDir, 'src'),
      },
    },
  };
});
