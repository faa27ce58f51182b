import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = (path: string) => fileURLToPath(new URL(path, import.meta.url));

// Mirrors the baseUrl-style imports ('types', 'index', 'src/...') used across the tree.
export default defineConfig({
  resolve: {
    alias: [
      { find: /^types$/, replacement: root('./types.ts') },
      { find: /^index$/, replacement: root('./index.ts') },
      { find: /^src\//, replacement: root('./src/') },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
});
