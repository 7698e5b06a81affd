import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePackage = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@glyphscrape/types': resolvePackage('types'),
      '@glyphscrape/layout': resolvePackage('layout'),
      '@glyphscrape/scrape': resolvePackage('scrape'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
