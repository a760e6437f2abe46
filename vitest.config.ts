import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packages = ['types', 'crypto', 'merkle'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@arbor/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
