import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['types', 'crypto', 'core', 'config', 'collateral', 'venue', 'pool', 'guarantee', 'protocol'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@backstop/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
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
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
      reporter: ['text', 'text-summary'],
    },
  },
});
