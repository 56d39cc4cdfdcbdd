import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts', 'packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', 'build'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.config.*', '**/types.ts', 'src/cli.ts'],
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@whois-tools/agents': resolvePath('./packages/whois-agents/src/index.ts'),
      '@': resolvePath('./src'),
    },
  },
});
