import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const at = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@league/schemas': at('./packages/schemas/src/index.ts'),
      '@league/core': at('./packages/core/src/index.ts'),
      '@league/interfaces': at('./packages/interfaces/src/index.ts'),
      '@league/storage': at('./packages/storage/src/index.ts'),
      '@league/risk': at('./agents/risk/src/index.ts'),
      '@league/strategy': at('./agents/strategy/src/index.ts'),
      '@league/signal': at('./agents/signal/src/index.ts'),
      '@league/execution': at('./agents/execution/src/index.ts'),
      '@league/manager': at('./apps/league/src/index.ts'),
      '@league/orchestrator': at('./apps/orchestrator/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'agents/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
});
