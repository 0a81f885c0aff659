import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@sluice/types': resolve('./packages/types/src'),
      '@sluice/data-feed': resolve('./packages/data-feed/src'),
      '@sluice/strategy-engine': resolve('./packages/strategy-engine/src'),
      '@sluice/simulator': resolve('./packages/simulator/src'),
      '@sluice/adapters-stability-pool': resolve('./packages/adapters/stability-pool/src'),
      '@sluice/adapters-uniswap': resolve('./packages/adapters/uniswap/src'),
      '@sluice/adapters-curve': resolve('./packages/adapters/curve/src'),
    },
  },
});
