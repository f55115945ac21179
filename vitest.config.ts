import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const libPath = (name: string) => fileURLToPath(new URL(`./libs/${name}/src/index.ts`, import.meta.url));

const alias = {
  '@apikit/api-client-core': libPath('api-client-core'),
  '@apikit/api-client-pagination': libPath('api-client-pagination'),
  '@apikit/api-client-storage': libPath('api-client-storage'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
