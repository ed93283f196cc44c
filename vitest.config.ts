import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: fileURLToPath(new URL('./src/', import.meta.url)) },
      { find: /^@tests\//, replacement: fileURLToPath(new URL('./tests/', import.meta.url)) }
    ]
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node'
  }
});
