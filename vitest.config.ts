import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['bell-player/src/**/*.test.ts'],
  },
});
