import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    watch: false,
    env: {
      TASK_GROUP_LOG_LEVEL: 'silent',
    },
  },
});
