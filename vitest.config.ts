import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      TM_DEBUG: 'false',
      TM_NON_INTERACTIVE: 'false',
      TM_FORMAT: 'text',
      TM_SAVE_DIR: ''
    }
  }
});
