import { defineConfig } from 'vitest/config';

export default defineConfig({
  // 테스트 설정 (Vitest)
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20000,
  },
});
