import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // 테스트는 빌드 없이 워크스페이스 소스를 직접 읽는다
    alias: {
      '@clargs/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts', 'cli/src/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
