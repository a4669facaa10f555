import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    // 環境: Node.js（ブラウザAPIは不使用）
    environment: 'node',

    // グローバルAPI有効（describe, it, expect をimport不要に）
    globals: true,

    // テストファイルパターン
    include: ['src/tests/**/*.test.ts'],

    // セットアップファイル
    setupFiles: ['./src/tests/setup.ts'],

    // タイムアウト（ms）
    testTimeout: 10000,

    // モック設定
    mockReset: true,
    restoreMocks: true,
    unstubGlobals: true,

    // カバレッジ
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        // utils
        'src/lib/utils/date.ts',
        'src/lib/utils/html.ts',
        'src/lib/utils/http.ts',
        'src/lib/utils/logger.ts',
        // macro
        'src/lib/macro/config.ts',
        'src/lib/macro/extractor.ts',
        'src/lib/macro/normalizer.ts',
        'src/lib/macro/scorer.ts',
        'src/lib/macro/fetcher.ts',
        'src/lib/macro/snapshot.ts',
        'src/lib/macro/dashboard.ts',
        // signals
        'src/lib/signals/technical.ts',
        'src/lib/signals/table.ts',
        'src/lib/signals/price-client.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },

  // パスエイリアス
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
