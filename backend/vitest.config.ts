import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    env: {
      LOG_LEVEL: 'silent'
    },
    coverage: {
      reporter: ['text', 'html'],
      exclude: ['dist', 'node_modules']
    }
  }
})

/*
解説:

1) test オプション
  - Node.js 環境でグローバル API を有効化し、`src` 配下の test/spec ファイルのみを対象にする。
  - `LOG_LEVEL=silent` でテスト中の pino 出力を抑止する。

2) export default defineConfig(...)
  - Vitest がこの設定を読み取れるようにデフォルトエクスポートで公開する。
*/
