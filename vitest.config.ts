/**
 * Vitest設定
 *
 * - Node環境でシグナリングサーバーのユニットテストを実行
 * - ログはsetupファイルで抑制
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
  },
});
