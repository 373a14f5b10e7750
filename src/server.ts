/**
 * RSYAプレースメント分析エンジン - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import { createApp } from "./app";
import { loadEnvConfig, validateEnvConfig } from "./config";
import { ConfigurationError } from "./errors";
import { logger } from "./logger";

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * HTTPサーバーを起動する
 *
 * @returns Promise<void> - サーバー起動完了後にresolve（プロセスは終了しない）
 */
async function startServer(): Promise<void> {
  // 環境変数の検証
  const envValidation = validateEnvConfig();
  if (!envValidation.valid) {
    logger.error("Environment validation failed", { errors: envValidation.errors });
    // 開発環境では警告のみ、本番では起動を停止
    if (process.env.NODE_ENV === "production") {
      throw new ConfigurationError(
        `Environment validation failed: ${envValidation.errors.join(", ")}`
      );
    }
  }

  const envConfig = loadEnvConfig();
  const app = createApp(envConfig);

  return new Promise<void>((resolve) => {
    app.listen(envConfig.port, () => {
      logger.info("Server started", {
        port: envConfig.port,
        environment: envConfig.nodeEnv,
        authEnabled: !!envConfig.apiKey,
        rateLimitEnabled: true,
      });
      // app.listen() がソケットを保持し続けるためプロセスは終了しない
      resolve();
    });
  });
}

// =============================================================================
// エントリポイント
// =============================================================================

startServer().catch((error) => {
  logger.error("Failed to start server", {
    error: error instanceof Error ? error : String(error),
  });
  process.exit(1);
});

// 注意: このモジュールをimportすると startServer() が実行される（テストでは app.ts を使う）
export { startServer };
