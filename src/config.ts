/**
 * RSYAプレースメント分析エンジン - 環境変数設定
 */

import { SERVER, INPUT, OUTPUT } from "./constants";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  // 認証設定
  apiKey?: string;

  /**
   * CORSで許可する追加オリジン
   * - 環境変数 CORS_ALLOWED_ORIGINS（カンマ区切り）で設定
   */
  corsAllowedOrigins: string[];

  // 入出力設定
  /**
   * 分析対象ファイルのパス
   * - 環境変数 ANALYSIS_INPUT_PATH で設定
   * - CLI 引数が優先される
   */
  inputPath?: string;

  /**
   * 出力ディレクトリ
   * - 環境変数 ANALYSIS_OUTPUT_DIR で設定
   * - デフォルト: ./output
   */
  outputDir: string;

  /**
   * レポート冒頭の読み飛ばし行数
   * - 環境変数 REPORT_PREAMBLE_LINES で設定
   * - 不正な値や未設定の場合は 4 にフォールバック
   */
  preambleLines: number;
}

/**
 * 環境変数を読み込み、設定オブジェクトを返す
 *
 * 必須の環境変数はない（すべてデフォルトあり）
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    port: parsePort(env.PORT),
    nodeEnv: env.NODE_ENV || "development",

    apiKey: env.API_KEY || undefined,
    corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS),

    inputPath: env.ANALYSIS_INPUT_PATH || undefined,
    outputDir: env.ANALYSIS_OUTPUT_DIR || OUTPUT.DEFAULT_DIR,
    preambleLines: parsePreambleLines(env.REPORT_PREAMBLE_LINES),
  };
}

/**
 * PORT環境変数をパース
 * 不正な値や未設定の場合はデフォルトポートを返す
 */
function parsePort(value: string | undefined): number {
  const port = parseInt(value || "", 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    return SERVER.DEFAULT_PORT;
  }
  return port;
}

/**
 * カンマ区切りの環境変数をパース（空要素は除外）
 */
function parseList(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * REPORT_PREAMBLE_LINES環境変数をパース
 * 0以上の整数でない場合は 4 を返す
 */
function parsePreambleLines(value: string | undefined): number {
  if (value === undefined || value.trim() === "") {
    return INPUT.DEFAULT_PREAMBLE_LINES;
  }
  const lines = Number(value);
  if (!Number.isInteger(lines) || lines < 0) {
    return INPUT.DEFAULT_PREAMBLE_LINES;
  }
  return lines;
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (env.PORT !== undefined) {
    const port = parseInt(env.PORT, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      errors.push(`Invalid PORT value: ${env.PORT}`);
    }
  }

  if (env.REPORT_PREAMBLE_LINES !== undefined) {
    const lines = Number(env.REPORT_PREAMBLE_LINES);
    if (!Number.isInteger(lines) || lines < 0) {
      errors.push(`Invalid REPORT_PREAMBLE_LINES value: ${env.REPORT_PREAMBLE_LINES}`);
    }
  }

  // 本番でAPIを公開する場合はAPIキー必須
  if (env.NODE_ENV === "production" && !env.API_KEY) {
    errors.push("API_KEY is required when NODE_ENV is production");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * 環境変数の設定例を出力（デバッグ用）
 */
export function printEnvTemplate(): void {
  console.log(`
# サーバー設定（オプション）
PORT=8080
NODE_ENV=production
LOG_LEVEL=info

# 認証設定（本番では必須）
API_KEY=your_api_key
CORS_ALLOWED_ORIGINS=http://localhost:3000

# 入出力設定（オプション）
ANALYSIS_INPUT_PATH=./data/input/report.csv
ANALYSIS_OUTPUT_DIR=./output
REPORT_PREAMBLE_LINES=4
  `);
}
