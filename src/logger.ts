/**
 * RSYAプレースメント分析エンジン - 構造化ログ
 */

import { Request, Response, NextFunction } from "express";

/**
 * ログレベル
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * ログエントリの構造
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  severity: string;
  message: string;
  traceId?: string;
  service: string;
  version: string;
  environment: string;
  [key: string]: unknown;
}

/**
 * ログコンテキスト（実行ごと・リクエストごとの情報）
 */
export interface LogContext {
  traceId?: string;
  executionId?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * 値が LogLevel かどうかを判定
 */
export function isValidLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL環境変数をパース
 * 不正な値や未設定の場合は "info" を返す
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isValidLogLevel(normalized) ? normalized : "info";
}

/**
 * 構造化ロガークラス
 */
export class StructuredLogger {
  private service: string;
  private version: string;
  private environment: string;
  private minLevel: LogLevel;
  private context: LogContext;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(context: LogContext = {}) {
    this.service = "rsya-placement-analyzer";
    this.version = process.env.npm_package_version || "1.0.0";
    this.environment = process.env.NODE_ENV || "development";
    this.minLevel = parseLogLevel(process.env.LOG_LEVEL);
    this.context = { ...context };
  }

  /**
   * トレースIDを生成
   */
  generateTraceId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
  }

  /**
   * ログエントリを構築
   */
  private buildLogEntry(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      // Cloud Logging互換の重大度
      severity: level.toUpperCase(),
      message,
      service: this.service,
      version: this.version,
      environment: this.environment,
      ...this.context,
      ...data,
    };
  }

  /**
   * ログを出力
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (this.levelPriority[level] < this.levelPriority[this.minLevel]) {
      return;
    }

    const output = JSON.stringify(this.buildLogEntry(level, message, data));

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "debug":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  /**
   * エラーログ（Errorオブジェクトは name/message/stack に展開）
   */
  error(message: string, data?: Record<string, unknown>): void {
    if (data?.error instanceof Error) {
      data = {
        ...data,
        error: {
          name: data.error.name,
          message: data.error.message,
          stack: data.error.stack,
        },
      };
    }
    this.log("error", message, data);
  }

  /**
   * 子ロガーを作成（追加のコンテキストを持つ）
   */
  child(additionalContext: LogContext): StructuredLogger {
    return new StructuredLogger({ ...this.context, ...additionalContext });
  }

  /**
   * リクエストログ用のミドルウェア
   */
  requestLogger() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const startTime = Date.now();

      // Cloud Traceヘッダーがあれば使用
      const cloudTraceHeader = req.get("x-cloud-trace-context");
      const traceId = cloudTraceHeader
        ? cloudTraceHeader.split("/")[0]
        : this.generateTraceId();

      res.locals.traceId = traceId;

      this.info("Request started", {
        traceId,
        method: req.method,
        path: req.path,
        ip: req.ip,
        userAgent: req.get("user-agent"),
      });

      res.on("finish", () => {
        this.info("Request completed", {
          traceId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startTime,
        });
      });

      next();
    };
  }
}

// シングルトンインスタンス
export const logger = new StructuredLogger();

export function createChildLogger(context: LogContext): StructuredLogger {
  return logger.child(context);
}
