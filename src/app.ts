/**
 * RSYAプレースメント分析エンジン - Express アプリケーション
 *
 * createApp() はリッスンせずに app を返す（サーバー起動は server.ts）
 */

import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { EnvConfig } from "./config";
import { SERVER } from "./constants";
import { ApiResponse, ApiResponseBuilder, ErrorCode, AppError } from "./errors";
import { logger } from "./logger";
import { apiKeyAuth } from "./middleware/auth";
import { analysisRoutes, healthRoutes } from "./routes";

/**
 * オリジンが許可されているか
 *
 * オリジンがない場合（サーバー間通信など）は許可
 */
export function isOriginAllowed(
  origin: string | undefined,
  additionalOrigins: readonly string[]
): boolean {
  const allowedOrigins = [
    // ローカル開発
    "http://localhost:3000",
    `http://localhost:${SERVER.DEFAULT_PORT}`,
    ...additionalOrigins,
  ];
  return !origin || allowedOrigins.includes(origin);
}

/**
 * CORS設定を構築
 */
function buildCorsOptions(additionalOrigins: readonly string[]): cors.CorsOptions {
  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, additionalOrigins)) {
        callback(null, true);
        return;
      }
      logger.warn("CORS request blocked", { origin });
      callback(
        new AppError({
          code: ErrorCode.FORBIDDEN,
          message: "Not allowed by CORS",
          statusCode: 403,
        })
      );
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-API-Key", "X-Request-ID"],
    exposedHeaders: ["X-Request-ID", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    maxAge: 86400,
  };
}

/**
 * ハンドラー外に漏れたエラーを統一レスポンスに変換
 *
 * - JSONパースエラーは 400
 * - 本番では AppError 以外のメッセージを隠す
 */
export function toErrorResponse(
  err: Error,
  nodeEnv: string,
  requestId?: string
): ApiResponse<never> {
  if (err instanceof SyntaxError) {
    return ApiResponseBuilder.validationError(
      [{ field: "body", message: "Malformed JSON body" }],
      requestId
    );
  }
  if (err instanceof AppError || nodeEnv !== "production") {
    return ApiResponseBuilder.error(err, requestId);
  }
  return ApiResponseBuilder.error(new Error("An error occurred"), requestId);
}

/**
 * Express app を作成
 */
export function createApp(config: EnvConfig): Express {
  const app = express();

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(cors(buildCorsOptions(config.corsAllowedOrigins)));
  app.use(express.json({ limit: SERVER.JSON_BODY_LIMIT }));
  app.use(logger.requestLogger());

  // レート制限（API全体）
  const generalLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 100,
    message: ApiResponseBuilder.error(
      new AppError({
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: "Too many requests, please try again later.",
        statusCode: 429,
      })
    ),
    standardHeaders: true,
    legacyHeaders: false,
  });

  // 分析API用の厳しいレート制限
  const analysisLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 30,
    message: ApiResponseBuilder.error(
      new AppError({
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: "Too many analysis requests, please try again later.",
        statusCode: 429,
      })
    ),
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalLimiter);

  // ===========================================================================
  // 公開エンドポイント
  // ===========================================================================

  app.use(healthRoutes);

  // ===========================================================================
  // 認証付きエンドポイント
  // ===========================================================================

  app.use("/analysis", analysisLimiter, apiKeyAuth(config.apiKey));
  app.use(analysisRoutes);

  // ===========================================================================
  // エラーハンドリング
  // ===========================================================================

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const response = toErrorResponse(err, config.nodeEnv, res.locals.traceId);
    if (response.statusCode >= 500) {
      logger.error("Unhandled error", {
        error: err,
        path: req.path,
      });
    }
    res.status(response.statusCode).json(response);
  });

  return app;
}
