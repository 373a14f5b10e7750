/**
 * RSYAプレースメント分析エンジン - 認証ミドルウェア
 */

import { Request, Response, NextFunction } from "express";
import { ApiResponseBuilder } from "../errors";
import { logger } from "../logger";

/**
 * Authorization ヘッダーからBearerトークンを抽出
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.substring(7);
}

/**
 * 提示されたキーを検証
 *
 * @returns 認証失敗時のメッセージ。成功なら null
 */
export function verifyApiKey(
  expectedKey: string,
  headers: { apiKey?: string; authorization?: string }
): string | null {
  const providedKey = headers.apiKey || extractBearerToken(headers.authorization);

  if (!providedKey) {
    return "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>";
  }
  if (providedKey !== expectedKey) {
    return "Invalid API key";
  }
  return null;
}

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 */
export function apiKeyAuth(apiKey: string | undefined) {
  if (!apiKey) {
    // API Keyが設定されていない場合は認証をスキップ
    logger.warn("API Key authentication is disabled (API_KEY not set)");
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const failure = verifyApiKey(apiKey, {
      apiKey: req.get("x-api-key"),
      authorization: req.get("authorization"),
    });

    if (failure) {
      logger.warn("API key authentication failed", {
        ip: req.ip,
        path: req.path,
        reason: failure,
      });
      const response = ApiResponseBuilder.unauthorized(failure, res.locals.traceId);
      res.status(response.statusCode).json(response);
      return;
    }

    next();
  };
}
