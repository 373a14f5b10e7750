/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * CLI・HTTP API・分析ジョブで共通のエラー表現を使う
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証エラー (401)
  UNAUTHORIZED: "UNAUTHORIZED",

  // アクセス拒否 (403)
  FORBIDDEN: "FORBIDDEN",

  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // 分析不能な入力 (422)
  EMPTY_BATCH: "EMPTY_BATCH",

  // レート制限 (429)
  RATE_LIMIT_EXCEEDED: "RATE_LIMIT_EXCEEDED",

  // 入力ファイルエラー
  INPUT_FILE_ERROR: "INPUT_FILE_ERROR",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  OUTPUT_WRITE_ERROR: "OUTPUT_WRITE_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    // スタックトレースを保持
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// 認証エラー
// =============================================================================

/**
 * 認証エラー（401）
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed", details?: Record<string, unknown>) {
    super({
      code: ErrorCode.UNAUTHORIZED,
      message,
      statusCode: 401,
      details,
    });
    this.name = "AuthenticationError";
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
    });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

// =============================================================================
// 分析エラー
// =============================================================================

/**
 * 空バッチエラー（422）
 * 0件のプレースメントでは平均値（ベースライン）が定義できない
 */
export class EmptyBatchError extends AppError {
  constructor(message: string = "Cannot compute aggregate statistics for an empty batch") {
    super({
      code: ErrorCode.EMPTY_BATCH,
      message,
      statusCode: 422,
    });
    this.name = "EmptyBatchError";
  }
}

// =============================================================================
// 入出力エラー
// =============================================================================

/**
 * 入力ファイルエラー（読み込み不可・形式不正）
 */
export class InputFileError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, cause?: Error) {
    super({
      code: ErrorCode.INPUT_FILE_ERROR,
      message,
      statusCode: 400,
      details: { filePath },
      cause,
    });
    this.name = "InputFileError";
    this.filePath = filePath;
  }
}

/**
 * 出力書き込みエラー
 */
export class OutputWriteError extends AppError {
  constructor(outputPath: string, cause?: Error) {
    super({
      code: ErrorCode.OUTPUT_WRITE_ERROR,
      message: `Failed to write analysis output: ${outputPath}`,
      statusCode: 500,
      details: { outputPath },
      cause,
    });
    this.name = "OutputWriteError";
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

/**
 * 設定エラー
 */
export class ConfigurationError extends AppError {
  constructor(message: string, missingConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: missingConfig ? { missingConfig } : undefined,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  meta?: {
    requestId?: string;
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  /**
   * 成功レスポンスを生成
   */
  static success<T>(
    data: T,
    options?: {
      statusCode?: number;
      requestId?: string;
    }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  /**
   * エラーレスポンスを生成
   */
  static error(error: AppError | Error, requestId?: string): ApiResponse<never> {
    if (error instanceof AppError) {
      return {
        success: false,
        statusCode: error.statusCode,
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        meta: {
          requestId,
          timestamp: new Date().toISOString(),
        },
      };
    }

    // 一般的なErrorの場合
    return {
      success: false,
      statusCode: 500,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  /**
   * バリデーションエラーレスポンスを生成
   */
  static validationError(
    errors: ValidationErrorDetail[],
    requestId?: string
  ): ApiResponse<never> {
    return ApiResponseBuilder.error(new ValidationError(errors), requestId);
  }

  /**
   * 認証エラーレスポンスを生成
   */
  static unauthorized(message: string = "Unauthorized", requestId?: string): ApiResponse<never> {
    return ApiResponseBuilder.error(new AuthenticationError(message), requestId);
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * エラーをAppErrorに変換
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  });
}
