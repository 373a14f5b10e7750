/**
 * RSYAプレースメント分析エンジン
 *
 * Yandex広告ネットワーク（РСЯ）のプレースメント統計から、
 * ブロックすべきプレースメントを判定し、全体を効果別に分類する
 *
 * 主要エクスポート:
 * - analyzePlacements: レコード配列の分析
 * - runPlacementAnalysisJob: ファイル読み込みから出力までのジョブ
 * - createApp: HTTP API
 */

export * from "./placements";
export * from "./statistics";
export * from "./blocking";
export * from "./segmentation";
export * from "./analysis";
export * from "./ingestion";
export * from "./report";

export {
  AppError,
  AuthenticationError,
  ValidationError,
  EmptyBatchError,
  InputFileError,
  OutputWriteError,
  ConfigurationError,
  ApiResponseBuilder,
  ErrorCode,
  toAppError,
} from "./errors";
export type { ApiResponse, ValidationErrorDetail, ErrorCodeType } from "./errors";

export { loadEnvConfig, validateEnvConfig } from "./config";
export type { EnvConfig } from "./config";

export {
  PlacementRecordSchema,
  AnalyzeRequestSchema,
  validatePlacementRecord,
  validateAnalyzeRequest,
} from "./schemas";
export type { AnalyzeRequest, PlacementRecordInput } from "./schemas";

export { StructuredLogger, logger, createChildLogger } from "./logger";
export type { LogLevel, LogContext } from "./logger";

export { createApp } from "./app";
