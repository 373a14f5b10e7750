/**
 * RSYAプレースメント分析エンジン - バリデーションスキーマ
 */

import { z } from "zod";
import { ValidationErrorDetail } from "./errors";

// =============================================================================
// PlacementRecord スキーマ
// =============================================================================

const nonNegative = (field: string) =>
  z.number().finite().min(0, `${field} must be non-negative`);

export const PlacementRecordSchema = z.object({
  placement: z.string().trim().min(1, "placement is required"),
  sourceType: z.string().default(""),

  impressions: nonNegative("impressions"),
  clicks: nonNegative("clicks"),
  ctr: nonNegative("ctr"),
  spend: nonNegative("spend"),
  avgCpc: nonNegative("avgCpc"),
  bounceRate: nonNegative("bounceRate"),
  depth: nonNegative("depth"),
  costPerConversion: nonNegative("costPerConversion"),
  conversions: nonNegative("conversions"),
});

// =============================================================================
// APIリクエストスキーマ
// =============================================================================

/**
 * 空配列はスキーマでは許可し、集計時に EmptyBatchError (422) とする
 */
export const AnalyzeRequestSchema = z.object({
  placements: z.array(PlacementRecordSchema),
  includeReport: z.boolean().optional().default(false),
  reportPeriod: z.string().trim().min(1).optional(),
});

// =============================================================================
// 型エクスポート（zodから推論）
// =============================================================================

export type PlacementRecordInput = z.infer<typeof PlacementRecordSchema>;
export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

// =============================================================================
// バリデーション結果型
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: ValidationErrorDetail[];
}

// =============================================================================
// バリデーションヘルパー関数
// =============================================================================

/**
 * zodのエラーを ValidationErrorDetail に変換
 *
 * @param pathPrefix - フィールド名の前に付ける接頭辞（例: "row 7"）
 */
export function toValidationErrorDetails(
  error: z.ZodError,
  pathPrefix?: string
): ValidationErrorDetail[] {
  return error.errors.map((err) => {
    const path = err.path.join(".");
    const field = pathPrefix ? [pathPrefix, path].filter(Boolean).join(".") : path;
    return {
      field: field || "(root)",
      message: err.message,
    };
  });
}

/**
 * 単一のPlacementRecordをバリデーション
 */
export function validatePlacementRecord(
  data: unknown,
  pathPrefix?: string
): ValidationResult<PlacementRecordInput> {
  const result = PlacementRecordSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: toValidationErrorDetails(result.error, pathPrefix) };
}

/**
 * 分析リクエストをバリデーション
 */
export function validateAnalyzeRequest(
  data: unknown
): ValidationResult<AnalyzeRequest> {
  const result = AnalyzeRequestSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: toValidationErrorDetails(result.error) };
}
