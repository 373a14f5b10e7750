/**
 * プレースメント分析 API ルート
 *
 * POST /analysis
 *   body: { placements: PlacementRecord[], includeReport?: boolean, reportPeriod?: string }
 */

import { Router, Request, Response } from "express";
import { analyzePlacements } from "../analysis/placement-analyzer";
import { PlacementAnalysisResult } from "../analysis/types";
import { ApiResponse, ApiResponseBuilder, toAppError } from "../errors";
import { logger } from "../logger";
import { generateAnalyticalReport } from "../report/report-generator";
import { validateAnalyzeRequest } from "../schemas";

const router = Router();

// =============================================================================
// 型定義
// =============================================================================

export interface AnalysisResponseData extends PlacementAnalysisResult {
  /** includeReport=true のときのみ */
  report?: string;
}

// =============================================================================
// ハンドラー
// =============================================================================

/**
 * 分析リクエストを処理して統一レスポンスを返す
 *
 * - 400: リクエストの形式が不正
 * - 422: placements が空
 */
export function handleAnalysisRequest(
  body: unknown,
  requestId?: string
): ApiResponse<AnalysisResponseData> {
  const validation = validateAnalyzeRequest(body);
  if (!validation.success || !validation.data) {
    logger.warn("Invalid analysis request", { requestId, errors: validation.errors });
    return ApiResponseBuilder.validationError(validation.errors ?? [], requestId);
  }

  const { placements, includeReport, reportPeriod } = validation.data;

  try {
    const result = analyzePlacements(placements);
    const data: AnalysisResponseData = includeReport
      ? {
          ...result,
          report: generateAnalyticalReport({ records: placements, result, reportPeriod }),
        }
      : result;

    return ApiResponseBuilder.success(data, { requestId });
  } catch (error) {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      logger.error("Analysis request failed", { requestId, error: appError });
    }
    return ApiResponseBuilder.error(appError, requestId);
  }
}

// =============================================================================
// エンドポイント
// =============================================================================

/**
 * POST /analysis
 */
router.post("/analysis", (req: Request, res: Response) => {
  const response = handleAnalysisRequest(req.body, res.locals.traceId);
  return res.status(response.statusCode).json(response);
});

export default router;
