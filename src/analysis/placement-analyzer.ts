/**
 * プレースメント分析パイプライン
 *
 * 集計統計 → ブロック判定 / セグメンテーション の順に実行する。
 * 入力レコードは変更しない。
 */

import { v4 as uuidv4 } from "uuid";
import { computeBlockingVerdicts } from "../blocking/blocking-engine";
import { logger } from "../logger";
import { PlacementRecord } from "../placements/types";
import { segmentPlacements } from "../segmentation/segmentation-engine";
import { calculateAggregateStatistics } from "../statistics/aggregate-statistics";
import { AnalyzePlacementsOptions, PlacementAnalysisResult } from "./types";

/**
 * プレースメントのバッチを分析
 *
 * @throws {EmptyBatchError} レコードが0件の場合
 */
export function analyzePlacements(
  records: readonly PlacementRecord[],
  options: AnalyzePlacementsOptions = {}
): PlacementAnalysisResult {
  const executionId = options.executionId ?? uuidv4();
  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();

  logger.info("Starting placement analysis", {
    executionId,
    placementCount: records.length,
  });

  try {
    const statistics = calculateAggregateStatistics(records);
    const verdicts = computeBlockingVerdicts(records, statistics);
    const segments = segmentPlacements(records, statistics);

    const finishTime = Date.now();

    logger.info("Placement analysis completed", {
      executionId,
      placementCount: statistics.placementCount,
      blockedCount: verdicts.length,
      effectiveCount: segments.effective.length,
      mediumCount: segments.medium.length,
      ineffectiveCount: segments.ineffective.length,
      durationMs: finishTime - startTime,
    });

    return {
      executionId,
      startedAt,
      finishedAt: new Date(finishTime).toISOString(),
      durationMs: finishTime - startTime,
      statistics,
      verdicts,
      segments,
    };
  } catch (error) {
    logger.error("Placement analysis failed", {
      executionId,
      error: error instanceof Error ? error : String(error),
    });
    throw error;
  }
}
