/**
 * 分析パイプライン - 型定義
 */

import { BlockingVerdict } from "../blocking/types";
import { PlacementRecord } from "../placements/types";
import { PlacementSegments } from "../segmentation/types";
import { AggregateStatistics } from "../statistics/types";

/**
 * analyzePlacements のオプション
 */
export interface AnalyzePlacementsOptions {
  /** 実行ID（未指定なら uuid v4 を採番） */
  executionId?: string;
}

/**
 * 1回の分析結果
 *
 * verdicts と segments は同じ入力に対して常に同じになる。
 * executionId とタイムスタンプのみ実行ごとに変わる。
 */
export interface PlacementAnalysisResult {
  executionId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;

  statistics: AggregateStatistics;

  /** ブロック対象の判定結果（入力順） */
  verdicts: BlockingVerdict[];

  segments: PlacementSegments;
}

/**
 * ファイル分析ジョブのオプション
 */
export interface RunPlacementAnalysisJobOptions {
  inputPath: string;
  outputDir: string;
  preambleLines?: number;
}

/**
 * ファイル分析ジョブの結果
 */
export interface PlacementAnalysisJobResult {
  executionId: string;
  inputPath: string;
  reportPeriod: string | null;

  records: PlacementRecord[];
  result: PlacementAnalysisResult;

  /** 書き出したCSVのパス（判定が0件なら null） */
  blockingCsvPath: string | null;
  reportPath: string;

  processingTimeMs: number;
}
