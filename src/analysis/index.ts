/**
 * 分析パイプラインモジュール
 */

export type {
  AnalyzePlacementsOptions,
  PlacementAnalysisResult,
  RunPlacementAnalysisJobOptions,
  PlacementAnalysisJobResult,
} from "./types";

export { analyzePlacements } from "./placement-analyzer";
export { runPlacementAnalysisJob } from "./analysis-job";
