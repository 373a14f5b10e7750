/**
 * ブロック判定モジュール
 *
 * 主要エクスポート:
 * - computeBlockingVerdicts: バッチ全体の判定
 * - evaluatePlacement: 単一プレースメントの判定
 * - BLOCKING_RULES: 優先順のルール表
 */

export type {
  CriterionId,
  BlockingPriority,
  BlockingRecommendation,
  RuleContext,
  BlockingRule,
  VerdictMetrics,
  BlockingVerdict,
} from "./types";

export {
  BLOCKING_PRIORITY_LABELS,
  BLOCKING_RECOMMENDATION_LABELS,
} from "./types";

export {
  BLOCKING_RULES,
  expensiveCpaThreshold,
  bounceThreshold,
  lowCtrThreshold,
  hasSuspiciousInventorySignals,
} from "./blocking-rules";

export {
  getLeniencyCoefficient,
  buildRuleContext,
  findFirstMatchingRule,
  buildJustification,
  evaluatePlacement,
  computeBlockingVerdicts,
} from "./blocking-engine";
