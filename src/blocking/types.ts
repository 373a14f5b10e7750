/**
 * ブロック判定 - 型定義
 *
 * 1プレースメントにつき判定結果は最大1件（最初に一致した基準のみ）
 */

import { PlacementRecord, PlatformType } from "../placements/types";
import { AggregateStatistics } from "../statistics/types";

// =============================================================================
// 基準ID・優先度
// =============================================================================

/**
 * ブロック基準ID（レポートに表示するコードそのもの）
 */
export type CriterionId =
  | "2.2а"        // 極端に高いCTR
  | "2.2б"        // 高CTR・コンバージョンなし
  | "2.2б + 2.1"  // 高CTR・高額コンバージョン
  | "2.1A"        // 高額コンバージョン
  | "2.1Б"        // 広告費ありでコンバージョンなし
  | "2.3"         // 致命的に低いCTR
  | "2.8"         // 安すぎるクリック＋高CTR
  | "2.4"         // 低エンゲージメント
  | "2.5"         // モバイルアプリの不審指標
  | "2.5Б"        // DSPの不審指標
  | "2.6";        // .com ドメインの無コンバージョン広告費

/**
 * ブロック優先度
 */
export type BlockingPriority = "CRITICAL" | "HIGH" | "MEDIUM" | "SUPPLEMENTARY";

export const BLOCKING_PRIORITY_LABELS: Record<BlockingPriority, string> = {
  CRITICAL: "КРИТИЧНЫЙ",
  HIGH: "ВЫСОКИЙ",
  MEDIUM: "СРЕДНИЙ",
  SUPPLEMENTARY: "ДОПОЛНИТЕЛЬНЫЙ",
};

/**
 * 推奨アクション
 */
export type BlockingRecommendation = "BLOCK_IMMEDIATELY" | "BLOCK";

export const BLOCKING_RECOMMENDATION_LABELS: Record<BlockingRecommendation, string> = {
  BLOCK_IMMEDIATELY: "БЛОКИРОВАТЬ НЕМЕДЛЕННО",
  BLOCK: "БЛОКИРОВАТЬ",
};

// =============================================================================
// 判定コンテキスト・ルール
// =============================================================================

/**
 * 1レコードの判定に必要な情報
 */
export interface RuleContext {
  record: PlacementRecord;
  stats: AggregateStatistics;
  platformType: PlatformType;
  /** 緩和係数（Yandex自社面は 1.5、その他 1.0） */
  coefficient: number;
}

/**
 * ブロック判定ルール
 */
export interface BlockingRule {
  criterionId: CriterionId;
  priority: BlockingPriority;
  recommendation: BlockingRecommendation;
  /** 判定理由（人が読む文） */
  reason: string;
  /** レポートの「特徴」欄に追加するラベル */
  featureLabel?: string;
  matches: (ctx: RuleContext) => boolean;
  /** しきい値に対する乖離の説明 */
  describeDeviation: (ctx: RuleContext) => string;
}

// =============================================================================
// 判定結果
// =============================================================================

/**
 * レポート用に複製するレコードの主要指標
 */
export interface VerdictMetrics {
  impressions: number;
  clicks: number;
  ctr: number;
  conversions: number;
  /** コンバージョン単価（正でなければ 0） */
  costPerConversion: number;
  spend: number;
  bounceRate: number;
  depth: number;
}

/**
 * ブロック判定結果
 */
export interface BlockingVerdict {
  placement: string;
  platformType: PlatformType;
  criterionId: CriterionId;
  reason: string;
  priority: BlockingPriority;
  recommendation: BlockingRecommendation;
  /** しきい値に対する乖離 */
  deviation: string;
  /** 指標を並べた根拠文 */
  justification: string;
  /** 特徴ラベル（プラットフォーム種別など） */
  specialFeatures: string[];
  metrics: VerdictMetrics;
}
