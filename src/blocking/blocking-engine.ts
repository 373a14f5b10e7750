/**
 * ブロック判定エンジン（純粋関数）
 *
 * 各プレースメントに対してルール表を先頭から評価し、最初に一致した基準で判定結果を作る。
 * どの基準にも一致しなければ判定なし（＝維持）。
 * レコード同士の判定は独立しており、共有するのは事前計算した集計統計のみ。
 */

import { LENIENCY } from "../constants";
import { PlacementRecord, PlatformType, PLATFORM_TYPE_LABELS } from "../placements/types";
import { classifyPlatformType } from "../placements/platform-classifier";
import { AggregateStatistics } from "../statistics/types";
import { formatCount, formatFixed, formatPercent, formatRub } from "../utils/number-format";
import { BLOCKING_RULES } from "./blocking-rules";
import {
  BlockingRule,
  BlockingVerdict,
  RuleContext,
  VerdictMetrics,
} from "./types";

// =============================================================================
// ヘルパー関数
// =============================================================================

/**
 * 緩和係数を取得
 */
export function getLeniencyCoefficient(platformType: PlatformType): number {
  return platformType === "YANDEX"
    ? LENIENCY.YANDEX_COEFFICIENT
    : LENIENCY.DEFAULT_COEFFICIENT;
}

/**
 * 判定コンテキストを構築
 */
export function buildRuleContext(
  record: PlacementRecord,
  stats: AggregateStatistics
): RuleContext {
  const platformType = classifyPlatformType(record.placement);
  return {
    record,
    stats,
    platformType,
    coefficient: getLeniencyCoefficient(platformType),
  };
}

/**
 * 最初に一致したルールを返す
 */
export function findFirstMatchingRule(
  ctx: RuleContext,
  rules: readonly BlockingRule[] = BLOCKING_RULES
): BlockingRule | undefined {
  return rules.find((rule) => rule.matches(ctx));
}

/**
 * 根拠文を生成
 *
 * 例: "Критически низкий CTR. Показов: 5000, кликов: 2, CTR: 0.04%, расход: 10.00₽. Конверсий: 0. Отказы: ..."
 */
export function buildJustification(
  reason: string,
  record: PlacementRecord,
  deviation: string
): string {
  const parts = [
    `${reason}. `,
    `Показов: ${formatCount(record.impressions)}, кликов: ${formatCount(record.clicks)}, `,
    `CTR: ${formatPercent(record.ctr)}, расход: ${formatRub(record.spend)}. `,
  ];

  if (record.conversions > 0) {
    parts.push(
      `Конверсий: ${formatCount(record.conversions)}, цена цели: ${formatRub(record.costPerConversion)}. `
    );
  } else {
    parts.push("Конверсий: 0. ");
  }

  parts.push(`Отказы: ${formatPercent(record.bounceRate)}, глубина: ${formatFixed(record.depth)} стр. `);
  parts.push(deviation);

  return parts.join("");
}

function buildVerdictMetrics(record: PlacementRecord): VerdictMetrics {
  return {
    impressions: Math.trunc(record.impressions),
    clicks: Math.trunc(record.clicks),
    ctr: record.ctr,
    conversions: Math.trunc(record.conversions),
    costPerConversion: record.costPerConversion > 0 ? record.costPerConversion : 0,
    spend: record.spend,
    bounceRate: record.bounceRate,
    depth: record.depth,
  };
}

// =============================================================================
// メイン関数
// =============================================================================

/**
 * 単一プレースメントを判定
 *
 * @returns 最初に一致した基準の判定結果。一致なしなら null
 */
export function evaluatePlacement(
  record: PlacementRecord,
  stats: AggregateStatistics,
  rules: readonly BlockingRule[] = BLOCKING_RULES
): BlockingVerdict | null {
  const ctx = buildRuleContext(record, stats);
  const rule = findFirstMatchingRule(ctx, rules);

  if (!rule) {
    return null;
  }

  const deviation = rule.describeDeviation(ctx);

  // 一般サイト以外は種別を特徴として残す
  const specialFeatures: string[] = [];
  if (ctx.platformType !== "SITE") {
    specialFeatures.push(PLATFORM_TYPE_LABELS[ctx.platformType]);
  }
  if (rule.featureLabel) {
    specialFeatures.push(rule.featureLabel);
  }

  return {
    placement: record.placement,
    platformType: ctx.platformType,
    criterionId: rule.criterionId,
    reason: rule.reason,
    priority: rule.priority,
    recommendation: rule.recommendation,
    deviation,
    justification: buildJustification(rule.reason, record, deviation),
    specialFeatures,
    metrics: buildVerdictMetrics(record),
  };
}

/**
 * バッチ全体を判定
 *
 * @returns ブロック対象の判定結果（入力順）
 */
export function computeBlockingVerdicts(
  records: readonly PlacementRecord[],
  stats: AggregateStatistics,
  rules: readonly BlockingRule[] = BLOCKING_RULES
): BlockingVerdict[] {
  const verdicts: BlockingVerdict[] = [];
  for (const record of records) {
    const verdict = evaluatePlacement(record, stats, rules);
    if (verdict) {
      verdicts.push(verdict);
    }
  }
  return verdicts;
}
