/**
 * ブロック判定ルール表
 *
 * 配列の順序がそのまま優先順位。エンジンは先頭から評価し、最初に一致した1件だけを採用する。
 * 係数付きのしきい値（2.2б, 2.1A, 2.1Б, 2.3, 2.4）は Yandex自社面で緩和される。
 */

import {
  CTR_THRESHOLDS,
  VOLUME_THRESHOLDS,
  COST_THRESHOLDS,
  ENGAGEMENT_THRESHOLDS,
} from "../constants";
import { PlacementRecord } from "../placements/types";
import { formatCount, formatFixed, formatPercent, formatRub } from "../utils/number-format";
import { BlockingRule, RuleContext } from "./types";

// =============================================================================
// しきい値ヘルパー
// =============================================================================

/**
 * 高額CPAのしきい値（平均CPA × 2.5 × 係数）
 */
export function expensiveCpaThreshold(ctx: RuleContext): number {
  return ctx.stats.avgCpa * COST_THRESHOLDS.CPA_MULTIPLIER * ctx.coefficient;
}

/**
 * 直帰率のしきい値（平均直帰率 × 1.2 × 係数）
 */
export function bounceThreshold(ctx: RuleContext): number {
  return ctx.stats.avgBounce * ENGAGEMENT_THRESHOLDS.BOUNCE_MULTIPLIER * ctx.coefficient;
}

/**
 * 低CTRのしきい値（0.20% ÷ 係数）
 */
export function lowCtrThreshold(ctx: RuleContext): number {
  return CTR_THRESHOLDS.CRITICALLY_LOW / ctx.coefficient;
}

function isInHighCtrBand(ctx: RuleContext): boolean {
  const { record } = ctx;
  return (
    record.ctr >= CTR_THRESHOLDS.HIGH * ctx.coefficient &&
    record.ctr < CTR_THRESHOLDS.EXTREME &&
    record.impressions >= VOLUME_THRESHOLDS.MIN_IMPRESSIONS_FOR_CTR
  );
}

function hasExpensiveConversions(ctx: RuleContext): boolean {
  return (
    ctx.record.conversions > 0 &&
    ctx.stats.avgCpa > 0 &&
    ctx.record.costPerConversion > expensiveCpaThreshold(ctx)
  );
}

/**
 * モバイルアプリ・DSP 共通の不審シグナル
 */
export function hasSuspiciousInventorySignals(record: PlacementRecord): boolean {
  const noConversions = record.conversions === 0;
  return (
    (record.ctr > CTR_THRESHOLDS.CHEAP_CLICK && noConversions) ||
    (record.avgCpc < COST_THRESHOLDS.SUPPLEMENTARY_CPC &&
      record.ctr > COST_THRESHOLDS.SUPPLEMENTARY_CTR_WITH_CHEAP_CPC) ||
    (record.spend > COST_THRESHOLDS.SUPPLEMENTARY_SPEND && noConversions)
  );
}

function describeSuspiciousSignals({ record }: RuleContext): string {
  return `CTR ${formatPercent(record.ctr)}, расход ${formatRub(record.spend)}, конверсий = ${formatCount(record.conversions)}`;
}

// =============================================================================
// ルール表
// =============================================================================

export const BLOCKING_RULES: readonly BlockingRule[] = [
  // 2.2а: 極端に高いCTR（不正トラフィック疑い）。係数なし
  {
    criterionId: "2.2а",
    priority: "CRITICAL",
    recommendation: "BLOCK_IMMEDIATELY",
    reason: "Экстремально высокий CTR (мошеннический трафик)",
    featureLabel: "Экстремальный CTR",
    matches: ({ record }) =>
      record.ctr >= CTR_THRESHOLDS.EXTREME &&
      record.impressions >= VOLUME_THRESHOLDS.MIN_IMPRESSIONS_FOR_CTR,
    describeDeviation: ({ record }) => `CTR ${formatPercent(record.ctr)} (норма 1-2%)`,
  },

  // 2.2б: 高CTR帯でコンバージョンなし
  {
    criterionId: "2.2б",
    priority: "HIGH",
    recommendation: "BLOCK",
    reason: "Подозрительно высокий CTR без конверсий",
    featureLabel: "Высокий CTR",
    matches: (ctx) => isInHighCtrBand(ctx) && ctx.record.conversions === 0,
    describeDeviation: ({ record }) =>
      `CTR ${formatPercent(record.ctr)} при норме 1-2%, конверсий = 0`,
  },

  // 2.2б + 2.1: 高CTR帯で高額コンバージョン
  {
    criterionId: "2.2б + 2.1",
    priority: "HIGH",
    recommendation: "BLOCK",
    reason: "Высокий CTR + дорогие конверсии",
    matches: (ctx) => isInHighCtrBand(ctx) && hasExpensiveConversions(ctx),
    describeDeviation: (ctx) =>
      `CTR ${formatPercent(ctx.record.ctr)}, Цена цели ${formatRub(ctx.record.costPerConversion)} > ${formatRub(expensiveCpaThreshold(ctx))}`,
  },

  // 2.1A: 平均CPAに対して高額なコンバージョン
  {
    criterionId: "2.1A",
    priority: "CRITICAL",
    recommendation: "BLOCK",
    reason: "Высокая стоимость конверсии",
    matches: hasExpensiveConversions,
    describeDeviation: ({ record, stats }) =>
      `Цена цели ${formatRub(record.costPerConversion)} в ${formatFixed(record.costPerConversion / stats.avgCpa, 1)}x раз выше средней ${formatRub(stats.avgCpa)}`,
  },

  // 2.1Б: 広告費・クリックがあるのにコンバージョンなし
  {
    criterionId: "2.1Б",
    priority: "CRITICAL",
    recommendation: "BLOCK",
    reason: "Нулевые конверсии при значительном расходе",
    matches: ({ record, coefficient }) =>
      record.conversions === 0 &&
      record.spend >= COST_THRESHOLDS.ZERO_CONVERSION_SPEND * coefficient &&
      record.clicks >= VOLUME_THRESHOLDS.MIN_CLICKS_FOR_ZERO_CONVERSIONS,
    describeDeviation: ({ record }) =>
      `Расход ${formatRub(record.spend)}, кликов ${formatCount(record.clicks)}, конверсий = 0`,
  },

  // 2.3: 十分な表示回数で致命的に低いCTR
  {
    criterionId: "2.3",
    priority: "HIGH",
    recommendation: "BLOCK",
    reason: "Критически низкий CTR",
    matches: (ctx) =>
      ctx.record.ctr < lowCtrThreshold(ctx) &&
      ctx.record.impressions >= VOLUME_THRESHOLDS.MIN_IMPRESSIONS_FOR_LOW_CTR,
    describeDeviation: (ctx) =>
      `CTR ${formatPercent(ctx.record.ctr, 4)} < ${formatPercent(lowCtrThreshold(ctx))}`,
  },

  // 2.8: 平均より極端に安いクリックと高CTRの組み合わせ。係数なし
  {
    criterionId: "2.8",
    priority: "HIGH",
    recommendation: "BLOCK",
    reason: "Подозрительно низкая цена клика + высокий CTR",
    matches: ({ record, stats }) =>
      record.avgCpc < stats.avgCpc * COST_THRESHOLDS.CHEAP_CPC_RATIO &&
      record.ctr > CTR_THRESHOLDS.CHEAP_CLICK,
    // avgCpc > 0 は一致条件から保証される
    describeDeviation: ({ record, stats }) =>
      `Цена клика ${formatRub(record.avgCpc)} (${formatFixed((record.avgCpc / stats.avgCpc) * 100, 0)}% от средней), CTR ${formatPercent(record.ctr)}`,
  },

  // 2.4: 低エンゲージメント
  {
    criterionId: "2.4",
    priority: "MEDIUM",
    recommendation: "BLOCK",
    reason: "Низкая вовлеченность пользователей",
    matches: (ctx) =>
      (ctx.record.bounceRate > bounceThreshold(ctx) ||
        ctx.record.depth <= ENGAGEMENT_THRESHOLDS.MIN_DEPTH) &&
      ctx.record.conversions === 0 &&
      ctx.record.clicks >= VOLUME_THRESHOLDS.MIN_CLICKS_FOR_ENGAGEMENT,
    describeDeviation: (ctx) => {
      const threshold = bounceThreshold(ctx);
      if (ctx.record.bounceRate > threshold) {
        return `Отказы ${formatPercent(ctx.record.bounceRate)} > ${formatPercent(threshold)}`;
      }
      return `Глубина просмотра ${formatFixed(ctx.record.depth)} стр.`;
    },
  },

  // 2.5: モバイルアプリの不審指標
  {
    criterionId: "2.5",
    priority: "SUPPLEMENTARY",
    recommendation: "BLOCK",
    reason: "Мобильное приложение: подозрительные показатели",
    matches: ({ record, platformType }) =>
      platformType === "MOBILE_APP" && hasSuspiciousInventorySignals(record),
    describeDeviation: describeSuspiciousSignals,
  },

  // 2.5Б: DSPの不審指標
  {
    criterionId: "2.5Б",
    priority: "SUPPLEMENTARY",
    recommendation: "BLOCK",
    reason: "DSP-площадка: подозрительные показатели",
    matches: ({ record, platformType }) =>
      platformType === "DSP" && hasSuspiciousInventorySignals(record),
    describeDeviation: describeSuspiciousSignals,
  },

  // 2.6: .com ドメインで広告費のみ発生
  {
    criterionId: "2.6",
    priority: "SUPPLEMENTARY",
    recommendation: "BLOCK",
    reason: "Домен .com без конверсий при расходе",
    matches: ({ record, platformType }) =>
      platformType === "COM_SITE" &&
      record.conversions === 0 &&
      record.spend > COST_THRESHOLDS.SUPPLEMENTARY_SPEND,
    describeDeviation: ({ record }) => `Расход ${formatRub(record.spend)}, конверсий = 0`,
  },
];
