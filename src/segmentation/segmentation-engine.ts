/**
 * セグメンテーションエンジン（純粋関数）
 *
 * ブロック判定とは独立に、全プレースメントを3区分のどれか1つに振り分ける。
 * 緩和係数は使わず、集計統計のしきい値をそのまま使う。
 * そのため Yandex自社面ではブロック判定とセグメントが食い違うことがある。
 */

import {
  CTR_THRESHOLDS,
  COST_THRESHOLDS,
  VOLUME_THRESHOLDS,
} from "../constants";
import { PlacementRecord } from "../placements/types";
import { AggregateStatistics } from "../statistics/types";
import { PlacementSegments, SegmentTag } from "./types";

/**
 * 効果的: コンバージョンあり、CPA・直帰率が平均以下、CTRが 0.5〜2%
 */
export function isEffectivePlacement(
  record: PlacementRecord,
  stats: AggregateStatistics
): boolean {
  return (
    record.conversions > 0 &&
    record.costPerConversion <= stats.avgCpa &&
    record.ctr >= CTR_THRESHOLDS.EFFECTIVE_MIN &&
    record.ctr <= CTR_THRESHOLDS.EFFECTIVE_MAX &&
    record.bounceRate <= stats.avgBounce
  );
}

/**
 * 非効果的: ブロック基準の主要条件のいずれか（係数なし）
 */
export function isIneffectivePlacement(
  record: PlacementRecord,
  stats: AggregateStatistics
): boolean {
  const noConversions = record.conversions === 0;
  return (
    record.ctr >= CTR_THRESHOLDS.EXTREME ||
    (record.ctr >= CTR_THRESHOLDS.HIGH && noConversions) ||
    (record.conversions > 0 &&
      record.costPerConversion > stats.avgCpa * COST_THRESHOLDS.CPA_MULTIPLIER) ||
    (noConversions &&
      record.spend >= COST_THRESHOLDS.ZERO_CONVERSION_SPEND &&
      record.clicks >= VOLUME_THRESHOLDS.MIN_CLICKS_FOR_ZERO_CONVERSIONS) ||
    (record.ctr < CTR_THRESHOLDS.CRITICALLY_LOW &&
      record.impressions >= VOLUME_THRESHOLDS.MIN_IMPRESSIONS_FOR_LOW_CTR)
  );
}

/**
 * 単一プレースメントのセグメントを判定
 *
 * 効果的 → 非効果的 → 中間 の順に判定
 */
export function segmentPlacement(
  record: PlacementRecord,
  stats: AggregateStatistics
): SegmentTag {
  if (isEffectivePlacement(record, stats)) {
    return "EFFECTIVE";
  }
  if (isIneffectivePlacement(record, stats)) {
    return "INEFFECTIVE";
  }
  return "MEDIUM";
}

/**
 * バッチ全体をセグメントに分割
 */
export function segmentPlacements(
  records: readonly PlacementRecord[],
  stats: AggregateStatistics
): PlacementSegments {
  const segments: PlacementSegments = {
    effective: [],
    medium: [],
    ineffective: [],
  };

  for (const record of records) {
    switch (segmentPlacement(record, stats)) {
      case "EFFECTIVE":
        segments.effective.push(record.placement);
        break;
      case "INEFFECTIVE":
        segments.ineffective.push(record.placement);
        break;
      case "MEDIUM":
        segments.medium.push(record.placement);
        break;
    }
  }

  return segments;
}
