/**
 * 集計統計の計算（純粋関数）
 */

import { EmptyBatchError } from "../errors";
import { PlacementRecord } from "../placements/types";
import { AggregateStatistics } from "./types";

/**
 * 単純平均（空配列は 0）
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * バッチ全体の集計統計を計算
 *
 * - CTR・CPC・直帰率・深度・広告費・コンバージョン数は全件の単純平均
 * - 平均CPAはコンバージョンのあるレコードのみで計算（なければ 0）
 *
 * @throws {EmptyBatchError} レコードが0件の場合
 */
export function calculateAggregateStatistics(
  records: readonly PlacementRecord[]
): AggregateStatistics {
  if (records.length === 0) {
    throw new EmptyBatchError();
  }

  const converting = records.filter((record) => record.conversions > 0);

  return {
    avgCtr: mean(records.map((r) => r.ctr)),
    avgCpc: mean(records.map((r) => r.avgCpc)),
    avgBounce: mean(records.map((r) => r.bounceRate)),
    avgDepth: mean(records.map((r) => r.depth)),
    avgSpend: mean(records.map((r) => r.spend)),
    avgConversions: mean(records.map((r) => r.conversions)),
    avgCpa: mean(converting.map((r) => r.costPerConversion)),
    placementCount: records.length,
    convertingPlacementCount: converting.length,
  };
}
