/**
 * 集計統計モジュール
 */

export type { AggregateStatistics } from "./types";

export { calculateAggregateStatistics, mean } from "./aggregate-statistics";
