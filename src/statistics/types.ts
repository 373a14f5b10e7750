/**
 * 集計統計 - 型定義
 */

/**
 * バッチ全体の平均値（ブロック判定・セグメント判定のベースライン）
 *
 * 実行ごとに再計算し、判定中は読み取り専用で共有する
 */
export interface AggregateStatistics {
  /** 平均CTR（%） */
  readonly avgCtr: number;

  /** 平均CPC（₽） */
  readonly avgCpc: number;

  /** 平均直帰率（%） */
  readonly avgBounce: number;

  /** 平均閲覧深度 */
  readonly avgDepth: number;

  /** 平均広告費（₽） */
  readonly avgSpend: number;

  /** 平均コンバージョン数 */
  readonly avgConversions: number;

  /**
   * 平均コンバージョン単価（₽）
   * コンバージョンのあるプレースメントのみで計算、該当なしなら 0
   */
  readonly avgCpa: number;

  /** プレースメント数 */
  readonly placementCount: number;

  /** コンバージョンのあるプレースメント数 */
  readonly convertingPlacementCount: number;
}
