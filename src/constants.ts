/**
 * RSYAプレースメント分析エンジン - 定数定義
 */

// =============================================================================
// 緩和係数
// =============================================================================
export const LENIENCY = {
  /** Yandex自社面に適用する緩和係数 */
  YANDEX_COEFFICIENT: 1.5,
  /** それ以外の面の係数 */
  DEFAULT_COEFFICIENT: 1.0,
} as const;

// =============================================================================
// CTR関連しきい値（%）
// =============================================================================
export const CTR_THRESHOLDS = {
  /** 不正トラフィック疑い（この値以上） */
  EXTREME: 50,
  /** 高CTR帯の下限（係数で緩和される） */
  HIGH: 10,
  /** 安価クリック判定と組み合わせるCTR */
  CHEAP_CLICK: 15,
  /** 致命的に低いCTR（係数で割る） */
  CRITICALLY_LOW: 0.2,
  /** 効果的セグメントのCTR下限 */
  EFFECTIVE_MIN: 0.5,
  /** 効果的セグメントのCTR上限 */
  EFFECTIVE_MAX: 2,
} as const;

// =============================================================================
// ボリューム関連しきい値
// =============================================================================
export const VOLUME_THRESHOLDS = {
  /** CTR判定に必要な最小インプレッション */
  MIN_IMPRESSIONS_FOR_CTR: 10,
  /** 低CTR判定に必要な最小インプレッション */
  MIN_IMPRESSIONS_FOR_LOW_CTR: 1000,
  /** 無コンバージョン判定に必要な最小クリック */
  MIN_CLICKS_FOR_ZERO_CONVERSIONS: 10,
  /** エンゲージメント判定に必要な最小クリック */
  MIN_CLICKS_FOR_ENGAGEMENT: 20,
} as const;

// =============================================================================
// コスト関連しきい値
// =============================================================================
export const COST_THRESHOLDS = {
  /** 平均CPAに対する倍率（これを超えると高コスト） */
  CPA_MULTIPLIER: 2.5,
  /** 無コンバージョンで許容する最大広告費（₽、係数で緩和） */
  ZERO_CONVERSION_SPEND: 50,
  /** 平均CPCに対する比率（これ未満で安すぎるクリック） */
  CHEAP_CPC_RATIO: 0.3,
  /** 補助判定で使う広告費（₽） */
  SUPPLEMENTARY_SPEND: 30,
  /** 補助判定で使う絶対CPC（₽） */
  SUPPLEMENTARY_CPC: 0.5,
  /** 補助判定で安価CPCと組み合わせるCTR（%） */
  SUPPLEMENTARY_CTR_WITH_CHEAP_CPC: 20,
} as const;

// =============================================================================
// エンゲージメント関連しきい値
// =============================================================================
export const ENGAGEMENT_THRESHOLDS = {
  /** 平均直帰率に対する倍率 */
  BOUNCE_MULTIPLIER: 1.2,
  /** 閲覧深度の下限（この値以下は低エンゲージメント） */
  MIN_DEPTH: 1.0,
} as const;

// =============================================================================
// 入出力
// =============================================================================
export const INPUT = {
  /** レポート冒頭の読み飛ばし行数（クライアント名、合計、空行など） */
  DEFAULT_PREAMBLE_LINES: 4,
  /** 列区切り */
  DELIMITER: ";",
} as const;

export const OUTPUT = {
  /** デフォルト出力ディレクトリ */
  DEFAULT_DIR: "./output",
  /** ブロック対象CSVのファイル名 */
  BLOCKING_CSV_FILE: "Площадки_к_блокировке.csv",
  /** 分析レポートのファイル名 */
  REPORT_FILE: "Аналитическая_справка.txt",
  /** レポートのTop-N件数 */
  TOP_PLACEMENTS: 10,
  /** コンソールサマリーのTop-N件数 */
  SUMMARY_TOP: 3,
} as const;

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
  /** リクエストボディ上限 */
  JSON_BODY_LIMIT: "10mb",
} as const;
