/**
 * プレースメント - 型定義
 *
 * Yandex広告ネットワーク（РСЯ）のプレースメント統計レポート1行分と、
 * 識別子から導出するプラットフォーム種別
 */

// =============================================================================
// プレースメントレコード
// =============================================================================

/**
 * プレースメント1件分の統計（読み込み後は不変）
 */
export interface PlacementRecord {
  /** プレースメント識別子（ドメイン、アプリID、DSP名など） */
  readonly placement: string;

  /** レポート上のプレースメント種別列（参考情報、判定には使わない） */
  readonly sourceType: string;

  /** インプレッション数 */
  readonly impressions: number;

  /** クリック数 */
  readonly clicks: number;

  /** CTR（%、0-100） */
  readonly ctr: number;

  /** 広告費（₽） */
  readonly spend: number;

  /** 平均CPC（₽） */
  readonly avgCpc: number;

  /** 直帰率（%） */
  readonly bounceRate: number;

  /** 平均閲覧深度（ページ数） */
  readonly depth: number;

  /** コンバージョン単価（₽、conversions > 0 のときのみ意味を持つ） */
  readonly costPerConversion: number;

  /** コンバージョン数 */
  readonly conversions: number;
}

// =============================================================================
// プラットフォーム種別
// =============================================================================

/**
 * プラットフォーム種別
 */
export type PlatformType =
  | "YANDEX"       // Yandex自社面（yandex.*, dzen.ru）
  | "DSP"          // DSP経由のプログラマティック在庫
  | "MOBILE_APP"   // モバイルアプリ（逆ドメイン形式のID）
  | "COM_SITE"     // .com ドメインのサイト
  | "SITE";        // その他のサイト

/**
 * 有効な PlatformType 一覧
 */
export const VALID_PLATFORM_TYPES: readonly PlatformType[] = [
  "YANDEX",
  "DSP",
  "MOBILE_APP",
  "COM_SITE",
  "SITE",
] as const;

/**
 * レポート表示用ラベル
 */
export const PLATFORM_TYPE_LABELS: Record<PlatformType, string> = {
  YANDEX: "Яндекс-площадка",
  DSP: "DSP-площадка",
  MOBILE_APP: "Мобильное приложение",
  COM_SITE: "Сайт (.com)",
  SITE: "Сайт",
};

/**
 * 値が PlatformType かどうかを判定
 */
export function isValidPlatformType(value: unknown): value is PlatformType {
  return (
    typeof value === "string" &&
    VALID_PLATFORM_TYPES.some((type) => type === value)
  );
}
