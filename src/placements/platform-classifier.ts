/**
 * プラットフォーム種別判定（純粋関数）
 *
 * 識別子文字列だけから5種別のいずれかを決める。
 * ルールは上から順に評価し、最初に一致したものを採用する。
 */

import { PlatformType } from "./types";

// =============================================================================
// 判定テーブル
// =============================================================================

/**
 * モバイルアプリIDとみなす接頭辞（逆ドメイン形式）
 */
export const MOBILE_APP_PREFIXES: readonly string[] = [
  "com.",
  "ru.",
  "by.",
  "fm.",
  "org.",
  "cz.",
  "net.",
  "biz.",
  "game.",
  "afisha.",
  "asian.",
  "air.",
  "and.",
  "io.",
  "con.",
  "tap.",
];

/**
 * Yandex自社面として扱う完全一致の識別子
 */
const YANDEX_EXACT_IDENTIFIERS: readonly string[] = ["dzen.ru"];

/**
 * 判定ルール
 */
export interface PlatformTypeRule {
  /** 結果の種別 */
  type: PlatformType;
  /** 小文字化済みの識別子に対する判定 */
  matches: (identifier: string) => boolean;
}

function countDots(identifier: string): number {
  return identifier.split(".").length - 1;
}

/**
 * モバイルアプリ判定
 *
 * 接頭辞一致に加え「ドットが2つ以上」または「yandex/dzen を含まない」ことを要求する。
 * 2ドット未満でも yandex/dzen を含まなければアプリ扱いになる。
 */
function isMobileAppIdentifier(identifier: string): boolean {
  const hasPrefix = MOBILE_APP_PREFIXES.some((prefix) => identifier.startsWith(prefix));
  if (!hasPrefix) {
    return false;
  }
  const mentionsYandex = identifier.includes("yandex") || identifier.includes("dzen");
  return countDots(identifier) >= 2 || !mentionsYandex;
}

/**
 * 判定テーブル（評価順）
 */
export const PLATFORM_TYPE_RULES: readonly PlatformTypeRule[] = [
  {
    type: "YANDEX",
    matches: (id) => id.includes("yandex") || YANDEX_EXACT_IDENTIFIERS.includes(id),
  },
  {
    type: "DSP",
    matches: (id) => id.startsWith("dsp-"),
  },
  {
    type: "MOBILE_APP",
    matches: isMobileAppIdentifier,
  },
  {
    type: "COM_SITE",
    matches: (id) => id.endsWith(".com"),
  },
];

// =============================================================================
// メイン関数
// =============================================================================

/**
 * 識別子からプラットフォーム種別を判定
 *
 * 大文字小文字は区別しない。どのルールにも一致しなければ SITE。
 */
export function classifyPlatformType(identifier: string): PlatformType {
  const normalized = identifier.toLowerCase();
  const rule = PLATFORM_TYPE_RULES.find((candidate) => candidate.matches(normalized));
  return rule ? rule.type : "SITE";
}
