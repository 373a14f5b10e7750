/**
 * ロケール形式の数値パース
 *
 * レポートの数値セルは "1 234,56" のようにスペース区切り・カンマ小数で出力される。
 * 欠損は "-" または空セル。
 */

// 通常のスペース、NBSP、狭いNBSP
const THOUSANDS_SEPARATOR_PATTERN = /[\s\u00A0\u202F]/g;

// 10進表記のみ（"0x10" などの接頭辞付き表記は受け付けない）
const DECIMAL_NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * セル値を数値に変換
 *
 * - null / undefined / "" / "-" → 0
 * - カンマは小数点として扱う
 * - 10進数として解釈できない値は 0
 */
export function parseLocaleNumber(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "-") {
    return 0;
  }

  const normalized = trimmed
    .replace(THOUSANDS_SEPARATOR_PATTERN, "")
    .replace(/,/g, ".");

  if (!DECIMAL_NUMBER_PATTERN.test(normalized)) {
    return 0;
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : 0;
}
