/**
 * 数値の表示用フォーマット
 *
 * 判定理由・レポート・CSVで同じ書式を使う
 */

// toFixed が指数表記に切り替わる境界
const TO_FIXED_LIMIT = 1e21;

/**
 * 固定小数点表記（-0 は 0 として表示）
 *
 * toFixed はちょうど中間の値を絶対値の大きい側に丸めるため、
 * 2進数で正確に表せる中間値（3.25, 12.5 など）だけ偶数側に丸め直す。
 */
export function formatFixed(value: number, digits: number = 2): string {
  const text = roundHalfEven(value, digits);
  return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

function roundHalfEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= TO_FIXED_LIMIT) {
    return rounded;
  }

  // 100桁あれば倍精度の小数部は正確に展開できる
  const exact = Math.abs(value).toFixed(100);
  const cut = exact.indexOf(".") + (digits > 0 ? digits + 1 : 0);
  const isTie = /^50*$/.test(exact.slice(cut).replace(".", ""));
  const lastDigit = Number(rounded.charAt(rounded.length - 1));

  if (!isTie || lastDigit % 2 === 0) {
    return rounded;
  }
  return `${value < 0 ? "-" : ""}${exact.slice(0, cut)}`;
}

/**
 * 金額（₽）
 */
export function formatRub(value: number): string {
  return `${formatFixed(value)}₽`;
}

/**
 * パーセント値（既に0-100スケールの値）
 */
export function formatPercent(value: number, digits: number = 2): string {
  return `${formatFixed(value, digits)}%`;
}

/**
 * 件数（小数部を切り捨て）
 */
export function formatCount(value: number): string {
  return String(Math.trunc(value));
}

/**
 * 全体に対する割合（%、小数1桁）。分母が0なら 0.0
 */
export function formatShare(part: number, total: number): string {
  if (total === 0) {
    return formatFixed(0, 1);
  }
  return formatFixed((part / total) * 100, 1);
}
