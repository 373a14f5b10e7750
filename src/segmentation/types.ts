/**
 * セグメンテーション - 型定義
 */

/**
 * 効果セグメント
 */
export type SegmentTag = "EFFECTIVE" | "MEDIUM" | "INEFFECTIVE";

/**
 * セグメント別のプレースメント識別子（入力順）
 */
export interface PlacementSegments {
  effective: string[];
  medium: string[];
  ineffective: string[];
}
