/**
 * セグメンテーションモジュール
 */

export type { SegmentTag, PlacementSegments } from "./types";

export {
  isEffectivePlacement,
  isIneffectivePlacement,
  segmentPlacement,
  segmentPlacements,
} from "./segmentation-engine";
