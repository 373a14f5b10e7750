/**
 * プレースメントモジュール
 */

export type { PlacementRecord, PlatformType } from "./types";

export {
  VALID_PLATFORM_TYPES,
  PLATFORM_TYPE_LABELS,
  isValidPlatformType,
} from "./types";

export type { PlatformTypeRule } from "./platform-classifier";

export {
  MOBILE_APP_PREFIXES,
  PLATFORM_TYPE_RULES,
  classifyPlatformType,
} from "./platform-classifier";
