/**
 * レポート読み込み - 型定義
 */

import { PlacementRecord } from "../placements/types";

/**
 * CSVパースオプション
 */
export interface CsvParseOptions {
  /** ヘッダー行の前に読み飛ばす行数（クライアント名、合計行、空行） */
  preambleLines?: number;

  /** 区切り文字 */
  delimiter?: string;
}

/**
 * 読み込み済みレポート
 */
export interface LoadedPlacementFile {
  filePath: string;
  records: PlacementRecord[];

  /** ファイル名から取得した期間（"DD.MM.YYYY - DD.MM.YYYY"）。取得できなければ null */
  reportPeriod: string | null;
}

/**
 * レポートの列順（位置で対応付ける）
 */
export const PLACEMENT_CSV_COLUMNS = [
  "sourceType",
  "placement",
  "impressions",
  "clicks",
  "ctr",
  "spend",
  "avgCpc",
  "bounceRate",
  "depth",
  "costPerConversion",
  "conversions",
] as const;

export type PlacementCsvColumn = (typeof PLACEMENT_CSV_COLUMNS)[number];
