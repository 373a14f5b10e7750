/**
 * レポート読み込みモジュール
 */

export type { CsvParseOptions, LoadedPlacementFile, PlacementCsvColumn } from "./types";

export { PLACEMENT_CSV_COLUMNS } from "./types";

export { parseLocaleNumber } from "./number-parser";

export {
  parseDelimitedText,
  parsePlacementCsv,
  extractReportPeriod,
  loadPlacementFile,
} from "./csv-loader";
