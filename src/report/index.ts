/**
 * レポート出力モジュール
 */

export type { AnalyticalReportInput, GroupSummary } from "./report-generator";
export type { WriteAnalysisOutputsOptions, WrittenAnalysisOutputs } from "./output-writer";

export {
  generateAnalyticalReport,
  generateConsoleSummary,
  groupVerdicts,
  topBySpend,
} from "./report-generator";

export { BLOCKING_CSV_COLUMNS, escapeCsvField, exportVerdictsToCsv } from "./csv-exporter";

export { writeAnalysisOutputs } from "./output-writer";
