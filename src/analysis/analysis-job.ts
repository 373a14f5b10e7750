/**
 * ファイル分析ジョブ
 *
 * レポート読み込み → 分析 → CSV・テキストレポート出力
 */

import { v4 as uuidv4 } from "uuid";
import { loadPlacementFile } from "../ingestion/csv-loader";
import { logger } from "../logger";
import { writeAnalysisOutputs } from "../report/output-writer";
import { analyzePlacements } from "./placement-analyzer";
import { PlacementAnalysisJobResult, RunPlacementAnalysisJobOptions } from "./types";

/**
 * プレースメントレポートの分析ジョブを実行
 *
 * @throws {InputFileError} 入力ファイルが読めない場合
 * @throws {ValidationError} 入力の内容が不正な場合
 * @throws {EmptyBatchError} 有効なレコードが0件の場合
 * @throws {OutputWriteError} 出力に失敗した場合
 */
export async function runPlacementAnalysisJob(
  options: RunPlacementAnalysisJobOptions
): Promise<PlacementAnalysisJobResult> {
  const executionId = uuidv4();
  const startTime = Date.now();

  logger.info("Starting placement analysis job", {
    executionId,
    inputPath: options.inputPath,
    outputDir: options.outputDir,
  });

  const loaded = await loadPlacementFile(options.inputPath, {
    preambleLines: options.preambleLines,
  });

  const result = analyzePlacements(loaded.records, { executionId });

  const written = await writeAnalysisOutputs(
    { records: loaded.records, result, reportPeriod: loaded.reportPeriod },
    { outputDir: options.outputDir }
  );

  const processingTimeMs = Date.now() - startTime;

  logger.info("Placement analysis job completed", {
    executionId,
    processingTimeMs,
    blockedCount: result.verdicts.length,
  });

  return {
    executionId,
    inputPath: options.inputPath,
    reportPeriod: loaded.reportPeriod,
    records: loaded.records,
    result,
    blockingCsvPath: written.blockingCsvPath,
    reportPath: written.reportPath,
    processingTimeMs,
  };
}
