/**
 * 分析結果のファイル出力
 */

import * as fs from "fs";
import * as path from "path";
import { OUTPUT } from "../constants";
import { OutputWriteError } from "../errors";
import { logger } from "../logger";
import { exportVerdictsToCsv } from "./csv-exporter";
import { AnalyticalReportInput, generateAnalyticalReport } from "./report-generator";

export interface WriteAnalysisOutputsOptions {
  outputDir: string;
}

export interface WrittenAnalysisOutputs {
  /** 判定が0件の場合は書き出さず null */
  blockingCsvPath: string | null;
  reportPath: string;
}

async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new OutputWriteError(filePath, error instanceof Error ? error : undefined);
  }
}

/**
 * ブロック対象CSVと分析レポートを出力ディレクトリに書き出す
 *
 * @throws {OutputWriteError} ディレクトリ作成・書き込みに失敗した場合
 */
export async function writeAnalysisOutputs(
  input: AnalyticalReportInput,
  options: WriteAnalysisOutputsOptions
): Promise<WrittenAnalysisOutputs> {
  const { outputDir } = options;
  const { executionId, verdicts } = input.result;

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new OutputWriteError(outputDir, error instanceof Error ? error : undefined);
  }

  let blockingCsvPath: string | null = null;
  if (verdicts.length > 0) {
    blockingCsvPath = path.join(outputDir, OUTPUT.BLOCKING_CSV_FILE);
    await writeTextFile(blockingCsvPath, exportVerdictsToCsv(verdicts));
    logger.info("Blocking list written", { executionId, path: blockingCsvPath, count: verdicts.length });
  } else {
    logger.info("No placements to block, blocking list not written", { executionId });
  }

  const reportPath = path.join(outputDir, OUTPUT.REPORT_FILE);
  await writeTextFile(reportPath, generateAnalyticalReport(input));
  logger.info("Analytical report written", { executionId, path: reportPath });

  return { blockingCsvPath, reportPath };
}
