#!/usr/bin/env node
/**
 * プレースメントレポート分析 CLI
 *
 * 使い方:
 *   analyze-placements <レポートCSVのパス>
 *   （引数がなければ ANALYSIS_INPUT_PATH を使用）
 */

import * as dotenv from "dotenv";
dotenv.config();

import { runPlacementAnalysisJob } from "../src/analysis/analysis-job";
import { loadEnvConfig, printEnvTemplate } from "../src/config";
import { toAppError, ValidationError } from "../src/errors";
import { generateConsoleSummary } from "../src/report/report-generator";

/**
 * CLIを実行して終了コードを返す
 */
export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const config = loadEnvConfig(env);
  const inputPath = argv[0] || config.inputPath;

  if (!inputPath) {
    console.error("❌ Не указан путь к файлу отчёта: передайте его аргументом или задайте ANALYSIS_INPUT_PATH");
    printEnvTemplate();
    return 1;
  }

  console.log(`📊 Анализ площадок РСЯ: ${inputPath}\n`);

  try {
    const job = await runPlacementAnalysisJob({
      inputPath,
      outputDir: config.outputDir,
      preambleLines: config.preambleLines,
    });

    if (job.blockingCsvPath) {
      console.log(`✅ Файл сохранен: ${job.blockingCsvPath}`);
    } else {
      console.log("✅ Площадок к блокировке не найдено - файл не создан");
    }
    console.log(`✅ Аналитическая справка сохранена: ${job.reportPath}\n`);
    console.log(generateConsoleSummary(job.result));

    return 0;
  } catch (error) {
    const appError = toAppError(error);
    console.error(`❌ ${appError.message}`);
    if (appError instanceof ValidationError) {
      for (const detail of appError.errors) {
        console.error(`   ${detail.field}: ${detail.message}`);
      }
    }
    return 1;
  }
}

if (require.main === module) {
  runCli()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      console.error("❌ Unexpected error:", error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
