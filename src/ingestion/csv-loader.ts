/**
 * プレースメントレポート（CSV）の読み込み
 *
 * Yandex Direct のプレースメントレポートを想定:
 * - UTF-8（BOM付きのことがある）、セミコロン区切り
 * - 冒頭に数行のプリアンブル（クライアント名、合計行、空行）
 * - ヘッダー行の後に 11 列のデータ行。列名ではなく位置で対応付ける
 */

import * as fs from "fs";
import * as path from "path";
import { INPUT } from "../constants";
import { InputFileError, ValidationError, ValidationErrorDetail } from "../errors";
import { logger } from "../logger";
import { PlacementRecord } from "../placements/types";
import { validatePlacementRecord } from "../schemas";
import { parseLocaleNumber } from "./number-parser";
import {
  CsvParseOptions,
  LoadedPlacementFile,
  PlacementCsvColumn,
  PLACEMENT_CSV_COLUMNS,
} from "./types";

const BOM = "\uFEFF";

// =============================================================================
// 低レベルパース
// =============================================================================

/**
 * 区切り文字付きテキストを行・セルに分割
 *
 * ダブルクォートで囲まれたセル内の区切り文字・改行はそのまま値になる。
 * "" はクォート内で " 1文字として扱う。
 */
export function parseDelimitedText(
  text: string,
  delimiter: string = INPUT.DELIMITER
): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"' && field === "") {
      inQuotes = true;
      i++;
      continue;
    }

    if (ch === delimiter) {
      row.push(field);
      field = "";
      i++;
      continue;
    }

    if (ch === "\r" || ch === "\n") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      i += ch === "\r" && text[i + 1] === "\n" ? 2 : 1;
      continue;
    }

    field += ch;
    i++;
  }

  // 末尾に改行がない場合の最終行
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim() === "");
}

function cellOf(row: readonly string[], column: PlacementCsvColumn): string {
  return row[PLACEMENT_CSV_COLUMNS.indexOf(column)] ?? "";
}

type NumericColumn = Exclude<PlacementCsvColumn, "sourceType" | "placement">;

/**
 * 数値セルを変換（負の値は 0 に丸めて警告）
 */
function parseNumericCell(row: readonly string[], column: NumericColumn, rowNumber: number): number {
  const value = parseLocaleNumber(cellOf(row, column));
  if (value < 0) {
    logger.warn("Negative value in placement report coerced to 0", {
      row: rowNumber,
      field: column,
      value,
    });
    return 0;
  }
  return value;
}

/**
 * データ行を検証前のレコード形に変換（欠けたセルは 0 扱い）
 */
function toRawRecord(
  row: readonly string[],
  rowNumber: number
): Record<PlacementCsvColumn, string | number> {
  const numberAt = (column: NumericColumn) => parseNumericCell(row, column, rowNumber);
  return {
    sourceType: cellOf(row, "sourceType").trim(),
    placement: cellOf(row, "placement").trim(),
    impressions: numberAt("impressions"),
    clicks: numberAt("clicks"),
    ctr: numberAt("ctr"),
    spend: numberAt("spend"),
    avgCpc: numberAt("avgCpc"),
    bounceRate: numberAt("bounceRate"),
    depth: numberAt("depth"),
    costPerConversion: numberAt("costPerConversion"),
    conversions: numberAt("conversions"),
  };
}

// =============================================================================
// メイン関数
// =============================================================================

/**
 * レポート本文をパースしてプレースメントレコードを返す
 *
 * - プレースメント識別子が空の行は除外
 * - 解釈できない数値は 0、負の値も 0 に丸める
 * - 検証に通らない行があれば全件まとめて ValidationError
 *
 * @throws {ValidationError} ヘッダー行がない、または不正な行がある場合
 */
export function parsePlacementCsv(
  text: string,
  options: CsvParseOptions = {}
): PlacementRecord[] {
  const preambleLines = options.preambleLines ?? INPUT.DEFAULT_PREAMBLE_LINES;
  const content = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const rows = parseDelimitedText(content, options.delimiter ?? INPUT.DELIMITER);

  let headerIndex = preambleLines;
  while (headerIndex < rows.length && isBlankRow(rows[headerIndex])) {
    headerIndex++;
  }
  if (headerIndex >= rows.length) {
    throw new ValidationError(
      [{ field: "header", message: `Header line not found after ${preambleLines} preamble lines` }],
      "Placement report has no header line"
    );
  }

  const records: PlacementRecord[] = [];
  const errors: ValidationErrorDetail[] = [];

  for (let index = headerIndex + 1; index < rows.length; index++) {
    const row = rows[index];
    if (isBlankRow(row)) {
      continue;
    }

    const raw = toRawRecord(row, index + 1);
    if (raw.placement === "") {
      continue;
    }

    const result = validatePlacementRecord(raw, `row ${index + 1}`);
    if (result.success && result.data) {
      records.push(result.data);
    } else {
      errors.push(...(result.errors ?? []));
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(errors, "Placement report contains invalid rows");
  }

  return records;
}

/**
 * ファイル名からレポート期間を取得
 *
 * 例: "2025-10-24_2025-10-25_client.csv" → "24.10.2025 - 25.10.2025"
 */
export function extractReportPeriod(fileName: string): string | null {
  const match = /(\d{4})-(\d{2})-(\d{2})_(\d{4})-(\d{2})-(\d{2})/.exec(fileName);
  if (!match) {
    return null;
  }
  const [, fromYear, fromMonth, fromDay, toYear, toMonth, toDay] = match;
  return `${fromDay}.${fromMonth}.${fromYear} - ${toDay}.${toMonth}.${toYear}`;
}

/**
 * レポートファイルを読み込む
 *
 * @throws {InputFileError} ファイルが存在しない、または読めない場合
 * @throws {ValidationError} 内容が不正な場合
 */
export async function loadPlacementFile(
  filePath: string,
  options: CsvParseOptions = {}
): Promise<LoadedPlacementFile> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new InputFileError(
      filePath,
      `Cannot read placement report: ${cause?.message ?? String(error)}`,
      cause
    );
  }

  const records = parsePlacementCsv(text, options);
  const reportPeriod = extractReportPeriod(path.basename(filePath));

  logger.info("Placement report loaded", {
    filePath,
    recordCount: records.length,
    reportPeriod,
  });

  return { filePath, records, reportPeriod };
}
