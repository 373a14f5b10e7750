/**
 * ブロック対象リストのCSV出力
 *
 * Excel（ロシア語ロケール）でそのまま開けるよう、BOM付きUTF-8・セミコロン区切りで出力する
 */

import {
  BlockingVerdict,
  BLOCKING_PRIORITY_LABELS,
  BLOCKING_RECOMMENDATION_LABELS,
} from "../blocking/types";
import { INPUT } from "../constants";
import { PLATFORM_TYPE_LABELS } from "../placements/types";

const BOM = "\uFEFF";

/**
 * 列定義（ヘッダーと値の取り出し）
 */
export interface CsvColumn {
  header: string;
  value: (verdict: BlockingVerdict) => string | number;
}

export const BLOCKING_CSV_COLUMNS: readonly CsvColumn[] = [
  { header: "Площадка", value: (v) => v.placement },
  { header: "Тип", value: (v) => PLATFORM_TYPE_LABELS[v.platformType] },
  { header: "Критерий_минусации", value: (v) => v.reason },
  { header: "Номер_критерия", value: (v) => v.criterionId },
  { header: "Приоритет_блокировки", value: (v) => BLOCKING_PRIORITY_LABELS[v.priority] },
  { header: "Показов", value: (v) => v.metrics.impressions },
  { header: "Кликов", value: (v) => v.metrics.clicks },
  { header: "CTR_%", value: (v) => v.metrics.ctr },
  { header: "Конверсий", value: (v) => v.metrics.conversions },
  { header: "Стоимость_конверсии_руб", value: (v) => v.metrics.costPerConversion },
  { header: "Расход_руб", value: (v) => v.metrics.spend },
  { header: "Показатель_отказов_%", value: (v) => v.metrics.bounceRate },
  { header: "Глубина_просмотра", value: (v) => v.metrics.depth },
  { header: "Отклонение_от_среднего", value: (v) => v.deviation },
  { header: "Обоснование", value: (v) => v.justification },
  { header: "Рекомендация", value: (v) => BLOCKING_RECOMMENDATION_LABELS[v.recommendation] },
  { header: "Особенности", value: (v) => v.specialFeatures.join(", ") },
];

/**
 * セル値をエスケープ（区切り文字・引用符・改行を含む場合のみ引用）
 */
export function escapeCsvField(value: string | number, delimiter: string = INPUT.DELIMITER): string {
  const text = String(value);
  if (text.includes(delimiter) || text.includes('"') || /[\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * 判定結果をCSV文字列に変換
 */
export function exportVerdictsToCsv(verdicts: readonly BlockingVerdict[]): string {
  const lines = [
    BLOCKING_CSV_COLUMNS.map((column) => escapeCsvField(column.header)).join(INPUT.DELIMITER),
    ...verdicts.map((verdict) =>
      BLOCKING_CSV_COLUMNS.map((column) => escapeCsvField(column.value(verdict))).join(
        INPUT.DELIMITER
      )
    ),
  ];
  return `${BOM}${lines.join("\n")}\n`;
}
