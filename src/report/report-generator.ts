/**
 * 分析レポート生成
 *
 * 分析結果を広告運用担当者向けのテキストレポート（ロシア語）に整形する
 */

import { PlacementAnalysisResult } from "../analysis/types";
import {
  BlockingPriority,
  BlockingVerdict,
  BLOCKING_PRIORITY_LABELS,
} from "../blocking/types";
import { OUTPUT } from "../constants";
import { PlacementRecord, PlatformType, PLATFORM_TYPE_LABELS } from "../placements/types";
import { mean } from "../statistics/aggregate-statistics";
import { formatCount, formatFixed, formatShare } from "../utils/number-format";

// =============================================================================
// 型定義
// =============================================================================

export interface AnalyticalReportInput {
  /** 分析対象の全レコード */
  records: readonly PlacementRecord[];
  result: PlacementAnalysisResult;
  /** "DD.MM.YYYY - DD.MM.YYYY" */
  reportPeriod?: string | null;
}

export interface GroupSummary {
  key: string;
  count: number;
  spend: number;
}

const SEPARATOR = "=".repeat(80);
const SECTION_RULE = "-".repeat(80);

// =============================================================================
// ヘルパー関数
// =============================================================================

function sumSpend(verdicts: readonly BlockingVerdict[]): number {
  return verdicts.reduce((sum, verdict) => sum + verdict.metrics.spend, 0);
}

/**
 * キーごとに件数と広告費を集計（キーの昇順）
 */
export function groupVerdicts(
  verdicts: readonly BlockingVerdict[],
  keyOf: (verdict: BlockingVerdict) => string
): GroupSummary[] {
  const groups = new Map<string, GroupSummary>();
  for (const verdict of verdicts) {
    const key = keyOf(verdict);
    const group = groups.get(key) ?? { key, count: 0, spend: 0 };
    group.count += 1;
    group.spend += verdict.metrics.spend;
    groups.set(key, group);
  }
  return [...groups.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * 広告費の多い順に上位N件（同額は入力順）
 */
export function topBySpend(
  verdicts: readonly BlockingVerdict[],
  limit: number
): BlockingVerdict[] {
  return [...verdicts]
    .sort((a, b) => b.metrics.spend - a.metrics.spend)
    .slice(0, limit);
}

function ofPlatformType(
  verdicts: readonly BlockingVerdict[],
  platformType: PlatformType
): BlockingVerdict[] {
  return verdicts.filter((verdict) => verdict.platformType === platformType);
}

function ofPriority(
  verdicts: readonly BlockingVerdict[],
  priority: BlockingPriority
): BlockingVerdict[] {
  return verdicts.filter((verdict) => verdict.priority === priority);
}

// =============================================================================
// セクション
// =============================================================================

function buildGeneralSection(input: AnalyticalReportInput): string[] {
  const total = input.records.length;
  const { verdicts, segments } = input.result;

  return [
    "1. ОБЩАЯ СТАТИСТИКА",
    SECTION_RULE,
    `Период анализа: ${input.reportPeriod ?? "не указан"}`,
    `Всего площадок проанализировано: ${total}`,
    `Площадок к блокировке: ${verdicts.length} (${formatShare(verdicts.length, total)}%)`,
    `Площадок к наблюдению (средние): ${segments.medium.length} (${formatShare(segments.medium.length, total)}%)`,
    `Эффективных площадок: ${segments.effective.length} (${formatShare(segments.effective.length, total)}%)`,
    "",
  ];
}

function buildFinancialSection(input: AnalyticalReportInput): string[] {
  const { verdicts, segments } = input.result;
  const totalSpend = input.records.reduce((sum, record) => sum + record.spend, 0);
  const blockedSpend = sumSpend(verdicts);

  const lines = [
    "2. ФИНАНСОВАЯ ОЦЕНКА",
    SECTION_RULE,
    `Общий расход на все площадки: ${formatFixed(totalSpend)} руб.`,
    `Расход на неэффективные площадки: ${formatFixed(blockedSpend)} руб.`,
    `Доля расхода на неэффективные площадки: ${formatShare(blockedSpend, totalSpend)}%`,
  ];

  const effectiveNames = new Set(segments.effective);
  const effectiveConverting = input.records.filter(
    (record) => effectiveNames.has(record.placement) && record.conversions > 0
  );
  if (effectiveConverting.length > 0) {
    const cpa = mean(effectiveConverting.map((record) => record.costPerConversion));
    lines.push(`Средняя стоимость конверсии по эффективным площадкам: ${formatFixed(cpa)} руб.`);
  } else {
    lines.push("Средняя стоимость конверсии по эффективным площадкам: данных нет");
  }

  const blockedConverting = verdicts.filter((verdict) => verdict.metrics.conversions > 0);
  if (blockedConverting.length > 0) {
    const cpa = mean(blockedConverting.map((verdict) => verdict.metrics.costPerConversion));
    lines.push(`Средняя стоимость конверсии по неэффективным площадкам: ${formatFixed(cpa)} руб.`);
  } else {
    lines.push("Средняя стоимость конверсии по неэффективным площадкам: конверсий нет");
  }

  lines.push(`Потенциальная экономия бюджета при блокировке: ${formatFixed(blockedSpend)} руб.`);
  lines.push("");
  return lines;
}

function buildCriteriaSection(verdicts: readonly BlockingVerdict[]): string[] {
  const lines = ["3. РАСПРЕДЕЛЕНИЕ ПО КРИТЕРИЯМ МИНУСАЦИИ", SECTION_RULE];

  if (verdicts.length === 0) {
    lines.push("Площадок к блокировке не найдено.");
  }
  for (const group of groupVerdicts(verdicts, (verdict) => verdict.criterionId)) {
    lines.push(
      `Критерий ${group.key}: ${group.count} площадок (${formatShare(group.count, verdicts.length)}%), расход ${formatFixed(group.spend)} руб.`
    );
  }

  lines.push("");
  return lines;
}

function buildPlatformTypeSection(verdicts: readonly BlockingVerdict[]): string[] {
  const lines = ["4. РАСПРЕДЕЛЕНИЕ ПО ТИПАМ ПЛОЩАДОК", SECTION_RULE];

  const groups = groupVerdicts(verdicts, (verdict) => PLATFORM_TYPE_LABELS[verdict.platformType]);
  for (const group of groups) {
    lines.push(
      `${group.key}: ${group.count} площадок (${formatShare(group.count, verdicts.length)}%), расход ${formatFixed(group.spend)} руб.`
    );
  }

  lines.push("");
  return lines;
}

function buildTopPlacementsSection(verdicts: readonly BlockingVerdict[]): string[] {
  const lines = [
    `5. ТОП-${OUTPUT.TOP_PLACEMENTS} САМЫХ РАСХОДНЫХ НЕЭФФЕКТИВНЫХ ПЛОЩАДОК`,
    SECTION_RULE,
  ];

  for (const verdict of topBySpend(verdicts, OUTPUT.TOP_PLACEMENTS)) {
    lines.push(
      `${verdict.placement}: ${formatFixed(verdict.metrics.spend)} руб., ` +
        `CTR ${formatFixed(verdict.metrics.ctr)}%, конверсий ${formatCount(verdict.metrics.conversions)}, ` +
        verdict.reason
    );
  }

  lines.push("");
  return lines;
}

function buildRecommendationsSection(verdicts: readonly BlockingVerdict[]): string[] {
  const lines = ["6. РЕКОМЕНДАЦИИ", SECTION_RULE];

  if (verdicts.length === 0) {
    return lines;
  }

  const critical = ofPriority(verdicts, "CRITICAL");
  const high = ofPriority(verdicts, "HIGH");

  lines.push(
    "ПРИОРИТЕТ БЛОКИРОВКИ:",
    `1. ${BLOCKING_PRIORITY_LABELS.CRITICAL} приоритет: ${critical.length} площадок - блокировать НЕМЕДЛЕННО`,
    `   Экономия: ${formatFixed(sumSpend(critical))} руб.`,
    `2. ${BLOCKING_PRIORITY_LABELS.HIGH} приоритет: ${high.length} площадок - блокировать после проверки`,
    `   Экономия: ${formatFixed(sumSpend(high))} руб.`,
    ""
  );

  const mobile = ofPlatformType(verdicts, "MOBILE_APP");
  if (mobile.length > 0) {
    lines.push(`ТОП-${OUTPUT.TOP_PLACEMENTS} МОБИЛЬНЫХ ПРИЛОЖЕНИЙ ПО РАСХОДУ:`);
    for (const verdict of topBySpend(mobile, OUTPUT.TOP_PLACEMENTS)) {
      lines.push(
        `  - ${verdict.placement}: ${formatFixed(verdict.metrics.spend)} руб., CTR ${formatFixed(verdict.metrics.ctr)}%`
      );
    }
    lines.push(
      "Рекомендация: Мобильные приложения демонстрируют высокий CTR без конверсий.",
      `Это указывает на случайные клики. Блокировать ${mobile.length} приложений.`,
      ""
    );
  }

  const dsp = ofPlatformType(verdicts, "DSP");
  if (dsp.length > 0) {
    lines.push(
      "АНАЛИЗ DSP-ПЛОЩАДОК:",
      `К блокировке: ${dsp.length} площадок, расход ${formatFixed(sumSpend(dsp))} руб.`
    );
    for (const verdict of dsp) {
      lines.push(`  - ${verdict.placement}: ${formatFixed(verdict.metrics.spend)} руб., ${verdict.reason}`);
    }
    lines.push("Рекомендация: Программатик-площадки показывают низкую эффективность.", "");
  }

  const yandex = ofPlatformType(verdicts, "YANDEX");
  if (yandex.length > 0) {
    lines.push(
      "АНАЛИЗ ЯНДЕКС-ПЛОЩАДОК:",
      `К блокировке: ${yandex.length} площадок, расход ${formatFixed(sumSpend(yandex))} руб.`
    );
    for (const verdict of yandex) {
      lines.push(`  - ${verdict.placement}: ${formatFixed(verdict.metrics.spend)} руб., ${verdict.reason}`);
    }
    lines.push("ВНИМАНИЕ: Яндекс-площадки обычно качественные. Проверьте критерии повторно.", "");
  }

  return lines;
}

// =============================================================================
// メイン関数
// =============================================================================

/**
 * 分析レポートを生成
 */
export function generateAnalyticalReport(input: AnalyticalReportInput): string {
  const { verdicts } = input.result;

  const lines = [
    SEPARATOR,
    "АНАЛИТИЧЕСКАЯ СПРАВКА",
    "Анализ площадок Яндекс Директ РСЯ",
    SEPARATOR,
    "",
    ...buildGeneralSection(input),
    ...buildFinancialSection(input),
    ...buildCriteriaSection(verdicts),
    ...buildPlatformTypeSection(verdicts),
    ...buildTopPlacementsSection(verdicts),
    ...buildRecommendationsSection(verdicts),
    SEPARATOR,
    "КОНЕЦ АНАЛИТИЧЕСКОЙ СПРАВКИ",
    SEPARATOR,
  ];

  return lines.join("\n");
}

/**
 * コンソール向けの要約
 *
 * 件数の多い基準上位3件と、広告費の多いプレースメント上位3件
 */
export function generateConsoleSummary(result: PlacementAnalysisResult): string {
  const { verdicts } = result;
  const lines = [
    SEPARATOR,
    "КРАТКОЕ РЕЗЮМЕ",
    SEPARATOR,
    `Всего площадок проанализировано: ${result.statistics.placementCount}`,
    `К блокировке: ${verdicts.length} площадок`,
  ];

  if (verdicts.length === 0) {
    lines.push("Неэффективных площадок не обнаружено!");
    return lines.join("\n");
  }

  lines.push(`Потенциальная экономия: ${formatFixed(sumSpend(verdicts))} руб.`);

  lines.push("", "Главные проблемные критерии:");
  const topCriteria = groupVerdicts(verdicts, (verdict) => verdict.criterionId)
    .sort((a, b) => b.count - a.count)
    .slice(0, OUTPUT.SUMMARY_TOP);
  for (const group of topCriteria) {
    lines.push(`  - Критерий ${group.key}: ${group.count} площадок`);
  }

  lines.push("", `Топ-${OUTPUT.SUMMARY_TOP} самых расходных неэффективных площадки:`);
  for (const verdict of topBySpend(verdicts, OUTPUT.SUMMARY_TOP)) {
    lines.push(`  ${verdict.placement}: ${formatFixed(verdict.metrics.spend)} руб., ${verdict.reason}`);
  }

  return lines.join("\n");
}
