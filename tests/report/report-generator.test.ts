/**
 * 分析レポート生成テスト
 */

import { analyzePlacements } from "../../src/analysis/placement-analyzer";
import {
  generateAnalyticalReport,
  generateConsoleSummary,
  groupVerdicts,
  topBySpend,
} from "../../src/report/report-generator";
import { createRecord, SAMPLE_RECORDS } from "../helpers/placement-fixtures";

const SEPARATOR = "=".repeat(80);

describe("report-generator", () => {
  const result = analyzePlacements(SAMPLE_RECORDS, { executionId: "test-execution" });

  describe("groupVerdicts / topBySpend", () => {
    it("キーの昇順で件数と広告費を集計する", () => {
      expect(groupVerdicts(result.verdicts, (verdict) => verdict.criterionId)).toEqual([
        { key: "2.1Б", count: 1, spend: 600 },
        { key: "2.2а", count: 1, spend: 300 },
        { key: "2.2б", count: 1, spend: 40 },
      ]);
    });

    it("広告費の多い順に上位N件", () => {
      expect(topBySpend(result.verdicts, 2).map((verdict) => verdict.placement)).toEqual([
        "waste.ru",
        "fraud.ru",
      ]);
    });
  });

  describe("generateAnalyticalReport", () => {
    const report = generateAnalyticalReport({
      records: SAMPLE_RECORDS,
      result,
      reportPeriod: "24.10.2025 - 25.10.2025",
    });
    const lines = report.split("\n");

    it("ヘッダーとフッター", () => {
      expect(lines.slice(0, 4)).toEqual([
        SEPARATOR,
        "АНАЛИТИЧЕСКАЯ СПРАВКА",
        "Анализ площадок Яндекс Директ РСЯ",
        SEPARATOR,
      ]);
      expect(lines.slice(-3)).toEqual([SEPARATOR, "КОНЕЦ АНАЛИТИЧЕСКОЙ СПРАВКИ", SEPARATOR]);
    });

    it("一般統計", () => {
      expect(lines).toContain("Период анализа: 24.10.2025 - 25.10.2025");
      expect(lines).toContain("Всего площадок проанализировано: 5");
      expect(lines).toContain("Площадок к блокировке: 3 (60.0%)");
      expect(lines).toContain("Площадок к наблюдению (средние): 1 (20.0%)");
      expect(lines).toContain("Эффективных площадок: 1 (20.0%)");
    });

    it("財務評価", () => {
      expect(lines).toContain("Общий расход на все площадки: 1150.00 руб.");
      expect(lines).toContain("Расход на неэффективные площадки: 940.00 руб.");
      expect(lines).toContain("Доля расхода на неэффективные площадки: 81.7%");
      expect(lines).toContain("Средняя стоимость конверсии по эффективным площадкам: 50.00 руб.");
      expect(lines).toContain(
        "Средняя стоимость конверсии по неэффективным площадкам: конверсий нет"
      );
      expect(lines).toContain("Потенциальная экономия бюджета при блокировке: 940.00 руб.");
    });

    it("基準別の分布（基準IDの昇順）", () => {
      const start = lines.indexOf("3. РАСПРЕДЕЛЕНИЕ ПО КРИТЕРИЯМ МИНУСАЦИИ");
      expect(lines.slice(start + 2, start + 5)).toEqual([
        "Критерий 2.1Б: 1 площадок (33.3%), расход 600.00 руб.",
        "Критерий 2.2а: 1 площадок (33.3%), расход 300.00 руб.",
        "Критерий 2.2б: 1 площадок (33.3%), расход 40.00 руб.",
      ]);
    });

    it("プラットフォーム種別ごとの分布", () => {
      const start = lines.indexOf("4. РАСПРЕДЕЛЕНИЕ ПО ТИПАМ ПЛОЩАДОК");
      expect(lines.slice(start + 2, start + 4)).toEqual([
        "Мобильное приложение: 1 площадок (33.3%), расход 40.00 руб.",
        "Сайт: 2 площадок (66.7%), расход 900.00 руб.",
      ]);
    });

    it("広告費の多い順のTOP", () => {
      const start = lines.indexOf("5. ТОП-10 САМЫХ РАСХОДНЫХ НЕЭФФЕКТИВНЫХ ПЛОЩАДОК");
      expect(lines[start + 2]).toBe(
        "waste.ru: 600.00 руб., CTR 1.00%, конверсий 0, Нулевые конверсии при значительном расходе"
      );
      expect(lines[start + 3]).toBe(
        "fraud.ru: 300.00 руб., CTR 60.00%, конверсий 0, Экстремально высокий CTR (мошеннический трафик)"
      );
    });

    it("優先度別の推奨とモバイルアプリの内訳", () => {
      expect(lines).toContain("1. КРИТИЧНЫЙ приоритет: 2 площадок - блокировать НЕМЕДЛЕННО");
      expect(lines).toContain("   Экономия: 900.00 руб.");
      expect(lines).toContain("2. ВЫСОКИЙ приоритет: 1 площадок - блокировать после проверки");
      expect(lines).toContain("   Экономия: 40.00 руб.");
      expect(lines).toContain("  - com.example.app: 40.00 руб., CTR 20.00%");
      expect(lines).toContain("Это указывает на случайные клики. Блокировать 1 приложений.");
    });

    it("該当がなければDSP・Yandexの節は出さない", () => {
      expect(lines).not.toContain("АНАЛИЗ DSP-ПЛОЩАДОК:");
      expect(lines).not.toContain("АНАЛИЗ ЯНДЕКС-ПЛОЩАДОК:");
    });

    it("判定0件・期間未指定", () => {
      const records = [createRecord()];
      const emptyReport = generateAnalyticalReport({
        records,
        result: analyzePlacements(records),
      });
      const emptyLines = emptyReport.split("\n");

      expect(emptyLines).toContain("Период анализа: не указан");
      expect(emptyLines).toContain("Площадок к блокировке: 0 (0.0%)");
      expect(emptyLines).toContain("Площадок к наблюдению (средние): 1 (100.0%)");
      expect(emptyLines).toContain("Доля расхода на неэффективные площадки: 0.0%");
      expect(emptyLines).toContain(
        "Средняя стоимость конверсии по эффективным площадкам: данных нет"
      );
      expect(emptyLines).toContain("Площадок к блокировке не найдено.");
      expect(emptyLines).not.toContain("ПРИОРИТЕТ БЛОКИРОВКИ:");
    });
  });

  describe("generateConsoleSummary", () => {
    it("基準上位3件と広告費上位3件を出力する", () => {
      expect(generateConsoleSummary(result)).toBe(
        [
          SEPARATOR,
          "КРАТКОЕ РЕЗЮМЕ",
          SEPARATOR,
          "Всего площадок проанализировано: 5",
          "К блокировке: 3 площадок",
          "Потенциальная экономия: 940.00 руб.",
          "",
          "Главные проблемные критерии:",
          "  - Критерий 2.1Б: 1 площадок",
          "  - Критерий 2.2а: 1 площадок",
          "  - Критерий 2.2б: 1 площадок",
          "",
          "Топ-3 самых расходных неэффективных площадки:",
          "  waste.ru: 600.00 руб., Нулевые конверсии при значительном расходе",
          "  fraud.ru: 300.00 руб., Экстремально высокий CTR (мошеннический трафик)",
          "  com.example.app: 40.00 руб., Подозрительно высокий CTR без конверсий",
        ].join("\n")
      );
    });

    it("判定0件ならその旨だけを出力する", () => {
      const summary = generateConsoleSummary(analyzePlacements([createRecord()]));
      expect(summary.split("\n").slice(3)).toEqual([
        "Всего площадок проанализировано: 1",
        "К блокировке: 0 площадок",
        "Неэффективных площадок не обнаружено!",
      ]);
    });
  });
});
