/**
 * 分析結果のファイル出力テスト
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { analyzePlacements } from "../../src/analysis/placement-analyzer";
import { OUTPUT } from "../../src/constants";
import { OutputWriteError } from "../../src/errors";
import { writeAnalysisOutputs } from "../../src/report/output-writer";
import { createRecord, SAMPLE_RECORDS } from "../helpers/placement-fixtures";

describe("writeAnalysisOutputs", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "rsya-output-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("ブロック対象CSVと分析レポートを書き出す", async () => {
    const outputDir = path.join(tmpDir, "nested", "output");
    const result = analyzePlacements(SAMPLE_RECORDS);

    const written = await writeAnalysisOutputs(
      { records: SAMPLE_RECORDS, result, reportPeriod: null },
      { outputDir }
    );

    expect(written.blockingCsvPath).toBe(path.join(outputDir, OUTPUT.BLOCKING_CSV_FILE));
    expect(written.reportPath).toBe(path.join(outputDir, OUTPUT.REPORT_FILE));

    const csv = fs.readFileSync(path.join(outputDir, OUTPUT.BLOCKING_CSV_FILE), "utf-8");
    expect(csv.trimEnd().split("\n")).toHaveLength(4);

    const report = fs.readFileSync(written.reportPath, "utf-8");
    expect(report.split("\n")).toContain("Период анализа: не указан");
  });

  it("判定0件ならCSVは書き出さず null", async () => {
    const records = [createRecord()];
    const written = await writeAnalysisOutputs(
      { records, result: analyzePlacements(records) },
      { outputDir: tmpDir }
    );

    expect(written.blockingCsvPath).toBeNull();
    expect(fs.existsSync(path.join(tmpDir, OUTPUT.BLOCKING_CSV_FILE))).toBe(false);
    expect(fs.existsSync(written.reportPath)).toBe(true);
  });

  it("出力先がファイルなら OutputWriteError", async () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "", "utf-8");
    const records = [createRecord()];

    await expect(
      writeAnalysisOutputs(
        { records, result: analyzePlacements(records) },
        { outputDir: path.join(blocker, "output") }
      )
    ).rejects.toBeInstanceOf(OutputWriteError);
  });
});
