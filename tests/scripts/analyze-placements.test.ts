/**
 * 分析CLIテスト
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runCli } from "../../scripts/analyze-placements";
import { OUTPUT } from "../../src/constants";
import { SAMPLE_REPORT_PATH } from "../helpers/placement-fixtures";

describe("runCli", () => {
  let tmpDir: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "rsya-cli-"));
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("入力パスがなければ終了コード1", async () => {
    await expect(runCli([], {})).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalled();
  });

  it("レポートを分析して出力先に書き出す", async () => {
    const exitCode = await runCli([SAMPLE_REPORT_PATH], { ANALYSIS_OUTPUT_DIR: tmpDir });

    expect(exitCode).toBe(0);
    expect(fs.existsSync(path.join(tmpDir, OUTPUT.BLOCKING_CSV_FILE))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, OUTPUT.REPORT_FILE))).toBe(true);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("КРАТКОЕ РЕЗЮМЕ"));
  });

  it("ANALYSIS_INPUT_PATH からも入力を取る", async () => {
    const exitCode = await runCli([], {
      ANALYSIS_INPUT_PATH: SAMPLE_REPORT_PATH,
      ANALYSIS_OUTPUT_DIR: tmpDir,
    });
    expect(exitCode).toBe(0);
  });

  it("ヘッダー行がなければ詳細を出して終了コード1", async () => {
    const inputPath = path.join(tmpDir, "invalid.csv");
    fs.writeFileSync(inputPath, "Клиент\nИтого\n", "utf-8");

    const exitCode = await runCli([inputPath], { ANALYSIS_OUTPUT_DIR: tmpDir });

    expect(exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("❌ Placement report has no header line");
    expect(errorSpy).toHaveBeenCalledWith(
      "   header: Header line not found after 4 preamble lines"
    );
  });
});
