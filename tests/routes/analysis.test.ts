/**
 * 分析APIハンドラーテスト
 */

import { handleAnalysisRequest } from "../../src/routes/analysis";
import { SAMPLE_RECORDS } from "../helpers/placement-fixtures";

describe("handleAnalysisRequest", () => {
  it("正常なリクエストは 200 と分析結果", () => {
    const response = handleAnalysisRequest({ placements: SAMPLE_RECORDS }, "req-1");

    expect(response.success).toBe(true);
    expect(response.statusCode).toBe(200);
    expect(response.meta?.requestId).toBe("req-1");
    expect(response.data?.verdicts).toHaveLength(3);
    expect(response.data?.segments.effective).toEqual(["good.ru"]);
    expect(response.data?.report).toBeUndefined();
  });

  it("includeReport でレポート本文を含める", () => {
    const response = handleAnalysisRequest({
      placements: SAMPLE_RECORDS,
      includeReport: true,
      reportPeriod: "24.10.2025 - 25.10.2025",
    });

    expect(response.statusCode).toBe(200);
    expect(response.data?.report?.split("\n")).toContain(
      "Период анализа: 24.10.2025 - 25.10.2025"
    );
  });

  it("sourceType は省略できる", () => {
    const { sourceType: _omitted, ...record } = SAMPLE_RECORDS[0];
    const response = handleAnalysisRequest({ placements: [record] });
    expect(response.statusCode).toBe(200);
  });

  it("形式が不正なら 400", () => {
    const response = handleAnalysisRequest({ placements: "not-an-array" }, "req-2");

    expect(response.success).toBe(false);
    expect(response.statusCode).toBe(400);
    expect(response.error?.code).toBe("VALIDATION_ERROR");
    expect(response.meta?.requestId).toBe("req-2");
  });

  it("負の値はフィールド付きで 400", () => {
    const response = handleAnalysisRequest({
      placements: [{ ...SAMPLE_RECORDS[0], spend: -1 }],
    });

    expect(response.statusCode).toBe(400);
    expect(response.error?.details).toEqual({
      errors: [{ field: "placements.0.spend", message: "spend must be non-negative" }],
    });
  });

  it("空の placements は 422", () => {
    const response = handleAnalysisRequest({ placements: [] });

    expect(response.statusCode).toBe(422);
    expect(response.error?.code).toBe("EMPTY_BATCH");
  });
});
