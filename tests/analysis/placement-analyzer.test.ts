/**
 * プレースメント分析パイプラインテスト
 */

import { analyzePlacements } from "../../src/analysis/placement-analyzer";
import { EmptyBatchError } from "../../src/errors";
import { SAMPLE_RECORDS } from "../helpers/placement-fixtures";

describe("analyzePlacements", () => {
  it("統計・判定・セグメントをまとめて返す", () => {
    const result = analyzePlacements(SAMPLE_RECORDS, { executionId: "test-execution" });

    expect(result.executionId).toBe("test-execution");
    expect(result.statistics.placementCount).toBe(5);
    expect(result.verdicts.map((verdict) => [verdict.placement, verdict.criterionId])).toEqual([
      ["fraud.ru", "2.2а"],
      ["com.example.app", "2.2б"],
      ["waste.ru", "2.1Б"],
    ]);
    expect(result.segments).toEqual({
      effective: ["good.ru"],
      medium: ["neutral.ru"],
      ineffective: ["fraud.ru", "com.example.app", "waste.ru"],
    });
  });

  it("同じ入力からは同じ判定・セグメントになる", () => {
    const first = analyzePlacements(SAMPLE_RECORDS);
    const second = analyzePlacements(SAMPLE_RECORDS);

    expect(second.statistics).toEqual(first.statistics);
    expect(second.verdicts).toEqual(first.verdicts);
    expect(second.segments).toEqual(first.segments);
  });

  it("executionId 未指定なら uuid v4 を採番する", () => {
    const result = analyzePlacements(SAMPLE_RECORDS);
    expect(result.executionId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });

  it("タイムスタンプと所要時間を記録する", () => {
    const result = analyzePlacements(SAMPLE_RECORDS);
    expect(Date.parse(result.finishedAt)).toBeGreaterThanOrEqual(Date.parse(result.startedAt));
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("空バッチは EmptyBatchError", () => {
    expect(() => analyzePlacements([])).toThrow(EmptyBatchError);
  });
});
