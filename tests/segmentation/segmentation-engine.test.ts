/**
 * セグメンテーションエンジンテスト
 */

import { evaluatePlacement } from "../../src/blocking/blocking-engine";
import {
  isEffectivePlacement,
  isIneffectivePlacement,
  segmentPlacement,
  segmentPlacements,
} from "../../src/segmentation/segmentation-engine";
import { createRecord, createStats } from "../helpers/placement-fixtures";

describe("segmentation-engine", () => {
  const stats = createStats({ avgCpa: 100, avgBounce: 30 });

  const effectiveRecord = createRecord({
    conversions: 2,
    costPerConversion: 80,
    ctr: 1,
    bounceRate: 20,
  });

  describe("segmentPlacement", () => {
    it("CPA・直帰率が平均以下でCTRが適正範囲なら EFFECTIVE", () => {
      expect(segmentPlacement(effectiveRecord, stats)).toBe("EFFECTIVE");
    });

    it("CTRの範囲 0.5〜2% は両端を含む", () => {
      expect(segmentPlacement(createRecord({ ...effectiveRecord, ctr: 0.5 }), stats)).toBe("EFFECTIVE");
      expect(segmentPlacement(createRecord({ ...effectiveRecord, ctr: 2 }), stats)).toBe("EFFECTIVE");
      expect(segmentPlacement(createRecord({ ...effectiveRecord, ctr: 2.01 }), stats)).toBe("MEDIUM");
    });

    it("CPAが平均と等しくても EFFECTIVE", () => {
      expect(
        segmentPlacement(createRecord({ ...effectiveRecord, costPerConversion: 100 }), stats)
      ).toBe("EFFECTIVE");
    });

    it("直帰率が平均を超えると EFFECTIVE にならない", () => {
      expect(segmentPlacement(createRecord({ ...effectiveRecord, bounceRate: 31 }), stats)).toBe(
        "MEDIUM"
      );
    });

    it("極端なCTRは INEFFECTIVE", () => {
      expect(segmentPlacement(createRecord({ ctr: 55 }), stats)).toBe("INEFFECTIVE");
    });

    it("高CTRでコンバージョンなしは INEFFECTIVE", () => {
      expect(segmentPlacement(createRecord({ ctr: 10 }), stats)).toBe("INEFFECTIVE");
    });

    it("CPAが平均の2.5倍超は INEFFECTIVE", () => {
      expect(
        segmentPlacement(createRecord({ conversions: 1, costPerConversion: 251 }), stats)
      ).toBe("INEFFECTIVE");
    });

    it("広告費50₽以上・10クリック以上でコンバージョンなしは INEFFECTIVE", () => {
      expect(segmentPlacement(createRecord({ spend: 50, clicks: 10 }), stats)).toBe("INEFFECTIVE");
    });

    it("1000表示以上でCTR 0.2%未満は INEFFECTIVE", () => {
      expect(segmentPlacement(createRecord({ impressions: 1000, ctr: 0.19 }), stats)).toBe(
        "INEFFECTIVE"
      );
    });

    it("コンバージョン・広告費・クリックがすべて0なら MEDIUM", () => {
      const record = createRecord({ impressions: 0, clicks: 0, ctr: 0, spend: 0, conversions: 0 });
      expect(isEffectivePlacement(record, stats)).toBe(false);
      expect(isIneffectivePlacement(record, stats)).toBe(false);
      expect(segmentPlacement(record, stats)).toBe("MEDIUM");
    });

    it("緩和係数は使わない（Yandexでもブロック判定とずれる）", () => {
      const record = createRecord({ placement: "yandex.ru", ctr: 12 });

      expect(evaluatePlacement(record, stats)).toBeNull();
      expect(segmentPlacement(record, stats)).toBe("INEFFECTIVE");
    });
  });

  describe("segmentPlacements", () => {
    it("全レコードを入力順で3区分のいずれか1つに振り分ける", () => {
      const records = [
        createRecord({ ...effectiveRecord, placement: "good.ru" }),
        createRecord({ placement: "plain.ru" }),
        createRecord({ placement: "fraud.ru", ctr: 60 }),
        createRecord({ ...effectiveRecord, placement: "fine.ru" }),
      ];

      const segments = segmentPlacements(records, stats);

      expect(segments).toEqual({
        effective: ["good.ru", "fine.ru"],
        medium: ["plain.ru"],
        ineffective: ["fraud.ru"],
      });
      expect(
        segments.effective.length + segments.medium.length + segments.ineffective.length
      ).toBe(records.length);
    });
  });
});
