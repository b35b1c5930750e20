/**
 * FieldNormalizer Utility Test
 *
 * 목적: 셀 텍스트 정규화 규칙 검증
 */

import { describe, it, expect } from "@jest/globals";
import { FieldNormalizer } from "@/extractors/common/FieldNormalizer";

describe("FieldNormalizer", () => {
  describe("stripMarker", () => {
    it("숫자가 아닌 선행 문자 1개만 제거", () => {
      expect(FieldNormalizer.stripMarker("#1234")).toBe("1234");
      expect(FieldNormalizer.stripMarker("##12")).toBe("#12");
    });

    it("숫자로 시작하면 그대로", () => {
      expect(FieldNormalizer.stripMarker("1234")).toBe("1234");
    });
  });

  describe("parseListingId", () => {
    it("표시 문자를 제거하고 정수로 변환", () => {
      expect(FieldNormalizer.parseListingId("#1234")).toBe(1234);
      expect(FieldNormalizer.parseListingId("  #77 ")).toBe(77);
    });

    it("표시 문자가 없어도 파싱", () => {
      expect(FieldNormalizer.parseListingId("5")).toBe(5);
    });

    it("숫자가 아닌 문자가 남으면 undefined", () => {
      expect(FieldNormalizer.parseListingId("#12a")).toBeUndefined();
      expect(FieldNormalizer.parseListingId("#")).toBeUndefined();
      expect(FieldNormalizer.parseListingId("")).toBeUndefined();
    });

    it("셀이 없으면 undefined", () => {
      expect(FieldNormalizer.parseListingId(undefined)).toBeUndefined();
    });
  });

  describe("leadingValue", () => {
    it("마지막 공백 이후 토큰을 제거", () => {
      expect(FieldNormalizer.leadingValue("Vintage 3%")).toBe("Vintage");
    });

    it("여러 단어 값은 마지막 토큰만 제거", () => {
      expect(FieldNormalizer.leadingValue("Deep Space 3%")).toBe("Deep Space");
    });

    it("공백이 없으면 전체 텍스트", () => {
      expect(FieldNormalizer.leadingValue("Rare")).toBe("Rare");
    });

    it("개행으로 나뉜 셀 텍스트도 값만 유지", () => {
      expect(FieldNormalizer.leadingValue("Vintage\n      3%")).toBe("Vintage");
    });

    it("연속 공백 구분자는 값 끝에 남기지 않음", () => {
      expect(FieldNormalizer.leadingValue("Deep Space  1.5%")).toBe("Deep Space");
      expect(FieldNormalizer.leadingValue("Deep Space\t \n1.5%\n")).toBe(
        "Deep Space",
      );
    });
  });

  describe("alternateTokens", () => {
    it("짝수 인덱스 토큰만 유지", () => {
      expect(FieldNormalizer.alternateTokens("1,234 of 10,000")).toEqual([
        "1,234",
        "10,000",
      ]);
    });

    it("연속 공백을 하나로 취급", () => {
      expect(FieldNormalizer.alternateTokens("12  of\n 500")).toEqual([
        "12",
        "500",
      ]);
    });

    it("빈 텍스트는 빈 배열", () => {
      expect(FieldNormalizer.alternateTokens("")).toEqual([]);
    });
  });

  describe("typeSlugFromHref", () => {
    it("마지막 세그먼트의 첫 '-' 이전", () => {
      expect(FieldNormalizer.typeSlugFromHref("/gift/plushpepe-1234")).toBe(
        "plushpepe",
      );
    });

    it("'-' 가 없으면 세그먼트 전체", () => {
      expect(FieldNormalizer.typeSlugFromHref("/gifts/lolpop")).toBe("lolpop");
    });

    it("빈 링크는 빈 문자열", () => {
      expect(FieldNormalizer.typeSlugFromHref("")).toBe("");
    });
  });

  describe("orUnknown", () => {
    it("빈 값이면 Unknown", () => {
      expect(FieldNormalizer.orUnknown("")).toBe("Unknown");
      expect(FieldNormalizer.orUnknown(undefined)).toBe("Unknown");
    });

    it("값이 있으면 그대로", () => {
      expect(FieldNormalizer.orUnknown("alice")).toBe("alice");
    });
  });
});
