/**
 * FieldNormalizer Utility
 *
 * 목적: 셀 텍스트 → 필드 값 정규화 규칙
 * 패턴: Utility Class (Static Methods)
 */

import { UNKNOWN_VALUE } from "@/core/domain/Gift";

/**
 * 마지막 공백 구간 + 끝 토큰
 */
const TRAILING_TOKEN = /\s+\S*$/;

export class FieldNormalizer {
  /**
   * 선행 표시 문자 1개 제거 (숫자가 아닐 때만)
   *
   * "#1234" → "1234", "1234" → "1234"
   */
  static stripMarker(text: string): string {
    return /^\D/.test(text) ? text.slice(1) : text;
  }

  /**
   * 목록 행 번호 파싱
   *
   * 표시 문자 제거 후 숫자만 남아야 함
   * "#1234" → 1234, "#12a" → undefined, "" → undefined
   */
  static parseListingId(text: string | undefined): number | undefined {
    if (text === undefined) {
      return undefined;
    }

    const digits = this.stripMarker(text.trim());
    if (!/^\d+$/.test(digits)) {
      return undefined;
    }

    const id = Number.parseInt(digits, 10);
    return Number.isSafeInteger(id) ? id : undefined;
  }

  /**
   * 마지막 공백 앞까지의 값
   *
   * 셀 텍스트 형식: "값 희귀도%" → 값만 유지
   * 구분자는 공백 문자열 (개행/연속 공백 포함)
   * "Vintage 3%" → "Vintage", "Deep Space 3%" → "Deep Space", "Rare" → "Rare"
   * "Vintage\n  3%" → "Vintage"
   */
  static leadingValue(text: string): string {
    const value = text.trimEnd();
    const trailing = TRAILING_TOKEN.exec(value);
    return trailing ? value.slice(0, trailing.index).trimEnd() : value;
  }

  /**
   * "값 단위 값 단위 ..." 형식에서 값 토큰만 추출 (짝수 인덱스)
   *
   * "1,234 of 10,000" → ["1,234", "10,000"]
   */
  static alternateTokens(text: string): string[] {
    return text
      .split(/\s+/)
      .filter((token) => token.length > 0)
      .filter((_, index) => index % 2 === 0);
  }

  /**
   * 링크 경로에서 타입 slug 추출
   *
   * 마지막 "/" 이후 세그먼트의 첫 "-" 이전
   * "/gift/plushpepe-1234" → "plushpepe"
   */
  static typeSlugFromHref(href: string): string {
    const segment = href.split("/").pop() ?? "";
    return segment.split("-")[0];
  }

  /**
   * 빈 값이면 "Unknown"
   */
  static orUnknown(text: string | undefined): string {
    return text ? text : UNKNOWN_VALUE;
  }
}
