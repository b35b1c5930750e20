/**
 * PriceParser Utility
 *
 * 목적: 가격 텍스트 파싱 유틸리티
 * 패턴: Utility Class (Static Methods)
 *
 * 파싱 실패는 예외가 아니라 undefined 로 반환 (호출자가 기본값 결정)
 */

/**
 * 10진수 리터럴 (부호, 소수점, 지수 허용)
 */
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * 근사 표시 + 통화 기호 (예: "~$45.20")
 */
const CURRENCY_MARKS = /[$~]/g;

/**
 * 가격 파서 유틸리티
 */
export class PriceParser {
  /**
   * 천 단위 구분자 제거
   *
   * "1,234,567" → "1234567"
   */
  static stripThousands(text: string): string {
    return text.replace(/,/g, "");
  }

  /**
   * 숫자 문자열을 number 로 변환
   *
   * 앞뒤 공백만 허용, 그 외 문자가 섞이면 undefined
   * 예: " 12.5 " → 12.5, "12 TON" → undefined, "" → undefined
   */
  static parseNumber(text: string | null | undefined): number | undefined {
    if (typeof text !== "string") {
      return undefined;
    }

    const trimmed = text.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return undefined;
    }

    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  }

  /**
   * 쉼표 구분 숫자 파싱
   *
   * "1,500" → 1500
   */
  static parseGrouped(text: string | null | undefined): number | undefined {
    if (typeof text !== "string") {
      return undefined;
    }
    return this.parseNumber(this.stripThousands(text));
  }

  /**
   * 보조 통화 금액 파싱
   *
   * 통화 기호($), 천 단위 구분자, 근사 표시(~) 제거 후 파싱
   * "~$45.20" → 45.2, "$1,234" → 1234
   */
  static parseCurrencyAmount(
    text: string | null | undefined,
  ): number | undefined {
    if (typeof text !== "string") {
      return undefined;
    }
    return this.parseGrouped(text.replace(CURRENCY_MARKS, ""));
  }
}
