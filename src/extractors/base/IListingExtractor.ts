/**
 * IListingExtractor Interface
 *
 * 목적: 카탈로그 페이지 → 목록 행 추출 인터페이스
 * 패턴: Strategy Pattern
 */

import type { ListingSummary } from "@/core/domain/Gift";

/**
 * 목록 추출기 인터페이스
 *
 * 구현체는 동기/순수 함수여야 함 (I/O 없음, 공유 가변 상태 없음)
 */
export interface IListingExtractor {
  /**
   * @param markup 카탈로그 페이지 HTML
   * @returns 문서 순서 그대로의 목록 (행이 없으면 빈 배열)
   */
  extract(markup: string): ListingSummary[];
}
