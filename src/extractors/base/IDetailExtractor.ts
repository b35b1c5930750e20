/**
 * IDetailExtractor Interface
 *
 * 목적: 상세 페이지 → 상세 정보 추출 인터페이스
 * 패턴: Strategy Pattern
 */

import type { ItemDetail } from "@/core/domain/Gift";

/**
 * 상세 추출기 인터페이스
 */
export interface IDetailExtractor {
  /**
   * @param markup 상세 페이지 HTML
   * @param id 목록 단계에서 얻은 번호 (그대로 결과에 복사)
   * @param itemType 목록 단계에서 얻은 타입 (그대로 결과에 복사)
   */
  extract(markup: string, id: number, itemType: string): ItemDetail;
}
