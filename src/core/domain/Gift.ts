/**
 * 기프트 도메인 모델
 *
 * 모든 레코드는 파싱 시점에 한 번 생성되는 불변 평범한 객체
 * (조회 능력/세션 핸들을 담지 않음 → 상세 조회는 GiftKey + 서비스로 분리)
 */

/**
 * 필드 누락 시 기본 표시값
 */
export const UNKNOWN_VALUE = "Unknown";

/**
 * 상세 조회용 키
 */
export interface GiftKey {
  readonly id: number;
  readonly itemType: string;
  readonly url: string;
}

/**
 * 카탈로그 페이지의 한 행
 *
 * isForSale === (price !== undefined)
 */
export interface ListingSummary extends GiftKey {
  readonly name: string;
  readonly price?: number;
  readonly isForSale: boolean;
}

/**
 * 소유권 이전 이력 한 행 (문서 순서 유지, 재정렬하지 않음)
 */
export interface OwnershipHistoryEntry {
  /** 표시 텍스트 그대로 (행마다 기호/형식이 다름) */
  readonly price: string | number;
  /** 표시 문자열 그대로 (날짜 타입으로 파싱하지 않음) */
  readonly date: string;
  readonly buyer: string;
}

/**
 * 기프트 상세 정보
 *
 * isForSale === (tonPrice !== undefined), usdPrice 는 독립
 */
export interface ItemDetail {
  readonly id: number;
  readonly itemType: string;
  readonly owner: string;
  readonly model: string;
  readonly backdrop: string;
  readonly symbol: string;
  readonly issued: readonly string[];
  readonly tonPrice?: number;
  readonly usdPrice?: number;
  readonly isForSale: boolean;
  readonly history: readonly OwnershipHistoryEntry[];
}

/**
 * 목록 행에서 상세 조회 키만 추출
 */
export function toGiftKey(summary: GiftKey): GiftKey {
  return { id: summary.id, itemType: summary.itemType, url: summary.url };
}
