/**
 * IMarkupFetcher Interface
 *
 * 목적: 원시 마크업(HTML) 조회 능력 추상화
 * 패턴: Strategy Pattern (HTTP 구현체 / 테스트용 Fake 교체 가능)
 */

/**
 * 지원 HTTP 메서드
 */
export type HttpMethod = "GET" | "POST";

/**
 * 쿼리 파라미터
 */
export type RequestParams = Record<string, string>;

/**
 * 마크업 조회기 인터페이스
 *
 * 전송 실패는 구현체가 throw 하며, 호출자(서비스)는 잡지 않고 그대로 전파함
 */
export interface IMarkupFetcher {
  /**
   * 마크업 조회
   *
   * @param method HTTP 메서드
   * @param path baseUrl 기준 상대 경로 또는 절대 URL
   * @param params 쿼리 파라미터 (GET/POST 모두 query string 으로 전달)
   * @returns 응답 본문 텍스트
   */
  fetch(method: HttpMethod, path: string, params?: RequestParams): Promise<string>;
}
