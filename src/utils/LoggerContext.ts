/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Request ID, Task 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param url - 요청 URL
 * @returns Request 컨텍스트가 포함된 자식 로거
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  url: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    url,
  });
}

/**
 * Task 전용 로거 생성
 * @param task - 작업 이름 (예: "get_gifts", "get_gift_info")
 * @param context - 추가 컨텍스트 (gift_id 등)
 */
export function createTaskLogger(
  task: string,
  context: Record<string, string | number | undefined> = {},
): Logger {
  return logger.child({ task, ...context });
}
