/**
 * Rate Limiter Utility
 *
 * 목적:
 * - 연속 요청 사이 최소 간격 보장
 * - 플랫폼 설정(http.requestDelay) 기반 대기 시간 적용
 */

import { logger } from "@/config/logger";

/**
 * Rate Limiter
 *
 * 동시 호출 시에도 예약 시각을 먼저 갱신하므로 요청 간격이 유지됨
 */
export class RateLimiter {
  private nextAvailableTime: number = 0;

  constructor(private readonly waitTimeMs: number) {}

  /**
   * Rate limiting 적용 (필요시 대기)
   */
  async throttle(context?: string): Promise<void> {
    const now = Date.now();
    const scheduled = Math.max(now, this.nextAvailableTime);
    this.nextAvailableTime = scheduled + this.waitTimeMs;

    const waitTime = scheduled - now;
    if (waitTime > 0) {
      logger.debug({ wait_time_ms: waitTime, context }, "Rate limiting 대기");
      await this.sleep(waitTime);
    }
  }

  /**
   * Sleep 유틸리티
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * 현재 설정 조회
   */
  getWaitTime(): number {
    return this.waitTimeMs;
  }
}
