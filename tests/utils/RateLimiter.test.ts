/**
 * RateLimiter Test
 */

import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { RateLimiter } from "@/utils/RateLimiter";

describe("RateLimiter", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("첫 요청은 대기하지 않음", async () => {
    const limiter = new RateLimiter(1000);
    const start = Date.now();

    await limiter.throttle("first");

    expect(Date.now() - start).toBeLessThan(100);
  });

  it("연속 요청은 간격만큼 대기", async () => {
    jest.useFakeTimers({ now: 0 });
    const limiter = new RateLimiter(500);

    await limiter.throttle();

    let released = false;
    const second = limiter.throttle().then(() => {
      released = true;
    });

    await jest.advanceTimersByTimeAsync(499);
    expect(released).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    await second;
    expect(released).toBe(true);
  });

  it("설정된 대기 시간 조회", () => {
    expect(new RateLimiter(300).getWaitTime()).toBe(300);
  });
});
