/**
 * mapWithConcurrency Test
 */

import { describe, it, expect } from "@jest/globals";
import { mapWithConcurrency } from "@/utils/concurrency";

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("완료 순서와 무관하게 입력 순서 유지", async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it("동시 실행 수를 넘지 않음", async () => {
    let running = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });

    expect(peak).toBe(2);
  });

  it("0 이하 또는 NaN 은 순차 실행", async () => {
    const order: number[] = [];

    await mapWithConcurrency([1, 2, 3], Number.NaN, async (value) => {
      order.push(value);
      await delay(1);
    });
    await mapWithConcurrency([4, 5], 0, async (value) => {
      order.push(value);
    });

    expect(order).toEqual([1, 2, 3, 4, 5]);
  });

  it("실패 후에는 새 작업을 시작하지 않음", async () => {
    const started: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3, 4], 1, async (value) => {
        started.push(value);
        if (value === 2) {
          throw new Error("boom");
        }
        return value;
      }),
    ).rejects.toThrow("boom");

    expect(started).toEqual([1, 2]);
  });

  it("빈 입력", async () => {
    await expect(
      mapWithConcurrency([], 4, async (value: number) => value),
    ).resolves.toEqual([]);
  });
});
