/**
 * HttpMarkupFetcher Test
 *
 * 목적: URL 조립 / 재시도 / 에러 분류 검증 (global fetch mock)
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { HttpMarkupFetcher } from "@/fetchers/HttpMarkupFetcher";
import type { HttpConfig } from "@/core/domain/MarketConfig";
import { ScanError, ScanErrorType } from "@/core/interfaces/ScanErrorType";

const HTTP_CONFIG: HttpConfig = {
  headers: { "User-Agent": "test-agent" },
  timeout: 1000,
  retryCount: 2,
  retryDelay: 0,
  rateLimitDelay: 0,
};

const htmlResponse = (body: string, status: number = 200): Response =>
  new Response(body, { status, headers: { "Content-Type": "text/html" } });

async function captureError(promise: Promise<unknown>): Promise<ScanError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ScanError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected promise to reject");
}

describe("HttpMarkupFetcher", () => {
  let fetcher: HttpMarkupFetcher;
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetcher = new HttpMarkupFetcher("https://fragment.com", HTTP_CONFIG);
    fetchMock = jest.spyOn(global, "fetch");
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe("buildUrl", () => {
    it("상대 경로와 파라미터를 조립해야 함", () => {
      expect(
        fetcher.buildUrl("gifts/plushpepe", { filter: "sale", sort: "price_asc" }),
      ).toBe("https://fragment.com/gifts/plushpepe?filter=sale&sort=price_asc");
    });

    it("절대 URL 은 그대로 사용", () => {
      expect(fetcher.buildUrl("https://fragment.com/gift/plushpepe-1")).toBe(
        "https://fragment.com/gift/plushpepe-1",
      );
    });
  });

  describe("fetch", () => {
    it("응답 본문 텍스트를 반환해야 함", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("<html>ok</html>"));

      const body = await fetcher.fetch("POST", "gifts", { filter: "all" });

      expect(body).toBe("<html>ok</html>");
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://fragment.com/gifts?filter=all");
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({ "User-Agent": "test-agent" });
    });

    it("5xx 응답은 재시도 후 성공", async () => {
      fetchMock
        .mockResolvedValueOnce(htmlResponse("", 502))
        .mockResolvedValueOnce(htmlResponse("<html>retry</html>"));

      await expect(fetcher.fetch("GET", "gifts")).resolves.toBe(
        "<html>retry</html>",
      );
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("5xx 가 계속되면 SERVER_ERROR", async () => {
      fetchMock.mockImplementation(async () => htmlResponse("", 503));

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.SERVER_ERROR);
      expect(error.status).toBe(503);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("429 가 계속되면 RATE_LIMITED", async () => {
      fetchMock.mockImplementation(async () => htmlResponse("", 429));

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.RATE_LIMITED);
      expect(error.retryable).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("404 는 재시도 없이 NOT_FOUND", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("", 404));

      const error = await captureError(
        fetcher.fetch("GET", "https://fragment.com/gift/plushpepe-1"),
      );

      expect(error.type).toBe(ScanErrorType.NOT_FOUND);
      expect(error.url).toBe("https://fragment.com/gift/plushpepe-1");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("기타 4xx 는 HTTP_ERROR", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("", 403));

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.HTTP_ERROR);
      expect(error.retryable).toBe(false);
    });

    it("타임아웃이 계속되면 TIMEOUT", async () => {
      fetchMock.mockImplementation(async () => {
        throw Object.assign(new Error("The operation was aborted"), {
          name: "TimeoutError",
        });
      });

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.TIMEOUT);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("본문 읽기 중 타임아웃도 재시도 후 TIMEOUT", async () => {
      fetchMock.mockImplementation(async () => {
        const response = htmlResponse("<html>slow</html>");
        jest.spyOn(response, "text").mockRejectedValue(
          Object.assign(new Error("The operation was aborted due to timeout"), {
            name: "TimeoutError",
          }),
        );
        return response;
      });

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.TIMEOUT);
      expect(error.errorCause?.name).toBe("TimeoutError");
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("에러 응답의 본문은 읽지 않고 취소", async () => {
      const response = htmlResponse("<html>forbidden</html>", 403);
      const { body } = response;
      if (!body) {
        throw new Error("응답 본문 없음");
      }
      const cancelSpy = jest.spyOn(body, "cancel");
      fetchMock.mockResolvedValueOnce(response);

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.HTTP_ERROR);
      expect(cancelSpy).toHaveBeenCalledTimes(1);
    });

    it("네트워크 에러는 NETWORK_ERROR 로 감싸고 원인 유지", async () => {
      const cause = new TypeError("fetch failed");
      fetchMock.mockRejectedValueOnce(cause);

      const error = await captureError(fetcher.fetch("GET", "gifts"));

      expect(error.type).toBe(ScanErrorType.NETWORK_ERROR);
      expect(error.errorCause).toBe(cause);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
