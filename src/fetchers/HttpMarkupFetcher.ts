/**
 * HTTP 마크업 조회기
 *
 * IMarkupFetcher 구현체 - Node 내장 fetch 기반
 *
 * 역할:
 * - baseUrl 기준 URL 조립 (절대 URL 은 그대로 사용)
 * - 파라미터는 GET/POST 모두 query string 으로 전달
 * - 타임아웃 / 429 / 5xx 재시도
 *
 * 재시도는 전송 계층 책임이며, Extractor 와 서비스는 재시도하지 않음
 */

import { v7 as uuidv7 } from "uuid";
import type {
  HttpMethod,
  IMarkupFetcher,
  RequestParams,
} from "@/core/interfaces/IMarkupFetcher";
import type { HttpConfig, MarketConfig } from "@/core/domain/MarketConfig";
import { ScanError, ScanErrorType } from "@/core/interfaces/ScanErrorType";
import { RateLimiter } from "@/utils/RateLimiter";
import { createRequestLogger } from "@/utils/LoggerContext";
import type { Logger } from "@/config/logger";

/**
 * 요청 단위 컨텍스트
 */
interface RequestContext {
  method: HttpMethod;
  url: string;
  log: Logger;
}

/**
 * HTTP 마크업 조회기
 */
export class HttpMarkupFetcher implements IMarkupFetcher {
  private readonly rateLimiter?: RateLimiter;

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpConfig,
  ) {
    if (http.requestDelay) {
      this.rateLimiter = new RateLimiter(http.requestDelay);
    }
  }

  /**
   * 플랫폼 설정으로부터 생성
   */
  static fromConfig(config: MarketConfig): HttpMarkupFetcher {
    return new HttpMarkupFetcher(config.baseUrl, config.http);
  }

  async fetch(
    method: HttpMethod,
    path: string,
    params: RequestParams = {},
  ): Promise<string> {
    const url = this.buildUrl(path, params);
    const log = createRequestLogger(uuidv7(), method, url);

    if (this.rateLimiter) {
      await this.rateLimiter.throttle(`${method} ${url}`);
    }

    const startTime = Date.now();
    const body = await this.fetchWithRetry({ method, url, log });

    log.debug(
      { duration_ms: Date.now() - startTime, bytes: body.length },
      "마크업 조회 완료",
    );

    return body;
  }

  /**
   * URL 빌드
   */
  buildUrl(path: string, params: RequestParams = {}): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * Retry 로직이 포함된 fetch
   */
  private async fetchWithRetry(
    context: RequestContext,
    attempt: number = 1,
  ): Promise<string> {
    const { method, url, log } = context;
    const canRetry = attempt < this.http.retryCount;

    // 본문 읽기까지 같은 타임아웃 / 에러 분류 적용
    let response: Response;
    let body: string | undefined;
    try {
      response = await fetch(url, {
        method,
        headers: this.http.headers,
        signal: AbortSignal.timeout(this.http.timeout),
      });

      if (response.ok) {
        body = await response.text();
      } else {
        // 재시도/에러 전에 연결 반환
        await response.body?.cancel();
      }
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;

      // Timeout
      if (isTimeoutError(error)) {
        if (canRetry) {
          log.warn({ attempt }, "요청 타임아웃, 재시도");
          await this.sleep(this.http.retryDelay);
          return this.fetchWithRetry(context, attempt + 1);
        }
        throw new ScanError(ScanErrorType.TIMEOUT, `Request timeout: ${url}`, {
          url,
          cause,
        });
      }

      throw new ScanError(
        ScanErrorType.NETWORK_ERROR,
        `Network error: ${cause?.message ?? String(error)}`,
        { url, cause },
      );
    }

    // 성공
    if (body !== undefined) {
      return body;
    }

    const status = response.status;

    // 404 Not Found
    if (status === 404) {
      throw new ScanError(ScanErrorType.NOT_FOUND, `Page not found: ${url}`, {
        url,
        status,
      });
    }

    // 429 Rate Limiting
    if (status === 429) {
      if (canRetry) {
        log.warn(
          { attempt, delay_ms: this.http.rateLimitDelay },
          "Rate limit (429), 재시도",
        );
        await this.sleep(this.http.rateLimitDelay);
        return this.fetchWithRetry(context, attempt + 1);
      }
      throw new ScanError(ScanErrorType.RATE_LIMITED, "Rate limit exceeded", {
        url,
        status,
      });
    }

    // 500 Server Error
    if (status >= 500) {
      if (canRetry) {
        log.warn({ attempt, status }, "서버 에러, 재시도");
        await this.sleep(this.http.retryDelay);
        return this.fetchWithRetry(context, attempt + 1);
      }
      throw new ScanError(ScanErrorType.SERVER_ERROR, `Server error: ${status}`, {
        url,
        status,
      });
    }

    // 기타 에러
    throw new ScanError(
      ScanErrorType.HTTP_ERROR,
      `HTTP ${status}: ${response.statusText}`,
      { url, status },
    );
  }

  /**
   * Sleep 유틸리티
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * AbortSignal.timeout 에 의한 중단 여부
 */
function isTimeoutError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  return error.name === "TimeoutError" || error.name === "AbortError";
}
