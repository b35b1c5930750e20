/**
 * Scan Error Type Enum
 *
 * 목적:
 * - 전송/입력 실패 원인 세분화
 * - 재시도 가능 여부 판단
 *
 * 필드 단위 파싱 실패는 에러가 아니라 기본값으로 흡수되므로 여기에 포함하지 않음
 */

/**
 * Scan 에러 타입
 */
export enum ScanErrorType {
  /** 네트워크 에러 (연결 실패, DNS) */
  NETWORK_ERROR = "NETWORK_ERROR",

  /** 요청 타임아웃 */
  TIMEOUT = "TIMEOUT",

  /** 429 재시도 한도 초과 */
  RATE_LIMITED = "RATE_LIMITED",

  /** 5xx 재시도 한도 초과 */
  SERVER_ERROR = "SERVER_ERROR",

  /** 404 */
  NOT_FOUND = "NOT_FOUND",

  /** 그 외 HTTP 에러 (4xx) */
  HTTP_ERROR = "HTTP_ERROR",

  /** 파싱 불가능한 입력 (문자열이 아닌 마크업 등) */
  MARKUP_INVALID = "MARKUP_INVALID",

  /** 플랫폼 설정 파일 오류 */
  CONFIG_INVALID = "CONFIG_INVALID",
}

/**
 * Scan Error 클래스
 */
export class ScanError extends Error {
  public readonly type: ScanErrorType;
  public readonly url?: string;
  public readonly status?: number;
  public readonly retryable: boolean;
  public readonly errorCause?: Error;

  constructor(
    type: ScanErrorType,
    message: string,
    options?: {
      url?: string;
      status?: number;
      retryable?: boolean;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = "ScanError";
    this.type = type;
    this.url = options?.url;
    this.status = options?.status;
    this.retryable = options?.retryable ?? isRetryableType(type);
    this.errorCause = options?.cause;

    // Stack trace 유지
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScanError);
    }
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      url: this.url,
      status: this.status,
      retryable: this.retryable,
      cause: this.errorCause?.message,
    };
  }
}

/**
 * 에러 타입별 기본 재시도 가능 여부
 */
export function isRetryableType(type: ScanErrorType): boolean {
  switch (type) {
    case ScanErrorType.NETWORK_ERROR:
    case ScanErrorType.TIMEOUT:
    case ScanErrorType.RATE_LIMITED:
    case ScanErrorType.SERVER_ERROR:
      return true;
    default:
      return false;
  }
}

/**
 * ScanError 타입 가드
 */
export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}
