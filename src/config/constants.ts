/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Gift Market Scanner",
} as const;

/**
 * 마켓 설정
 */
export const MARKET_CONFIG = {
  /**
   * 사용할 플랫폼 설정 파일명 (config/platforms/{PLATFORM}.yaml)
   * 환경변수: MARKET_PLATFORM
   */
  PLATFORM: process.env.MARKET_PLATFORM || "fragment",

  /**
   * baseUrl 오버라이드 (스테이징/미러 사이트용)
   * 환경변수: MARKET_BASE_URL
   */
  BASE_URL_OVERRIDE: process.env.MARKET_BASE_URL || undefined,

  /**
   * 플랫폼 YAML 디렉토리 오버라이드 (빌드 산출물에서 실행할 때)
   * 환경변수: PLATFORM_CONFIG_DIR
   */
  CONFIG_DIR_OVERRIDE: process.env.PLATFORM_CONFIG_DIR || undefined,
} as const;

/**
 * 상세 조회 설정
 */
export const DETAIL_CONFIG = {
  /**
   * 상세 조회 동시 실행 수 (미지정 시 플랫폼 설정의 concurrency.default)
   * 환경변수: DETAIL_CONCURRENCY
   */
  CONCURRENCY: Number(process.env.DETAIL_CONCURRENCY) || undefined,
} as const;
