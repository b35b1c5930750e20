/**
 * Jest 공통 설정
 * 로거 모듈 로드 전에 환경변수 지정
 */

process.env.LOG_LEVEL = "silent";
process.env.LOG_TO_FILE = "false";
