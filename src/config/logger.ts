/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 구조화된 JSON 로깅 (콘솔)
 * - 개발 환경: LOG_PRETTY=true 이면 색상 포맷
 * - LOG_TO_FILE=true 이면 날짜별 디렉터리에 파일 기록
 *   - logs/YYYY-MM-DD/{SERVICE_NAME}.log
 *   - logs/YYYY-MM-DD/error.log (에러 통합)
 *   - 일일 로테이션, 30일 보관
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import type { RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getDateStringWithDash } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "scanner";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "50M",
    },
  );
}

/**
 * 파일 라우팅 스트림
 * 에러 레벨은 error.log 에도 기록
 */
class FileRoutingStream implements DestinationStream {
  private readonly serviceStream: RotatingFileStream;
  private readonly errorStream: RotatingFileStream;

  constructor(serviceName: string) {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
    this.serviceStream = createRotatingStream(serviceName);
    this.errorStream = createRotatingStream("error");
  }

  write(chunk: string): boolean {
    this.serviceStream.write(chunk);

    // 에러 이상 레벨 판별 (JSON 파싱 실패 시 서비스 파일에만 기록)
    try {
      const parsed: unknown = JSON.parse(chunk);
      if (isRecord(parsed) && isErrorLevel(parsed.level)) {
        this.errorStream.write(chunk);
      }
    } catch {
      return true;
    }
    return true;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isErrorLevel(level: unknown): boolean {
  if (typeof level === "number") return level >= LOG_LEVELS.ERROR;
  return level === "error" || level === "fatal";
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 콘솔 출력 임계값 (LOG_LEVEL 이상만 출력)
 */
const consoleThreshold = (): number => {
  switch (LOG_LEVEL) {
    case "trace":
      return LOG_LEVELS.TRACE;
    case "debug":
      return LOG_LEVELS.DEBUG;
    case "info":
      return LOG_LEVELS.INFO;
    case "warn":
      return LOG_LEVELS.WARN;
    case "error":
      return LOG_LEVELS.ERROR;
    case "fatal":
      return LOG_LEVELS.FATAL;
    default:
      return Infinity;
  }
};

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m`,
  );

  const fields = Object.keys(logObj).filter((k) => k !== "msg");
  fields.forEach((field) => {
    const raw = logObj[field];
    const value =
      typeof raw === "object"
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  });
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(
    JSON.stringify({
      ...logObj,
      level,
      time: getTimestampWithTimezone(),
      service_name: SERVICE_NAME,
    }),
  );
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  const threshold = consoleThreshold();

  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (level < threshold) {
        return;
      }

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (isRecord(first)) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "gift_market_scanner",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
  hooks: createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  ),
};

/**
 * 파일 기록을 하지 않을 때의 destination
 */
class DiscardStream implements DestinationStream {
  write(): boolean {
    return true;
  }
}

/**
 * 메인 로거 인스턴스
 * 콘솔 출력은 hook 이 담당하고, pino destination 은 파일(옵션) 전용
 */
const logger: pino.Logger = pino(
  baseConfig,
  LOG_TO_FILE ? new FileRoutingStream(SERVICE_NAME) : new DiscardStream(),
);

export { logger };

export type Logger = pino.Logger;
