/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 출력 (LOG_PRETTY=true면 색상 포맷, 아니면 JSON)
 * - LOG_DIR 지정 시 날짜별 파일 출력 (logs/YYYY-MM-DD/suite.log, error.log)
 * - 일일 로그 로테이션, 14일 보관
 *
 * 콘솔 출력은 stderr 사용 (cucumber 포맷터 stdout과 분리)
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const LOG_DIR = process.env.LOG_DIR;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string) {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(logDir, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정(00:00) 기준 정렬
      initialRotation: true,
      immutable: true,
      path: logDir,
      maxFiles: 14,
      maxSize: "50M",
    },
  );
}

/**
 * 파일 라우팅 스트림
 * error 레벨 이상은 error.log에도 기록
 */
class FileRoutingStream implements DestinationStream {
  private readonly mainStream: ReturnType<typeof createRotatingStream>;
  private readonly errorStream: ReturnType<typeof createRotatingStream>;

  constructor(logDir: string) {
    this.mainStream = createRotatingStream(logDir, "suite");
    this.errorStream = createRotatingStream(logDir, "error");
  }

  write(chunk: string): boolean {
    this.mainStream.write(chunk);
    if (readLevel(chunk) >= LOG_LEVELS.ERROR) {
      this.errorStream.write(chunk);
    }
    return true;
  }
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

const LEVEL_BY_LABEL: Record<string, number> = {
  trace: LOG_LEVELS.TRACE,
  debug: LOG_LEVELS.DEBUG,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  fatal: LOG_LEVELS.FATAL,
};

/**
 * 직렬화된 로그 라인에서 레벨 숫자 추출
 */
function readLevel(chunk: string): number {
  try {
    const parsed: unknown = JSON.parse(chunk);
    if (typeof parsed === "object" && parsed !== null && "level" in parsed) {
      const { level } = parsed;
      if (typeof level === "number") return level;
      if (typeof level === "string") return LEVEL_BY_LABEL[level] ?? 0;
    }
  } catch {
    return 0;
  }
  return 0;
}

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const important = Boolean(logObj.important);
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
  const star = important ? " ⭐" : "";

  console.error(
    msg
      ? `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`
      : `[${time}] ${levelColor}${levelText}\x1b[0m${star}`,
  );

  const excludedFields = ["msg", "important"];
  Object.keys(logObj)
    .filter((k) => !excludedFields.includes(k))
    .forEach((field) => {
      const raw = logObj[field];
      const value =
        typeof raw === "object" && raw !== null
          ? JSON.stringify(raw, null, 2)
              .split("\n")
              .map((l) => "  " + l)
              .join("\n")
          : String(raw);
      console.error(`  ${field}: ${value}`);
    });
};

/**
 * 콘솔 포맷터 (JSON 한 줄)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.error(
    JSON.stringify({ time: getTimestampWithTimezone(), ...logObj, level }),
  );
};

/**
 * 콘솔 출력 Hook 생성 함수
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      // 파일 로그는 정상 처리
      method.apply(this, inputArgs);

      // Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = { ...this.bindings() };

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, serializeErrors(first));
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

/**
 * Error 인스턴스는 JSON.stringify로 빈 객체가 되므로 메시지만 남김
 */
function serializeErrors(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] =
      value instanceof Error ? `${value.name}: ${value.message}` : value;
  }
  return result;
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "blog-ui-suite",
    env: NODE_ENV,
  },
  hooks: createConsoleHook(LOG_PRETTY ? formatConsolePretty : formatConsoleJson),
};

// 파일 출력은 LOG_DIR 지정 시에만
const streams: pino.StreamEntry[] = LOG_DIR
  ? [{ level: "debug", stream: new FileRoutingStream(LOG_DIR) }]
  : [];

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(baseConfig, pino.multistream(streams));

export { logger };

export type Logger = pino.Logger;
