/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 출력 (logMethod hook) + 파일 출력 (destination) 동일 내용
 * - 서비스별 로그 파일 분리 (service_name 필드 기반)
 * - 일일 로그 로테이션, 90일 보관
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (LOG_TO_FILE, 테스트 환경 기본 비활성):
 * - logs/YYYY-MM-DD/server.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "production"
    ? "info"
    : NODE_ENV === "test"
      ? "silent"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE
  ? process.env.LOG_TO_FILE === "true"
  : NODE_ENV !== "test";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 90,
      maxSize: "100M",
    },
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 서비스별 라우팅 스트림
 * - skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음 (health check)
 * - 에러는 error.log에도 기록
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingFileStream>();
  private errorStream: RotatingFileStream | null = null;

  write(chunk: string): void {
    let record: unknown;
    try {
      record = JSON.parse(chunk);
    } catch {
      this.getStream("server").write(chunk);
      return;
    }

    if (!isRecord(record) || record.skip_file_log === true) {
      return;
    }

    if (record.level === "error" || record.level === "fatal") {
      this.errorStream ??= createRotatingStream("error");
      this.errorStream.write(chunk);
    }

    const serviceName =
      typeof record.service_name === "string" ? record.service_name : "server";
    this.getStream(serviceName).write(chunk);
  }

  private getStream(serviceName: string): RotatingFileStream {
    let stream = this.streams.get(serviceName);
    if (!stream) {
      stream = createRotatingStream(serviceName);
      this.streams.set(serviceName, stream);
    }
    return stream;
  }
}

/**
 * 파일 출력 비활성 시 destination (콘솔 hook만 사용)
 */
class DiscardStream implements DestinationStream {
  write(): void {}
}

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

const LEVEL_ERROR = pino.levels.values.error;
const LEVEL_WARN = pino.levels.values.warn;

const EXCLUDED_CONSOLE_FIELDS = new Set([
  "level",
  "time",
  "service",
  "env",
  "pid",
  "hostname",
  "msg",
  "important",
  "skip_file_log",
]);

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LEVEL_ERROR ? "\x1b[31m" : level >= LEVEL_WARN ? "\x1b[33m" : "\x1b[32m";
  const levelText =
    level >= LEVEL_ERROR ? "ERROR" : level >= LEVEL_WARN ? "WARN" : "INFO";
  const star = logObj.important ? " ⭐" : "";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star}${msg ? ` \x1b[36m${msg}\x1b[0m` : ""}`,
  );

  for (const [field, value] of Object.entries(logObj)) {
    if (EXCLUDED_CONSOLE_FIELDS.has(field)) continue;
    const rendered =
      typeof value === "object" && value !== null
        ? JSON.stringify(value, null, 2)
            .split("\n")
            .map((line) => "  " + line)
            .join("\n")
        : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = { ...this.bindings() };
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
    service: "product_catalog",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
  hooks: createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  ),
};

if (LOG_TO_FILE) {
  fs.mkdirSync(LOG_DIR, { recursive: true });
}

const logger: pino.Logger = pino(
  baseConfig,
  LOG_TO_FILE ? new ServiceRoutingStream() : new DiscardStream(),
);

export { logger };

export type Logger = pino.Logger;
