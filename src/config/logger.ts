/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 JSON 출력 + 파일 출력 (동일 내용)
 * - 서비스별 로그 파일 분리 (SERVICE_NAME 환경변수 기반)
 * - 일일 로그 로테이션 (logs/YYYY-MM-DD/{service}.log)
 * - 에러 통합 파일 (logs/YYYY-MM-DD/error.log)
 *
 * 파일 출력은 LOG_TO_FILE=false 또는 NODE_ENV=test 에서 비활성화
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getDateStringWithDash } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_TO_FILE =
  process.env.LOG_TO_FILE !== "false" && NODE_ENV !== "test";
const SERVICE_NAME = process.env.SERVICE_NAME || "affiliate";

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
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정 기준 정렬
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 90, // 90일 보관
      maxSize: "100M",
    },
  );
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
    service: "affiliate_converter",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

/**
 * 서비스별 라우팅 스트림
 * 에러 레벨 로그는 error.log에도 기록
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly serviceStreams = new Map<string, RotatingFileStream>();
  private errorStream: RotatingFileStream | null = null;

  write(chunk: string): boolean {
    let serviceName = SERVICE_NAME;
    let isError = false;

    try {
      const parsed: unknown = JSON.parse(chunk);
      if (typeof parsed === "object" && parsed !== null) {
        if ("service_name" in parsed && typeof parsed.service_name === "string") {
          serviceName = parsed.service_name;
        }
        if ("level" in parsed) {
          isError = parsed.level === "error" || parsed.level === "fatal";
        }
      }
    } catch {
      // JSON 파싱 실패 시 기본 서비스 파일에 기록
    }

    if (isError) {
      this.errorStream ??= createRotatingStream("error");
      this.errorStream.write(chunk);
    }

    this.streamFor(serviceName).write(chunk);
    return true;
  }

  private streamFor(serviceName: string): RotatingFileStream {
    const existing = this.serviceStreams.get(serviceName);
    if (existing) {
      return existing;
    }
    const created = createRotatingStream(serviceName);
    this.serviceStreams.set(serviceName, created);
    return created;
  }
}

function createLogger(): pino.Logger {
  const streams: pino.StreamEntry[] = [
    { level: "trace", stream: process.stdout },
  ];

  if (LOG_TO_FILE) {
    streams.push({ level: "debug", stream: new ServiceRoutingStream() });
  }

  return pino(baseConfig, pino.multistream(streams));
}

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = createLogger();

export { logger };

export type Logger = pino.Logger;
