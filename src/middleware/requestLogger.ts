/**
 * Request Logger 미들웨어
 *
 * - Request ID 생성 (x-request-id 헤더가 있으면 재사용)
 * - 요청/응답 로깅, 응답 시간 측정
 * - Health check 요청은 파일 로그 제외 (콘솔만)
 */

import "@/types/express";
import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

const SKIP_FILE_LOG_PATHS = ["/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const headerId = req.header("x-request-id");
  const requestId = headerId && headerId.trim() !== "" ? headerId : uuidv4();
  const startTime = Date.now();
  const skipFileLog = SKIP_FILE_LOG_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.id = requestId;
  req.log = logger;
  res.setHeader("x-request-id", requestId);

  logger.info(
    { query: req.query, ip: req.ip, skip_file_log: skipFileLog },
    "요청 수신",
  );

  res.on("finish", () => {
    const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";
    logger[level](
      {
        status: res.statusCode,
        duration_ms: Date.now() - startTime,
        skip_file_log: skipFileLog,
      },
      "요청 완료",
    );
  });

  next();
}
