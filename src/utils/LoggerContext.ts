/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 자식 로거 생성 헬퍼
 */

import { logger, Logger } from "@/config/logger";

/**
 * 서비스 전용 로거 생성
 * @param serviceName - 로그 파일 라우팅용 서비스명 (SERVICE_NAMES)
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data: Record<string, unknown> = {},
): void {
  target.info({ ...data, important: true }, message);
}
