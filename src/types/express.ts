/**
 * Express Request 타입 확장
 *
 * - id: Request ID (UUID v4, requestLogger에서 생성)
 * - log: Request별 로거 (request_id, method, path 컨텍스트)
 */

import type { Logger } from "@/config/logger";

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: Logger;
    }
  }
}

export {};
