/**
 * 에러 핸들러 미들웨어
 * Express 전역 에러 처리 + 상품 에러 → HTTP 응답 변환
 *
 * 상태 코드:
 * - ValidationError → 400
 * - NotFoundError → 404
 * - StorageUnavailableError → 503
 * - 그 외 → 500
 */

import "@/types/express";
import { Request, Response, NextFunction } from "express";
import { logger } from "@/config/logger";
import {
  NotFoundError,
  ProductError,
  ProductErrorType,
  StorageUnavailableError,
  ValidationError,
} from "@/core/errors/ProductError";

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    field?: string;
    productId?: number;
  };
}

/**
 * express.json() 본문 파싱 실패 (body-parser)
 */
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

/**
 * 클라이언트에 노출 가능한 4xx 에러의 상태 코드 (body-parser: 413, 415 등)
 * @returns 해당 없으면 null
 */
function exposedClientStatus(err: unknown): number | null {
  if (
    err instanceof Error &&
    "expose" in err &&
    err.expose === true &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return err.status;
  }
  return null;
}

export function toHttpStatus(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof StorageUnavailableError) return 503;
  if (isBodyParseError(error)) return 400;
  return exposedClientStatus(error) ?? 500;
}

export function toErrorBody(error: unknown): ErrorResponseBody {
  if (error instanceof ValidationError) {
    return {
      success: false,
      error: { code: error.type, message: error.message, field: error.field },
    };
  }
  if (error instanceof NotFoundError) {
    return {
      success: false,
      error: {
        code: error.type,
        message: error.message,
        productId: error.productId,
      },
    };
  }
  if (error instanceof StorageUnavailableError) {
    return {
      success: false,
      error: { code: error.type, message: "storage unavailable" },
    };
  }
  if (isBodyParseError(error)) {
    return {
      success: false,
      error: {
        code: ProductErrorType.VALIDATION_ERROR,
        message: "body: malformed JSON",
        field: "body",
      },
    };
  }
  if (error instanceof Error && exposedClientStatus(error) !== null) {
    return {
      success: false,
      error: { code: "BAD_REQUEST", message: error.message },
    };
  }
  return {
    success: false,
    error: { code: "INTERNAL_ERROR", message: "Internal server error" },
  };
}

/**
 * 상품 에러 응답 전송 (Result 실패 분기용)
 */
export function sendProductError(res: Response, error: ProductError): void {
  res.status(toHttpStatus(error)).json(toErrorBody(error));
}

/**
 * 전역 에러 핸들러
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = toHttpStatus(err);
  const log = req.log ?? logger;
  const errorContext = {
    status,
    errorType:
      err instanceof ProductError
        ? err.type
        : err instanceof Error
          ? err.name
          : typeof err,
    errorCause:
      err instanceof ProductError
        ? err.toLogObject()
        : err instanceof Error
          ? { message: err.message, stack: err.stack }
          : String(err),
    request_id: req.id,
    method: req.method,
    path: req.path,
  };

  if (status >= 500) {
    log.error(errorContext, "요청 처리 실패");
  } else {
    log.warn(errorContext, "잘못된 요청");
  }

  res.status(status).json(toErrorBody(err));
}

/**
 * 404 핸들러
 */
export function notFoundHandler(req: Request, res: Response): void {
  (req.log ?? logger).warn(
    { request_id: req.id, method: req.method, path: req.path },
    "경로를 찾을 수 없음",
  );

  res.status(404).json({
    success: false,
    error: { code: "ROUTE_NOT_FOUND", message: `Cannot ${req.method} ${req.path}` },
  });
}
