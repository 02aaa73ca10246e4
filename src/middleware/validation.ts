/**
 * 요청 검증 미들웨어
 *
 * 전송 계층 형식 검증만 담당 (필드 길이/공백 규칙은 서비스에서 검증)
 */

import { Request, Response, NextFunction } from "express";
import { ValidationError } from "@/core/errors/ProductError";
import { sendProductError } from "@/middleware/errorHandler";

const POSITIVE_INTEGER = /^[1-9]\d*$/;

/**
 * productId 경로 파라미터 → 양의 정수
 * @returns 형식이 잘못되면 null
 */
export function parseProductId(raw: string | undefined): number | null {
  if (raw === undefined || !POSITIVE_INTEGER.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * productId 파라미터 검증
 */
export function validateProductIdParam(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (parseProductId(req.params.productId) === null) {
    sendProductError(
      res,
      new ValidationError("productId", "must be a positive integer"),
    );
    return;
  }

  next();
}
