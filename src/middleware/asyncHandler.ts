/**
 * 비동기 라우트 핸들러 래퍼
 * reject된 Promise를 전역 에러 핸들러(next)로 전달
 */

import { Request, Response, NextFunction, RequestHandler } from "express";

export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
