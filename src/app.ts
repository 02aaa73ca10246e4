/**
 * Express 애플리케이션 구성
 * 서비스는 외부에서 주입 (저장소 수명주기는 server.ts가 관리)
 */

import express, { Express } from "express";
import { APP_METADATA } from "@/config/constants";
import { IProductService } from "@/core/interfaces/IProductService";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { asyncHandler } from "@/middleware/asyncHandler";
import { createProductsRouter } from "@/routes/products.router";

export function createApp(service: IProductService): Express {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  // 헬스체크 엔드포인트
  app.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const storeHealthy = await service.healthCheck();
      res.status(storeHealthy ? 200 : 503).json({
        status: storeHealthy ? "ok" : "degraded",
        message: `${APP_METADATA.NAME} is running`,
        version: APP_METADATA.VERSION,
        store: { healthy: storeHealthy },
      });
    }),
  );

  app.use(`${APP_METADATA.API_PREFIX}/products`, createProductsRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
