/**
 * Product Catalog 서버
 *
 * 기동 순서: 설정 로드 → 저장소 init → HTTP listen
 * 종료 순서: HTTP close → 저장소 close
 */

import "dotenv/config";
import { Server } from "http";
import { createApp } from "@/app";
import { APP_METADATA, SERVICE_NAMES } from "@/config/constants";
import { loadServerConfig } from "@/config/ServerConfigLoader";
import { loadStoreConfig } from "@/config/StoreConfigLoader";
import { IProductStore } from "@/core/interfaces/IProductStore";
import { createProductStore } from "@/repositories/createProductStore";
import { ProductService } from "@/services/ProductService";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function shutdown(
  signal: string,
  server: Server,
  store: IProductStore,
): Promise<void> {
  logger.warn(`${signal} 수신, 서버 종료 중...`);
  await closeServer(server);
  logger.info("HTTP 서버 종료");
  await store.close();
  logImportant(logger, "서버 종료 완료");
}

async function main(): Promise<void> {
  const { port, baseUrl } = loadServerConfig();
  const storeConfig = loadStoreConfig();
  const store = createProductStore(storeConfig);
  await store.init();

  const app = createApp(new ProductService(store));
  const server = app.listen(port, () => {
    logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
      port,
      env: process.env.NODE_ENV || "development",
      version: APP_METADATA.VERSION,
      store: storeConfig.driver,
    });
    logger.info(
      {
        baseUrl,
        endpoints: {
          health: `${baseUrl}/health`,
          products: `${APP_METADATA.API_PREFIX}/products`,
          categories: `${APP_METADATA.API_PREFIX}/products/categories`,
        },
      },
      "API 엔드포인트 등록 완료",
    );
  });

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      shutdown(signal, server, store)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, "서버 종료 실패");
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  logger.fatal(
    { error: error instanceof Error ? error.message : String(error) },
    "서버 기동 실패",
  );
  process.exit(1);
});
