/**
 * HTTP 서버 설정 로더
 *
 * PORT, BASE_URL 환경변수를 zod로 검증
 * 잘못된 값은 기본값으로 대체하지 않고 기동 시점에 실패
 */

import { z } from "zod";
import { SERVER_DEFAULTS } from "@/config/constants";
import { compactEnv } from "@/config/StoreConfigLoader";

const DECIMAL_DIGITS = /^\d+$/;

const ServerEnvSchema = z.object({
  PORT: z
    .string()
    .regex(DECIMAL_DIGITS, "PORT must be an integer between 1 and 65535")
    .transform(Number)
    .pipe(
      z
        .number()
        .int()
        .min(1, "PORT must be an integer between 1 and 65535")
        .max(65535, "PORT must be an integer between 1 and 65535"),
    )
    .default(String(SERVER_DEFAULTS.PORT)),
  BASE_URL: z.string().url("BASE_URL must be a valid URL").optional(),
});

export interface ServerConfig {
  port: number;
  baseUrl: string;
}

/**
 * 환경변수에서 서버 설정 로드
 * @param env 기본값 process.env
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(compactEnv(env));

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid server configuration: ${details.join("; ")}`);
  }

  const { PORT, BASE_URL } = parsed.data;
  return { port: PORT, baseUrl: BASE_URL ?? `http://localhost:${PORT}` };
}
