/**
 * 저장소 설정 로더
 *
 * 환경변수를 zod 스키마로 검증해 StoreConfig로 변환
 * 잘못된 설정은 모든 문제를 나열한 에러로 기동 시점에 실패
 */

import { z } from "zod";
import { DATABASE_CONFIG, STORE_DEFAULTS } from "@/config/constants";

const SupabaseEnvSchema = z.object({
  STORE_DRIVER: z.literal("supabase"),
  SUPABASE_URL: z
    .string({ required_error: "SUPABASE_URL is required" })
    .url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z
    .string({ required_error: "SUPABASE_SERVICE_ROLE_KEY is required" })
    .min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),
  SUPABASE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive("SUPABASE_TIMEOUT_MS must be a positive integer")
    .default(STORE_DEFAULTS.TIMEOUT_MS),
  PRODUCT_TABLE_NAME: z.string().min(1).default(DATABASE_CONFIG.PRODUCT_TABLE_NAME),
  PRODUCT_CATEGORY_VIEW_NAME: z
    .string()
    .min(1)
    .default(DATABASE_CONFIG.CATEGORY_VIEW_NAME),
});

const MemoryEnvSchema = z.object({
  STORE_DRIVER: z.literal("memory"),
});

const StoreEnvSchema = z.discriminatedUnion("STORE_DRIVER", [
  SupabaseEnvSchema,
  MemoryEnvSchema,
]);

export interface SupabaseStoreConfig {
  driver: "supabase";
  url: string;
  serviceRoleKey: string;
  timeoutMs: number;
  tableName: string;
  categoryViewName: string;
}

export interface MemoryStoreConfig {
  driver: "memory";
}

export type StoreConfig = SupabaseStoreConfig | MemoryStoreConfig;

/**
 * 빈 문자열 환경변수는 미설정으로 취급
 */
export function compactEnv(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const compacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      compacted[key] = value.trim();
    }
  }
  return compacted;
}

/**
 * 환경변수에서 저장소 설정 로드
 * @param env 기본값 process.env
 */
export function loadStoreConfig(
  env: Record<string, string | undefined> = process.env,
): StoreConfig {
  const source = compactEnv(env);
  const parsed = StoreEnvSchema.safeParse({
    ...source,
    STORE_DRIVER: source.STORE_DRIVER ?? STORE_DEFAULTS.DRIVER,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid store configuration: ${details.join("; ")}`);
  }

  const config = parsed.data;
  if (config.STORE_DRIVER === "memory") {
    return { driver: "memory" };
  }

  return {
    driver: "supabase",
    url: config.SUPABASE_URL,
    serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY,
    timeoutMs: config.SUPABASE_TIMEOUT_MS,
    tableName: config.PRODUCT_TABLE_NAME,
    categoryViewName: config.PRODUCT_CATEGORY_VIEW_NAME,
  };
}
