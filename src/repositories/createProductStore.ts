/**
 * Product Store 팩토리
 *
 * 설정(driver)에 따라 저장소 구현 선택
 * 생성된 핸들은 호출자가 init()/close() 수명주기를 관리
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { IProductStore } from "@/core/interfaces/IProductStore";
import {
  StoreConfig,
  SupabaseStoreConfig,
} from "@/config/StoreConfigLoader";
import { InMemoryProductStore } from "@/repositories/InMemoryProductStore";
import { SupabaseProductStore } from "@/repositories/SupabaseProductStore";

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

/**
 * 요청 단위 타임아웃 fetch
 * 타임아웃 시 AbortError → 저장소에서 StorageUnavailableError로 분류
 */
export function createTimeoutFetch(
  timeoutMs: number,
  baseFetch: typeof fetch = fetch,
): typeof fetch {
  return (input: FetchInput, init?: FetchInit) =>
    baseFetch(input, {
      ...init,
      signal: init?.signal ?? AbortSignal.timeout(timeoutMs),
    });
}

export function createSupabaseClient(
  config: SupabaseStoreConfig,
): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: createTimeoutFetch(config.timeoutMs) },
  });
}

export function createProductStore(config: StoreConfig): IProductStore {
  switch (config.driver) {
    case "memory":
      return new InMemoryProductStore();
    case "supabase":
      return new SupabaseProductStore(createSupabaseClient(config), {
        tableName: config.tableName,
        categoryViewName: config.categoryViewName,
      });
  }
}
