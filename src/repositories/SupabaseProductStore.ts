/**
 * Supabase Product Store 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase(PostgREST)와의 데이터 통신만 담당
 * - DIP: IProductStore 인터페이스 구현
 *
 * 원자성:
 * - replace: UPDATE ... WHERE id = ? RETURNING (한 문장, 행 잠금은 문장 단위)
 * - deleteById: DELETE ... WHERE id = ? RETURNING id (존재 확인 + 삭제 동시)
 * - queryByCategory: 목록과 exact count를 한 요청으로 조회 (같은 스냅샷)
 *
 * 에러 분류:
 * - 0건 (maybeSingle null, PGRST116) → StoreNotFound
 * - 그 외 PostgREST 에러, fetch 실패, 타임아웃 → StorageUnavailableError
 */

import { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  IProductStore,
  storeNotFound,
  StoreResult,
} from "@/core/interfaces/IProductStore";
import {
  Product,
  ProductId,
  ProductRowSchema,
  toProductSnapshot,
} from "@/core/domain/Product";
import { countPages, PageResult, SortSpec } from "@/core/domain/Page";
import { ok } from "@/core/domain/Result";
import {
  ProductError,
  StorageUnavailableError,
} from "@/core/errors/ProductError";
import { DATABASE_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { createServiceLogger } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.STORE);

/** 단일 행 조회 결과 없음 (single()) */
const PGRST_NO_ROWS = "PGRST116";

/** 요청한 range가 전체 건수를 넘음 (416) */
const PGRST_RANGE_NOT_SATISFIABLE = "PGRST103";

const ProductRowsSchema = z.array(ProductRowSchema);

const CategoryRowsSchema = z.array(z.object({ category: z.string() }));

/**
 * PostgREST 에러 (필요한 필드만)
 */
interface PostgrestErrorLike {
  message: string;
  code: string;
}

export interface SupabaseProductStoreOptions {
  tableName?: string;
  categoryViewName?: string;
}

type StoreState = "created" | "ready" | "closed";

export class SupabaseProductStore implements IProductStore {
  private readonly tableName: string;
  private readonly categoryViewName: string;
  private readonly fields = DATABASE_CONFIG.PRODUCT_FIELDS.join(", ");
  private state: StoreState = "created";

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseProductStoreOptions = {},
  ) {
    this.tableName = options.tableName ?? DATABASE_CONFIG.PRODUCT_TABLE_NAME;
    this.categoryViewName =
      options.categoryViewName ?? DATABASE_CONFIG.CATEGORY_VIEW_NAME;
  }

  /**
   * 테이블/뷰 존재 확인 후 사용 가능 상태로 전환
   */
  async init(): Promise<void> {
    if (this.state === "closed") {
      throw new StorageUnavailableError("init", "store is closed");
    }

    await this.execute("init", async () => {
      for (const relation of [this.tableName, this.categoryViewName]) {
        const { error } = await this.client
          .from(relation)
          .select("*", { count: "exact", head: true })
          .limit(1);
        if (error) {
          throw this.toStorageError("init", error);
        }
      }
    });

    this.state = "ready";
    logger.info(
      { table: this.tableName, view: this.categoryViewName },
      "[Store] Supabase 저장소 준비 완료",
    );
  }

  async close(): Promise<void> {
    if (this.state === "closed") return;
    this.state = "closed";
    await this.client.removeAllChannels();
    logger.info("[Store] Supabase 저장소 종료");
  }

  async healthCheck(): Promise<boolean> {
    if (this.state !== "ready") return false;

    try {
      const { error } = await this.client
        .from(this.tableName)
        .select("id")
        .limit(1);

      if (error) {
        logger.error({ error: error.message }, "[Store] Health check 실패");
        return false;
      }
      return true;
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Store] Health check 실패",
      );
      return false;
    }
  }

  async insert(category: string, name: string): Promise<Product> {
    return this.execute("insert", async () => {
      const { data, error } = await this.client
        .from(this.tableName)
        .insert({ category, name })
        .select(this.fields)
        .single();

      if (error) {
        throw this.toStorageError("insert", error);
      }

      const product = this.parseRow("insert", data);
      logger.info({ product_id: product.id }, "[Store] 상품 저장 완료");
      return product;
    });
  }

  async findById(id: ProductId): Promise<StoreResult<Product>> {
    return this.execute("findById", async () => {
      const { data, error } = await this.client
        .from(this.tableName)
        .select(this.fields)
        .eq("id", id)
        .maybeSingle();

      if (error) {
        if (error.code === PGRST_NO_ROWS) return storeNotFound(id);
        throw this.toStorageError("findById", error);
      }

      return data === null
        ? storeNotFound(id)
        : ok(this.parseRow("findById", data));
    });
  }

  async replace(
    id: ProductId,
    category: string,
    name: string,
  ): Promise<StoreResult<Product>> {
    return this.execute("replace", async () => {
      const { data, error } = await this.client
        .from(this.tableName)
        .update({ category, name })
        .eq("id", id)
        .select(this.fields)
        .maybeSingle();

      if (error) {
        if (error.code === PGRST_NO_ROWS) return storeNotFound(id);
        throw this.toStorageError("replace", error);
      }

      if (data === null) {
        logger.warn({ product_id: id }, "[Store] 수정 대상 없음");
        return storeNotFound(id);
      }

      return ok(this.parseRow("replace", data));
    });
  }

  async deleteById(id: ProductId): Promise<StoreResult<void>> {
    return this.execute("deleteById", async () => {
      const { data, error } = await this.client
        .from(this.tableName)
        .delete()
        .eq("id", id)
        .select("id");

      if (error) {
        throw this.toStorageError("deleteById", error);
      }

      if (!Array.isArray(data) || data.length === 0) {
        return storeNotFound(id);
      }

      logger.info({ product_id: id }, "[Store] 상품 삭제 완료");
      return ok(undefined);
    });
  }

  async queryByCategory(
    category: string | undefined,
    page: number,
    size: number,
    sort: SortSpec,
  ): Promise<PageResult<Product>> {
    return this.execute("queryByCategory", async () => {
      const from = page * size;

      let query = this.client
        .from(this.tableName)
        .select(this.fields, { count: "exact" });

      if (category !== undefined) {
        query = query.eq("category", category);
      }

      const { data, error, count } = await query
        .order(sort.field, { ascending: sort.direction === "asc" })
        .range(from, from + size - 1);

      if (error) {
        if (error.code === PGRST_RANGE_NOT_SATISFIABLE) {
          // 마지막 페이지 이후 요청: 빈 목록 + 같은 필터 기준 건수
          const totalElements = await this.countByCategory(category);
          return {
            items: [],
            totalPages: countPages(totalElements, size),
            totalElements,
            page,
          };
        }
        throw this.toStorageError("queryByCategory", error);
      }

      const items = this.parseRows("queryByCategory", data ?? []);
      const totalElements = count ?? 0;

      logger.debug(
        { category, page, size, count: items.length, totalElements },
        "[Store] 카테고리 조회 완료",
      );

      return {
        items,
        totalPages: countPages(totalElements, size),
        totalElements,
        page,
      };
    });
  }

  async distinctCategories(): Promise<string[]> {
    return this.execute("distinctCategories", async () => {
      const { data, error } = await this.client
        .from(this.categoryViewName)
        .select("category")
        .order("first_id", { ascending: true });

      if (error) {
        throw this.toStorageError("distinctCategories", error);
      }

      const parsed = CategoryRowsSchema.safeParse(data ?? []);
      if (!parsed.success) {
        throw new StorageUnavailableError(
          "distinctCategories",
          "malformed category rows",
          parsed.error,
        );
      }

      return [...new Set(parsed.data.map((row) => row.category))];
    });
  }

  private async countByCategory(category: string | undefined): Promise<number> {
    let query = this.client
      .from(this.tableName)
      .select("id", { count: "exact", head: true });

    if (category !== undefined) {
      query = query.eq("category", category);
    }

    const { error, count } = await query;
    if (error) {
      throw this.toStorageError("queryByCategory", error);
    }
    return count ?? 0;
  }

  /**
   * 상태 확인 + 예외 분류
   * 도메인 에러는 그대로, 나머지(fetch 실패, abort)는 StorageUnavailableError
   */
  private async execute<T>(
    operation: string,
    action: () => Promise<T>,
  ): Promise<T> {
    if (operation !== "init" && this.state !== "ready") {
      throw new StorageUnavailableError(
        operation,
        this.state === "closed" ? "store is closed" : "store is not initialized",
      );
    }

    try {
      return await action();
    } catch (error) {
      if (error instanceof ProductError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ operation, error: message }, "[Store] Supabase 호출 실패");
      throw new StorageUnavailableError(operation, message, error);
    }
  }

  private toStorageError(
    operation: string,
    error: PostgrestErrorLike,
  ): StorageUnavailableError {
    logger.error(
      { operation, error: error.message, code: error.code },
      "[Store] Supabase 쿼리 실패",
    );
    return new StorageUnavailableError(operation, error.message, error);
  }

  private parseRow(operation: string, row: unknown): Product {
    const [product] = this.parseRows(operation, [row]);
    if (!product) {
      throw new StorageUnavailableError(operation, "empty row");
    }
    return product;
  }

  private parseRows(operation: string, rows: unknown): Product[] {
    const parsed = ProductRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new StorageUnavailableError(
        operation,
        "malformed product row",
        parsed.error,
      );
    }
    return parsed.data.map(toProductSnapshot);
  }
}
