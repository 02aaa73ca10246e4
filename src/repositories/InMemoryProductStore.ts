/**
 * In-Memory Product Store
 *
 * 프로세스 내부 저장소 (STORE_DRIVER=memory, 테스트)
 *
 * - id는 단조 증가 카운터 (삭제 후에도 재사용하지 않음)
 * - 각 연산은 await 없이 동기적으로 읽고 쓰므로 연산 단위로 원자적
 * - 저장된 행은 동결 스냅샷이므로 그대로 반환해도 외부에서 변경 불가
 */

import {
  IProductStore,
  storeNotFound,
  StoreResult,
} from "@/core/interfaces/IProductStore";
import { Product, ProductId, toProductSnapshot } from "@/core/domain/Product";
import { countPages, PageResult, SortSpec } from "@/core/domain/Page";
import { ok } from "@/core/domain/Result";
import { StorageUnavailableError } from "@/core/errors/ProductError";

type StoreState = "created" | "ready" | "closed";

export class InMemoryProductStore implements IProductStore {
  private readonly rows = new Map<ProductId, Product>();
  private nextId: ProductId = 1;
  private state: StoreState = "created";

  async init(): Promise<void> {
    if (this.state === "closed") {
      throw new StorageUnavailableError("init", "store is closed");
    }
    this.state = "ready";
  }

  async close(): Promise<void> {
    this.state = "closed";
    this.rows.clear();
  }

  async healthCheck(): Promise<boolean> {
    return this.state === "ready";
  }

  async insert(category: string, name: string): Promise<Product> {
    this.assertReady("insert");
    const product = toProductSnapshot({ id: this.nextId++, category, name });
    this.rows.set(product.id, product);
    return product;
  }

  async findById(id: ProductId): Promise<StoreResult<Product>> {
    this.assertReady("findById");
    const product = this.rows.get(id);
    return product ? ok(product) : storeNotFound(id);
  }

  async replace(
    id: ProductId,
    category: string,
    name: string,
  ): Promise<StoreResult<Product>> {
    this.assertReady("replace");
    if (!this.rows.has(id)) {
      return storeNotFound(id);
    }
    const product = toProductSnapshot({ id, category, name });
    this.rows.set(id, product);
    return ok(product);
  }

  async deleteById(id: ProductId): Promise<StoreResult<void>> {
    this.assertReady("deleteById");
    return this.rows.delete(id) ? ok(undefined) : storeNotFound(id);
  }

  async queryByCategory(
    category: string | undefined,
    page: number,
    size: number,
    sort: SortSpec,
  ): Promise<PageResult<Product>> {
    this.assertReady("queryByCategory");

    const matched = [...this.rows.values()].filter(
      (product) => category === undefined || product.category === category,
    );
    matched.sort((a, b) =>
      sort.direction === "asc" ? a.id - b.id : b.id - a.id,
    );

    const offset = page * size;
    return {
      items: matched.slice(offset, offset + size),
      totalPages: countPages(matched.length, size),
      totalElements: matched.length,
      page,
    };
  }

  async distinctCategories(): Promise<string[]> {
    this.assertReady("distinctCategories");
    // Map은 삽입(id) 순서를 유지
    const categories = new Set<string>();
    for (const product of this.rows.values()) {
      categories.add(product.category);
    }
    return [...categories];
  }

  private assertReady(operation: string): void {
    if (this.state !== "ready") {
      throw new StorageUnavailableError(
        operation,
        this.state === "closed" ? "store is closed" : "store is not initialized",
      );
    }
  }
}
