/**
 * Product Service 인터페이스
 *
 * 검증 실패/상품 없음은 Result로 반환
 * 저장소 장애는 StorageUnavailableError throw
 */

import type { Product, ProductId } from "@/core/domain/Product";
import type { PageResult } from "@/core/domain/Page";
import type { Result } from "@/core/domain/Result";
import type {
  NotFoundError,
  ValidationError,
} from "@/core/errors/ProductError";

export interface IProductService {
  create(
    category: string | undefined,
    name: string | undefined,
  ): Promise<Result<Product, ValidationError>>;

  getById(id: ProductId): Promise<Result<Product, NotFoundError>>;

  /**
   * 전체 교체 (category, name 모두 필수)
   */
  update(
    id: ProductId,
    category: string | undefined,
    name: string | undefined,
  ): Promise<Result<Product, NotFoundError | ValidationError>>;

  delete(id: ProductId): Promise<Result<void, NotFoundError>>;

  listByCategory(
    category: string | undefined,
    rawPage?: number,
    rawSize?: number,
  ): Promise<Result<PageResult<Product>, ValidationError>>;

  listCategories(): Promise<string[]>;

  healthCheck(): Promise<boolean>;
}
