/**
 * Product 서비스
 *
 * 역할:
 * - 입력 검증 (저장소 호출 전, 부분 쓰기 없음)
 * - 저장소 NotFound → NotFoundError(id) 변환
 * - 페이지 요청 정규화 후 조회
 *
 * 수정 정책: 전체 교체
 * - category, name 모두 필수, 한 문장(replace)으로 덮어씀
 * - 동시 수정 시 최종 행은 어느 한 요청의 필드 전체와 같음 (필드 혼합 없음)
 *
 * SOLID 원칙:
 * - SRP: 상품 비즈니스 규칙 조율만 담당
 * - DIP: IProductStore 인터페이스에 의존 (생성자 주입)
 */

import { IProductService } from "@/core/interfaces/IProductService";
import { IProductStore } from "@/core/interfaces/IProductStore";
import {
  Product,
  ProductId,
  validateProductFields,
} from "@/core/domain/Product";
import { PageResult } from "@/core/domain/Page";
import { fail, ok, Result } from "@/core/domain/Result";
import {
  NotFoundError,
  ValidationError,
} from "@/core/errors/ProductError";
import { PaginationEngine } from "@/services/PaginationEngine";
import { SERVICE_NAMES } from "@/config/constants";
import { createServiceLogger } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.PRODUCT_SERVICE);

export class ProductService implements IProductService {
  constructor(
    private readonly store: IProductStore,
    private readonly pagination: PaginationEngine = new PaginationEngine(),
  ) {}

  async create(
    category: string | undefined,
    name: string | undefined,
  ): Promise<Result<Product, ValidationError>> {
    const fields = validateProductFields(category, name);
    if (!fields.success) {
      logger.info(fields.error.toLogObject(), "상품 생성 검증 실패");
      return fields;
    }

    const product = await this.store.insert(
      fields.data.category,
      fields.data.name,
    );
    logger.info({ productId: product.id }, "상품 생성 완료");
    return ok(product);
  }

  async getById(id: ProductId): Promise<Result<Product, NotFoundError>> {
    const found = await this.store.findById(id);
    if (!found.success) {
      logger.info({ productId: id }, "상품을 찾을 수 없음");
      return fail(new NotFoundError(found.error.id));
    }
    return found;
  }

  async update(
    id: ProductId,
    category: string | undefined,
    name: string | undefined,
  ): Promise<Result<Product, NotFoundError | ValidationError>> {
    const fields = validateProductFields(category, name);
    if (!fields.success) {
      logger.info(
        { productId: id, ...fields.error.toLogObject() },
        "상품 수정 검증 실패",
      );
      return fields;
    }

    const replaced = await this.store.replace(
      id,
      fields.data.category,
      fields.data.name,
    );
    if (!replaced.success) {
      logger.info({ productId: id }, "수정할 상품을 찾을 수 없음");
      return fail(new NotFoundError(replaced.error.id));
    }

    logger.info({ productId: id }, "상품 수정 완료");
    return replaced;
  }

  async delete(id: ProductId): Promise<Result<void, NotFoundError>> {
    const deleted = await this.store.deleteById(id);
    if (!deleted.success) {
      logger.info({ productId: id }, "삭제할 상품을 찾을 수 없음");
      return fail(new NotFoundError(deleted.error.id));
    }

    logger.info({ productId: id }, "상품 삭제 완료");
    return deleted;
  }

  async listByCategory(
    category: string | undefined,
    rawPage?: number,
    rawSize?: number,
  ): Promise<Result<PageResult<Product>, ValidationError>> {
    const request = this.pagination.normalize(category, rawPage, rawSize);
    if (!request.success) {
      logger.info(request.error.toLogObject(), "페이지 요청 검증 실패");
      return request;
    }

    const { page, size, sort } = request.data;
    const result = await this.store.queryByCategory(
      request.data.category,
      page,
      size,
      sort,
    );

    logger.debug(
      {
        category,
        page,
        size,
        count: result.items.length,
        totalElements: result.totalElements,
      },
      "카테고리별 상품 조회 완료",
    );
    return ok(result);
  }

  async listCategories(): Promise<string[]> {
    return this.store.distinctCategories();
  }

  async healthCheck(): Promise<boolean> {
    return this.store.healthCheck();
  }
}
