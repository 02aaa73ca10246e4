/**
 * Pagination Engine
 *
 * 원시 page/size/category 입력을 저장소에 전달 가능한 PageRequest로 정규화
 *
 * 규칙:
 * - 값이 없을 때만 기본값 적용 (page=0, size=10)
 * - 명시된 값이 범위를 벗어나면 거부 (클램핑하지 않음)
 * - 조회 offset은 안전 정수 범위 이내
 * - 정렬은 id 오름차순 고정
 */

import { PAGINATION_CONFIG, PRODUCT_CONSTRAINTS } from "@/config/constants";
import { PageRequest, SortSpec } from "@/core/domain/Page";
import { fail, ok, Result } from "@/core/domain/Result";
import { ValidationError } from "@/core/errors/ProductError";

export const DEFAULT_SORT: SortSpec = Object.freeze({
  field: PAGINATION_CONFIG.SORT_FIELD,
  direction: PAGINATION_CONFIG.SORT_DIRECTION,
});

export class PaginationEngine {
  constructor(
    private readonly defaultSize: number = PAGINATION_CONFIG.DEFAULT_SIZE,
    private readonly maxSize: number = PAGINATION_CONFIG.MAX_SIZE,
  ) {}

  normalize(
    category?: string,
    rawPage?: number,
    rawSize?: number,
  ): Result<PageRequest, ValidationError> {
    if (category !== undefined) {
      if (category.trim().length === 0) {
        return fail(new ValidationError("category", "must not be blank"));
      }
      if (category.length > PRODUCT_CONSTRAINTS.CATEGORY_MAX_LENGTH) {
        return fail(
          new ValidationError(
            "category",
            `must be at most ${PRODUCT_CONSTRAINTS.CATEGORY_MAX_LENGTH} characters`,
          ),
        );
      }
    }

    const page = rawPage ?? PAGINATION_CONFIG.DEFAULT_PAGE;
    if (!Number.isSafeInteger(page) || page < 0) {
      return fail(new ValidationError("page", "must be a non-negative integer"));
    }

    const size = rawSize ?? this.defaultSize;
    if (!Number.isInteger(size) || size < 1 || size > this.maxSize) {
      return fail(
        new ValidationError(
          "size",
          `must be an integer between 1 and ${this.maxSize}`,
        ),
      );
    }

    // 마지막 행 offset((page + 1) * size - 1)까지 정확한 정수여야 함
    if ((page + 1) * size > Number.MAX_SAFE_INTEGER) {
      return fail(new ValidationError("page", "is too large for the page size"));
    }

    return ok({ category, page, size, sort: DEFAULT_SORT });
  }
}
