/**
 * 페이지네이션 도메인 타입
 */

import type { Product } from "@/core/domain/Product";

export type SortDirection = "asc" | "desc";

/**
 * 정렬 조건
 * 필드는 id로 고정 (PaginationEngine)
 */
export interface SortSpec {
  readonly field: "id";
  readonly direction: SortDirection;
}

/**
 * 정규화된 페이지 요청
 * 호출마다 생성되며 저장되지 않음
 */
export interface PageRequest {
  /** 카테고리 필터 (undefined = 전체) */
  readonly category?: string;
  /** 0부터 시작 */
  readonly page: number;
  /** 1..MAX_SIZE */
  readonly size: number;
  readonly sort: SortSpec;
}

export interface PageResult<T = Product> {
  readonly items: readonly T[];
  readonly totalPages: number;
  readonly totalElements: number;
  readonly page: number;
}

/**
 * 전체 페이지 수 계산 (행이 없으면 0)
 */
export function countPages(totalElements: number, size: number): number {
  return Math.ceil(totalElements / size);
}
