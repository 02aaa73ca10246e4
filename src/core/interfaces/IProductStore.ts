/**
 * Product Store 인터페이스
 *
 * SOLID 원칙:
 * - DIP: 서비스는 이 추상화에만 의존 (Supabase/메모리 구현 교체 가능)
 *
 * 계약:
 * - 모든 쓰기는 저장소 왕복 1회 (replace/delete 전에 존재 확인 조회 없음)
 * - 반환 값은 동결된 스냅샷
 * - 상품 없음은 Result 값, I/O 장애는 StorageUnavailableError throw
 * - init() 이전 / close() 이후 호출은 StorageUnavailableError
 */

import type { Product, ProductId } from "@/core/domain/Product";
import type { PageResult, SortSpec } from "@/core/domain/Page";
import { fail, Failure, Result } from "@/core/domain/Result";

/**
 * 저장소 수준 "없음" 표식
 * 서비스에서 NotFoundError로 변환
 */
export interface StoreNotFound {
  readonly type: "NOT_FOUND";
  readonly id: ProductId;
}

export type StoreResult<T> = Result<T, StoreNotFound>;

export function storeNotFound(id: ProductId): Failure<StoreNotFound> {
  return fail<StoreNotFound>({ type: "NOT_FOUND", id });
}

export interface IProductStore {
  /**
   * 저장소 준비 (스키마 확인)
   */
  init(): Promise<void>;

  /**
   * 연결 해제
   */
  close(): Promise<void>;

  /**
   * 연결 상태 확인 (throw 하지 않음)
   */
  healthCheck(): Promise<boolean>;

  /**
   * 새 id를 부여해 저장
   */
  insert(category: string, name: string): Promise<Product>;

  findById(id: ProductId): Promise<StoreResult<Product>>;

  /**
   * 두 필드를 한 문장으로 덮어쓰기
   */
  replace(
    id: ProductId,
    category: string,
    name: string,
  ): Promise<StoreResult<Product>>;

  /**
   * 존재 확인과 삭제를 한 문장으로 수행
   */
  deleteById(id: ProductId): Promise<StoreResult<void>>;

  /**
   * 카테고리 필터 + 페이지 조회
   * 목록과 전체 건수는 같은 필터, 같은 스냅샷 기준
   * @param category undefined면 전체
   * @param page 0부터 시작
   */
  queryByCategory(
    category: string | undefined,
    page: number,
    size: number,
    sort: SortSpec,
  ): Promise<PageResult<Product>>;

  /**
   * 중복 없는 카테고리 목록 (최초 등록 순)
   */
  distinctCategories(): Promise<string[]>;
}
