/**
 * Result 타입
 *
 * 예상 가능한 실패(검증 실패, 상품 없음)는 예외 대신 값으로 반환
 * 호출부에서 success 분기를 반드시 처리하도록 강제
 */

export type Success<T> = { readonly success: true; readonly data: T };

export type Failure<E> = { readonly success: false; readonly error: E };

export type Result<T, E> = Success<T> | Failure<E>;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function fail<E>(error: E): Failure<E> {
  return { success: false, error };
}
