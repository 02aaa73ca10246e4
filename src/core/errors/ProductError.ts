/**
 * 상품 도메인 에러
 *
 * 목적:
 * - 호출자가 "없음" / "잘못된 입력" / "저장소 장애"를 구분
 * - 에러별 HTTP 상태 코드, 재시도 여부 결정
 *
 * 전파 규칙:
 * - ValidationError, NotFoundError: Result 값으로 반환 (재시도 불가)
 * - StorageUnavailableError: throw (호출자가 재시도 가능, 내부 재시도 없음)
 */

import type { ProductId } from "@/core/domain/Product";

/**
 * 상품 에러 타입
 */
export enum ProductErrorType {
  /** 입력 형식/범위 오류 (저장소 호출 전 검출) */
  VALIDATION_ERROR = "VALIDATION_ERROR",

  /** 참조한 상품 없음 (삭제됨 포함) */
  NOT_FOUND = "NOT_FOUND",

  /** 저장소 I/O 장애 (연결 실패, 타임아웃, 스키마 미준비) */
  STORAGE_UNAVAILABLE = "STORAGE_UNAVAILABLE",
}

/**
 * 상품 에러 기본 클래스
 */
export abstract class ProductError extends Error {
  abstract readonly type: ProductErrorType;
  abstract readonly retryable: boolean;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * 필드 단위 검증 실패 내역
 */
export interface FieldIssue {
  field: string;
  reason: string;
}

/**
 * 검증 에러
 * 첫 번째 실패 필드를 field/reason으로 노출, 전체 내역은 issues
 */
export class ValidationError extends ProductError {
  readonly type = ProductErrorType.VALIDATION_ERROR;
  readonly retryable = false;
  readonly field: string;
  readonly reason: string;
  readonly issues: readonly FieldIssue[];

  constructor(field: string, reason: string, issues?: readonly FieldIssue[]) {
    super(`${field}: ${reason}`);
    this.field = field;
    this.reason = reason;
    this.issues = issues && issues.length > 0 ? issues : [{ field, reason }];
  }

  static fromIssues(issues: readonly FieldIssue[]): ValidationError {
    const [first] = issues;
    if (!first) {
      return new ValidationError("request", "invalid input");
    }
    return new ValidationError(first.field, first.reason, issues);
  }

  override toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), field: this.field, issues: this.issues };
  }
}

/**
 * 상품 없음 에러
 */
export class NotFoundError extends ProductError {
  readonly type = ProductErrorType.NOT_FOUND;
  readonly retryable = false;
  readonly productId: ProductId;

  constructor(productId: ProductId) {
    super(`product not found: ${productId}`);
    this.productId = productId;
  }

  override toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), productId: this.productId };
  }
}

/**
 * 저장소 장애 에러
 * 타임아웃도 여기로 분류 (NotFound로 보고하지 않음)
 */
export class StorageUnavailableError extends ProductError {
  readonly type = ProductErrorType.STORAGE_UNAVAILABLE;
  readonly retryable = true;
  readonly operation: string;
  readonly errorCause?: unknown;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`storage unavailable (${operation}): ${message}`);
    this.operation = operation;
    this.errorCause = cause;
  }

  override toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      operation: this.operation,
      errorCause:
        this.errorCause instanceof Error
          ? this.errorCause.message
          : this.errorCause,
    };
  }
}
