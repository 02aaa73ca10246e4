/**
 * Product 도메인 모델
 *
 * - id: 저장소가 생성 시 부여 (변경/재사용 불가)
 * - category: 1..100자, 공백만으로 구성 불가
 * - name: 1..200자, 공백만으로 구성 불가
 *
 * 호출자에게는 동결된(frozen) 스냅샷만 전달
 * 필드 변경은 저장소의 replace 한 번으로만 수행 (setter 없음)
 */

import { z, ZodError } from "zod";
import { PRODUCT_CONSTRAINTS } from "@/config/constants";
import { fail, ok, Result } from "@/core/domain/Result";
import { FieldIssue, ValidationError } from "@/core/errors/ProductError";

export type ProductId = number;

export interface Product {
  readonly id: ProductId;
  readonly category: string;
  readonly name: string;
}

export interface ProductFields {
  readonly category: string;
  readonly name: string;
}

/**
 * 길이 제한 + 비공백 텍스트 스키마
 * 저장 값은 trim 하지 않음 (생성 → 조회 왕복 시 동일 텍스트 보장)
 */
const boundedText = (maxLength: number) =>
  z
    .string({
      required_error: "is required",
      invalid_type_error: "must be a string",
    })
    .max(maxLength, `must be at most ${maxLength} characters`)
    .refine((value) => value.trim().length > 0, "must not be blank");

export const CategorySchema = boundedText(
  PRODUCT_CONSTRAINTS.CATEGORY_MAX_LENGTH,
);

export const ProductNameSchema = boundedText(
  PRODUCT_CONSTRAINTS.NAME_MAX_LENGTH,
);

export const ProductFieldsSchema = z.object({
  category: CategorySchema,
  name: ProductNameSchema,
});

/**
 * DB 레코드 스키마
 * PostgREST는 bigint id를 숫자로 반환
 */
export const ProductRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  category: z.string(),
  name: z.string(),
});

export type ProductRow = z.infer<typeof ProductRowSchema>;

/**
 * Zod 에러를 필드 단위 검증 내역으로 변환
 */
export function toFieldIssues(error: ZodError, fallbackField = "request"): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : fallbackField,
    reason: issue.message,
  }));
}

/**
 * 상품 필드 검증 (저장소 호출 전)
 */
export function validateProductFields(
  category: string | undefined,
  name: string | undefined,
): Result<ProductFields, ValidationError> {
  const parsed = ProductFieldsSchema.safeParse({ category, name });
  if (!parsed.success) {
    return fail(ValidationError.fromIssues(toFieldIssues(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * 동결된 상품 스냅샷 생성
 */
export function toProductSnapshot(row: ProductRow): Product {
  return Object.freeze({ id: row.id, category: row.category, name: row.name });
}
