/**
 * Product 컨트롤러
 * HTTP 요청/응답 변환
 *
 * SOLID 원칙:
 * - SRP: HTTP 요청/응답 변환만 담당
 * - DIP: IProductService 인터페이스에 의존
 *
 * 저장소 장애 등 예외는 asyncHandler → errorHandler로 전달
 */

import { Request, Response } from "express";
import { z } from "zod";
import { IProductService } from "@/core/interfaces/IProductService";
import { toFieldIssues } from "@/core/domain/Product";
import { ValidationError } from "@/core/errors/ProductError";
import { sendProductError } from "@/middleware/errorHandler";
import { parseProductId } from "@/middleware/validation";

/**
 * 생성/수정 요청 본문
 * 타입만 확인 (필수/길이/공백 검증은 서비스 담당)
 */
const ProductBodySchema = z.object(
  {
    category: z.string({ invalid_type_error: "must be a string" }).optional(),
    name: z.string({ invalid_type_error: "must be a string" }).optional(),
  },
  { invalid_type_error: "must be a JSON object" },
);

const DECIMAL_DIGITS = /^\d+$/;

/**
 * 쿼리스트링 숫자 파라미터
 * 빈 값은 미지정, 10진 숫자만 변환 (그 외는 NaN → PaginationEngine에서 거부)
 */
const optionalNumber = z
  .string({ invalid_type_error: "must be a single value" })
  .optional()
  .transform((value) => {
    if (value === undefined || value === "") return undefined;
    return DECIMAL_DIGITS.test(value) ? Number(value) : Number.NaN;
  });

const ListQuerySchema = z.object({
  category: z.string({ invalid_type_error: "must be a single value" }).optional(),
  page: optionalNumber,
  size: optionalNumber,
});

export class ProductController {
  constructor(private readonly service: IProductService) {}

  /**
   * POST /api/v1/products
   */
  async create(req: Request, res: Response): Promise<void> {
    const body = ProductBodySchema.safeParse(req.body);
    if (!body.success) {
      sendProductError(res, ValidationError.fromIssues(toFieldIssues(body.error, "body")));
      return;
    }

    const result = await this.service.create(body.data.category, body.data.name);
    if (!result.success) {
      sendProductError(res, result.error);
      return;
    }

    res.status(201).json({ success: true, data: result.data });
  }

  /**
   * GET /api/v1/products/:productId
   */
  async getById(req: Request, res: Response): Promise<void> {
    const result = await this.service.getById(this.productIdOf(req));
    if (!result.success) {
      sendProductError(res, result.error);
      return;
    }

    res.status(200).json({ success: true, data: result.data });
  }

  /**
   * PUT /api/v1/products/:productId
   * 전체 교체: category, name 모두 필수
   */
  async update(req: Request, res: Response): Promise<void> {
    const body = ProductBodySchema.safeParse(req.body);
    if (!body.success) {
      sendProductError(res, ValidationError.fromIssues(toFieldIssues(body.error, "body")));
      return;
    }

    const result = await this.service.update(
      this.productIdOf(req),
      body.data.category,
      body.data.name,
    );
    if (!result.success) {
      sendProductError(res, result.error);
      return;
    }

    res.status(200).json({ success: true, data: result.data });
  }

  /**
   * DELETE /api/v1/products/:productId
   */
  async delete(req: Request, res: Response): Promise<void> {
    const result = await this.service.delete(this.productIdOf(req));
    if (!result.success) {
      sendProductError(res, result.error);
      return;
    }

    res.status(200).json({ success: true });
  }

  /**
   * GET /api/v1/products?category=&page=&size=
   */
  async list(req: Request, res: Response): Promise<void> {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendProductError(res, ValidationError.fromIssues(toFieldIssues(query.error, "query")));
      return;
    }

    const { category, page, size } = query.data;
    const result = await this.service.listByCategory(category, page, size);
    if (!result.success) {
      sendProductError(res, result.error);
      return;
    }

    res.status(200).json({
      success: true,
      data: {
        products: result.data.items,
        totalPages: result.data.totalPages,
        totalElements: result.data.totalElements,
        page: result.data.page,
      },
    });
  }

  /**
   * GET /api/v1/products/categories
   */
  async listCategories(_req: Request, res: Response): Promise<void> {
    const categories = await this.service.listCategories();
    res.status(200).json({ success: true, data: categories });
  }

  /**
   * validateProductIdParam 통과 후 호출
   */
  private productIdOf(req: Request): number {
    const id = parseProductId(req.params.productId);
    if (id === null) {
      throw new ValidationError("productId", "must be a positive integer");
    }
    return id;
  }
}
