/**
 * Products API 라우터
 *
 * - POST   /api/v1/products
 * - GET    /api/v1/products?category=&page=&size=
 * - GET    /api/v1/products/categories
 * - GET    /api/v1/products/:productId
 * - PUT    /api/v1/products/:productId
 * - DELETE /api/v1/products/:productId
 */

import { Router } from "express";
import { ProductController } from "@/controllers/ProductController";
import { IProductService } from "@/core/interfaces/IProductService";
import { asyncHandler } from "@/middleware/asyncHandler";
import { validateProductIdParam } from "@/middleware/validation";

export function createProductsRouter(service: IProductService): Router {
  const router = Router();
  const controller = new ProductController(service);

  router.post("/", asyncHandler((req, res) => controller.create(req, res)));
  router.get("/", asyncHandler((req, res) => controller.list(req, res)));

  // /:productId 보다 먼저 등록
  router.get(
    "/categories",
    asyncHandler((req, res) => controller.listCategories(req, res)),
  );

  router.get(
    "/:productId",
    validateProductIdParam,
    asyncHandler((req, res) => controller.getById(req, res)),
  );
  router.put(
    "/:productId",
    validateProductIdParam,
    asyncHandler((req, res) => controller.update(req, res)),
  );
  router.delete(
    "/:productId",
    validateProductIdParam,
    asyncHandler((req, res) => controller.delete(req, res)),
  );

  return router;
}
