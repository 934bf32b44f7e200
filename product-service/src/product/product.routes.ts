import { Router } from "express";
import { asyncHandler, parse } from "../common/http";
import {
  CategoryRequestSchema,
  IdParamSchema,
  ProductRequestSchema,
  PurchaseBatchSchema,
} from "./product.schemas";
import { ProductService } from "./product.service";

export const productRoutes = (productService: ProductService): Router => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parse(ProductRequestSchema, req.body);
      const id = await productService.createProduct(request);
      res.status(201).json({ id });
    })
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await productService.findAll());
    })
  );

  router.post(
    "/purchase",
    asyncHandler(async (req, res) => {
      const batch = parse(PurchaseBatchSchema, req.body);
      res.json(await productService.purchaseProducts(batch));
    })
  );

  router.post(
    "/release",
    asyncHandler(async (req, res) => {
      const batch = parse(PurchaseBatchSchema, req.body);
      await productService.releaseProducts(batch);
      res.status(204).end();
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const id = parse(IdParamSchema, req.params.id);
      res.json(await productService.findById(id));
    })
  );

  return router;
};

export const categoryRoutes = (productService: ProductService): Router => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parse(CategoryRequestSchema, req.body);
      res.status(201).json(await productService.createCategory(request));
    })
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await productService.findAllCategories());
    })
  );

  return router;
};
