import express, { Express } from "express";
import { errorHandler } from "./common/http";
import { categoryRoutes, productRoutes } from "./product/product.routes";
import { ProductService } from "./product/product.service";

export interface ProductAppDependencies {
  productService: ProductService;
  /** Rejects when the database cannot be reached. */
  checkDatabase: () => Promise<void>;
}

export function createApp({
  productService,
  checkDatabase,
}: ProductAppDependencies): Express {
  const app = express();
  app.use(express.json());

  app.use("/api/v1/products", productRoutes(productService));
  app.use("/api/v1/categories", categoryRoutes(productService));

  app.get("/health", async (_req, res) => {
    try {
      await checkDatabase();
      res.json({ status: "healthy" });
    } catch (error) {
      res.status(503).json({
        status: "unhealthy",
        error: (error as Error).message,
      });
    }
  });

  app.use(errorHandler);
  return app;
}
