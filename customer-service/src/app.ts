import express, { Express } from "express";
import { errorHandler } from "./common/http";
import { customerRoutes } from "./customer/customer.routes";
import { CustomerService } from "./customer/customer.service";

export interface CustomerAppDependencies {
  customerService: CustomerService;
  checkDatabase: () => Promise<void>;
}

export function createApp({
  customerService,
  checkDatabase,
}: CustomerAppDependencies): Express {
  const app = express();
  app.use(express.json());

  app.use("/api/v1/customers", customerRoutes(customerService));

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
