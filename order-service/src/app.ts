import express, { Express } from "express";
import { errorHandler } from "./common/http";
import { orderRoutes } from "./order/order.routes";
import { OrderService } from "./order/order.service";
import { orderLineRoutes } from "./orderline/orderline.routes";
import { OrderLineService } from "./orderline/orderline.service";

export interface OrderAppDependencies {
  orderService: OrderService;
  orderLineService: OrderLineService;
  /** Rejects when the database cannot be reached. */
  checkDatabase: () => Promise<void>;
}

export function createApp({
  orderService,
  orderLineService,
  checkDatabase,
}: OrderAppDependencies): Express {
  const app = express();
  app.use(express.json());

  app.use("/api/v1/orders", orderRoutes(orderService));
  app.use("/api/v1/order-lines", orderLineRoutes(orderLineService));

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
