import express, { Express } from "express";
import { errorHandler } from "./common/http";
import { paymentRoutes } from "./payment/payment.routes";
import { PaymentService } from "./payment/payment.service";

export interface PaymentAppDependencies {
  paymentService: PaymentService;
  checkDatabase: () => Promise<void>;
}

export function createApp({
  paymentService,
  checkDatabase,
}: PaymentAppDependencies): Express {
  const app = express();
  app.use(express.json());

  app.use("/api/v1/payments", paymentRoutes(paymentService));

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
