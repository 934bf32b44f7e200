import { Router } from "express";
import { asyncHandler, parse } from "../common/http";
import { PaymentRequestSchema } from "./payment.schemas";
import { PaymentService } from "./payment.service";

export const paymentRoutes = (paymentService: PaymentService): Router => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parse(PaymentRequestSchema, req.body);
      const id = await paymentService.createPayment(request);
      res.status(201).json({ id });
    })
  );

  return router;
};
