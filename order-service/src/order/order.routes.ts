import { Router } from "express";
import { asyncHandler, parse } from "../common/http";
import { IdParamSchema, OrderRequestSchema } from "./order.schemas";
import { OrderService } from "./order.service";

export const orderRoutes = (orderService: OrderService): Router => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parse(OrderRequestSchema, req.body);
      const id = await orderService.createOrder(request);
      res.status(201).json({ id });
    })
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await orderService.findAllOrders());
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const id = parse(IdParamSchema, req.params.id);
      res.json(await orderService.findById(id));
    })
  );

  return router;
};
