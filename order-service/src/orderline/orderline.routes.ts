import { Router } from "express";
import { asyncHandler, parse } from "../common/http";
import { IdParamSchema } from "../order/order.schemas";
import { OrderLineService } from "./orderline.service";

export const orderLineRoutes = (orderLineService: OrderLineService): Router => {
  const router = Router();

  router.get(
    "/order/:orderId",
    asyncHandler(async (req, res) => {
      const orderId = parse(IdParamSchema, req.params.orderId);
      res.json(await orderLineService.findAllByOrderId(orderId));
    })
  );

  return router;
};
