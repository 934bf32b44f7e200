import { Router } from "express";
import { asyncHandler, parse } from "../common/http";
import {
  CustomerRequestSchema,
  CustomerUpdateSchema,
} from "./customer.schemas";
import { CustomerService } from "./customer.service";

export const customerRoutes = (customerService: CustomerService): Router => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parse(CustomerRequestSchema, req.body);
      const id = await customerService.createCustomer(request);
      res.status(201).json({ id });
    })
  );

  router.put(
    "/",
    asyncHandler(async (req, res) => {
      const update = parse(CustomerUpdateSchema, req.body);
      await customerService.updateCustomer(update);
      res.status(202).end();
    })
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.json(await customerService.findAllCustomers());
    })
  );

  router.get(
    "/exists/:id",
    asyncHandler(async (req, res) => {
      res.json(await customerService.existsById(req.params.id));
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json(await customerService.findById(req.params.id));
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      await customerService.deleteCustomer(req.params.id);
      res.status(202).end();
    })
  );

  return router;
};
