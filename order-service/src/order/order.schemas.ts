import { z } from "zod";
import { PAYMENT_METHODS } from "./order.types";

export const PaymentMethodSchema = z.enum(PAYMENT_METHODS);

/** Largest value of a Postgres INTEGER column. */
const MAX_ID = 2147483647;

export const IdParamSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(MAX_ID, "Id is out of range");

export const OrderRequestSchema = z.object({
  reference: z.string().trim().min(1).max(255).optional(),
  amount: z.number().positive("Order amount should be positive"),
  paymentMethod: PaymentMethodSchema,
  customerId: z.string().trim().min(1, "Customer should be present"),
  products: z
    .array(
      z.object({
        productId: z
          .number()
          .int()
          .positive("Product is mandatory")
          .max(MAX_ID, "Id is out of range"),
        quantity: z.number().positive("Quantity is mandatory"),
      })
    )
    .min(1, "You should at least purchase one product"),
});
