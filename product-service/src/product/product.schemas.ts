import { z } from "zod";

/** Largest value of a Postgres INTEGER column. */
const MAX_ID = 2147483647;

const idSchema = (required: string) =>
  z.number().int().positive(required).max(MAX_ID, "Id is out of range");

export const IdParamSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(MAX_ID, "Id is out of range");

export const CategoryRequestSchema = z.object({
  name: z.string().trim().min(1, "Category name is required"),
  description: z.string().default(""),
});

export const ProductRequestSchema = z.object({
  name: z.string().trim().min(1, "Product name is required"),
  description: z.string().default(""),
  availableQuantity: z
    .number()
    .nonnegative("Available quantity cannot be negative"),
  price: z.number().positive("Price should be positive"),
  categoryId: idSchema("Product category is required"),
});

export const PurchaseRequestSchema = z.object({
  productId: idSchema("Product is mandatory"),
  quantity: z.number().positive("Quantity should be positive"),
});

export const PurchaseBatchSchema = z
  .array(PurchaseRequestSchema)
  .min(1, "At least one product is required");
