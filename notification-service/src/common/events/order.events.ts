import { z } from "zod";

export const OrderConfirmationSchema = z.object({
  orderReference: z.string().min(1),
  totalAmount: z.number(),
  paymentMethod: z.string().min(1),
  customer: z.object({
    id: z.string(),
    firstname: z.string(),
    lastname: z.string(),
    email: z.string().email(),
  }),
  products: z.array(
    z.object({
      productId: z.number(),
      name: z.string(),
      price: z.number(),
      quantity: z.number(),
    })
  ),
});

export type OrderConfirmation = z.infer<typeof OrderConfirmationSchema>;
