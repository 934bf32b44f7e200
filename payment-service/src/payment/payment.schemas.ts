import { z } from "zod";

export const PaymentMethodSchema = z.enum([
  "PAYPAL",
  "CREDIT_CARD",
  "VISA",
  "MASTER_CARD",
  "BITCOIN",
]);

export const PaymentRequestSchema = z.object({
  amount: z.number().positive("Payment amount should be positive"),
  paymentMethod: PaymentMethodSchema,
  orderId: z.number().int().positive().max(2147483647),
  orderReference: z.string().trim().min(1, "Order reference is required"),
  customer: z.object({
    id: z.string().min(1),
    firstname: z.string().min(1, "Firstname is required"),
    lastname: z.string().min(1, "Lastname is required"),
    email: z.string().email("The customer email is not correctly formatted"),
  }),
});

export type PaymentRequest = z.infer<typeof PaymentRequestSchema>;
export type PaymentMethod = z.infer<typeof PaymentMethodSchema>;
