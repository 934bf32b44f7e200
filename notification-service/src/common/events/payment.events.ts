import { z } from "zod";

export const PaymentNotificationSchema = z.object({
  orderReference: z.string().min(1),
  amount: z.number(),
  paymentMethod: z.string().min(1),
  customerFirstname: z.string(),
  customerLastname: z.string(),
  customerEmail: z.string().email(),
});

export type PaymentNotification = z.infer<typeof PaymentNotificationSchema>;
