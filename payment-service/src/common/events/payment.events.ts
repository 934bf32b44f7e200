import { PaymentMethod } from "../../payment/payment.schemas";

export interface PaymentNotification {
  orderReference: string;
  amount: number;
  paymentMethod: PaymentMethod;
  customerFirstname: string;
  customerLastname: string;
  customerEmail: string;
}
