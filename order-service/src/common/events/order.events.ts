import { Customer } from "../../customer/customer.client";
import { PaymentMethod } from "../../order/order.types";
import { PurchaseResult } from "../../product/product.client";

/** Published once per successfully created order. */
export interface OrderConfirmation {
  readonly orderReference: string;
  readonly totalAmount: number;
  readonly paymentMethod: PaymentMethod;
  readonly customer: Customer;
  readonly products: readonly PurchaseResult[];
}
