import { PurchaseRequest } from "../product/product.client";

export const PAYMENT_METHODS = [
  "PAYPAL",
  "CREDIT_CARD",
  "VISA",
  "MASTER_CARD",
  "BITCOIN",
] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface OrderLine {
  id: number;
  orderId: number;
  productId: number;
  quantity: number;
}

export interface Order {
  id: number;
  reference: string;
  createdAt: Date;
  customerId: string;
  totalAmount: number;
  paymentMethod: PaymentMethod;
  lines: OrderLine[];
}

export interface NewOrder {
  reference: string;
  customerId: string;
  totalAmount: number;
  paymentMethod: PaymentMethod;
}

export type NewOrderLine = Omit<OrderLine, "id">;

export interface OrderRequest {
  /** Generated when omitted. */
  reference?: string;
  amount: number;
  paymentMethod: PaymentMethod;
  customerId: string;
  products: PurchaseRequest[];
}

export interface OrderLineResponse {
  id: number;
  productId: number;
  quantity: number;
}

export interface OrderResponse {
  id: number;
  reference: string;
  amount: number;
  paymentMethod: PaymentMethod;
  customerId: string;
  createdAt: string;
  lines: OrderLineResponse[];
}

/** Steps an order creation passes through, in order. */
export type OrderCreationState =
  | "START"
  | "CUSTOMER_VALIDATED"
  | "INVENTORY_RESERVED"
  | "ORDER_PERSISTED"
  | "PAYMENT_INITIATED"
  | "CONFIRMED";
