import { Database } from "../db";
import { PaymentMethod } from "./payment.schemas";

export interface NewPayment {
  amount: number;
  paymentMethod: PaymentMethod;
  orderId: number;
  orderReference: string;
  customerId: string;
}

export interface PaymentRepository {
  /** Resolves the id of the stored payment. */
  save(payment: NewPayment): Promise<number>;
}

export class PgPaymentRepository implements PaymentRepository {
  constructor(private readonly db: Database) {}

  async save(payment: NewPayment): Promise<number> {
    const result = await this.db.query<{ id: number }>(
      `INSERT INTO payments (amount, payment_method, order_id, order_reference, customer_id)
       VALUES ($1, $2, $3, $4, $5) RETURNING id`,
      [
        payment.amount,
        payment.paymentMethod,
        payment.orderId,
        payment.orderReference,
        payment.customerId,
      ]
    );
    return result.rows[0].id;
  }
}
