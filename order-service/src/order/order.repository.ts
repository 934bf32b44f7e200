import { PoolClient } from "pg";
import { DuplicateOrderReferenceError } from "../common/errors";
import { Database } from "../db";
import { PaymentMethodSchema } from "./order.schemas";
import { NewOrder, NewOrderLine, Order, OrderLine } from "./order.types";

/** Order storage as seen from inside one local transaction. */
export interface OrderTransaction {
  saveOrder(order: NewOrder): Promise<Order>;
  saveOrderLine(line: NewOrderLine): Promise<OrderLine>;
}

export interface OrderRepository {
  findAll(): Promise<Order[]>;
  findById(id: number): Promise<Order | null>;
  existsByReference(reference: string): Promise<boolean>;
  findLinesByOrderId(orderId: number): Promise<OrderLine[]>;

  /** Commits when `work` resolves, rolls back when it rejects. */
  inTransaction<T>(work: (tx: OrderTransaction) => Promise<T>): Promise<T>;
}

interface OrderRow {
  id: number;
  reference: string;
  total_amount: string;
  payment_method: string;
  customer_id: string;
  created_at: Date;
}

interface OrderLineRow {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
}

const UNIQUE_VIOLATION = "23505";

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === UNIQUE_VIOLATION;

const ORDER_COLUMNS =
  "id, reference, total_amount, payment_method, customer_id, created_at";
const LINE_COLUMNS = "id, order_id, product_id, quantity";

const toOrderLine = (row: OrderLineRow): OrderLine => ({
  id: row.id,
  orderId: row.order_id,
  productId: row.product_id,
  quantity: row.quantity,
});

const toOrder = (row: OrderRow, lines: OrderLine[]): Order => ({
  id: row.id,
  reference: row.reference,
  createdAt: row.created_at,
  customerId: row.customer_id,
  totalAmount: Number(row.total_amount),
  paymentMethod: PaymentMethodSchema.parse(row.payment_method),
  lines,
});

class PgOrderTransaction implements OrderTransaction {
  constructor(private readonly client: PoolClient) {}

  async saveOrder(order: NewOrder): Promise<Order> {
    try {
      const result = await this.client.query<OrderRow>(
        `INSERT INTO customer_orders (reference, total_amount, payment_method, customer_id)
         VALUES ($1, $2, $3, $4) RETURNING ${ORDER_COLUMNS}`,
        [order.reference, order.totalAmount, order.paymentMethod, order.customerId]
      );
      return toOrder(result.rows[0], []);
    } catch (error) {
      // Another request committed the same reference since the caller checked.
      if (isUniqueViolation(error)) {
        throw new DuplicateOrderReferenceError(order.reference);
      }
      throw error;
    }
  }

  async saveOrderLine(line: NewOrderLine): Promise<OrderLine> {
    const result = await this.client.query<OrderLineRow>(
      `INSERT INTO order_lines (order_id, product_id, quantity)
       VALUES ($1, $2, $3) RETURNING ${LINE_COLUMNS}`,
      [line.orderId, line.productId, line.quantity]
    );
    return toOrderLine(result.rows[0]);
  }
}

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Database) {}

  async findAll(): Promise<Order[]> {
    const orders = await this.db.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM customer_orders ORDER BY id`
    );
    if (orders.rows.length === 0) {
      return [];
    }

    const lines = await this.db.query<OrderLineRow>(
      `SELECT ${LINE_COLUMNS} FROM order_lines WHERE order_id = ANY($1::int[]) ORDER BY id`,
      [orders.rows.map((row) => row.id)]
    );

    const linesByOrder = new Map<number, OrderLine[]>();
    for (const row of lines.rows) {
      const bucket = linesByOrder.get(row.order_id) ?? [];
      bucket.push(toOrderLine(row));
      linesByOrder.set(row.order_id, bucket);
    }

    return orders.rows.map((row) => toOrder(row, linesByOrder.get(row.id) ?? []));
  }

  async findById(id: number): Promise<Order | null> {
    const result = await this.db.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM customer_orders WHERE id = $1`,
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return toOrder(result.rows[0], await this.findLinesByOrderId(id));
  }

  async existsByReference(reference: string): Promise<boolean> {
    const result = await this.db.query(
      "SELECT 1 FROM customer_orders WHERE reference = $1",
      [reference]
    );
    return result.rows.length > 0;
  }

  async findLinesByOrderId(orderId: number): Promise<OrderLine[]> {
    const result = await this.db.query<OrderLineRow>(
      `SELECT ${LINE_COLUMNS} FROM order_lines WHERE order_id = $1 ORDER BY id`,
      [orderId]
    );
    return result.rows.map(toOrderLine);
  }

  inTransaction<T>(work: (tx: OrderTransaction) => Promise<T>): Promise<T> {
    return this.db.withTransaction((client) =>
      work(new PgOrderTransaction(client))
    );
  }
}
